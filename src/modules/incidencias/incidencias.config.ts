/** What happens to an incidencia's history rows when it is deleted */
export const HISTORY_RETENTION_MODES = ['retain', 'cascade'] as const;

export type HistoryRetention = (typeof HISTORY_RETENTION_MODES)[number];

export const DEFAULT_HISTORY_RETENTION: HistoryRetention = 'retain';

export function isHistoryRetention(value: string): value is HistoryRetention {
  return HISTORY_RETENTION_MODES.some((mode) => mode === value);
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/** Largest value of the SERIAL (int4) primary keys */
export const MAX_ROW_ID = 2147483647;
