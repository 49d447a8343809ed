/**
 * Stable catalog codes shared with the rest of the platform.
 * The rows themselves are seeded by the CreateIncidenciasSchema migration.
 */

export enum StateCode {
  PENDING = 'pendiente',
  ASSIGNED = 'asignada',
  IN_PROGRESS = 'en_proceso',
  RESOLVED = 'resuelta',
  CLOSED = 'cerrada',
  CANCELLED = 'cancelada',
}

export enum PriorityCode {
  LOW = 'baja',
  MEDIUM = 'media',
  HIGH = 'alta',
  URGENT = 'urgente',
}

export const DEFAULT_PRIORITY = PriorityCode.MEDIUM;

export const TERMINAL_STATES: readonly StateCode[] = [
  StateCode.CLOSED,
  StateCode.CANCELLED,
];

const STATE_CODES = new Set<string>(Object.values(StateCode));

export function isStateCode(value: string): value is StateCode {
  return STATE_CODES.has(value);
}
