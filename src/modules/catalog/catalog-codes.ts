import { StateCode, isStateCode } from './catalog.constants';

/**
 * Id-to-code lookup over every catalog row, active or not.
 * Used to render incidencias and history snapshots with stable codes
 * instead of numeric foreign keys.
 */
export class CatalogCodes {
  constructor(
    private readonly states: ReadonlyMap<number, string>,
    private readonly priorities: ReadonlyMap<number, string>,
    private readonly categories: ReadonlyMap<number, string>,
  ) {}

  stateCode(stateId: number): StateCode {
    const code = this.states.get(stateId);
    if (code === undefined || !isStateCode(code)) {
      throw new Error(`Catalog state ${stateId} is missing or unknown`);
    }
    return code;
  }

  priorityCode(priorityId: number): string {
    const code = this.priorities.get(priorityId);
    if (code === undefined) {
      throw new Error(`Catalog priority ${priorityId} is missing`);
    }
    return code;
  }

  categoryCode(categoryId: number | null): string | null {
    if (categoryId === null) {
      return null;
    }
    const code = this.categories.get(categoryId);
    if (code === undefined) {
      throw new Error(`Catalog category ${categoryId} is missing`);
    }
    return code;
  }
}
