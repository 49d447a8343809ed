import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { IncidenciaState } from '../../database/entities/incidencia-state.entity';
import { IncidenciaPriority } from '../../database/entities/incidencia-priority.entity';
import { IncidenciaCategory } from '../../database/entities/incidencia-category.entity';
import { CatalogCodeException, CatalogName } from './catalog.exceptions';
import { isStateCode } from './catalog.constants';
import { CatalogCodes } from './catalog-codes';

/**
 * CatalogService
 *
 * Read-only lookups over the state, priority and category tables.
 * Only active rows resolve by code; lookups by id return inactive rows too,
 * since existing incidencias may still reference them.
 */
@Injectable()
export class CatalogService {
  constructor(
    @InjectRepository(IncidenciaState)
    private readonly stateRepository: Repository<IncidenciaState>,
    @InjectRepository(IncidenciaPriority)
    private readonly priorityRepository: Repository<IncidenciaPriority>,
    @InjectRepository(IncidenciaCategory)
    private readonly categoryRepository: Repository<IncidenciaCategory>,
  ) {}

  async findStateByCode(code: string): Promise<IncidenciaState | null> {
    return this.stateRepository.findOne({ where: { code, active: true } });
  }

  async findPriorityByCode(code: string): Promise<IncidenciaPriority | null> {
    return this.priorityRepository.findOne({ where: { code, active: true } });
  }

  async findCategoryByCode(code: string): Promise<IncidenciaCategory | null> {
    return this.categoryRepository.findOne({ where: { code, active: true } });
  }

  /**
   * Resolve a state code, failing with a validation error when the code is
   * not part of the state machine or has no active catalog row.
   */
  async requireState(code: string): Promise<IncidenciaState> {
    this.assertCode('estado', code);
    const state = isStateCode(code) ? await this.findStateByCode(code) : null;
    if (!state) {
      throw new CatalogCodeException('estado', code);
    }
    return state;
  }

  async requirePriority(code: string): Promise<IncidenciaPriority> {
    this.assertCode('prioridad', code);
    const priority = await this.findPriorityByCode(code);
    if (!priority) {
      throw new CatalogCodeException('prioridad', code);
    }
    return priority;
  }

  async requireCategory(code: string): Promise<IncidenciaCategory> {
    this.assertCode('categoria', code);
    const category = await this.findCategoryByCode(code);
    if (!category) {
      throw new CatalogCodeException('categoria', code);
    }
    return category;
  }

  /**
   * Snapshot of every catalog row keyed by id. Rows retired after an
   * incidencia referenced them still resolve.
   */
  async loadCodes(): Promise<CatalogCodes> {
    const [states, priorities, categories] = await Promise.all([
      this.stateRepository.find(),
      this.priorityRepository.find(),
      this.categoryRepository.find(),
    ]);

    return new CatalogCodes(
      new Map(states.map((row) => [row.id, row.code])),
      new Map(priorities.map((row) => [row.id, row.code])),
      new Map(categories.map((row) => [row.id, row.code])),
    );
  }

  async listStates(): Promise<IncidenciaState[]> {
    return this.stateRepository.find({
      where: { active: true },
      order: { rank: 'ASC' },
    });
  }

  async listPriorities(): Promise<IncidenciaPriority[]> {
    return this.priorityRepository.find({
      where: { active: true },
      order: { level: 'ASC' },
    });
  }

  async listCategories(): Promise<IncidenciaCategory[]> {
    return this.categoryRepository.find({
      where: { active: true },
      order: { name: 'ASC' },
    });
  }

  /**
   * TypeORM drops null and undefined from `where`, so a missing code would
   * match the first active row. Reject it before querying.
   */
  private assertCode(catalog: CatalogName, code: unknown): void {
    if (typeof code !== 'string' || code.trim().length === 0) {
      throw new CatalogCodeException(catalog, String(code));
    }
  }
}
