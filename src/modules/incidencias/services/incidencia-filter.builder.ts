import { Injectable, Logger } from '@nestjs/common';
import { FindOptionsWhere } from 'typeorm';
import { Incidencia } from '../../../database/entities/incidencia.entity';
import { Actor } from '../../auth/interfaces/actor.interface';
import { CatalogService } from '../../catalog/catalog.service';
import { IncidenciaAccessPolicy } from '../policies/incidencia-access.policy';

/** Caller-supplied listing filters, all optional */
export interface IncidenciaListFilters {
  stateCode?: string;
  priorityCode?: string;
  categoryCode?: string;
  reporterId?: string;
  responsibleId?: string;
}

/**
 * IncidenciaFilterBuilder
 *
 * Turns caller filters into the `where` clause for incidencia listings.
 * Catalog codes are resolved first so an unknown code fails before any query
 * runs. The visibility filter is applied last and wins over caller input.
 */
@Injectable()
export class IncidenciaFilterBuilder {
  private readonly logger = new Logger(IncidenciaFilterBuilder.name);

  constructor(
    private readonly catalogService: CatalogService,
    private readonly accessPolicy: IncidenciaAccessPolicy,
  ) {}

  async build(
    actor: Actor,
    filters: IncidenciaListFilters,
  ): Promise<FindOptionsWhere<Incidencia>> {
    const where: FindOptionsWhere<Incidencia> = {};

    if (filters.stateCode) {
      where.stateId = (await this.catalogService.requireState(filters.stateCode)).id;
    }

    if (filters.priorityCode) {
      where.priorityId = (
        await this.catalogService.requirePriority(filters.priorityCode)
      ).id;
    }

    if (filters.categoryCode) {
      where.categoryId = (
        await this.catalogService.requireCategory(filters.categoryCode)
      ).id;
    }

    if (this.accessPolicy.isAdministrator(actor)) {
      if (filters.reporterId) {
        where.reporterId = filters.reporterId;
      }
      if (filters.responsibleId) {
        where.responsibleId = filters.responsibleId;
      }
    } else if (filters.reporterId || filters.responsibleId) {
      this.logger.debug(
        `Ignoring reporter/responsible filters from non-administrator ${actor.subjectId}`,
      );
    }

    return { ...where, ...this.accessPolicy.visibilityFilter(actor) };
  }
}
