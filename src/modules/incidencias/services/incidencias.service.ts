import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Incidencia } from '../../../database/entities/incidencia.entity';
import { IncidenciaComment } from '../../../database/entities/incidencia-comment.entity';
import { IncidenciaAttachment } from '../../../database/entities/incidencia-attachment.entity';
import {
  HistoryAction,
  HistorySnapshot,
  IncidenciaHistoryEntry,
} from '../../../database/entities/incidencia-history.entity';
import { Actor } from '../../auth/interfaces/actor.interface';
import { CatalogService } from '../../catalog/catalog.service';
import { CatalogCodes } from '../../catalog/catalog-codes';
import { CatalogCodeException } from '../../catalog/catalog.exceptions';
import {
  DEFAULT_PRIORITY,
  StateCode,
  isStateCode,
} from '../../catalog/catalog.constants';
import {
  IncidenciaAccessPolicy,
  UpdatableField,
} from '../policies/incidencia-access.policy';
import {
  canTransition,
  isAssignable,
  nextResolvedAt,
} from '../incidencia-state-machine';
import {
  AccessDeniedException,
  ConcurrentModificationException,
  IncidenciaNotFoundException,
  InvalidInputException,
  InvalidTransitionException,
} from '../exceptions/incidencia.exceptions';
import {
  DEFAULT_HISTORY_RETENTION,
  DEFAULT_PAGE_SIZE,
  HistoryRetention,
  MAX_PAGE_SIZE,
  isHistoryRetention,
} from '../incidencias.config';
import { IncidenciaHistoryService } from './incidencia-history.service';
import {
  IncidenciaFilterBuilder,
  IncidenciaListFilters,
} from './incidencia-filter.builder';
import {
  CreateIncidenciaDto,
  UpdateIncidenciaDto,
  AssignResponsibleDto,
  IncidenciaResponseDto,
  IncidenciaListResponseDto,
} from '../dto/incidencia.dto';

/** Columns of the incidencia row that mutations may change */
type IncidenciaPatch = Partial<
  Pick<
    Incidencia,
    | 'title'
    | 'description'
    | 'stateId'
    | 'priorityId'
    | 'categoryId'
    | 'responsibleId'
    | 'locationId'
    | 'updatedAt'
    | 'resolvedAt'
  >
>;

export interface IncidenciaListQuery extends IncidenciaListFilters {
  page?: number;
  limit?: number;
}

export interface StateChangeRequest {
  stateCode: string;
  note?: string;
}

/** Fields an update may omit but never set to null */
const NON_NULLABLE_FIELDS = [
  'title',
  'description',
  'categoryCode',
  'priorityCode',
] as const;

const UPDATABLE_FIELDS: readonly UpdatableField[] = [
  'title',
  'description',
  'categoryCode',
  'priorityCode',
  'locationId',
];

function toIso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

/**
 * IncidenciasService
 *
 * Lifecycle of an incidencia: filing, edits, assignment, state transitions and
 * deletion. Every mutation runs in a single transaction together with its
 * history entry, and every write to the incidencia row is conditional on the
 * version that was read.
 */
@Injectable()
export class IncidenciasService {
  private readonly logger = new Logger(IncidenciasService.name);
  private readonly historyRetention: HistoryRetention;

  constructor(
    @InjectRepository(Incidencia)
    private readonly incidenciaRepository: Repository<Incidencia>,
    private readonly dataSource: DataSource,
    private readonly catalogService: CatalogService,
    private readonly accessPolicy: IncidenciaAccessPolicy,
    private readonly historyService: IncidenciaHistoryService,
    private readonly filterBuilder: IncidenciaFilterBuilder,
    configService: ConfigService,
  ) {
    const retention = configService.get<string>(
      'HISTORY_ON_DELETE',
      DEFAULT_HISTORY_RETENTION,
    );
    this.historyRetention = isHistoryRetention(retention)
      ? retention
      : DEFAULT_HISTORY_RETENTION;
  }

  /**
   * File a new incidencia. Any authenticated actor may do this; the actor
   * becomes the reporter.
   */
  async create(
    actor: Actor,
    dto: CreateIncidenciaDto,
  ): Promise<IncidenciaResponseDto> {
    if (!dto.title.trim()) {
      throw new InvalidInputException('Title must not be empty');
    }
    if (!dto.description.trim()) {
      throw new InvalidInputException('Description must not be empty');
    }

    const priority = await this.catalogService.requirePriority(
      dto.priorityCode ?? DEFAULT_PRIORITY,
    );
    const category = dto.categoryCode
      ? await this.catalogService.requireCategory(dto.categoryCode)
      : null;
    const pending = await this.catalogService.requireState(StateCode.PENDING);
    const codes = await this.catalogService.loadCodes();

    const saved = await this.dataSource.transaction(async (manager) => {
      const incidencia = manager.create(Incidencia, {
        title: dto.title,
        description: dto.description,
        stateId: pending.id,
        priorityId: priority.id,
        categoryId: category ? category.id : null,
        reporterId: actor.subjectId,
        responsibleId: null,
        locationId: dto.locationId ?? null,
        updatedAt: null,
        resolvedAt: null,
      });
      const created = await manager.save(incidencia);

      await this.historyService.record(manager, {
        incidenciaId: created.id,
        actor,
        action: HistoryAction.CREATED,
        after: this.snapshot(created, codes),
        description: 'Incidencia created',
      });

      return created;
    });

    this.logger.log(`Incidencia ${saved.id} created by ${actor.subjectId}`);
    return this.toResponse(saved, codes);
  }

  async getIncidencia(
    actor: Actor,
    incidenciaId: number,
  ): Promise<IncidenciaResponseDto> {
    const incidencia = await this.requireVisible(
      this.dataSource.manager,
      actor,
      incidenciaId,
    );
    return this.toResponse(incidencia, await this.catalogService.loadCodes());
  }

  /**
   * Paginated listing, newest first. Non-administrators only ever see their
   * own tickets, whatever filters they send.
   */
  async listIncidencias(
    actor: Actor,
    query: IncidenciaListQuery,
  ): Promise<IncidenciaListResponseDto> {
    const page = query.page && query.page > 0 ? query.page : 1;
    const limit = Math.min(
      query.limit && query.limit > 0 ? query.limit : DEFAULT_PAGE_SIZE,
      MAX_PAGE_SIZE,
    );

    const where = await this.filterBuilder.build(actor, query);
    const [incidencias, total] = await this.incidenciaRepository.findAndCount({
      where,
      order: { createdAt: 'DESC', id: 'DESC' },
      skip: (page - 1) * limit,
      take: limit,
    });
    const codes = await this.catalogService.loadCodes();

    return {
      items: incidencias.map((incidencia) => this.toResponse(incidencia, codes)),
      total,
      page,
      limit,
      totalPages: Math.ceil(total / limit),
    };
  }

  /**
   * Edit descriptive fields. Administrators may change all of them; the
   * reporter only title, description and category. Fields equal to the
   * stored value are ignored, and an update that changes nothing writes no
   * history.
   */
  async updateIncidencia(
    actor: Actor,
    incidenciaId: number,
    dto: UpdateIncidenciaDto,
  ): Promise<IncidenciaResponseDto> {
    const nullField = NON_NULLABLE_FIELDS.find((field) => dto[field] === null);
    if (nullField) {
      throw new InvalidInputException(`${nullField} must not be null`);
    }

    const fields = UPDATABLE_FIELDS.filter((field) => dto[field] !== undefined);

    if (dto.title !== undefined && !dto.title.trim()) {
      throw new InvalidInputException('Title must not be empty');
    }
    if (dto.description !== undefined && !dto.description.trim()) {
      throw new InvalidInputException('Description must not be empty');
    }

    return this.dataSource.transaction(async (manager) => {
      const incidencia = await this.requireVisible(manager, actor, incidenciaId);

      const forbidden = this.accessPolicy.forbiddenUpdateFields(
        actor,
        incidencia,
        fields,
      );
      if (forbidden.length > 0) {
        throw new AccessDeniedException(
          `Not allowed to update: ${forbidden.join(', ')}`,
        );
      }

      const codes = await this.catalogService.loadCodes();
      const patch: IncidenciaPatch = {};
      const before: HistorySnapshot = {};
      const after: HistorySnapshot = {};

      if (dto.title !== undefined && dto.title !== incidencia.title) {
        patch.title = dto.title;
        before.title = incidencia.title;
        after.title = dto.title;
      }

      if (
        dto.description !== undefined &&
        dto.description !== incidencia.description
      ) {
        patch.description = dto.description;
        before.description = incidencia.description;
        after.description = dto.description;
      }

      const currentCategory = codes.categoryCode(incidencia.categoryId);
      if (
        dto.categoryCode !== undefined &&
        dto.categoryCode !== currentCategory
      ) {
        patch.categoryId = (
          await this.catalogService.requireCategory(dto.categoryCode)
        ).id;
        before.categoryCode = currentCategory;
        after.categoryCode = dto.categoryCode;
      }

      const currentPriority = codes.priorityCode(incidencia.priorityId);
      if (
        dto.priorityCode !== undefined &&
        dto.priorityCode !== currentPriority
      ) {
        patch.priorityId = (
          await this.catalogService.requirePriority(dto.priorityCode)
        ).id;
        before.priorityCode = currentPriority;
        after.priorityCode = dto.priorityCode;
      }

      if (
        dto.locationId !== undefined &&
        dto.locationId !== incidencia.locationId
      ) {
        patch.locationId = dto.locationId;
        before.locationId = incidencia.locationId;
        after.locationId = dto.locationId;
      }

      if (Object.keys(patch).length === 0) {
        this.logger.debug(`Update of incidencia ${incidenciaId} changed nothing`);
        return this.toResponse(incidencia, codes);
      }

      patch.updatedAt = new Date();
      const updated = await this.applyUpdate(manager, incidencia, patch);

      await this.historyService.record(manager, {
        incidenciaId,
        actor,
        action: HistoryAction.UPDATED,
        before,
        after,
        description: `Updated ${Object.keys(after).join(', ')}`,
      });

      return this.toResponse(updated, codes);
    });
  }

  /**
   * Set or replace the responsible party. A pending ticket moves to
   * `asignada`; assigned and in-progress tickets keep their state.
   */
  async assignResponsible(
    actor: Actor,
    incidenciaId: number,
    dto: AssignResponsibleDto,
  ): Promise<IncidenciaResponseDto> {
    if (!this.accessPolicy.canAssignResponsible(actor)) {
      throw new AccessDeniedException(
        'Only administrators can assign a responsible party',
      );
    }

    const responsibleId = dto.responsibleId.trim();
    if (!responsibleId) {
      throw new InvalidInputException('Responsible id must not be empty');
    }

    const result = await this.dataSource.transaction(async (manager) => {
      const incidencia = await this.requireVisible(manager, actor, incidenciaId);
      const codes = await this.catalogService.loadCodes();

      const from = codes.stateCode(incidencia.stateId);
      if (!isAssignable(from)) {
        throw new InvalidTransitionException(from, StateCode.ASSIGNED);
      }

      const to = from === StateCode.PENDING ? StateCode.ASSIGNED : from;
      const patch: IncidenciaPatch = { responsibleId, updatedAt: new Date() };
      if (to !== from) {
        patch.stateId = (await this.catalogService.requireState(to)).id;
      }

      const updated = await this.applyUpdate(manager, incidencia, patch);

      await this.historyService.record(manager, {
        incidenciaId,
        actor,
        action: HistoryAction.ASSIGNED_RESPONSIBLE,
        before: { responsibleId: incidencia.responsibleId, stateCode: from },
        after: { responsibleId, stateCode: to },
        description: dto.note ?? `Responsible set to ${responsibleId}`,
      });

      return this.toResponse(updated, codes);
    });

    this.logger.log(
      `Incidencia ${incidenciaId} assigned to ${responsibleId} by ${actor.subjectId}`,
    );
    return result;
  }

  /**
   * Move the incidencia along one edge of the state machine.
   */
  async changeState(
    actor: Actor,
    incidenciaId: number,
    request: StateChangeRequest,
  ): Promise<IncidenciaResponseDto> {
    if (!this.accessPolicy.canModifyState(actor)) {
      throw new AccessDeniedException('Only administrators can change the state');
    }

    const to = request.stateCode;
    if (!isStateCode(to)) {
      throw new CatalogCodeException('estado', to);
    }

    const result = await this.dataSource.transaction(async (manager) => {
      const incidencia = await this.requireVisible(manager, actor, incidenciaId);
      const codes = await this.catalogService.loadCodes();

      const from = codes.stateCode(incidencia.stateId);
      if (!canTransition(from, to)) {
        throw new InvalidTransitionException(from, to);
      }

      const target = await this.catalogService.requireState(to);
      const now = new Date();
      const resolvedAt = nextResolvedAt(to, incidencia.resolvedAt, now);

      const updated = await this.applyUpdate(manager, incidencia, {
        stateId: target.id,
        resolvedAt,
        updatedAt: now,
      });

      await this.historyService.record(manager, {
        incidenciaId,
        actor,
        action: HistoryAction.STATE_CHANGED,
        before: { stateCode: from, resolvedAt: toIso(incidencia.resolvedAt) },
        after: { stateCode: to, resolvedAt: toIso(resolvedAt) },
        description: request.note ?? `State changed from ${from} to ${to}`,
      });

      return this.toResponse(updated, codes);
    });

    this.logger.log(
      `Incidencia ${incidenciaId} moved to ${to} by ${actor.subjectId}`,
    );
    return result;
  }

  /**
   * Delete an incidencia with its comments and attachments. History rows are
   * kept (plus a final `deleted` entry) or purged according to
   * HISTORY_ON_DELETE.
   */
  async deleteIncidencia(actor: Actor, incidenciaId: number): Promise<void> {
    if (!this.accessPolicy.canDelete(actor)) {
      throw new AccessDeniedException('Only administrators can delete incidencias');
    }

    await this.dataSource.transaction(async (manager) => {
      const incidencia = await this.requireVisible(manager, actor, incidenciaId);
      const codes = await this.catalogService.loadCodes();

      await manager.delete(IncidenciaComment, { incidenciaId });
      await manager.delete(IncidenciaAttachment, { incidenciaId });

      if (this.historyRetention === 'retain') {
        await this.historyService.record(manager, {
          incidenciaId,
          actor,
          action: HistoryAction.DELETED,
          before: this.snapshot(incidencia, codes),
          description: 'Incidencia deleted',
        });
      } else {
        await this.historyService.purge(manager, incidenciaId);
      }

      const result = await manager.delete(Incidencia, {
        id: incidenciaId,
        version: incidencia.version,
      });
      if (!result.affected) {
        throw new ConcurrentModificationException(incidenciaId);
      }
    });

    this.logger.log(`Incidencia ${incidenciaId} deleted by ${actor.subjectId}`);
  }

  async getHistory(
    actor: Actor,
    incidenciaId: number,
  ): Promise<IncidenciaHistoryEntry[]> {
    await this.requireVisible(this.dataSource.manager, actor, incidenciaId);
    return this.historyService.listForIncidencia(incidenciaId);
  }

  /**
   * Load an incidencia the actor is allowed to see. Absent and invisible
   * tickets fail the same way.
   */
  async requireVisible(
    manager: EntityManager,
    actor: Actor,
    incidenciaId: number,
  ): Promise<Incidencia> {
    const incidencia = await manager.findOne(Incidencia, {
      where: { id: incidenciaId },
    });

    if (!incidencia || !this.accessPolicy.canView(actor, incidencia)) {
      throw new IncidenciaNotFoundException(incidenciaId);
    }

    return incidencia;
  }

  private async applyUpdate(
    manager: EntityManager,
    incidencia: Incidencia,
    patch: IncidenciaPatch,
  ): Promise<Incidencia> {
    const version = incidencia.version + 1;
    const result = await manager.update(
      Incidencia,
      { id: incidencia.id, version: incidencia.version },
      { ...patch, version },
    );

    if (!result.affected) {
      this.logger.warn(
        `Version ${incidencia.version} of incidencia ${incidencia.id} is stale`,
      );
      throw new ConcurrentModificationException(incidencia.id);
    }

    return { ...incidencia, ...patch, version };
  }

  private snapshot(incidencia: Incidencia, codes: CatalogCodes): HistorySnapshot {
    return {
      title: incidencia.title,
      description: incidencia.description,
      stateCode: codes.stateCode(incidencia.stateId),
      priorityCode: codes.priorityCode(incidencia.priorityId),
      categoryCode: codes.categoryCode(incidencia.categoryId),
      reporterId: incidencia.reporterId,
      responsibleId: incidencia.responsibleId,
      locationId: incidencia.locationId,
      resolvedAt: toIso(incidencia.resolvedAt),
    };
  }

  private toResponse(
    incidencia: Incidencia,
    codes: CatalogCodes,
  ): IncidenciaResponseDto {
    return {
      id: incidencia.id,
      title: incidencia.title,
      description: incidencia.description,
      stateCode: codes.stateCode(incidencia.stateId),
      priorityCode: codes.priorityCode(incidencia.priorityId),
      categoryCode: codes.categoryCode(incidencia.categoryId),
      reporterId: incidencia.reporterId,
      responsibleId: incidencia.responsibleId,
      locationId: incidencia.locationId,
      createdAt: incidencia.createdAt,
      updatedAt: incidencia.updatedAt,
      resolvedAt: incidencia.resolvedAt,
      version: incidencia.version,
    };
  }
}
