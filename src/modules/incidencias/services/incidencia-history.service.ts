import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import {
  IncidenciaHistoryEntry,
  HistoryAction,
  HistorySnapshot,
} from '../../../database/entities/incidencia-history.entity';
import { Actor } from '../../auth/interfaces/actor.interface';

export interface HistoryRecord {
  incidenciaId: number;
  actor: Actor;
  action: HistoryAction;
  before?: HistorySnapshot | null;
  after?: HistorySnapshot | null;
  description?: string | null;
}

/**
 * IncidenciaHistoryService
 *
 * Append-only audit trail. Writes always go through the EntityManager of the
 * transaction that performs the mutation, so an entry exists if and only if
 * the mutation committed.
 */
@Injectable()
export class IncidenciaHistoryService {
  constructor(
    @InjectRepository(IncidenciaHistoryEntry)
    private readonly historyRepository: Repository<IncidenciaHistoryEntry>,
  ) {}

  async record(
    manager: EntityManager,
    record: HistoryRecord,
  ): Promise<IncidenciaHistoryEntry> {
    const entry = manager.create(IncidenciaHistoryEntry, {
      incidenciaId: record.incidenciaId,
      action: record.action,
      actorId: record.actor.subjectId,
      before: record.before ?? null,
      after: record.after ?? null,
      description: record.description ?? null,
    });

    return manager.save(entry);
  }

  /**
   * Entries for an incidencia, oldest first. Ties on the timestamp fall back to
   * insertion order.
   */
  async listForIncidencia(
    incidenciaId: number,
  ): Promise<IncidenciaHistoryEntry[]> {
    return this.historyRepository.find({
      where: { incidenciaId },
      order: { createdAt: 'ASC', id: 'ASC' },
    });
  }

  /** Remove every entry of a deleted incidencia (cascade retention mode). */
  async purge(manager: EntityManager, incidenciaId: number): Promise<number> {
    const result = await manager.delete(IncidenciaHistoryEntry, { incidenciaId });
    return result.affected ?? 0;
  }
}
