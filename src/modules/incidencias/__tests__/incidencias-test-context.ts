import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { InMemoryDataSource } from '../../../database/__tests__/in-memory-data-source';
import { seedCatalogs } from '../../../database/__tests__/catalog-fixtures';
import { Incidencia } from '../../../database/entities/incidencia.entity';
import { IncidenciaState } from '../../../database/entities/incidencia-state.entity';
import { IncidenciaPriority } from '../../../database/entities/incidencia-priority.entity';
import { IncidenciaCategory } from '../../../database/entities/incidencia-category.entity';
import { IncidenciaComment } from '../../../database/entities/incidencia-comment.entity';
import { IncidenciaAttachment } from '../../../database/entities/incidencia-attachment.entity';
import { IncidenciaHistoryEntry } from '../../../database/entities/incidencia-history.entity';
import { Actor } from '../../auth/interfaces/actor.interface';
import { CatalogService } from '../../catalog/catalog.service';
import { IncidenciaAccessPolicy } from '../policies/incidencia-access.policy';
import { IncidenciaHistoryService } from '../services/incidencia-history.service';
import { IncidenciaFilterBuilder } from '../services/incidencia-filter.builder';
import { IncidenciasService } from '../services/incidencias.service';
import { IncidenciaCommentsService } from '../services/incidencia-comments.service';
import { IncidenciaAttachmentsService } from '../services/incidencia-attachments.service';

export const ADMIN: Actor = { subjectId: 'admin1', role: 'administrador' };
export const STUDENT: Actor = { subjectId: 's1', role: 'estudiante' };
export const OTHER_STUDENT: Actor = { subjectId: 's2', role: 'estudiante' };

export interface IncidenciasTestContext {
  store: InMemoryDataSource;
  catalogService: CatalogService;
  accessPolicy: IncidenciaAccessPolicy;
  historyService: IncidenciaHistoryService;
  filterBuilder: IncidenciaFilterBuilder;
  incidenciasService: IncidenciasService;
  commentsService: IncidenciaCommentsService;
  attachmentsService: IncidenciaAttachmentsService;
}

const ENTITIES: Array<new () => object> = [
  IncidenciaState,
  IncidenciaPriority,
  IncidenciaCategory,
  Incidencia,
  IncidenciaComment,
  IncidenciaAttachment,
  IncidenciaHistoryEntry,
];

/**
 * Builds a testing module with the real services over an in-memory store
 * seeded with the catalogs.
 */
export async function createIncidenciasTestContext(
  config: Record<string, string> = {},
): Promise<IncidenciasTestContext> {
  const store = new InMemoryDataSource();
  seedCatalogs(store.manager);

  const module: TestingModule = await Test.createTestingModule({
    providers: [
      CatalogService,
      IncidenciaAccessPolicy,
      IncidenciaHistoryService,
      IncidenciaFilterBuilder,
      IncidenciasService,
      IncidenciaCommentsService,
      IncidenciaAttachmentsService,
      { provide: DataSource, useValue: store },
      { provide: ConfigService, useValue: new ConfigService(config) },
      ...ENTITIES.map((entity) => ({
        provide: getRepositoryToken(entity),
        useValue: store.getRepository(entity),
      })),
    ],
  }).compile();

  return {
    store,
    catalogService: module.get(CatalogService),
    accessPolicy: module.get(IncidenciaAccessPolicy),
    historyService: module.get(IncidenciaHistoryService),
    filterBuilder: module.get(IncidenciaFilterBuilder),
    incidenciasService: module.get(IncidenciasService),
    commentsService: module.get(IncidenciaCommentsService),
    attachmentsService: module.get(IncidenciaAttachmentsService),
  };
}
