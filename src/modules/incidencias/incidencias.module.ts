import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Incidencia } from '../../database/entities/incidencia.entity';
import { IncidenciaComment } from '../../database/entities/incidencia-comment.entity';
import { IncidenciaAttachment } from '../../database/entities/incidencia-attachment.entity';
import { IncidenciaHistoryEntry } from '../../database/entities/incidencia-history.entity';
import { CatalogModule } from '../catalog/catalog.module';
import { IncidenciasController } from './controllers/incidencias.controller';
import { IncidenciaCommentsController } from './controllers/incidencia-comments.controller';
import { IncidenciaAttachmentsController } from './controllers/incidencia-attachments.controller';
import { IncidenciasService } from './services/incidencias.service';
import { IncidenciaCommentsService } from './services/incidencia-comments.service';
import { IncidenciaAttachmentsService } from './services/incidencia-attachments.service';
import { IncidenciaHistoryService } from './services/incidencia-history.service';
import { IncidenciaFilterBuilder } from './services/incidencia-filter.builder';
import { IncidenciaAccessPolicy } from './policies/incidencia-access.policy';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      Incidencia,
      IncidenciaComment,
      IncidenciaAttachment,
      IncidenciaHistoryEntry,
    ]),
    CatalogModule,
  ],
  controllers: [
    IncidenciasController,
    IncidenciaCommentsController,
    IncidenciaAttachmentsController,
  ],
  providers: [
    IncidenciasService,
    IncidenciaCommentsService,
    IncidenciaAttachmentsService,
    IncidenciaHistoryService,
    IncidenciaFilterBuilder,
    IncidenciaAccessPolicy,
  ],
  exports: [IncidenciasService, IncidenciaAccessPolicy],
})
export class IncidenciasModule {}
