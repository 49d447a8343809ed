import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { IncidenciaAttachment } from '../../../database/entities/incidencia-attachment.entity';
import { HistoryAction } from '../../../database/entities/incidencia-history.entity';
import { Actor } from '../../auth/interfaces/actor.interface';
import { IncidenciaAccessPolicy } from '../policies/incidencia-access.policy';
import {
  AccessDeniedException,
  InvalidInputException,
} from '../exceptions/incidencia.exceptions';
import { CreateAttachmentDto } from '../dto/attachment.dto';
import { IncidenciasService } from './incidencias.service';
import { IncidenciaHistoryService } from './incidencia-history.service';

/**
 * Attachment metadata only; uploads go straight to external storage and the
 * client registers the resulting path here.
 */
@Injectable()
export class IncidenciaAttachmentsService {
  private readonly logger = new Logger(IncidenciaAttachmentsService.name);

  constructor(
    @InjectRepository(IncidenciaAttachment)
    private readonly attachmentRepository: Repository<IncidenciaAttachment>,
    private readonly dataSource: DataSource,
    private readonly incidenciasService: IncidenciasService,
    private readonly accessPolicy: IncidenciaAccessPolicy,
    private readonly historyService: IncidenciaHistoryService,
  ) {}

  async addAttachment(
    actor: Actor,
    incidenciaId: number,
    dto: CreateAttachmentDto,
  ): Promise<IncidenciaAttachment> {
    if (!dto.filename.trim() || !dto.storagePath.trim()) {
      throw new InvalidInputException('Filename and storage path are required');
    }

    const attachment = await this.dataSource.transaction(async (manager) => {
      const incidencia = await this.incidenciasService.requireVisible(
        manager,
        actor,
        incidenciaId,
      );

      if (!this.accessPolicy.canAttach(actor, incidencia)) {
        throw new AccessDeniedException('Not allowed to attach files to this incidencia');
      }

      const saved = await manager.save(
        manager.create(IncidenciaAttachment, {
          incidenciaId,
          filename: dto.filename,
          mimeType: dto.mimeType ?? null,
          sizeBytes: dto.sizeBytes ?? null,
          storagePath: dto.storagePath,
          uploaderId: actor.subjectId,
        }),
      );

      await this.historyService.record(manager, {
        incidenciaId,
        actor,
        action: HistoryAction.ATTACHMENT_ADDED,
        after: { attachmentId: saved.id, filename: saved.filename },
        description: `Attachment ${saved.filename} added`,
      });

      return saved;
    });

    this.logger.log(
      `Attachment ${attachment.id} added to incidencia ${incidenciaId} by ${actor.subjectId}`,
    );
    return attachment;
  }

  async listAttachments(
    actor: Actor,
    incidenciaId: number,
  ): Promise<IncidenciaAttachment[]> {
    await this.incidenciasService.requireVisible(
      this.dataSource.manager,
      actor,
      incidenciaId,
    );

    return this.attachmentRepository.find({
      where: { incidenciaId },
      order: { createdAt: 'ASC', id: 'ASC' },
    });
  }
}
