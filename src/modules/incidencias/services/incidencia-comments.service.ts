import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, FindOptionsWhere, Repository } from 'typeorm';
import { IncidenciaComment } from '../../../database/entities/incidencia-comment.entity';
import { HistoryAction } from '../../../database/entities/incidencia-history.entity';
import { Actor } from '../../auth/interfaces/actor.interface';
import { IncidenciaAccessPolicy } from '../policies/incidencia-access.policy';
import {
  AccessDeniedException,
  InvalidInputException,
} from '../exceptions/incidencia.exceptions';
import { CreateCommentDto } from '../dto/comment.dto';
import { IncidenciasService } from './incidencias.service';
import { IncidenciaHistoryService } from './incidencia-history.service';

@Injectable()
export class IncidenciaCommentsService {
  private readonly logger = new Logger(IncidenciaCommentsService.name);

  constructor(
    @InjectRepository(IncidenciaComment)
    private readonly commentRepository: Repository<IncidenciaComment>,
    private readonly dataSource: DataSource,
    private readonly incidenciasService: IncidenciasService,
    private readonly accessPolicy: IncidenciaAccessPolicy,
    private readonly historyService: IncidenciaHistoryService,
  ) {}

  /**
   * Add a comment. Internal comments are reserved for administrators.
   */
  async addComment(
    actor: Actor,
    incidenciaId: number,
    dto: CreateCommentDto,
  ): Promise<IncidenciaComment> {
    if (!dto.content.trim()) {
      throw new InvalidInputException('Comment must not be empty');
    }
    const isInternal = dto.isInternal ?? false;

    const comment = await this.dataSource.transaction(async (manager) => {
      const incidencia = await this.incidenciasService.requireVisible(
        manager,
        actor,
        incidenciaId,
      );

      if (!this.accessPolicy.canComment(actor, incidencia)) {
        throw new AccessDeniedException('Not allowed to comment on this incidencia');
      }
      if (isInternal && !this.accessPolicy.canViewInternalComments(actor)) {
        throw new AccessDeniedException(
          'Only administrators can post internal comments',
        );
      }

      const saved = await manager.save(
        manager.create(IncidenciaComment, {
          incidenciaId,
          authorId: actor.subjectId,
          content: dto.content,
          isInternal,
          updatedAt: null,
        }),
      );

      await this.historyService.record(manager, {
        incidenciaId,
        actor,
        action: HistoryAction.COMMENT_ADDED,
        after: { commentId: saved.id, isInternal },
        description: isInternal ? 'Internal comment added' : 'Comment added',
      });

      return saved;
    });

    this.logger.log(
      `Comment ${comment.id} added to incidencia ${incidenciaId} by ${actor.subjectId}`,
    );
    return comment;
  }

  /**
   * Comments oldest first. Internal comments are left out silently unless
   * requested by an administrator.
   */
  async listComments(
    actor: Actor,
    incidenciaId: number,
    includeInternal: boolean,
  ): Promise<IncidenciaComment[]> {
    await this.incidenciasService.requireVisible(
      this.dataSource.manager,
      actor,
      incidenciaId,
    );

    const where: FindOptionsWhere<IncidenciaComment> = { incidenciaId };
    if (!includeInternal || !this.accessPolicy.canViewInternalComments(actor)) {
      where.isInternal = false;
    }

    return this.commentRepository.find({
      where,
      order: { createdAt: 'ASC', id: 'ASC' },
    });
  }
}
