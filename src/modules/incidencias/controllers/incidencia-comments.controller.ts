import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiBearerAuth,
  ApiParam,
} from '@nestjs/swagger';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentActor } from '../../auth/decorators/current-actor.decorator';
import { Actor } from '../../auth/interfaces/actor.interface';
import { IncidenciaComment } from '../../../database/entities/incidencia-comment.entity';
import { IncidenciaCommentsService } from '../services/incidencia-comments.service';
import { CreateCommentDto, ListCommentsQueryDto } from '../dto/comment.dto';
import { ParseIncidenciaIdPipe } from '../pipes/incidencia-id.pipe';

@Controller('api/incidencias/:id/comentarios')
@UseGuards(JwtAuthGuard)
@ApiBearerAuth('JWT-auth')
@ApiTags('Comentarios')
export class IncidenciaCommentsController {
  constructor(private readonly commentsService: IncidenciaCommentsService) {}

  @Post()
  @ApiOperation({ summary: 'Comment on an incidencia' })
  @ApiParam({ name: 'id', description: 'Incidencia ID' })
  @ApiResponse({ status: 201, description: 'Comment added' })
  @ApiResponse({ status: 403, description: 'Internal comments are administrators only' })
  @ApiResponse({ status: 404, description: 'Incidencia not found' })
  async addComment(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIncidenciaIdPipe) id: number,
    @Body() commentDto: CreateCommentDto,
  ): Promise<IncidenciaComment> {
    return this.commentsService.addComment(actor, id, commentDto);
  }

  @Get()
  @ApiOperation({ summary: 'List comments, oldest first' })
  @ApiParam({ name: 'id', description: 'Incidencia ID' })
  @ApiResponse({ status: 200, description: 'Comments' })
  @ApiResponse({ status: 404, description: 'Incidencia not found' })
  async listComments(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIncidenciaIdPipe) id: number,
    @Query() query: ListCommentsQueryDto,
  ): Promise<IncidenciaComment[]> {
    return this.commentsService.listComments(actor, id, query.includeInternal ?? false);
  }
}
