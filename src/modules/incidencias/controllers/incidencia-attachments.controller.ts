import {
  Controller,
  Get,
  Post,
  Body,
  Param,
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
import { IncidenciaAttachment } from '../../../database/entities/incidencia-attachment.entity';
import { IncidenciaAttachmentsService } from '../services/incidencia-attachments.service';
import { CreateAttachmentDto } from '../dto/attachment.dto';
import { ParseIncidenciaIdPipe } from '../pipes/incidencia-id.pipe';

@Controller('api/incidencias/:id/adjuntos')
@UseGuards(JwtAuthGuard)
@ApiBearerAuth('JWT-auth')
@ApiTags('Adjuntos')
export class IncidenciaAttachmentsController {
  constructor(private readonly attachmentsService: IncidenciaAttachmentsService) {}

  @Post()
  @ApiOperation({ summary: 'Register an uploaded file' })
  @ApiParam({ name: 'id', description: 'Incidencia ID' })
  @ApiResponse({ status: 201, description: 'Attachment registered' })
  @ApiResponse({ status: 404, description: 'Incidencia not found' })
  async addAttachment(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIncidenciaIdPipe) id: number,
    @Body() attachmentDto: CreateAttachmentDto,
  ): Promise<IncidenciaAttachment> {
    return this.attachmentsService.addAttachment(actor, id, attachmentDto);
  }

  @Get()
  @ApiOperation({ summary: 'List attachments' })
  @ApiParam({ name: 'id', description: 'Incidencia ID' })
  @ApiResponse({ status: 200, description: 'Attachments' })
  @ApiResponse({ status: 404, description: 'Incidencia not found' })
  async listAttachments(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIncidenciaIdPipe) id: number,
  ): Promise<IncidenciaAttachment[]> {
    return this.attachmentsService.listAttachments(actor, id);
  }
}
