import {
  Controller,
  Get,
  Post,
  Put,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  UseGuards,
  HttpCode,
  HttpStatus,
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
import { IncidenciaHistoryEntry } from '../../../database/entities/incidencia-history.entity';
import { IncidenciasService } from '../services/incidencias.service';
import {
  CreateIncidenciaDto,
  UpdateIncidenciaDto,
  AssignResponsibleDto,
  ChangeStateDto,
  IncidenciaQueryDto,
  IncidenciaResponseDto,
  IncidenciaListResponseDto,
} from '../dto/incidencia.dto';
import { ParseIncidenciaIdPipe } from '../pipes/incidencia-id.pipe';

@Controller('api/incidencias')
@UseGuards(JwtAuthGuard)
@ApiBearerAuth('JWT-auth')
@ApiTags('Incidencias')
export class IncidenciasController {
  constructor(private readonly incidenciasService: IncidenciasService) {}

  @Post()
  @ApiOperation({ summary: 'File a new incidencia' })
  @ApiResponse({ status: 201, description: 'Incidencia created', type: IncidenciaResponseDto })
  @ApiResponse({ status: 400, description: 'Validation error or unknown catalog code' })
  @ApiResponse({ status: 401, description: 'Unauthorized' })
  async create(
    @CurrentActor() actor: Actor,
    @Body() createDto: CreateIncidenciaDto,
  ): Promise<IncidenciaResponseDto> {
    return this.incidenciasService.create(actor, createDto);
  }

  /**
   * List incidencias visible to the caller, newest first
   */
  @Get()
  @ApiOperation({ summary: 'List incidencias' })
  @ApiResponse({ status: 200, description: 'Paginated incidencias', type: IncidenciaListResponseDto })
  @ApiResponse({ status: 400, description: 'Unknown catalog code in filters' })
  @ApiResponse({ status: 401, description: 'Unauthorized' })
  async list(
    @CurrentActor() actor: Actor,
    @Query() query: IncidenciaQueryDto,
  ): Promise<IncidenciaListResponseDto> {
    return this.incidenciasService.listIncidencias(actor, query);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an incidencia' })
  @ApiParam({ name: 'id', description: 'Incidencia ID' })
  @ApiResponse({ status: 200, description: 'Incidencia details', type: IncidenciaResponseDto })
  @ApiResponse({ status: 404, description: 'Incidencia not found' })
  async get(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIncidenciaIdPipe) id: number,
  ): Promise<IncidenciaResponseDto> {
    return this.incidenciasService.getIncidencia(actor, id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update descriptive fields of an incidencia' })
  @ApiParam({ name: 'id', description: 'Incidencia ID' })
  @ApiResponse({ status: 200, description: 'Incidencia updated', type: IncidenciaResponseDto })
  @ApiResponse({ status: 403, description: 'Field not editable by the caller' })
  @ApiResponse({ status: 404, description: 'Incidencia not found' })
  @ApiResponse({ status: 409, description: 'Concurrent modification' })
  async update(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIncidenciaIdPipe) id: number,
    @Body() updateDto: UpdateIncidenciaDto,
  ): Promise<IncidenciaResponseDto> {
    return this.incidenciasService.updateIncidencia(actor, id, updateDto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete an incidencia (administrators only)' })
  @ApiParam({ name: 'id', description: 'Incidencia ID' })
  @ApiResponse({ status: 204, description: 'Incidencia deleted' })
  @ApiResponse({ status: 403, description: 'Forbidden - administrators only' })
  @ApiResponse({ status: 404, description: 'Incidencia not found' })
  async remove(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIncidenciaIdPipe) id: number,
  ): Promise<void> {
    await this.incidenciasService.deleteIncidencia(actor, id);
  }

  @Put(':id/responsable')
  @ApiOperation({ summary: 'Assign the responsible party (administrators only)' })
  @ApiParam({ name: 'id', description: 'Incidencia ID' })
  @ApiResponse({ status: 200, description: 'Responsible party assigned', type: IncidenciaResponseDto })
  @ApiResponse({ status: 403, description: 'Forbidden - administrators only' })
  @ApiResponse({ status: 404, description: 'Incidencia not found' })
  @ApiResponse({ status: 422, description: 'Incidencia is resolved, closed or cancelled' })
  async assignResponsible(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIncidenciaIdPipe) id: number,
    @Body() assignDto: AssignResponsibleDto,
  ): Promise<IncidenciaResponseDto> {
    return this.incidenciasService.assignResponsible(actor, id, assignDto);
  }

  @Put(':id/estado')
  @ApiOperation({ summary: 'Change the state (administrators only)' })
  @ApiParam({ name: 'id', description: 'Incidencia ID' })
  @ApiResponse({ status: 200, description: 'State changed', type: IncidenciaResponseDto })
  @ApiResponse({ status: 403, description: 'Forbidden - administrators only' })
  @ApiResponse({ status: 404, description: 'Incidencia not found' })
  @ApiResponse({ status: 422, description: 'Transition not allowed' })
  async changeState(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIncidenciaIdPipe) id: number,
    @Body() stateDto: ChangeStateDto,
  ): Promise<IncidenciaResponseDto> {
    return this.incidenciasService.changeState(actor, id, stateDto);
  }

  @Get(':id/historial')
  @ApiOperation({ summary: 'Change history, oldest first' })
  @ApiParam({ name: 'id', description: 'Incidencia ID' })
  @ApiResponse({ status: 200, description: 'History entries' })
  @ApiResponse({ status: 404, description: 'Incidencia not found' })
  async getHistory(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIncidenciaIdPipe) id: number,
  ): Promise<IncidenciaHistoryEntry[]> {
    return this.incidenciasService.getHistory(actor, id);
  }
}
