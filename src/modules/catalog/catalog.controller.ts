import { Controller, Get, UseGuards } from '@nestjs/common';
import {
  ApiTags,
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
} from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { CatalogService } from './catalog.service';
import { IncidenciaState } from '../../database/entities/incidencia-state.entity';
import { IncidenciaPriority } from '../../database/entities/incidencia-priority.entity';
import { IncidenciaCategory } from '../../database/entities/incidencia-category.entity';

@ApiTags('Catalogos')
@ApiBearerAuth('JWT-auth')
@Controller('api/catalogos')
@UseGuards(JwtAuthGuard)
export class CatalogController {
  constructor(private readonly catalogService: CatalogService) {}

  @Get('estados')
  @ApiOperation({ summary: 'List active states ordered by rank' })
  @ApiResponse({ status: 200, description: 'States' })
  async listStates(): Promise<IncidenciaState[]> {
    return this.catalogService.listStates();
  }

  @Get('prioridades')
  @ApiOperation({ summary: 'List active priorities ordered by level' })
  @ApiResponse({ status: 200, description: 'Priorities' })
  async listPriorities(): Promise<IncidenciaPriority[]> {
    return this.catalogService.listPriorities();
  }

  @Get('categorias')
  @ApiOperation({ summary: 'List active categories ordered by name' })
  @ApiResponse({ status: 200, description: 'Categories' })
  async listCategories(): Promise<IncidenciaCategory[]> {
    return this.catalogService.listCategories();
  }
}
