import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { IncidenciaState } from '../../database/entities/incidencia-state.entity';
import { IncidenciaPriority } from '../../database/entities/incidencia-priority.entity';
import { IncidenciaCategory } from '../../database/entities/incidencia-category.entity';
import { CatalogService } from './catalog.service';
import { CatalogController } from './catalog.controller';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      IncidenciaState,
      IncidenciaPriority,
      IncidenciaCategory,
    ]),
  ],
  controllers: [CatalogController],
  providers: [CatalogService],
  exports: [CatalogService],
})
export class CatalogModule {}
