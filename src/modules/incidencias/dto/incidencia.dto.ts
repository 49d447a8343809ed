import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsEnum,
  IsInt,
  Length,
  Min,
  Max,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { StateCode } from '../../catalog/catalog.constants';

function isPresent(_dto: object, value: unknown): boolean {
  return value !== undefined;
}

export class CreateIncidenciaDto {
  @ApiProperty({ description: 'Short summary', example: 'Broken projector', maxLength: 200 })
  @IsString()
  @Length(1, 200)
  title!: string;

  @ApiProperty({ description: 'What happened and where' })
  @IsString()
  @IsNotEmpty()
  description!: string;

  @ApiPropertyOptional({ description: 'Priority code (default "media")', example: 'alta' })
  @IsOptional()
  @IsString()
  @MaxLength(20)
  priorityCode?: string;

  @ApiPropertyOptional({ description: 'Category code', example: 'tecnologia' })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  categoryCode?: string;

  @ApiPropertyOptional({ description: 'Room identifier from the rooms service' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  locationId?: string;
}

/**
 * Editable ticket fields. State and responsible party have dedicated
 * endpoints; reporters may only send title, description and categoryCode.
 *
 * Omitted fields are left alone. Only `locationId` accepts null, which
 * clears the location; null on any other field fails validation.
 */
export class UpdateIncidenciaDto {
  @ApiPropertyOptional({ maxLength: 200 })
  @ValidateIf(isPresent)
  @IsString()
  @Length(1, 200)
  title?: string;

  @ApiPropertyOptional()
  @ValidateIf(isPresent)
  @IsString()
  @IsNotEmpty()
  description?: string;

  @ApiPropertyOptional({ description: 'Category code' })
  @ValidateIf(isPresent)
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  categoryCode?: string;

  @ApiPropertyOptional({ description: 'Priority code (administrators only)' })
  @ValidateIf(isPresent)
  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  priorityCode?: string;

  @ApiPropertyOptional({
    description: 'Room identifier (administrators only); null clears it',
    nullable: true,
    type: String,
  })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  locationId?: string | null;
}

export class AssignResponsibleDto {
  @ApiProperty({ description: 'User id of the responsible party', example: 'tech1' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  responsibleId!: string;

  @ApiPropertyOptional({ description: 'Note stored with the history entry' })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  note?: string;
}

export class ChangeStateDto {
  @ApiProperty({ description: 'Target state', enum: StateCode })
  @IsEnum(StateCode)
  stateCode!: StateCode;

  @ApiPropertyOptional({ description: 'Note stored with the history entry' })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  note?: string;
}

export class IncidenciaQueryDto {
  @ApiPropertyOptional({ description: 'Filter by state code' })
  @IsOptional()
  @IsString()
  stateCode?: string;

  @ApiPropertyOptional({ description: 'Filter by priority code' })
  @IsOptional()
  @IsString()
  priorityCode?: string;

  @ApiPropertyOptional({ description: 'Filter by category code' })
  @IsOptional()
  @IsString()
  categoryCode?: string;

  @ApiPropertyOptional({ description: 'Filter by reporter (administrators only)' })
  @IsOptional()
  @IsString()
  reporterId?: string;

  @ApiPropertyOptional({ description: 'Filter by responsible party (administrators only)' })
  @IsOptional()
  @IsString()
  responsibleId?: string;

  @ApiPropertyOptional({ minimum: 1, default: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number = 1;

  @ApiPropertyOptional({ minimum: 1, maximum: 100, default: 20 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number = 20;
}

/**
 * Incidencia as returned by the API, with catalog references rendered as codes
 */
export class IncidenciaResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  title!: string;

  @ApiProperty()
  description!: string;

  @ApiProperty({ enum: StateCode })
  stateCode!: StateCode;

  @ApiProperty({ example: 'media' })
  priorityCode!: string;

  @ApiPropertyOptional({ nullable: true, type: String })
  categoryCode!: string | null;

  @ApiProperty()
  reporterId!: string;

  @ApiPropertyOptional({ nullable: true, type: String })
  responsibleId!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  locationId!: string | null;

  @ApiProperty()
  createdAt!: Date;

  @ApiPropertyOptional({ nullable: true, type: Date })
  updatedAt!: Date | null;

  @ApiPropertyOptional({ nullable: true, type: Date })
  resolvedAt!: Date | null;

  @ApiProperty({ description: 'Row version, incremented on every change' })
  version!: number;
}

export class IncidenciaListResponseDto {
  @ApiProperty({ type: [IncidenciaResponseDto] })
  items!: IncidenciaResponseDto[];

  @ApiProperty({ description: 'Total number of incidencias matching filters' })
  total!: number;

  @ApiProperty()
  page!: number;

  @ApiProperty()
  limit!: number;

  @ApiProperty()
  totalPages!: number;
}
