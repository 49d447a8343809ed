import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsBoolean,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CreateCommentDto {
  @ApiProperty({ description: 'Comment text', maxLength: 5000 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(5000)
  content!: string;

  @ApiPropertyOptional({
    description: 'Visible to administrators only (administrators only)',
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  isInternal?: boolean;
}

export class ListCommentsQueryDto {
  @ApiPropertyOptional({
    description: 'Include internal comments; ignored for non-administrators',
    default: false,
  })
  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true')
  @IsBoolean()
  includeInternal?: boolean;
}
