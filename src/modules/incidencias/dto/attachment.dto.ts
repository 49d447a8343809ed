import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsInt,
  Length,
  Min,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Metadata of a file already uploaded to external storage.
 */
export class CreateAttachmentDto {
  @ApiProperty({ example: 'projector.jpg', maxLength: 255 })
  @IsString()
  @Length(1, 255)
  filename!: string;

  @ApiPropertyOptional({ example: 'image/jpeg', maxLength: 100 })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  mimeType?: string;

  @ApiPropertyOptional({ minimum: 0, example: 48213 })
  @IsOptional()
  @IsInt()
  @Min(0)
  sizeBytes?: number;

  @ApiProperty({ description: 'Opaque storage path or URL' })
  @IsString()
  @IsNotEmpty()
  storagePath!: string;
}
