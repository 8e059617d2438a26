import {
  IsInt,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateIf,
} from 'class-validator';
import { Metadata } from '../types/entities';
import { IsNotBlank } from './validators/not-blank.validator';

/**
 * Payload for registering a rendered video. Only the reference is stored;
 * the file itself lives elsewhere.
 *
 * @property file_size - Bytes.
 * @property duration - Seconds.
 */
export class CreateVideoDto {
  @IsInt()
  @Min(1)
  text_source_id!: number;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string | null;

  @IsNotBlank()
  @MaxLength(500)
  file_path!: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  file_url?: string | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  file_size?: number | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  duration?: number | null;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  format?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  thumbnail_path?: string | null;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}

export class UpdateVideoDto {
  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string | null;

  @ValidateIf((_dto, value) => value !== undefined)
  @IsNotBlank()
  @MaxLength(500)
  file_path?: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  file_url?: string | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  file_size?: number | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  duration?: number | null;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  format?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  thumbnail_path?: string | null;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}
