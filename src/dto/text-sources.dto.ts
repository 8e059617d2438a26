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
 * Payload for storing a scraped article or transcript under a project.
 *
 * @property project_id - Owning project; must exist.
 * @property content - Full text, stored verbatim.
 * @property source_type - Free-form tag, `text` when omitted.
 */
export class CreateTextSourceDto {
  @IsInt()
  @Min(1)
  project_id!: number;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string | null;

  @IsNotBlank()
  content!: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  source_type?: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  source_url?: string | null;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}

/**
 * Partial text source update. The owning project cannot be changed.
 */
export class UpdateTextSourceDto {
  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string | null;

  @ValidateIf((_dto, value) => value !== undefined)
  @IsNotBlank()
  content?: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  source_type?: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  source_url?: string | null;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}
