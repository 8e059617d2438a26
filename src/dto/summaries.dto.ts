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

export class CreateSummaryDto {
  @IsInt()
  @Min(1)
  text_source_id!: number;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string | null;

  @IsNotBlank()
  content!: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  summary_type?: string;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}

export class UpdateSummaryDto {
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
  summary_type?: string;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}
