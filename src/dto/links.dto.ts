import {
  IsBoolean,
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

export class CreateLinkDto {
  @IsInt()
  @Min(1)
  text_source_id!: number;

  @IsNotBlank()
  @MaxLength(500)
  url!: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(1000)
  description?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  link_type?: string;

  @IsOptional()
  @IsBoolean()
  is_active?: boolean;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}

export class UpdateLinkDto {
  @ValidateIf((_dto, value) => value !== undefined)
  @IsNotBlank()
  @MaxLength(500)
  url?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(1000)
  description?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  link_type?: string;

  @IsOptional()
  @IsBoolean()
  is_active?: boolean;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}
