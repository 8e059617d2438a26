import {
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { Metadata } from '../types/entities';
import { IsNotBlank } from './validators/not-blank.validator';

/**
 * Payload for creating a project.
 */
export class CreateProjectDto {
  @IsNotBlank()
  @MaxLength(255)
  name!: string;

  @IsOptional()
  @IsString()
  @MaxLength(10000)
  description?: string | null;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}

/**
 * Partial project update. Only the supplied properties are written.
 */
export class UpdateProjectDto {
  @ValidateIf((_dto, value) => value !== undefined)
  @IsNotBlank()
  @MaxLength(255)
  name?: string;

  @IsOptional()
  @IsString()
  @MaxLength(10000)
  description?: string | null;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}
