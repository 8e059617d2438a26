import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { Metadata } from '../types/entities';
import { IsNotBlank } from './validators/not-blank.validator';
import { IsTokenSequence } from './validators/token-sequence.validator';

/**
 * One word or gloss of a translation and its position in the sequence.
 */
export class TranslationTokenDto {
  @IsString()
  token!: string;

  @IsInt()
  @Min(0)
  pos!: number;
}

/**
 * Payload for storing a tokenized translation of a text source.
 *
 * @property language_code - Target language, e.g. `ase` or `en`.
 * @property tokens - Non-empty; `pos` runs 0, 1, 2... in array order.
 * @property original_text - The passage the tokens were derived from.
 */
export class CreateTranslationDto {
  @IsInt()
  @Min(1)
  text_source_id!: number;

  @IsNotBlank()
  @MaxLength(10)
  language_code!: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string | null;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => TranslationTokenDto)
  @IsTokenSequence()
  tokens!: TranslationTokenDto[];

  @IsOptional()
  @IsString()
  original_text?: string | null;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}

/**
 * Partial translation update. The source and the language are fixed once
 * stored.
 */
export class UpdateTranslationDto {
  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string | null;

  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => TranslationTokenDto)
  @IsTokenSequence()
  tokens?: TranslationTokenDto[];

  @IsOptional()
  @IsString()
  original_text?: string | null;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}
