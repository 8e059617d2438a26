import { Injectable } from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/sequelize';
import {
  CreationAttributes,
  Op,
  WhereAttributeHash,
  WhereOptions,
} from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { QueryContext } from '../dal/query-context';
import { Logger } from '../decorators/logger.decorator';
import { CreateTranslationDto, UpdateTranslationDto } from '../dto';
import { TextSource, Translation, TranslationAttributes } from '../models';
import {
  Page,
  TranslationEntity,
  TranslationToken,
} from '../types/entities';
import { JSONLogger } from '../utils/logger';
import {
  BaseRepository,
  contains,
  DEFAULT_PAGE_LIMIT,
} from './base.repository';

export interface TranslationFilters {
  text_source_id?: number;
  language_code?: string;
}

export interface TokenStatistics {
  translation_id: number;
  token_count: number;
  unique_tokens: number;
  average_token_length: number;
  max_position: number;
}

/**
 * Tokenized translations of text sources.
 *
 * @remarks
 * Token lists are validated on every write: the list must be non-empty and
 * each `pos` must equal the token's index. A payload that breaks this fails
 * with `ValidationError` on `tokens` and nothing is stored.
 */
@Injectable()
export class TranslationsRepository extends BaseRepository<
  Translation,
  TranslationEntity,
  CreateTranslationDto,
  UpdateTranslationDto,
  TranslationFilters
> {
  @Logger(TranslationsRepository.name)
  protected readonly logger!: JSONLogger;

  protected readonly resource = 'Translation';
  protected readonly createDto = CreateTranslationDto;
  protected readonly updateDto = UpdateTranslationDto;
  protected readonly searchColumns = ['original_text', 'title'];

  constructor(
    @InjectModel(Translation)
    private readonly translationModel: typeof Translation,
    @InjectModel(TextSource)
    private readonly textSourceModel: typeof TextSource,
    @InjectConnection()
    sequelize: Sequelize,
  ) {
    super(translationModel, sequelize);
  }

  async getBySourceId(
    textSourceId: number,
    page: Page = {},
    context?: QueryContext,
  ): Promise<TranslationEntity[]> {
    return this.list({ text_source_id: textSourceId }, page, context);
  }

  /**
   * Most recent translation of a text source into a language, or `null`.
   */
  async getByLanguage(
    textSourceId: number,
    languageCode: string,
    context?: QueryContext,
  ): Promise<TranslationEntity | null> {
    const row = await this.execute('read', () =>
      this.translationModel.findOne({
        where: { text_source_id: textSourceId, language_code: languageCode },
        order: [
          ['created_at', 'DESC'],
          ['id', 'DESC'],
        ],
        transaction: context?.transaction,
      }),
    );
    return row ? this.toEntity(row) : null;
  }

  async getByProjectLanguage(
    projectId: number,
    languageCode: string,
    page: Page = {},
    context?: QueryContext,
  ): Promise<TranslationEntity[]> {
    const rows = await this.execute('list', () =>
      this.translationModel.findAll({
        where: { language_code: languageCode },
        include: [
          {
            model: this.textSourceModel,
            attributes: [],
            where: { project_id: projectId },
          },
        ],
        order: [['id', 'ASC']],
        limit: page.limit ?? DEFAULT_PAGE_LIMIT,
        offset: page.offset ?? 0,
        transaction: context?.transaction,
      }),
    );
    return rows.map((row) => this.toEntity(row));
  }

  /**
   * Matches the term against the serialized token list.
   */
  async searchTokens(
    term: string,
    languageCode?: string,
    page: Page = {},
    context?: QueryContext,
  ): Promise<TranslationEntity[]> {
    const match = contains('tokens', term);
    const condition: WhereOptions<TranslationAttributes> =
      languageCode === undefined
        ? match
        : { [Op.and]: [{ language_code: languageCode }, match] };

    return this.findEntities(condition, page, context);
  }

  async getAvailableLanguages(
    textSourceId?: number,
    context?: QueryContext,
  ): Promise<string[]> {
    return this.distinctValues(
      'language_code',
      this.filterWhere({ text_source_id: textSourceId }),
      context,
    );
  }

  /**
   * @throws NotFoundError when the translation does not exist.
   */
  async getTokenStatistics(
    id: number,
    context?: QueryContext,
  ): Promise<TokenStatistics> {
    const { tokens } = await this.getById(id, context);
    const texts = tokens.map((entry) => entry.token);
    const totalLength = texts.reduce((sum, text) => sum + text.length, 0);

    return {
      translation_id: id,
      token_count: tokens.length,
      unique_tokens: new Set(texts).size,
      average_token_length: texts.length > 0 ? totalLength / texts.length : 0,
      max_position: tokens.reduce((max, entry) => Math.max(max, entry.pos), 0),
    };
  }

  /**
   * Tokens joined by single spaces in position order.
   */
  tokenText(translation: Pick<TranslationEntity, 'tokens'>): string {
    return [...translation.tokens]
      .sort((a, b) => a.pos - b.pos)
      .map((entry) => entry.token)
      .join(' ');
  }

  protected async checkParents(
    dtos: CreateTranslationDto[],
    context?: QueryContext,
  ): Promise<void> {
    await this.ensureExists(
      this.textSourceModel,
      'TextSource',
      dtos.map((dto) => dto.text_source_id),
      context,
    );
  }

  protected toEntity(row: Translation): TranslationEntity {
    return {
      id: row.id,
      text_source_id: row.text_source_id,
      language_code: row.language_code,
      title: row.title,
      tokens: toTokens(row.tokens),
      original_text: row.original_text,
      metadata: row.metadata,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected toCreationAttributes(
    dto: CreateTranslationDto,
  ): CreationAttributes<Translation> {
    return {
      text_source_id: dto.text_source_id,
      language_code: dto.language_code,
      title: dto.title ?? null,
      tokens: toTokens(dto.tokens),
      original_text: dto.original_text ?? null,
      metadata: dto.metadata ?? {},
    };
  }

  protected filterWhere(
    filters: TranslationFilters,
  ): WhereAttributeHash<TranslationAttributes> {
    const condition: WhereAttributeHash<TranslationAttributes> = {};
    if (filters.text_source_id !== undefined) {
      condition.text_source_id = filters.text_source_id;
    }
    if (filters.language_code !== undefined) {
      condition.language_code = filters.language_code;
    }
    return condition;
  }
}

function toTokens(tokens: TranslationToken[]): TranslationToken[] {
  return tokens.map(({ token, pos }) => ({ token, pos }));
}
