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
import { CreateTextSourceDto, UpdateTextSourceDto } from '../dto';
import {
  Link,
  Project,
  Summary,
  TextSource,
  TextSourceAttributes,
  Translation,
  Video,
} from '../models';
import { Page, TextSourceEntity } from '../types/entities';
import { JSONLogger } from '../utils/logger';
import { validatePayload } from '../utils/validation';
import { BaseRepository } from './base.repository';

export interface TextSourceFilters {
  project_id?: number;
  source_type?: string;
}

export interface DerivedCounts {
  summary_count: number;
  translation_count: number;
  video_count: number;
  link_count: number;
  languages: string[];
}

/**
 * Size of a text source and of everything derived from it.
 */
export interface TextSourceStatistics extends DerivedCounts {
  text_source_id: number;
  title: string | null;
  project_id: number;
  content_length: number;
}

/**
 * Scraped articles and transcripts. Summaries, translations, videos and
 * links all hang off a text source and are removed with it.
 */
@Injectable()
export class TextSourcesRepository extends BaseRepository<
  TextSource,
  TextSourceEntity,
  CreateTextSourceDto,
  UpdateTextSourceDto,
  TextSourceFilters
> {
  @Logger(TextSourcesRepository.name)
  protected readonly logger!: JSONLogger;

  protected readonly resource = 'TextSource';
  protected readonly createDto = CreateTextSourceDto;
  protected readonly updateDto = UpdateTextSourceDto;
  protected readonly searchColumns = ['title', 'content'];

  constructor(
    @InjectModel(TextSource)
    private readonly textSourceModel: typeof TextSource,
    @InjectModel(Project)
    private readonly projectModel: typeof Project,
    @InjectModel(Summary)
    private readonly summaryModel: typeof Summary,
    @InjectModel(Translation)
    private readonly translationModel: typeof Translation,
    @InjectModel(Video)
    private readonly videoModel: typeof Video,
    @InjectModel(Link)
    private readonly linkModel: typeof Link,
    @InjectConnection()
    sequelize: Sequelize,
  ) {
    super(textSourceModel, sequelize);
  }

  async getByProjectId(
    projectId: number,
    page: Page = {},
    context?: QueryContext,
  ): Promise<TextSourceEntity[]> {
    return this.list({ project_id: projectId }, page, context);
  }

  async getByType(
    projectId: number,
    sourceType: string,
    page: Page = {},
    context?: QueryContext,
  ): Promise<TextSourceEntity[]> {
    return this.list(
      { project_id: projectId, source_type: sourceType },
      page,
      context,
    );
  }

  /**
   * Matches the term against title and content, optionally within one
   * project.
   */
  async searchContent(
    term: string,
    projectId?: number,
    page: Page = {},
    context?: QueryContext,
  ): Promise<TextSourceEntity[]> {
    const condition: WhereOptions<TextSourceAttributes> =
      projectId === undefined
        ? this.searchWhere(term)
        : { [Op.and]: [{ project_id: projectId }, this.searchWhere(term)] };

    return this.findEntities(condition, page, context);
  }

  /**
   * @throws NotFoundError when the text source does not exist.
   */
  async getStatistics(
    id: number,
    context?: QueryContext,
  ): Promise<TextSourceStatistics> {
    const source = await this.findRow(id, context);
    const counts = await this.countDerived([id], context);

    return {
      text_source_id: source.id,
      title: source.title,
      project_id: source.project_id,
      content_length: source.content.length,
      ...counts,
    };
  }

  /**
   * Totals over everything derived from the given text sources. Ids that no
   * longer exist contribute nothing.
   */
  async countDerived(
    ids: number[],
    context?: QueryContext,
  ): Promise<DerivedCounts> {
    if (ids.length === 0) {
      return {
        summary_count: 0,
        translation_count: 0,
        video_count: 0,
        link_count: 0,
        languages: [],
      };
    }

    const where = { text_source_id: { [Op.in]: ids } };
    const transaction = context?.transaction;

    const [summaryCount, translationCount, videoCount, linkCount, languages] =
      await this.execute('statistics', () =>
        Promise.all([
          this.summaryModel.count({ where, transaction }),
          this.translationModel.count({ where, transaction }),
          this.videoModel.count({ where, transaction }),
          this.linkModel.count({ where, transaction }),
          this.translationModel.findAll({
            attributes: ['language_code'],
            where,
            group: ['language_code'],
            transaction,
          }),
        ]),
      );

    return {
      summary_count: summaryCount,
      translation_count: translationCount,
      video_count: videoCount,
      link_count: linkCount,
      languages: languages.map((row) => row.language_code).sort(),
    };
  }

  /**
   * Applies the same change to every text source of a project.
   *
   * @returns Number of rows updated.
   */
  async bulkUpdateByProject(
    projectId: number,
    payload: UpdateTextSourceDto,
    context?: QueryContext,
  ): Promise<number> {
    const dto = await validatePayload(
      UpdateTextSourceDto,
      payload,
      this.resource,
    );
    await this.ensureExists(this.projectModel, 'Project', [projectId], context);

    const [affected] = await this.execute('bulk update', () =>
      this.textSourceModel.update(
        { ...dto },
        {
          where: { project_id: projectId },
          transaction: context?.transaction,
        },
      ),
    );

    this.logger.log('Text sources updated for project', {
      projectId,
      affected,
      fields: Object.keys(dto),
    });
    return affected;
  }

  protected async checkParents(
    dtos: CreateTextSourceDto[],
    context?: QueryContext,
  ): Promise<void> {
    await this.ensureExists(
      this.projectModel,
      'Project',
      dtos.map((dto) => dto.project_id),
      context,
    );
  }

  protected toEntity(row: TextSource): TextSourceEntity {
    return {
      id: row.id,
      project_id: row.project_id,
      title: row.title,
      content: row.content,
      source_type: row.source_type,
      source_url: row.source_url,
      metadata: row.metadata,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected toCreationAttributes(
    dto: CreateTextSourceDto,
  ): CreationAttributes<TextSource> {
    return {
      project_id: dto.project_id,
      title: dto.title ?? null,
      content: dto.content,
      source_type: dto.source_type ?? 'text',
      source_url: dto.source_url ?? null,
      metadata: dto.metadata ?? {},
    };
  }

  protected filterWhere(
    filters: TextSourceFilters,
  ): WhereAttributeHash<TextSourceAttributes> {
    const condition: WhereAttributeHash<TextSourceAttributes> = {};
    if (filters.project_id !== undefined) {
      condition.project_id = filters.project_id;
    }
    if (filters.source_type !== undefined) {
      condition.source_type = filters.source_type;
    }
    return condition;
  }
}
