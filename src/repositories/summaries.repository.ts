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
import { CreateSummaryDto, UpdateSummaryDto } from '../dto';
import { Summary, SummaryAttributes, TextSource } from '../models';
import { Page, SummaryEntity } from '../types/entities';
import { JSONLogger } from '../utils/logger';
import { BaseRepository, DEFAULT_PAGE_LIMIT } from './base.repository';

export interface SummaryFilters {
  text_source_id?: number;
  summary_type?: string;
}

@Injectable()
export class SummariesRepository extends BaseRepository<
  Summary,
  SummaryEntity,
  CreateSummaryDto,
  UpdateSummaryDto,
  SummaryFilters
> {
  @Logger(SummariesRepository.name)
  protected readonly logger!: JSONLogger;

  protected readonly resource = 'Summary';
  protected readonly createDto = CreateSummaryDto;
  protected readonly updateDto = UpdateSummaryDto;
  protected readonly searchColumns = ['title', 'content'];

  constructor(
    @InjectModel(Summary)
    private readonly summaryModel: typeof Summary,
    @InjectModel(TextSource)
    private readonly textSourceModel: typeof TextSource,
    @InjectConnection()
    sequelize: Sequelize,
  ) {
    super(summaryModel, sequelize);
  }

  async getBySourceId(
    textSourceId: number,
    page: Page = {},
    context?: QueryContext,
  ): Promise<SummaryEntity[]> {
    return this.list({ text_source_id: textSourceId }, page, context);
  }

  async getByType(
    textSourceId: number,
    summaryType: string,
    page: Page = {},
    context?: QueryContext,
  ): Promise<SummaryEntity[]> {
    return this.list(
      { text_source_id: textSourceId, summary_type: summaryType },
      page,
      context,
    );
  }

  /**
   * Summaries of one type across every text source of a project.
   */
  async getByProjectType(
    projectId: number,
    summaryType: string,
    page: Page = {},
    context?: QueryContext,
  ): Promise<SummaryEntity[]> {
    const rows = await this.execute('list', () =>
      this.summaryModel.findAll({
        where: { summary_type: summaryType },
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
   * Matches title and content, optionally restricted to one summary type.
   */
  async searchContent(
    term: string,
    summaryType?: string,
    page: Page = {},
    context?: QueryContext,
  ): Promise<SummaryEntity[]> {
    const condition: WhereOptions<SummaryAttributes> =
      summaryType === undefined
        ? this.searchWhere(term)
        : {
            [Op.and]: [{ summary_type: summaryType }, this.searchWhere(term)],
          };

    return this.findEntities(condition, page, context);
  }

  async getAvailableTypes(
    textSourceId?: number,
    context?: QueryContext,
  ): Promise<string[]> {
    return this.distinctValues(
      'summary_type',
      this.filterWhere({ text_source_id: textSourceId }),
      context,
    );
  }

  protected async checkParents(
    dtos: CreateSummaryDto[],
    context?: QueryContext,
  ): Promise<void> {
    await this.ensureExists(
      this.textSourceModel,
      'TextSource',
      dtos.map((dto) => dto.text_source_id),
      context,
    );
  }

  protected toEntity(row: Summary): SummaryEntity {
    return {
      id: row.id,
      text_source_id: row.text_source_id,
      title: row.title,
      content: row.content,
      summary_type: row.summary_type,
      metadata: row.metadata,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected toCreationAttributes(
    dto: CreateSummaryDto,
  ): CreationAttributes<Summary> {
    return {
      text_source_id: dto.text_source_id,
      title: dto.title ?? null,
      content: dto.content,
      summary_type: dto.summary_type ?? 'general',
      metadata: dto.metadata ?? {},
    };
  }

  protected filterWhere(
    filters: SummaryFilters,
  ): WhereAttributeHash<SummaryAttributes> {
    const condition: WhereAttributeHash<SummaryAttributes> = {};
    if (filters.text_source_id !== undefined) {
      condition.text_source_id = filters.text_source_id;
    }
    if (filters.summary_type !== undefined) {
      condition.summary_type = filters.summary_type;
    }
    return condition;
  }
}
