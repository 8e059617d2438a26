import { Injectable } from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/sequelize';
import {
  Attributes,
  CreationAttributes,
  Op,
  WhereAttributeHash,
  WhereOptions,
} from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { QueryContext } from '../dal/query-context';
import { Logger } from '../decorators/logger.decorator';
import { CreateLinkDto, UpdateLinkDto } from '../dto';
import { Link, LinkAttributes, TextSource } from '../models';
import { LinkEntity, Page } from '../types/entities';
import { JSONLogger } from '../utils/logger';
import {
  BaseRepository,
  DEFAULT_PAGE_LIMIT,
  escapeLike,
} from './base.repository';

export const RECOGNIZED_LINK_TYPES = [
  'reference',
  'source',
  'citation',
  'related',
  'media',
];

export interface LinkFilters {
  text_source_id?: number;
  link_type?: string;
  is_active?: boolean;
}

export interface LinkStatistics {
  total_links: number;
  active_links: number;
  inactive_links: number;
  type_count: number;
  secure_links: number;
}

function hasSchemeAndHost(url: string): boolean {
  try {
    return new URL(url).host.length > 0;
  } catch {
    return false;
  }
}

/**
 * External references attached to text sources.
 *
 * @remarks
 * Links are the one resource with a soft delete: `deactivate` clears
 * `is_active` and keeps the row. Lookups by project, domain and free text
 * only return active links; lookups by text source or id return both.
 */
@Injectable()
export class LinksRepository extends BaseRepository<
  Link,
  LinkEntity,
  CreateLinkDto,
  UpdateLinkDto,
  LinkFilters
> {
  @Logger(LinksRepository.name)
  protected readonly logger!: JSONLogger;

  protected readonly resource = 'Link';
  protected readonly createDto = CreateLinkDto;
  protected readonly updateDto = UpdateLinkDto;
  protected readonly searchColumns = ['title', 'description'];

  constructor(
    @InjectModel(Link)
    private readonly linkModel: typeof Link,
    @InjectModel(TextSource)
    private readonly textSourceModel: typeof TextSource,
    @InjectConnection()
    sequelize: Sequelize,
  ) {
    super(linkModel, sequelize);
  }

  async getBySourceId(
    textSourceId: number,
    page: Page = {},
    context?: QueryContext,
  ): Promise<LinkEntity[]> {
    return this.list({ text_source_id: textSourceId }, page, context);
  }

  async getActiveBySourceId(
    textSourceId: number,
    page: Page = {},
    context?: QueryContext,
  ): Promise<LinkEntity[]> {
    return this.list(
      { text_source_id: textSourceId, is_active: true },
      page,
      context,
    );
  }

  async getByType(
    textSourceId: number,
    linkType: string,
    page: Page = {},
    context?: QueryContext,
  ): Promise<LinkEntity[]> {
    return this.list(
      { text_source_id: textSourceId, link_type: linkType },
      page,
      context,
    );
  }

  /**
   * Active links of one type across every text source of a project.
   */
  async getByProjectType(
    projectId: number,
    linkType: string,
    page: Page = {},
    context?: QueryContext,
  ): Promise<LinkEntity[]> {
    const rows = await this.execute('list', () =>
      this.linkModel.findAll({
        where: { link_type: linkType, is_active: true },
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
   * Active links whose URL contains `domain`.
   */
  async getByDomain(
    domain: string,
    page: Page = {},
    context?: QueryContext,
  ): Promise<LinkEntity[]> {
    return this.findEntities(this.domainWhere(domain), page, context);
  }

  async deactivate(id: number, context?: QueryContext): Promise<LinkEntity> {
    return this.setActive(id, false, context);
  }

  async activate(id: number, context?: QueryContext): Promise<LinkEntity> {
    return this.setActive(id, true, context);
  }

  /**
   * Deactivates every active link whose URL contains `domain`.
   *
   * @returns Number of links deactivated.
   */
  async bulkDeactivateByDomain(
    domain: string,
    context?: QueryContext,
  ): Promise<number> {
    const [affected] = await this.execute('bulk deactivate', () =>
      this.linkModel.update(
        { is_active: false },
        {
          where: this.domainWhere(domain),
          transaction: context?.transaction,
        },
      ),
    );

    this.logger.log('Links deactivated for domain', { domain, affected });
    return affected;
  }

  async getAvailableTypes(
    textSourceId?: number,
    context?: QueryContext,
  ): Promise<string[]> {
    return this.distinctValues(
      'link_type',
      this.filterWhere({ text_source_id: textSourceId }),
      context,
    );
  }

  async getStatistics(
    textSourceId?: number,
    context?: QueryContext,
  ): Promise<LinkStatistics> {
    const scope = this.filterWhere({ text_source_id: textSourceId });
    const transaction = context?.transaction;

    const [total, active, types, secure] = await this.execute(
      'statistics',
      () =>
        Promise.all([
          this.linkModel.count({ where: scope, transaction }),
          this.linkModel.count({
            where: { ...scope, is_active: true },
            transaction,
          }),
          this.linkModel.count({
            where: scope,
            distinct: true,
            col: 'link_type',
            transaction,
          }),
          this.linkModel.count({
            where: { ...scope, url: { [Op.like]: 'https://%' } },
            transaction,
          }),
        ]),
    );

    return {
      total_links: total,
      active_links: active,
      inactive_links: total - active,
      type_count: types,
      secure_links: secure,
    };
  }

  protected searchWhere(term: string): WhereOptions<Attributes<Link>> {
    return { [Op.and]: [{ is_active: true }, super.searchWhere(term)] };
  }

  /**
   * Malformed URLs and unknown link types are stored as given but
   * reported.
   */
  protected inspect(dto: CreateLinkDto | UpdateLinkDto): void {
    if (dto.url !== undefined && !hasSchemeAndHost(dto.url)) {
      this.logger.warn('Link URL has no scheme or host', { url: dto.url });
    }
    if (dto.link_type && !RECOGNIZED_LINK_TYPES.includes(dto.link_type)) {
      this.logger.warn('Unrecognized link type', {
        linkType: dto.link_type,
        recognized: RECOGNIZED_LINK_TYPES,
      });
    }
  }

  protected async checkParents(
    dtos: CreateLinkDto[],
    context?: QueryContext,
  ): Promise<void> {
    await this.ensureExists(
      this.textSourceModel,
      'TextSource',
      dtos.map((dto) => dto.text_source_id),
      context,
    );
  }

  protected toEntity(row: Link): LinkEntity {
    return {
      id: row.id,
      text_source_id: row.text_source_id,
      url: row.url,
      title: row.title,
      description: row.description,
      link_type: row.link_type,
      is_active: row.is_active,
      metadata: row.metadata,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected toCreationAttributes(dto: CreateLinkDto): CreationAttributes<Link> {
    return {
      text_source_id: dto.text_source_id,
      url: dto.url,
      title: dto.title ?? null,
      description: dto.description ?? null,
      link_type: dto.link_type ?? 'reference',
      is_active: dto.is_active ?? true,
      metadata: dto.metadata ?? {},
    };
  }

  protected filterWhere(
    filters: LinkFilters,
  ): WhereAttributeHash<LinkAttributes> {
    const condition: WhereAttributeHash<LinkAttributes> = {};
    if (filters.text_source_id !== undefined) {
      condition.text_source_id = filters.text_source_id;
    }
    if (filters.link_type !== undefined) {
      condition.link_type = filters.link_type;
    }
    if (filters.is_active !== undefined) {
      condition.is_active = filters.is_active;
    }
    return condition;
  }

  private domainWhere(domain: string): WhereAttributeHash<LinkAttributes> {
    return {
      is_active: true,
      url: { [Op.like]: `%${escapeLike(domain)}%` },
    };
  }

  private async setActive(
    id: number,
    active: boolean,
    context?: QueryContext,
  ): Promise<LinkEntity> {
    const row = await this.findRow(id, context);

    return this.execute(active ? 'activate' : 'deactivate', async () => {
      await row.update(
        { is_active: active },
        { transaction: context?.transaction },
      );
      this.logger.log(active ? 'Link activated' : 'Link deactivated', { id });
      return this.toEntity(row);
    });
  }
}
