import { Injectable } from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/sequelize';
import { CreationAttributes, Op, WhereAttributeHash } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { QueryContext } from '../dal/query-context';
import { Logger } from '../decorators/logger.decorator';
import { CreateVideoDto, UpdateVideoDto } from '../dto';
import { TextSource, Video, VideoAttributes } from '../models';
import { Page, VideoEntity } from '../types/entities';
import { JSONLogger } from '../utils/logger';
import { BaseRepository, DEFAULT_PAGE_LIMIT } from './base.repository';

export const RECOGNIZED_VIDEO_FORMATS = [
  'mp4',
  'webm',
  'mov',
  'avi',
  'mkv',
  'm4v',
];

export interface VideoFilters {
  text_source_id?: number;
  format?: string;
}

export interface VideoStatistics {
  video_count: number;
  avg_duration: number;
  total_size: number;
  min_duration: number;
  max_duration: number;
  format_count: number;
}

/**
 * Rendered videos of text sources. Only file references and their
 * descriptive fields are stored here.
 */
@Injectable()
export class VideosRepository extends BaseRepository<
  Video,
  VideoEntity,
  CreateVideoDto,
  UpdateVideoDto,
  VideoFilters
> {
  @Logger(VideosRepository.name)
  protected readonly logger!: JSONLogger;

  protected readonly resource = 'Video';
  protected readonly createDto = CreateVideoDto;
  protected readonly updateDto = UpdateVideoDto;
  protected readonly searchColumns = ['title'];

  constructor(
    @InjectModel(Video)
    private readonly videoModel: typeof Video,
    @InjectModel(TextSource)
    private readonly textSourceModel: typeof TextSource,
    @InjectConnection()
    sequelize: Sequelize,
  ) {
    super(videoModel, sequelize);
  }

  async getBySourceId(
    textSourceId: number,
    page: Page = {},
    context?: QueryContext,
  ): Promise<VideoEntity[]> {
    return this.list({ text_source_id: textSourceId }, page, context);
  }

  async getByFormat(
    format: string,
    page: Page = {},
    context?: QueryContext,
  ): Promise<VideoEntity[]> {
    return this.list({ format }, page, context);
  }

  async getByProjectId(
    projectId: number,
    page: Page = {},
    context?: QueryContext,
  ): Promise<VideoEntity[]> {
    const rows = await this.execute('list', () =>
      this.videoModel.findAll({
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

  async searchByTitle(
    term: string,
    page: Page = {},
    context?: QueryContext,
  ): Promise<VideoEntity[]> {
    return this.search(term, page, context);
  }

  /**
   * Videos whose duration, in seconds, lies within the inclusive range.
   */
  async getByDurationRange(
    minSeconds: number,
    maxSeconds: number,
    page: Page = {},
    context?: QueryContext,
  ): Promise<VideoEntity[]> {
    return this.findEntities(
      { duration: { [Op.between]: [minSeconds, maxSeconds] } },
      page,
      context,
    );
  }

  /**
   * Videos whose size, in bytes, lies within the inclusive range.
   */
  async getByFileSizeRange(
    minBytes: number,
    maxBytes: number,
    page: Page = {},
    context?: QueryContext,
  ): Promise<VideoEntity[]> {
    return this.findEntities(
      { file_size: { [Op.between]: [minBytes, maxBytes] } },
      page,
      context,
    );
  }

  async getAvailableFormats(
    textSourceId?: number,
    context?: QueryContext,
  ): Promise<string[]> {
    return this.distinctValues(
      'format',
      this.filterWhere({ text_source_id: textSourceId }),
      context,
    );
  }

  /**
   * Counts and duration/size aggregates, for one text source or for all
   * videos. Empty sets report zeros.
   */
  async getStatistics(
    textSourceId?: number,
    context?: QueryContext,
  ): Promise<VideoStatistics> {
    const where = this.filterWhere({ text_source_id: textSourceId });
    const transaction = context?.transaction;

    const timed = { ...where, duration: { [Op.not]: null } };
    const [count, formats, timedCount, totalDuration, total, min, max] =
      await this.execute('statistics', () =>
        Promise.all([
          this.videoModel.count({ where, transaction }),
          this.videoModel.count({
            where,
            distinct: true,
            col: 'format',
            transaction,
          }),
          this.videoModel.count({ where: timed, transaction }),
          this.videoModel.sum('duration', { where: timed, transaction }),
          this.videoModel.sum('file_size', { where, transaction }),
          this.videoModel.min('duration', { where, transaction }),
          this.videoModel.max('duration', { where, transaction }),
        ]),
      );

    return {
      video_count: count,
      avg_duration: timedCount > 0 ? Number(totalDuration) / timedCount : 0,
      total_size: Number(total) || 0,
      min_duration: Number(min) || 0,
      max_duration: Number(max) || 0,
      format_count: formats,
    };
  }

  /**
   * Unrecognized containers are stored as given but reported.
   */
  protected inspect(dto: CreateVideoDto | UpdateVideoDto): void {
    const format = dto.format;
    if (format && !RECOGNIZED_VIDEO_FORMATS.includes(format.toLowerCase())) {
      this.logger.warn('Unrecognized video format', {
        format,
        recognized: RECOGNIZED_VIDEO_FORMATS,
      });
    }
  }

  protected async checkParents(
    dtos: CreateVideoDto[],
    context?: QueryContext,
  ): Promise<void> {
    await this.ensureExists(
      this.textSourceModel,
      'TextSource',
      dtos.map((dto) => dto.text_source_id),
      context,
    );
  }

  protected toEntity(row: Video): VideoEntity {
    return {
      id: row.id,
      text_source_id: row.text_source_id,
      title: row.title,
      file_path: row.file_path,
      file_url: row.file_url,
      file_size: row.file_size === null ? null : Number(row.file_size),
      duration: row.duration,
      format: row.format,
      thumbnail_path: row.thumbnail_path,
      metadata: row.metadata,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected toCreationAttributes(
    dto: CreateVideoDto,
  ): CreationAttributes<Video> {
    return {
      text_source_id: dto.text_source_id,
      title: dto.title ?? null,
      file_path: dto.file_path,
      file_url: dto.file_url ?? null,
      file_size: dto.file_size ?? null,
      duration: dto.duration ?? null,
      format: dto.format ?? null,
      thumbnail_path: dto.thumbnail_path ?? null,
      metadata: dto.metadata ?? {},
    };
  }

  protected filterWhere(
    filters: VideoFilters,
  ): WhereAttributeHash<VideoAttributes> {
    const condition: WhereAttributeHash<VideoAttributes> = {};
    if (filters.text_source_id !== undefined) {
      condition.text_source_id = filters.text_source_id;
    }
    if (filters.format !== undefined) {
      condition.format = filters.format;
    }
    return condition;
  }
}
