import { Injectable } from '@nestjs/common';
import { QueryContext } from '../dal/query-context';
import { Logger } from '../decorators/logger.decorator';
import { DEFAULT_PAGE_LIMIT } from '../repositories/base.repository';
import { LinksRepository } from '../repositories/links.repository';
import { ProjectsRepository } from '../repositories/projects.repository';
import { SummariesRepository } from '../repositories/summaries.repository';
import { TextSourcesRepository } from '../repositories/text-sources.repository';
import { TranslationsRepository } from '../repositories/translations.repository';
import { VideosRepository } from '../repositories/videos.repository';
import {
  LinkEntity,
  Page,
  ProjectEntity,
  SummaryEntity,
  TextSourceEntity,
  TranslationEntity,
  VideoEntity,
} from '../types/entities';
import { JSONLogger } from '../utils/logger';

export interface TextSourceTree extends TextSourceEntity {
  summaries: SummaryEntity[];
  translations: TranslationEntity[];
  videos: VideoEntity[];
  links: LinkEntity[];
}

export interface ProjectTree extends ProjectEntity {
  text_sources: TextSourceTree[];
}

export interface ProjectStatistics {
  project_id: number;
  project_name: string;
  source_count: number;
  summary_count: number;
  translation_count: number;
  video_count: number;
  link_count: number;
  languages: string[];
}

export type SearchHitType = 'text_source' | 'summary' | 'translation';

export interface SearchHit {
  type: SearchHitType;
  id: number;
  title: string | null;
}

/**
 * Reads every page of a paginated repository query.
 */
async function collectAll<T>(
  fetch: (page: Page) => Promise<T[]>,
): Promise<T[]> {
  const rows: T[] = [];
  for (let offset = 0; ; offset += DEFAULT_PAGE_LIMIT) {
    const batch = await fetch({ limit: DEFAULT_PAGE_LIMIT, offset });
    rows.push(...batch);
    if (batch.length < DEFAULT_PAGE_LIMIT) {
      return rows;
    }
  }
}

/**
 * Read-only views spanning several repositories.
 *
 * @remarks
 * Each view is assembled from sequential repository reads rather than a
 * single query, so it is not a snapshot: a row written by another caller
 * while a view is being built may or may not appear in it, but is never
 * counted twice. Pass a {@link QueryContext} to read inside a unit of work.
 */
@Injectable()
export class AggregatesService {
  @Logger(AggregatesService.name)
  private readonly logger!: JSONLogger;

  constructor(
    private readonly projects: ProjectsRepository,
    private readonly textSources: TextSourcesRepository,
    private readonly summaries: SummariesRepository,
    private readonly translations: TranslationsRepository,
    private readonly videos: VideosRepository,
    private readonly links: LinksRepository,
  ) {}

  /**
   * A project with every text source and everything derived from them.
   *
   * @throws NotFoundError when the project does not exist.
   */
  async getComplete(
    projectId: number,
    context?: QueryContext,
  ): Promise<ProjectTree> {
    const project = await this.projects.getById(projectId, context);
    const sources = await collectAll((page) =>
      this.textSources.getByProjectId(projectId, page, context),
    );

    const trees: TextSourceTree[] = [];
    for (const source of sources) {
      trees.push({
        ...source,
        summaries: await collectAll((page) =>
          this.summaries.getBySourceId(source.id, page, context),
        ),
        translations: await collectAll((page) =>
          this.translations.getBySourceId(source.id, page, context),
        ),
        videos: await collectAll((page) =>
          this.videos.getBySourceId(source.id, page, context),
        ),
        links: await collectAll((page) =>
          this.links.getBySourceId(source.id, page, context),
        ),
      });
    }

    this.logger.debug('Assembled project tree', {
      projectId,
      textSources: trees.length,
    });
    return { ...project, text_sources: trees };
  }

  /**
   * Row counts per resource for one project and the distinct translation
   * languages, sorted.
   *
   * @throws NotFoundError when the project does not exist.
   */
  async getStatistics(
    projectId: number,
    context?: QueryContext,
  ): Promise<ProjectStatistics> {
    const project = await this.projects.getById(projectId, context);
    const sources = await collectAll((page) =>
      this.textSources.getByProjectId(projectId, page, context),
    );

    const counts = await this.textSources.countDerived(
      sources.map((source) => source.id),
      context,
    );

    return {
      project_id: project.id,
      project_name: project.name,
      source_count: sources.length,
      ...counts,
    };
  }

  /**
   * Free-text search over text sources (title, content), summaries (title,
   * content) and translations (original text, title). Hits are grouped in
   * that order, oldest first within each group.
   */
  async searchAll(term: string, context?: QueryContext): Promise<SearchHit[]> {
    const sources = await collectAll((page) =>
      this.textSources.search(term, page, context),
    );
    const summaries = await collectAll((page) =>
      this.summaries.search(term, page, context),
    );
    const translations = await collectAll((page) =>
      this.translations.search(term, page, context),
    );

    const hits: SearchHit[] = [
      ...sources.map((row) => hit('text_source', row)),
      ...summaries.map((row) => hit('summary', row)),
      ...translations.map((row) => hit('translation', row)),
    ];

    this.logger.debug('Search completed', { term, hits: hits.length });
    return hits;
  }
}

function hit(
  type: SearchHitType,
  row: { id: number; title: string | null },
): SearchHit {
  return { type, id: row.id, title: row.title };
}
