import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { AggregatesService } from '../aggregates/aggregates.service';
import { STORE_MODELS } from '../models';
import { LinksRepository } from '../repositories/links.repository';
import { ProjectsRepository } from '../repositories/projects.repository';
import { SummariesRepository } from '../repositories/summaries.repository';
import { TextSourcesRepository } from '../repositories/text-sources.repository';
import { TranslationsRepository } from '../repositories/translations.repository';
import { VideosRepository } from '../repositories/videos.repository';
import {
  ConnectionService,
  DEFAULT_RECONNECT_POLICY,
  RECONNECT_POLICY,
} from './connection/connection.service';
import { UnitOfWorkService } from './unit-of-work/unit-of-work.service';

const repositories = [
  ProjectsRepository,
  TextSourcesRepository,
  SummariesRepository,
  TranslationsRepository,
  VideosRepository,
  LinksRepository,
];

/**
 * Data access layer. Expects a Sequelize connection to be opened by the
 * importing application (`SequelizeModule.forRoot` or `forRootAsync`).
 */
@Module({
  imports: [SequelizeModule.forFeature(STORE_MODELS)],
  exports: [
    SequelizeModule,
    ConnectionService,
    UnitOfWorkService,
    AggregatesService,
    ...repositories,
  ],
  providers: [
    { provide: RECONNECT_POLICY, useValue: DEFAULT_RECONNECT_POLICY },
    ConnectionService,
    UnitOfWorkService,
    AggregatesService,
    ...repositories,
  ],
})
export class DalModule {}
