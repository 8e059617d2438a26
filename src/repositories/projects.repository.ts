import { Injectable } from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/sequelize';
import { CreationAttributes, WhereAttributeHash } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { QueryContext } from '../dal/query-context';
import { Logger } from '../decorators/logger.decorator';
import { CreateProjectDto, UpdateProjectDto } from '../dto';
import { Project, ProjectAttributes } from '../models';
import { ProjectEntity } from '../types/entities';
import { JSONLogger } from '../utils/logger';
import { BaseRepository } from './base.repository';

export interface ProjectFilters {
  name?: string;
}

/**
 * Top-level containers. Deleting a project removes every text source under
 * it and everything derived from them.
 */
@Injectable()
export class ProjectsRepository extends BaseRepository<
  Project,
  ProjectEntity,
  CreateProjectDto,
  UpdateProjectDto,
  ProjectFilters
> {
  @Logger(ProjectsRepository.name)
  protected readonly logger!: JSONLogger;

  protected readonly resource = 'Project';
  protected readonly createDto = CreateProjectDto;
  protected readonly updateDto = UpdateProjectDto;
  protected readonly searchColumns = ['name', 'description'];

  constructor(
    @InjectModel(Project)
    private readonly projectModel: typeof Project,
    @InjectConnection()
    sequelize: Sequelize,
  ) {
    super(projectModel, sequelize);
  }

  /**
   * First project with exactly this name, or `null`.
   */
  async getByName(
    name: string,
    context?: QueryContext,
  ): Promise<ProjectEntity | null> {
    const row = await this.execute('read', () =>
      this.projectModel.findOne({
        where: { name },
        order: [['id', 'ASC']],
        transaction: context?.transaction,
      }),
    );
    return row ? this.toEntity(row) : null;
  }

  protected toEntity(row: Project): ProjectEntity {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      metadata: row.metadata,
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }

  protected toCreationAttributes(
    dto: CreateProjectDto,
  ): CreationAttributes<Project> {
    return {
      name: dto.name,
      description: dto.description ?? null,
      metadata: dto.metadata ?? {},
    };
  }

  protected filterWhere(
    filters: ProjectFilters,
  ): WhereAttributeHash<ProjectAttributes> {
    const condition: WhereAttributeHash<ProjectAttributes> = {};
    if (filters.name !== undefined) {
      condition.name = filters.name;
    }
    return condition;
  }
}
