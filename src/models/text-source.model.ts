import { Optional } from 'sequelize';
import {
  AutoIncrement,
  BelongsTo,
  Column,
  CreatedAt,
  DataType,
  ForeignKey,
  HasMany,
  Model,
  PrimaryKey,
  Table,
  UpdatedAt,
} from 'sequelize-typescript';
import { Metadata } from '../types/entities';
import { Link } from './link.model';
import { Project } from './project.model';
import { Summary } from './summary.model';
import { Translation } from './translation.model';
import { Video } from './video.model';

export interface TextSourceAttributes {
  id: number;
  project_id: number;
  title: string | null;
  content: string;
  source_type: string;
  source_url: string | null;
  metadata: Metadata;
  created_at: Date;
  updated_at: Date;
}

export type TextSourceCreationAttributes = Optional<
  TextSourceAttributes,
  | 'id'
  | 'title'
  | 'source_type'
  | 'source_url'
  | 'metadata'
  | 'created_at'
  | 'updated_at'
>;

@Table({
  tableName: 'text_sources',
  timestamps: true,
  createdAt: 'created_at',
  updatedAt: 'updated_at',
  indexes: [
    { fields: ['project_id'] },
    { fields: ['title'] },
    { fields: ['source_type'] },
  ],
})
export class TextSource extends Model<
  TextSourceAttributes,
  TextSourceCreationAttributes
> {
  @PrimaryKey
  @AutoIncrement
  @Column({
    type: DataType.INTEGER,
  })
  id!: number;

  @ForeignKey(() => Project)
  @Column({
    type: DataType.INTEGER,
    allowNull: false,
  })
  project_id!: number;

  @Column({
    type: DataType.STRING(255),
  })
  title!: string | null;

  @Column({
    type: DataType.TEXT,
    allowNull: false,
  })
  content!: string;

  @Column({
    type: DataType.STRING(50),
    allowNull: false,
    defaultValue: 'text',
  })
  source_type!: string;

  @Column({
    type: DataType.STRING(500),
  })
  source_url!: string | null;

  @Column({
    type: DataType.JSON,
    allowNull: false,
    defaultValue: {},
  })
  metadata!: Metadata;

  @CreatedAt
  @Column({
    type: DataType.DATE,
  })
  created_at!: Date;

  @UpdatedAt
  @Column({
    type: DataType.DATE,
  })
  updated_at!: Date;

  // Relationships
  @BelongsTo(() => Project, { onDelete: 'CASCADE' })
  project?: Project;

  @HasMany(() => Summary, { onDelete: 'CASCADE', hooks: false })
  summaries?: Summary[];

  @HasMany(() => Translation, { onDelete: 'CASCADE', hooks: false })
  translations?: Translation[];

  @HasMany(() => Video, { onDelete: 'CASCADE', hooks: false })
  videos?: Video[];

  @HasMany(() => Link, { onDelete: 'CASCADE', hooks: false })
  links?: Link[];
}
