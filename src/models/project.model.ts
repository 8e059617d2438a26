import { Optional } from 'sequelize';
import {
  AutoIncrement,
  Column,
  CreatedAt,
  DataType,
  HasMany,
  Model,
  PrimaryKey,
  Table,
  UpdatedAt,
} from 'sequelize-typescript';
import { Metadata } from '../types/entities';
import { TextSource } from './text-source.model';

export interface ProjectAttributes {
  id: number;
  name: string;
  description: string | null;
  metadata: Metadata;
  created_at: Date;
  updated_at: Date;
}

export type ProjectCreationAttributes = Optional<
  ProjectAttributes,
  'id' | 'description' | 'metadata' | 'created_at' | 'updated_at'
>;

@Table({
  tableName: 'projects',
  timestamps: true,
  createdAt: 'created_at',
  updatedAt: 'updated_at',
  indexes: [{ fields: ['name'] }, { fields: ['created_at'] }],
})
export class Project extends Model<
  ProjectAttributes,
  ProjectCreationAttributes
> {
  @PrimaryKey
  @AutoIncrement
  @Column({
    type: DataType.INTEGER,
  })
  id!: number;

  @Column({
    type: DataType.STRING(255),
    allowNull: false,
  })
  name!: string;

  @Column({
    type: DataType.TEXT,
  })
  description!: string | null;

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
  @HasMany(() => TextSource, { onDelete: 'CASCADE', hooks: false })
  text_sources?: TextSource[];
}
