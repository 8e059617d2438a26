import { Optional } from 'sequelize';
import {
  AutoIncrement,
  BelongsTo,
  Column,
  CreatedAt,
  DataType,
  Default,
  ForeignKey,
  Model,
  PrimaryKey,
  Table,
  UpdatedAt,
} from 'sequelize-typescript';
import { Metadata } from '../types/entities';
import { TextSource } from './text-source.model';

export interface LinkAttributes {
  id: number;
  text_source_id: number;
  url: string;
  title: string | null;
  description: string | null;
  link_type: string;
  is_active: boolean;
  metadata: Metadata;
  created_at: Date;
  updated_at: Date;
}

export type LinkCreationAttributes = Optional<
  LinkAttributes,
  | 'id'
  | 'title'
  | 'description'
  | 'link_type'
  | 'is_active'
  | 'metadata'
  | 'created_at'
  | 'updated_at'
>;

@Table({
  tableName: 'links',
  timestamps: true,
  createdAt: 'created_at',
  updatedAt: 'updated_at',
  indexes: [
    { fields: ['text_source_id'] },
    { fields: ['link_type'] },
    { fields: ['is_active'] },
  ],
})
export class Link extends Model<LinkAttributes, LinkCreationAttributes> {
  @PrimaryKey
  @AutoIncrement
  @Column({
    type: DataType.INTEGER,
  })
  id!: number;

  @ForeignKey(() => TextSource)
  @Column({
    type: DataType.INTEGER,
    allowNull: false,
  })
  text_source_id!: number;

  @Column({
    type: DataType.STRING(500),
    allowNull: false,
  })
  url!: string;

  @Column({
    type: DataType.STRING(255),
  })
  title!: string | null;

  @Column({
    type: DataType.TEXT,
  })
  description!: string | null;

  @Column({
    type: DataType.STRING(50),
    allowNull: false,
    defaultValue: 'reference',
  })
  link_type!: string;

  // Soft delete flag; links are deactivated rather than removed
  @Default(true)
  @Column({
    type: DataType.BOOLEAN,
    allowNull: false,
  })
  is_active!: boolean;

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
  @BelongsTo(() => TextSource, { onDelete: 'CASCADE' })
  text_source?: TextSource;
}
