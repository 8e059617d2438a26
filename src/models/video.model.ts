import { Optional } from 'sequelize';
import {
  AutoIncrement,
  BelongsTo,
  Column,
  CreatedAt,
  DataType,
  ForeignKey,
  Model,
  PrimaryKey,
  Table,
  UpdatedAt,
} from 'sequelize-typescript';
import { Metadata } from '../types/entities';
import { TextSource } from './text-source.model';

export interface VideoAttributes {
  id: number;
  text_source_id: number;
  title: string | null;
  file_path: string;
  file_url: string | null;
  // BIGINT: postgres hands it back as a string
  file_size: number | string | null;
  duration: number | null;
  format: string | null;
  thumbnail_path: string | null;
  metadata: Metadata;
  created_at: Date;
  updated_at: Date;
}

export type VideoCreationAttributes = Optional<
  VideoAttributes,
  | 'id'
  | 'title'
  | 'file_url'
  | 'file_size'
  | 'duration'
  | 'format'
  | 'thumbnail_path'
  | 'metadata'
  | 'created_at'
  | 'updated_at'
>;

@Table({
  tableName: 'videos',
  timestamps: true,
  createdAt: 'created_at',
  updatedAt: 'updated_at',
  indexes: [{ fields: ['text_source_id'] }, { fields: ['format'] }],
})
export class Video extends Model<VideoAttributes, VideoCreationAttributes> {
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
    type: DataType.STRING(255),
  })
  title!: string | null;

  @Column({
    type: DataType.STRING(500),
    allowNull: false,
  })
  file_path!: string;

  @Column({
    type: DataType.STRING(500),
  })
  file_url!: string | null;

  @Column({
    type: DataType.BIGINT,
  })
  file_size!: number | string | null;

  /**
   * Length in seconds.
   */
  @Column({
    type: DataType.INTEGER,
  })
  duration!: number | null;

  @Column({
    type: DataType.STRING(20),
  })
  format!: string | null;

  @Column({
    type: DataType.STRING(500),
  })
  thumbnail_path!: string | null;

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
