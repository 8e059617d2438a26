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

export interface SummaryAttributes {
  id: number;
  text_source_id: number;
  title: string | null;
  content: string;
  summary_type: string;
  metadata: Metadata;
  created_at: Date;
  updated_at: Date;
}

export type SummaryCreationAttributes = Optional<
  SummaryAttributes,
  'id' | 'title' | 'summary_type' | 'metadata' | 'created_at' | 'updated_at'
>;

@Table({
  tableName: 'summaries',
  timestamps: true,
  createdAt: 'created_at',
  updatedAt: 'updated_at',
  indexes: [{ fields: ['text_source_id'] }, { fields: ['summary_type'] }],
})
export class Summary extends Model<
  SummaryAttributes,
  SummaryCreationAttributes
> {
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
    type: DataType.TEXT,
    allowNull: false,
  })
  content!: string;

  @Column({
    type: DataType.STRING(50),
    allowNull: false,
    defaultValue: 'general',
  })
  summary_type!: string;

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
