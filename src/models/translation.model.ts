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
import { Metadata, TranslationToken } from '../types/entities';
import { TextSource } from './text-source.model';

export interface TranslationAttributes {
  id: number;
  text_source_id: number;
  language_code: string;
  title: string | null;
  tokens: TranslationToken[];
  original_text: string | null;
  metadata: Metadata;
  created_at: Date;
  updated_at: Date;
}

export type TranslationCreationAttributes = Optional<
  TranslationAttributes,
  'id' | 'title' | 'original_text' | 'metadata' | 'created_at' | 'updated_at'
>;

/**
 * Tokenized rendering of a text source in one language. `tokens` is stored
 * as a JSON array of `{ token, pos }` in position order.
 */
@Table({
  tableName: 'translations',
  timestamps: true,
  createdAt: 'created_at',
  updatedAt: 'updated_at',
  indexes: [{ fields: ['text_source_id'] }, { fields: ['language_code'] }],
})
export class Translation extends Model<
  TranslationAttributes,
  TranslationCreationAttributes
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
    type: DataType.STRING(10),
    allowNull: false,
  })
  language_code!: string;

  @Column({
    type: DataType.STRING(255),
  })
  title!: string | null;

  @Column({
    type: DataType.JSON,
    allowNull: false,
  })
  tokens!: TranslationToken[];

  @Column({
    type: DataType.TEXT,
  })
  original_text!: string | null;

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
