import { ClassConstructor } from 'class-transformer';
import {
  Attributes,
  cast,
  col,
  CreationAttributes,
  fn,
  ModelStatic,
  Op,
  Transaction,
  where,
  WhereOptions,
} from 'sequelize';
import { Model, Sequelize } from 'sequelize-typescript';
import {
  DatabaseError,
  NotFoundError,
  ValidationError,
  translateDatabaseError,
} from '../dal/database.errors';
import { QueryContext } from '../dal/query-context';
import { Page, StoredEntity } from '../types/entities';
import { JSONLogger } from '../utils/logger';
import { validatePayload } from '../utils/validation';

export const DEFAULT_PAGE_LIMIT = 100;

/**
 * Rows every stored model shares.
 */
type StoredModel = Model & { id: number; updated_at: Date };

/**
 * Common create/read/update/delete operations over one table.
 *
 * @remarks
 * Subclasses describe their table: the DTO classes used to validate
 * payloads, how a row maps to a plain entity, which columns `search` looks
 * at and which parent rows must exist before an insert. Payloads are always
 * validated before the store is touched, and store failures leave as one of
 * the errors in `database.errors`.
 *
 * Every operation takes an optional {@link QueryContext}; when it carries a
 * transaction the operation joins it, otherwise Sequelize checks a
 * connection out of the pool for the duration of the call.
 */
export abstract class BaseRepository<
  TModel extends StoredModel,
  TEntity extends StoredEntity,
  TCreate extends object,
  TUpdate extends Partial<Attributes<TModel>>,
  TFilters extends object,
> {
  protected abstract readonly logger: JSONLogger;

  /**
   * Name used in errors and logs, e.g. `TextSource`.
   */
  protected abstract readonly resource: string;

  protected abstract readonly createDto: ClassConstructor<TCreate>;

  protected abstract readonly updateDto: ClassConstructor<TUpdate>;

  /**
   * Columns matched by `search`.
   */
  protected abstract readonly searchColumns: string[];

  constructor(
    protected readonly model: ModelStatic<TModel>,
    protected readonly sequelize: Sequelize,
  ) {}

  protected abstract toEntity(row: TModel): TEntity;

  protected abstract toCreationAttributes(
    dto: TCreate,
  ): CreationAttributes<TModel>;

  protected abstract filterWhere(
    filters: TFilters,
  ): WhereOptions<Attributes<TModel>>;

  /**
   * Confirms that every parent referenced by `dtos` exists. Top-level
   * resources have nothing to check.
   */
  protected async checkParents(
    _dtos: TCreate[],
    _context?: QueryContext,
  ): Promise<void> {}

  /**
   * Hook for advisory checks that log but never reject, such as
   * unrecognized tags.
   */
  protected inspect(_dto: TCreate | TUpdate): void {}

  async create(payload: TCreate, context?: QueryContext): Promise<TEntity> {
    const dto = await validatePayload(this.createDto, payload, this.resource);
    this.inspect(dto);

    return this.execute('create', async () => {
      await this.checkParents([dto], context);
      const row = await this.model.create(this.toCreationAttributes(dto), {
        transaction: context?.transaction,
      });

      this.logger.log(`${this.resource} created`, { id: row.id });
      return this.toEntity(row);
    });
  }

  /**
   * @throws NotFoundError when no row has this id.
   */
  async getById(id: number, context?: QueryContext): Promise<TEntity> {
    const row = await this.findRow(id, context);
    return this.toEntity(row);
  }

  /**
   * Merges the supplied fields onto the row. `updated_at` moves forward even
   * when nothing else changed.
   */
  async update(
    id: number,
    payload: TUpdate,
    context?: QueryContext,
  ): Promise<TEntity> {
    const dto = await validatePayload(this.updateDto, payload, this.resource);
    this.inspect(dto);

    const row = await this.findRow(id, context);

    return this.execute('update', async () => {
      row.set(dto);
      row.changed('updated_at', true);
      await row.save({ transaction: context?.transaction });

      this.logger.log(`${this.resource} updated`, {
        id,
        fields: Object.keys(dto),
      });
      return this.toEntity(row);
    });
  }

  /**
   * Deletes the row. Children go with it through the store's cascading
   * foreign keys.
   */
  async delete(id: number, context?: QueryContext): Promise<void> {
    const row = await this.findRow(id, context);

    await this.execute('delete', async () => {
      await row.destroy({ transaction: context?.transaction });
      this.logger.log(`${this.resource} deleted`, { id });
    });
  }

  /**
   * Rows matching every given filter, oldest first.
   */
  async list(
    filters: TFilters,
    page: Page = {},
    context?: QueryContext,
  ): Promise<TEntity[]> {
    return this.findEntities(this.filterWhere(filters), page, context);
  }

  async count(filters: TFilters, context?: QueryContext): Promise<number> {
    return this.execute('count', () =>
      this.model.count({
        where: this.filterWhere(filters),
        transaction: context?.transaction,
      }),
    );
  }

  /**
   * Case-insensitive substring match over {@link searchColumns}.
   */
  async search(
    term: string,
    page: Page = {},
    context?: QueryContext,
  ): Promise<TEntity[]> {
    return this.findEntities(this.searchWhere(term), page, context);
  }

  /**
   * Validates every payload and checks every parent, then inserts them all
   * in one transaction. Nothing is written unless everything is.
   *
   * @throws ValidationError whose `fields` are prefixed with the offending
   * item's index, e.g. `[2].content`.
   */
  async bulkCreate(
    payloads: TCreate[],
    context?: QueryContext,
  ): Promise<TEntity[]> {
    if (payloads.length === 0) {
      return [];
    }

    const dtos: TCreate[] = [];
    for (const [index, payload] of payloads.entries()) {
      try {
        dtos.push(
          await validatePayload(this.createDto, payload, this.resource),
        );
      } catch (error) {
        if (error instanceof ValidationError) {
          throw new ValidationError(
            `Item ${index}: ${error.message}`,
            error.fields.map((field) => `[${index}].${field}`),
          );
        }
        throw error;
      }
    }
    dtos.forEach((dto) => this.inspect(dto));

    const insertAll = async (transaction: Transaction) => {
      await this.checkParents(dtos, { transaction });

      const entities: TEntity[] = [];
      for (const dto of dtos) {
        const row = await this.model.create(this.toCreationAttributes(dto), {
          transaction,
        });
        entities.push(this.toEntity(row));
      }
      return entities;
    };

    return this.execute('bulk create', async () => {
      const entities = context?.transaction
        ? await insertAll(context.transaction)
        : await this.sequelize.transaction(insertAll);

      this.logger.log(`${this.resource} bulk insert completed`, {
        count: entities.length,
      });
      return entities;
    });
  }

  protected async findRow(id: number, context?: QueryContext): Promise<TModel> {
    const row = await this.execute('read', () =>
      this.model.findByPk(id, { transaction: context?.transaction }),
    );

    if (!row) {
      throw new NotFoundError(this.resource, id);
    }
    return row;
  }

  protected async findEntities(
    condition: WhereOptions<Attributes<TModel>>,
    page: Page = {},
    context?: QueryContext,
  ): Promise<TEntity[]> {
    const rows = await this.execute('list', () =>
      this.model.findAll({
        where: condition,
        order: [['id', 'ASC']],
        limit: page.limit ?? DEFAULT_PAGE_LIMIT,
        offset: page.offset ?? 0,
        transaction: context?.transaction,
      }),
    );
    return rows.map((row) => this.toEntity(row));
  }

  protected searchWhere(term: string): WhereOptions<Attributes<TModel>> {
    return {
      [Op.or]: this.searchColumns.map((column) => contains(column, term)),
    };
  }

  /**
   * Distinct non-null values of a tag column, sorted.
   */
  protected async distinctValues(
    column: keyof Attributes<TModel> & string,
    condition: WhereOptions<Attributes<TModel>>,
    context?: QueryContext,
  ): Promise<string[]> {
    const rows = await this.execute('read', () =>
      this.model.findAll({
        attributes: [column],
        where: condition,
        group: [column],
        transaction: context?.transaction,
      }),
    );

    return rows
      .map((row): unknown => row.get(column))
      .filter((value): value is string => typeof value === 'string')
      .sort();
  }

  /**
   * Fails with `NotFoundError` unless every id names an existing row of
   * `parent`.
   */
  protected async ensureExists<TParent extends StoredModel>(
    parent: ModelStatic<TParent>,
    resource: string,
    ids: number[],
    context?: QueryContext,
  ): Promise<void> {
    for (const id of new Set(ids)) {
      const row = await this.execute('check parent', () =>
        parent.findByPk(id, {
          attributes: ['id'],
          transaction: context?.transaction,
        }),
      );

      if (!row) {
        throw new NotFoundError(resource, id);
      }
    }
  }

  /**
   * Runs a store call and translates whatever it throws.
   */
  protected async execute<T>(
    operation: string,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      const translated = translateDatabaseError(
        error,
        `${this.resource} ${operation}`,
      );

      if (!(error instanceof DatabaseError)) {
        this.logger.error(
          `${this.resource} ${operation} failed`,
          translated.stack,
          { error: translated.message },
        );
      }
      throw translated;
    }
  }
}

/**
 * Escapes the `LIKE` wildcards in `term` so it only matches itself.
 */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, '\\$&');
}

/**
 * Case-insensitive substring match on one column, read as text so JSON
 * columns can be matched too. Works on every dialect, unlike `ILIKE`.
 */
export function contains(column: string, term: string) {
  return where(
    fn('lower', cast(col(column), 'TEXT')),
    Op.like,
    `%${escapeLike(term.toLowerCase())}%`,
  );
}
