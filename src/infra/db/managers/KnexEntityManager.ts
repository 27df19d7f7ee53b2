import type { Knex } from 'knex';
import type { BaseModel } from '../../../domain/models/BaseModel.js';
import type { ModelDescriptor } from '../../../domain/models/ModelDescriptor.js';
import type {
  BulkDeleteCriteria,
  EntityManager,
  FilteredQuery,
  Filters,
  Range,
} from '../../../domain/repositories/index.js';

type Row = Record<string, unknown>;

/**
 * Table layout for one model: field to column names, plus JSON-encoded fields
 */
export interface TableMapping<F> {
  tableName: string;
  columns: { [K in keyof F]-?: string };
  jsonFields?: ReadonlyArray<keyof F & string>;
}

/**
 * Which id of a multi-row insert the driver reports: MySQL gives the first,
 * SQLite the last
 */
export type InsertedIdPosition = 'first' | 'last';

export interface KnexEntityManagerOptions {
  insertedId?: InsertedIdPosition;
}

/**
 * Knex Entity Manager
 * Rows are read back through the model's field parser, so driver quirks
 * (0/1 booleans, epoch dates, JSON text) come out as proper field values
 */
export class KnexEntityManager<T extends BaseModel<F>, F extends object>
  implements EntityManager<T, F>
{
  private readonly jsonFields: ReadonlySet<string>;
  private readonly insertedId: InsertedIdPosition;

  constructor(
    private readonly db: Knex,
    private readonly model: ModelDescriptor<T, F>,
    private readonly table: TableMapping<F>,
    private readonly options: KnexEntityManagerOptions = {},
    private readonly inTransaction = false
  ) {
    this.jsonFields = new Set(table.jsonFields ?? []);
    this.insertedId = options.insertedId ?? 'first';
  }

  async getById(id: number): Promise<T | null> {
    const row: Row | undefined = await this.query().where('id', id).first();
    return row ? this.fromRow(row) : null;
  }

  getAll(range: Range = {}): Promise<T[]> {
    return this.select({}, range.offset ?? 0, range.limit);
  }

  filterBy(filters: Filters<F>): FilteredQuery<T> {
    return {
      count: () => this.count(filters),
      first: async () => (await this.select(filters, 0, 1))[0] ?? null,
      slice: (offset, limit) => this.select(filters, offset, limit),
    };
  }

  async createInstance(fields: Partial<F>): Promise<T | null> {
    const data = this.model.parseFields(fields);
    const [id]: number[] = await this.query().insert(this.toRow(data));
    if (id === undefined) {
      return null;
    }
    return this.getById(Number(id));
  }

  async saveInstance(instance: T, fieldNames: string[]): Promise<void> {
    const existing = await this.getById(instance.id);
    if (!existing) {
      throw new Error(`${this.model.modelName} ID=${instance.id} does not exist`);
    }
    await this.query()
      .where('id', instance.id)
      .update(this.changes(existing, instance, fieldNames));
  }

  async deleteInstance(instance: T): Promise<void> {
    await this.query().where('id', instance.id).del();
  }

  /**
   * One multi-row INSERT per chunk; ids within a chunk are consecutive
   */
  async bulkCreateInstances(instances: T[], batchSize: number): Promise<T[]> {
    for (const chunk of chunks(instances, batchSize)) {
      const rows = chunk.map((instance) =>
        this.toRow(this.model.parseFields(instance.toFields()))
      );
      const [reported]: number[] = await this.query().insert(rows);
      if (reported === undefined) {
        continue;
      }

      const firstId =
        this.insertedId === 'last' ? Number(reported) - chunk.length + 1 : Number(reported);
      chunk.forEach((instance, index) => instance.assignId(firstId + index));
    }
    return instances.filter((instance) => instance.id > 0);
  }

  async bulkUpdateInstances(instances: T[], fieldNames: string[], batchSize: number): Promise<T[]> {
    const updated: T[] = [];
    for (const chunk of chunks(instances, batchSize)) {
      const rows: Row[] = await this.query()
        .whereIn(
          'id',
          chunk.map((instance) => instance.id)
        )
        .select('*');
      const current = new Map(
        rows.map((row): [number, T] => {
          const entity = this.fromRow(row);
          return [entity.id, entity];
        })
      );

      for (const instance of chunk) {
        const existing = current.get(instance.id);
        if (!existing) {
          continue;
        }
        await this.query()
          .where('id', instance.id)
          .update(this.changes(existing, instance, fieldNames));
        updated.push(instance);
      }
    }
    return updated;
  }

  async bulkDeleteInstances(criteria: BulkDeleteCriteria<F>): Promise<T[]> {
    const query = this.filtered(criteria.filters ?? {});
    if (criteria.ids !== undefined) {
      query.whereIn('id', criteria.ids);
    }

    const rows: Row[] = await query.select('*').orderBy('id', 'asc');
    const entities = rows.map((row) => this.fromRow(row));
    if (entities.length > 0) {
      await this.query()
        .whereIn(
          'id',
          entities.map((entity) => entity.id)
        )
        .del();
    }
    return entities;
  }

  async count(filters: Filters<F> = {}): Promise<number> {
    const [row]: Row[] = await this.filtered(filters).count({ total: '*' });
    return Number(row?.total ?? 0);
  }

  async exists(filters: Filters<F>): Promise<boolean> {
    const row: Row | undefined = await this.filtered(filters).first('id');
    return row !== undefined;
  }

  /**
   * Nested calls join the transaction already open
   */
  transaction<R>(work: (manager: EntityManager<T, F>) => Promise<R>): Promise<R> {
    if (this.inTransaction) {
      return work(this);
    }
    return this.db.transaction((trx) =>
      work(new KnexEntityManager<T, F>(trx, this.model, this.table, this.options, true))
    );
  }

  private query(): Knex.QueryBuilder {
    return this.db(this.table.tableName);
  }

  private filtered(filters: Filters<F>): Knex.QueryBuilder {
    const query = this.query();
    for (const [field, value] of Object.entries(filters)) {
      if (value === undefined) {
        continue;
      }
      const column = this.column(field);
      if (value === null) {
        query.whereNull(column);
      } else {
        query.where({ [column]: this.toColumnValue(field, value) });
      }
    }
    return query;
  }

  private async select(filters: Filters<F>, offset: number, limit?: number): Promise<T[]> {
    const query = this.filtered(filters).select('*').orderBy('id', 'asc');
    if (limit !== undefined) {
      query.limit(limit);
    }
    if (offset > 0) {
      query.offset(offset);
    }
    const rows: Row[] = await query;
    return rows.map((row) => this.fromRow(row));
  }

  /**
   * Named fields of the instance laid over the stored row and parsed as a whole,
   * so a bad value fails here instead of on the next read
   */
  private changes(existing: T, instance: T, fieldNames: string[]): Row {
    const picked = pick(instance.toFields(), fieldNames);
    const merged = this.model.parseFields({ ...existing.toFields(), ...picked });
    return this.toRow(pick(merged, fieldNames));
  }

  private column(field: string): string {
    const column: unknown = Reflect.get(this.table.columns, field);
    if (typeof column !== 'string') {
      throw new Error(`Unknown field '${field}' for table ${this.table.tableName}`);
    }
    return column;
  }

  private toColumnValue(field: string, value: unknown): unknown {
    if (this.jsonFields.has(field) && value !== null) {
      return JSON.stringify(value);
    }
    return value;
  }

  private toRow(fields: object): Row {
    const row: Row = {};
    for (const [field, value] of Object.entries(fields)) {
      if (value === undefined) {
        continue;
      }
      row[this.column(field)] = this.toColumnValue(field, value);
    }
    return row;
  }

  private fromRow(row: Row): T {
    const fields: Row = {};
    for (const [field, column] of Object.entries(this.table.columns)) {
      let value = row[String(column)];
      if (this.jsonFields.has(field) && typeof value === 'string') {
        value = JSON.parse(value);
      }
      fields[field] = value;
    }
    return this.model.build(this.model.parseFields(fields), Number(row.id));
  }
}

function pick(source: object, fieldNames: string[]): Row {
  const picked: Row = {};
  for (const name of fieldNames) {
    if (!(name in source)) {
      throw new Error(`Unknown field '${name}'`);
    }
    picked[name] = Reflect.get(source, name);
  }
  return picked;
}

function chunks<V>(items: V[], size: number): V[][] {
  const result: V[][] = [];
  for (let start = 0; start < items.length; start += size) {
    result.push(items.slice(start, start + size));
  }
  return result;
}
