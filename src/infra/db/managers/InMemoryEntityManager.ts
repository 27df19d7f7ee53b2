import type { BaseModel } from '../../../domain/models/BaseModel.js';
import type { ModelDescriptor } from '../../../domain/models/ModelDescriptor.js';
import type {
  BulkDeleteCriteria,
  EntityManager,
  FilteredQuery,
  Filters,
  Range,
} from '../../../domain/repositories/index.js';

interface Table<F> {
  rows: Map<number, F>;
  nextId: number;
}

/**
 * In-Memory Entity Manager
 * Use this for testing or when database is not available
 */
export class InMemoryEntityManager<T extends BaseModel<F>, F extends object>
  implements EntityManager<T, F>
{
  constructor(
    private readonly model: ModelDescriptor<T, F>,
    private readonly table: Table<F> = { rows: new Map(), nextId: 1 },
    // Prior state of each row this unit of work touched; null outside a transaction
    private readonly undo: Map<number, F | undefined> | null = null
  ) {}

  private get rows(): Map<number, F> {
    return this.table.rows;
  }

  getById(id: number): Promise<T | null> {
    const data = this.rows.get(id);
    return Promise.resolve(data ? this.toEntity(id, data) : null);
  }

  getAll(range: Range = {}): Promise<T[]> {
    return Promise.resolve(this.select({}, range.offset ?? 0, range.limit));
  }

  filterBy(filters: Filters<F>): FilteredQuery<T> {
    return {
      count: () => this.count(filters),
      first: () => Promise.resolve(this.select(filters, 0, 1)[0] ?? null),
      slice: (offset, limit) => Promise.resolve(this.select(filters, offset, limit)),
    };
  }

  async createInstance(fields: Partial<F>): Promise<T | null> {
    const data = this.model.parseFields(fields);
    const id = this.table.nextId++;
    this.write(id, data);
    return this.toEntity(id, data);
  }

  async saveInstance(instance: T, fieldNames: string[]): Promise<void> {
    const existing = this.rows.get(instance.id);
    if (!existing) {
      throw new Error(`${this.model.modelName} ID=${instance.id} does not exist`);
    }
    this.write(instance.id, this.merge(existing, instance, fieldNames));
  }

  deleteInstance(instance: T): Promise<void> {
    this.write(instance.id, undefined);
    return Promise.resolve();
  }

  async bulkCreateInstances(instances: T[], batchSize: number): Promise<T[]> {
    for (let start = 0; start < instances.length; start += batchSize) {
      for (const instance of instances.slice(start, start + batchSize)) {
        const id = this.table.nextId++;
        this.write(id, this.model.parseFields(instance.toFields()));
        instance.assignId(id);
      }
    }
    return instances;
  }

  async bulkUpdateInstances(instances: T[], fieldNames: string[], batchSize: number): Promise<T[]> {
    const updated: T[] = [];
    for (let start = 0; start < instances.length; start += batchSize) {
      for (const instance of instances.slice(start, start + batchSize)) {
        const existing = this.rows.get(instance.id);
        if (!existing) {
          continue;
        }
        this.write(instance.id, this.merge(existing, instance, fieldNames));
        updated.push(instance);
      }
    }
    return updated;
  }

  bulkDeleteInstances(criteria: BulkDeleteCriteria<F>): Promise<T[]> {
    const ids = criteria.ids === undefined ? null : new Set(criteria.ids);
    const deleted: T[] = [];

    for (const [id, data] of this.rows) {
      if (ids && !ids.has(id)) {
        continue;
      }
      if (!matches(data, criteria.filters ?? {})) {
        continue;
      }
      deleted.push(this.toEntity(id, data));
    }

    for (const entity of deleted) {
      this.write(entity.id, undefined);
    }
    return Promise.resolve(deleted);
  }

  count(filters: Filters<F> = {}): Promise<number> {
    let total = 0;
    for (const data of this.rows.values()) {
      if (matches(data, filters)) {
        total++;
      }
    }
    return Promise.resolve(total);
  }

  exists(filters: Filters<F>): Promise<boolean> {
    return Promise.resolve(this.select(filters, 0, 1).length > 0);
  }

  /**
   * A failed unit of work restores only the rows it wrote; ids it took stay used.
   * Nested calls join the unit of work already open
   */
  async transaction<R>(work: (manager: EntityManager<T, F>) => Promise<R>): Promise<R> {
    if (this.undo) {
      return work(this);
    }

    const undo = new Map<number, F | undefined>();
    try {
      return await work(new InMemoryEntityManager(this.model, this.table, undo));
    } catch (error) {
      for (const [id, prior] of undo) {
        if (prior === undefined) {
          this.rows.delete(id);
        } else {
          this.rows.set(id, prior);
        }
      }
      throw error;
    }
  }

  // Test helper: clear all data
  clear(): void {
    this.rows.clear();
    this.table.nextId = 1;
  }

  private write(id: number, data: F | undefined): void {
    if (this.undo && !this.undo.has(id)) {
      this.undo.set(id, this.rows.get(id));
    }
    if (data === undefined) {
      this.rows.delete(id);
    } else {
      this.rows.set(id, structuredClone(data));
    }
  }

  private select(filters: Filters<F>, offset: number, limit?: number): T[] {
    const ordered = [...this.rows.entries()]
      .filter(([, data]) => matches(data, filters))
      .sort(([a], [b]) => a - b);
    const end = limit === undefined ? undefined : offset + limit;
    return ordered.slice(offset, end).map(([id, data]) => this.toEntity(id, data));
  }

  private merge(existing: F, instance: T, fieldNames: string[]): F {
    const source = instance.toFields();
    const next = structuredClone(existing);
    for (const name of fieldNames) {
      if (!(name in source)) {
        throw new Error(`Unknown field '${name}' for ${this.model.modelName}`);
      }
      Reflect.set(next, name, structuredClone(Reflect.get(source, name)));
    }
    return this.model.parseFields(next);
  }

  private toEntity(id: number, data: F): T {
    return this.model.build(structuredClone(data), id);
  }
}

function matches<F extends object>(data: F, filters: Filters<F>): boolean {
  return Object.entries(filters).every(([key, expected]) => {
    if (expected === undefined) {
      return true;
    }
    const actual: unknown = Reflect.get(data, key);
    if (expected instanceof Date) {
      return actual instanceof Date && actual.getTime() === expected.getTime();
    }
    return actual === expected;
  });
}
