import type { BaseModel, ModelClass } from './BaseModel.js';
import type { EntityManager } from '../repositories/IEntityManager.js';

/**
 * Entity type descriptor
 * Carries the model's name, its namespace for cache keys and the manager slot
 * bound at bootstrap.
 */
export class ModelDescriptor<T extends BaseModel<F>, F extends object> {
  private boundManager: EntityManager<T, F> | null = null;

  constructor(
    readonly modelName: string,
    private readonly entityClass: ModelClass<T, F>,
    private readonly fieldParser: (input: unknown) => F,
    readonly appLabel?: string
  ) {}

  /**
   * Manager bound to this model, null until bootstrap binds one
   */
  get objects(): EntityManager<T, F> | null {
    return this.boundManager;
  }

  bindManager(manager: EntityManager<T, F>): void {
    this.boundManager = manager;
  }

  unbindManager(): void {
    this.boundManager = null;
  }

  /**
   * Field-based construction
   */
  build(fields: F, id?: number): T {
    return new this.entityClass(fields, id);
  }

  /**
   * Complete a partial field map with defaults; throws on missing or invalid values
   */
  parseFields(input: unknown): F {
    return this.fieldParser(input);
  }

  readonly isInstance = (value: unknown): value is T => value instanceof this.entityClass;
}
