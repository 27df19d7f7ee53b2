/**
 * Base Domain Model
 * Entities are built from a field map and mutated in place
 */
export abstract class BaseModel<F extends object> {
  private _id: number;
  protected data: F;

  constructor(fields: F, id = 0) {
    this._id = id;
    this.data = { ...fields };
  }

  get id(): number {
    return this._id;
  }

  /**
   * Assign the primary key once the row exists
   */
  assignId(id: number): void {
    this._id = id;
  }

  /**
   * Read a single field
   */
  get<K extends keyof F>(key: K): F[K] {
    return this.data[key];
  }

  /**
   * Apply a partial field map in place
   */
  applyFields(fields: Partial<F>): void {
    this.data = { ...this.data, ...fields };
  }

  /**
   * Copy of the current field values
   */
  toFields(): F {
    return { ...this.data };
  }

  // Convert to persistence format
  toPersistence(): F & { id: number } {
    return { id: this._id, ...this.data };
  }
}

/**
 * Constructor signature shared by every model class
 */
export type ModelClass<T extends BaseModel<F>, F extends object> = new (fields: F, id?: number) => T;
