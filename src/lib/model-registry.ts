import { UnknownModelError, ValidationError } from './errors.js';
import type { ModelClass } from './model-types.js';

/**
 * Track model classes defined on a particular DAL instance, by model name
 * and by table name.
 */
export class ModelRegistry {
  private modelsByName: Map<string, ModelClass>;
  private modelsByTable: Map<string, ModelClass>;

  constructor() {
    this.modelsByName = new Map();
    this.modelsByTable = new Map();
  }

  /**
   * Register a model class. A name or table already taken by another class
   * is rejected.
   */
  register<T extends ModelClass>(model: T): T {
    const { modelName, tableName } = model;
    if (!modelName || !tableName) {
      throw new ValidationError('Model registry requires a model name and a table name', 'model');
    }

    const existingByName = this.modelsByName.get(modelName);
    if (existingByName && existingByName !== model) {
      throw new ValidationError(`Model '${modelName}' is already defined on this DAL`, 'name');
    }

    const existingByTable = this.modelsByTable.get(tableName);
    if (existingByTable && existingByTable !== model) {
      throw new ValidationError(
        `Table '${tableName}' is already mapped to model '${existingByTable.modelName}'`,
        'tableName'
      );
    }

    this.modelsByName.set(modelName, model);
    this.modelsByTable.set(tableName, model);
    return model;
  }

  /**
   * Look up a model by model name or table name.
   */
  get(identifier: string): ModelClass | null {
    return this.modelsByName.get(identifier) ?? this.modelsByTable.get(identifier) ?? null;
  }

  require(identifier: string): ModelClass {
    const model = this.get(identifier);
    if (!model) {
      throw new UnknownModelError(identifier);
    }
    return model;
  }

  has(identifier: string): boolean {
    return this.get(identifier) !== null;
  }

  list(): ModelClass[] {
    return [...this.modelsByName.values()];
  }

  get size(): number {
    return this.modelsByName.size;
  }

  clear(): void {
    this.modelsByName.clear();
    this.modelsByTable.clear();
  }
}

export default ModelRegistry;
