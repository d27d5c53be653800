import type { Model } from './model.js';
import type { RowRecord } from './model-types.js';

/**
 * Identity map and query cache shared by every entity materialized from
 * one query, and by everything later loaded through those entities.
 */
export class HydrationScope {
  readonly discoveredEntities: Map<string, Model>;
  readonly cachedQueries: Map<string, RowRecord[]>;

  constructor() {
    this.discoveredEntities = new Map();
    this.cachedQueries = new Map();
  }

  static key(typeName: string, id: number): string {
    return `${typeName}:${id}`;
  }

  find(typeName: string, id: number): Model | undefined {
    return this.discoveredEntities.get(HydrationScope.key(typeName, id));
  }

  register(typeName: string, id: number, entity: Model): void {
    if (id > 0) {
      this.discoveredEntities.set(HydrationScope.key(typeName, id), entity);
    }
  }

  /**
   * Run `load` once per fingerprint; later calls reuse the rows.
   */
  async cachedRows(hash: string, load: () => Promise<RowRecord[]>): Promise<RowRecord[]> {
    const cached = this.cachedQueries.get(hash);
    if (cached) {
      return cached;
    }
    const rows = await load();
    this.cachedQueries.set(hash, rows);
    return rows;
  }

  invalidateQueries(): void {
    this.cachedQueries.clear();
  }
}

export default HydrationScope;
