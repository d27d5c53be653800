import { TypeCoercionError } from './errors.js';
import type HydrationScope from './hydration-scope.js';
import type { Model } from './model.js';
import type { ModelClass, RowRecord } from './model-types.js';

/**
 * Read a key column. Zero and NULL both mean "no row".
 */
export function toIdentity(raw: unknown, fieldName: string): number | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return value > 0 ? value : null;
  }
  if (typeof value === 'bigint' && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
    const converted = Number(value);
    return converted > 0 ? converted : null;
  }
  throw new TypeCoercionError(
    `Cannot convert ${typeof raw} value for ${fieldName} to an identity`,
    fieldName,
    raw
  );
}

export function isInstanceOf<T extends Model>(type: ModelClass<T>, value: unknown): value is T {
  return value instanceof type;
}

/**
 * Materialize one row. An entity already in the scope is returned as is;
 * otherwise a new instance is built, registered before its relations are
 * looked at, and snapshotted so that it reports no dirty properties.
 */
export function hydrateRow<T extends Model>(
  type: ModelClass<T>,
  row: RowRecord,
  scope: HydrationScope
): T {
  const id = toIdentity(row.Id, `${type.modelName}.id`) ?? 0;

  const existing = scope.find(type.modelName, id);
  if (isInstanceOf(type, existing)) {
    return existing;
  }

  const entity = new type();
  entity._scope = scope;
  entity._loaded.clear();

  for (const property of type.descriptor.properties) {
    if (property.kind !== 'primitive') {
      entity._data[property.name] = undefined;
      continue;
    }
    if (property.name === 'id') {
      entity._data.id = id;
      continue;
    }
    entity._data[property.name] = property.field.coerce(
      row[property.column],
      `${type.modelName}.${property.name}`
    );
  }

  scope.register(type.modelName, id, entity);

  const context = type.context;
  if (context) {
    for (const relation of context.relationsOf(type.modelName)) {
      if (!relation.ownsForeignKey || !relation.foreignKeyColumnName) {
        continue;
      }
      const column = relation.foreignKeyColumnName;
      const foreignId = toIdentity(row[column], `${type.modelName}.${column}`);
      entity._foreignKeys[column] = foreignId;

      if (!relation.localProperty) {
        continue;
      }
      // A to-one target is set right away when there is nothing to fetch.
      if (foreignId === null) {
        entity._data[relation.localProperty] = null;
        entity._loaded.add(relation.localProperty);
      } else {
        const target = scope.find(relation.foreignType, foreignId);
        if (target) {
          entity._data[relation.localProperty] = target;
          entity._loaded.add(relation.localProperty);
        }
      }
    }
  }

  entity._snapshot();
  return entity;
}

/**
 * Materialize a batch of rows into one shared scope.
 */
export function hydrateRows<T extends Model>(
  type: ModelClass<T>,
  rows: readonly RowRecord[],
  scope: HydrationScope
): T[] {
  return rows.map(row => hydrateRow(type, row, scope));
}
