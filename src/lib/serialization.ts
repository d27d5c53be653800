import { ValidationError } from './errors.js';
import type HydrationScope from './hydration-scope.js';
import { isInstanceOf, toIdentity } from './hydrator.js';
import type { Model } from './model.js';
import type { JsonObject, ModelClass } from './model-types.js';
import { isEntity } from './type-classifier.js';

const isRecord = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);

/**
 * Structured record of an entity and its loaded relations. An entity that
 * is already on the current path is emitted as `{ id }`.
 */
export function serializeEntity(entity: Model, path: Set<Model>): JsonObject {
  if (path.has(entity)) {
    return { id: entity.id };
  }
  path.add(entity);

  const record: JsonObject = {};
  for (const property of entity.modelClass.descriptor.properties) {
    const value = entity._data[property.name];
    if (property.kind === 'primitive') {
      record[property.name] = value;
    } else if (entity._loaded.has(property.name)) {
      if (property.kind === 'reference') {
        record[property.name] = isEntity(value) ? serializeEntity(value, path) : null;
      } else if (Array.isArray(value)) {
        const items: unknown[] = value;
        record[property.name] = items.filter(isEntity).map(item => serializeEntity(item, path));
      }
    }
  }

  path.delete(entity);
  return record;
}

/**
 * Build an entity graph from a structured record. Records with a positive
 * `id` are treated as persisted rows and come out clean; the others are new
 * entities whose values all count as modified. Every entity of the graph
 * shares `scope`.
 */
export function buildFromRecord<T extends Model>(
  type: ModelClass<T>,
  record: JsonObject,
  scope: HydrationScope
): T {
  const id = toIdentity(record.id, `${type.modelName}.id`) ?? 0;
  if (id > 0) {
    const existing = scope.find(type.modelName, id);
    if (isInstanceOf(type, existing)) {
      return existing;
    }
  }

  const entity = new type();
  entity._scope = scope;
  if (id > 0) {
    entity._data.id = id;
    scope.register(type.modelName, id, entity);
  }

  const context = type.requireContext();
  const assign = (name: string, value: unknown): void => {
    if (id > 0) {
      entity._setLoaded(name, value);
    } else {
      entity.setValue(name, value);
    }
  };

  for (const property of type.descriptor.properties) {
    if (property.name === 'id' || !(property.name in record)) {
      continue;
    }
    const value = record[property.name];
    const fieldName = `${type.modelName}.${property.name}`;

    if (property.kind === 'primitive') {
      assign(property.name, property.field.coerce(value, fieldName));
      continue;
    }

    const target = context.getModel(property.target);
    if (property.kind === 'reference') {
      if (value === null || value === undefined) {
        assign(property.name, null);
      } else if (isRecord(value)) {
        assign(property.name, buildFromRecord(target, value, scope));
      } else {
        throw new ValidationError(`${fieldName} must be a record or null`, property.name);
      }
      continue;
    }

    if (!Array.isArray(value)) {
      throw new ValidationError(`${fieldName} must be an array of records`, property.name);
    }
    const items: unknown[] = value;
    assign(
      property.name,
      items.map(item => {
        if (!isRecord(item)) {
          throw new ValidationError(`${fieldName} must be an array of records`, property.name);
        }
        return buildFromRecord(target, item, scope);
      })
    );
  }

  if (id > 0) {
    // Relations absent from the record stay unloaded.
    for (const property of type.descriptor.relations) {
      if (!(property.name in record)) {
        entity._loaded.delete(property.name);
        entity._data[property.name] = undefined;
      }
    }
    for (const relation of context.relationsOf(type.modelName)) {
      const name = relation.localProperty;
      const column = relation.foreignKeyColumnName;
      if (name && column && relation.ownsForeignKey && entity._loaded.has(name)) {
        const target = entity._data[name];
        entity._foreignKeys[column] = isEntity(target) && target.id > 0 ? target.id : null;
      }
    }
    entity._snapshot();
  }

  return entity;
}
