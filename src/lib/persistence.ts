import { DiscoveryError, QueryError } from './errors.js';
import { toIdentity } from './hydrator.js';
import type { Model } from './model.js';
import type {
  DeleteOptions,
  ModelContext,
  QueryExecutor,
  Relation,
  SaveOptions,
} from './model-types.js';
import SqlBuilder from './sql-builder.js';
import { SqlId } from './sql-identifiers.js';
import { isEntity } from './type-classifier.js';

interface DeferredForeignKey {
  entity: Model;
  table: string;
  column: string;
  target: Model;
}

interface PivotChange {
  relation: Relation;
  owner: Model;
  related: Model | number;
  action: 'insert' | 'delete';
}

const isOwnedReference = (relation: Relation): boolean =>
  relation.relationType === 'ManyToOne' ||
  (relation.relationType === 'OneToOne' && relation.ownsForeignKey);

function requireColumn(relation: Relation): string {
  if (!relation.foreignKeyColumnName) {
    throw new DiscoveryError(
      `${relation.localType}.${relation.localProperty ?? '?'} has no foreign key column`
    );
  }
  return relation.foreignKeyColumnName;
}

function entitiesOf(value: unknown): Model[] {
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return items.filter(isEntity);
  }
  return isEntity(value) ? [value] : [];
}

/**
 * One call to `save()`. Tracks which entities were already written so that
 * cyclic graphs terminate, and collects the writes that have to wait until
 * every entity in the graph has an identity.
 */
export class SaveOperation {
  private readonly executor: QueryExecutor;
  private readonly visited: Set<Model>;
  private readonly pendingKeys: Map<Model, Record<string, number | null>>;
  private readonly deferred: DeferredForeignKey[];
  private readonly pivotChanges: PivotChange[];
  private readonly saved: Model[];

  constructor(executor: QueryExecutor) {
    this.executor = executor;
    this.visited = new Set();
    this.pendingKeys = new Map();
    this.deferred = [];
    this.pivotChanges = [];
    this.saved = [];
  }

  private builder(context: ModelContext): SqlBuilder {
    return new SqlBuilder({ schema: context.schema, executor: this.executor });
  }

  private setPendingKey(entity: Model, column: string, value: number | null): void {
    const keys = this.pendingKeys.get(entity) ?? {};
    keys[column] = value;
    this.pendingKeys.set(entity, keys);
  }

  async save(entity: Model): Promise<void> {
    if (this.visited.has(entity)) {
      return;
    }
    this.visited.add(entity);

    const type = entity.modelClass;
    const context = type.requireContext();
    const relations = context
      .relationsOf(type.modelName)
      .filter(relation => relation.localProperty !== null);

    this.validate(entity);

    for (const relation of relations) {
      if (isOwnedReference(relation)) {
        await this.saveOwnedReference(entity, relation);
      }
    }

    const wasNew = entity.isNew;
    await this.writeRow(entity, context);

    for (const relation of relations) {
      if (relation.relationType === 'ManyToMany') {
        await this.saveManyToMany(entity, relation, context);
      } else if (!isOwnedReference(relation)) {
        await this.saveForeignSide(entity, relation, wasNew, context);
      }
    }

    this.saved.push(entity);
  }

  private validate(entity: Model): void {
    entity._detectInPlaceChanges();
    for (const property of entity.modelClass.descriptor.primitives) {
      if (property.name === 'id') continue;
      const normalized = property.field.validate(entity._data[property.name], property.name);
      entity._data[property.name] = normalized === undefined ? null : normalized;
    }
  }

  private async saveOwnedReference(entity: Model, relation: Relation): Promise<void> {
    const name = relation.localProperty;
    if (!name || !entity._loaded.has(name)) {
      return;
    }
    const column = requireColumn(relation);
    const [target] = entitiesOf(entity._data[name]);

    if (target) {
      await this.save(target);
      if (target.isNew) {
        // Still being inserted further up a cycle.
        this.deferred.push({ entity, table: entity.modelClass.tableName, column, target });
        return;
      }
    }

    const value = target ? target.id : null;
    if (value !== (entity._foreignKeys[column] ?? null)) {
      this.setPendingKey(entity, column, value);
    }
  }

  /**
   * Point `child` at `owner` through `column`, in whichever way the child's
   * own progress through this save allows.
   */
  private assignForeignKey(child: Model, relation: Relation, owner: Model): void {
    const column = requireColumn(relation);
    const inverse = relation.foreignProperty;
    if (inverse && child._data[inverse] !== owner) {
      child._setLoaded(inverse, owner);
    }

    if ((child._foreignKeys[column] ?? null) === owner.id) {
      return;
    }
    if (!this.visited.has(child)) {
      this.setPendingKey(child, column, owner.id);
    } else {
      this.deferred.push({ entity: child, table: child.modelClass.tableName, column, target: owner });
    }
  }

  private async saveForeignSide(
    owner: Model,
    relation: Relation,
    wasNew: boolean,
    context: ModelContext
  ): Promise<void> {
    const name = relation.localProperty;
    if (!name || !owner._loaded.has(name)) {
      return;
    }
    const column = requireColumn(relation);
    const children = entitiesOf(owner._data[name]);

    for (const child of children) {
      this.assignForeignKey(child, relation, owner);
      await this.save(child);
    }

    if (wasNew || !owner._changed.has(name)) {
      return;
    }

    // Detach whatever still points at the owner but is no longer held.
    const baseline = entitiesOf(owner._original[name]);
    const inverse = relation.foreignProperty;
    for (const removed of baseline) {
      if (children.includes(removed)) continue;
      removed._foreignKeys[column] = null;
      if (inverse && removed._data[inverse] === owner) {
        removed._setLoaded(inverse, null);
      }
    }

    const kept = children.map(child => child.id).filter(id => id > 0);
    const builder = this.builder(context)
      .UPDATE(relation.foreignTableName)
      .SET(column, null)
      .WHERE(column, owner.id);
    if (kept.length > 0) {
      builder.WHERE('Id', 'NOT IN', kept);
    }
    await builder.execute();
  }

  private async saveManyToMany(owner: Model, relation: Relation, context: ModelContext): Promise<void> {
    const name = relation.localProperty;
    if (!name || !owner._loaded.has(name)) {
      return;
    }
    const current = entitiesOf(owner._data[name]);

    for (const related of current) {
      await this.save(related);
    }

    if (!owner._changed.has(name)) {
      return;
    }

    const original = owner._original[name];
    if (Array.isArray(original)) {
      const baseline = entitiesOf(original);
      for (const related of current) {
        if (!baseline.includes(related)) {
          this.pivotChanges.push({ relation, owner, related, action: 'insert' });
        }
      }
      for (const related of baseline) {
        if (!current.includes(related)) {
          this.pivotChanges.push({ relation, owner, related, action: 'delete' });
        }
      }
      return;
    }

    // The collection was replaced without being loaded: diff against the pivot.
    const { pivotTableName, pivotLocalColumnName, pivotForeignColumnName } = relation;
    if (!pivotTableName || !pivotLocalColumnName || !pivotForeignColumnName) {
      throw new DiscoveryError(`${relation.localType}.${name} has no pivot table`);
    }
    const rows = await this.builder(context)
      .SELECT('{0}', new SqlId(pivotForeignColumnName))
      .FROM(pivotTableName)
      .WHERE(pivotLocalColumnName, owner.id)
      .rows();
    const existing = rows
      .map(row => toIdentity(row[pivotForeignColumnName], `${pivotTableName}.${pivotForeignColumnName}`))
      .filter((id): id is number => id !== null);

    for (const related of current) {
      if (related.isNew || !existing.includes(related.id)) {
        this.pivotChanges.push({ relation, owner, related, action: 'insert' });
      }
    }
    const currentIds = current.map(related => related.id);
    for (const id of existing) {
      if (!currentIds.includes(id)) {
        this.pivotChanges.push({ relation, owner, related: id, action: 'delete' });
      }
    }
  }

  private async writeRow(entity: Model, context: ModelContext): Promise<void> {
    const type = entity.modelClass;
    const pending = this.pendingKeys.get(entity) ?? {};
    this.pendingKeys.delete(entity);
    const builder = this.builder(context);

    if (entity.isNew) {
      const now = new Date();
      entity._data.createdAt ??= now;
      entity._data.modifiedAt ??= now;

      const columns: string[] = [];
      const values: unknown[] = [];
      for (const property of type.descriptor.primitives) {
        if (property.name === 'id') continue;
        columns.push(property.column);
        values.push(entity._data[property.name]);
      }
      for (const [column, value] of Object.entries(pending)) {
        columns.push(column);
        values.push(value);
      }

      builder
        .INSERT_INTO(type.tableName)
        .COLS(...columns)
        .VALUES(...values)
        .RETURNING('Id');
      const id = toIdentity(await builder.scalar(), `${type.modelName}.id`);
      if (id === null) {
        throw new QueryError(`Insert into ${type.tableName} returned no Id`);
      }
      entity._data.id = id;
      entity._scope.register(type.modelName, id, entity);
    } else {
      const assignments: Record<string, unknown> = {};
      for (const property of type.descriptor.primitives) {
        if (property.name === 'id' || property.name === 'modifiedAt') continue;
        if (entity._changed.has(property.name)) {
          assignments[property.column] = entity._data[property.name];
        }
      }
      Object.assign(assignments, pending);

      if (Object.keys(assignments).length === 0) {
        return;
      }

      const modifiedAt = new Date();
      entity._data.modifiedAt = modifiedAt;
      assignments.ModifiedAt = modifiedAt;

      await builder.UPDATE(type.tableName).SET(assignments).WHERE('Id', entity.id).execute();
    }

    Object.assign(entity._foreignKeys, pending);
  }

  /**
   * Writes that needed identities from the whole graph, then the snapshot.
   */
  async finish(): Promise<void> {
    for (const { entity, table, column, target } of this.deferred) {
      if (entity.isNew || target.isNew || entity._foreignKeys[column] === target.id) {
        continue;
      }
      const context = entity.modelClass.requireContext();
      await this.builder(context).UPDATE(table).SET(column, target.id).WHERE('Id', entity.id).execute();
      entity._foreignKeys[column] = target.id;
    }

    const written = new Set<string>();
    for (const { relation, owner, related, action } of this.pivotChanges) {
      const { pivotTableName, pivotTableFirstColumnName, pivotTableSecondColumnName } = relation;
      if (!pivotTableName || !pivotTableFirstColumnName || !pivotTableSecondColumnName) {
        continue;
      }
      const relatedId = typeof related === 'number' ? related : related.id;
      const [firstId, secondId] =
        relation.pivotLocalColumnName === pivotTableFirstColumnName
          ? [owner.id, relatedId]
          : [relatedId, owner.id];
      const key = `${action}:${pivotTableName}:${firstId}:${secondId}`;
      if (written.has(key) || firstId === 0 || secondId === 0) {
        continue;
      }
      written.add(key);

      const builder = this.builder(owner.modelClass.requireContext());
      if (action === 'insert') {
        builder
          .INSERT_INTO(pivotTableName)
          .COLS(pivotTableFirstColumnName, pivotTableSecondColumnName)
          .VALUES(firstId, secondId)
          .ON_CONFLICT();
      } else {
        builder
          .DELETE_FROM(pivotTableName)
          .WHERE(pivotTableFirstColumnName, firstId)
          .WHERE(pivotTableSecondColumnName, secondId);
      }
      await builder.execute();
    }

    for (const entity of this.saved) {
      entity._snapshot();
      entity._scope.invalidateQueries();
    }
  }
}

/**
 * Save an entity and everything reachable from it through loaded or
 * assigned relations.
 */
export async function saveEntity(entity: Model, options: SaveOptions = {}): Promise<void> {
  const context = entity.modelClass.requireContext();
  const operation = new SaveOperation(options.executor ?? context.executor);
  await operation.save(entity);
  await operation.finish();
}

/**
 * Remove the entity's row.
 */
export async function deleteEntity(entity: Model, options: DeleteOptions = {}): Promise<number> {
  const type = entity.modelClass;
  const context = type.requireContext();
  const affected = await new SqlBuilder({
    schema: context.schema,
    executor: options.executor ?? context.executor,
  })
    .DELETE_FROM(type.tableName)
    .WHERE('Id', entity.id)
    .execute();
  entity._scope.invalidateQueries();
  return affected;
}
