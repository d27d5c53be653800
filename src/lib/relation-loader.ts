import { CardinalityError, DiscoveryError, ValidationError } from './errors.js';
import type HydrationScope from './hydration-scope.js';
import { hydrateRow, hydrateRows, toIdentity } from './hydrator.js';
import type { Model } from './model.js';
import type { ExecutorOptions, ModelClass, Relation, RowRecord } from './model-types.js';
import SqlBuilder from './sql-builder.js';
import { SqlColumn, SqlId } from './sql-identifiers.js';

const OWNER_COLUMN = '__ownerId';

interface LoadPlan {
  type: ModelClass;
  foreignType: ModelClass;
  relation: Relation;
  name: string;
  scope: HydrationScope;
  builder: SqlBuilder;
}

async function fetchRows(plan: LoadPlan): Promise<RowRecord[]> {
  const { builder, scope } = plan;
  return scope.cachedRows(builder.hash, () => builder.rows());
}

function requireColumn(relation: Relation): string {
  if (!relation.foreignKeyColumnName) {
    throw new DiscoveryError(
      `${relation.localType}.${relation.localProperty ?? '?'} has no foreign key column`
    );
  }
  return relation.foreignKeyColumnName;
}

function setInverse(plan: LoadPlan, owner: Model, children: readonly Model[]): void {
  const inverse = plan.relation.foreignProperty;
  if (!inverse) {
    return;
  }
  for (const child of children) {
    if (!child._loaded.has(inverse)) {
      child._setLoaded(inverse, owner);
    }
  }
}

async function loadOwnedReference(plan: LoadPlan, owners: readonly Model[]): Promise<void> {
  const { foreignType, relation, name, scope, builder } = plan;
  const column = requireColumn(relation);
  const missing = new Set<number>();

  for (const owner of owners) {
    const foreignId = owner._foreignKeys[column] ?? null;
    if (foreignId !== null && !scope.find(foreignType.modelName, foreignId)) {
      missing.add(foreignId);
    }
  }

  if (missing.size > 0) {
    builder
      .SELECT('*')
      .FROM(relation.foreignTableName)
      .WHERE('Id', 'IN', [...missing])
      .ORDER_BY('Id');
    hydrateRows(foreignType, await fetchRows(plan), scope);
  }

  for (const owner of owners) {
    const foreignId = owner._foreignKeys[column] ?? null;
    owner._setLoaded(
      name,
      foreignId === null ? null : (scope.find(foreignType.modelName, foreignId) ?? null)
    );
  }
}

async function loadForeignSide(plan: LoadPlan, owners: readonly Model[]): Promise<void> {
  const { type, foreignType, relation, name, scope, builder } = plan;
  const column = requireColumn(relation);

  builder
    .SELECT('*')
    .FROM(relation.foreignTableName)
    .WHERE(column, 'IN', owners.map(owner => owner.id))
    .WHERE('DeletedAt', null)
    .ORDER_BY('Id');

  const groups = new Map<number, Model[]>();
  for (const child of hydrateRows(foreignType, await fetchRows(plan), scope)) {
    const ownerId = child._foreignKeys[column] ?? null;
    if (ownerId === null) continue;
    const group = groups.get(ownerId) ?? [];
    group.push(child);
    groups.set(ownerId, group);
  }

  for (const owner of owners) {
    const children = groups.get(owner.id) ?? [];
    if (relation.relationType === 'OneToOne') {
      if (children.length > 1) {
        throw new CardinalityError(
          `${type.modelName}.${name} matched ${children.length} ${foreignType.modelName} rows`,
          'zero or one',
          children.length
        );
      }
      owner._setLoaded(name, children[0] ?? null);
    } else {
      owner._setLoaded(name, children);
    }
    setInverse(plan, owner, children);
  }
}

async function loadManyToMany(plan: LoadPlan, owners: readonly Model[]): Promise<void> {
  const { foreignType, relation, name, scope, builder } = plan;
  const { pivotTableName, pivotLocalColumnName, pivotForeignColumnName } = relation;
  if (!pivotTableName || !pivotLocalColumnName || !pivotForeignColumnName) {
    throw new DiscoveryError(`${relation.localType}.${name} has no pivot table`);
  }

  const target = builder.table(relation.foreignTableName);
  const pivot = builder.table(pivotTableName);
  const ownerColumn = new SqlColumn(pivot, pivotLocalColumnName);

  builder
    .SELECT('{0}.*', target)
    ._('{0} AS {1}', ownerColumn, new SqlId(OWNER_COLUMN))
    .FROM(target)
    .INNER_JOIN(
      '{0} ON {1} = {2}',
      pivot,
      new SqlColumn(pivot, pivotForeignColumnName),
      new SqlColumn(target, 'Id')
    )
    .WHERE(ownerColumn, 'IN', owners.map(owner => owner.id))
    .WHERE(new SqlColumn(target, 'DeletedAt'), null)
    .ORDER_BY(new SqlColumn(target, 'Id'));

  const groups = new Map<number, Model[]>();
  for (const row of await fetchRows(plan)) {
    const ownerId = toIdentity(row[OWNER_COLUMN], `${pivotTableName}.${pivotLocalColumnName}`);
    if (ownerId === null) continue;
    const group = groups.get(ownerId) ?? [];
    group.push(hydrateRow(foreignType, row, scope));
    groups.set(ownerId, group);
  }

  for (const owner of owners) {
    owner._setLoaded(name, groups.get(owner.id) ?? []);
  }
}

/**
 * Load one relation for a batch of entities of the same type, with a single
 * query. Entities that already hold the relation are left alone.
 */
export async function loadRelationBatch(
  type: ModelClass,
  entities: readonly Model[],
  name: string,
  options: ExecutorOptions = {}
): Promise<void> {
  const property = type.descriptor.byName.get(name);
  if (!property || property.kind === 'primitive') {
    throw new ValidationError(`'${name}' is not a relation of ${type.modelName}`, name);
  }

  const context = type.requireContext();
  const relation = context.relationFor(type.modelName, name);
  if (!relation) {
    throw new DiscoveryError(`No relation was discovered for ${type.modelName}.${name}`);
  }

  const owners: Model[] = [];
  for (const entity of entities) {
    if (entity._loaded.has(name)) continue;
    if (entity.isNew) {
      // Nothing in the database points at an unsaved entity yet.
      entity._setLoaded(name, property.kind === 'collection' ? [] : null);
      continue;
    }
    owners.push(entity);
  }

  const [first] = owners;
  if (!first) {
    return;
  }

  const plan: LoadPlan = {
    type,
    foreignType: context.getModel(relation.foreignType),
    relation,
    name,
    scope: first._scope,
    builder: new SqlBuilder({
      schema: context.schema,
      executor: options.executor ?? context.executor,
    }),
  };

  switch (relation.relationType) {
    case 'ManyToMany':
      return loadManyToMany(plan, owners);
    case 'OneToMany':
      return loadForeignSide(plan, owners);
    case 'ManyToOne':
      return loadOwnedReference(plan, owners);
    case 'OneToOne':
      return relation.ownsForeignKey
        ? loadOwnedReference(plan, owners)
        : loadForeignSide(plan, owners);
  }
}

/**
 * Deferred accessor for one relation of one entity. Runs at most one query;
 * later calls return the memoized value.
 */
export async function loadRelation(
  entity: Model,
  name: string,
  options: ExecutorOptions = {}
): Promise<void> {
  if (entity._loaded.has(name)) {
    return;
  }
  await loadRelationBatch(entity.modelClass, [entity], name, options);
}
