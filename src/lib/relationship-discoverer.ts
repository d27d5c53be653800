import { DiscoveryAmbiguityError, DiscoveryError, UnknownModelError } from './errors.js';
import { defaultInflector, type Inflector, lowerFirst, upperFirst } from './inflector.js';
import type { ModelDescriptor, RelationPropertyDescriptor } from './model-definition.js';
import type { Relation, RelationType } from './model-types.js';

/**
 * The slice of a model descriptor discovery looks at.
 */
export type DiscoverableModel = Pick<ModelDescriptor, 'name' | 'tableName' | 'relations'>;

interface TableNames {
  table: string;
  singular: string;
}

interface ResolvedPair {
  counterpart: RelationPropertyDescriptor | null;
  link: string | null;
}

type Side = { model: DiscoverableModel; property: RelationPropertyDescriptor | null };

const byName = (a: DiscoverableModel, b: DiscoverableModel): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

/**
 * Infers relations between models from the shapes and names of their
 * navigation properties.
 *
 * Models are visited in name order and properties in declaration order. The
 * relation for a property is emitted when the property is visited; the
 * mirror of a lazy relation directly follows it. Running discovery twice
 * over the same models yields the same sequence.
 */
export class RelationshipDiscoverer {
  private readonly inflector: Inflector;

  constructor(inflector: Inflector = defaultInflector) {
    this.inflector = inflector;
  }

  tableNames(model: Pick<DiscoverableModel, 'name' | 'tableName'>): TableNames {
    const table = model.tableName ?? this.inflector.pluralize(model.name);
    return { table, singular: this.inflector.singularize(table) };
  }

  discover(models: readonly DiscoverableModel[]): readonly Relation[] {
    const modelsByName = new Map<string, DiscoverableModel>();
    for (const model of models) {
      if (modelsByName.has(model.name)) {
        throw new DiscoveryError(`Model '${model.name}' appears more than once`);
      }
      modelsByName.set(model.name, model);
    }

    for (const model of models) {
      for (const property of model.relations) {
        if (!modelsByName.has(property.target)) {
          throw new UnknownModelError(
            property.target,
            `${model.name}.${property.name} points at unknown model '${property.target}'`
          );
        }
      }
    }

    const sorted = [...models].sort(byName);
    const pending = new Map<string, Relation>();
    const discovered: Relation[] = [];

    for (const model of sorted) {
      for (const property of model.relations) {
        const key = `${model.name}.${property.name}`;
        const mirrored = pending.get(key);
        if (mirrored) {
          discovered.push(mirrored);
          pending.delete(key);
          continue;
        }

        const target = modelsByName.get(property.target);
        if (!target) {
          throw new UnknownModelError(property.target);
        }

        const { counterpart, link } = this.resolvePair(model, property, target);
        const [relation, mirror] = this.build(
          { model, property },
          { model: target, property: counterpart },
          link
        );

        discovered.push(relation);
        if (counterpart) {
          pending.set(`${target.name}.${counterpart.name}`, mirror);
        } else {
          discovered.push(mirror);
        }
      }
    }

    return Object.freeze(discovered);
  }

  /**
   * The link identifier of a property: what remains of its name once the
   * target type name (pluralized for collections) is removed from either end.
   */
  deriveLink(property: RelationPropertyDescriptor, targetName: string): string | null {
    const token =
      property.kind === 'collection' ? this.inflector.pluralize(targetName) : targetName;
    const { name } = property;

    if (name.endsWith(token)) {
      return upperFirst(name.slice(0, name.length - token.length));
    }
    if (name.startsWith(token) || name.startsWith(lowerFirst(token))) {
      return upperFirst(name.slice(token.length));
    }
    return null;
  }

  private resolvePair(
    model: DiscoverableModel,
    property: RelationPropertyDescriptor,
    target: DiscoverableModel
  ): ResolvedPair {
    const selfReferencing = model.name === target.name;
    const local = model.relations.filter(candidate => candidate.target === target.name);
    const foreign = target.relations.filter(
      candidate => candidate.target === model.name && candidate !== property
    );

    if (selfReferencing) {
      if (local.length === 1) return { counterpart: null, link: null };
      if (local.length === 2) return { counterpart: foreign[0] ?? null, link: null };
    } else if (local.length === 1 && foreign.length <= 1) {
      return { counterpart: foreign[0] ?? null, link: null };
    } else if (foreign.length === 0) {
      return { counterpart: null, link: this.lazyLink(model, property, target, local) };
    }

    const link = this.deriveLink(property, target.name);
    if (!link) {
      throw new DiscoveryAmbiguityError(
        `${model.name}.${property.name} is one of several relations between ` +
          `${model.name} and ${target.name} and carries no link identifier`,
        model.name,
        target.name,
        [property.name]
      );
    }

    const clashing = local.filter(
      candidate =>
        candidate !== property && this.deriveLink(candidate, target.name) === link
    );
    if (clashing.length > 0) {
      throw new DiscoveryAmbiguityError(
        `${model.name}.${property.name} shares the link identifier '${link}' with ` +
          clashing.map(candidate => `${model.name}.${candidate.name}`).join(', '),
        model.name,
        target.name,
        [property.name, ...clashing.map(candidate => candidate.name)]
      );
    }

    const matches = foreign.filter(
      candidate => this.deriveLink(candidate, model.name) === link
    );
    if (matches.length > 1) {
      throw new DiscoveryAmbiguityError(
        `${model.name}.${property.name} matches several properties on ${target.name} ` +
          `with link identifier '${link}'`,
        model.name,
        target.name,
        [property.name, ...matches.map(candidate => candidate.name)]
      );
    }

    return { counterpart: matches[0] ?? null, link };
  }

  /**
   * Link identifier for one of several lazy relations to the same type. A
   * property named after the type alone keeps the plain key; any other name
   * without the type name in it becomes the link itself.
   */
  private lazyLink(
    model: DiscoverableModel,
    property: RelationPropertyDescriptor,
    target: DiscoverableModel,
    local: readonly RelationPropertyDescriptor[]
  ): string | null {
    const linkOf = (candidate: RelationPropertyDescriptor): string | null => {
      const derived = this.deriveLink(candidate, target.name);
      return derived === null ? upperFirst(candidate.name) : derived || null;
    };

    const link = linkOf(property);
    const clashing = local.filter(
      candidate => candidate !== property && linkOf(candidate) === link
    );
    if (clashing.length > 0) {
      throw new DiscoveryAmbiguityError(
        `${model.name}.${property.name} and ` +
          clashing.map(candidate => `${model.name}.${candidate.name}`).join(', ') +
          ` would share the key of their relation to ${target.name}`,
        model.name,
        target.name,
        [property.name, ...clashing.map(candidate => candidate.name)]
      );
    }
    return link;
  }

  private relationType(local: Side, foreign: Side): RelationType {
    const localMulti = local.property?.kind === 'collection';
    const foreignMulti = foreign.property?.kind === 'collection';
    if (localMulti && foreignMulti) return 'ManyToMany';
    if (localMulti) return 'OneToMany';
    if (foreignMulti) return 'ManyToOne';
    return 'OneToOne';
  }

  /**
   * Build the relation for `local` and its mirror. `local.property` is always
   * set; `foreign.property` is null for a lazy relation.
   */
  private build(local: Side, foreign: Side, link: string | null): [Relation, Relation] {
    const localNames = this.tableNames(local.model);
    const foreignNames = this.tableNames(foreign.model);
    const linkPart = link ?? '';

    let type: RelationType;
    if (foreign.property) {
      type = this.relationType(local, foreign);
    } else {
      // Nothing on the other side says whether it is one or many.
      type = local.property?.kind === 'collection' ? 'OneToMany' : 'ManyToOne';
    }

    if (type === 'ManyToMany') {
      if (local.model.name === foreign.model.name) {
        throw new DiscoveryError(
          `${local.model.name} cannot relate many-to-many to itself: both pivot columns would be named ` +
            `${localNames.singular}Id`
        );
      }
      const localFirst = local.model.name < foreign.model.name;
      const [first, second] = localFirst ? [localNames, foreignNames] : [foreignNames, localNames];
      const pivot = {
        pivotTableName: `${first.table}${link ?? 'To'}${second.table}`,
        pivotTableFirstColumnName: `${first.singular}Id`,
        pivotTableSecondColumnName: `${second.singular}Id`,
      };
      const localColumn = `${localNames.singular}Id`;
      const foreignColumn = `${foreignNames.singular}Id`;
      return [
        this.relation(local, foreign, 'ManyToMany', link, null, null, false, {
          ...pivot,
          pivotLocalColumnName: localColumn,
          pivotForeignColumnName: foreignColumn,
        }),
        this.relation(foreign, local, 'ManyToMany', link, null, null, false, {
          ...pivot,
          pivotLocalColumnName: foreignColumn,
          pivotForeignColumnName: localColumn,
        }),
      ];
    }

    if (type === 'ManyToOne') {
      const column = `${foreignNames.singular}${linkPart}Id`;
      return [
        this.relation(local, foreign, 'ManyToOne', link, localNames.table, column, true),
        this.relation(foreign, local, 'OneToMany', link, localNames.table, column, false),
      ];
    }

    if (type === 'OneToMany') {
      const column = `${localNames.singular}${linkPart}Id`;
      return [
        this.relation(local, foreign, 'OneToMany', link, foreignNames.table, column, false),
        this.relation(foreign, local, 'ManyToOne', link, foreignNames.table, column, true),
      ];
    }

    // One-to-one: the key lives with the type that sorts first, or with the
    // property declared first when the type references itself.
    let localOwns: boolean;
    if (local.model.name === foreign.model.name) {
      const properties = local.model.relations;
      localOwns =
        !foreign.property ||
        (local.property !== null &&
          properties.indexOf(local.property) < properties.indexOf(foreign.property));
    } else {
      localOwns = local.model.name < foreign.model.name;
    }
    const [owner, other] = localOwns ? [localNames, foreignNames] : [foreignNames, localNames];
    const column = `${other.singular}${linkPart}Id`;
    return [
      this.relation(local, foreign, 'OneToOne', link, owner.table, column, localOwns),
      this.relation(foreign, local, 'OneToOne', link, owner.table, column, !localOwns),
    ];
  }

  private relation(
    local: Side,
    foreign: Side,
    relationType: RelationType,
    linkIdentifier: string | null,
    foreignKeyTableName: string | null,
    foreignKeyColumnName: string | null,
    ownsForeignKey: boolean,
    pivot: Partial<
      Pick<
        Relation,
        | 'pivotTableName'
        | 'pivotTableFirstColumnName'
        | 'pivotTableSecondColumnName'
        | 'pivotLocalColumnName'
        | 'pivotForeignColumnName'
      >
    > = {}
  ): Relation {
    const localNames = this.tableNames(local.model);
    const foreignNames = this.tableNames(foreign.model);
    return Object.freeze({
      localType: local.model.name,
      foreignType: foreign.model.name,
      localProperty: local.property?.name ?? null,
      foreignProperty: foreign.property?.name ?? null,
      relationType,
      localTableName: localNames.table,
      foreignTableName: foreignNames.table,
      localTableNameSingular: localNames.singular,
      foreignTableNameSingular: foreignNames.singular,
      foreignKeyTableName,
      foreignKeyColumnName,
      ownsForeignKey,
      pivotTableName: pivot.pivotTableName ?? null,
      pivotTableFirstColumnName: pivot.pivotTableFirstColumnName ?? null,
      pivotTableSecondColumnName: pivot.pivotTableSecondColumnName ?? null,
      pivotLocalColumnName: pivot.pivotLocalColumnName ?? null,
      pivotForeignColumnName: pivot.pivotForeignColumnName ?? null,
      linkIdentifier,
    });
  }
}

/**
 * Lookup tables over a discovered relation list.
 */
export class RelationIndex {
  readonly all: readonly Relation[];
  private readonly byType: Map<string, Relation[]>;
  private readonly byProperty: Map<string, Relation>;

  constructor(relations: readonly Relation[]) {
    this.all = relations;
    this.byType = new Map();
    this.byProperty = new Map();
    for (const relation of relations) {
      const list = this.byType.get(relation.localType) ?? [];
      list.push(relation);
      this.byType.set(relation.localType, list);
      if (relation.localProperty) {
        this.byProperty.set(`${relation.localType}.${relation.localProperty}`, relation);
      }
    }
  }

  relationsOf(typeName: string): readonly Relation[] {
    return this.byType.get(typeName) ?? [];
  }

  relationFor(typeName: string, property: string): Relation | null {
    return this.byProperty.get(`${typeName}.${property}`) ?? null;
  }
}

export default RelationshipDiscoverer;
