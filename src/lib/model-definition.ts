import { ValidationError } from './errors.js';
import { upperFirst } from './inflector.js';
import type { Model } from './model.js';
import type { ModelClass } from './model-types.js';
import {
  type CollectionType,
  DateType,
  type InferFieldValue,
  NumberType,
  type PrimitiveField,
  type ReferenceType,
  type SchemaField,
} from './type.js';

export type ModelSchema = Record<string, SchemaField>;

/**
 * Declarative model configuration consumed by `dal.defineModel()`.
 */
export interface ModelDefinition<Schema extends ModelSchema = ModelSchema> {
  name: string;
  /** Defaults to the pluralized model name. */
  tableName?: string;
  schema: Schema;
}

export interface PrimitivePropertyDescriptor {
  readonly name: string;
  readonly kind: 'primitive';
  readonly column: string;
  readonly field: PrimitiveField;
  /** One of id, createdAt, modifiedAt, deletedAt. */
  readonly system: boolean;
}

export interface RelationPropertyDescriptor {
  readonly name: string;
  readonly kind: 'reference' | 'collection';
  readonly target: string;
  readonly field: ReferenceType | CollectionType;
}

export type PropertyDescriptor = PrimitivePropertyDescriptor | RelationPropertyDescriptor;

/**
 * Per-type property table, built once per model.
 */
export interface ModelDescriptor {
  readonly name: string;
  readonly tableName: string | null;
  readonly properties: readonly PropertyDescriptor[];
  readonly primitives: readonly PrimitivePropertyDescriptor[];
  readonly relations: readonly RelationPropertyDescriptor[];
  readonly byName: ReadonlyMap<string, PropertyDescriptor>;
}

export const SYSTEM_COLUMNS = {
  id: 'Id',
  createdAt: 'CreatedAt',
  modifiedAt: 'ModifiedAt',
  deletedAt: 'DeletedAt',
} as const;

export type SystemProperty = keyof typeof SYSTEM_COLUMNS;

const systemProperties = (): PrimitivePropertyDescriptor[] => [
  {
    name: 'id',
    kind: 'primitive',
    column: SYSTEM_COLUMNS.id,
    field: new NumberType().integer(),
    system: true,
  },
  {
    name: 'createdAt',
    kind: 'primitive',
    column: SYSTEM_COLUMNS.createdAt,
    field: new DateType(),
    system: true,
  },
  {
    name: 'modifiedAt',
    kind: 'primitive',
    column: SYSTEM_COLUMNS.modifiedAt,
    field: new DateType(),
    system: true,
  },
  {
    name: 'deletedAt',
    kind: 'primitive',
    column: SYSTEM_COLUMNS.deletedAt,
    field: new DateType(),
    system: true,
  },
];

const MODEL_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const isSystemProperty = (name: string): name is SystemProperty =>
  Object.prototype.hasOwnProperty.call(SYSTEM_COLUMNS, name);

/**
 * Build the descriptor table for a model definition. Column names default
 * to the property name with an upper-cased first letter.
 */
export function describeModel(definition: ModelDefinition): ModelDescriptor {
  const { name, schema } = definition;
  if (typeof name !== 'string' || !MODEL_NAME.test(name)) {
    throw new ValidationError(`Invalid model name '${String(name)}'`, 'name');
  }
  if (definition.tableName !== undefined && !definition.tableName) {
    throw new ValidationError(`Model '${name}' has an empty tableName`, 'tableName');
  }

  const system = systemProperties();
  const properties: PropertyDescriptor[] = [...system];
  const columns = new Map<string, string>(system.map(property => [property.column, property.name]));

  for (const [propertyName, field] of Object.entries(schema)) {
    if (isSystemProperty(propertyName)) {
      throw new ValidationError(
        `Property '${propertyName}' on model '${name}' is reserved`,
        propertyName
      );
    }

    if (field.kind === 'primitive') {
      const column = field.columnName ?? upperFirst(propertyName);
      const existing = columns.get(column);
      if (existing !== undefined) {
        throw new ValidationError(
          `Model '${name}' maps both '${existing}' and '${propertyName}' to column '${column}'`,
          propertyName
        );
      }
      columns.set(column, propertyName);
      properties.push({ name: propertyName, kind: 'primitive', column, field, system: false });
    } else {
      properties.push({ name: propertyName, kind: field.kind, target: field.target, field });
    }
  }

  const primitives = properties.filter(
    (property): property is PrimitivePropertyDescriptor => property.kind === 'primitive'
  );
  const relations = properties.filter(
    (property): property is RelationPropertyDescriptor => property.kind !== 'primitive'
  );

  return Object.freeze({
    name,
    tableName: definition.tableName ?? null,
    properties: Object.freeze(properties),
    primitives: Object.freeze(primitives),
    relations: Object.freeze(relations),
    byName: new Map(properties.map(property => [property.name, property])),
  });
}

/**
 * Relations read `undefined` until they are loaded or assigned.
 */
type InferPropertyValue<Field extends SchemaField> = Field extends ReferenceType
  ? Model | null | undefined
  : Field extends CollectionType
    ? Model[] | undefined
    : InferFieldValue<Field>;

/**
 * Infer instance data fields from the schema definition.
 */
export type InferData<Schema extends ModelSchema> = {
  -readonly [K in keyof Schema]: InferPropertyValue<Schema[K]>;
};

/**
 * Instance type produced by a defined model.
 */
export type InferInstance<Schema extends ModelSchema> = Model & InferData<Schema>;

/**
 * Constructor type returned by `defineModel`.
 */
export type DefinedModel<Schema extends ModelSchema> = ModelClass<InferInstance<Schema>>;
