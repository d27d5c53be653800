import { TypeCoercionError, ValidationError } from './errors.js';
import type { Model } from './model.js';
import { isEntity } from './type-classifier.js';

export type ValidatorFunction<TValue> = (value: TValue) => boolean | void;

type TypeOutput<TBase, TRequired extends boolean> = TRequired extends true
  ? TBase
  : TBase | null | undefined;

type SchemaFieldLike = { validate(value: unknown, fieldName?: string): unknown };

export type InferFieldValue<Field extends SchemaFieldLike> = Field extends {
  validate(value: unknown, fieldName?: string): infer TValue;
}
  ? TValue
  : never;

/**
 * Base type class used for declarative schema definitions. Subclasses supply
 * `check` (shape of an assigned value) and `fromDriver` (conversion of a raw
 * value read from a row).
 */
export abstract class Type<TBase, TRequired extends boolean = false> {
  readonly kind = 'primitive' as const;
  options: Record<string, unknown>;
  validators: ValidatorFunction<TBase>[];
  protected _required: boolean;
  defaultValue?: TypeOutput<TBase, TRequired> | (() => TypeOutput<TBase, TRequired>);
  hasDefault: boolean;
  columnName: string | null;

  constructor(options: Record<string, unknown> = {}) {
    this.options = options;
    this.validators = [];
    this._required = false;
    this.defaultValue = undefined;
    this.hasDefault = false;
    this.columnName = null;
  }

  get isRequired(): boolean {
    return this._required;
  }

  /**
   * Add a validator function that will receive the normalized value.
   */
  validator(validator: ValidatorFunction<TBase>): this {
    if (typeof validator === 'function') {
      this.validators.push(validator);
    }
    return this;
  }

  /**
   * Mark the field as required or optional.
   */
  required<T extends boolean = true>(isRequired = true as T): Type<TBase, T> {
    this._required = Boolean(isRequired);
    return this as unknown as Type<TBase, T>;
  }

  /**
   * Configure a default value (or factory) for the field.
   */
  default(value: TypeOutput<TBase, TRequired> | (() => TypeOutput<TBase, TRequired>)): this {
    this.defaultValue = value;
    this.hasDefault = true;
    return this;
  }

  /**
   * Store the property under a column other than its PascalCase name.
   */
  column(name: string): this {
    if (!name) {
      throw new ValidationError('Column name must be a non-empty string');
    }
    this.columnName = name;
    return this;
  }

  protected abstract check(value: unknown, fieldName: string): TBase;

  protected abstract fromDriver(raw: unknown, fieldName: string): TBase;

  protected runValidators(value: TBase, fieldName: string): void {
    for (const validator of this.validators) {
      try {
        const result = validator(value);
        if (result === false) {
          throw new ValidationError(`Validation failed for ${fieldName}`, fieldName);
        }
      } catch (error) {
        if (error instanceof ValidationError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ValidationError(`Validation error for ${fieldName}: ${message}`, fieldName);
      }
    }
  }

  /**
   * Validate the supplied value and return the normalized result.
   */
  validate(value: unknown, fieldName = 'field'): TypeOutput<TBase, TRequired> {
    if (value === null || value === undefined) {
      if (this._required) {
        throw new ValidationError(`${fieldName} is required`, fieldName);
      }
      return value as TypeOutput<TBase, TRequired>;
    }

    const normalized = this.check(value, fieldName);
    this.runValidators(normalized, fieldName);
    return normalized as TypeOutput<TBase, TRequired>;
  }

  /**
   * Convert a raw driver value into the field's semantic type. SQL NULL maps
   * to null; anything that cannot be converted raises TypeCoercionError.
   */
  coerce(raw: unknown, fieldName = 'field'): TBase | null {
    if (raw === null || raw === undefined) {
      return null;
    }
    return this.fromDriver(raw, fieldName);
  }

  /**
   * Resolve a configured default for the field, if any.
   */
  getDefault(): TypeOutput<TBase, TRequired> | undefined {
    if (!this.hasDefault) {
      return undefined;
    }

    if (typeof this.defaultValue === 'function') {
      return (this.defaultValue as () => TypeOutput<TBase, TRequired>)();
    }

    return this.defaultValue;
  }
}

const coercionFailure = (fieldName: string, raw: unknown, expected: string) =>
  new TypeCoercionError(
    `Cannot convert ${typeof raw} value for ${fieldName} to ${expected}`,
    fieldName,
    raw
  );

/**
 * Accepts any value unchanged. Used as the element type of untyped arrays.
 */
export class UnknownType<TRequired extends boolean = false> extends Type<unknown, TRequired> {
  protected check(value: unknown): unknown {
    return value;
  }

  protected fromDriver(raw: unknown): unknown {
    return raw;
  }
}

/**
 * String type definition with common helpers.
 */
export class StringType<TRequired extends boolean = false> extends Type<string, TRequired> {
  maxLength: number | null;
  minLength: number | null;
  enumValues: string[] | null;

  constructor(options: Record<string, unknown> = {}) {
    super(options);
    this.maxLength = null;
    this.minLength = null;
    this.enumValues = null;
  }

  max(length: number): this {
    this.maxLength = length;
    return this;
  }

  min(length: number): this {
    this.minLength = length;
    return this;
  }

  enum(values: string | string[]): this {
    this.enumValues = Array.isArray(values) ? values : [values];
    return this;
  }

  email(): this {
    const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
    this.validator(value => {
      if (!emailRegex.test(value)) {
        throw new ValidationError('Must be a valid email address');
      }
      return true;
    });
    return this;
  }

  override required<T extends boolean = true>(isRequired = true as T): StringType<T> {
    super.required(isRequired);
    return this as unknown as StringType<T>;
  }

  protected check(value: unknown, fieldName: string): string {
    if (typeof value !== 'string') {
      throw new ValidationError(`${fieldName} must be a string`, fieldName);
    }

    if (this.maxLength !== null && value.length > this.maxLength) {
      throw new ValidationError(
        `${fieldName} must be shorter than ${this.maxLength} characters`,
        fieldName
      );
    }

    if (this.minLength !== null && value.length < this.minLength) {
      throw new ValidationError(
        `${fieldName} must be longer than ${this.minLength} characters`,
        fieldName
      );
    }

    if (this.enumValues && !this.enumValues.includes(value)) {
      throw new ValidationError(
        `${fieldName} must be one of: ${this.enumValues.join(', ')}`,
        fieldName
      );
    }

    return value;
  }

  protected fromDriver(raw: unknown, fieldName: string): string {
    if (typeof raw === 'string') return raw;
    if (typeof raw === 'number' || typeof raw === 'bigint' || typeof raw === 'boolean') {
      return String(raw);
    }
    if (raw instanceof Date) return raw.toISOString();
    throw coercionFailure(fieldName, raw, 'string');
  }
}

/**
 * Number type definition with optional range/integer constraints.
 */
export class NumberType<TRequired extends boolean = false> extends Type<number, TRequired> {
  minValue: number | null;
  maxValue: number | null;
  isInteger: boolean;

  constructor(options: Record<string, unknown> = {}) {
    super(options);
    this.minValue = null;
    this.maxValue = null;
    this.isInteger = false;
  }

  min(value: number): this {
    this.minValue = value;
    return this;
  }

  max(value: number): this {
    this.maxValue = value;
    return this;
  }

  integer(): this {
    this.isInteger = true;
    return this;
  }

  override required<T extends boolean = true>(isRequired = true as T): NumberType<T> {
    super.required(isRequired);
    return this as unknown as NumberType<T>;
  }

  protected check(value: unknown, fieldName: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ValidationError(`${fieldName} must be a finite number`, fieldName);
    }

    if (this.isInteger && !Number.isInteger(value)) {
      throw new ValidationError(`${fieldName} must be an integer`, fieldName);
    }

    if (this.minValue !== null && value < this.minValue) {
      throw new ValidationError(
        `${fieldName} must be greater than or equal to ${this.minValue}`,
        fieldName
      );
    }

    if (this.maxValue !== null && value > this.maxValue) {
      throw new ValidationError(
        `${fieldName} must be less than or equal to ${this.maxValue}`,
        fieldName
      );
    }

    return value;
  }

  // pg returns NUMERIC and BIGINT columns as strings.
  protected fromDriver(raw: unknown, fieldName: string): number {
    if (typeof raw === 'number' && Number.isFinite(raw)) return raw;
    if (typeof raw === 'bigint') {
      const converted = Number(raw);
      if (Number.isSafeInteger(converted)) return converted;
    }
    if (typeof raw === 'string' && raw.trim() !== '') {
      const converted = Number(raw);
      if (Number.isFinite(converted)) return converted;
    }
    throw coercionFailure(fieldName, raw, 'number');
  }
}

const TRUE_STRINGS = new Set(['t', 'true', '1', 'y', 'yes']);
const FALSE_STRINGS = new Set(['f', 'false', '0', 'n', 'no']);

/**
 * Boolean type definition.
 */
export class BooleanType<TRequired extends boolean = false> extends Type<boolean, TRequired> {
  override required<T extends boolean = true>(isRequired = true as T): BooleanType<T> {
    super.required(isRequired);
    return this as unknown as BooleanType<T>;
  }

  protected check(value: unknown, fieldName: string): boolean {
    if (typeof value !== 'boolean') {
      throw new ValidationError(`${fieldName} must be a boolean`, fieldName);
    }
    return value;
  }

  protected fromDriver(raw: unknown, fieldName: string): boolean {
    if (typeof raw === 'boolean') return raw;
    if (raw === 1 || raw === 0) return raw === 1;
    if (typeof raw === 'string') {
      const normalized = raw.trim().toLowerCase();
      if (TRUE_STRINGS.has(normalized)) return true;
      if (FALSE_STRINGS.has(normalized)) return false;
    }
    throw coercionFailure(fieldName, raw, 'boolean');
  }
}

/**
 * Date type definition with ISO parsing support.
 */
export class DateType<TRequired extends boolean = false> extends Type<Date, TRequired> {
  override required<T extends boolean = true>(isRequired = true as T): DateType<T> {
    super.required(isRequired);
    return this as unknown as DateType<T>;
  }

  protected check(value: unknown, fieldName: string): Date {
    let normalized: Date;

    if (value instanceof Date) {
      normalized = value;
    } else if (typeof value === 'string') {
      normalized = new Date(value);
    } else {
      throw new ValidationError(`${fieldName} must be a Date object`, fieldName);
    }

    if (Number.isNaN(normalized.getTime())) {
      throw new ValidationError(`${fieldName} must be a valid date`, fieldName);
    }

    return normalized;
  }

  protected fromDriver(raw: unknown, fieldName: string): Date {
    let converted: Date | null = null;
    if (raw instanceof Date) {
      converted = raw;
    } else if (typeof raw === 'string' || typeof raw === 'number') {
      converted = new Date(raw);
    }
    if (!converted || Number.isNaN(converted.getTime())) {
      throw coercionFailure(fieldName, raw, 'date');
    }
    return converted;
  }
}

function parseJson(raw: string, fieldName: string, expected: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw coercionFailure(fieldName, raw, expected);
  }
}

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);

/**
 * Array type definition that can optionally enforce an element type.
 */
export class ArrayType<TElement = unknown, TRequired extends boolean = false> extends Type<
  Array<TElement | null>,
  TRequired
> {
  elementType: Type<TElement, boolean>;

  constructor(elementType: Type<TElement, boolean>, options: Record<string, unknown> = {}) {
    super(options);
    this.elementType = elementType;
  }

  override required<T extends boolean = true>(isRequired = true as T): ArrayType<TElement, T> {
    super.required(isRequired);
    return this as unknown as ArrayType<TElement, T>;
  }

  protected check(value: unknown, fieldName: string): Array<TElement | null> {
    if (!Array.isArray(value)) {
      throw new ValidationError(`${fieldName} must be an array`, fieldName);
    }

    const items: unknown[] = value;
    return items.map((item, index) => {
      const normalized = this.elementType.validate(item, `${fieldName}[${index}]`);
      return normalized === undefined ? null : normalized;
    });
  }

  protected fromDriver(raw: unknown, fieldName: string): Array<TElement | null> {
    const source = typeof raw === 'string' ? parseJson(raw, fieldName, 'array') : raw;
    if (!Array.isArray(source)) {
      throw coercionFailure(fieldName, raw, 'array');
    }
    const items: unknown[] = source;
    return items.map((item, index) => this.elementType.coerce(item, `${fieldName}[${index}]`));
  }
}

/**
 * Object/JSONB type definition.
 */
export class ObjectType<TRequired extends boolean = false> extends Type<
  Record<string, unknown>,
  TRequired
> {
  override required<T extends boolean = true>(isRequired = true as T): ObjectType<T> {
    super.required(isRequired);
    return this as unknown as ObjectType<T>;
  }

  protected check(value: unknown, fieldName: string): Record<string, unknown> {
    if (!isPlainRecord(value)) {
      throw new ValidationError(`${fieldName} must be an object`, fieldName);
    }
    return value;
  }

  protected fromDriver(raw: unknown, fieldName: string): Record<string, unknown> {
    const source = typeof raw === 'string' ? parseJson(raw, fieldName, 'object') : raw;
    if (!isPlainRecord(source)) {
      throw coercionFailure(fieldName, raw, 'object');
    }
    return source;
  }
}

/**
 * Navigation property pointing at another model. Relation fields carry no
 * column of their own; keys and pivots come from relationship discovery.
 */
export abstract class RelationField<TValue, TKind extends 'reference' | 'collection'> {
  readonly kind: TKind;
  readonly target: string;

  constructor(kind: TKind, target: string) {
    if (!target) {
      throw new ValidationError('Relation fields need a target model name');
    }
    this.kind = kind;
    this.target = target;
  }

  abstract validate(value: unknown, fieldName?: string): TValue;
}

export class ReferenceType extends RelationField<Model | null, 'reference'> {
  constructor(target: string) {
    super('reference', target);
  }

  validate(value: unknown, fieldName = 'field'): Model | null {
    if (value === null || value === undefined) {
      return null;
    }
    if (!isEntity(value)) {
      throw new ValidationError(`${fieldName} must be a ${this.target} entity`, fieldName);
    }
    return value;
  }
}

export class CollectionType extends RelationField<Model[], 'collection'> {
  constructor(target: string) {
    super('collection', target);
  }

  validate(value: unknown, fieldName = 'field'): Model[] {
    if (!Array.isArray(value)) {
      throw new ValidationError(`${fieldName} must be an array of ${this.target} entities`, fieldName);
    }
    const items: unknown[] = value;
    const entities: Model[] = [];
    for (const item of items) {
      if (!isEntity(item)) {
        throw new ValidationError(
          `${fieldName} must be an array of ${this.target} entities`,
          fieldName
        );
      }
      entities.push(item);
    }
    return entities;
  }
}

/**
 * Structural view of any primitive field, whatever its value type.
 */
export interface PrimitiveField {
  readonly kind: 'primitive';
  readonly columnName: string | null;
  readonly hasDefault: boolean;
  readonly isRequired: boolean;
  validate(value: unknown, fieldName?: string): unknown;
  coerce(raw: unknown, fieldName?: string): unknown;
  getDefault(): unknown;
}

export type SchemaField = PrimitiveField | ReferenceType | CollectionType;

function arrayOf(elementType?: null, options?: Record<string, unknown>): ArrayType<unknown>;
function arrayOf<TElement>(
  elementType: Type<TElement, boolean>,
  options?: Record<string, unknown>
): ArrayType<TElement>;
function arrayOf<TElement>(
  elementType?: Type<TElement, boolean> | null,
  options?: Record<string, unknown>
): ArrayType<TElement> | ArrayType<unknown> {
  return elementType
    ? new ArrayType(elementType, options)
    : new ArrayType(new UnknownType(), options);
}

// Factory helpers used by model definitions.
const types = {
  string: (options?: Record<string, unknown>) => new StringType(options),
  number: (options?: Record<string, unknown>) => new NumberType(options),
  boolean: (options?: Record<string, unknown>) => new BooleanType(options),
  date: (options?: Record<string, unknown>) => new DateType(options),
  array: arrayOf,
  object: (options?: Record<string, unknown>) => new ObjectType(options),
  reference: (target: string) => new ReferenceType(target),
  collection: (target: string) => new CollectionType(target),
} as const;

export default types;
