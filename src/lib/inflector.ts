import pluralize from 'pluralize';

/**
 * String transforms used to derive table names from type names.
 */
export interface Inflector {
  pluralize(word: string): string;
  singularize(word: string): string;
}

export const defaultInflector: Inflector = {
  pluralize: word => pluralize.plural(word),
  singularize: word => pluralize.singular(word),
};

/**
 * Upper-case the first character: `firstName` becomes `FirstName`.
 */
export const upperFirst = (value: string): string =>
  value.length === 0 ? value : value.charAt(0).toUpperCase() + value.slice(1);

export const lowerFirst = (value: string): string =>
  value.length === 0 ? value : value.charAt(0).toLowerCase() + value.slice(1);
