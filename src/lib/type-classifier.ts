import type { Model } from './model.js';

/**
 * Marker carried by every entity instance.
 */
export const ENTITY_BRAND: unique symbol = Symbol.for('conventional-orm.entity');

export const isEntity = (value: unknown): value is Model =>
  typeof value === 'object' && value !== null && ENTITY_BRAND in value;
