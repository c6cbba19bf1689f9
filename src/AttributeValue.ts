import type { Entity } from './Entity';
import type { Reference } from './Reference';

/**
 * A value object that renders itself as attribute text (colours, coordinate triplets, ...)
 */
export interface FormattedValue {
  format(): string;
}

export type ScalarValue = string | number | boolean | FormattedValue;

/**
 * Everything an entity attribute slot may hold
 */
export type AttributeValue = ScalarValue | Entity | Entity[] | Reference;

/**
 * The closed set of shapes the serializer dispatches on
 */
export type ClassifiedValue =
  | { kind: 'scalar'; value: ScalarValue }
  | { kind: 'entity'; value: Entity }
  | { kind: 'entity-list'; value: Entity[] }
  | { kind: 'reference'; value: Reference };

export function isFormattedValue(value: object): value is FormattedValue {
  return 'format' in value && typeof value.format === 'function';
}

/**
 * Canonical text of a scalar attribute value
 */
export function formatScalar(value: ScalarValue): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
      return String(value);
    case 'boolean':
      return value ? 'True' : 'False';
    default:
      return value.format();
  }
}
