import type { AttributeValue } from './AttributeValue';

export type PrimitiveTypeTag = 'string' | 'number' | 'boolean';

/**
 * Any class whose instances may be stored in a slot (entities, references, value objects)
 */
export type ValueClass = abstract new (...args: never[]) => object;

export type ExpectedType = PrimitiveTypeTag | 'entity-list' | ValueClass;

export type DefaultFactory = () => AttributeValue;

/**
 * Immutable description of one serializable field of an entity type
 */
export interface AttributeSchema {
  /** snake_case name, also the key of the value slot */
  readonly name: string;
  readonly expectedType?: ExpectedType;
  /** Used when no value is supplied; factories are called once per entity */
  readonly defaultValue?: AttributeValue | DefaultFactory;
  readonly required: boolean;
  /** Leave the field out of the markup when it has no value */
  readonly omitIfAbsent: boolean;
}

export interface AttributeOptions {
  type?: ExpectedType;
  default?: AttributeValue | DefaultFactory;
  required?: boolean;
  omitIfAbsent?: boolean;
}

/**
 * Declare a serializable attribute.
 * Attributes are optional and omitted when absent unless stated otherwise.
 */
export function attribute(name: string, options: AttributeOptions = {}): AttributeSchema {
  return Object.freeze({
    name,
    expectedType: options.type,
    defaultValue: options.default,
    required: options.required ?? false,
    omitIfAbsent: options.omitIfAbsent ?? true,
  });
}

export function isDefaultFactory(value: AttributeValue | DefaultFactory): value is DefaultFactory {
  return typeof value === 'function';
}

/**
 * Human readable name of a type tag, used in error messages
 */
export function describeType(type: ExpectedType): string {
  return typeof type === 'string' ? type : type.name;
}

/**
 * Called for every entry dropped during a merge because its name was already taken
 * @param entry The dropped entry
 * @param level Index of the schema level that declared it
 */
export type DuplicateHandler = (entry: AttributeSchema, level: number) => void;

/**
 * Merge attribute declarations along a type hierarchy.
 * @param levels Own declarations of each type, root-most ancestor first and the type itself last
 * @param onDuplicate Notified about entries whose name already appeared
 * @returns The entries in first-declaration order, unique by name
 */
export function mergeSchemas(
  levels: ReadonlyArray<readonly AttributeSchema[]>,
  onDuplicate?: DuplicateHandler
): AttributeSchema[] {
  const merged: AttributeSchema[] = [];
  const seen = new Set<string>();

  levels.forEach((entries, level) => {
    for (const entry of entries) {
      if (seen.has(entry.name)) {
        onDuplicate?.(entry, level);
        continue;
      }
      seen.add(entry.name);
      merged.push(entry);
    }
  });

  return merged;
}
