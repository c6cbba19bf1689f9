import {
  AttributeSchema,
  ExpectedType,
  ValueClass,
  describeType,
  isDefaultFactory,
  mergeSchemas,
} from './AttributeSchema';
import type { AttributeValue, ClassifiedValue, ScalarValue } from './AttributeValue';
import { getConfig } from './Config';
import { DuplicateSchemaNameError, MissingRequiredAttributeError, TypeMismatchError } from './Errors';
import { Reference } from './Reference';

export type EntityValues = Readonly<Record<string, AttributeValue | null | undefined>>;

/**
 * Static side of an entity class as seen by the schema merge
 */
export interface EntityType {
  readonly name: string;
  readonly tag?: string;
  readonly attributes?: readonly AttributeSchema[];
}

const schemaCache = new WeakMap<EntityType, readonly AttributeSchema[]>();

const hasOwn = (target: object, key: string): boolean => Object.prototype.hasOwnProperty.call(target, key);

/**
 * Generic schema-typed tree node.
 *
 * Subclasses declare their own serializable fields in a static `attributes`
 * list and optionally a static `tag`; inherited fields are merged in ahead of
 * them (see {@link schemaOf}). Slot values are validated against the merged
 * schema on construction and on every {@link Entity.set}.
 */
export abstract class Entity {
  /** Markup tag; the class name is used when a class does not declare one */
  public static readonly tag?: string;
  /** Fields declared by this class itself */
  public static readonly attributes: readonly AttributeSchema[] = [];

  public readonly tag: string;
  public readonly schema: readonly AttributeSchema[];
  /** Structural descendants, emitted after everything derived from the schema */
  public readonly children: Entity[];

  private readonly slots = new Map<string, AttributeValue>();

  constructor(values: EntityValues = {}, children: readonly Entity[] = []) {
    this.tag = tagOf(new.target);
    this.schema = schemaOf(new.target);

    // Validate everything before storing so a failed construction leaves nothing behind
    const resolved: Array<[AttributeSchema, AttributeValue | undefined]> = this.schema.map(entry => [
      entry,
      initialValue(entry, values[entry.name]),
    ]);
    for (const [entry, value] of resolved) {
      this.validate(entry, value);
    }
    for (const [entry, value] of resolved) {
      if (value !== undefined) {
        this.slots.set(entry.name, value);
      }
    }

    this.children = [...children];
  }

  /**
   * Schema entry for a field name, if the type declares one
   */
  public attributeSchema(name: string): AttributeSchema | undefined {
    return this.schema.find(entry => entry.name === name);
  }

  public get(name: string): AttributeValue | undefined {
    return this.slots.get(name);
  }

  public has(name: string): boolean {
    return this.slots.has(name);
  }

  /**
   * Write a slot. Names outside the schema are stored but never emitted.
   * @param value `null` or `undefined` clears the slot
   * @throws MissingRequiredAttributeError when clearing a required field
   * @throws TypeMismatchError when the value does not fit the declared type
   */
  public set(name: string, value: AttributeValue | null | undefined): this {
    const normalized = value ?? undefined;
    const entry = this.attributeSchema(name);
    if (entry) {
      this.validate(entry, normalized);
    }
    if (normalized === undefined) {
      this.slots.delete(name);
    } else {
      this.slots.set(name, Array.isArray(normalized) ? [...normalized] : normalized);
    }
    return this;
  }

  public appendChild(...children: Entity[]): this {
    this.children.push(...children);
    return this;
  }

  /**
   * Names of schema fields currently holding a value, in schema order.
   * Empty lists count as absent, as they do in markup.
   */
  public declaredNames(): string[] {
    return this.schema.filter(entry => isPresent(this.slots.get(entry.name))).map(entry => entry.name);
  }

  /**
   * Append entities to a list-valued slot, creating the list when the slot is empty
   */
  protected appendTo(name: string, ...items: Entity[]): this {
    const current = this.get(name);
    if (Array.isArray(current)) {
      current.push(...items);
      return this;
    }
    return this.set(name, [...items]);
  }

  protected readString(name: string): string | undefined {
    const value = this.get(name);
    return typeof value === 'string' ? value : undefined;
  }

  protected readNumber(name: string): number | undefined {
    const value = this.get(name);
    return typeof value === 'number' ? value : undefined;
  }

  protected readBoolean(name: string): boolean | undefined {
    const value = this.get(name);
    return typeof value === 'boolean' ? value : undefined;
  }

  /**
   * Read a slot holding an instance of a given class (nested entity, reference or value object)
   */
  protected readInstance<T extends object>(name: string, type: abstract new (...args: never[]) => T): T | undefined {
    const value = this.get(name);
    return value instanceof type ? value : undefined;
  }

  /**
   * Read a list-valued slot, keeping only items of the given entity class
   */
  protected readList<T extends Entity>(name: string, type: abstract new (...args: never[]) => T): T[] {
    const value = this.get(name);
    if (!Array.isArray(value)) {
      return [];
    }
    return value.filter((item): item is T => item instanceof type);
  }

  private validate(entry: AttributeSchema, value: AttributeValue | undefined): void {
    if (value === undefined) {
      if (entry.required) {
        throw new MissingRequiredAttributeError(this.tag, entry.name);
      }
      return;
    }
    if (entry.expectedType !== undefined && !matchesType(value, entry.expectedType)) {
      throw new TypeMismatchError(this.tag, entry.name, describeType(entry.expectedType), describeValue(value));
    }
  }
}

/**
 * Check a slot value against a declared type tag
 */
export function matchesType(value: AttributeValue, type: ExpectedType): boolean {
  switch (type) {
    case 'string':
    case 'number':
    case 'boolean':
      return typeof value === type;
    case 'entity-list':
      return Array.isArray(value) && value.every(item => item instanceof Entity);
    default:
      return isInstanceOf(value, type);
  }
}

function isInstanceOf(value: AttributeValue, type: ValueClass): boolean {
  return value instanceof type;
}

/**
 * Runtime type name of a slot value, used in error messages
 */
export function describeValue(value: AttributeValue): string {
  if (Array.isArray(value)) {
    return 'entity-list';
  }
  if (typeof value === 'object') {
    return value.constructor.name;
  }
  return typeof value;
}

/**
 * Sort a slot value into the variant the serializer dispatches on
 */
export function classifyValue(value: AttributeValue): ClassifiedValue {
  if (value instanceof Entity) {
    return { kind: 'entity', value };
  }
  if (Array.isArray(value)) {
    return { kind: 'entity-list', value };
  }
  if (value instanceof Reference) {
    return { kind: 'reference', value };
  }
  const scalar: ScalarValue = value;
  return { kind: 'scalar', value: scalar };
}

function initialValue(entry: AttributeSchema, supplied: AttributeValue | null | undefined): AttributeValue | undefined {
  if (supplied !== undefined && supplied !== null) {
    return Array.isArray(supplied) ? [...supplied] : supplied;
  }
  const fallback = entry.defaultValue;
  if (fallback !== undefined) {
    if (isDefaultFactory(fallback)) {
      return fallback();
    }
    // Lists are copied so that no two entities share a default collection
    return Array.isArray(fallback) ? [...fallback] : fallback;
  }
  if (entry.expectedType === 'entity-list') {
    return [];
  }
  return undefined;
}

function isEntityType(candidate: unknown): candidate is EntityType {
  return typeof candidate === 'function' && (candidate === Entity || candidate.prototype instanceof Entity);
}

function ownAttributes(type: EntityType): readonly AttributeSchema[] {
  return hasOwn(type, 'attributes') ? type.attributes ?? [] : [];
}

/**
 * Markup tag of an entity class
 */
export function tagOf(type: EntityType): string {
  return hasOwn(type, 'tag') && type.tag ? type.tag : type.name;
}

/**
 * Merged schema of an entity class: every ancestor's own fields, root-most
 * first, followed by the class's own new fields. Computed once per class.
 */
export function schemaOf(type: EntityType): readonly AttributeSchema[] {
  const cached = schemaCache.get(type);
  if (cached) {
    return cached;
  }

  const parent: unknown = Object.getPrototypeOf(type);
  const inherited = isEntityType(parent) ? schemaOf(parent) : [];
  const strict = getConfig().strictSchema;
  const merged = Object.freeze(
    mergeSchemas([inherited, ownAttributes(type)], entry => {
      if (strict) {
        throw new DuplicateSchemaNameError(type.name, entry.name);
      }
      console.warn(`Warning: ${type.name} redeclares attribute '${entry.name}'; the first declaration is kept`);
    })
  );

  schemaCache.set(type, merged);
  return merged;
}

function isPresent(value: AttributeValue | undefined): boolean {
  return Array.isArray(value) ? value.length > 0 : value !== undefined;
}
