/**
 * Base class for every error raised while assembling or serializing a scene document
 */
export class SceneMarkupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A required attribute resolved to no value
 */
export class MissingRequiredAttributeError extends SceneMarkupError {
  public readonly entityTag: string;
  public readonly attribute: string;

  constructor(entityTag: string, attribute: string) {
    super(`${entityTag} takes a '${attribute}' attribute`);
    this.entityTag = entityTag;
    this.attribute = attribute;
  }
}

/**
 * A supplied value does not satisfy the expected type of its attribute
 */
export class TypeMismatchError extends SceneMarkupError {
  public readonly entityTag: string;
  public readonly attribute: string;
  public readonly expected: string;
  public readonly received: string;

  constructor(entityTag: string, attribute: string, expected: string, received: string) {
    super(`${entityTag}.${attribute} requires a '${expected}' but received a '${received}'`);
    this.entityTag = entityTag;
    this.attribute = attribute;
    this.expected = expected;
    this.received = received;
  }
}

/**
 * A reference was rendered while its target had no usable value under the referenced key
 * @param problem What is wrong with the value, `has no value` when it is absent
 */
export class UnresolvedReferenceError extends SceneMarkupError {
  public readonly targetTag: string;
  public readonly key: string;

  constructor(targetTag: string, key: string, problem: string = 'has no value') {
    super(`Reference to ${targetTag} cannot be resolved: '${key}' ${problem}`);
    this.targetTag = targetTag;
    this.key = key;
  }
}

/**
 * An entity type declared an attribute name that is already part of its schema
 */
export class DuplicateSchemaNameError extends SceneMarkupError {
  public readonly entityType: string;
  public readonly attribute: string;

  constructor(entityType: string, attribute: string) {
    super(`${entityType} redeclares attribute '${attribute}'`);
    this.entityType = entityType;
    this.attribute = attribute;
  }
}
