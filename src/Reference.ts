import { formatScalar, isFormattedValue } from './AttributeValue';
import type { Entity } from './Entity';
import { UnresolvedReferenceError } from './Errors';

/**
 * Non-owning pointer to another entity, rendered as that entity's current name.
 * The target is read every time the reference is rendered, so renaming the
 * target after the reference was created is reflected in the markup.
 */
export class Reference {
  public readonly target: Entity;
  public readonly key: string;

  constructor(target: Entity, key: string = 'name') {
    this.target = target;
    this.key = key;
  }

  /**
   * Read the target's value for the referenced key, as text in the form the
   * serializer writes it
   * @throws UnresolvedReferenceError when the key is absent or holds entities
   */
  public resolve(): string {
    const value = this.target.get(this.key);
    if (value === undefined) {
      throw new UnresolvedReferenceError(this.target.tag, this.key);
    }
    if (value instanceof Reference) {
      return value.resolve();
    }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return formatScalar(value);
    }
    if (!Array.isArray(value) && isFormattedValue(value)) {
      return value.format();
    }
    throw new UnresolvedReferenceError(this.target.tag, this.key, 'holds an entity');
  }

  public toString(): string {
    return this.resolve();
  }
}
