import { DOMImplementation } from '@xmldom/xmldom';
import { formatScalar } from './AttributeValue';
import { getConfig } from './Config';
import { Entity, classifyValue } from './Entity';
import { SceneMarkupError } from './Errors';
import { toExternalName, wrapperName } from './Naming';

export interface SerializationStats {
  elements: number;
  wrappers: number;
  attributes: number;
  references: number;
}

interface SerializationContext {
  stats: SerializationStats;
  // Entities on the current descent path
  path: Set<Entity>;
}

/**
 * Turns an entity graph into an XML element tree.
 *
 * Per entity: one element named after the entity's tag; schema fields in
 * schema order become either a string attribute (scalars, references) or a
 * `Tag.Field` wrapper element holding the nested entity or entity list;
 * structural children follow as plain child elements.
 */
export class MarkupSerializer {
  private lastStats: SerializationStats | null = null;

  /**
   * Serialize an entity and everything reachable from it
   * @param entity The entity to serialize
   * @param parent Element to append the result to; a new document is created when omitted
   * @returns The element created for the entity
   */
  public serialize(entity: Entity, parent?: Element): Element {
    const context: SerializationContext = {
      stats: { elements: 0, wrappers: 0, attributes: 0, references: 0 },
      path: new Set<Entity>(),
    };
    const element = this.serializeEntity(entity, parent ?? null, context);
    this.lastStats = context.stats;
    if (getConfig().trace) {
      this.printStats(entity.tag, context.stats);
    }
    return element;
  }

  /**
   * Counters of the most recent {@link serialize} call
   */
  public getLastStats(): SerializationStats | null {
    return this.lastStats;
  }

  private serializeEntity(entity: Entity, parent: Element | null, context: SerializationContext): Element {
    if (context.path.has(entity)) {
      throw new SceneMarkupError(`${entity.tag} contains itself and cannot be serialized`);
    }
    context.path.add(entity);

    const element = this.createElement(entity.tag, parent);
    context.stats.elements++;

    for (const entry of entity.schema) {
      const value = entity.get(entry.name);
      const externalName = toExternalName(entry.name);

      if (value === undefined) {
        if (!entry.omitIfAbsent) {
          element.setAttribute(externalName, '');
          context.stats.attributes++;
        }
        continue;
      }

      const classified = classifyValue(value);
      switch (classified.kind) {
        case 'entity': {
          const wrapper = this.createWrapper(element, entity.tag, entry.name, context);
          this.serializeEntity(classified.value, wrapper, context);
          break;
        }
        case 'entity-list': {
          if (classified.value.length === 0) {
            break;
          }
          const wrapper = this.createWrapper(element, entity.tag, entry.name, context);
          for (const item of classified.value) {
            this.serializeEntity(item, wrapper, context);
          }
          break;
        }
        case 'reference':
          element.setAttribute(externalName, classified.value.resolve());
          context.stats.attributes++;
          context.stats.references++;
          break;
        case 'scalar':
          element.setAttribute(externalName, formatScalar(classified.value));
          context.stats.attributes++;
          break;
      }
    }

    for (const child of entity.children) {
      this.serializeEntity(child, element, context);
    }

    context.path.delete(entity);
    return element;
  }

  private createWrapper(element: Element, tag: string, attributeName: string, context: SerializationContext): Element {
    context.stats.wrappers++;
    return this.createElement(wrapperName(tag, attributeName), element);
  }

  private createElement(name: string, parent: Element | null): Element {
    if (parent) {
      const element = parent.ownerDocument.createElement(name);
      parent.appendChild(element);
      return element;
    }
    const doc = new DOMImplementation().createDocument(null, null, null);
    const element = doc.createElement(name);
    doc.appendChild(element);
    return element;
  }

  private printStats(rootTag: string, stats: SerializationStats): void {
    const rows = Object.entries(stats);
    const nameWidth = Math.max('Counter'.length, ...rows.map(([name]) => name.length));
    const pad = (s: string, w: number) => s + ' '.repeat(Math.max(0, w - s.length));

    const lines: string[] = [];
    lines.push(`=== Serialization Stats for "${rootTag}" ===`);
    lines.push(pad('Counter', nameWidth) + '  Count');
    lines.push('-'.repeat(nameWidth) + '  -----');
    for (const [name, count] of rows) {
      lines.push(pad(name, nameWidth) + '  ' + String(count));
    }
    // eslint-disable-next-line no-console
    console.log(lines.join('\n'));
  }
}

const defaultSerializer = new MarkupSerializer();

/**
 * Serialize an entity with a shared serializer instance
 */
export function serialize(entity: Entity, parent?: Element): Element {
  return defaultSerializer.serialize(entity, parent);
}
