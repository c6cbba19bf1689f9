import { XMLSerializer } from '@xmldom/xmldom';

const ELEMENT_NODE = 1;

export interface WriteOptions {
  /** Whitespace added per nesting level; no line breaks are written when omitted */
  indent?: string;
  /** Prepend an XML declaration */
  declaration?: boolean;
  /** Encoding named in the declaration */
  encoding?: string;
}

/**
 * Writes serialized element trees as XML text
 */
export class MarkupWriter {
  /**
   * Render an element and its descendants
   * @param element Root of the tree to write; it is not modified
   * @param options Layout of the produced text
   */
  public static write(element: Element, options: WriteOptions = {}): string {
    let root: Node = element;
    if (options.indent !== undefined) {
      root = element.cloneNode(true);
      this.indent(root, element.ownerDocument, options.indent, 0);
    }

    const body = new XMLSerializer().serializeToString(root);
    if (!options.declaration) {
      return body;
    }
    const encoding = options.encoding || 'utf-8';
    return `<?xml version="1.0" encoding="${encoding}"?>\n${body}`;
  }

  /**
   * Insert line breaks and indentation between element children.
   * Elements that carry text content are left as they are.
   */
  private static indent(node: Node, doc: Document, unit: string, level: number): void {
    const children = Array.from(node.childNodes);
    if (children.length === 0 || children.some(child => child.nodeType !== ELEMENT_NODE)) {
      return;
    }

    for (const child of children) {
      node.insertBefore(doc.createTextNode('\n' + unit.repeat(level + 1)), child);
      this.indent(child, doc, unit, level + 1);
    }
    node.appendChild(doc.createTextNode('\n' + unit.repeat(level)));
  }
}
