const ELEMENT_NODE = 1;

export function childElements(element: Element): Element[] {
  return Array.from(element.childNodes).filter((node): node is Element => node.nodeType === ELEMENT_NODE);
}

export function childTags(element: Element): string[] {
  return childElements(element).map(child => child.tagName);
}

export function attributeNames(element: Element): string[] {
  return Array.from(element.attributes).map(attr => attr.name);
}
