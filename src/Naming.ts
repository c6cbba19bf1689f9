const WORD_SEPARATOR = '_';

/**
 * Convert a snake_case attribute name to the PascalCase name used in markup,
 * e.g. `font_weight` becomes `FontWeight` and `point_2d` becomes `Point2D`
 */
export function toExternalName(attributeName: string): string {
  return attributeName
    .split(WORD_SEPARATOR)
    .filter(segment => segment.length > 0)
    .map(titleCase)
    .join('');
}

/**
 * Upper-case the first letter of every run of letters, lower-case the rest
 */
function titleCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match: string, before: string, letter: string) => before + letter.toUpperCase());
}

/**
 * Name of the element wrapping a nested entity or a list of entities
 * @param parentTag Tag of the element owning the attribute
 * @param attributeName Schema (snake_case) name of the attribute
 */
export function wrapperName(parentTag: string, attributeName: string): string {
  return `${parentTag}.${toExternalName(attributeName)}`;
}
