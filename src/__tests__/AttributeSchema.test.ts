import { describe, expect, it, vi } from 'vitest';
import { attribute, describeType, mergeSchemas } from '../AttributeSchema';
import { toExternalName, wrapperName } from '../Naming';
import { Color } from '../document/Color';

describe('attribute', () => {
  it('defaults to an optional field omitted when absent', () => {
    const entry = attribute('position');

    expect(entry.name).toBe('position');
    expect(entry.expectedType).toBeUndefined();
    expect(entry.defaultValue).toBeUndefined();
    expect(entry.required).toBe(false);
    expect(entry.omitIfAbsent).toBe(true);
  });

  it('keeps the given options', () => {
    const entry = attribute('name', { type: 'string', required: true, omitIfAbsent: false, default: 'untitled' });

    expect(entry.expectedType).toBe('string');
    expect(entry.required).toBe(true);
    expect(entry.omitIfAbsent).toBe(false);
    expect(entry.defaultValue).toBe('untitled');
  });

  it('is frozen', () => {
    expect(Object.isFrozen(attribute('color'))).toBe(true);
  });
});

describe('describeType', () => {
  it('names primitive tags and classes', () => {
    expect(describeType('number')).toBe('number');
    expect(describeType('entity-list')).toBe('entity-list');
    expect(describeType(Color)).toBe('Color');
  });
});

describe('mergeSchemas', () => {
  const f1 = attribute('f1');
  const f2 = attribute('f2');
  const f3 = attribute('f3');

  it('concatenates levels root-most first', () => {
    expect(mergeSchemas([[f1], [f2], [f3]]).map(entry => entry.name)).toEqual(['f1', 'f2', 'f3']);
  });

  it('keeps the first declaration of a repeated name in place', () => {
    const redeclared = attribute('f1', { type: 'number' });
    const merged = mergeSchemas([[f1], [f2], [f3, redeclared]]);

    expect(merged.map(entry => entry.name)).toEqual(['f1', 'f2', 'f3']);
    expect(merged[0]).toBe(f1);
  });

  it('reports dropped entries with their level', () => {
    const onDuplicate = vi.fn();
    const redeclared = attribute('f2');

    mergeSchemas([[f1, f2], [redeclared]], onDuplicate);

    expect(onDuplicate).toHaveBeenCalledTimes(1);
    expect(onDuplicate).toHaveBeenCalledWith(redeclared, 1);
  });

  it('returns an empty schema for no levels', () => {
    expect(mergeSchemas([])).toEqual([]);
  });
});

describe('toExternalName', () => {
  it('converts snake_case to PascalCase', () => {
    expect(toExternalName('font_weight')).toBe('FontWeight');
    expect(toExternalName('data_flags')).toBe('DataFlags');
    expect(toExternalName('text')).toBe('Text');
  });

  it('lowercases the rest of each segment and skips empty segments', () => {
    expect(toExternalName('text_word_wrapping')).toBe('TextWordWrapping');
    expect(toExternalName('blur__AMOUNT')).toBe('BlurAmount');
  });

  it('starts a new word at each letter that follows a digit', () => {
    expect(toExternalName('point_2d')).toBe('Point2D');
    expect(toExternalName('axis3x4')).toBe('Axis3X4');
  });
});

describe('wrapperName', () => {
  it('joins the parent tag and the external attribute name', () => {
    expect(wrapperName('Brush', 'stops')).toBe('Brush.Stops');
    expect(wrapperName('Rectangle', 'stroke_thickness')).toBe('Rectangle.StrokeThickness');
  });
});
