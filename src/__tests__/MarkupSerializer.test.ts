import { afterEach, describe, expect, it, vi } from 'vitest';
import { attribute } from '../AttributeSchema';
import { configure, resetConfig } from '../Config';
import { Entity } from '../Entity';
import { SceneMarkupError } from '../Errors';
import { MarkupSerializer, serialize } from '../MarkupSerializer';
import { MarkupWriter } from '../MarkupWriter';
import { Color } from '../document/Color';
import { Brush, Effect, Geometry, GradientStop } from '../document/ObjectAttributes';
import { attributeNames, childElements, childTags } from './helpers';

class Panel extends Entity {
  public static readonly tag = 'Panel';
  public static readonly attributes = [
    attribute('title', { type: 'string' }),
    attribute('background', { type: Brush }),
    attribute('items', { type: 'entity-list' }),
  ];
}

class Caption extends Entity {
  public static readonly tag = 'Caption';
  public static readonly attributes = [
    attribute('text', { type: 'string', omitIfAbsent: false }),
    attribute('is_visible', { type: 'boolean' }),
    attribute('scale', { type: 'number' }),
  ];
}

const red = () => Color.preset('red');

afterEach(() => {
  resetConfig({});
  vi.restoreAllMocks();
});

describe('MarkupSerializer', () => {
  it('writes scalar fields as attributes and leaves absent ones out', () => {
    const element = serialize(new GradientStop(red()));

    expect(element.tagName).toBe('GradientStop');
    expect(attributeNames(element)).toEqual(['Color']);
    expect(element.getAttribute('Color')).toBe('#FFFF0000');
    expect(element.hasAttribute('Position')).toBe(false);
    expect(element.childNodes.length).toBe(0);
  });

  it('wraps a list of entities once, with items as direct children', () => {
    const brush = Brush.linearGradient([[red()], [Color.preset('blue'), 1]]);

    const element = serialize(brush);

    expect(childTags(element)).toEqual(['Brush.Stops']);
    const [wrapper] = childElements(element);
    expect(attributeNames(wrapper)).toEqual([]);
    expect(childTags(wrapper)).toEqual(['GradientStop', 'GradientStop']);
    expect(MarkupWriter.write(element)).toBe(
      '<Brush Type="LinearGradient"><Brush.Stops>' +
        '<GradientStop Color="#FFFF0000"/><GradientStop Color="#FF0000FF" Position="1"/>' +
        '</Brush.Stops></Brush>'
    );
  });

  it('wraps a nested entity and keeps its own tag', () => {
    const panel = new Panel({ background: Brush.solid(red()) });

    const [wrapper] = childElements(serialize(panel));

    expect(wrapper.tagName).toBe('Panel.Background');
    expect(childTags(wrapper)).toEqual(['Brush']);
    expect(childElements(wrapper)[0].getAttribute('Type')).toBe('Solid');
  });

  it('emits wrapped fields before structural children', () => {
    const panel = new Panel(
      { title: 'Main', background: Brush.solid(red()), items: [new GradientStop(red())] },
      [new Geometry('Box')]
    );

    const element = serialize(panel);

    expect(childTags(element)).toEqual(['Panel.Background', 'Panel.Items', 'Geometry']);
    expect(MarkupWriter.write(element)).toBe(
      '<Panel Title="Main">' +
        '<Panel.Background><Brush Color="#FFFF0000" Type="Solid"/></Panel.Background>' +
        '<Panel.Items><GradientStop Color="#FFFF0000"/></Panel.Items>' +
        '<Geometry Type="Box"/>' +
        '</Panel>'
    );
  });

  it('omits the wrapper of an empty list', () => {
    const element = serialize(new Panel({ items: [] }));

    expect(childTags(element)).toEqual([]);
    expect(MarkupWriter.write(element)).toBe('<Panel/>');
  });

  it('writes an empty attribute for absent fields that are not omitted', () => {
    expect(MarkupWriter.write(serialize(new Caption()))).toBe('<Caption Text=""/>');
  });

  it('uses fixed text for booleans and numbers', () => {
    const caption = new Caption({ text: 'Score', is_visible: false, scale: 0.5 });

    const element = serialize(caption);

    expect(attributeNames(element)).toEqual(['Text', 'IsVisible', 'Scale']);
    expect(element.getAttribute('IsVisible')).toBe('False');
    expect(element.getAttribute('Scale')).toBe('0.5');
  });

  it('only emits schema fields', () => {
    const caption = new Caption({ text: 'Score' });
    caption.set('debug_note', 'hidden');

    expect(attributeNames(serialize(caption))).toEqual(['Text']);
  });

  it('creates a document for the root element', () => {
    const element = serialize(new GradientStop());

    expect(element.ownerDocument.documentElement).toBe(element);
  });

  it('appends to a given parent element', () => {
    const root = serialize(new Panel({ title: 'Root' }));

    const element = serialize(Effect.flipX(), root);

    expect(element.parentNode).toBe(root);
    expect(element.ownerDocument).toBe(root.ownerDocument);
    expect(MarkupWriter.write(root)).toBe('<Panel Title="Root"><Effect Type="FlipX"/></Panel>');
  });

  it('produces identical markup when run twice on the same graph', () => {
    const panel = new Panel(
      { title: 'Main', items: [new GradientStop(red(), 0), new GradientStop(red(), 1)] },
      [new Geometry('Box')]
    );

    expect(MarkupWriter.write(serialize(panel))).toBe(MarkupWriter.write(serialize(panel)));
  });

  it('allows the same entity in several places', () => {
    const stop = new GradientStop(red());
    const panel = new Panel({}, [stop, stop]);

    expect(childTags(serialize(panel))).toEqual(['GradientStop', 'GradientStop']);
  });

  it('rejects an entity that contains itself', () => {
    const panel = new Panel();
    panel.appendChild(panel);

    expect(() => serialize(panel)).toThrow(SceneMarkupError);
    expect(() => serialize(panel)).toThrow('Panel contains itself and cannot be serialized');
  });

  it('counts what it produced', () => {
    const serializer = new MarkupSerializer();
    const brush = Brush.linearGradient([[red()], [red(), 1]]);

    expect(serializer.getLastStats()).toBeNull();
    serializer.serialize(brush);

    expect(serializer.getLastStats()).toEqual({ elements: 3, wrappers: 1, attributes: 4, references: 0 });
  });

  it('prints a summary when tracing is enabled', () => {
    configure({ trace: true });
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new MarkupSerializer().serialize(Brush.linearGradient([[red()], [red(), 1]]));

    expect(log).toHaveBeenCalledTimes(1);
    const lines = String(log.mock.calls[0][0]).split('\n');
    expect(lines[0]).toBe('=== Serialization Stats for "Brush" ===');
    expect(lines[3]).toBe('elements    3');
    expect(lines[5]).toBe('attributes  4');
  });

  it('stays quiet by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    serialize(new GradientStop(red()));

    expect(log).not.toHaveBeenCalled();
  });
});
