import { describe, expect, it } from 'vitest';
import { MissingRequiredAttributeError } from '../../Errors';
import { serialize } from '../../MarkupSerializer';
import { MarkupWriter } from '../../MarkupWriter';
import { attributeNames, childTags } from '../../__tests__/helpers';
import { Ellipse, Rectangle } from '../Composition';
import { Dimensions, Location } from '../Coordinates';
import { BounceAnimation, FadeAnimation, RevealAnimation, Storyboard } from '../Storyboard';

const shape = (name: string) =>
  new Rectangle(name, { location: new Location(0, 0), dimensions: new Dimensions(10, 10) });

describe('Storyboard', () => {
  it('wraps its animations and refers to targets by name', () => {
    const rect = shape('Rect 1');
    const ellipse = new Ellipse('Ellipse 1', { location: new Location(100, 100), dimensions: new Dimensions(100, 100) });
    const storyboard = Storyboard.transitionIn();

    storyboard.animate('Bounce', rect, { duration: 1, delay: 2 });
    storyboard.animate('Fade', ellipse, { duration: 1, delay: 2 });

    expect(MarkupWriter.write(serialize(storyboard))).toBe(
      '<Storyboard Type="TransitionIn"><Storyboard.Animations>' +
        '<Bounce Object="Rect 1" Duration="1" Delay="2"/>' +
        '<Fade Object="Ellipse 1" Duration="1" Delay="2"/>' +
        '</Storyboard.Animations></Storyboard>'
    );
  });

  it('keeps animations in the order they were added', () => {
    const storyboard = Storyboard.continuous(new BounceAnimation(shape('a')));

    storyboard.append(new FadeAnimation(shape('b')), new RevealAnimation(shape('c')));

    expect(storyboard.animations.map(animation => animation.tag)).toEqual(['Bounce', 'Fade', 'Reveal']);
    expect(storyboard.type).toBe('Continuous');
  });

  it('names page storyboards by number', () => {
    expect(Storyboard.page(2).type).toBe('Page 2');
  });

  it('writes the data name of data change storyboards before the type', () => {
    const element = serialize(Storyboard.dataChangeOut('Score.Value'));

    expect(attributeNames(element)).toEqual(['DataName', 'Type']);
    expect(element.getAttribute('DataName')).toBe('Score.Value');
    expect(element.getAttribute('Type')).toBe('DataChangeOut');
  });

  it('omits the animations wrapper when there are none', () => {
    expect(childTags(serialize(Storyboard.transitionOut()))).toEqual([]);
  });

  it('renders every timing field', () => {
    const rect = shape('Panel');
    const animation = new RevealAnimation(rect, {
      duration: 0.5,
      speed: 2,
      delay: 1,
      interpolation: 'CubicEasingOut',
      direction: 'Left',
      reverse: true,
      centerAxis: 'X',
    });

    expect(MarkupWriter.write(serialize(animation))).toBe(
      '<Reveal Object="Panel" Duration="0.5" Speed="2" Delay="1" Interpolation="CubicEasingOut" ' +
        'Direction="Left" Reverse="True" CenterAxis="X"/>'
    );
  });

  it('follows a renamed target', () => {
    const rect = shape('Old');
    const animation = Storyboard.transitionIn().animate('Zoom', rect);

    rect.name = 'New';

    expect(animation.target?.toString()).toBe('New');
    expect(serialize(animation).getAttribute('Object')).toBe('New');
  });

  it('requires a target', () => {
    const animation = new BounceAnimation(shape('x'));

    expect(() => animation.set('object', null)).toThrow(MissingRequiredAttributeError);
  });
});
