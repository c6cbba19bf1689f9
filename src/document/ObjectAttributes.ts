import { attribute } from '../AttributeSchema';
import { Entity } from '../Entity';
import { Reference } from '../Reference';
import { Color } from './Color';
import { Feather, Padding, Range, Rotate } from './Coordinates';

export class Crop extends Entity {
  public static readonly tag = 'Crop';
  public static readonly attributes = [
    attribute('range', { type: Range }),
    attribute('feather', { type: Feather }),
  ];

  constructor(range?: Range, feather?: Feather) {
    super({ range, feather });
  }
}

/**
 * A colour stop of a gradient brush.
 * Without a position the consumer distributes the stop itself.
 */
export class GradientStop extends Entity {
  public static readonly tag = 'GradientStop';
  public static readonly attributes = [
    attribute('color', { type: Color }),
    attribute('position', { type: 'number' }),
  ];

  constructor(color?: Color, position?: number) {
    super({ color, position });
  }

  public get color(): Color | undefined {
    return this.readInstance('color', Color);
  }

  public get position(): number | undefined {
    return this.readNumber('position');
  }
}

export class Bitmap extends Entity {
  public static readonly tag = 'Bitmap';
  public static readonly attributes = [attribute('source', { type: 'string', required: true })];

  constructor(source: string) {
    super({ source });
  }
}

export type BrushType = 'Solid' | 'LinearGradient' | 'RadialGradient' | 'Transparent' | 'Bitmap';

export type BrushOptions = {
  type?: BrushType;
  color?: Color;
  startPoint?: string;
  endPoint?: string;
  stops?: GradientStop[];
  bitmap?: Bitmap;
};

/** A stop, or a colour and position pair */
export type StopLike = GradientStop | readonly [Color, number?];

export class Brush extends Entity {
  public static readonly tag = 'Brush';
  public static readonly attributes = [
    attribute('color', { type: Color }),
    attribute('type', { type: 'string' }),
    attribute('start_point', { type: 'string' }),
    attribute('end_point', { type: 'string' }),
    attribute('stops', { type: 'entity-list' }),
    attribute('bitmap', { type: Bitmap }),
  ];

  constructor(options: BrushOptions = {}) {
    super({
      color: options.color,
      type: options.type,
      start_point: options.startPoint,
      end_point: options.endPoint,
      stops: options.stops,
      bitmap: options.bitmap,
    });
  }

  public static solid(color: Color): Brush {
    return new Brush({ type: 'Solid', color });
  }

  public static transparent(): Brush {
    return new Brush({ type: 'Transparent' });
  }

  public static image(source: string): Brush {
    return new Brush({ type: 'Bitmap', bitmap: new Bitmap(source) });
  }

  /**
   * Gradient running from `startPoint` to `endPoint` (relative `x,y` pairs)
   */
  public static linearGradient(stops: readonly StopLike[], startPoint?: string, endPoint?: string): Brush {
    return new Brush({ type: 'LinearGradient', stops: stops.map(toStop), startPoint, endPoint });
  }

  public static radialGradient(stops: readonly StopLike[]): Brush {
    return new Brush({ type: 'RadialGradient', stops: stops.map(toStop) });
  }

  public get stops(): GradientStop[] {
    return this.readList('stops', GradientStop);
  }

  public addStop(...stops: StopLike[]): this {
    return this.appendTo('stops', ...stops.map(toStop));
  }
}

function toStop(stop: StopLike): GradientStop {
  if (stop instanceof GradientStop) {
    return stop;
  }
  const [color, position] = stop;
  return new GradientStop(color, position);
}

/**
 * Keeps an object sized to another object's bounds
 */
export class Bounding extends Entity {
  public static readonly tag = 'Bounding';
  public static readonly attributes = [
    attribute('object', { type: Reference }),
    attribute('padding', { type: Padding }),
  ];

  constructor(object?: Reference, padding?: Padding) {
    super({ object, padding });
  }
}

export type EffectType = 'Skew' | 'Shadow' | 'FlipX' | 'FlipY';

export type EffectOptions = {
  angle?: string;
  blurAmount?: number;
  mode?: string;
};

export class Effect extends Entity {
  public static readonly tag = 'Effect';
  public static readonly attributes = [
    attribute('type', { type: 'string', required: true }),
    attribute('angle', { type: 'string' }),
    attribute('blur_amount', { type: 'number' }),
    attribute('mode', { type: 'string' }),
  ];

  constructor(type: EffectType, options: EffectOptions = {}) {
    super({ type, angle: options.angle, blur_amount: options.blurAmount, mode: options.mode });
  }

  public static skew(angleX: number = 0, angleY: number = 0): Effect {
    return new Effect('Skew', { angle: `${angleX},${angleY}` });
  }

  public static shadow(blurAmount: number = 0, mode: string = 'Outer'): Effect {
    return new Effect('Shadow', { blurAmount, mode });
  }

  public static flipX(): Effect {
    return new Effect('FlipX');
  }

  public static flipY(): Effect {
    return new Effect('FlipY');
  }
}

export class Geometry extends Entity {
  public static readonly tag = 'Geometry';
  public static readonly attributes = [attribute('type', { type: 'string' })];

  constructor(type?: string) {
    super({ type });
  }
}

export class Mask extends Entity {
  public static readonly tag = 'Mask';
  public static readonly attributes = [attribute('object', { type: Reference })];

  constructor(object?: Reference) {
    super({ object });
  }
}

export class Transform extends Entity {
  public static readonly tag = 'Transform';
  public static readonly attributes = [attribute('rotate', { type: Rotate })];

  constructor(rotate?: Rotate) {
    super({ rotate });
  }
}
