import { attribute } from '../AttributeSchema';
import { Entity, EntityValues } from '../Entity';
import { Reference } from '../Reference';
import { Dimensions, Location, Padding } from './Coordinates';
import { Bitmap, Bounding, Brush, Crop, Effect, Geometry, Mask, Transform } from './ObjectAttributes';
import { Storyboard } from './Storyboard';

export type DataFlags = 'Hidden' | 'ShowVisible' | 'None';

/**
 * Canvas holding layers, shapes and storyboards as structural children
 */
export class Composition extends Entity {
  public static readonly tag = 'Composition';
  public static readonly attributes = [
    attribute('width', { type: 'number', required: true }),
    attribute('height', { type: 'number', required: true }),
  ];

  constructor(width: number, height: number, children: readonly Entity[] = []) {
    super({ width, height }, children);
  }

  public get width(): number {
    return this.readNumber('width') ?? 0;
  }

  public get height(): number {
    return this.readNumber('height') ?? 0;
  }

  public get layers(): Layer[] {
    return this.children.filter((child): child is Layer => child instanceof Layer);
  }

  public get storyboards(): Storyboard[] {
    return this.children.filter((child): child is Storyboard => child instanceof Storyboard);
  }

  /**
   * Create a layer spanning the whole composition unless told otherwise
   */
  public addLayer(name: string, options: Partial<LayerOptions> = {}): Layer {
    const layer = new Layer(name, {
      ...options,
      location: options.location ?? new Location(0, 0, 0),
      dimensions: options.dimensions ?? new Dimensions(this.width, this.height, 0),
    });
    this.appendChild(layer);
    return layer;
  }

  public addStoryboard(...storyboards: Storyboard[]): this {
    return this.appendChild(...storyboards);
  }

  /**
   * Find a layer by its current name
   */
  public findLayer(name: string): Layer | undefined {
    return this.layers.find(layer => layer.name === name);
  }
}

/**
 * Anything with a name other entities can refer to
 */
export abstract class NamedEntity extends Entity {
  public static readonly attributes = [attribute('name', { type: 'string', required: true })];

  constructor(name: string, values: EntityValues = {}, children: readonly Entity[] = []) {
    super({ ...values, name }, children);
  }

  public get name(): string {
    return this.readString('name') ?? '';
  }

  public set name(value: string) {
    this.set('name', value);
  }

  /**
   * A late-bound pointer to this entity's name
   */
  public reference(): Reference {
    return new Reference(this);
  }
}

export type ObjectOptions = {
  location: Location;
  dimensions: Dimensions;
  dataFlags?: DataFlags;
};

/**
 * A named object placed on the canvas
 */
export abstract class ObjectEntity extends NamedEntity {
  public static readonly attributes = [
    attribute('location', { type: Location, required: true }),
    attribute('dimensions', { type: Dimensions, required: true }),
    attribute('data_flags', { type: 'string' }),
  ];

  constructor(name: string, options: ObjectOptions, values: EntityValues = {}) {
    super(name, {
      ...values,
      location: options.location,
      dimensions: options.dimensions,
      data_flags: options.dataFlags,
    });
  }

  public get location(): Location | undefined {
    return this.readInstance('location', Location);
  }

  public set location(value: Location | undefined) {
    this.set('location', value);
  }

  public get dimensions(): Dimensions | undefined {
    return this.readInstance('dimensions', Dimensions);
  }

  public set dimensions(value: Dimensions | undefined) {
    this.set('dimensions', value);
  }
}

export type ContentOptions = ObjectOptions & {
  crop?: Crop;
  transform?: Transform;
  bounding?: Bounding;
  mask?: Mask;
  geometry?: Geometry;
  fill?: Brush;
  stroke?: Brush;
  effects?: Effect[];
  opacity?: number;
  strokeThickness?: number;
  visible?: boolean;
};

/**
 * Base of every drawable shape
 */
export abstract class ContentEntity extends ObjectEntity {
  public static readonly attributes = [
    attribute('crop', { type: Crop }),
    attribute('transform', { type: Transform }),
    attribute('bounding', { type: Bounding }),
    attribute('mask', { type: Mask }),
    attribute('geometry', { type: Geometry }),
    attribute('fill', { type: Brush }),
    attribute('stroke', { type: Brush }),
    attribute('effects', { type: 'entity-list' }),
    attribute('opacity', { type: 'number' }),
    attribute('stroke_thickness', { type: 'number' }),
    attribute('visible', { type: 'boolean' }),
  ];

  constructor(name: string, options: ContentOptions, values: EntityValues = {}) {
    super(name, options, {
      ...values,
      crop: options.crop,
      transform: options.transform,
      bounding: options.bounding,
      mask: options.mask,
      geometry: options.geometry,
      fill: options.fill,
      stroke: options.stroke,
      effects: options.effects,
      opacity: options.opacity,
      stroke_thickness: options.strokeThickness,
      visible: options.visible,
    });
  }

  public get fill(): Brush | undefined {
    return this.readInstance('fill', Brush);
  }

  public get stroke(): Brush | undefined {
    return this.readInstance('stroke', Brush);
  }

  public get effects(): Effect[] {
    return this.readList('effects', Effect);
  }

  public withCrop(crop: Crop): this {
    return this.set('crop', crop);
  }

  public withTransform(transform: Transform): this {
    return this.set('transform', transform);
  }

  public withBounding(bounding: Bounding): this {
    return this.set('bounding', bounding);
  }

  /**
   * Size this object to another object's bounds
   * @param target The object to follow
   * @param padding Uniform padding, or a full padding value
   */
  public boundTo(target: NamedEntity, padding?: number | Padding): this {
    const resolved = typeof padding === 'number' ? new Padding(padding) : padding;
    return this.withBounding(new Bounding(target.reference(), resolved));
  }

  public withMask(mask: Mask): this {
    return this.set('mask', mask);
  }

  public withGeometry(geometry: Geometry): this {
    return this.set('geometry', geometry);
  }

  public withFill(fill: Brush): this {
    return this.set('fill', fill);
  }

  public withStroke(stroke: Brush, thickness?: number): this {
    this.set('stroke', stroke);
    if (thickness !== undefined) {
      this.set('stroke_thickness', thickness);
    }
    return this;
  }

  public addEffects(...effects: Effect[]): this {
    return this.appendTo('effects', ...effects);
  }
}

export class Ellipse extends ContentEntity {
  public static readonly tag = 'Ellipse';
}

export class Triangle extends ContentEntity {
  public static readonly tag = 'Triangle';
}

export class RightTriangle extends ContentEntity {
  public static readonly tag = 'RightTriangle';
}

export type RectangleOptions = ContentOptions & {
  radius?: number;
  style?: string;
};

export class Rectangle extends ContentEntity {
  public static readonly tag = 'Rectangle';
  public static readonly attributes = [
    attribute('radius', { type: 'number' }),
    attribute('style', { type: 'string' }),
  ];

  constructor(name: string, options: RectangleOptions) {
    super(name, options, { radius: options.radius, style: options.style });
  }
}

export type ImageOptions = ContentOptions & {
  bitmap?: Bitmap;
  sizeMode?: string;
};

export class Image extends ContentEntity {
  public static readonly tag = 'Image';
  public static readonly attributes = [
    attribute('bitmap', { type: Bitmap }),
    attribute('size_mode', { type: 'string' }),
  ];

  constructor(name: string, options: ImageOptions) {
    super(name, options, { bitmap: options.bitmap, size_mode: options.sizeMode });
  }
}

export type QRCodeOptions = ContentOptions & {
  text: string;
};

export class QRCode extends ContentEntity {
  public static readonly tag = 'QRCode';
  public static readonly attributes = [attribute('text', { type: 'string', required: true })];

  constructor(name: string, options: QRCodeOptions) {
    super(name, options, { text: options.text });
  }
}

export type TextProperties = {
  fontFamily?: string;
  fontSize?: number;
  fontWeight?: string;
  textAlign?: string;
  verticalAlign?: string;
  textWordWrapping?: string;
};

const TEXT_ATTRIBUTES = [
  attribute('font_family', { type: 'string' }),
  attribute('font_size', { type: 'number' }),
  attribute('font_weight', { type: 'string' }),
  attribute('text_align', { type: 'string' }),
  attribute('vertical_align', { type: 'string' }),
  attribute('text_word_wrapping', { type: 'string' }),
];

function textValues(properties: TextProperties): EntityValues {
  return {
    font_family: properties.fontFamily,
    font_size: properties.fontSize,
    font_weight: properties.fontWeight,
    text_align: properties.textAlign,
    vertical_align: properties.verticalAlign,
    text_word_wrapping: properties.textWordWrapping,
  };
}

export type TextBlockOptions = ContentOptions &
  TextProperties & {
    text: string;
    autoSize?: string;
    lineSpacing?: number;
  };

export class TextBlock extends ContentEntity {
  public static readonly tag = 'TextBlock';
  public static readonly attributes = [
    attribute('text', { type: 'string', required: true }),
    ...TEXT_ATTRIBUTES,
    attribute('auto_size', { type: 'string' }),
    attribute('line_spacing', { type: 'number' }),
  ];

  constructor(name: string, options: TextBlockOptions) {
    super(name, options, {
      ...textValues(options),
      text: options.text,
      auto_size: options.autoSize,
      line_spacing: options.lineSpacing,
    });
  }

  public get text(): string {
    return this.readString('text') ?? '';
  }

  public set text(value: string) {
    this.set('text', value);
  }
}

export type TickerOptions = ContentOptions &
  TextProperties & {
    direction?: string;
    speed?: number;
    type?: string;
  };

export class Ticker extends ContentEntity {
  public static readonly tag = 'Ticker';
  public static readonly attributes = [
    ...TEXT_ATTRIBUTES,
    attribute('direction', { type: 'string' }),
    attribute('speed', { type: 'number' }),
    attribute('type', { type: 'string' }),
  ];

  constructor(name: string, options: TickerOptions) {
    super(name, options, {
      ...textValues(options),
      direction: options.direction,
      speed: options.speed,
      type: options.type,
    });
  }
}

export type LayerOptions = ObjectOptions & {
  locked?: boolean;
  composition?: Composition;
};

/**
 * A named layer; its shapes live in a nested composition of the layer's size
 */
export class Layer extends ObjectEntity {
  public static readonly tag = 'Layer';
  public static readonly attributes = [
    attribute('locked', { type: 'boolean' }),
    attribute('composition', { type: Composition }),
  ];

  constructor(name: string, options: LayerOptions) {
    super(name, options, {
      locked: options.locked,
      composition:
        options.composition ?? new Composition(options.dimensions.width, options.dimensions.height),
    });
  }

  public get composition(): Composition {
    const composition = this.readInstance('composition', Composition);
    if (composition) {
      return composition;
    }
    const dimensions = this.dimensions ?? new Dimensions(0, 0);
    const created = new Composition(dimensions.width, dimensions.height);
    this.set('composition', created);
    return created;
  }

  public get shapes(): ContentEntity[] {
    return this.composition.children.filter((child): child is ContentEntity => child instanceof ContentEntity);
  }

  public append(...shapes: ContentEntity[]): this {
    this.composition.appendChild(...shapes);
    return this;
  }

  public addEllipse(name: string, options: ContentOptions): Ellipse {
    return this.add(new Ellipse(name, options));
  }

  public addTriangle(name: string, options: ContentOptions): Triangle {
    return this.add(new Triangle(name, options));
  }

  public addRightTriangle(name: string, options: ContentOptions): RightTriangle {
    return this.add(new RightTriangle(name, options));
  }

  public addRectangle(name: string, options: RectangleOptions): Rectangle {
    return this.add(new Rectangle(name, options));
  }

  public addImage(name: string, options: ImageOptions): Image {
    return this.add(new Image(name, options));
  }

  public addQRCode(name: string, options: QRCodeOptions): QRCode {
    return this.add(new QRCode(name, options));
  }

  public addTextBlock(name: string, options: TextBlockOptions): TextBlock {
    return this.add(new TextBlock(name, options));
  }

  public addTicker(name: string, options: TickerOptions): Ticker {
    return this.add(new Ticker(name, options));
  }

  private add<T extends ContentEntity>(shape: T): T {
    this.append(shape);
    return shape;
  }
}
