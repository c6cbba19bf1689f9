import type { FormattedValue } from '../AttributeValue';

/**
 * Three-component value rendered as `x,y,z`
 */
export class Triplet implements FormattedValue {
  public x: number;
  public y: number;
  public z: number;

  constructor(x: number, y: number, z: number = 0) {
    this.x = x;
    this.y = y;
    this.z = z;
  }

  public format(): string {
    return `${this.x},${this.y},${this.z}`;
  }

  public toString(): string {
    return this.format();
  }
}

export class Location extends Triplet {}

export class Rotate extends Triplet {}

export class Dimensions extends Triplet {
  public get width(): number {
    return this.x;
  }

  public set width(value: number) {
    this.x = value;
  }

  public get height(): number {
    return this.y;
  }

  public set height(value: number) {
    this.y = value;
  }

  public get depth(): number {
    return this.z;
  }

  public set depth(value: number) {
    this.z = value;
  }
}

/**
 * Four-sided value rendered as `top,right,bottom,left`.
 * Missing sides fall back like CSS shorthand: right to top, bottom to top, left to right.
 */
export class Quadruplet implements FormattedValue {
  public top: number;
  public right: number;
  public bottom: number;
  public left: number;

  constructor(top: number, right?: number, bottom?: number, left?: number) {
    this.top = top;
    this.right = right ?? top;
    this.bottom = bottom ?? top;
    this.left = left ?? this.right;
  }

  public format(): string {
    return `${this.top},${this.right},${this.bottom},${this.left}`;
  }

  public toString(): string {
    return this.format();
  }
}

export class Padding extends Quadruplet {}

export class Margin extends Quadruplet {}

export class Feather extends Quadruplet {}

/** Crop range */
export class Range extends Quadruplet {}
