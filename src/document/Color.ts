import type { FormattedValue } from '../AttributeValue';

export type ColorPreset =
  | 'red'
  | 'green'
  | 'blue'
  | 'white'
  | 'black'
  | 'transparentWhite'
  | 'transparentBlack'
  | 'cyan'
  | 'magenta'
  | 'yellow'
  | 'navy'
  | 'olive'
  | 'teal'
  | 'maroon'
  | 'purple'
  | 'gray'
  | 'silver'
  | 'orange'
  | 'pink'
  | 'gold';

// [r, g, b, a] in 0..1
const PRESETS: Record<ColorPreset, readonly [number, number, number, number]> = {
  red: [1, 0, 0, 1],
  green: [0, 1, 0, 1],
  blue: [0, 0, 1, 1],
  white: [1, 1, 1, 1],
  black: [0, 0, 0, 1],
  transparentWhite: [1, 1, 1, 0],
  transparentBlack: [0, 0, 0, 0],
  cyan: [0, 1, 1, 1],
  magenta: [1, 0, 1, 1],
  yellow: [1, 1, 0, 1],
  navy: [0, 0, 0.5, 1],
  olive: [0.5, 0.5, 0, 1],
  teal: [0, 0.5, 0.5, 1],
  maroon: [0.5, 0, 0, 1],
  purple: [0.5, 0, 0.5, 1],
  gray: [0.5, 0.5, 0.5, 1],
  silver: [0.75, 0.75, 0.75, 1],
  orange: [1, 0.65, 0, 1],
  pink: [1, 0.75, 0.8, 1],
  gold: [1, 0.84, 0, 1],
};

const HEX_PATTERN = /^#?([0-9a-fA-F]{6})([0-9a-fA-F]{2})?$/;

const toByte = (channel: number): number => Math.round(Math.min(1, Math.max(0, channel)) * 255);
const hexByte = (channel: number): string => toByte(channel).toString(16).toUpperCase().padStart(2, '0');

/**
 * RGBA colour with channels in the 0..1 range.
 * Rendered in markup as `#AARRGGBB`.
 */
export class Color implements FormattedValue {
  public readonly r: number;
  public readonly g: number;
  public readonly b: number;
  public readonly a: number;

  constructor(r: number, g: number, b: number, a: number = 1) {
    this.r = r;
    this.g = g;
    this.b = b;
    this.a = a;
  }

  public static preset(name: ColorPreset): Color {
    const [r, g, b, a] = PRESETS[name];
    return new Color(r, g, b, a);
  }

  /**
   * Parse `#RRGGBB` or `#RRGGBBAA`
   * @throws RangeError when the text is not a hex colour
   */
  public static fromHex(hex: string): Color {
    const match = HEX_PATTERN.exec(hex.trim());
    if (!match) {
      throw new RangeError(`'${hex}' is not a hex colour`);
    }
    const rgb = match[1];
    const alpha = match[2] ?? 'FF';
    return Color.fromInt(
      parseInt(rgb.slice(0, 2), 16),
      parseInt(rgb.slice(2, 4), 16),
      parseInt(rgb.slice(4, 6), 16),
      parseInt(alpha, 16)
    );
  }

  /**
   * Build a colour from 8-bit channel values
   */
  public static fromInt(r: number, g: number, b: number, a: number = 255): Color {
    return new Color(r / 255, g / 255, b / 255, a / 255);
  }

  public withAlpha(a: number): Color {
    return new Color(this.r, this.g, this.b, a);
  }

  public format(): string {
    return `#${hexByte(this.a)}${hexByte(this.r)}${hexByte(this.g)}${hexByte(this.b)}`;
  }

  public toString(): string {
    return this.format();
  }
}
