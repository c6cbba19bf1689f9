import { attribute } from '../AttributeSchema';
import { Entity } from '../Entity';
import { Reference } from '../Reference';

export type Interpolation =
  | 'Linear'
  | 'CubicEasingIn'
  | 'CubicEasingOut'
  | 'CubicEasingInOut'
  | 'BounceIn'
  | 'BounceOut';

export type AnimationDirection = 'Top' | 'Down' | 'Left' | 'Right';

export type CenterAxis = 'X' | 'Y';

export type AnimationTiming = {
  duration?: number;
  delay?: number;
  speed?: number;
  interpolation?: Interpolation;
  direction?: AnimationDirection;
  reverse?: boolean;
  centerAxis?: CenterAxis;
};

/**
 * An animation applied to another object, which is referred to by name
 */
export abstract class Animation extends Entity {
  public static readonly attributes = [
    attribute('object', { type: Reference, required: true }),
    attribute('duration', { type: 'number' }),
    attribute('speed', { type: 'number' }),
    attribute('delay', { type: 'number' }),
    attribute('interpolation', { type: 'string' }),
    attribute('direction', { type: 'string' }),
    attribute('reverse', { type: 'boolean' }),
    attribute('center_axis', { type: 'string' }),
  ];

  /**
   * @param target The animated object, or a reference to it
   * @param timing Duration, delay and easing; unset fields are left out of the markup
   */
  constructor(target: Entity | Reference, timing: AnimationTiming = {}) {
    super({
      object: target instanceof Reference ? target : new Reference(target),
      duration: timing.duration,
      speed: timing.speed,
      delay: timing.delay,
      interpolation: timing.interpolation,
      direction: timing.direction,
      reverse: timing.reverse,
      center_axis: timing.centerAxis,
    });
  }

  public get target(): Reference | undefined {
    return this.readInstance('object', Reference);
  }
}

export class BounceAnimation extends Animation {
  public static readonly tag = 'Bounce';
}

export class ExpandAnimation extends Animation {
  public static readonly tag = 'Expand';
}

export class FadeAnimation extends Animation {
  public static readonly tag = 'Fade';
}

export class FillOffsetAnimation extends Animation {
  public static readonly tag = 'FillOffset';
}

export class FlyAnimation extends Animation {
  public static readonly tag = 'Fly';
}

export class HiddenAnimation extends Animation {
  public static readonly tag = 'Hidden';
}

export class ImageSequenceLoopAnimation extends Animation {
  public static readonly tag = 'ImageSequenceLoop';
}

export class NoneAnimation extends Animation {
  public static readonly tag = 'None';
}

export class RevealAnimation extends Animation {
  public static readonly tag = 'Reveal';
}

export class RotateAnimation extends Animation {
  public static readonly tag = 'Rotate';
}

export class RotateContinuousAnimation extends Animation {
  public static readonly tag = 'RotateContinuous';
}

export class StrokeOffsetAnimation extends Animation {
  public static readonly tag = 'StrokeOffset';
}

export class ZoomAnimation extends Animation {
  public static readonly tag = 'Zoom';
}

export class ZoomFadeAnimation extends Animation {
  public static readonly tag = 'ZoomFade';
}

type AnimationClass = new (target: Entity | Reference, timing?: AnimationTiming) => Animation;

const ANIMATIONS = {
  Bounce: BounceAnimation,
  Expand: ExpandAnimation,
  Fade: FadeAnimation,
  FillOffset: FillOffsetAnimation,
  Fly: FlyAnimation,
  Hidden: HiddenAnimation,
  ImageSequenceLoop: ImageSequenceLoopAnimation,
  None: NoneAnimation,
  Reveal: RevealAnimation,
  Rotate: RotateAnimation,
  RotateContinuous: RotateContinuousAnimation,
  StrokeOffset: StrokeOffsetAnimation,
  Zoom: ZoomAnimation,
  ZoomFade: ZoomFadeAnimation,
} satisfies Record<string, AnimationClass>;

export type AnimationKind = keyof typeof ANIMATIONS;

export type StoryboardType =
  | 'Continuous'
  | 'TransitionIn'
  | 'TransitionOut'
  | 'DataChangeIn'
  | 'DataChangeOut'
  | `Page ${number}`;

export type StoryboardOptions = {
  dataName?: string;
  name?: string;
  animations?: Animation[];
};

/**
 * An ordered set of animations played together on a trigger
 */
export class Storyboard extends Entity {
  public static readonly tag = 'Storyboard';
  public static readonly attributes = [
    attribute('animations', { type: 'entity-list' }),
    attribute('data_name', { type: 'string' }),
    attribute('type', { type: 'string', required: true }),
    attribute('name', { type: 'string' }),
  ];

  constructor(type: StoryboardType, options: StoryboardOptions = {}) {
    super({ animations: options.animations, data_name: options.dataName, type, name: options.name });
  }

  public static page(pageNumber: number, ...animations: Animation[]): Storyboard {
    return new Storyboard(`Page ${pageNumber}`, { animations });
  }

  public static continuous(...animations: Animation[]): Storyboard {
    return new Storyboard('Continuous', { animations });
  }

  public static transitionIn(...animations: Animation[]): Storyboard {
    return new Storyboard('TransitionIn', { animations });
  }

  public static transitionOut(...animations: Animation[]): Storyboard {
    return new Storyboard('TransitionOut', { animations });
  }

  /**
   * Played when a data field changes
   * @param dataName `Object_Name.Attribute` of the watched field
   */
  public static dataChangeIn(dataName: string, ...animations: Animation[]): Storyboard {
    return new Storyboard('DataChangeIn', { dataName, animations });
  }

  public static dataChangeOut(dataName: string, ...animations: Animation[]): Storyboard {
    return new Storyboard('DataChangeOut', { dataName, animations });
  }

  public get type(): string {
    return this.readString('type') ?? '';
  }

  public get animations(): Animation[] {
    return this.readList('animations', Animation);
  }

  public append(...animations: Animation[]): this {
    return this.appendTo('animations', ...animations);
  }

  /**
   * Create an animation of the given kind on a target and add it
   * @returns The created animation
   */
  public animate(kind: AnimationKind, target: Entity | Reference, timing: AnimationTiming = {}): Animation {
    const AnimationType: AnimationClass = ANIMATIONS[kind];
    const animation = new AnimationType(target, timing);
    this.append(animation);
    return animation;
  }
}
