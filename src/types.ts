import type { TweenComponent } from './TweenComponent';
import type { Tween } from './Tween';
import type { Sequence } from './Sequence';

/** Anything a sequence can hold */
export type Timeline = Tween | Sequence;

export type LoopType = 'restart' | 'yoyo' | 'yoyoInverse' | 'incremental';

/**
 * Reads and writes one property of an animated target.
 * Implementations decide how `property` is resolved (field, path, lookup table).
 */
export interface PropertyAccessor<V> {
  get(target: object, property: string): V;
  set(target: object, property: string, value: V): void;
}

/**
 * Whatever drives root components once per frame.
 * Registration and removal are synchronous.
 */
export interface TweenScheduler {
  add(component: TweenComponent): void;
  remove(component: TweenComponent): void;
}

/**
 * Notified when a tween starts and when it dies, so it can cancel
 * other tweens animating the same properties.
 */
export interface OverwriteArbiter {
  addTween(tween: Tween): void;
  removeTween(tween: Tween): void;
}

/**
 * The slice of a tween that its property bindings read.
 */
export interface BindingOwner {
  readonly target: object | null;
  readonly loopType: LoopType;
  readonly loops: number;
  readonly completedLoops: number;
  readonly speedBased: boolean;
}

export type ComponentCallback = (component: TweenComponent) => void;

export type TimelineEvents = {
  start: [TweenComponent];
  update: [TweenComponent];
  stepcomplete: [TweenComponent];
  complete: [TweenComponent];
  rewound: [TweenComponent];
  play: [TweenComponent];
  pause: [TweenComponent];
  kill: [TweenComponent];
};

/**
 * Options shared by tweens and sequences.
 */
export interface TimelineOptions {
  id?: string;
  /** Number of loops; negative for infinite (default: 1) */
  loops?: number;
  loopType?: LoopType;
  timeScale?: number;
  /** Kill the component once it completes (default: from config) */
  autoKill?: boolean;
  scheduler?: TweenScheduler;
  onStart?: ComponentCallback;
  onUpdate?: ComponentCallback;
  onStepComplete?: ComponentCallback;
  onComplete?: ComponentCallback;
  onRewound?: ComponentCallback;
  onPlay?: ComponentCallback;
  onPause?: ComponentCallback;
  onKill?: ComponentCallback;
}
