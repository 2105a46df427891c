import { Sequence } from './Sequence';
import type { SequenceOptions } from './Sequence';
import { Tween } from './Tween';
import type { TweenOptions } from './Tween';

/**
 * Create a tween. Registered with `options.scheduler`, if any, and playing
 * unless `options.paused` is set.
 */
export function createTween<T extends object>(target: T, duration: number, options: TweenOptions<T>): Tween<T> {
  return new Tween(target, duration, options);
}

/**
 * Create an empty, paused sequence.
 */
export function createSequence(options: SequenceOptions = {}): Sequence {
  return new Sequence(options);
}
