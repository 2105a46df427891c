import type { EaseInput } from './easing';
import type { LoopType } from './types';

/**
 * Library-wide fallbacks for options left unset on individual tweens and sequences.
 */
export interface TweenDefaults {
  ease: EaseInput;
  loopType: LoopType;
  timeScale: number;
  /** Whether completed components are killed by the scheduler */
  autoKill: boolean;
  /** Buckets used by constant-speed path traversal */
  arcLengthSubdivisions: number;
  /** Parameter offset used to sample the path ahead when orienting to it */
  lookAhead: number;
}

const FACTORY_DEFAULTS: TweenDefaults = {
  ease: 'easeOutQuad',
  loopType: 'restart',
  timeScale: 1,
  autoKill: true,
  arcLengthSubdivisions: 100,
  lookAhead: 0.0001
};

let current: TweenDefaults = { ...FACTORY_DEFAULTS };

export function getDefaults(): Readonly<TweenDefaults> {
  return current;
}

export function setDefaults(overrides: Partial<TweenDefaults>): void {
  current = { ...current, ...overrides };
}

export function resetDefaults(): void {
  current = { ...FACTORY_DEFAULTS };
}
