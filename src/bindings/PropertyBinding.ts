import { Ease, inverseEase, resolveEase } from '../easing';
import type { EaseFunction, EaseInput } from '../easing';
import type { BindingOwner, PropertyAccessor } from '../types';

export interface BindingOptions<V> {
  /** Ease for this property only; defaults to the tween's ease */
  ease?: EaseInput;
  /** Treat the end value as an offset from the value found at startup */
  relative?: boolean;
  accessor?: PropertyAccessor<V>;
}

/**
 * Animates one property of a tween's target from the value it has at startup
 * to an end value.
 *
 * Subclasses own the typed start/end values; this class owns easing,
 * startup, and the incremental-loop bookkeeping.
 */
export abstract class PropertyBinding<V> {
  readonly property: string;
  readonly isRelative: boolean;

  protected readonly accessor: PropertyAccessor<V>;
  protected owner: BindingOwner | null = null;

  private easeInput: EaseInput;
  private easeFn: EaseFunction;
  private readonly hasOwnEase: boolean;
  private _easeReversed = false;
  private _duration = 0;
  private started = false;
  private prevCompletedLoops = 0;

  protected constructor(property: string, accessor: PropertyAccessor<V>, options: BindingOptions<V>) {
    this.property = property;
    this.accessor = options.accessor ?? accessor;
    this.isRelative = options.relative ?? false;
    this.hasOwnEase = options.ease !== undefined;
    this.easeInput = options.ease ?? 'linear';
    this.easeFn = resolveEase(this.easeInput);
  }

  get duration(): number {
    return this._duration;
  }

  get easeReversed(): boolean {
    return this._easeReversed;
  }

  get ease(): EaseInput {
    return this.easeInput;
  }

  get wasStarted(): boolean {
    return this.started;
  }

  /**
   * Attach to the tween that drives this binding.
   */
  init(owner: BindingOwner, duration: number, tweenEase: EaseInput): void {
    this.owner = owner;
    this._duration = duration;
    if (!this.hasOwnEase) {
      this.setEase(tweenEase);
    }
  }

  setEase(ease: EaseInput): void {
    this.easeInput = ease;
    this._easeReversed = false;
    this.easeFn = resolveEase(ease);
  }

  /**
   * Capture the target's current value and derive the change to apply.
   * Runs once; later calls are no-ops.
   */
  startup(): void {
    const target = this.owner?.target;
    if (this.started || !this.owner || !target) {
      return;
    }
    this.started = true;
    this.captureStartValue(this.accessor.get(target, this.property));
    this.setChangeValue();
    if (this.owner.speedBased) {
      // While speed based, the duration passed to init is a speed in units per second.
      this._duration = this.getSpeedBasedDuration(this._duration);
    }
  }

  update(elapsed: number): void {
    const owner = this.owner;
    if (!owner) return;

    if (owner.loopType === 'incremental') {
      if (this.prevCompletedLoops !== owner.completedLoops) {
        let currLoops = owner.completedLoops;
        if (owner.loops >= 0 && currLoops >= owner.loops) {
          // The completion loop does not start a new increment
          --currLoops;
        }
        const diff = currLoops - this.prevCompletedLoops;
        if (diff !== 0) {
          this.setIncremental(diff);
          this.prevCompletedLoops = currLoops;
        }
      }
    } else if (this.prevCompletedLoops !== 0) {
      this.setIncremental(-this.prevCompletedLoops);
      this.prevCompletedLoops = 0;
    }

    this.applyAt(elapsed);
  }

  /**
   * Swap between the ease and its inverse (used by yoyoInverse loops).
   * Custom ease functions have no inverse and are left as they are.
   */
  reverseEase(): void {
    this._easeReversed = !this._easeReversed;
    if (typeof this.easeInput === 'string') {
      this.easeFn = Ease[this._easeReversed ? inverseEase(this.easeInput) : this.easeInput];
    }
  }

  rewind(): void {
    if (this.prevCompletedLoops !== 0) {
      this.setIncremental(-this.prevCompletedLoops);
      this.prevCompletedLoops = 0;
    }
    this.applyStart();
  }

  complete(): void {
    this.applyEnd();
  }

  /**
   * Shift the animated range by `diff` loop widths.
   */
  abstract setIncremental(diff: number): void;

  protected abstract captureStartValue(value: V): void;
  protected abstract setChangeValue(): void;
  protected abstract getSpeedBasedDuration(speed: number): number;
  protected abstract applyAt(elapsed: number): void;
  protected abstract applyStart(): void;
  protected abstract applyEnd(): void;

  protected easeValue(elapsed: number, start: number, change: number): number {
    return this.easeFn(elapsed, start, change, this._duration);
  }

  protected write(value: V): void {
    const target = this.owner?.target;
    if (target) {
      this.accessor.set(target, this.property, value);
    }
  }
}
