import type * as THREE from 'three';
import { PathBinding } from './bindings/PathBinding';
import type { PropertyBinding } from './bindings/PropertyBinding';
import { getDefaults } from './config';
import { debugLog, warn } from './debug';
import type { EaseInput } from './easing';
import { TweenComponent } from './TweenComponent';
import type { GoToOptions } from './TweenComponent';
import type { BindingOwner, OverwriteArbiter, TimelineOptions } from './types';

export interface TweenOptions<T extends object = object> extends TimelineOptions {
  /** Properties to animate */
  bindings: PropertyBinding<unknown>[];
  /** Default ease for bindings without their own (default: from config) */
  ease?: EaseInput;
  /** Seconds to wait before the first update moves anything */
  delay?: number;
  /** Read `duration` as a speed in units per second */
  speedBased?: boolean;
  /** Start paused instead of playing as soon as the scheduler ticks */
  paused?: boolean;
  overwrite?: OverwriteArbiter;
  /**
   * Checked before every update; returning false kills the tween.
   * Use it for targets that can be disposed behind the tween's back.
   */
  isTargetAlive?: (target: T) => boolean;
}

/**
 * Animates one target's properties over a fixed duration.
 *
 * @example
 * ```typescript
 * const tween = new Tween(mesh, 2, {
 *   bindings: [new Vector3Binding('position', new THREE.Vector3(0, 5, 0))],
 *   ease: 'easeInOutSine',
 *   loops: 2,
 *   loopType: 'yoyo',
 *   scheduler: ticker
 * });
 * ```
 */
export class Tween<T extends object = object> extends TweenComponent implements BindingOwner {
  readonly kind = 'tween';
  readonly speedBased: boolean;

  private _target: T | null;
  private bindings: PropertyBinding<unknown>[];
  private originalBindings: PropertyBinding<unknown>[] | null = null;
  private originalDuration = 0;
  private _ease: EaseInput;
  private readonly _delay: number;
  private delayCount: number;
  private _elapsedDelay = 0;
  private readonly overwrite: OverwriteArbiter | null;
  private readonly targetAlive: (() => boolean) | null;

  constructor(target: T, duration: number, options: TweenOptions<T>) {
    super(options);
    if (!(duration >= 0)) {
      throw new Error(`Tween: duration must be a non-negative number, got ${duration}`);
    }
    this._target = target;
    this._duration = duration;
    this._ease = options.ease ?? getDefaults().ease;
    this._delay = Math.max(0, options.delay ?? 0);
    this.delayCount = this._delay;
    this.speedBased = options.speedBased ?? false;
    this.overwrite = options.overwrite ?? null;
    const isTargetAlive = options.isTargetAlive;
    this.targetAlive = isTargetAlive ? () => isTargetAlive(target) : null;
    this._isPaused = options.paused ?? false;

    this.bindings = [...options.bindings];
    for (const binding of this.bindings) {
      binding.init(this, duration, this._ease);
    }
    this.setFullDuration();
    this.register();
  }

  /** The animated object; null once the tween is killed */
  get target(): T | null {
    return this._target;
  }

  get ease(): EaseInput {
    return this._ease;
  }

  /** Changes the ease of every binding, including those with their own */
  set ease(value: EaseInput) {
    this._ease = value;
    for (const binding of this.bindings) {
      binding.setEase(value);
    }
  }

  get delay(): number {
    return this._delay;
  }

  get elapsedDelay(): number {
    return this._elapsedDelay;
  }

  /**
   * Parameter reached on the path by the last update, or null if the tween
   * does not animate a path.
   */
  get pathPercentage(): number | null {
    const binding = this.bindings.find((b) => b instanceof PathBinding);
    return binding instanceof PathBinding ? binding.pathPercentage : null;
  }

  /**
   * @param ignoreDelay - advance `fullElapsed` even if the delay has not run out
   */
  update(dt: number, forceUpdate = false, isStartupIteration = false, ignoreDelay = false): boolean {
    if (this._destroyed) return true;
    if (this._target === null || this.targetAlive?.() === false) {
      this.kill(false);
      return true;
    }
    if (!this.enabled) return false;
    if (this._isComplete && !this._isReversed && !forceUpdate) return true;
    if (this._fullElapsed === 0 && this._isReversed && !forceUpdate) return false;
    if (this._isPaused && !forceUpdate) return false;

    this.ignoreCallbacks = isStartupIteration;

    if (ignoreDelay || isStartupIteration || this.delayCount === 0) {
      this.startup();
      if (!this._hasStarted) this.onStart();
      if (this._isReversed) {
        this._fullElapsed -= dt;
        this._elapsed -= dt;
      } else {
        this._fullElapsed += dt;
        this._elapsed += dt;
      }
      this.clampFullElapsed();
    } else {
      if (this.timeScale !== 0) {
        // Delays run on real time, so undo the scheduler's scaling
        this._elapsedDelay += dt / this.timeScale;
      }
      if (this._elapsedDelay < this.delayCount) {
        this.ignoreCallbacks = false;
        return false;
      }
      if (this._isReversed) {
        this._fullElapsed = this._elapsed = 0;
      } else {
        this._fullElapsed = this._elapsed = this._elapsedDelay - this.delayCount;
        this.clampFullElapsed();
      }
      this._elapsedDelay = this.delayCount;
      this.delayCount = 0;
      this.startup();
      if (!this._hasStarted) this.onStart();
    }

    const wasComplete = this._isComplete;
    const stepComplete = !this._isReversed && !wasComplete && this._elapsed >= this._duration;
    this.setLoops();
    this.setElapsed();
    this._isComplete = !this._isReversed && this._loops >= 0 && this._completedLoops >= this._loops;
    let complete = !wasComplete && this._isComplete;

    const bindingElapsed = this._isLoopingBack ? this._duration - this._elapsed : this._elapsed;
    for (const binding of [...this.bindings]) {
      const inverse = this._loopType === 'yoyoInverse';
      if (
        !this._isLoopingBack && binding.easeReversed ||
        this._isLoopingBack && inverse && !binding.easeReversed
      ) {
        binding.reverseEase();
      }
      if (this._duration > 0) {
        binding.update(bindingElapsed);
      } else {
        binding.complete();
        complete = true;
      }
    }

    this.fireProgressCallbacks(complete, stepComplete);
    this.ignoreCallbacks = false;
    this.prevFullElapsed = this._fullElapsed;
    return complete;
  }

  /**
   * Start or resume playing.
   * @param skipDelay - start right away if the delay has not run yet
   */
  play(skipDelay = false): void {
    if (!this.enabled || this._destroyed) return;
    if (skipDelay) this.skipDelay();
    super.play();
  }

  goTo(time: number, options: GoToOptions = {}): boolean {
    if (!this.enabled || this._destroyed) return false;
    time = Math.min(Math.max(time, 0), this._fullDuration);
    if (!options.force && this._fullElapsed === time) {
      if (!this._isComplete && options.play) this.play();
      return this._isComplete;
    }
    this._fullElapsed = time;
    this.delayCount = 0;
    this._elapsedDelay = this._delay;
    this.update(0, true, options.ignoreCallbacks ?? false);
    if (!this._isComplete && options.play) this.play();
    return this._isComplete;
  }

  /**
   * Back to the start, paused.
   * @param skipDelay - the next play starts immediately instead of waiting for the delay
   */
  rewind(skipDelay = false): void {
    this.doRewind(false, skipDelay);
  }

  /**
   * Back to the start, then play.
   */
  restart(skipDelay = false): void {
    if (this._fullElapsed === 0) {
      this._isReversed = false;
      this.play(skipDelay);
    } else {
      this.doRewind(true, skipDelay);
    }
  }

  setIncremental(diff: number): void {
    for (const binding of this.bindings) {
      binding.setIncremental(diff);
    }
  }

  fillBindings(out: PropertyBinding<unknown>[]): void {
    out.push(...this.bindings);
  }

  isTweening(target: object): boolean {
    return this.enabled && !this._isPaused && !this._isComplete && target === this._target;
  }

  isLinkedTo(target: object): boolean {
    return target === this._target;
  }

  getTargets(): object[] {
    return this._target ? [this._target] : [];
  }

  getTweensById(id: string): TweenComponent[] {
    return this.id === id ? [this] : [];
  }

  /**
   * Point at `t` in [0, 1] on the full path, at constant speed. Starts the
   * tween up if needed. Null when the tween has no path binding.
   */
  getPointOnPath(t: number): THREE.Vector3 | null {
    const binding = this.findPathBinding();
    if (!binding) {
      warn('Tween', 'getPointOnPath called on a tween without a path');
      return null;
    }
    this.startup();
    return binding.getConstPointOnPath(t);
  }

  /**
   * Play only the part of the path between two waypoints. Waypoint ids index
   * the waypoints given to the path binding; -1 is the path's starting point.
   * The duration shrinks in proportion to the length kept.
   */
  usePartialPath(waypointId0: number, waypointId1: number, ease: EaseInput = this._ease): this {
    const binding = this.findPathBinding();
    if (!binding) {
      warn('Tween', 'usePartialPath called on a tween without a path');
      return this;
    }
    if (this.speedBased) {
      warn('Tween', 'usePartialPath is not available on speed-based tweens');
      return this;
    }
    if ((this.originalBindings ?? this.bindings).length > 1) {
      warn('Tween', 'usePartialPath needs the path to be the only animated property');
      return this;
    }

    this.startup();
    const path = binding.path;
    if (!path) {
      warn('Tween', 'usePartialPath called on a zero-length path');
      return this;
    }
    const id0 = this.toPathId(binding, waypointId0);
    const id1 = this.toPathId(binding, waypointId1);
    if (id0 < 1 || id1 > path.points.length - 2 || id0 >= id1) {
      warn('Tween', `invalid waypoint range [${waypointId0}, ${waypointId1}]`);
      return this;
    }

    if (!this.originalBindings) {
      this.originalDuration = this._duration;
      this.originalBindings = this.bindings;
    }
    this._duration = this.originalDuration * path.getWaypointsLengthPercentage(id0, id1);
    debugLog(`Tween partial path ${id0}..${id1}, duration ${this._duration}`);

    const partial = binding.cloneForPartialPath(path.points.slice(id0 - 1, id1 + 2), ease);
    partial.init(this, this._duration, ease);
    this.bindings = [partial];
    this.restartWithBindings();
    return this;
  }

  /**
   * Undo `usePartialPath`.
   */
  resetPath(): void {
    if (!this.originalBindings) {
      warn('Tween', 'resetPath called without a partial path in use');
      return;
    }
    this._duration = this.originalDuration;
    this.bindings = this.originalBindings;
    this.originalBindings = null;
    this.restartWithBindings();
  }

  /** Start the bindings now, so speed-based durations are known. */
  resolveDuration(): void {
    this.startup();
  }

  protected startup(force = false): void {
    if (this.startupDone && !force) return;
    for (const binding of this.bindings) {
      binding.startup();
    }
    if (this.speedBased) {
      this._duration = this.bindings.reduce((max, b) => Math.max(max, b.duration), 0);
    }
    this.setFullDuration();
    super.startup();
  }

  protected onStart(): void {
    if (this.ignoreCallbacks || this.muted) return;
    this.overwrite?.addTween(this);
    super.onStart();
  }

  protected onKill(): void {
    this.overwrite?.removeTween(this);
    this.bindings = [];
    this.originalBindings = null;
    this._target = null;
  }

  private doRewind(play: boolean, skipDelay: boolean): void {
    if (!this.enabled || this._destroyed) return;
    this.startup();
    if (!this._hasStarted) this.onStart();

    this._isComplete = false;
    this._isLoopingBack = false;
    this.delayCount = skipDelay ? 0 : this._delay;
    this._elapsedDelay = skipDelay ? this._delay : 0;
    this._completedLoops = 0;
    this._fullElapsed = this._elapsed = 0;

    for (const binding of this.bindings) {
      if (binding.easeReversed) binding.reverseEase();
      binding.rewind();
    }

    if (this._fullElapsed !== this.prevFullElapsed) {
      this.fire('update');
      this.fire('rewound');
    }
    this.prevFullElapsed = this._fullElapsed;

    if (play) {
      this._isReversed = false;
      this.play();
    } else {
      this.pause();
    }
  }

  private restartWithBindings(): void {
    this.startup(true);
    if (this._isPaused) {
      this.doRewind(false, true);
    } else {
      this.doRewind(true, true);
    }
  }

  private skipDelay(): void {
    if (this.delayCount > 0) {
      this._elapsedDelay = this._delay;
      this.delayCount = 0;
    }
  }

  private findPathBinding(): PathBinding | null {
    const binding = (this.originalBindings ?? this.bindings).find((b) => b instanceof PathBinding);
    return binding instanceof PathBinding ? binding : null;
  }

  private toPathId(binding: PathBinding, waypointId: number): number {
    if (waypointId === -1) return 1;
    return waypointId + (binding.hasAdditionalStartingPoint ? 2 : 1);
  }
}
