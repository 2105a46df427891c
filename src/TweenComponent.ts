import { EventEmitter } from './EventEmitter';
import { getDefaults } from './config';
import type { PropertyBinding } from './bindings/PropertyBinding';
import type {
  ComponentCallback,
  LoopType,
  TimelineEvents,
  TimelineOptions,
  TweenScheduler
} from './types';

/**
 * A sequence as seen by one of its members: just enough to leave it.
 */
export interface TweenContainer {
  remove(member: TweenComponent): void;
}

export interface GoToOptions {
  /** Resume playback afterwards (unless the position is the end) */
  play?: boolean;
  /** Update even if nothing changed, or while paused or complete */
  force?: boolean;
  ignoreCallbacks?: boolean;
}

/**
 * Elapsed-time / loop state machine shared by tweens and sequences.
 *
 * Time only moves through `update` (or `advance`, its public entry point):
 * the scheduler or the owning sequence calls it with a delta, and the
 * component works out loops, direction and completion from `fullElapsed`.
 */
export abstract class TweenComponent extends EventEmitter<TimelineEvents> {
  abstract readonly kind: 'tween' | 'sequence';

  id: string;
  timeScale: number;
  autoKillOnComplete: boolean;
  enabled = true;

  /** Sequence owning this component, if any. Set by the sequence. */
  container: TweenContainer | null = null;

  protected scheduler: TweenScheduler | null;

  protected _duration = 0;
  protected _fullDuration = 0;
  protected _elapsed = 0;
  protected _fullElapsed = 0;
  protected _completedLoops = 0;
  protected _loops: number;
  protected _loopType: LoopType;
  protected _isPaused = false;
  protected _isComplete = false;
  protected _isReversed = false;
  protected _isLoopingBack = false;
  protected _hasStarted = false;
  protected _destroyed = false;
  protected startupDone = false;
  protected ignoreCallbacks = false;
  protected prevFullElapsed = 0;
  private _muted = false;

  protected constructor(options: TimelineOptions) {
    super();
    const defaults = getDefaults();
    this.id = options.id ?? '';
    this._loops = options.loops ?? 1;
    this._loopType = options.loopType ?? defaults.loopType;
    this.timeScale = options.timeScale ?? defaults.timeScale;
    this.autoKillOnComplete = options.autoKill ?? defaults.autoKill;
    this.scheduler = options.scheduler ?? null;

    const callbacks: Array<[keyof TimelineEvents, ComponentCallback | undefined]> = [
      ['start', options.onStart],
      ['update', options.onUpdate],
      ['stepcomplete', options.onStepComplete],
      ['complete', options.onComplete],
      ['rewound', options.onRewound],
      ['play', options.onPlay],
      ['pause', options.onPause],
      ['kill', options.onKill]
    ];
    for (const [event, callback] of callbacks) {
      if (callback) this.on(event, callback);
    }
  }

  /** Length of one loop, in seconds */
  get duration(): number {
    return this._duration;
  }

  /** Length of all loops; Infinity for infinite loops */
  get fullDuration(): number {
    return this._fullDuration;
  }

  /** Position inside the current loop */
  get elapsed(): number {
    return this._elapsed;
  }

  /** Position across all loops */
  get fullElapsed(): number {
    return this._fullElapsed;
  }

  get completedLoops(): number {
    return this._completedLoops;
  }

  get loops(): number {
    return this._loops;
  }

  set loops(value: number) {
    this._loops = value;
    this.setFullDuration();
  }

  get loopType(): LoopType {
    return this._loopType;
  }

  set loopType(value: LoopType) {
    this._loopType = value;
  }

  get isPaused(): boolean {
    return this._isPaused;
  }

  get isComplete(): boolean {
    return this._isComplete;
  }

  get isReversed(): boolean {
    return this._isReversed;
  }

  get isLoopingBack(): boolean {
    return this._isLoopingBack;
  }

  get hasStarted(): boolean {
    return this._hasStarted;
  }

  get isDestroyed(): boolean {
    return this._destroyed;
  }

  get isSequenced(): boolean {
    return this.container !== null;
  }

  /** While muted no callback fires, whatever the update mode. */
  get muted(): boolean {
    return this._muted;
  }

  set muted(value: boolean) {
    this.setMuted(value);
  }

  /**
   * Advance by `dt` seconds. Returns true if the component is complete
   * in the forward direction (or was killed).
   */
  advance(dt: number, forceUpdate = false): boolean {
    return this.update(dt, forceUpdate, false);
  }

  /**
   * @param isStartupIteration - update issued by a sequence's startup pass; no callbacks fire
   */
  abstract update(dt: number, forceUpdate?: boolean, isStartupIteration?: boolean): boolean;

  /**
   * Jump to `time` (loops included, clamped to the full duration).
   * Returns true if that position completes the component.
   */
  abstract goTo(time: number, options?: GoToOptions): boolean;

  abstract rewind(): void;
  abstract restart(): void;
  abstract setIncremental(diff: number): void;
  abstract fillBindings(out: PropertyBinding<unknown>[]): void;
  abstract isTweening(target: object): boolean;
  abstract isLinkedTo(target: object): boolean;
  abstract getTargets(): object[];
  abstract getTweensById(id: string): TweenComponent[];

  seek(time: number): boolean {
    return this.goTo(time);
  }

  goToAndPlay(time: number): boolean {
    return this.goTo(time, { play: true });
  }

  play(): void {
    if (!this.enabled || this._destroyed) return;
    this.playIfPaused();
  }

  playForward(): void {
    if (!this.enabled || this._destroyed) return;
    this._isReversed = false;
    this.playIfPaused();
  }

  playBackwards(): void {
    if (!this.enabled || this._destroyed) return;
    this._isReversed = true;
    this.playIfPaused();
  }

  pause(): void {
    if (!this.enabled || this._destroyed || this._isPaused) return;
    this._isPaused = true;
    this.fire('pause');
  }

  /**
   * Flip the playing direction. Does not resume a paused component unless `forcePlay`.
   */
  reverse(forcePlay = false): void {
    if (!this.enabled || this._destroyed) return;
    this._isReversed = !this._isReversed;
    if (forcePlay) this.play();
  }

  /**
   * Jump to the end of the last loop. No effect with infinite loops.
   */
  complete(): void {
    if (!this.enabled || this._destroyed || this._loops < 0) return;
    this._fullElapsed = this._fullDuration;
    this.update(0, true);
    if (this.autoKillOnComplete) {
      this.kill();
    }
  }

  /**
   * Destroy the component: release its content, leave its sequence and
   * (unless `autoRemove` is false) its scheduler.
   */
  kill(autoRemove = true): void {
    if (this._destroyed) return;
    this._destroyed = true;
    this.onKill();

    const container = this.container;
    this.container = null;
    container?.remove(this);
    if (autoRemove) {
      this.scheduler?.remove(this);
    }
    this.scheduler = null;

    this.fire('kill');
    this.removeAllListeners();
  }

  /**
   * Hand this component over to a sequence: it leaves its scheduler and
   * any previous sequence.
   */
  adopt(container: TweenContainer): void {
    this.scheduler?.remove(this);
    this.scheduler = null;
    const previous = this.container;
    this.container = container;
    if (previous && previous !== container) {
      previous.remove(this);
    }
  }

  protected register(): void {
    this.scheduler?.add(this);
  }

  protected setMuted(value: boolean): void {
    this._muted = value;
  }

  protected abstract onKill(): void;

  protected startup(): void {
    this.startupDone = true;
  }

  /** Not counted as a start while callbacks are suppressed. */
  protected onStart(): void {
    if (this.ignoreCallbacks || this._muted) return;
    this._hasStarted = true;
    this.fire('start');
  }

  protected fire(event: keyof TimelineEvents): void {
    if (this.ignoreCallbacks || this._muted) return;
    this.emit(event, this);
  }

  protected setFullDuration(): void {
    this._fullDuration = this._loops < 0 ? Infinity : this._duration * this._loops;
  }

  protected setLoops(): void {
    if (this._duration === 0) {
      this._completedLoops = this._loops < 0 ? 1 : Math.max(this._loops, 1);
    } else {
      const loops = this._fullElapsed / this._duration;
      // Floating point division can land just below a whole number of loops
      this._completedLoops = Math.ceil(loops) - loops < 0.0000001 ? Math.round(loops) : Math.floor(loops);
    }

    const odd = this._completedLoops % 2 !== 0;
    const yoyo = this._loopType === 'yoyo' || this._loopType === 'yoyoInverse';
    this._isLoopingBack = yoyo && (
      this._loops > 0 && (this._completedLoops < this._loops ? odd : !odd) ||
      this._loops < 0 && odd
    );
  }

  protected setElapsed(): void {
    if (this._duration === 0 || this._loops >= 0 && this._completedLoops >= this._loops) {
      this._elapsed = this._duration;
    } else if (this._fullElapsed < this._duration) {
      this._elapsed = this._fullElapsed;
    } else {
      this._elapsed = this._fullElapsed % this._duration;
    }
  }

  protected clampFullElapsed(): void {
    if (this._fullElapsed > this._fullDuration) {
      this._fullElapsed = this._fullDuration;
    } else if (this._fullElapsed < 0) {
      this._fullElapsed = 0;
    }
  }

  protected fireProgressCallbacks(complete: boolean, stepComplete: boolean): void {
    if (this._fullElapsed !== this.prevFullElapsed) {
      this.fire('update');
      if (this._fullElapsed === 0) {
        this.fire('rewound');
      }
    }
    if (complete) {
      this.fire('complete');
    } else if (stepComplete) {
      this.fire('stepcomplete');
    }
  }

  private playIfPaused(): void {
    const canMove = this._isReversed ? this._fullElapsed > 0 : !this._isComplete;
    if (this._isPaused && canMove) {
      this._isPaused = false;
      this.fire('play');
    }
  }
}
