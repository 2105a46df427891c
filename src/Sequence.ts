import type { PropertyBinding } from './bindings/PropertyBinding';
import { debugLog, warn } from './debug';
import { TweenComponent } from './TweenComponent';
import type { GoToOptions, TweenContainer } from './TweenComponent';
import type { Timeline, TimelineOptions } from './types';

export type SequenceOptions = TimelineOptions;

/**
 * One slot on a sequence's timeline: a nested tween or sequence, or an
 * empty interval.
 */
export type SequenceItem =
  | { readonly kind: 'member'; startTime: number; readonly member: Timeline }
  | { readonly kind: 'interval'; startTime: number; readonly duration: number };

function itemDuration(item: SequenceItem): number {
  return item.kind === 'member' ? item.member.duration : item.duration;
}

/**
 * Plays tweens and other sequences on a shared timeline.
 *
 * Sequences are created paused; call `play()` once they are filled.
 * A member handed to a sequence stops being driven by its scheduler.
 *
 * @example
 * ```typescript
 * const seq = new Sequence({ scheduler: ticker, loops: 2, loopType: 'yoyo' });
 * seq.append(moveUp);
 * seq.appendInterval(0.5);
 * seq.insert(0, fadeIn);
 * seq.play();
 * ```
 */
export class Sequence extends TweenComponent implements TweenContainer {
  readonly kind = 'sequence';

  private entries: SequenceItem[] = [];
  private prevCompletedLoops = 0;

  constructor(options: SequenceOptions = {}) {
    super(options);
    this._isPaused = true;
    this.setFullDuration();
    this.register();
  }

  /** Snapshot of the timeline, ordered by start time */
  get items(): SequenceItem[] {
    return this.entries.map((item) => ({ ...item }));
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /**
   * Add `member` at the end of the timeline. Returns the new duration.
   */
  append(member: Timeline): number {
    if (!this.accept(member)) return this._duration;
    return this.push({ kind: 'member', startTime: this._duration, member });
  }

  appendInterval(duration: number): number {
    return this.push({ kind: 'interval', startTime: this._duration, duration: this.checkInterval(duration) });
  }

  /**
   * Add `member` at time 0, pushing everything else back by its duration.
   */
  prepend(member: Timeline): number {
    if (!this.accept(member)) return this._duration;
    return this.unshift({ kind: 'member', startTime: 0, member });
  }

  prependInterval(duration: number): number {
    return this.unshift({ kind: 'interval', startTime: 0, duration: this.checkInterval(duration) });
  }

  /**
   * Add `member` at `time`, overlapping whatever plays there.
   */
  insert(time: number, member: Timeline): number {
    if (!this.accept(member)) return this._duration;
    return this.insertItem({ kind: 'member', startTime: this.checkTime(time), member });
  }

  insertInterval(time: number, duration: number): number {
    return this.insertItem({ kind: 'interval', startTime: this.checkTime(time), duration: this.checkInterval(duration) });
  }

  /**
   * Drop `member` from the timeline. The duration is left as it is; a
   * sequence left with nothing in it is killed. The member is not handed
   * back to a scheduler.
   */
  remove(member: TweenComponent): void {
    if (this._destroyed) return;
    if (!this.detach(member)) return;
    if (member.container === this) {
      member.container = null;
    }
    if (this.entries.length === 0) {
      debugLog('Sequence emptied, killing it');
      this.kill();
    }
  }

  update(dt: number, forceUpdate = false, isStartupIteration = false, ignoreCallbacks = false): boolean {
    if (this._destroyed) return true;
    if (this.entries.length === 0) return true;
    if (!this.enabled) return false;
    if (this._isComplete && !this._isReversed && !forceUpdate) return true;
    if (this._fullElapsed === 0 && this._isReversed && !forceUpdate) return false;
    if (this._isPaused && !forceUpdate) return false;

    this.ignoreCallbacks = isStartupIteration || ignoreCallbacks;

    if (this._isReversed) {
      this._fullElapsed -= dt;
      this._elapsed -= dt;
    } else {
      this._fullElapsed += dt;
      this._elapsed += dt;
    }
    this.clampFullElapsed();

    this.startup();
    if (!this._hasStarted) this.onStart();

    const wasComplete = this._isComplete;
    const stepComplete = !this._isReversed && !wasComplete && this._elapsed >= this._duration;
    this.setLoops();
    this.setElapsed();
    this._isComplete = !this._isReversed && this._loops >= 0 && this._completedLoops >= this._loops;
    const complete = !wasComplete && this._isComplete;

    this.applyIncrementalLoops();

    const localTime = this._isLoopingBack ? this._duration - this._elapsed : this._elapsed;
    const snapshot = [...this.entries];
    // Members ahead of the playhead go back to their start first, so that
    // members behind it write last when they animate the same properties.
    for (let i = snapshot.length - 1; i >= 0; i--) {
      const item = snapshot[i];
      if (item.kind === 'member' && item.startTime > localTime) {
        item.member.goTo(localTime - item.startTime, { force: forceUpdate, ignoreCallbacks: true });
      }
    }
    for (const item of snapshot) {
      if (item.kind === 'member' && item.startTime <= localTime) {
        item.member.goTo(localTime - item.startTime, {
          force: forceUpdate,
          ignoreCallbacks: this.ignoreCallbacks
        });
      }
    }

    // A member can empty (and so kill) the sequence while updating
    if (this._destroyed) return true;

    this.fireProgressCallbacks(complete, stepComplete);
    this.ignoreCallbacks = false;
    this.prevFullElapsed = this._fullElapsed;
    return complete;
  }

  goTo(time: number, options: GoToOptions = {}): boolean {
    if (!this.enabled || this._destroyed) return false;
    time = Math.min(Math.max(time, 0), this._fullDuration);
    if (!options.force && this._fullElapsed === time) {
      if (!this._isComplete && options.play) this.play();
      return this._isComplete;
    }
    this._fullElapsed = time;
    this.update(0, true, false, options.ignoreCallbacks ?? false);
    if (!this._isComplete && options.play) this.play();
    return this._isComplete;
  }

  rewind(): void {
    this.doRewind(false);
  }

  restart(): void {
    if (this._fullElapsed === 0) {
      this.playForward();
    } else {
      this.doRewind(true);
    }
  }

  complete(): void {
    if (this.entries.length === 0) return;
    super.complete();
  }

  setIncremental(diff: number): void {
    for (const item of this.entries) {
      if (item.kind === 'member') item.member.setIncremental(diff);
    }
  }

  fillBindings(out: PropertyBinding<unknown>[]): void {
    for (const item of this.entries) {
      if (item.kind === 'member') item.member.fillBindings(out);
    }
  }

  isTweening(target: object): boolean {
    if (!this.enabled) return false;
    return this.members().some((member) => member.isTweening(target));
  }

  isLinkedTo(target: object): boolean {
    return this.members().some((member) => member.isLinkedTo(target));
  }

  getTargets(): object[] {
    const targets: object[] = [];
    for (const member of this.members()) {
      for (const target of member.getTargets()) {
        if (!targets.includes(target)) targets.push(target);
      }
    }
    return targets;
  }

  getTweensById(id: string): TweenComponent[] {
    const found: TweenComponent[] = this.id === id ? [this] : [];
    for (const member of this.members()) {
      found.push(...member.getTweensById(id));
    }
    return found;
  }

  protected setMuted(value: boolean): void {
    super.setMuted(value);
    for (const member of this.members()) {
      member.muted = value;
    }
  }

  protected startup(): void {
    if (this.startupDone) return;
    this.startupIteration();
    super.startup();
  }

  protected onKill(): void {
    const members = this.members();
    this.entries = [];
    for (const member of members) {
      member.kill(false);
    }
  }

  /**
   * Run every member to its end once, silently, then back to its start, so
   * that each one captures its start values in timeline order.
   */
  private startupIteration(): void {
    const wasMuted = this.muted;
    this.muted = true;
    const members = this.members();
    for (const member of members) {
      member.update(member.duration, true, true);
    }
    for (let i = members.length - 1; i >= 0; i--) {
      members[i].rewind();
    }
    this.muted = wasMuted;
  }

  private applyIncrementalLoops(): void {
    if (this._loopType === 'incremental') {
      if (this.prevCompletedLoops === this._completedLoops) return;
      let currLoops = this._completedLoops;
      if (this._loops >= 0 && currLoops >= this._loops) {
        --currLoops;
      }
      const diff = currLoops - this.prevCompletedLoops;
      if (diff !== 0) {
        this.setIncremental(diff);
        this.prevCompletedLoops = currLoops;
      }
    } else if (this.prevCompletedLoops !== 0) {
      this.setIncremental(-this.prevCompletedLoops);
      this.prevCompletedLoops = 0;
    }
  }

  private doRewind(play: boolean): void {
    if (!this.enabled || this._destroyed || this.entries.length === 0) return;
    this.startup();
    if (!this._hasStarted) this.onStart();

    this._isComplete = false;
    this._isLoopingBack = false;
    this._completedLoops = 0;
    this._fullElapsed = this._elapsed = 0;

    if (this.prevCompletedLoops !== 0) {
      this.setIncremental(-this.prevCompletedLoops);
      this.prevCompletedLoops = 0;
    }
    const members = this.members();
    for (let i = members.length - 1; i >= 0; i--) {
      members[i].rewind();
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

  private accept(member: Timeline): boolean {
    if (member === this) {
      warn('Sequence', 'a sequence cannot contain itself');
      return false;
    }
    if (member.isDestroyed) {
      warn('Sequence', 'cannot add a killed tween or sequence');
      return false;
    }
    for (let parent = this.container; parent; parent = parent instanceof TweenComponent ? parent.container : null) {
      if (parent === member) {
        warn('Sequence', 'cannot add a sequence to one of its own members');
        return false;
      }
    }

    if (member.container === this) {
      this.detach(member);
    }
    member.adopt(this);
    if (member.kind === 'tween' && member.speedBased) {
      member.resolveDuration();
    }
    return true;
  }

  private detach(member: TweenComponent): boolean {
    const index = this.entries.findIndex((item) => item.kind === 'member' && item.member === member);
    if (index === -1) return false;
    this.entries.splice(index, 1);
    return true;
  }

  private push(item: SequenceItem): number {
    this.entries.push(item);
    this._duration += itemDuration(item);
    this.setFullDuration();
    return this._duration;
  }

  private unshift(item: SequenceItem): number {
    const duration = itemDuration(item);
    for (const entry of this.entries) {
      entry.startTime += duration;
    }
    this.entries.unshift(item);
    this._duration += duration;
    this.setFullDuration();
    return this._duration;
  }

  private insertItem(item: SequenceItem): number {
    const index = this.entries.findIndex((entry) => entry.startTime >= item.startTime);
    if (index === -1) {
      this.entries.push(item);
    } else {
      this.entries.splice(index, 0, item);
    }
    this._duration = Math.max(this._duration, item.startTime + itemDuration(item));
    this.setFullDuration();
    return this._duration;
  }

  private checkTime(time: number): number {
    if (!(time >= 0)) {
      warn('Sequence', `invalid insertion time ${time}, using 0`);
      return 0;
    }
    return time;
  }

  private checkInterval(duration: number): number {
    if (!(duration >= 0)) {
      warn('Sequence', `invalid interval ${duration}, using 0`);
      return 0;
    }
    return duration;
  }

  private members(): Timeline[] {
    const members: Timeline[] = [];
    for (const item of this.entries) {
      if (item.kind === 'member') members.push(item.member);
    }
    return members;
  }
}
