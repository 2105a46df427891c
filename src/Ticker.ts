import { EventEmitter } from './EventEmitter';
import { debugLog, warn } from './debug';
import type { TweenComponent } from './TweenComponent';
import type { TweenScheduler } from './types';

type TickerEvents = {
  start: [];
  stop: [];
  /** Seconds elapsed since the previous frame, before time scaling */
  tick: [number];
};

/**
 * Frame loop driving root tweens and sequences.
 *
 * `start()` ties it to `requestAnimationFrame`; without a DOM (tests, servers)
 * call `update(dt)` from your own loop instead. Each component advances by
 * `dt * component.timeScale`, and completed components with
 * `autoKillOnComplete` are killed and dropped.
 */
export class Ticker extends EventEmitter<TickerEvents> implements TweenScheduler {
  private components: TweenComponent[] = [];
  private running = false;
  private rafId: number | null = null;
  private lastTimestamp = 0;

  get size(): number {
    return this.components.length;
  }

  get isRunning(): boolean {
    return this.running;
  }

  add(component: TweenComponent): void {
    if (!this.components.includes(component)) {
      this.components.push(component);
    }
  }

  remove(component: TweenComponent): void {
    const index = this.components.indexOf(component);
    if (index !== -1) {
      this.components.splice(index, 1);
    }
  }

  has(component: TweenComponent): boolean {
    return this.components.includes(component);
  }

  /**
   * Advance every registered component by `dt` seconds.
   */
  update(dt: number): void {
    this.emit('tick', dt);
    // Components can add or kill others from their callbacks
    for (const component of [...this.components]) {
      if (component.isDestroyed) {
        this.remove(component);
        continue;
      }
      const complete = component.advance(dt * component.timeScale);
      if (component.isDestroyed) {
        this.remove(component);
      } else if (complete && component.autoKillOnComplete) {
        component.kill();
      }
    }
  }

  start(): void {
    if (this.running) return;
    if (typeof requestAnimationFrame !== 'function') {
      warn('Ticker', 'requestAnimationFrame is not available, call update(dt) instead');
      return;
    }
    this.running = true;
    this.lastTimestamp = 0;
    this.rafId = requestAnimationFrame((ts) => this.tick(ts));
    debugLog('Ticker started');
    this.emit('start');
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.rafId !== null) {
      cancelAnimationFrame(this.rafId);
      this.rafId = null;
    }
    this.emit('stop');
  }

  /**
   * Stop the loop and kill every registered component.
   */
  dispose(): void {
    this.stop();
    for (const component of [...this.components]) {
      component.kill();
    }
    this.components = [];
    this.removeAllListeners();
  }

  private tick(timestamp: number): void {
    if (!this.running) return;

    if (this.lastTimestamp === 0) {
      this.lastTimestamp = timestamp;
    }
    const dtMs = timestamp - this.lastTimestamp;
    this.lastTimestamp = timestamp;

    this.update(dtMs / 1000);

    if (this.running) {
      this.rafId = requestAnimationFrame((ts) => this.tick(ts));
    }
  }
}
