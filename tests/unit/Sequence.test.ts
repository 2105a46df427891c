import { describe, it, expect, vi, afterEach } from 'vitest';
import { Sequence } from '../../src/Sequence';
import { Tween } from '../../src/Tween';
import { Ticker } from '../../src/Ticker';
import { NumberBinding } from '../../src/bindings';
import type { PropertyBinding } from '../../src/bindings';
import type { TweenOptions } from '../../src/Tween';

interface Values {
  [key: string]: number;
}

function tweenOf(
  target: Values,
  property: string,
  end: number,
  duration: number,
  options: Partial<TweenOptions<Values>> = {}
): Tween<Values> {
  return new Tween(target, duration, {
    bindings: [new NumberBinding(property, end)],
    ease: 'linear',
    ...options
  });
}

function startTimes(seq: Sequence): number[] {
  return seq.items.map((item) => item.startTime);
}

describe('Sequence', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('building', () => {
    it('appends members one after the other', () => {
      const target: Values = { a: 0, b: 0, c: 0 };
      const seq = new Sequence();
      expect(seq.append(tweenOf(target, 'a', 1, 1))).toBe(1);
      expect(seq.append(tweenOf(target, 'b', 1, 2))).toBe(3);
      expect(seq.append(tweenOf(target, 'c', 1, 3))).toBe(6);
      expect(startTimes(seq)).toEqual([0, 1, 3]);
      expect(seq.duration).toBe(6);
      expect(seq.fullDuration).toBe(6);
    });

    it('shifts existing items when prepending', () => {
      const target: Values = { a: 0, b: 0 };
      const seq = new Sequence();
      seq.append(tweenOf(target, 'a', 1, 1));
      seq.appendInterval(2);
      expect(seq.prepend(tweenOf(target, 'b', 1, 0.5))).toBe(3.5);
      expect(startTimes(seq)).toEqual([0, 0.5, 1.5]);
      expect(seq.prependInterval(1)).toBe(4.5);
      expect(startTimes(seq)).toEqual([0, 1, 1.5, 2.5]);
    });

    it('inserts in start-time order', () => {
      const target: Values = { a: 0, b: 0, c: 0, d: 0 };
      const seq = new Sequence();
      seq.append(tweenOf(target, 'a', 1, 1));
      seq.append(tweenOf(target, 'b', 1, 2));
      seq.append(tweenOf(target, 'c', 1, 3));
      expect(seq.insert(2, tweenOf(target, 'd', 1, 1))).toBe(6);
      expect(startTimes(seq)).toEqual([0, 1, 2, 3]);
      expect(seq.insertInterval(5.5, 1)).toBe(6.5);
      expect(startTimes(seq)).toEqual([0, 1, 2, 3, 5.5]);
    });

    it('clamps negative insertion times to 0', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const seq = new Sequence();
      seq.insert(-1, tweenOf({ a: 0 }, 'a', 1, 1));
      expect(startTimes(seq)).toEqual([0]);
      expect(warn).toHaveBeenCalledWith('Sequence: invalid insertion time -1, using 0');
    });

    it('takes members away from their scheduler', () => {
      const ticker = new Ticker();
      const tween = tweenOf({ a: 0 }, 'a', 1, 1, { scheduler: ticker });
      const seq = new Sequence({ scheduler: ticker });
      expect(ticker.has(tween)).toBe(true);
      seq.append(tween);
      expect(ticker.has(tween)).toBe(false);
      expect(ticker.has(seq)).toBe(true);
      expect(tween.isSequenced).toBe(true);
    });

    it('moves a member out of its previous sequence', () => {
      const target: Values = { a: 0, b: 0 };
      const first = new Sequence();
      const second = new Sequence();
      const moved = tweenOf(target, 'a', 1, 1);
      first.append(moved);
      first.append(tweenOf(target, 'b', 1, 1));
      second.append(moved);
      expect(first.items).toHaveLength(1);
      expect(second.items).toHaveLength(1);
      expect(moved.container).toBe(second);
    });

    it('refuses itself, its ancestors and killed members', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const outer = new Sequence();
      const inner = new Sequence();
      inner.append(tweenOf({ a: 0 }, 'a', 1, 1));
      outer.append(inner);

      outer.append(outer);
      expect(warn).toHaveBeenLastCalledWith('Sequence: a sequence cannot contain itself');
      inner.append(outer);
      expect(warn).toHaveBeenLastCalledWith('Sequence: cannot add a sequence to one of its own members');
      const dead = tweenOf({ a: 0 }, 'a', 1, 1);
      dead.kill();
      outer.append(dead);
      expect(warn).toHaveBeenLastCalledWith('Sequence: cannot add a killed tween or sequence');
      expect(outer.items).toHaveLength(1);
    });

    it('computes the duration of speed-based members before placing them', () => {
      const seq = new Sequence();
      // 10 units at 5 units per second
      seq.append(tweenOf({ a: 0 }, 'a', 10, 5, { speedBased: true }));
      expect(seq.duration).toBe(2);
    });
  });

  describe('playback', () => {
    it('starts paused', () => {
      const target: Values = { a: 0 };
      const seq = new Sequence();
      seq.append(tweenOf(target, 'a', 10, 1));
      expect(seq.isPaused).toBe(true);
      expect(seq.advance(0.5)).toBe(false);
      expect(target.a).toBe(0);
    });

    it('drives members from their start offsets', () => {
      const target: Values = { a: 0, b: 0 };
      const onComplete = vi.fn();
      const seq = new Sequence({ onComplete });
      seq.append(tweenOf(target, 'a', 10, 1));
      seq.append(tweenOf(target, 'b', 10, 2));
      seq.play();

      expect(seq.advance(1.5)).toBe(false);
      expect(target.a).toBe(10);
      expect(target.b).toBe(2.5);

      expect(seq.advance(1.5)).toBe(true);
      expect(target.b).toBe(10);
      expect(onComplete).toHaveBeenCalledTimes(1);
    });

    it('lets later members start from where earlier ones left a shared property', () => {
      const target: Values = { x: 0 };
      const seq = new Sequence();
      seq.append(tweenOf(target, 'x', 10, 1));
      seq.append(tweenOf(target, 'x', 20, 1));
      seq.play();
      seq.advance(1.5);
      expect(target.x).toBe(15);
    });

    it('fires member callbacks only once the sequence really plays them', () => {
      const target: Values = { a: 0 };
      const onStart = vi.fn();
      const onComplete = vi.fn();
      const seq = new Sequence();
      seq.append(tweenOf(target, 'a', 10, 1, { onStart, onComplete }));
      seq.play();
      seq.advance(0.5);
      expect(onStart).toHaveBeenCalledTimes(1);
      expect(onComplete).not.toHaveBeenCalled();
      seq.advance(0.5);
      expect(onComplete).toHaveBeenCalledTimes(1);
    });

    it('resets members ahead of the playhead when going back', () => {
      const target: Values = { a: 0, b: 0 };
      const seq = new Sequence();
      seq.append(tweenOf(target, 'a', 10, 1));
      seq.append(tweenOf(target, 'b', 10, 2));
      seq.play();
      seq.advance(2);
      expect(target.b).toBe(5);

      seq.seek(0.5);
      expect(target.a).toBe(5);
      expect(target.b).toBe(0);
    });

    it('plays backwards through its members', () => {
      const target: Values = { a: 0, b: 0 };
      const seq = new Sequence({ autoKill: false });
      seq.append(tweenOf(target, 'a', 10, 1));
      seq.append(tweenOf(target, 'b', 10, 2));
      seq.play();
      seq.advance(3);
      seq.playBackwards();
      seq.advance(1);
      expect(target.b).toBe(5);
      expect(target.a).toBe(10);
      expect(seq.isComplete).toBe(false);
    });

    it('resets members behind the playhead when reversed past their start', () => {
      const target: Values = { a: 0, b: 0, c: 0 };
      const seq = new Sequence();
      seq.append(tweenOf(target, 'a', 10, 1));
      seq.append(tweenOf(target, 'b', 10, 2));
      seq.append(tweenOf(target, 'c', 10, 3));
      seq.play();
      seq.advance(4);
      expect(target.c).toBeCloseTo(10 / 3, 10);

      seq.reverse();
      seq.advance(1.5);
      expect(seq.fullElapsed).toBe(2.5);
      expect(target.a).toBe(10);
      expect(target.b).toBe(7.5);
      expect(target.c).toBe(0);
    });

    it('fires stepcomplete at each loop boundary but the last', () => {
      const target: Values = { a: 0 };
      const onStepComplete = vi.fn();
      const onComplete = vi.fn();
      const seq = new Sequence({ loops: 3, onStepComplete, onComplete });
      seq.append(tweenOf(target, 'a', 10, 1));
      seq.play();
      seq.advance(0.9);
      expect(onStepComplete).not.toHaveBeenCalled();
      seq.advance(0.2);
      expect(onStepComplete).toHaveBeenCalledTimes(1);
      seq.advance(1);
      expect(seq.completedLoops).toBe(2);
      expect(onStepComplete).toHaveBeenCalledTimes(2);
      expect(seq.advance(1)).toBe(true);
      expect(onStepComplete).toHaveBeenCalledTimes(2);
      expect(onComplete).toHaveBeenCalledTimes(1);
    });

    it('plays yoyo loops back through its members', () => {
      const target: Values = { a: 0 };
      const seq = new Sequence({ loops: 2, loopType: 'yoyo' });
      seq.append(tweenOf(target, 'a', 10, 1));
      seq.play();
      seq.advance(1.25);
      expect(seq.isLoopingBack).toBe(true);
      expect(target.a).toBe(7.5);
      expect(seq.advance(0.75)).toBe(true);
      expect(target.a).toBe(0);
    });

    it('shifts members on incremental loops', () => {
      const target: Values = { a: 0 };
      const seq = new Sequence({ loops: 3, loopType: 'incremental' });
      seq.append(tweenOf(target, 'a', 10, 1));
      seq.play();
      seq.advance(1.5);
      expect(target.a).toBe(15);
    });

    it('drops incremental shifts when rewound', () => {
      const target: Values = { a: 0 };
      const seq = new Sequence({ loops: 3, loopType: 'incremental' });
      seq.append(tweenOf(target, 'a', 10, 1));
      seq.play();
      seq.advance(1.5);
      seq.rewind();
      expect(target.a).toBe(0);
      seq.play();
      seq.advance(0.5);
      expect(target.a).toBe(5);
    });

    it('plays nested sequences', () => {
      const target: Values = { a: 0, b: 0 };
      const inner = new Sequence();
      inner.append(tweenOf(target, 'b', 10, 1));
      const outer = new Sequence();
      outer.append(tweenOf(target, 'a', 10, 1));
      outer.append(inner);
      expect(outer.duration).toBe(2);
      outer.play();
      outer.advance(1.5);
      expect(target.a).toBe(10);
      expect(target.b).toBe(5);
    });

    it('ignores empty intervals', () => {
      const target: Values = { a: 0, b: 0 };
      const seq = new Sequence();
      seq.append(tweenOf(target, 'a', 10, 1));
      seq.appendInterval(1);
      seq.append(tweenOf(target, 'b', 10, 1));
      seq.play();
      seq.advance(1.5);
      expect(target.b).toBe(0);
      seq.advance(1);
      expect(target.b).toBe(5);
    });

    it('rewinds and restarts', () => {
      const target: Values = { a: 0 };
      const onRewound = vi.fn();
      const seq = new Sequence({ onRewound });
      seq.append(tweenOf(target, 'a', 10, 2));
      seq.play();
      seq.advance(1);
      seq.rewind();
      expect(target.a).toBe(0);
      expect(seq.isPaused).toBe(true);
      expect(onRewound).toHaveBeenCalledTimes(1);
      seq.restart();
      expect(seq.isPaused).toBe(false);
      seq.advance(1);
      expect(target.a).toBe(5);
    });

    it('completes at once', () => {
      const target: Values = { a: 0, b: 0 };
      const seq = new Sequence({ autoKill: false });
      seq.append(tweenOf(target, 'a', 10, 1));
      seq.append(tweenOf(target, 'b', 10, 1));
      seq.complete();
      expect(target.a).toBe(10);
      expect(target.b).toBe(10);
      expect(seq.isComplete).toBe(true);
    });
  });

  describe('lifetime', () => {
    it('is complete when empty', () => {
      expect(new Sequence().advance(1)).toBe(true);
    });

    it('kills its members when killed', () => {
      const target: Values = { a: 0, b: 0 };
      const a = tweenOf(target, 'a', 1, 1);
      const b = tweenOf(target, 'b', 1, 1);
      const seq = new Sequence();
      seq.append(a);
      seq.append(b);
      seq.kill();
      expect(a.isDestroyed).toBe(true);
      expect(b.isDestroyed).toBe(true);
      expect(seq.items).toEqual([]);
    });

    it('kills itself once its last member is gone', () => {
      const target: Values = { a: 0, b: 0 };
      const a = tweenOf(target, 'a', 1, 1);
      const b = tweenOf(target, 'b', 1, 1);
      const seq = new Sequence();
      seq.append(a);
      seq.append(b);
      seq.remove(a);
      expect(a.container).toBeNull();
      expect(seq.isDestroyed).toBe(false);
      expect(seq.duration).toBe(2);
      b.kill();
      expect(seq.isDestroyed).toBe(true);
    });

    it('leaves its own parent when it dies', () => {
      const target: Values = { a: 0, b: 0 };
      const inner = new Sequence();
      inner.append(tweenOf(target, 'a', 1, 1));
      const outer = new Sequence();
      outer.append(inner);
      outer.append(tweenOf(target, 'b', 1, 1));
      inner.kill();
      expect(outer.items).toHaveLength(1);
      expect(outer.isDestroyed).toBe(false);
    });

    it('stops when a member target dies mid-update', () => {
      const target: Values = { a: 0 };
      let alive = true;
      const seq = new Sequence();
      seq.append(tweenOf(target, 'a', 10, 2, { isTargetAlive: () => alive }));
      seq.play();
      seq.advance(1);
      alive = false;
      expect(seq.advance(0.5)).toBe(true);
      expect(seq.isDestroyed).toBe(true);
    });
  });

  describe('queries', () => {
    it('reports targets, bindings and ids across members', () => {
      const first: Values = { a: 0 };
      const second: Values = { b: 0 };
      const seq = new Sequence({ id: 'intro' });
      seq.append(tweenOf(first, 'a', 1, 1, { id: 'fade' }));
      seq.append(tweenOf(second, 'b', 1, 1));
      seq.append(tweenOf(first, 'a', 2, 1));

      expect(seq.getTargets()).toEqual([first, second]);
      expect(seq.isLinkedTo(second)).toBe(true);
      expect(seq.isLinkedTo({})).toBe(false);
      expect(seq.getTweensById('intro')).toEqual([seq]);
      expect(seq.getTweensById('fade')).toHaveLength(1);

      const bindings: PropertyBinding<unknown>[] = [];
      seq.fillBindings(bindings);
      expect(bindings.map((b) => b.property)).toEqual(['a', 'b', 'a']);
    });

    it('reports tweening from its members\' own play state', () => {
      const target: Values = { a: 0 };
      const seq = new Sequence();
      seq.append(tweenOf(target, 'a', 1, 1));
      // Members handed to a sequence keep their own play state
      expect(seq.isTweening(target)).toBe(true);
      seq.enabled = false;
      expect(seq.isTweening(target)).toBe(false);
      seq.enabled = true;

      // Startup rewinds members, which pauses them while the sequence drives them
      seq.play();
      seq.advance(0.5);
      expect(target.a).toBe(0.5);
      expect(seq.isTweening(target)).toBe(false);
    });
  });
});
