import { describe, it, expect, afterEach } from 'vitest';
import { createTween, createSequence } from '../../src/create';
import { getDefaults, setDefaults, resetDefaults } from '../../src/config';
import { Ticker } from '../../src/Ticker';
import { NumberBinding } from '../../src/bindings';

describe('createTween / createSequence', () => {
  afterEach(() => {
    resetDefaults();
  });

  it('creates a playing tween registered with its scheduler', () => {
    const ticker = new Ticker();
    const target = { x: 0 };
    const tween = createTween(target, 1, { bindings: [new NumberBinding('x', 4)], ease: 'linear', scheduler: ticker });
    expect(tween.isPaused).toBe(false);
    expect(ticker.has(tween)).toBe(true);
    ticker.update(0.5);
    expect(target.x).toBe(2);
  });

  it('creates an empty paused sequence', () => {
    const seq = createSequence({ id: 'intro' });
    expect(seq.isPaused).toBe(true);
    expect(seq.isEmpty).toBe(true);
    expect(seq.duration).toBe(0);
    expect(seq.id).toBe('intro');
  });

  it('applies library defaults to unset options', () => {
    setDefaults({ loopType: 'yoyo', timeScale: 0.5, autoKill: false });
    const seq = createSequence();
    expect(seq.loopType).toBe('yoyo');
    expect(seq.timeScale).toBe(0.5);
    expect(seq.autoKillOnComplete).toBe(false);
  });

  it('restores factory defaults', () => {
    setDefaults({ ease: 'linear', arcLengthSubdivisions: 10 });
    resetDefaults();
    expect(getDefaults().ease).toBe('easeOutQuad');
    expect(getDefaults().arcLengthSubdivisions).toBe(100);
  });
});
