/**
 * Penner-style easing equations.
 *
 * Every function maps `(elapsed, start, change, duration)` to a value between
 * `start` and `start + change` (overshooting for elastic and back curves).
 */
export type EaseFunction = (t: number, b: number, c: number, d: number) => number;

const BACK_OVERSHOOT = 1.70158;

function bounceOut(t: number, b: number, c: number, d: number): number {
  if ((t /= d) < 1 / 2.75) {
    return c * (7.5625 * t * t) + b;
  }
  if (t < 2 / 2.75) {
    return c * (7.5625 * (t -= 1.5 / 2.75) * t + 0.75) + b;
  }
  if (t < 2.5 / 2.75) {
    return c * (7.5625 * (t -= 2.25 / 2.75) * t + 0.9375) + b;
  }
  return c * (7.5625 * (t -= 2.625 / 2.75) * t + 0.984375) + b;
}

function elasticIn(t: number, b: number, c: number, d: number): number {
  if (t === 0) return b;
  if ((t /= d) === 1) return b + c;
  const p = d * 0.3;
  const s = p / 4;
  return -(c * Math.pow(2, 10 * (t -= 1)) * Math.sin((t * d - s) * (2 * Math.PI) / p)) + b;
}

function elasticOut(t: number, b: number, c: number, d: number): number {
  if (t === 0) return b;
  if ((t /= d) === 1) return b + c;
  const p = d * 0.3;
  const s = p / 4;
  return c * Math.pow(2, -10 * t) * Math.sin((t * d - s) * (2 * Math.PI) / p) + c + b;
}

function elasticInOut(t: number, b: number, c: number, d: number): number {
  if (t === 0) return b;
  if ((t /= d / 2) === 2) return b + c;
  const p = d * (0.3 * 1.5);
  const s = p / 4;
  if (t < 1) {
    return -0.5 * (c * Math.pow(2, 10 * (t -= 1)) * Math.sin((t * d - s) * (2 * Math.PI) / p)) + b;
  }
  return c * Math.pow(2, -10 * (t -= 1)) * Math.sin((t * d - s) * (2 * Math.PI) / p) * 0.5 + c + b;
}

export const Ease = {
  linear: (t: number, b: number, c: number, d: number) => c * t / d + b,

  easeInSine: (t: number, b: number, c: number, d: number) =>
    -c * Math.cos(t / d * (Math.PI / 2)) + c + b,
  easeOutSine: (t: number, b: number, c: number, d: number) =>
    c * Math.sin(t / d * (Math.PI / 2)) + b,
  easeInOutSine: (t: number, b: number, c: number, d: number) =>
    -c / 2 * (Math.cos(Math.PI * t / d) - 1) + b,

  easeInQuad: (t: number, b: number, c: number, d: number) => c * (t /= d) * t + b,
  easeOutQuad: (t: number, b: number, c: number, d: number) => -c * (t /= d) * (t - 2) + b,
  easeInOutQuad: (t: number, b: number, c: number, d: number) =>
    (t /= d / 2) < 1 ? c / 2 * t * t + b : -c / 2 * ((--t) * (t - 2) - 1) + b,

  easeInCubic: (t: number, b: number, c: number, d: number) => c * (t /= d) * t * t + b,
  easeOutCubic: (t: number, b: number, c: number, d: number) =>
    c * ((t = t / d - 1) * t * t + 1) + b,
  easeInOutCubic: (t: number, b: number, c: number, d: number) =>
    (t /= d / 2) < 1 ? c / 2 * t * t * t + b : c / 2 * ((t -= 2) * t * t + 2) + b,

  easeInQuart: (t: number, b: number, c: number, d: number) => c * (t /= d) * t * t * t + b,
  easeOutQuart: (t: number, b: number, c: number, d: number) =>
    -c * ((t = t / d - 1) * t * t * t - 1) + b,
  easeInOutQuart: (t: number, b: number, c: number, d: number) =>
    (t /= d / 2) < 1 ? c / 2 * t * t * t * t + b : -c / 2 * ((t -= 2) * t * t * t - 2) + b,

  easeInQuint: (t: number, b: number, c: number, d: number) => c * (t /= d) * t * t * t * t + b,
  easeOutQuint: (t: number, b: number, c: number, d: number) =>
    c * ((t = t / d - 1) * t * t * t * t + 1) + b,
  easeInOutQuint: (t: number, b: number, c: number, d: number) =>
    (t /= d / 2) < 1 ? c / 2 * t * t * t * t * t + b : c / 2 * ((t -= 2) * t * t * t * t + 2) + b,

  easeInExpo: (t: number, b: number, c: number, d: number) =>
    t === 0 ? b : c * Math.pow(2, 10 * (t / d - 1)) + b,
  easeOutExpo: (t: number, b: number, c: number, d: number) =>
    t === d ? b + c : c * (-Math.pow(2, -10 * t / d) + 1) + b,
  easeInOutExpo: (t: number, b: number, c: number, d: number) => {
    if (t === 0) return b;
    if (t === d) return b + c;
    if ((t /= d / 2) < 1) return c / 2 * Math.pow(2, 10 * (t - 1)) + b;
    return c / 2 * (-Math.pow(2, -10 * --t) + 2) + b;
  },

  easeInCirc: (t: number, b: number, c: number, d: number) =>
    -c * (Math.sqrt(1 - (t /= d) * t) - 1) + b,
  easeOutCirc: (t: number, b: number, c: number, d: number) =>
    c * Math.sqrt(1 - (t = t / d - 1) * t) + b,
  easeInOutCirc: (t: number, b: number, c: number, d: number) =>
    (t /= d / 2) < 1
      ? -c / 2 * (Math.sqrt(1 - t * t) - 1) + b
      : c / 2 * (Math.sqrt(1 - (t -= 2) * t) + 1) + b,

  easeInElastic: elasticIn,
  easeOutElastic: elasticOut,
  easeInOutElastic: elasticInOut,

  easeInBack: (t: number, b: number, c: number, d: number) =>
    c * (t /= d) * t * ((BACK_OVERSHOOT + 1) * t - BACK_OVERSHOOT) + b,
  easeOutBack: (t: number, b: number, c: number, d: number) =>
    c * ((t = t / d - 1) * t * ((BACK_OVERSHOOT + 1) * t + BACK_OVERSHOOT) + 1) + b,
  easeInOutBack: (t: number, b: number, c: number, d: number) => {
    const s = BACK_OVERSHOOT * 1.525;
    if ((t /= d / 2) < 1) return c / 2 * (t * t * ((s + 1) * t - s)) + b;
    return c / 2 * ((t -= 2) * t * ((s + 1) * t + s) + 2) + b;
  },

  easeInBounce: (t: number, b: number, c: number, d: number) => c - bounceOut(d - t, 0, c, d) + b,
  easeOutBounce: bounceOut,
  easeInOutBounce: (t: number, b: number, c: number, d: number) =>
    t < d / 2
      ? (c - bounceOut(d - t * 2, 0, c, d)) * 0.5 + b
      : bounceOut(t * 2 - d, 0, c, d) * 0.5 + c * 0.5 + b
} satisfies Record<string, EaseFunction>;

export type EaseType = keyof typeof Ease;

/** A named curve, or a custom function (which has no inverse). */
export type EaseInput = EaseType | EaseFunction;

export function isEaseType(value: string): value is EaseType {
  return Object.prototype.hasOwnProperty.call(Ease, value);
}

/**
 * The curve used on the return pass of a yoyoInverse loop:
 * `easeInX` <-> `easeOutX`; `inOut` curves and `linear` map to themselves.
 */
export function inverseEase(type: EaseType): EaseType {
  let inverse: string = type;
  if (type.startsWith('easeInOut')) {
    return type;
  } else if (type.startsWith('easeIn')) {
    inverse = 'easeOut' + type.slice('easeIn'.length);
  } else if (type.startsWith('easeOut')) {
    inverse = 'easeIn' + type.slice('easeOut'.length);
  }
  return isEaseType(inverse) ? inverse : type;
}

export function resolveEase(input: EaseInput): EaseFunction {
  return typeof input === 'function' ? input : Ease[input];
}
