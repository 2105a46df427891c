/**
 * tweenline - tweens, sequences and spline paths for three.js objects
 *
 * @module tweenline
 * @license MIT
 */

import * as THREE from 'three';
import { TweenComponent } from './TweenComponent';
import { Tween } from './Tween';
import { Sequence } from './Sequence';
import { Ticker } from './Ticker';
import { createTween, createSequence } from './create';
import { Ease, inverseEase, resolveEase, isEaseType } from './easing';
import { SplinePath } from './path/SplinePath';
import { PropertyBinding, NumberBinding, Vector3Binding, ColorBinding, PathBinding } from './bindings';
import { numberAccessor, vector3Accessor, colorAccessor, accessor } from './accessors';
import { getDefaults, setDefaults, resetDefaults } from './config';
import { debugLog, setDebug } from './debug';
import { EventEmitter } from './EventEmitter';

export {
  THREE,
  TweenComponent,
  Tween,
  Sequence,
  Ticker,
  createTween,
  createSequence,
  Ease,
  inverseEase,
  resolveEase,
  isEaseType,
  SplinePath,
  PropertyBinding,
  NumberBinding,
  Vector3Binding,
  ColorBinding,
  PathBinding,
  numberAccessor,
  vector3Accessor,
  colorAccessor,
  accessor,
  getDefaults,
  setDefaults,
  resetDefaults,
  debugLog,
  setDebug,
  EventEmitter
};

export type { TweenContainer, GoToOptions } from './TweenComponent';
export type { TweenOptions } from './Tween';
export type { SequenceOptions, SequenceItem } from './Sequence';
export type { EaseFunction, EaseType, EaseInput } from './easing';
export type { SplinePathOptions } from './path/SplinePath';
export type { BindingOptions, PathBindingOptions, PathOrientation } from './bindings';
export type { TweenDefaults } from './config';
export type { EventMap, EventListener, UnsubscribeFn } from './EventEmitter';
export type {
  Timeline,
  LoopType,
  PropertyAccessor,
  TweenScheduler,
  OverwriteArbiter,
  BindingOwner,
  ComponentCallback,
  TimelineEvents,
  TimelineOptions
} from './types';
