import * as THREE from 'three';
import { vector3Accessor } from '../accessors';
import { getDefaults } from '../config';
import { debugLog, warn } from '../debug';
import { SplinePath } from '../path/SplinePath';
import { PropertyBinding } from './PropertyBinding';
import type { BindingOptions } from './PropertyBinding';
import type { EaseInput } from '../easing';

/**
 * How an `Object3D` target is rotated while it moves along the path.
 */
export type PathOrientation =
  | { type: 'path' }
  | { type: 'position'; position: THREE.Vector3 }
  | { type: 'object'; object: THREE.Object3D };

export interface PathBindingOptions extends BindingOptions<THREE.Vector3> {
  /** Smoothly join the end of the path back to its start (for looping) */
  closed?: boolean;
  /** Move at constant speed instead of constant parameter rate (more expensive) */
  constantSpeed?: boolean;
  orientation?: PathOrientation;
  /** Arc-length table resolution for constant speed (default: from config) */
  subdivisions?: number;
  /** Look-ahead used by `{ type: 'path' }` orientation (default: from config) */
  lookAhead?: number;
}

/**
 * Animates a `THREE.Vector3` property through a list of waypoints on a
 * Catmull-Rom spline.
 *
 * @example
 * ```typescript
 * const binding = new PathBinding('position', [
 *   new THREE.Vector3(0, 0, 0),
 *   new THREE.Vector3(5, 2, 0),
 *   new THREE.Vector3(10, 0, 0)
 * ], { constantSpeed: true, orientation: { type: 'path' } });
 * ```
 */
export class PathBinding extends PropertyBinding<THREE.Vector3> {
  private readonly waypoints: THREE.Vector3[];
  private readonly options: PathBindingOptions;
  private readonly start = new THREE.Vector3();
  private readonly current = new THREE.Vector3();
  private partialPoints: THREE.Vector3[] | null = null;
  private _path: SplinePath | null = null;
  private _pathPercentage = 0;

  constructor(property: string, waypoints: THREE.Vector3[], options: PathBindingOptions = {}) {
    super(property, vector3Accessor, options);
    this.waypoints = waypoints.map((p) => p.clone());
    this.options = { ...options };
    if (waypoints.length === 0) {
      warn('PathBinding', `no waypoints given for "${property}"`);
    }
  }

  /** Spline built at startup; null before startup or for a zero-length path */
  get path(): SplinePath | null {
    return this._path;
  }

  /** Path parameter written by the last update */
  get pathPercentage(): number {
    return this._pathPercentage;
  }

  get isClosed(): boolean {
    return this.options.closed ?? false;
  }

  get hasAdditionalStartingPoint(): boolean {
    return this._path?.hasAdditionalStartingPoint ?? false;
  }

  get startValue(): THREE.Vector3 {
    return this.start.clone();
  }

  /**
   * Point at `t` with constant-speed spacing, building the arc-length table if needed.
   */
  getConstPointOnPath(t: number): THREE.Vector3 | null {
    const path = this._path;
    if (!path) return null;
    if (!path.hasArcLengthTable) {
      path.buildArcLengthTable(this.options.subdivisions ?? getDefaults().arcLengthSubdivisions);
    }
    return path.getPoint(path.getConstantSpeedPercentage(t));
  }

  /**
   * New binding running over `points` (control points, boundaries included)
   * with this binding's orientation and speed settings.
   */
  cloneForPartialPath(points: readonly THREE.Vector3[], ease: EaseInput): PathBinding {
    const clone = new PathBinding(this.property, this.waypoints, {
      ...this.options,
      ease,
      accessor: this.accessor
    });
    clone.partialPoints = points.map((p) => p.clone());
    return clone;
  }

  setIncremental(diff: number): void {
    const path = this._path;
    if (!path || this.isClosed) {
      return;
    }
    const offset = path.lastPoint.clone().sub(path.firstPoint).multiplyScalar(diff);
    this._path = path.translate(offset);
  }

  protected captureStartValue(value: THREE.Vector3): void {
    this.start.copy(value);
  }

  protected setChangeValue(): void {
    this._path = this.buildPath();
    if (this._path && this.options.constantSpeed) {
      this._path.buildArcLengthTable(this.options.subdivisions ?? getDefaults().arcLengthSubdivisions);
    }
  }

  protected getSpeedBasedDuration(speed: number): number {
    return this._path && speed > 0 ? this._path.length / speed : 0;
  }

  protected applyAt(elapsed: number): void {
    const path = this._path;
    if (!path) return;
    let perc = this.easeValue(elapsed, 0, 1);
    if (this.options.constantSpeed) {
      perc = path.getConstantSpeedPercentage(perc);
    }
    this.applyPercentage(path, perc);
  }

  protected applyStart(): void {
    if (this._path) {
      this.applyPercentage(this._path, 0);
    } else {
      this.write(this.current.copy(this.start));
    }
  }

  protected applyEnd(): void {
    if (this._path) {
      this.applyPercentage(this._path, 1);
    }
  }

  private buildPath(): SplinePath | null {
    if (this.partialPoints) {
      return new SplinePath(this.partialPoints);
    }

    const closed = this.isClosed;
    if (this.isRelative) {
      // Shift the whole path so its first waypoint lands on the current value
      if (this.waypoints.length + (closed ? 1 : 0) < 2) {
        warn('PathBinding', `zero-length path for "${this.property}"`);
        return null;
      }
      const diff = this.waypoints[0].clone().sub(this.start);
      return SplinePath.fromWaypoints(this.waypoints.map((p) => p.clone().sub(diff)), { closed });
    }

    const injectsStart = this.waypoints.length === 0 || !this.waypoints[0].equals(this.start);
    if (this.waypoints.length + (injectsStart ? 1 : 0) + (closed ? 1 : 0) < 2) {
      warn('PathBinding', `zero-length path for "${this.property}"`);
      return null;
    }
    const path = SplinePath.fromWaypoints(this.waypoints, { closed, start: this.start });
    debugLog(`PathBinding "${this.property}" built ${path.points.length} control points`);
    return path;
  }

  private applyPercentage(path: SplinePath, perc: number): void {
    // The path is only defined on [0, 1]
    perc = Math.min(Math.max(perc, 0), 1);
    this._pathPercentage = perc;
    path.getPoint(perc, this.current);
    this.write(this.current);
    this.orient(path, perc);
  }

  private orient(path: SplinePath, perc: number): void {
    const orientation = this.options.orientation;
    const target = this.owner?.target;
    if (!orientation || !(target instanceof THREE.Object3D)) {
      return;
    }
    switch (orientation.type) {
      case 'position':
        target.lookAt(orientation.position);
        break;
      case 'object':
        target.lookAt(orientation.object.getWorldPosition(new THREE.Vector3()));
        break;
      case 'path': {
        const nextT = perc + (this.options.lookAhead ?? getDefaults().lookAhead);
        if (nextT > 1) {
          // Nothing ahead: keep the last orientation
          break;
        }
        const next = path.getPoint(nextT);
        if (target.parent) {
          target.parent.localToWorld(next);
        }
        target.lookAt(next);
        break;
      }
    }
  }
}
