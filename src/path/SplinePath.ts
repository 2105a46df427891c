import * as THREE from 'three';
import { warn } from '../debug';

export interface SplinePathOptions {
  /** Join the last waypoint back to the first with a smooth segment */
  closed?: boolean;
  /** Current position; injected as the first point when it differs from the first waypoint */
  start?: THREE.Vector3;
}

/**
 * Catmull-Rom spline through a list of 3D control points.
 *
 * The first and last control points are never reached: they only shape the
 * curvature of the first and last segments. `fromWaypoints` adds them for you.
 */
export class SplinePath {
  readonly points: readonly THREE.Vector3[];

  /** Whether the first real point was injected from the `start` option */
  readonly hasAdditionalStartingPoint: boolean;

  private arcLengths: number[] = [];
  private segmentLengths: number[] | null = null;
  private totalLength = -1;

  constructor(points: readonly THREE.Vector3[], hasAdditionalStartingPoint = false) {
    if (points.length < 4) {
      throw new Error(`SplinePath requires at least 4 control points, got ${points.length}`);
    }
    this.points = points.map((p) => p.clone());
    this.hasAdditionalStartingPoint = hasAdditionalStartingPoint;
  }

  /**
   * Build a path that passes through every waypoint, adding the boundary
   * control points (and the closing segment for closed paths).
   */
  static fromWaypoints(
    waypoints: readonly THREE.Vector3[],
    options: SplinePathOptions = {}
  ): SplinePath {
    const real = waypoints.map((p) => p.clone());
    let injected = false;
    if (options.start && (real.length === 0 || !real[0].equals(options.start))) {
      real.unshift(options.start.clone());
      injected = true;
    }
    if (options.closed && real.length > 0) {
      real.push(real[0].clone());
    }
    if (real.length < 2) {
      throw new Error(`SplinePath needs at least 2 distinct waypoints, got ${real.length}`);
    }

    let first: THREE.Vector3;
    let last: THREE.Vector3;
    if (options.closed) {
      first = real[real.length - 2].clone();
      last = real[1].clone();
    } else {
      first = real[0].clone();
      const lastReal = real[real.length - 1];
      last = lastReal.clone().add(lastReal.clone().sub(real[real.length - 2]));
    }

    return new SplinePath([first, ...real, last], injected);
  }

  get segmentCount(): number {
    return this.points.length - 3;
  }

  /** First point the path actually passes through */
  get firstPoint(): THREE.Vector3 {
    return this.points[1];
  }

  /** Last point the path actually passes through */
  get lastPoint(): THREE.Vector3 {
    return this.points[this.points.length - 2];
  }

  private locate(t: number): { index: number; u: number } {
    const sections = this.segmentCount;
    const scaled = t * sections;
    const index = Math.min(Math.max(Math.floor(scaled), 0), sections - 1);
    return { index, u: scaled - index };
  }

  /**
   * Position at parameter `t` in [0, 1].
   */
  getPoint(t: number, target = new THREE.Vector3()): THREE.Vector3 {
    const { index, u } = this.locate(t);
    const a = this.points[index];
    const b = this.points[index + 1];
    const c = this.points[index + 2];
    const d = this.points[index + 3];
    const u2 = u * u;
    const u3 = u2 * u;

    const blend = (pa: number, pb: number, pc: number, pd: number): number =>
      0.5 * (
        (-pa + 3 * pb - 3 * pc + pd) * u3 +
        (2 * pa - 5 * pb + 4 * pc - pd) * u2 +
        (-pa + pc) * u +
        2 * pb
      );

    return target.set(
      blend(a.x, b.x, c.x, d.x),
      blend(a.y, b.y, c.y, d.y),
      blend(a.z, b.z, c.z, d.z)
    );
  }

  /**
   * Derivative of the position with respect to the local segment parameter.
   */
  getVelocity(t: number, target = new THREE.Vector3()): THREE.Vector3 {
    const { index, u } = this.locate(t);
    const a = this.points[index];
    const b = this.points[index + 1];
    const c = this.points[index + 2];
    const d = this.points[index + 3];
    const u2 = u * u;

    const derive = (pa: number, pb: number, pc: number, pd: number): number =>
      1.5 * (-pa + 3 * pb - 3 * pc + pd) * u2 +
      (2 * pa - 5 * pb + 4 * pc - pd) * u +
      0.5 * pc - 0.5 * pa;

    return target.set(
      derive(a.x, b.x, c.x, d.x),
      derive(a.y, b.y, c.y, d.y),
      derive(a.z, b.z, c.z, d.z)
    );
  }

  /**
   * Sample the path into `subdivisions` equal parameter steps and store each
   * step's share of the total length. Required by getConstantSpeedPercentage.
   */
  buildArcLengthTable(subdivisions = 100): readonly number[] {
    const lengths = new Array<number>(subdivisions);
    const prev = this.getPoint(0);
    const curr = new THREE.Vector3();
    let total = 0;
    for (let i = 1; i <= subdivisions; i++) {
      this.getPoint(i / subdivisions, curr);
      const len = curr.distanceTo(prev);
      lengths[i - 1] = len;
      total += len;
      prev.copy(curr);
    }

    if (total === 0) {
      warn('SplinePath', 'cannot build an arc-length table for a zero-length path');
      this.arcLengths = [];
      return this.arcLengths;
    }

    this.arcLengths = lengths.map((len) => len / total);
    return this.arcLengths;
  }

  get arcLengthPercentages(): readonly number[] {
    return this.arcLengths;
  }

  get hasArcLengthTable(): boolean {
    return this.arcLengths.length > 0;
  }

  /**
   * Convert a time-based percentage into the path parameter that covers the
   * same share of the path's length. Approximated linearly inside each bucket
   * of the arc-length table; values outside (0, 1) pass through.
   */
  getConstantSpeedPercentage(t: number): number {
    const table = this.arcLengths;
    if (table.length === 0 || t <= 0 || t >= 1) {
      return t;
    }
    const bucket = 1 / table.length;
    let cumulative = 0;
    for (let i = 0; i < table.length; i++) {
      const share = table[i];
      if (cumulative + share > t) {
        return i * bucket + bucket * ((t - cumulative) / share);
      }
      cumulative += share;
    }
    return t;
  }

  /**
   * Approximate length of each segment (between consecutive real points).
   */
  getSegmentLengths(subdivisionsPerSegment = 16): readonly number[] {
    if (this.segmentLengths) {
      return this.segmentLengths;
    }
    const sections = this.segmentCount;
    const lengths: number[] = [];
    const prev = new THREE.Vector3();
    const curr = new THREE.Vector3();
    for (let s = 0; s < sections; s++) {
      let len = 0;
      this.getPoint(s / sections, prev);
      for (let i = 1; i <= subdivisionsPerSegment; i++) {
        this.getPoint((s + i / subdivisionsPerSegment) / sections, curr);
        len += curr.distanceTo(prev);
        prev.copy(curr);
      }
      lengths.push(len);
    }
    this.segmentLengths = lengths;
    this.totalLength = lengths.reduce((sum, len) => sum + len, 0);
    return lengths;
  }

  get length(): number {
    if (this.totalLength < 0) {
      this.getSegmentLengths();
    }
    return this.totalLength;
  }

  /**
   * Share of the total length between two control-point indices
   * (both must be real points, `1 <= id0 < id1 <= points.length - 2`).
   */
  getWaypointsLengthPercentage(id0: number, id1: number): number {
    const lengths = this.getSegmentLengths();
    const total = this.length;
    if (total === 0) {
      return 0;
    }
    let partial = 0;
    for (let i = id0; i < id1; i++) {
      partial += lengths[i - 1] ?? 0;
    }
    return Math.min(partial / total, 1);
  }

  /**
   * Copy of this path moved by `offset`. The arc-length table carries over
   * since translation does not change lengths.
   */
  translate(offset: THREE.Vector3): SplinePath {
    const moved = new SplinePath(
      this.points.map((p) => p.clone().add(offset)),
      this.hasAdditionalStartingPoint
    );
    moved.arcLengths = this.arcLengths;
    moved.segmentLengths = this.segmentLengths;
    moved.totalLength = this.totalLength;
    return moved;
  }
}
