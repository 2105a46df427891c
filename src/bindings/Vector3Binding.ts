import * as THREE from 'three';
import { vector3Accessor } from '../accessors';
import { PropertyBinding } from './PropertyBinding';
import type { BindingOptions } from './PropertyBinding';

/**
 * Animates a `THREE.Vector3` property along a straight line.
 */
export class Vector3Binding extends PropertyBinding<THREE.Vector3> {
  private readonly endInput: THREE.Vector3;
  private readonly start = new THREE.Vector3();
  private readonly change = new THREE.Vector3();
  private readonly current = new THREE.Vector3();

  constructor(property: string, end: THREE.Vector3, options: BindingOptions<THREE.Vector3> = {}) {
    super(property, vector3Accessor, options);
    this.endInput = end.clone();
  }

  get startValue(): THREE.Vector3 {
    return this.start.clone();
  }

  get endValue(): THREE.Vector3 {
    return this.start.clone().add(this.change);
  }

  setIncremental(diff: number): void {
    this.start.addScaledVector(this.change, diff);
  }

  protected captureStartValue(value: THREE.Vector3): void {
    this.start.copy(value);
  }

  protected setChangeValue(): void {
    if (this.isRelative) {
      this.change.copy(this.endInput);
    } else {
      this.change.subVectors(this.endInput, this.start);
    }
  }

  protected getSpeedBasedDuration(speed: number): number {
    return speed > 0 ? this.change.length() / speed : 0;
  }

  protected applyAt(elapsed: number): void {
    // One eased factor for all axes, so overshooting eases stay on the line
    const factor = this.easeValue(elapsed, 0, 1);
    this.write(this.current.copy(this.start).addScaledVector(this.change, factor));
  }

  protected applyStart(): void {
    this.write(this.current.copy(this.start));
  }

  protected applyEnd(): void {
    this.write(this.current.copy(this.start).add(this.change));
  }
}
