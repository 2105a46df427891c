import * as THREE from 'three';
import { colorAccessor } from '../accessors';
import { PropertyBinding } from './PropertyBinding';
import type { BindingOptions } from './PropertyBinding';

/**
 * Animates a `THREE.Color` property channel by channel.
 */
export class ColorBinding extends PropertyBinding<THREE.Color> {
  private readonly endInput: THREE.Color;
  private readonly start = new THREE.Color();
  // THREE.Color.sub clamps at zero, so the signed change lives in a vector (r, g, b)
  private readonly change = new THREE.Vector3();
  private readonly current = new THREE.Color();

  constructor(property: string, end: THREE.ColorRepresentation, options: BindingOptions<THREE.Color> = {}) {
    super(property, colorAccessor, options);
    this.endInput = new THREE.Color(end);
  }

  get startValue(): THREE.Color {
    return this.start.clone();
  }

  get endValue(): THREE.Color {
    return this.at(1, new THREE.Color());
  }

  setIncremental(diff: number): void {
    this.start.setRGB(
      this.start.r + this.change.x * diff,
      this.start.g + this.change.y * diff,
      this.start.b + this.change.z * diff
    );
  }

  protected captureStartValue(value: THREE.Color): void {
    this.start.copy(value);
  }

  protected setChangeValue(): void {
    const end = this.endInput;
    if (this.isRelative) {
      this.change.set(end.r, end.g, end.b);
    } else {
      this.change.set(end.r - this.start.r, end.g - this.start.g, end.b - this.start.b);
    }
  }

  protected getSpeedBasedDuration(speed: number): number {
    return speed > 0 ? this.change.length() / speed : 0;
  }

  protected applyAt(elapsed: number): void {
    this.write(this.at(this.easeValue(elapsed, 0, 1), this.current));
  }

  protected applyStart(): void {
    this.write(this.at(0, this.current));
  }

  protected applyEnd(): void {
    this.write(this.at(1, this.current));
  }

  private at(factor: number, target: THREE.Color): THREE.Color {
    return target.setRGB(
      this.start.r + this.change.x * factor,
      this.start.g + this.change.y * factor,
      this.start.b + this.change.z * factor
    );
  }
}
