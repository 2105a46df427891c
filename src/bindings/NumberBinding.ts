import { numberAccessor } from '../accessors';
import { PropertyBinding } from './PropertyBinding';
import type { BindingOptions } from './PropertyBinding';

/**
 * Animates a numeric property.
 */
export class NumberBinding extends PropertyBinding<number> {
  private readonly endInput: number;
  private start = 0;
  private change = 0;

  constructor(property: string, end: number, options: BindingOptions<number> = {}) {
    super(property, numberAccessor, options);
    this.endInput = end;
  }

  get startValue(): number {
    return this.start;
  }

  get endValue(): number {
    return this.start + this.change;
  }

  setIncremental(diff: number): void {
    this.start += this.change * diff;
  }

  protected captureStartValue(value: number): void {
    this.start = value;
  }

  protected setChangeValue(): void {
    this.change = this.isRelative ? this.endInput : this.endInput - this.start;
  }

  protected getSpeedBasedDuration(speed: number): number {
    return speed > 0 ? Math.abs(this.change) / speed : 0;
  }

  protected applyAt(elapsed: number): void {
    this.write(this.easeValue(elapsed, this.start, this.change));
  }

  protected applyStart(): void {
    this.write(this.start);
  }

  protected applyEnd(): void {
    this.write(this.start + this.change);
  }
}
