import { ValidationError } from '../errors/import.errors';

/**
 * HierarchyTracker - "current meter point / current meter" context
 *
 * D0010 nests records without parent identifiers: one 026 is followed by
 * its 028 meters, each followed by its 030 readings. The tracker holds the
 * most recently accepted parent at each level so that a child line can be
 * attached to it.
 *
 * States:
 * - EMPTY:        no meter point, no meter (start of file)
 * - POINT:        meter point set, no meter (after 026)
 * - POINT_METER:  both set (after 028)
 *
 * A failed 026 or 028 invalidates the corresponding level, so the children
 * of a rejected parent surface as orphans instead of being attached to the
 * previous, unrelated parent.
 *
 * Generic over the parent types so it can be driven by persisted entities
 * or by plain test values.
 */
export class HierarchyTracker<P, M> {
  private meterPoint: P | null = null;
  private meter: M | null = null;

  get currentMeterPoint(): P | null {
    return this.meterPoint;
  }

  get currentMeter(): M | null {
    return this.meter;
  }

  /** 026 accepted */
  enterMeterPoint(meterPoint: P): void {
    this.meterPoint = meterPoint;
    this.meter = null;
  }

  /** 028 accepted */
  enterMeter(meter: M): void {
    this.requireMeterPoint();
    this.meter = meter;
  }

  /** 026 rejected */
  invalidateMeterPoint(): void {
    this.meterPoint = null;
    this.meter = null;
  }

  /** 028 rejected */
  invalidateMeter(): void {
    this.meter = null;
  }

  requireMeterPoint(): P {
    if (this.meterPoint === null) {
      throw new ValidationError(
        'OrphanMeter',
        'Meter record (028) has no preceding meter point record (026)',
      );
    }
    return this.meterPoint;
  }

  requireMeter(): M {
    if (this.meter === null) {
      throw new ValidationError(
        'OrphanReading',
        'Reading record (030) has no preceding meter record (028)',
      );
    }
    return this.meter;
  }
}
