import type {
  CenterOfGravity,
  FuelMass,
  FuelType,
  LeverArm,
  Mass,
  MassMoment,
  Volume,
  VolumeUnit,
} from '@loadsheet/shared';
import {
  armInMeters,
  cgInMeters,
  cgMeters,
  convertVolume,
  fuel,
  isFuel,
  kilograms,
  liters,
  massInKg,
  massMoment,
  momentInKgm,
  toFuel,
  volumeInLiters,
  volumeOf,
} from '@loadsheet/shared';
import { LoadingError } from './LoadingError.js';
import type { Limits } from './Limits.js';
import { Moment } from './Moment.js';

/**
 * Stations at or aft of this arm push the CG aft, so the solver binds them
 * to the rearward limit; stations forward of it to the forward limit.
 * Only valid for datums near the wing leading edge.
 */
export const AFT_STATION_THRESHOLD_M = 0.5;

/**
 * Slack on the envelope bounds. A solved fuel load goes kg -> volume -> kg,
 * which can land the CG an ulp past the limit it was solved against.
 */
export const ENVELOPE_TOLERANCE = 1e-9;

function sumMassKg(moments: readonly Moment[]): number {
  return moments.reduce((sum, m) => sum + massInKg(m.mass), 0);
}

function sumMomentKgm(moments: readonly Moment[]): number {
  return moments.reduce((sum, m) => sum + momentInKgm(m.total()), 0);
}

/**
 * Airplane aggregates the load items of one evaluation and checks them
 * against the envelope. Items are only ever appended.
 *
 * The fuel moment used for the landing figures is the one appended through
 * addFuelMoment or the fuel solver; without one, the last moment is taken
 * if it is fuel.
 */
export class Airplane {
  private readonly moments: Moment[];
  private fuelIndex: number | null = null;

  constructor(
    readonly callsign: string,
    moments: readonly Moment[],
    readonly limits: Limits,
    readonly fuelConsumptionTrip: Readonly<Volume> = liters(0)
  ) {
    this.moments = [...moments];
  }

  /** Load items in insertion order */
  getMoments(): readonly Moment[] {
    return this.moments;
  }

  totalMass(): Mass {
    return kilograms(sumMassKg(this.moments));
  }

  totalMassMoment(): MassMoment {
    return massMoment(sumMomentKgm(this.moments));
  }

  centerOfGravity(): CenterOfGravity {
    return centerOfGravityOf(sumMassKg(this.moments), sumMomentKgm(this.moments));
  }

  /** Mass at or below MTOW and CG between the limits, bounds inclusive */
  withinLimits(): boolean {
    return this.inEnvelope(massInKg(this.totalMass()), cgInMeters(this.centerOfGravity()));
  }

  /** Append a load item as-is */
  addMoment(moment: Moment): void {
    this.moments.push(moment);
  }

  /** Append the fuel load; landing figures burn trip fuel from it */
  addFuelMoment(name: string, arm: LeverArm, mass: FuelMass): Moment {
    const moment = new Moment(name, arm, mass);
    this.moments.push(moment);
    this.fuelIndex = this.moments.length - 1;
    return moment;
  }

  /**
   * Append the largest load at `arm` that keeps the aircraft within the envelope.
   * `mass` only selects the kind of load: plain kilograms, or a fuel type and
   * the volume unit to express the result in. `maxVolume` caps fuel loads.
   */
  addMaxMassWithinLimits(name: string, arm: LeverArm, mass: Mass, maxVolume?: Volume): Moment {
    const maxKg = this.solveMaxLoadKg(arm);

    if (!isFuel(mass)) {
      const moment = new Moment(name, arm, kilograms(maxKg));
      this.moments.push(moment);
      return moment;
    }

    const solved = toFuel(kilograms(maxKg), mass.kind);
    let volumeL = volumeInLiters(solved.volume);
    if (maxVolume !== undefined) {
      volumeL = Math.min(volumeL, volumeInLiters(maxVolume));
    }
    return this.addFuelMoment(name, arm, fuel(mass.kind, convertVolume(liters(volumeL), mass.volume.unit)));
  }

  /** Append as much fuel as the envelope (and the tank, if given) allows */
  addMaxFuelWithinLimits(
    name: string,
    arm: LeverArm,
    fuelType: FuelType,
    unit: VolumeUnit,
    maxVolume?: Volume
  ): Moment {
    return this.addMaxMassWithinLimits(name, arm, fuel(fuelType, volumeOf(0, unit)), maxVolume);
  }

  hasFuelMoment(): boolean {
    if (this.fuelIndex !== null) return true;
    const last = this.moments.at(-1);
    return last !== undefined && isFuel(last.mass);
  }

  /** Total mass after burning the trip fuel */
  totalMassLanding(): Mass {
    return kilograms(sumMassKg(this.landingMoments()));
  }

  totalMassMomentLanding(): MassMoment {
    return massMoment(sumMomentKgm(this.landingMoments()));
  }

  centerOfGravityLanding(): CenterOfGravity {
    const moments = this.landingMoments();
    return centerOfGravityOf(sumMassKg(moments), sumMomentKgm(moments));
  }

  withinLimitsLanding(): boolean {
    return this.inEnvelope(massInKg(this.totalMassLanding()), cgInMeters(this.centerOfGravityLanding()));
  }

  private inEnvelope(massKg: number, cgM: number): boolean {
    return (
      massKg <= this.limits.mtowKg() + ENVELOPE_TOLERANCE &&
      cgM >= this.limits.forwardCgLimitM() - ENVELOPE_TOLERANCE &&
      cgM <= this.limits.rearwardCgLimitM() + ENVELOPE_TOLERANCE
    );
  }

  /**
   * Point mass at `arm` that moves the CG exactly onto the binding limit:
   *   cgLimit = (moment + m * arm) / (mass + m)
   * clamped so the total stays at or below MTOW.
   */
  private solveMaxLoadKg(arm: LeverArm): number {
    const armM = armInMeters(arm);
    const cgLimit =
      armM >= AFT_STATION_THRESHOLD_M ? this.limits.rearwardCgLimitM() : this.limits.forwardCgLimitM();

    if (armM === cgLimit) {
      throw new LoadingError(
        'SINGULAR_STATION',
        `Station at ${armM} m lies on the CG limit; any load keeps the CG there`
      );
    }

    const massKg = sumMassKg(this.moments);
    const momentKgm = sumMomentKgm(this.moments);
    const mtowKg = this.limits.mtowKg();

    let maxKg = (cgLimit * massKg - momentKgm) / (armM - cgLimit);
    if (massKg + maxKg >= mtowKg) {
      maxKg = mtowKg - massKg;
    }

    if (maxKg < 0) {
      const message =
        massKg > mtowKg
          ? `${this.callsign} is above MTOW before loading station at ${armM} m`
          : `${this.callsign}: no positive load at ${armM} m keeps the CG at the binding limit`;
      throw new LoadingError('OUT_OF_ENVELOPE', message);
    }
    return maxKg;
  }

  private fuelMoment(): { index: number; mass: FuelMass } {
    const index = this.fuelIndex ?? this.moments.length - 1;
    const moment = this.moments.at(index);
    if (moment === undefined || !isFuel(moment.mass)) {
      throw new LoadingError('NO_FUEL_MOMENT', 'last moment is not fuel');
    }
    return { index, mass: moment.mass };
  }

  /** Moments with the trip fuel subtracted from the fuel load */
  private landingMoments(): Moment[] {
    const { index, mass } = this.fuelMoment();
    const remainingL = volumeInLiters(mass.volume) - volumeInLiters(this.fuelConsumptionTrip);
    const burned = fuel(mass.kind, convertVolume(liters(remainingL), mass.volume.unit));

    return this.moments.map((m, i) => (i === index ? new Moment(m.name, m.leverArm, burned) : m));
  }
}

function centerOfGravityOf(massKg: number, momentKgm: number): CenterOfGravity {
  if (massKg === 0) {
    throw new LoadingError('EMPTY_AIRCRAFT', 'Total mass is zero; center of gravity is undefined');
  }
  return cgMeters(momentKgm / massKg);
}
