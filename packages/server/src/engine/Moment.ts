import type { LeverArm, Mass, MassMoment } from '@loadsheet/shared';
import { armInMeters, massInKg, massMoment } from '@loadsheet/shared';

/** A named load at a fixed station */
export class Moment {
  constructor(
    readonly name: string,
    readonly leverArm: Readonly<LeverArm>,
    readonly mass: Readonly<Mass>
  ) {}

  /** Mass moment (kg m) */
  total(): MassMoment {
    return massMoment(massInKg(this.mass) * armInMeters(this.leverArm));
  }
}
