import type { CenterOfGravity, Mass } from '@loadsheet/shared';
import { cgInMeters, massInKg } from '@loadsheet/shared';

/** Weight and balance envelope: mass bounds and a forward/rearward CG pair */
export class Limits {
  constructor(
    readonly minimumWeight: Readonly<Mass>,
    readonly mtow: Readonly<Mass>,
    readonly forwardCgLimit: Readonly<CenterOfGravity>,
    readonly rearwardCgLimit: Readonly<CenterOfGravity>
  ) {}

  minimumWeightKg(): number {
    return massInKg(this.minimumWeight);
  }

  mtowKg(): number {
    return massInKg(this.mtow);
  }

  /** Forward CG limit (m aft of datum) */
  forwardCgLimitM(): number {
    return cgInMeters(this.forwardCgLimit);
  }

  /** Rearward CG limit (m aft of datum) */
  rearwardCgLimitM(): number {
    return cgInMeters(this.rearwardCgLimit);
  }
}
