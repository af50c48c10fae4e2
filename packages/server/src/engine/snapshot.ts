import type { AirplaneSnapshot, LoadingCondition, MomentView } from '@loadsheet/shared';
import { armInMeters, cgInMeters, isFuel, massInKg, massUnitLabel, momentInKgm } from '@loadsheet/shared';
import type { Airplane } from './Airplane.js';
import type { Moment } from './Moment.js';

function momentView(moment: Moment): MomentView {
  const { mass } = moment;
  return {
    name: moment.name,
    leverArmM: armInMeters(moment.leverArm),
    massKg: massInKg(mass),
    fuel: isFuel(mass) ? { fuelType: mass.kind, volume: { ...mass.volume } } : null,
    unitLabel: massUnitLabel(mass),
    totalKgm: momentInKgm(moment.total()),
  };
}

function takeoffCondition(airplane: Airplane): LoadingCondition {
  return {
    massKg: massInKg(airplane.totalMass()),
    massMomentKgm: momentInKgm(airplane.totalMassMoment()),
    centerOfGravityM: cgInMeters(airplane.centerOfGravity()),
    withinLimits: airplane.withinLimits(),
  };
}

function landingCondition(airplane: Airplane): LoadingCondition | null {
  if (!airplane.hasFuelMoment()) return null;
  return {
    massKg: massInKg(airplane.totalMassLanding()),
    massMomentKgm: momentInKgm(airplane.totalMassMomentLanding()),
    centerOfGravityM: cgInMeters(airplane.centerOfGravityLanding()),
    withinLimits: airplane.withinLimitsLanding(),
  };
}

/** Plain, serializable view of a finished evaluation for renderers and the API */
export function toSnapshot(airplane: Airplane): AirplaneSnapshot {
  const { limits } = airplane;
  return {
    callsign: airplane.callsign,
    moments: airplane.getMoments().map(momentView),
    limits: {
      minimumWeightKg: limits.minimumWeightKg(),
      mtowKg: limits.mtowKg(),
      forwardCgLimitM: limits.forwardCgLimitM(),
      rearwardCgLimitM: limits.rearwardCgLimitM(),
    },
    takeoff: takeoffCondition(airplane),
    landing: landingCondition(airplane),
  };
}
