/**
 * Airplane Unit Tests
 *
 * Covers: mass moments, totals and CG, envelope checks (inclusive bounds),
 * maximum-load solver (CG bound, MTOW clamp, fuel conversion, volume cap,
 * unsolvable stations), landing recomputation and fuel-moment tracking.
 */
import { describe, it, expect } from 'vitest';
import {
  avgas,
  cgInMeters,
  cgMeters,
  cgMillimeters,
  gallons,
  kilograms,
  leverArm,
  liters,
  massInKg,
  momentInKgm,
  mogas,
} from '@loadsheet/shared';
import { AFT_STATION_THRESHOLD_M, Airplane } from '../engine/Airplane.js';
import { Limits } from '../engine/Limits.js';
import { LoadingError } from '../engine/LoadingError.js';
import { Moment } from '../engine/Moment.js';

// ─── Fixtures ────────────────────────────────────────────────────────────────

const PHDHA_LIMITS = new Limits(kilograms(558), kilograms(750), cgMillimeters(427), cgMillimeters(523));

/** Loaded PHDHA; the fuel load is last */
function phdha(pilotKg = 80, tripFuelL = 0): Airplane {
  return new Airplane(
    'PHDHA',
    [
      new Moment('Empty mass', leverArm(0.4294), kilograms(517)),
      new Moment('Pilot', leverArm(0.515), kilograms(pilotKg)),
      new Moment('Passenger', leverArm(0.515), kilograms(89)),
      new Moment('Baggage', leverArm(1.3), kilograms(5)),
      new Moment('Fuel', leverArm(0.325), avgas(liters(62))),
    ],
    PHDHA_LIMITS,
    liters(tripFuelL)
  );
}

/** PHDHA without fuel: 691 kg, 315.5348 kg m */
function phdhaDry(tripFuelL = 0): Airplane {
  return new Airplane(
    'PHDHA',
    [
      new Moment('Empty mass', leverArm(0.4294), kilograms(517)),
      new Moment('Pilot', leverArm(0.515), kilograms(80)),
      new Moment('Passenger', leverArm(0.515), kilograms(89)),
      new Moment('Baggage', leverArm(1.3), kilograms(5)),
    ],
    PHDHA_LIMITS,
    liters(tripFuelL)
  );
}

/** Two loads totalling 15 kg at a CG of 2.33 m */
function simple(mtowKg = 40, rearwardM = 3.0): Airplane {
  return new Airplane(
    'TEST',
    [
      new Moment('a', leverArm(2.0), kilograms(10)),
      new Moment('b', leverArm(3.0), kilograms(5)),
    ],
    new Limits(kilograms(10), kilograms(mtowKg), cgMeters(1.0), cgMeters(rearwardM))
  );
}

function catchLoadingError(fn: () => unknown): LoadingError {
  try {
    fn();
  } catch (e) {
    if (e instanceof LoadingError) return e;
    throw e;
  }
  throw new Error('expected a LoadingError');
}

// ─── Moment ──────────────────────────────────────────────────────────────────

describe('Moment', () => {
  it('total is mass times arm', () => {
    const m = new Moment('test', leverArm(0.4294), kilograms(517));
    expect(momentInKgm(m.total())).toBe(517 * 0.4294);
  });

  it('uses the fuel density for fuel loads', () => {
    const m = new Moment('fuel', leverArm(2), mogas(liters(50)));
    expect(momentInKgm(m.total())).toBeCloseTo(74, 10);
  });

  it('accepts negative values without validation', () => {
    const m = new Moment('ballast', leverArm(-1), kilograms(-3));
    expect(momentInKgm(m.total())).toBe(3);
  });
});

// ─── Totals ──────────────────────────────────────────────────────────────────

describe('Airplane totals', () => {
  it('sums masses and moments of all items', () => {
    const plane = phdha();
    expect(massInKg(plane.totalMass())).toBeCloseTo(517 + 80 + 89 + 5 + 62 * 0.72, 10);
    expect(momentInKgm(plane.totalMassMoment())).toBeCloseTo(
      517 * 0.4294 + 80 * 0.515 + 89 * 0.515 + 5 * 1.3 + 62 * 0.72 * 0.325,
      10
    );
  });

  it('does not depend on item order', () => {
    const forward = phdha();
    const reversed = new Airplane('PHDHA', [...forward.getMoments()].reverse(), PHDHA_LIMITS);
    expect(massInKg(reversed.totalMass())).toBeCloseTo(massInKg(forward.totalMass()), 10);
    expect(momentInKgm(reversed.totalMassMoment())).toBeCloseTo(momentInKgm(forward.totalMassMoment()), 10);
  });

  it('recomputes after items are appended', () => {
    const plane = simple();
    expect(massInKg(plane.totalMass())).toBe(15);
    plane.addMoment(new Moment('c', leverArm(1), kilograms(5)));
    expect(massInKg(plane.totalMass())).toBe(20);
    expect(momentInKgm(plane.totalMassMoment())).toBe(40);
  });

  it('does not modify the list it was constructed from', () => {
    const initial = [new Moment('a', leverArm(1), kilograms(1))];
    const plane = new Airplane('TEST', initial, PHDHA_LIMITS);
    plane.addMoment(new Moment('b', leverArm(1), kilograms(1)));
    expect(initial).toHaveLength(1);
    expect(plane.getMoments()).toHaveLength(2);
  });

  it('computes the center of gravity', () => {
    const expected =
      (0.4294 * 517 + 0.515 * 80 + 0.515 * 89 + 1.3 * 5 + 0.325 * 0.72 * 62) /
      (517 + 80 + 89 + 5 + 62 * 0.72);
    expect(cgInMeters(phdha().centerOfGravity())).toBeCloseTo(expected, 12);
  });

  it('rejects CG of an aircraft without mass', () => {
    const plane = new Airplane('EMPTY', [], PHDHA_LIMITS);
    expect(catchLoadingError(() => plane.centerOfGravity()).code).toBe('EMPTY_AIRCRAFT');
    expect(() => plane.withinLimits()).toThrow(LoadingError);
  });
});

// ─── Envelope ────────────────────────────────────────────────────────────────

describe('Airplane.withinLimits', () => {
  it('PHDHA with an 80 kg pilot is within limits', () => {
    expect(phdha(80).withinLimits()).toBe(true);
  });

  it('PHDHA with a 95 kg pilot is outside limits', () => {
    expect(phdha(95).withinLimits()).toBe(false);
  });

  /** 10 kg at 1.0 m: mass 10, CG exactly 1.0 */
  function onTheEdge(mtowKg: number, forwardM: number, rearwardM: number): Airplane {
    return new Airplane(
      'EDGE',
      [new Moment('load', leverArm(1.0), kilograms(10))],
      new Limits(kilograms(0), kilograms(mtowKg), cgMeters(forwardM), cgMeters(rearwardM))
    );
  }

  it('treats every bound as inclusive', () => {
    expect(onTheEdge(10, 1.0, 1.0).withinLimits()).toBe(true);
  });

  it('fails when MTOW is lowered by an epsilon', () => {
    expect(onTheEdge(10 - 1e-6, 1.0, 1.0).withinLimits()).toBe(false);
  });

  it('fails when the forward limit moves aft by an epsilon', () => {
    expect(onTheEdge(10, 1.0 + 1e-6, 1.0 + 1e-6).withinLimits()).toBe(false);
  });

  it('fails when the rearward limit moves forward by an epsilon', () => {
    expect(onTheEdge(10, 1.0 - 1e-6, 1.0 - 1e-6).withinLimits()).toBe(false);
  });

  it('ignores the minimum weight', () => {
    const plane = new Airplane(
      'LIGHT',
      [new Moment('load', leverArm(1.0), kilograms(1))],
      new Limits(kilograms(500), kilograms(750), cgMeters(0.5), cgMeters(1.5))
    );
    expect(plane.withinLimits()).toBe(true);
  });
});

// ─── Solver ──────────────────────────────────────────────────────────────────

describe('Airplane.addMaxMassWithinLimits', () => {
  it('splits stations at 0.5 m', () => {
    expect(AFT_STATION_THRESHOLD_M).toBe(0.5);
  });

  it('solves the CG-bound maximum when MTOW is far away', () => {
    const plane = simple(40);
    const moment = plane.addMaxMassWithinLimits('max', leverArm(4.0), kilograms(0));
    expect(massInKg(moment.mass)).toBe(10);
    expect(cgInMeters(plane.centerOfGravity())).toBe(3);
    expect(plane.withinLimits()).toBe(true);
  });

  it('clamps to MTOW when the CG solution would exceed it', () => {
    const plane = simple(24);
    const moment = plane.addMaxMassWithinLimits('max', leverArm(4.0), kilograms(0));
    expect(massInKg(moment.mass)).toBe(9);
    expect(massInKg(plane.totalMass())).toBe(24);
    expect(plane.withinLimits()).toBe(true);
  });

  it('appends the solved moment and returns it', () => {
    const plane = simple();
    const moment = plane.addMaxMassWithinLimits('max', leverArm(4.0), kilograms(0));
    expect(plane.getMoments()).toHaveLength(3);
    expect(plane.getMoments()[2]).toBe(moment);
    expect(moment.name).toBe('max');
  });

  it('expresses a fuel result as liters of the fuel type', () => {
    const plane = simple(40);
    const moment = plane.addMaxMassWithinLimits('fuel', leverArm(4.0), avgas(liters(0)));
    expect(moment.mass).toEqual({ kind: 'avgas', volume: { unit: 'liter', value: 10 / 0.72 } });
    expect(massInKg(moment.mass)).toBeCloseTo(10, 10);
  });

  it('ignores the volume cap for plain mass', () => {
    const plane = phdhaDry();
    const moment = plane.addMaxMassWithinLimits('Baggage 2', leverArm(1.3), kilograms(0), liters(1));
    // CG solution is ~59.02 kg aft, MTOW leaves exactly 59 kg
    expect(moment.mass).toEqual({ kind: 'kilo', kg: 59 });
  });

  it('rejects a station lying on the binding CG limit', () => {
    const plane = simple(40, 3.0);
    const error = catchLoadingError(() => plane.addMaxMassWithinLimits('x', leverArm(3.0), kilograms(0)));
    expect(error.code).toBe('SINGULAR_STATION');
    expect(plane.getMoments()).toHaveLength(2);
  });

  it('rejects loading when the CG is already beyond the binding limit', () => {
    // CG 2.33 m with a rearward limit of 2.0 m
    const plane = simple(40, 2.0);
    const error = catchLoadingError(() => plane.addMaxMassWithinLimits('x', leverArm(4.0), kilograms(0)));
    expect(error.code).toBe('OUT_OF_ENVELOPE');
  });

  it('rejects loading when the aircraft is already above MTOW', () => {
    const plane = simple(12);
    const error = catchLoadingError(() => plane.addMaxMassWithinLimits('x', leverArm(4.0), kilograms(0)));
    expect(error.code).toBe('OUT_OF_ENVELOPE');
    expect(error.message).toBe('TEST is above MTOW before loading station at 4 m');
  });

  it('rejects a station between the 0.5 m split and the rearward limit', () => {
    // Dry PHDHA is within limits; the seats at 0.515 m cannot pull the CG aft to 0.523 m
    const plane = phdhaDry();
    expect(plane.withinLimits()).toBe(true);
    const error = catchLoadingError(() =>
      plane.addMaxMassWithinLimits('Passenger 2', leverArm(0.515), kilograms(0))
    );
    expect(error.code).toBe('OUT_OF_ENVELOPE');
    expect(error.message).toBe('PHDHA: no positive load at 0.515 m keeps the CG at the binding limit');
  });
});

describe('Airplane.addMaxFuelWithinLimits', () => {
  // Dry PHDHA: CG solution at 0.325 m is ~200.8 kg, MTOW leaves 59 kg
  const MAX_FUEL_KG = 59;

  it('never exceeds MTOW', () => {
    const plane = phdhaDry();
    plane.addMaxFuelWithinLimits('Fuel', leverArm(0.325), 'avgas', 'liter');
    expect(massInKg(plane.totalMass())).toBeLessThanOrEqual(750 + 1e-9);
    expect(massInKg(plane.totalMass())).toBeCloseTo(750, 9);
  });

  it('returns Avgas liters when uncapped', () => {
    const moment = phdhaDry().addMaxFuelWithinLimits('Fuel', leverArm(0.325), 'avgas', 'liter');
    expect(moment.mass.kind).toBe('avgas');
    if (moment.mass.kind !== 'avgas') return;
    expect(moment.mass.volume.unit).toBe('liter');
    expect(moment.mass.volume.value).toBeCloseTo(MAX_FUEL_KG / 0.72, 9);
  });

  it('uses the Mogas density for Mogas', () => {
    const moment = phdhaDry().addMaxFuelWithinLimits('Fuel', leverArm(0.325), 'mogas', 'liter');
    expect(moment.mass.kind).toBe('mogas');
    if (moment.mass.kind !== 'mogas') return;
    expect(moment.mass.volume.value).toBeCloseTo(MAX_FUEL_KG / 0.74, 9);
    expect(massInKg(moment.mass)).toBeCloseTo(MAX_FUEL_KG, 9);
  });

  it('expresses the result in gallons when requested', () => {
    const moment = phdhaDry().addMaxFuelWithinLimits('Fuel', leverArm(0.325), 'avgas', 'gallon');
    if (moment.mass.kind !== 'avgas') throw new Error('expected avgas');
    expect(moment.mass.volume.unit).toBe('gallon');
    expect(moment.mass.volume.value).toBeCloseTo(MAX_FUEL_KG / 0.72 / 3.78541, 9);
  });

  it('clamps to the tank capacity', () => {
    const plane = phdhaDry();
    const moment = plane.addMaxFuelWithinLimits('Fuel', leverArm(0.325), 'avgas', 'liter', liters(60));
    expect(moment.mass).toEqual({ kind: 'avgas', volume: { unit: 'liter', value: 60 } });
    expect(massInKg(plane.totalMass())).toBeCloseTo(691 + 43.2, 9);
    expect(plane.withinLimits()).toBe(true);
  });

  it('expresses a capacity given in gallons in the requested unit', () => {
    const moment = phdhaDry().addMaxFuelWithinLimits(
      'Fuel',
      leverArm(0.325),
      'avgas',
      'gallon',
      gallons(10)
    );
    if (moment.mass.kind !== 'avgas') throw new Error('expected avgas');
    expect(moment.mass.volume.unit).toBe('gallon');
    expect(moment.mass.volume.value).toBeCloseTo(10, 9);
  });

  it('stays within limits when the CG binds, for every fuel type and unit', () => {
    // 600 kg at 0.45 m: the forward limit allows 13.8 / 0.102 kg at 0.325 m, well below MTOW
    for (const fuelType of ['avgas', 'mogas'] as const) {
      for (const unit of ['liter', 'gallon'] as const) {
        const plane = new Airplane('CGBOUND', [new Moment('Dry', leverArm(0.45), kilograms(600))], PHDHA_LIMITS);
        plane.addMaxFuelWithinLimits('Fuel', leverArm(0.325), fuelType, unit);
        expect(massInKg(plane.totalMass())).toBeCloseTo(600 + 13.8 / 0.102, 9);
        expect(cgInMeters(plane.centerOfGravity())).toBeCloseTo(0.427, 9);
        expect(plane.withinLimits()).toBe(true);
      }
    }
  });

  it('keeps the computed volume when it is below the cap', () => {
    const moment = phdhaDry().addMaxFuelWithinLimits('Fuel', leverArm(0.325), 'avgas', 'liter', liters(200));
    if (moment.mass.kind !== 'avgas') throw new Error('expected avgas');
    expect(moment.mass.volume.value).toBeCloseTo(MAX_FUEL_KG / 0.72, 9);
  });
});

// ─── Landing ─────────────────────────────────────────────────────────────────

describe('Airplane landing figures', () => {
  it('burns the trip fuel from the fuel load', () => {
    const plane = phdha(80, 20);
    const takeoffKg = massInKg(plane.totalMass());
    const takeoffKgm = momentInKgm(plane.totalMassMoment());

    // 20 L of Avgas is 14.4 kg at 0.325 m
    expect(massInKg(plane.totalMassLanding())).toBeCloseTo(takeoffKg - 14.4, 9);
    expect(momentInKgm(plane.totalMassMomentLanding())).toBeCloseTo(takeoffKgm - 14.4 * 0.325, 9);
  });

  it('leaves the takeoff figures untouched', () => {
    const plane = phdha(80, 20);
    plane.totalMassLanding();
    expect(massInKg(plane.totalMass())).toBeCloseTo(735.64, 9);
    expect(plane.getMoments()[4].mass).toEqual({ kind: 'avgas', volume: { unit: 'liter', value: 62 } });
  });

  it('burns gallons from a fuel load gauged in gallons', () => {
    const plane = new Airplane(
      'GAL',
      [new Moment('Empty', leverArm(1), kilograms(400))],
      PHDHA_LIMITS,
      gallons(5)
    );
    plane.addFuelMoment('Fuel', leverArm(1), avgas(gallons(20)));
    expect(massInKg(plane.totalMassLanding())).toBeCloseTo(400 + 15 * 3.78541 * 0.72, 9);
  });

  it('uses the solver fuel load even when other items follow it', () => {
    const plane = phdhaDry(10);
    plane.addMaxFuelWithinLimits('Fuel', leverArm(0.325), 'avgas', 'liter', liters(60));
    plane.addMoment(new Moment('Charts', leverArm(1.3), kilograms(2)));

    expect(plane.hasFuelMoment()).toBe(true);
    expect(massInKg(plane.totalMassLanding())).toBeCloseTo(massInKg(plane.totalMass()) - 7.2, 9);
  });

  it('rejects landing figures when the last item is not fuel', () => {
    const plane = phdhaDry(10);
    expect(plane.hasFuelMoment()).toBe(false);
    const error = catchLoadingError(() => plane.totalMassLanding());
    expect(error.code).toBe('NO_FUEL_MOMENT');
    expect(error.message).toBe('last moment is not fuel');
  });

  it('rejects landing figures without any item', () => {
    const plane = new Airplane('EMPTY', [], PHDHA_LIMITS);
    expect(catchLoadingError(() => plane.totalMassMomentLanding()).code).toBe('NO_FUEL_MOMENT');
  });

  it('detects a CG that moves out of limits after the fuel burn', () => {
    const plane = new Airplane(
      'AFT',
      [new Moment('Cabin', leverArm(2.0), kilograms(10)), new Moment('Fuel', leverArm(1.0), avgas(liters(10)))],
      new Limits(kilograms(0), kilograms(100), cgMeters(1.0), cgMeters(1.7)),
      liters(10)
    );
    // takeoff: 27.2 kg m / 17.2 kg = 1.58 m; landing: 20 / 10 = 2.0 m
    expect(plane.withinLimits()).toBe(true);
    expect(cgInMeters(plane.centerOfGravityLanding())).toBeCloseTo(2.0, 12);
    expect(plane.withinLimitsLanding()).toBe(false);
  });
});
