import type { AircraftPreset, LimitsDefinition, LoadsheetRequest } from '@loadsheet/shared';
import {
  cgMeters,
  cgMillimeters,
  fuel,
  kilograms,
  leverArm,
  volumeOf,
} from '@loadsheet/shared';
import { Airplane } from '../engine/Airplane.js';
import { Limits } from '../engine/Limits.js';
import { LoadingError } from '../engine/LoadingError.js';
import { Moment } from '../engine/Moment.js';

export const EMPTY_MASS_NAME = 'Empty mass';

function limitsFrom(def: LimitsDefinition): Limits {
  const cg = ({ value, unit }: LimitsDefinition['forwardCg']) =>
    unit === 'meter' ? cgMeters(value) : cgMillimeters(value);

  return new Limits(
    kilograms(def.minimumWeightKg),
    kilograms(def.mtowKg),
    cg(def.forwardCg),
    cg(def.rearwardCg)
  );
}

/**
 * Build the Airplane for one loadsheet: empty mass, station loads in request
 * order, then the fuel load (solved or fixed) last.
 */
export function buildAirplane(preset: AircraftPreset, request: LoadsheetRequest): Airplane {
  const stations = new Map(preset.stations.map((s) => [s.id, s]));
  const tank = preset.fuel;

  const moments = [
    new Moment(EMPTY_MASS_NAME, leverArm(preset.emptyMass.armM), kilograms(preset.emptyMass.kg)),
  ];
  for (const load of request.loads) {
    const station = stations.get(load.station);
    if (!station) {
      throw new LoadingError(
        'UNKNOWN_STATION',
        `${preset.registration} has no station "${load.station}"`
      );
    }
    moments.push(new Moment(station.name, leverArm(station.armM), kilograms(load.kg)));
  }

  const airplane = new Airplane(
    preset.registration,
    moments,
    limitsFrom(preset.limits),
    volumeOf(request.tripFuel ?? 0, tank.unit)
  );

  switch (request.fuel.mode) {
    case 'max':
      airplane.addMaxFuelWithinLimits(
        tank.name,
        leverArm(tank.armM),
        tank.fuelType,
        tank.unit,
        volumeOf(tank.capacity, tank.unit)
      );
      break;
    case 'fixed':
      airplane.addFuelMoment(
        tank.name,
        leverArm(tank.armM),
        fuel(tank.fuelType, volumeOf(request.fuel.volume, tank.unit))
      );
      break;
  }

  return airplane;
}
