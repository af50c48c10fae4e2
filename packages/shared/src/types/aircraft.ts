import type { CenterOfGravityUnit, FuelType, VolumeUnit } from './quantities.js';

/** A seat or baggage position in the cabin */
export interface StationDefinition {
  /** Identifier used by loadsheet requests (e.g., "pilot") */
  id: string;
  /** Display name (e.g., "Pilot") */
  name: string;
  /** Lever arm (m aft of datum) */
  armM: number;
}

export interface FuelStationDefinition {
  name: string;
  /** Lever arm of the tank (m aft of datum) */
  armM: number;
  fuelType: FuelType;
  /** Unit the tank is gauged in; requests give volumes in this unit */
  unit: VolumeUnit;
  /** Usable capacity, in `unit` */
  capacity: number;
}

/** Certified weight and balance envelope */
export interface LimitsDefinition {
  minimumWeightKg: number;
  mtowKg: number;
  forwardCg: { value: number; unit: CenterOfGravityUnit };
  rearwardCg: { value: number; unit: CenterOfGravityUnit };
}

/** Aircraft preset as stored in data/aircraft/*.json */
export interface AircraftPreset {
  /** Registration, used as callsign (e.g., "PHDHA") */
  registration: string;
  /** ICAO type designator (e.g., "DR40") */
  typeDesignator: string;
  /** Full name (e.g., "Robin DR400/120") */
  name: string;
  emptyMass: {
    kg: number;
    armM: number;
  };
  stations: StationDefinition[];
  fuel: FuelStationDefinition;
  limits: LimitsDefinition;
}

/** Preset listing entry */
export interface AircraftSummary {
  registration: string;
  typeDesignator: string;
  name: string;
}
