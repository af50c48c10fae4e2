/**
 * Unit-tagged quantities used throughout weight and balance calculations.
 * Each is a closed union; read values through the helpers in utils/units.
 */

export type VolumeUnit = 'liter' | 'gallon';

/** Fuel volume */
export type Volume =
  | { unit: 'liter'; value: number }
  | { unit: 'gallon'; value: number };

export type FuelType = 'avgas' | 'mogas';

/** Mass, either plain kilograms or a volume of fuel with a fixed density */
export type Mass =
  | { kind: 'kilo'; kg: number }
  | { kind: 'avgas'; volume: Volume }
  | { kind: 'mogas'; volume: Volume };

export type FuelMass = Extract<Mass, { kind: FuelType }>;

/** Distance from datum */
export interface LeverArm {
  unit: 'meter';
  value: number;
}

/** Mass times lever arm */
export interface MassMoment {
  unit: 'kgm';
  value: number;
}

/** Positive values are aft of datum */
export type CenterOfGravity =
  | { unit: 'meter'; value: number }
  | { unit: 'millimeter'; value: number };

export type CenterOfGravityUnit = CenterOfGravity['unit'];
