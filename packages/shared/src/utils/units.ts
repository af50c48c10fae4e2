import type {
  CenterOfGravity,
  FuelMass,
  FuelType,
  LeverArm,
  Mass,
  MassMoment,
  Volume,
  VolumeUnit,
} from '../types/quantities.js';

/** Liters in one US gallon */
export const LITERS_PER_GALLON = 3.78541;

/** Fixed fuel densities (kg per liter) */
export const AVGAS_DENSITY_KG_PER_LITER = 0.72;
export const MOGAS_DENSITY_KG_PER_LITER = 0.74;

// ─── Constructors ───────────────────────────────────────────────────────────

export function liters(value: number): Volume {
  return { unit: 'liter', value };
}

export function gallons(value: number): Volume {
  return { unit: 'gallon', value };
}

/** Build a volume in the given unit */
export function volumeOf(value: number, unit: VolumeUnit): Volume {
  return unit === 'liter' ? liters(value) : gallons(value);
}

export function kilograms(kg: number): Mass {
  return { kind: 'kilo', kg };
}

export function avgas(volume: Volume): FuelMass {
  return { kind: 'avgas', volume };
}

export function mogas(volume: Volume): FuelMass {
  return { kind: 'mogas', volume };
}

/** Build a fuel mass of the given fuel type */
export function fuel(fuelType: FuelType, volume: Volume): FuelMass {
  return fuelType === 'avgas' ? avgas(volume) : mogas(volume);
}

export function leverArm(meters: number): LeverArm {
  return { unit: 'meter', value: meters };
}

export function massMoment(kgm: number): MassMoment {
  return { unit: 'kgm', value: kgm };
}

export function cgMeters(value: number): CenterOfGravity {
  return { unit: 'meter', value };
}

export function cgMillimeters(value: number): CenterOfGravity {
  return { unit: 'millimeter', value };
}

// ─── Volume ─────────────────────────────────────────────────────────────────

/** Convert a volume to liters */
export function volumeInLiters(volume: Volume): number {
  switch (volume.unit) {
    case 'liter':
      return volume.value;
    case 'gallon':
      return volume.value * LITERS_PER_GALLON;
  }
}

/** Convert a volume to US gallons */
export function volumeInGallons(volume: Volume): number {
  switch (volume.unit) {
    case 'liter':
      return volume.value / LITERS_PER_GALLON;
    case 'gallon':
      return volume.value;
  }
}

/** Re-express a volume in another unit */
export function convertVolume(volume: Volume, unit: VolumeUnit): Volume {
  if (volume.unit === unit) return volume;
  return unit === 'liter' ? liters(volumeInLiters(volume)) : gallons(volumeInGallons(volume));
}

/**
 * Format volume for display
 * e.g., 62 L → "62.00L", 16.4 gal → "16.40gal"
 */
export function formatVolume(volume: Volume): string {
  switch (volume.unit) {
    case 'liter':
      return `${volume.value.toFixed(2)}L`;
    case 'gallon':
      return `${volume.value.toFixed(2)}gal`;
  }
}

// ─── Mass ───────────────────────────────────────────────────────────────────

export function fuelDensity(fuelType: FuelType): number {
  switch (fuelType) {
    case 'avgas':
      return AVGAS_DENSITY_KG_PER_LITER;
    case 'mogas':
      return MOGAS_DENSITY_KG_PER_LITER;
  }
}

export function isFuel(mass: Mass): mass is FuelMass {
  return mass.kind !== 'kilo';
}

/** Physical mass in kilograms, whatever the tag */
export function massInKg(mass: Mass): number {
  switch (mass.kind) {
    case 'kilo':
      return mass.kg;
    case 'avgas':
    case 'mogas':
      return volumeInLiters(mass.volume) * fuelDensity(mass.kind);
  }
}

/**
 * Liters of the given fuel that weigh the same as `mass`.
 * This re-interprets any mass (crew, baggage) as fuel; the solver relies on it.
 */
export function toFuel(mass: Mass, fuelType: FuelType): FuelMass {
  return fuel(fuelType, liters(massInKg(mass) / fuelDensity(fuelType)));
}

export function toAvgas(mass: Mass): FuelMass {
  return toFuel(mass, 'avgas');
}

export function toMogas(mass: Mass): FuelMass {
  return toFuel(mass, 'mogas');
}

/**
 * Unit label for load tables: "kg" for plain mass, the fuel density
 * per volume unit otherwise (e.g., "0.72kg/L", "2.73kg/gal")
 */
export function massUnitLabel(mass: Mass): string {
  if (mass.kind === 'kilo') return 'kg';
  const density = fuelDensity(mass.kind);
  switch (mass.volume.unit) {
    case 'liter':
      return `${density.toFixed(2)}kg/L`;
    case 'gallon':
      return `${(density * LITERS_PER_GALLON).toFixed(2)}kg/gal`;
  }
}

// ─── Arm, moment, CG ────────────────────────────────────────────────────────

export function armInMeters(arm: LeverArm): number {
  return arm.value;
}

export function momentInKgm(moment: MassMoment): number {
  return moment.value;
}

/** CG position in meters aft of datum */
export function cgInMeters(cg: CenterOfGravity): number {
  switch (cg.unit) {
    case 'meter':
      return cg.value;
    case 'millimeter':
      return cg.value / 1000;
  }
}
