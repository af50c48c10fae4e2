import type { FuelType, Volume } from './quantities.js';

/** ===== Requests ===== */

export interface StationLoad {
  /** Station id from the aircraft preset */
  station: string;
  kg: number;
}

/** Fill the tank as far as the envelope allows, or load a fixed volume */
export type FuelRequest =
  | { mode: 'max' }
  | { mode: 'fixed'; volume: number };

export interface LoadsheetRequest {
  /** Aircraft registration */
  aircraft: string;
  loads: StationLoad[];
  fuel: FuelRequest;
  /** Fuel burned on the trip, in the aircraft's fuel unit */
  tripFuel?: number;
}

/** ===== Snapshot of a finished evaluation ===== */

export interface MomentView {
  name: string;
  leverArmM: number;
  massKg: number;
  /** Present for fuel loads */
  fuel: { fuelType: FuelType; volume: Volume } | null;
  /** Density label for fuel, "kg" otherwise */
  unitLabel: string;
  totalKgm: number;
}

export interface LimitsView {
  minimumWeightKg: number;
  mtowKg: number;
  forwardCgLimitM: number;
  rearwardCgLimitM: number;
}

export interface LoadingCondition {
  massKg: number;
  massMomentKgm: number;
  centerOfGravityM: number;
  withinLimits: boolean;
}

export interface AirplaneSnapshot {
  callsign: string;
  moments: MomentView[];
  limits: LimitsView;
  takeoff: LoadingCondition;
  /** Null when the aircraft carries no fuel moment */
  landing: LoadingCondition | null;
}

/** ===== Responses ===== */

export interface LoadsheetResponse {
  id: string;
  snapshot: AirplaneSnapshot;
}

export type LoadingErrorCode =
  | 'EMPTY_AIRCRAFT'
  | 'NO_FUEL_MOMENT'
  | 'SINGULAR_STATION'
  | 'OUT_OF_ENVELOPE'
  | 'UNKNOWN_STATION';

export interface ErrorResponse {
  error: string;
  code?: LoadingErrorCode;
  issues?: string[];
}
