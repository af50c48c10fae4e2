import { existsSync, readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import type { AircraftPreset, AircraftSummary } from '@loadsheet/shared';
import { aircraftPresetSchema, formatIssues } from '../api/schemas.js';

/** Built-in preset used when no data directory is available */
export const DEFAULT_PRESET: AircraftPreset = {
  registration: 'PHDHA',
  typeDesignator: 'DR40',
  name: 'Robin DR400/120',
  emptyMass: { kg: 517, armM: 0.4294 },
  stations: [
    { id: 'pilot', name: 'Pilot', armM: 0.515 },
    { id: 'passenger', name: 'Passenger', armM: 0.515 },
    { id: 'rear', name: 'Rear seats', armM: 1.3 },
    { id: 'baggage', name: 'Baggage', armM: 1.9 },
  ],
  fuel: { name: 'Fuel', armM: 0.325, fuelType: 'avgas', unit: 'liter', capacity: 110 },
  limits: {
    minimumWeightKg: 558,
    mtowKg: 750,
    forwardCg: { value: 427, unit: 'millimeter' },
    rearwardCg: { value: 523, unit: 'millimeter' },
  },
};

/** In-memory aircraft preset database, keyed by upper-case registration */
export class PresetDB {
  private db = new Map<string, AircraftPreset>();

  constructor(private readonly dataDir: string) {
    this.load();
  }

  private load(): void {
    const aircraftDir = join(this.dataDir, 'aircraft');
    if (!existsSync(aircraftDir)) {
      console.warn('[PresetDB] No aircraft data directory found, using defaults');
      this.add(DEFAULT_PRESET);
      return;
    }

    const files = readdirSync(aircraftDir).filter((f) => f.endsWith('.json')).sort();
    for (const file of files) {
      try {
        const raw: unknown = JSON.parse(readFileSync(join(aircraftDir, file), 'utf-8'));
        const parsed = aircraftPresetSchema.safeParse(raw);
        if (!parsed.success) {
          console.warn(`[PresetDB] Invalid preset ${file}: ${formatIssues(parsed.error).join('; ')}`);
          continue;
        }
        this.add(parsed.data);
      } catch (e) {
        console.warn(`[PresetDB] Failed to load ${file}:`, e);
      }
    }

    if (this.db.size === 0) {
      this.add(DEFAULT_PRESET);
    }

    console.log(`[PresetDB] Loaded ${this.db.size} aircraft presets`);
  }

  private add(preset: AircraftPreset): void {
    this.db.set(preset.registration.toUpperCase(), preset);
  }

  get(registration: string): AircraftPreset | undefined {
    return this.db.get(registration.toUpperCase());
  }

  list(): AircraftSummary[] {
    return [...this.db.values()].map(({ registration, typeDesignator, name }) => ({
      registration,
      typeDesignator,
      name,
    }));
  }
}
