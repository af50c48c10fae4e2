/**
 * Print a loadsheet for one aircraft preset
 *
 * Usage:
 *   npm run loadsheet -- --aircraft PHDHA --load pilot=80 --load passenger=89 \
 *     --fuel max --trip 20 --chart phdha.svg
 *
 * --fuel takes "max" or a volume in the aircraft's fuel unit.
 */

import { writeFileSync } from 'fs';
import { parseArgs } from 'util';
import type { FuelRequest, LoadsheetRequest, StationLoad } from '@loadsheet/shared';
import { DATA_DIR } from '../packages/server/src/config.js';
import { PresetDB } from '../packages/server/src/data/PresetDB.js';
import { LoadingError } from '../packages/server/src/engine/LoadingError.js';
import { toSnapshot } from '../packages/server/src/engine/snapshot.js';
import { buildAirplane } from '../packages/server/src/loadsheet/buildAirplane.js';
import { renderEnvelopeChart } from '../packages/server/src/render/EnvelopeChart.js';
import { loadTableRows } from '../packages/server/src/render/LoadTable.js';

function fail(msg: string): never {
  console.error(`[loadsheet] ${msg}`);
  process.exit(1);
}

function parseLoad(arg: string): StationLoad {
  const [station, kg] = arg.split('=');
  const value = Number(kg);
  if (!station || kg === undefined || !Number.isFinite(value)) fail(`Bad --load "${arg}", expected station=kg`);
  return { station, kg: value };
}

function parseFuel(arg: string): FuelRequest {
  if (arg === 'max') return { mode: 'max' };
  const volume = Number(arg);
  if (!Number.isFinite(volume) || volume < 0) fail(`Bad --fuel "${arg}", expected "max" or a volume`);
  return { mode: 'fixed', volume };
}

function printTable(rows: string[][]): void {
  const widths = rows[0].map((_, c) => Math.max(...rows.map((r) => r[c].length)));
  for (const row of rows) {
    console.log(row.map((cell, c) => (c === 0 ? cell.padEnd(widths[c]) : cell.padStart(widths[c]))).join('  '));
  }
}

const { values } = parseArgs({
  options: {
    aircraft: { type: 'string' },
    load: { type: 'string', multiple: true },
    fuel: { type: 'string' },
    trip: { type: 'string' },
    chart: { type: 'string' },
  },
});

const presets = new PresetDB(DATA_DIR);
const registration = values.aircraft ?? 'PHDHA';
const preset = presets.get(registration);
if (!preset) fail(`Unknown aircraft ${registration}`);

const tripFuel = Number(values.trip ?? '0');
if (!Number.isFinite(tripFuel) || tripFuel < 0) fail(`Bad --trip "${values.trip}", expected a volume`);

const request: LoadsheetRequest = {
  aircraft: preset.registration,
  loads: (values.load ?? []).map(parseLoad),
  fuel: parseFuel(values.fuel ?? 'max'),
  tripFuel,
};

try {
  const snapshot = toSnapshot(buildAirplane(preset, request));
  console.log(`${preset.registration} (${preset.name})`);
  printTable(loadTableRows(snapshot));

  if (values.chart) {
    writeFileSync(values.chart, renderEnvelopeChart(snapshot));
    console.log(`[loadsheet] Chart written to ${values.chart}`);
  }
  process.exitCode = snapshot.takeoff.withinLimits ? 0 : 2;
} catch (e) {
  if (e instanceof LoadingError) fail(`${e.code}: ${e.message}`);
  throw e;
}
