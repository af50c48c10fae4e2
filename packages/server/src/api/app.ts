import express from 'express';
import type { Express, Request, Response } from 'express';
import { v4 as uuid } from 'uuid';
import type { AirplaneSnapshot, ErrorResponse, LoadsheetResponse } from '@loadsheet/shared';
import { LoadingError } from '../engine/LoadingError.js';
import { toSnapshot } from '../engine/snapshot.js';
import type { PresetDB } from '../data/PresetDB.js';
import { buildAirplane } from '../loadsheet/buildAirplane.js';
import { renderEnvelopeChart } from '../render/EnvelopeChart.js';
import { renderLoadTable } from '../render/LoadTable.js';
import { formatIssues, loadsheetRequestSchema } from './schemas.js';

export interface AppDependencies {
  presets: PresetDB;
}

/**
 * Validate the request, evaluate it and hand the snapshot to `respond`.
 * Every failure is answered here; nothing is kept between requests.
 */
function evaluate(
  presets: PresetDB,
  req: Request,
  res: Response,
  respond: (id: string, snapshot: AirplaneSnapshot) => void
): void {
  const parsed = loadsheetRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    const body: ErrorResponse = { error: 'Invalid loadsheet request', issues: formatIssues(parsed.error) };
    res.status(400).json(body);
    return;
  }

  const request = parsed.data;
  const preset = presets.get(request.aircraft);
  if (!preset) {
    const body: ErrorResponse = { error: `Unknown aircraft ${request.aircraft}` };
    res.status(404).json(body);
    return;
  }

  const id = uuid();
  try {
    const snapshot = toSnapshot(buildAirplane(preset, request));
    console.log(
      `[Loadsheet] ${id} ${snapshot.callsign} ${snapshot.takeoff.withinLimits ? 'within limits' : 'OUTSIDE limits'}`
    );
    respond(id, snapshot);
  } catch (e) {
    if (e instanceof LoadingError) {
      console.log(`[Loadsheet] ${id} ${preset.registration} rejected: ${e.code}`);
      const body: ErrorResponse = { error: e.message, code: e.code };
      res.status(422).json(body);
      return;
    }
    console.error(`[Loadsheet] ${id} failed:`, e);
    const body: ErrorResponse = { error: String(e) };
    res.status(500).json(body);
  }
}

export function createApp({ presets }: AppDependencies): Express {
  const app = express();
  app.use(express.json());

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // REST: List aircraft presets
  app.get('/api/aircraft', (_req, res) => {
    res.json(presets.list());
  });

  // REST: Get one preset
  app.get('/api/aircraft/:registration', (req, res) => {
    const preset = presets.get(req.params.registration);
    if (!preset) {
      res.status(404).json({ error: 'Aircraft not found' });
      return;
    }
    res.json(preset);
  });

  // REST: Evaluate a loadsheet
  app.post('/api/loadsheet', (req, res) => {
    evaluate(presets, req, res, (id, snapshot) => {
      const body: LoadsheetResponse = { id, snapshot };
      res.json(body);
    });
  });

  // REST: Envelope chart of a loadsheet
  app.post('/api/loadsheet/chart', (req, res) => {
    evaluate(presets, req, res, (_id, snapshot) => {
      res.type('image/svg+xml').send(renderEnvelopeChart(snapshot));
    });
  });

  // REST: Load breakdown table of a loadsheet
  app.post('/api/loadsheet/table', (req, res) => {
    evaluate(presets, req, res, (_id, snapshot) => {
      res.type('image/svg+xml').send(renderLoadTable(snapshot));
    });
  });

  return app;
}
