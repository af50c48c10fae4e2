import { z } from 'zod';
import type { AircraftPreset, LoadsheetRequest } from '@loadsheet/shared';

const cgSchema = z.object({
  value: z.number(),
  unit: z.enum(['meter', 'millimeter']),
});

export const aircraftPresetSchema = z.object({
  registration: z.string().min(1),
  typeDesignator: z.string().min(1),
  name: z.string(),
  emptyMass: z.object({
    kg: z.number(),
    armM: z.number(),
  }),
  stations: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string(),
      armM: z.number(),
    })
  ),
  fuel: z.object({
    name: z.string(),
    armM: z.number(),
    fuelType: z.enum(['avgas', 'mogas']),
    unit: z.enum(['liter', 'gallon']),
    capacity: z.number().nonnegative(),
  }),
  limits: z.object({
    minimumWeightKg: z.number(),
    mtowKg: z.number().positive(),
    forwardCg: cgSchema,
    rearwardCg: cgSchema,
  }),
}) satisfies z.ZodType<AircraftPreset>;

export const loadsheetRequestSchema = z.object({
  aircraft: z.string().min(1),
  loads: z.array(
    z.object({
      station: z.string().min(1),
      kg: z.number().finite(),
    })
  ),
  fuel: z.discriminatedUnion('mode', [
    z.object({ mode: z.literal('max') }),
    z.object({ mode: z.literal('fixed'), volume: z.number().finite().nonnegative() }),
  ]),
  tripFuel: z.number().finite().nonnegative().optional(),
}) satisfies z.ZodType<LoadsheetRequest>;

/** Flatten zod issues into "path: message" lines */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
