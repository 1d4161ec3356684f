/**
 * Shared zod schemas for tool inputs.
 */

import { z } from 'zod';
import { CORRIDOR_KINDS } from '../types/index.js';

export const corridorKindSchema = z.enum(CORRIDOR_KINDS);

export const corridorBandSchema = z.object({
  varId: z.string().min(1),
  units: z.string(),
  safe: z.number(),
  gold: z.number(),
  hard: z.number(),
  weight: z.number(),
  diagnosticChannel: z.number().int(),
  mandatory: z.boolean(),
});

export const measurementSchema = z.object({
  varId: z.string().min(1),
  value: z.number(),
  sigma: z.number().nonnegative().optional(),
});

export const corridorEnvelopeSchema = z.object({
  kind: corridorKindSchema,
  lMin: z.number(),
  lMax: z.number(),
});

export const nodeStateSchema = z.object({
  nodeId: z.string().min(1),
  // Range is enforced by the controller so it can report InputValidationError.
  dutyCycle: z.number(),
  massRemovedKg: z.number().nonnegative(),
  karma: z.number().nonnegative(),
  powerCost: z.number(),
  baseWeight: z.number(),
  habitat: z.object({
    sensitivity: z.number().nonnegative(),
    inExclusionZone: z.boolean(),
    verticalOffsetM: z.number(),
  }),
  predictedLevels: z.array(z.object({
    kind: corridorKindSchema,
    level: z.number(),
  })),
});

export const permissionBandSchema = z.object({
  kind: corridorKindSchema,
  channelMin: z.number(),
  channelMax: z.number(),
  base: z.number(),
  noEffect: z.number(),
});

export const permissionMeasurementSchema = z.object({
  kind: corridorKindSchema,
  channel: z.number(),
  level: z.number(),
});

export const hiveEnvelopeSchema = z.object({
  hiveId: z.string().min(1),
  broodFrames: z.number().int().nonnegative(),
  nectarKg: z.number().nonnegative(),
  pollenKg: z.number().nonnegative(),
  temperatureC: z.number(),
  foragerLoad: z.number().min(0).max(1),
  toxinPpb: z.number().nonnegative(),
  forageDiversity: z.number().min(0).max(1),
  forageRadiusM: z.number().nonnegative(),
  ecoImpactScore: z.number(),
  safeTemperatureMinC: z.number(),
  safeTemperatureMaxC: z.number(),
  safeToxinMaxPpb: z.number().positive(),
  safeForageDiversityMin: z.number().min(0).max(1),
  safeForageRadiusMinM: z.number().positive(),
});

export const adjustmentSchema = z.object({
  id: z.string().min(1),
  timestamp: z.string().datetime().optional().describe('ISO-8601; defaults to now'),
  hiveId: z.string().min(1),
  deltaPesticidePpb: z.number(),
  deltaShade: z.number(),
  deltaWaterAvailability: z.number(),
  deltaForageRadiusM: z.number(),
  deltaForageDiversity: z.number(),
  deltaLightNits: z.number(),
  deltaNoiseDb: z.number(),
  deltaEcoImpact: z.number(),
});

export const habitatTaskSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(['spray-reduction', 'plant-wildflowers', 'adjust-irrigation', 'dim-lights', 'reduce-noise']),
  ecoRewardHint: z.number(),
});
