/**
 * Corridor Tools
 *
 * MCP tools for residual evaluation and the corridor permission gate.
 * Bands arrive with each request, so both tools are pure.
 */

import { z } from 'zod';
import type { PermissionDecision, ResidualState, Result } from '../types/index.js';
import { ok } from '../types/index.js';
import {
  CorridorRegistry,
  PermissionOracle,
  evaluateCorridors,
  isWorsening,
  riskPotential,
} from '../governance/index.js';
import type { RiskPotential } from '../governance/index.js';
import {
  corridorBandSchema,
  corridorKindSchema,
  measurementSchema,
  permissionBandSchema,
  permissionMeasurementSchema,
} from './schemas.js';
import { getGovernorState } from './state.js';

/** Schema for evaluate_corridors tool input */
export const evaluateCorridorsSchema = z.object({
  bands: z.array(corridorBandSchema).describe('Corridor bands for this entity'),
  measurements: z.array(measurementSchema).describe('Current raw measurements'),
  previousMeasurements: z
    .array(measurementSchema)
    .optional()
    .describe('Previous cycle measurements; enables the monotonicity ratchet'),
});

/** Schema for check_corridor_permission tool input */
export const checkPermissionSchema = z.object({
  kind: corridorKindSchema.describe('Corridor kind to gate (e.g., "rf")'),
  bands: z.array(permissionBandSchema),
  measurements: z.array(permissionMeasurementSchema),
  hardThreshold: z
    .number()
    .positive()
    .optional()
    .describe('Overrides the configured hard threshold'),
});

export type EvaluateCorridorsInput = z.infer<typeof evaluateCorridorsSchema>;
export type CheckPermissionInput = z.infer<typeof checkPermissionSchema>;

export interface CorridorEvaluation {
  residual: ResidualState;
  /** Escalated because the residual grew outside the safe interior */
  worsening: boolean;
  /** Quadratic potential gate over the same coordinates */
  potential: RiskPotential;
}

/**
 * Normalize, aggregate and (with previous measurements) ratchet one
 * entity's corridor state.
 */
export function evaluateCorridorState(input: EvaluateCorridorsInput): Result<CorridorEvaluation> {
  const { config } = getGovernorState();

  const registry = CorridorRegistry.fromBands(input.bands, {
    allowDegenerateBands: config.allowDegenerateBands,
  });
  if (!registry.ok) return registry;

  let prev: ResidualState | undefined;
  if (input.previousMeasurements) {
    const previous = evaluateCorridors(registry.value, input.previousMeasurements, {
      defaultSigma: config.defaultSigma,
    });
    if (!previous.ok) return previous;
    prev = previous.value;
  }

  const next = evaluateCorridors(registry.value, input.measurements, {
    prev,
    defaultSigma: config.defaultSigma,
  });
  if (!next.ok) return next;

  return ok({
    residual: next.value,
    worsening: prev ? isWorsening(prev, next.value) : false,
    potential: riskPotential(next.value.coords, config.potential),
  });
}

/**
 * "No corridor, no emission" for one corridor kind.
 */
export function checkCorridorPermission(input: CheckPermissionInput): Result<PermissionDecision> {
  const { config } = getGovernorState();

  const oracle = PermissionOracle.create(input.kind, input.bands, {
    hardThreshold: input.hardThreshold ?? config.permission.hardThreshold,
    epsilon: config.permission.epsilon,
  });
  if (!oracle.ok) return oracle;

  return ok(oracle.value.permit(input.measurements));
}
