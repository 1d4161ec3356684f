/**
 * Hive Tools
 *
 * MCP tools for onboarding hives, applying environmental adjustments
 * through the ledger, reading the audit trail, routing habitat tasks,
 * scoring hive habitat and judging a hive against corridor bands.
 */

import { z } from 'zod';
import type {
  CorridorBand,
  EnvironmentalEnvelope,
  LedgerEvent,
  ResidualState,
  Result,
} from '../types/index.js';
import { InputValidationError, err, ok } from '../types/index.js';
import type { HabitatIndices, HiveCorridorPolicy, RoutedTask } from '../governance/index.js';
import {
  CorridorRegistry,
  evaluateHive as evaluateHiveResidual,
  routeTasks,
  scoreEnvelope,
} from '../governance/index.js';
import { adjustmentSchema, corridorBandSchema, habitatTaskSchema, hiveEnvelopeSchema } from './schemas.js';
import { getGovernorState } from './state.js';

const hiveBandsSchema = z
  .array(corridorBandSchema)
  .describe(
    'Corridor bands over hive metrics: hive_temp_c, toxin_ppb, forager_load, '
    + 'forage_radius_deficit_m, forage_diversity_deficit',
  );

/** Schema for onboard_hive tool input */
export const onboardHiveSchema = z.object({
  envelope: hiveEnvelopeSchema.describe('Initial hive metrics and safe bounds; the eco band is derived'),
});

/** Schema for apply_adjustment tool input */
export const applyAdjustmentSchema = z.object({
  adjustment: adjustmentSchema,
  bands: hiveBandsSchema
    .optional()
    .describe('When given, the adjustment must also not grow the hive corridor residual'),
});

/** Schema for get_ledger tool input */
export const getLedgerSchema = z.object({
  hiveId: z.string().optional().describe('Restrict to one hive (default: all)'),
});

/** Schema for route_tasks tool input */
export const routeTasksSchema = z.object({
  tasks: z.array(habitatTaskSchema).describe('Protective tasks, routed in order'),
});

/** Schema for score_hive tool input */
export const scoreHiveSchema = z.object({
  hiveId: z.string().min(1),
  baselineC: z.number().describe('Ambient baseline temperature for the heat index'),
});

/** Schema for evaluate_hive tool input */
export const evaluateHiveSchema = z.object({
  hiveId: z.string().min(1),
  bands: hiveBandsSchema,
});

export type OnboardHiveInput = z.infer<typeof onboardHiveSchema>;
export type ApplyAdjustmentInput = z.infer<typeof applyAdjustmentSchema>;
export type GetLedgerInput = z.infer<typeof getLedgerSchema>;
export type RouteTasksInput = z.infer<typeof routeTasksSchema>;
export type ScoreHiveInput = z.infer<typeof scoreHiveSchema>;
export type EvaluateHiveInput = z.infer<typeof evaluateHiveSchema>;

function corridorPolicy(bands: readonly CorridorBand[]): Result<HiveCorridorPolicy> {
  const { config } = getGovernorState();
  const registry = CorridorRegistry.fromBands(bands, {
    allowDegenerateBands: config.allowDegenerateBands,
  });
  if (!registry.ok) return registry;
  return ok({ registry: registry.value, defaultSigma: config.defaultSigma });
}

export function onboardHive(input: OnboardHiveInput): Result<EnvironmentalEnvelope> {
  return getGovernorState().hives.onboard(input.envelope);
}

export function applyAdjustment(input: ApplyAdjustmentInput): Result<EnvironmentalEnvelope> {
  const { adjustment, bands } = input;

  let policy: HiveCorridorPolicy | undefined;
  if (bands) {
    const built = corridorPolicy(bands);
    if (!built.ok) return built;
    policy = built.value;
  }

  return getGovernorState().hives.applyAdjustment(
    { ...adjustment, timestamp: adjustment.timestamp ?? new Date().toISOString() },
    policy,
  );
}

export function getLedger(input: GetLedgerInput): { events: readonly LedgerEvent[] } {
  return { events: getGovernorState().hives.events(input.hiveId) };
}

export function routeHabitatTasks(input: RouteTasksInput): RoutedTask[] {
  return routeTasks(input.tasks, getGovernorState().hives);
}

export function scoreHive(
  input: ScoreHiveInput,
): Result<HabitatIndices & Pick<EnvironmentalEnvelope, 'hiveId' | 'ecoBand'>> {
  const hive = getGovernorState().hives.get(input.hiveId);
  if (!hive) {
    return err(new InputValidationError(`Unknown hive "${input.hiveId}"`));
  }
  return ok({
    hiveId: hive.hiveId,
    ecoBand: hive.ecoBand,
    ...scoreEnvelope(hive, input.baselineC),
  });
}

export function evaluateHive(input: EvaluateHiveInput): Result<ResidualState> {
  const hive = getGovernorState().hives.get(input.hiveId);
  if (!hive) {
    return err(new InputValidationError(`Unknown hive "${input.hiveId}"`));
  }
  const policy = corridorPolicy(input.bands);
  if (!policy.ok) return policy;
  return evaluateHiveResidual(hive, policy.value);
}
