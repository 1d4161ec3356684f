/**
 * Hive Corridors
 *
 * Reads a hive envelope as corridor measurements so a hive can be judged
 * by the same registry → normalizer → aggregator pipeline as any other
 * entity, and so an adjustment can be refused when it moves the hive's
 * residual the wrong way.
 *
 * Metrics where smaller is worse (forage radius, diversity) enter as
 * their shortfall below the envelope's safe minimum.
 */

import type { Measurement, ResidualState } from '../types/corridors.js';
import type { EnvironmentalEnvelope } from '../types/hive.js';
import { InvariantViolation, err, ok } from '../types/errors.js';
import type { ConfigurationError, InputValidationError, Result } from '../types/errors.js';
import type { CorridorRegistry } from './registry.js';
import { evaluateCorridors } from './pipeline.js';
import { isWorsening } from './monotonicity.js';

/** Corridor variable ids a hive envelope can supply */
export const HIVE_METRICS = {
  hive_temp_c: env => env.temperatureC,
  toxin_ppb: env => env.toxinPpb,
  forager_load: env => env.foragerLoad,
  forage_radius_deficit_m: env => Math.max(env.safeForageRadiusMinM - env.forageRadiusM, 0),
  forage_diversity_deficit: env => Math.max(env.safeForageDiversityMin - env.forageDiversity, 0),
} satisfies Record<string, (env: EnvironmentalEnvelope) => number>;

export interface HiveCorridorPolicy {
  registry: CorridorRegistry;
  defaultSigma: number;
}

export function hiveMeasurements(env: EnvironmentalEnvelope): Measurement[] {
  return Object.entries(HIVE_METRICS).map(([varId, read]) => ({ varId, value: read(env) }));
}

/** Residual of one hive against the policy's bands */
export function evaluateHive(
  env: EnvironmentalEnvelope,
  policy: HiveCorridorPolicy,
): Result<ResidualState, ConfigurationError | InputValidationError> {
  return evaluateCorridors(policy.registry, hiveMeasurements(env), {
    defaultSigma: policy.defaultSigma,
  });
}

/**
 * Refuse a pre → post change that grows the residual outside the safe
 * interior, or that brings any corridor to its hard limit.
 */
export function checkHiveResidual(
  pre: EnvironmentalEnvelope,
  post: EnvironmentalEnvelope,
  policy: HiveCorridorPolicy,
): Result<ResidualState, InvariantViolation | ConfigurationError | InputValidationError> {
  const before = evaluateHive(pre, policy);
  if (!before.ok) return before;
  const after = evaluateHive(post, policy);
  if (!after.ok) return after;

  if (isWorsening(before.value, after.value)) {
    return err(new InvariantViolation(
      'corridor-residual-increase',
      `Adjustment would raise the hive corridor residual from ${before.value.total.toFixed(3)} to ${after.value.total.toFixed(3)}`,
    ));
  }

  const breached = after.value.coords.find(c =>
    c.value >= 1 && !before.value.coords.some(p => p.varId === c.varId && p.value >= 1));
  if (breached) {
    return err(new InvariantViolation(
      'corridor-residual-increase',
      `Adjustment would push corridor "${breached.varId}" to its hard limit`,
    ));
  }

  return after;
}
