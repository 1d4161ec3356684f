/**
 * Adjustment Ledger
 *
 * Applies environmental adjustments to a hive envelope under hard
 * directional invariants, checked in a fixed order:
 *
 *   1. no pesticide increase
 *   2. projected temperature ≤ safe max
 *   3. projected forage radius ≥ safe min
 *   4. no light or noise increase
 *   5. no eco-impact decrease
 *   6. with a corridor policy: no residual growth outside the safe
 *      interior and no new hard-limit breach
 *
 * Deltas must be finite. The first failing check is returned as an
 * InvariantViolation and the envelope is left untouched. Accepted adjustments produce a new envelope
 * and append an immutable {adjustment, pre, post} event.
 */

import type {
  AdjustmentRequest,
  EcoBand,
  EnvironmentalEnvelope,
  LedgerEvent,
} from '../types/hive.js';
import { InputValidationError, InvariantViolation, err, ok } from '../types/errors.js';
import type { ConfigurationError, Result } from '../types/errors.js';
import { checkHiveResidual } from './hive-corridors.js';
import type { HiveCorridorPolicy } from './hive-corridors.js';

export type AdjustmentError = InvariantViolation | InputValidationError | ConfigurationError;

const DELTA_FIELDS = [
  'deltaPesticidePpb',
  'deltaShade',
  'deltaWaterAvailability',
  'deltaForageRadiusM',
  'deltaForageDiversity',
  'deltaLightNits',
  'deltaNoiseDb',
  'deltaEcoImpact',
] as const satisfies readonly (keyof AdjustmentRequest)[];

export interface ShadeModel {
  coolingPerUnitC: number;
  warmingPerUnitC: number;
}

/** Temperature change from a shade delta, shade clamped to [-1, 1] */
export function temperatureDeltaFromShade(deltaShade: number, model: ShadeModel): number {
  const shade = Math.min(1, Math.max(-1, deltaShade));
  return shade >= 0
    ? -model.coolingPerUnitC * shade
    : model.warmingPerUnitC * -shade;
}

/**
 * Safe when temperature, toxin and forage all hold; critical when none do.
 */
export function evaluateBand(env: Omit<EnvironmentalEnvelope, 'ecoBand'>): EcoBand {
  const tempOk = env.temperatureC >= env.safeTemperatureMinC
    && env.temperatureC <= env.safeTemperatureMaxC;
  const toxinOk = env.toxinPpb <= env.safeToxinMaxPpb;
  const forageOk = env.forageDiversity >= env.safeForageDiversityMin
    && env.forageRadiusM >= env.safeForageRadiusMinM;

  if (tempOk && toxinOk && forageOk) return 'safe';
  if (!tempOk && !toxinOk && !forageOk) return 'critical';
  return 'warning';
}

export class AdjustmentLedger {
  private readonly log: LedgerEvent[] = [];

  constructor(private readonly shade: ShadeModel) {}

  /** Check the invariants without touching the ledger */
  check(
    env: EnvironmentalEnvelope,
    adj: AdjustmentRequest,
    policy?: HiveCorridorPolicy,
  ): Result<EnvironmentalEnvelope, AdjustmentError> {
    if (adj.hiveId !== env.hiveId) {
      return err(new InputValidationError(
        `Adjustment ${adj.id} targets hive "${adj.hiveId}", envelope is "${env.hiveId}"`,
      ));
    }

    const nonFinite = DELTA_FIELDS.find(field => !Number.isFinite(adj[field]));
    if (nonFinite) {
      return err(new InputValidationError(
        `Adjustment ${adj.id} has a non-finite ${nonFinite}: ${adj[nonFinite]}`,
      ));
    }

    const projectedTemp = env.temperatureC + temperatureDeltaFromShade(adj.deltaShade, this.shade);
    const projectedRadius = env.forageRadiusM + adj.deltaForageRadiusM;
    if (!Number.isFinite(projectedTemp) || !Number.isFinite(projectedRadius)) {
      return err(new InputValidationError(
        `Adjustment ${adj.id} projects a non-finite temperature or forage radius for hive "${env.hiveId}"`,
      ));
    }

    if (adj.deltaPesticidePpb > 0) {
      return err(new InvariantViolation(
        'pesticide-increase',
        'Adjustment would increase pesticide exposure',
      ));
    }

    if (projectedTemp > env.safeTemperatureMaxC) {
      return err(new InvariantViolation(
        'temperature-above-safe-max',
        `Adjustment would raise hive temperature to ${projectedTemp.toFixed(2)} C, above safe max ${env.safeTemperatureMaxC} C`,
      ));
    }

    if (projectedRadius < env.safeForageRadiusMinM) {
      return err(new InvariantViolation(
        'forage-radius-reduction',
        `Adjustment would leave forage radius at ${projectedRadius} m, below safe min ${env.safeForageRadiusMinM} m`,
      ));
    }

    if (adj.deltaLightNits > 0 || adj.deltaNoiseDb > 0) {
      return err(new InvariantViolation(
        'light-or-noise-increase',
        'Adjustment would increase artificial light or noise',
      ));
    }

    if (adj.deltaEcoImpact < 0) {
      return err(new InvariantViolation(
        'eco-impact-decrease',
        'Adjustment would decrease the eco-impact score',
      ));
    }

    const next: EnvironmentalEnvelope = {
      ...env,
      toxinPpb: env.toxinPpb + adj.deltaPesticidePpb,
      forageRadiusM: projectedRadius,
      forageDiversity: Math.min(1, Math.max(0, env.forageDiversity + adj.deltaForageDiversity)),
      temperatureC: projectedTemp,
      ecoImpactScore: env.ecoImpactScore + adj.deltaEcoImpact,
    };
    next.ecoBand = evaluateBand(next);

    if (policy) {
      const residual = checkHiveResidual(env, next, policy);
      if (!residual.ok) return residual;
    }
    return ok(next);
  }

  /**
   * Validate and apply. On success the returned envelope replaces the
   * caller's copy; on failure the caller keeps `env` as it was.
   */
  apply(
    env: EnvironmentalEnvelope,
    adj: AdjustmentRequest,
    policy?: HiveCorridorPolicy,
  ): Result<EnvironmentalEnvelope, AdjustmentError> {
    const result = this.check(env, adj, policy);
    if (!result.ok) return result;

    this.log.push(Object.freeze({
      adjustment: Object.freeze({ ...adj }),
      preEnvelope: Object.freeze({ ...env }),
      postEnvelope: Object.freeze({ ...result.value }),
    }));
    return result;
  }

  events(): readonly LedgerEvent[] {
    return Object.freeze([...this.log]);
  }

  eventsFor(hiveId: string): LedgerEvent[] {
    return this.log.filter(e => e.adjustment.hiveId === hiveId);
  }
}
