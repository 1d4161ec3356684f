/**
 * Corridor Evaluation Pipeline
 *
 * registry → normalizer → aggregator → monotonicity guard, for one entity
 * and one cycle. Pure: the caller owns the previous snapshot.
 */

import type { Measurement, ResidualState, RiskCoordinate } from '../types/corridors.js';
import { ConfigurationError, InputValidationError, err, ok } from '../types/errors.js';
import type { Result } from '../types/errors.js';
import { CorridorRegistry } from './registry.js';
import { normalize } from './normalize.js';
import { aggregate } from './residual.js';
import { safeStep } from './monotonicity.js';

export interface EvaluateCorridorsOptions {
  /** Snapshot from the previous cycle; enables the monotonicity ratchet */
  prev?: ResidualState;
  /** Uncertainty for measurements that carry none */
  defaultSigma: number;
}

export function evaluateCorridors(
  registry: CorridorRegistry,
  measurements: readonly Measurement[],
  options: EvaluateCorridorsOptions,
): Result<ResidualState, ConfigurationError | InputValidationError> {
  if (!registry.isComplete()) {
    return err(new ConfigurationError('Corridor registry is empty or has malformed mandatory bands'));
  }

  const byVar = new Map<string, Measurement>();
  for (const m of measurements) {
    if (!Number.isFinite(m.value)) {
      return err(new InputValidationError(`Measurement for "${m.varId}" is not finite: ${m.value}`));
    }
    byVar.set(m.varId, m);
  }

  const coords: RiskCoordinate[] = [];
  for (const band of registry.list()) {
    const m = byVar.get(band.varId);
    if (!m) {
      if (band.mandatory) {
        return err(new InputValidationError(`Missing measurement for mandatory corridor "${band.varId}"`));
      }
      continue;
    }
    coords.push({
      varId: band.varId,
      value: normalize(m.value, band),
      sigma: m.sigma ?? options.defaultSigma,
      band,
    });
  }

  const next = aggregate(coords);
  return ok(options.prev ? safeStep(options.prev, next) : next);
}
