/**
 * Residual Aggregator
 *
 * Combines risk coordinates into V = Σ weight × risk and classifies the
 * snapshot:
 * - stop:   any coordinate at its hard limit (risk ≥ 1)
 * - derate: any coordinate above its band's gold threshold, with gold
 *           normalized onto the same [0, 1] scale as the coordinate
 */

import type { RiskCoordinate, ResidualState } from '../types/corridors.js';
import { normalizeThreshold } from './normalize.js';

export function computeResidual(coords: readonly RiskCoordinate[]): number {
  return coords.reduce((sum, c) => sum + c.band.weight * c.value, 0);
}

export function aggregate(coords: readonly RiskCoordinate[]): ResidualState {
  let derate = false;
  let stop = false;

  for (const c of coords) {
    if (c.value >= 1) {
      stop = true;
    } else if (c.value > normalizeThreshold(c.band.gold, c.band)) {
      derate = true;
    }
  }

  return Object.freeze({
    total: computeResidual(coords),
    coords: Object.freeze([...coords]),
    derate,
    stop,
  });
}
