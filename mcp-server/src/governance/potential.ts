/**
 * Risk Potential Gate
 *
 * A second view of the same risk coordinates as the residual: the
 * quadratic potential
 *
 *   V = Σ weight × max(r, 0)²
 *
 * grows slowly near the safe edge and sharply toward the hard edge.
 * Emission is permitted only while V ≤ vSafe and no single coordinate
 * exceeds rHard.
 */

import type { RiskCoordinate } from '../types/corridors.js';

export interface PotentialGate {
  vSafe: number;
  rHard: number;
}

export interface RiskPotential {
  value: number;
  /** Largest single coordinate */
  maxRisk: number;
  permitted: boolean;
}

export function riskPotential(
  coords: readonly RiskCoordinate[],
  gate: PotentialGate,
): RiskPotential {
  let value = 0;
  let maxRisk = 0;

  for (const c of coords) {
    const r = Math.max(c.value, 0);
    value += c.band.weight * r * r;
    if (r > maxRisk) maxRisk = r;
  }

  return {
    value,
    maxRisk,
    permitted: value <= gate.vSafe && maxRisk <= gate.rHard,
  };
}
