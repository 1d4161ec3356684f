/**
 * Habitat indices for a hive corridor.
 *
 * Heat and toxin indices are risks in [0, 1] (higher is worse); habitat
 * stability is a credit in [0, 1] (higher is better). The eco-impact score
 * blends them onto a 0–100 scale.
 */

import type { EnvironmentalEnvelope } from '../types/hive.js';
import { HABITAT_INDEX } from './governor.config.js';

export interface HabitatIndices {
  heatRisk: number;
  toxinLoad: number;
  habitatStability: number;
  /** 0–100, higher is better */
  ecoImpactScore: number;
}

export function heatRiskIndex(temperatureC: number, baselineC: number): number {
  const delta = Math.max(temperatureC - baselineC, 0);
  return clamp(delta / HABITAT_INDEX.heatSpanC, 0, 1);
}

export function toxinLoadIndex(ppb: number, safeMaxPpb: number): number {
  const ratio = clamp(ppb / safeMaxPpb, 0, HABITAT_INDEX.toxinRatioCap);
  return clamp(ratio / HABITAT_INDEX.toxinRatioCap, 0, 1);
}

export function habitatStabilityIndex(
  diversity: number,
  radiusM: number,
  minRadiusM: number,
): number {
  const d = clamp(diversity, 0, 1);
  const radiusFactor = clamp(radiusM / minRadiusM, 0, HABITAT_INDEX.radiusRatioCap)
    / HABITAT_INDEX.radiusRatioCap;
  return clamp(
    HABITAT_INDEX.diversityWeight * d + HABITAT_INDEX.radiusWeight * radiusFactor,
    0,
    1,
  );
}

export function hiveEcoImpactScore(heat: number, toxin: number, habitat: number): number {
  const risk = (heat + toxin) / 2;
  const score = (HABITAT_INDEX.habitatWeight * habitat + HABITAT_INDEX.riskWeight * (1 - risk))
    * HABITAT_INDEX.scoreScale;
  return clamp(score, 0, HABITAT_INDEX.scoreScale);
}

/** All indices for one envelope, against an ambient baseline temperature */
export function scoreEnvelope(env: EnvironmentalEnvelope, baselineC: number): HabitatIndices {
  const heatRisk = heatRiskIndex(env.temperatureC, baselineC);
  const toxinLoad = toxinLoadIndex(env.toxinPpb, env.safeToxinMaxPpb);
  const habitatStability = habitatStabilityIndex(
    env.forageDiversity,
    env.forageRadiusM,
    env.safeForageRadiusMinM,
  );
  return {
    heatRisk,
    toxinLoad,
    habitatStability,
    ecoImpactScore: hiveEcoImpactScore(heatRisk, toxinLoad, habitatStability),
  };
}

function clamp(value: number, min: number, max: number): number {
  // NaN (e.g. 0/0) clamps to the low end
  if (Number.isNaN(value)) return min;
  return Math.max(min, Math.min(max, value));
}
