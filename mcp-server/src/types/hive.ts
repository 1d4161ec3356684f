/**
 * Hive Types
 *
 * Hive envelopes hold bee-centered metrics and their safe bounds. They are
 * changed only through environmental adjustments that pass the ledger's
 * directional invariants; every accepted change is recorded as a ledger
 * event.
 */

export type EcoBand = 'safe' | 'warning' | 'critical';

/** Ordering used when protective work goes to the worst hives first */
export const ECO_BAND_PRIORITY: Record<EcoBand, number> = {
  critical: 0,
  warning: 1,
  safe: 2,
};

export interface EnvironmentalEnvelope {
  hiveId: string;
  broodFrames: number;
  nectarKg: number;
  pollenKg: number;
  temperatureC: number;
  /** Forager load in [0, 1] */
  foragerLoad: number;
  toxinPpb: number;
  /** Forage diversity index in [0, 1] */
  forageDiversity: number;
  forageRadiusM: number;
  ecoBand: EcoBand;
  ecoImpactScore: number;

  // Safe bounds
  safeTemperatureMinC: number;
  safeTemperatureMaxC: number;
  safeToxinMaxPpb: number;
  safeForageDiversityMin: number;
  safeForageRadiusMinM: number;
}

/**
 * Proposed environmental change for one hive. Single use.
 *
 * Directional constraints:
 * - pesticide, light and noise deltas must be ≤ 0
 * - the eco-impact delta must be ≥ 0
 */
export interface AdjustmentRequest {
  id: string;
  /** ISO-8601 */
  timestamp: string;
  hiveId: string;
  deltaPesticidePpb: number;
  /** Shade fraction change, clamped to [-1, 1] by the temperature model */
  deltaShade: number;
  deltaWaterAvailability: number;
  deltaForageRadiusM: number;
  deltaForageDiversity: number;
  deltaLightNits: number;
  deltaNoiseDb: number;
  deltaEcoImpact: number;
}

/** Immutable audit record of one accepted envelope mutation */
export interface LedgerEvent {
  readonly adjustment: AdjustmentRequest;
  readonly preEnvelope: EnvironmentalEnvelope;
  readonly postEnvelope: EnvironmentalEnvelope;
}
