/**
 * Corridor Types
 *
 * A corridor is the safe/gold/hard threshold triple for one monitored
 * variable. Measurements are normalized against their corridor into risk
 * coordinates, and the coordinates are summed into a residual that drives
 * derate/stop decisions.
 */

/**
 * Closed set of corridor kinds. Every per-kind check (envelopes, permission
 * bands, predicted levels) carries one of these tags instead of having its
 * own record type.
 */
export const CORRIDOR_KINDS = ['emf', 'thermal', 'acoustic', 'chemical', 'rf'] as const;

export type CorridorKind = (typeof CORRIDOR_KINDS)[number];

/** Safety thresholds for one monitored variable. */
export interface CorridorBand {
  /** Variable identifier (e.g., "hive_temp_c") */
  varId: string;

  /** Unit label, e.g. "C", "ppb", "dimensionless" */
  units: string;

  /** Upper bound of the safe band. Measurements at or below map to risk 0. */
  safe: number;

  /** Upper bound of the preferred band. Above this (normalized) → derate. */
  gold: number;

  /** Hard limit. Measurements at or above map to risk 1 → stop. */
  hard: number;

  /** Contribution of this variable to the residual */
  weight: number;

  /** Diagnostic channel id */
  diagnosticChannel: number;

  /** Mandatory corridors must be present before an entity is governed */
  mandatory: boolean;
}

/** One measurement normalized against its corridor band. */
export interface RiskCoordinate {
  varId: string;

  /** Normalized risk in [0, 1] */
  value: number;

  /** Measurement uncertainty. Carried for diagnostics only. */
  sigma: number;

  band: CorridorBand;
}

/**
 * Residual snapshot for one evaluation cycle.
 * Callers keep the previous snapshot to drive the monotonicity guard.
 */
export interface ResidualState {
  /** Weighted potential Σ weight × risk (≥ 0) */
  readonly total: number;

  readonly coords: readonly RiskCoordinate[];

  /** Advisory: reduce activity */
  readonly derate: boolean;

  /** Mandatory: halt activity */
  readonly stop: boolean;
}

/** A raw measurement for one registered variable */
export interface Measurement {
  varId: string;
  value: number;
  /** Overrides the configured default uncertainty */
  sigma?: number;
}
