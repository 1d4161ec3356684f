/**
 * Governor Configuration Defaults
 *
 * All tunable coefficients for the corridor governor. Deployments override
 * the kernel, permission, potential, shade and sigma values through
 * `loadGovernorConfig` (JSON file + environment), and the governance
 * modules receive them as a validated `GovernorConfig`. The habitat index
 * weights are fixed.
 *
 * The duty-cycle law:
 *   u' = Π[0,1]( u + ηmass·m/mRef + ηkarma·k/kRef + ηgeo·w − ηpower·p − ηcorridor·Φ/φRef )
 */

// ---------------------------------------------------------------------------
// Duty-Cycle Law: gains and reference scales
// ---------------------------------------------------------------------------

/** Gains and reference values for the duty-cycle update and eco score. */
export const DEFAULT_KERNEL_PARAMS = {
  /** Reward for pollutant mass removed */
  etaMass: 0.05,
  /** Reward for hazard-weighted karma */
  etaKarma: 0.02,
  /** Reward for geospatial weight */
  etaGeo: 0.1,
  /** Penalty for power cost */
  etaPower: 0.05,
  /** Penalty for corridor violation Φ */
  etaCorridor: 0.2,
  /** Reference mass, kg */
  mRef: 1e-6,
  /** Reference karma */
  kRef: 1e9,
  /** Reference corridor penalty */
  phiRef: 1.0,
  /** Vertical attenuation of the geospatial weight, 1/m */
  alphaZ: 0.05,
  /** Pollutant share of the eco-impact score (1 − β goes to corridor margin) */
  beta: 0.7,
} as const;

/**
 * Multiplier on Φ inside an exclusion zone. Any non-zero corridor
 * excess there dominates every reward term.
 */
export const EXCLUSION_PENALTY_FACTOR = 1e6;

/** Added to reference scales before dividing */
export const REFERENCE_EPSILON = 1e-12;

// ---------------------------------------------------------------------------
// Permission Oracle
// ---------------------------------------------------------------------------

export const PERMISSION_DEFAULTS = {
  /** Emission permitted only while the worst excess ratio is below this */
  hardThreshold: 1.0,
  /** Floor for (noEffect − base) */
  epsilon: 1e-9,
} as const;

/**
 * Quadratic risk potential gate: V = Σ weight × risk², permitted while
 * V ≤ vSafe and every risk ≤ rHard.
 */
export const POTENTIAL_GATE = {
  vSafe: 0.25,
  rHard: 0.8,
} as const;

// ---------------------------------------------------------------------------
// Hive Temperature Model
// ---------------------------------------------------------------------------

/**
 * Shade-to-temperature model. Adding shade (positive delta) cools by up
 * to 5 °C; removing shade warms by up to 2.5 °C.
 */
export const SHADE_MODEL = {
  coolingPerUnitC: 5.0,
  warmingPerUnitC: 2.5,
} as const;

// ---------------------------------------------------------------------------
// Risk Coordinates
// ---------------------------------------------------------------------------

/** Uncertainty attached to a coordinate when the measurement has none */
export const DEFAULT_SIGMA = 0.05;

/**
 * Whether bands with safe == hard are accepted. When accepted, the
 * normalizer treats them as a step at `safe`.
 */
export const ALLOW_DEGENERATE_BANDS = false;

// ---------------------------------------------------------------------------
// Habitat Indices
// ---------------------------------------------------------------------------

export const HABITAT_INDEX = {
  /** Degrees above baseline at which heat risk saturates */
  heatSpanC: 15,
  /** Toxin ratio (ppb / safe max) at which toxin load saturates */
  toxinRatioCap: 2,
  /** Radius ratio (radius / min radius) at which habitat credit saturates */
  radiusRatioCap: 2,
  diversityWeight: 0.6,
  radiusWeight: 0.4,
  habitatWeight: 0.7,
  riskWeight: 0.3,
  /** Scale of the hive-corridor eco-impact score */
  scoreScale: 100,
} as const;
