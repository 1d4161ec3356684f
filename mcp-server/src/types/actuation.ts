/**
 * Actuation Types
 *
 * Inputs and outputs of the duty-cycle controller. A node proposes a duty
 * cycle together with the corridor levels the physics model predicts at
 * that duty cycle; the controller returns a bounded, corridor-penalized
 * duty cycle and a permission flag.
 */

import type { CorridorKind } from './corridors.js';

/** Lower/upper level bounds for one corridor kind */
export interface CorridorEnvelope {
  kind: CorridorKind;
  /** Lower bound (often 0) */
  lMin: number;
  /** Upper bound, in the corridor's unit (V/m, °C, dB, mg/m³) */
  lMax: number;
}

/** Level predicted by the physics model for one corridor kind */
export interface PredictedLevel {
  kind: CorridorKind;
  level: number;
}

/** Pollinator habitat context at the node location */
export interface HabitatContext {
  /** Sensitivity scalar, ≥ 1 near hives */
  sensitivity: number;

  /** Inside a strict no-emission zone */
  inExclusionZone: boolean;

  /** Vertical distance to the dominant flight band, metres */
  verticalOffsetM: number;
}

export interface NodeActuationState {
  nodeId: string;

  /** Proposed actuation intensity in [0, 1] */
  dutyCycle: number;

  /** Pollutant mass removed this interval, kg */
  massRemovedKg: number;

  /** Hazard-weighted karma for this interval */
  karma: number;

  /** Normalized power cost in [0, 1] */
  powerCost: number;

  /** Base geospatial weight before habitat refinement */
  baseWeight: number;

  habitat: HabitatContext;

  predictedLevels: PredictedLevel[];
}

/** Coefficients of the duty-cycle update law and eco-impact score */
export interface KernelParams {
  etaMass: number;
  etaKarma: number;
  etaGeo: number;
  etaPower: number;
  etaCorridor: number;
  mRef: number;
  kRef: number;
  phiRef: number;
  alphaZ: number;
  beta: number;
}

/**
 * Decision record handed to telemetry/audit consumers.
 * Field names are the wire contract and stay snake_case.
 */
export interface KernelDecision {
  entity_id: string;
  /** Updated duty cycle in [0, 1] */
  safe_duty_cycle: number;
  permitted: boolean;
  /** Corridor penalty Φ (≥ 0) */
  phi_penalty: number;
  /** Eco-impact score in [0, 1] */
  eco_impact: number;
}
