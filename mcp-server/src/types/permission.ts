/**
 * Permission Types
 *
 * "No corridor, no emission": a measurement is judged against the band
 * covering its channel (frequency for RF, octave band for acoustic, …),
 * and emission is permitted only while the worst excess ratio stays below
 * a hard threshold.
 */

import type { CorridorKind } from './corridors.js';

export interface PermissionBand<K extends CorridorKind = CorridorKind> {
  kind: K;
  /** Inclusive channel range covered by this band (e.g., GHz) */
  channelMin: number;
  channelMax: number;
  /** Background level with no emission */
  base: number;
  /** Highest level with no observed effect */
  noEffect: number;
}

export interface PermissionMeasurement<K extends CorridorKind = CorridorKind> {
  kind: K;
  channel: number;
  level: number;
}

export interface PermissionDecision<K extends CorridorKind = CorridorKind> {
  kind: K;
  permitted: boolean;
  /** Worst normalized excess over all matched measurements */
  ratio: number;
  hardThreshold: number;
  /** Measurements that fell in a band */
  matched: number;
}
