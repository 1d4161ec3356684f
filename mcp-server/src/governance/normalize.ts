/**
 * Risk Normalizer
 *
 * Piecewise-linear map of a raw measurement onto [0, 1] using its band:
 *
 *   measured ≤ safe → 0
 *   measured ≥ hard → 1
 *   otherwise       → (measured − safe) / (hard − safe)
 */

import type { CorridorBand } from '../types/corridors.js';

export function normalize(measured: number, band: CorridorBand): number {
  if (Number.isNaN(measured)) {
    // An unreadable measurement counts as a hard breach.
    return 1;
  }
  if (band.safe === band.hard) {
    return measured > band.safe ? 1 : 0;
  }
  if (measured <= band.safe) return 0;
  if (measured >= band.hard) return 1;
  return (measured - band.safe) / (band.hard - band.safe);
}

/**
 * Express a raw threshold of the band (typically `gold`) on the same
 * normalized scale as the risk coordinates.
 */
export function normalizeThreshold(threshold: number, band: CorridorBand): number {
  return normalize(threshold, band);
}
