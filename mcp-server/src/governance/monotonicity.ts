/**
 * Monotonicity Guard
 *
 * Once an entity has left the fully safe interior (some coordinate above
 * zero), its residual may not increase: an increase forces derate and
 * stop. Independently, any coordinate at its hard limit forces stop.
 */

import type { ResidualState } from '../types/corridors.js';

export function safeStep(prev: ResidualState, next: ResidualState): ResidualState {
  let derate = next.derate;
  let stop = next.stop;

  if (isWorsening(prev, next)) {
    derate = true;
    stop = true;
  }

  if (next.coords.some(c => c.value >= 1)) {
    stop = true;
  }

  return Object.freeze({ ...next, derate, stop });
}

/** True if the step was escalated by the trend rather than by the snapshot itself */
export function isWorsening(prev: ResidualState, next: ResidualState): boolean {
  return next.total > prev.total && prev.coords.some(c => c.value > 0);
}
