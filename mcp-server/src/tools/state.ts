/**
 * In-memory governor state shared by the tool handlers.
 *
 * Holds the deployment configuration and the hive store. Corridor bands
 * and envelopes for node/corridor evaluation arrive with each request, so
 * those evaluations stay pure.
 */

import type { GovernorConfig } from '../governance/config.js';
import { DEFAULT_GOVERNOR_CONFIG } from '../governance/config.js';
import { HiveLedgerStore } from '../governance/hive-store.js';

export interface GovernorState {
  config: GovernorConfig;
  hives: HiveLedgerStore;
}

let state: GovernorState | null = null;

export function createGovernorState(config: GovernorConfig): GovernorState {
  return { config, hives: new HiveLedgerStore(config.shade) };
}

/** Lazily falls back to the built-in defaults */
export function getGovernorState(): GovernorState {
  if (!state) {
    state = createGovernorState(DEFAULT_GOVERNOR_CONFIG);
  }
  return state;
}

export function setGovernorState(next: GovernorState): void {
  state = next;
}
