/**
 * Adjustment Router
 *
 * Routes protective habitat tasks to hives. Each task becomes an
 * adjustment and is offered to hives worst band first (critical, warning,
 * safe). A hive that rejects it with an invariant violation is skipped and
 * the next one is tried; the same request is never offered to the same
 * hive twice.
 */

import type { AdjustmentRequest, EnvironmentalEnvelope } from '../types/hive.js';
import { ECO_BAND_PRIORITY } from '../types/hive.js';
import type { HiveLedgerStore } from './hive-store.js';

export type TaskKind =
  | 'spray-reduction'
  | 'plant-wildflowers'
  | 'adjust-irrigation'
  | 'dim-lights'
  | 'reduce-noise';

export interface HabitatTask {
  id: string;
  kind: TaskKind;
  /** Caller's estimate of the task's value; carried back in the result, never read by routing */
  ecoRewardHint: number;
}

export interface RoutedTask {
  task: HabitatTask;
  /** Hive that accepted the task, or the first to reject it; null with no hives */
  hiveId: string | null;
  accepted: boolean;
  reason: string;
}

type AdjustmentDeltas = Omit<AdjustmentRequest, 'id' | 'timestamp' | 'hiveId'>;

const NO_CHANGE: AdjustmentDeltas = {
  deltaPesticidePpb: 0,
  deltaShade: 0,
  deltaWaterAvailability: 0,
  deltaForageRadiusM: 0,
  deltaForageDiversity: 0,
  deltaLightNits: 0,
  deltaNoiseDb: 0,
  deltaEcoImpact: 0,
};

export const TASK_PROFILES: Record<TaskKind, AdjustmentDeltas> = {
  'spray-reduction': {
    ...NO_CHANGE,
    deltaPesticidePpb: -10,
    deltaForageDiversity: 0.05,
    deltaEcoImpact: 5,
  },
  'plant-wildflowers': {
    ...NO_CHANGE,
    deltaWaterAvailability: 0.1,
    deltaForageRadiusM: 200,
    deltaForageDiversity: 0.15,
    deltaEcoImpact: 10,
  },
  'adjust-irrigation': {
    ...NO_CHANGE,
    deltaWaterAvailability: 0.1,
    deltaForageDiversity: 0.02,
    deltaEcoImpact: 2,
  },
  'dim-lights': {
    ...NO_CHANGE,
    deltaLightNits: -50,
    deltaEcoImpact: 1,
  },
  'reduce-noise': {
    ...NO_CHANGE,
    deltaNoiseDb: -10,
    deltaEcoImpact: 1,
  },
};

export function taskToAdjustment(
  task: HabitatTask,
  hiveId: string,
  timestamp: string,
): AdjustmentRequest {
  return {
    id: `adj-${hiveId}-${task.id}`,
    timestamp,
    hiveId,
    ...TASK_PROFILES[task.kind],
  };
}

/** Worst band first; ties keep onboarding order */
export function orderByRisk(hives: readonly EnvironmentalEnvelope[]): EnvironmentalEnvelope[] {
  return hives
    .map((hive, index) => ({ hive, index }))
    .sort((a, b) =>
      ECO_BAND_PRIORITY[a.hive.ecoBand] - ECO_BAND_PRIORITY[b.hive.ecoBand] || a.index - b.index)
    .map(({ hive }) => hive);
}

export function routeTasks(
  tasks: readonly HabitatTask[],
  store: HiveLedgerStore,
  now: () => string = () => new Date().toISOString(),
): RoutedTask[] {
  const results: RoutedTask[] = [];

  for (const task of tasks) {
    let firstRejection: RoutedTask | null = null;
    let accepted: RoutedTask | null = null;

    for (const hive of orderByRisk(store.list())) {
      const result = store.applyAdjustment(taskToAdjustment(task, hive.hiveId, now()));
      if (result.ok) {
        accepted = {
          task,
          hiveId: hive.hiveId,
          accepted: true,
          reason: 'Adjustment satisfies all hive safety invariants',
        };
        break;
      }
      if (!firstRejection) {
        firstRejection = {
          task,
          hiveId: hive.hiveId,
          accepted: false,
          reason: `Rejected by hive ledger: ${result.error.message}`,
        };
      }
    }

    results.push(accepted ?? firstRejection ?? {
      task,
      hiveId: null,
      accepted: false,
      reason: 'No hive could accept adjustment under safety invariants',
    });
  }

  return results;
}
