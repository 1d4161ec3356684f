/**
 * Corridor Governance Layer
 *
 * Unified entry point: band registry, normalizer, residual aggregation,
 * monotonicity guard, potential gate, duty-cycle controller, adjustment
 * ledger, hive corridors and the permission oracle.
 */

export { CorridorRegistry, validateComplete } from './registry.js';
export type { RegistryOptions } from './registry.js';

export { normalize, normalizeThreshold } from './normalize.js';

export { computeResidual, aggregate } from './residual.js';

export { safeStep, isWorsening } from './monotonicity.js';

export { evaluateCorridors } from './pipeline.js';
export type { EvaluateCorridorsOptions } from './pipeline.js';

export { DutyCycleController } from './duty-cycle.js';
export type { DutyCycleSettings } from './duty-cycle.js';

export {
  AdjustmentLedger,
  evaluateBand,
  temperatureDeltaFromShade,
} from './ledger.js';
export type { AdjustmentError, ShadeModel } from './ledger.js';

export { HiveLedgerStore } from './hive-store.js';

export {
  HIVE_METRICS,
  hiveMeasurements,
  evaluateHive,
  checkHiveResidual,
} from './hive-corridors.js';
export type { HiveCorridorPolicy } from './hive-corridors.js';

export { riskPotential } from './potential.js';
export type { PotentialGate, RiskPotential } from './potential.js';

export { PermissionOracle } from './permission.js';
export type { PermissionOptions } from './permission.js';

export {
  heatRiskIndex,
  toxinLoadIndex,
  habitatStabilityIndex,
  hiveEcoImpactScore,
  scoreEnvelope,
} from './indices.js';
export type { HabitatIndices } from './indices.js';

export {
  TASK_PROFILES,
  taskToAdjustment,
  orderByRisk,
  routeTasks,
} from './routing.js';
export type { TaskKind, HabitatTask, RoutedTask } from './routing.js';

export {
  DEFAULT_GOVERNOR_CONFIG,
  governorConfigSchema,
  kernelParamsSchema,
  loadGovernorConfig,
  parseGovernorConfig,
} from './config.js';
export type { GovernorConfig, LoadConfigOptions } from './config.js';
