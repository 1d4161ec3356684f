/**
 * Governor Type System
 * Re-exports all type definitions for convenient imports.
 */

export type {
  CorridorKind,
  CorridorBand,
  RiskCoordinate,
  ResidualState,
  Measurement,
} from './corridors.js';

export { CORRIDOR_KINDS } from './corridors.js';

export type {
  CorridorEnvelope,
  PredictedLevel,
  HabitatContext,
  NodeActuationState,
  KernelParams,
  KernelDecision,
} from './actuation.js';

export type {
  EcoBand,
  EnvironmentalEnvelope,
  AdjustmentRequest,
  LedgerEvent,
} from './hive.js';

export { ECO_BAND_PRIORITY } from './hive.js';

export type {
  PermissionBand,
  PermissionMeasurement,
  PermissionDecision,
} from './permission.js';

export type {
  GovernorErrorKind,
  InvariantReason,
  Result,
} from './errors.js';

export {
  GovernorError,
  ConfigurationError,
  InputValidationError,
  InvariantViolation,
  NumericDegenerate,
  ok,
  err,
} from './errors.js';
