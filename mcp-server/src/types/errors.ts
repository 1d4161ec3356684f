/**
 * Governor error taxonomy.
 *
 * Every per-request failure comes back as a typed `Result` from the
 * operation that detected it. Only an invalid global configuration is
 * thrown, at startup.
 */

export type GovernorErrorKind =
  | 'configuration'
  | 'input_validation'
  | 'invariant_violation'
  | 'numeric_degenerate';

/** Adjustment rejection reasons, in the order the ledger checks them */
export type InvariantReason =
  | 'pesticide-increase'
  | 'temperature-above-safe-max'
  | 'forage-radius-reduction'
  | 'light-or-noise-increase'
  | 'eco-impact-decrease'
  | 'corridor-residual-increase';

export abstract class GovernorError extends Error {
  abstract readonly kind: GovernorErrorKind;

  toJSON(): { kind: GovernorErrorKind; message: string } {
    return { kind: this.kind, message: this.message };
  }
}

/** Empty or malformed corridor configuration */
export class ConfigurationError extends GovernorError {
  readonly kind = 'configuration' as const;
  override readonly name = 'ConfigurationError';
}

/** Out-of-range or missing input on a single request */
export class InputValidationError extends GovernorError {
  readonly kind = 'input_validation' as const;
  override readonly name = 'InputValidationError';
}

/** Adjustment rejected by one of the ledger invariants */
export class InvariantViolation extends GovernorError {
  readonly kind = 'invariant_violation' as const;
  override readonly name = 'InvariantViolation';

  constructor(
    readonly reason: InvariantReason,
    message: string,
  ) {
    super(message);
  }

  override toJSON(): { kind: GovernorErrorKind; message: string; reason: InvariantReason } {
    return { kind: this.kind, message: this.message, reason: this.reason };
  }
}

/** A band whose safe and hard thresholds coincide */
export class NumericDegenerate extends GovernorError {
  readonly kind = 'numeric_degenerate' as const;
  override readonly name = 'NumericDegenerate';
}

export type Result<T, E extends GovernorError = GovernorError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends GovernorError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
