/**
 * Hive ledger store.
 *
 * Owns the current envelope of every onboarded hive together with the
 * ledger that audits its changes. `applyAdjustment` runs
 * read → check → replace → append synchronously, so on the event loop it is
 * the single writer for each hive. Adjustment ids are single use per hive.
 */

import type { AdjustmentRequest, EnvironmentalEnvelope, LedgerEvent } from '../types/hive.js';
import { InputValidationError, err, ok } from '../types/errors.js';
import type { Result } from '../types/errors.js';
import { AdjustmentLedger, evaluateBand } from './ledger.js';
import type { AdjustmentError, ShadeModel } from './ledger.js';
import type { HiveCorridorPolicy } from './hive-corridors.js';
import { createLogger } from '../logger.js';

const log = createLogger('hive-store');

export class HiveLedgerStore {
  private readonly envelopes = new Map<string, EnvironmentalEnvelope>();
  /** Accepted adjustment ids, per hive */
  private readonly usedRequestIds = new Map<string, Set<string>>();
  readonly ledger: AdjustmentLedger;

  constructor(shade: ShadeModel) {
    this.ledger = new AdjustmentLedger(shade);
  }

  /** Admit a hive; its band is derived from the metrics, not trusted from input */
  onboard(
    envelope: Omit<EnvironmentalEnvelope, 'ecoBand'>,
  ): Result<EnvironmentalEnvelope, InputValidationError> {
    if (this.envelopes.has(envelope.hiveId)) {
      return err(new InputValidationError(`Hive "${envelope.hiveId}" is already onboarded`));
    }
    const admitted: EnvironmentalEnvelope = Object.freeze({ ...envelope, ecoBand: evaluateBand(envelope) });
    this.envelopes.set(admitted.hiveId, admitted);
    this.usedRequestIds.set(admitted.hiveId, new Set());
    log.info({ hiveId: admitted.hiveId, ecoBand: admitted.ecoBand }, 'hive onboarded');
    return ok(admitted);
  }

  get(hiveId: string): EnvironmentalEnvelope | undefined {
    return this.envelopes.get(hiveId);
  }

  list(): EnvironmentalEnvelope[] {
    return [...this.envelopes.values()];
  }

  /** With a corridor policy the hive's residual is checked as well */
  applyAdjustment(
    adj: AdjustmentRequest,
    policy?: HiveCorridorPolicy,
  ): Result<EnvironmentalEnvelope, AdjustmentError> {
    const current = this.envelopes.get(adj.hiveId);
    const used = this.usedRequestIds.get(adj.hiveId);
    if (!current || !used) {
      return err(new InputValidationError(`Unknown hive "${adj.hiveId}"`));
    }
    if (used.has(adj.id)) {
      return err(new InputValidationError(`Adjustment ${adj.id} was already applied`));
    }

    const result = this.ledger.apply(current, adj, policy);
    if (!result.ok) {
      log.warn(
        { hiveId: adj.hiveId, adjustmentId: adj.id, kind: result.error.kind, reason: reasonOf(result.error) },
        'adjustment rejected',
      );
      return result;
    }

    const next = Object.freeze(result.value);
    this.envelopes.set(adj.hiveId, next);
    used.add(adj.id);
    log.info(
      { hiveId: adj.hiveId, adjustmentId: adj.id, ecoBand: next.ecoBand },
      'adjustment applied',
    );
    return ok(next);
  }

  events(hiveId?: string): readonly LedgerEvent[] {
    return hiveId === undefined ? this.ledger.events() : this.ledger.eventsFor(hiveId);
  }
}

function reasonOf(error: AdjustmentError): string | undefined {
  return error.kind === 'invariant_violation' ? error.reason : undefined;
}
