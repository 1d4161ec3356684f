/**
 * Corridor Permission Oracle
 *
 * One banded gate for every corridor kind. For each measurement of the
 * oracle's kind, the first band covering its channel gives
 *
 *   ratio = max(level − base, 0) / max(noEffect − base, ε)
 *
 * and emission is permitted only while the worst ratio is strictly below
 * the hard threshold. Measurements outside every band are not judged;
 * a measurement of the oracle's kind whose channel is not finite cannot be
 * placed and counts as unbounded excess.
 */

import type { CorridorKind } from '../types/corridors.js';
import type {
  PermissionBand,
  PermissionDecision,
  PermissionMeasurement,
} from '../types/permission.js';
import { ConfigurationError, err, ok } from '../types/errors.js';
import type { Result } from '../types/errors.js';

export interface PermissionOptions {
  hardThreshold: number;
  epsilon: number;
}

export class PermissionOracle<K extends CorridorKind = CorridorKind> {
  private constructor(
    readonly kind: K,
    private readonly bands: readonly PermissionBand<K>[],
    private readonly options: PermissionOptions,
  ) {}

  /**
   * Bands of other kinds are dropped; at least one band of `kind` with an
   * ordered channel range is required.
   */
  static create<K extends CorridorKind>(
    kind: K,
    bands: readonly PermissionBand[],
    options: PermissionOptions,
  ): Result<PermissionOracle<K>, ConfigurationError> {
    const own = bands.filter((b): b is PermissionBand<K> => b.kind === kind);
    if (own.length === 0) {
      return err(new ConfigurationError(`No permission bands for corridor kind "${kind}"`));
    }
    const bad = own.find(b => !(b.channelMin <= b.channelMax));
    if (bad) {
      return err(new ConfigurationError(
        `Permission band for "${kind}" has channelMin ${bad.channelMin} > channelMax ${bad.channelMax}`,
      ));
    }
    return ok(new PermissionOracle(kind, own, options));
  }

  bandFor(channel: number): PermissionBand<K> | undefined {
    return this.bands.find(b => channel >= b.channelMin && channel <= b.channelMax);
  }

  excessRatio(measurements: readonly PermissionMeasurement[]): { ratio: number; matched: number } {
    let ratio = 0;
    let matched = 0;

    for (const m of measurements) {
      if (m.kind !== this.kind) continue;
      if (!Number.isFinite(m.channel)) {
        matched++;
        ratio = Infinity;
        continue;
      }
      const band = this.bandFor(m.channel);
      if (!band) continue;

      matched++;
      const denom = Math.max(band.noEffect - band.base, this.options.epsilon);
      const num = Math.max(m.level - band.base, 0);
      // NaN levels fail closed.
      const r = Number.isNaN(num) ? Infinity : num / denom;
      if (r > ratio) ratio = r;
    }

    return { ratio, matched };
  }

  permit(measurements: readonly PermissionMeasurement[]): PermissionDecision<K> {
    const { ratio, matched } = this.excessRatio(measurements);
    return {
      kind: this.kind,
      permitted: ratio < this.options.hardThreshold,
      ratio,
      hardThreshold: this.options.hardThreshold,
      matched,
    };
  }
}
