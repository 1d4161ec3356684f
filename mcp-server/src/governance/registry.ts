/**
 * Corridor Band Registry
 *
 * Holds the per-variable safety bands shared, read-only, by the normalizer
 * and the aggregator. Structural problems are caught here, at configuration
 * time, so enforcement never sees a band with unordered thresholds.
 */

import type { CorridorBand } from '../types/corridors.js';
import {
  ConfigurationError,
  NumericDegenerate,
  err,
  ok,
} from '../types/errors.js';
import type { Result } from '../types/errors.js';

export interface RegistryOptions {
  /** Accept bands with safe == hard (normalized as a step at `safe`) */
  allowDegenerateBands?: boolean;
}

export class CorridorRegistry {
  private readonly bands = new Map<string, CorridorBand>();
  private readonly allowDegenerate: boolean;

  constructor(options: RegistryOptions = {}) {
    this.allowDegenerate = options.allowDegenerateBands ?? false;
  }

  /**
   * Build a registry from a list of bands, stopping at the first rejection.
   */
  static fromBands(
    bands: readonly CorridorBand[],
    options: RegistryOptions = {},
  ): Result<CorridorRegistry, ConfigurationError | NumericDegenerate> {
    const registry = new CorridorRegistry(options);
    for (const band of bands) {
      const result = registry.register(band);
      if (!result.ok) return result;
    }
    return ok(registry);
  }

  register(band: CorridorBand): Result<CorridorBand, ConfigurationError | NumericDegenerate> {
    const label = `Corridor "${band.varId}"`;

    if (![band.safe, band.gold, band.hard, band.weight].every(Number.isFinite)) {
      return err(new ConfigurationError(`${label}: thresholds and weight must be finite`));
    }
    if (band.safe > band.gold) {
      return err(new ConfigurationError(`${label}: safe ${band.safe} > gold ${band.gold}`));
    }
    if (band.gold > band.hard) {
      return err(new ConfigurationError(`${label}: gold ${band.gold} > hard ${band.hard}`));
    }
    if (band.weight < 0) {
      return err(new ConfigurationError(`${label}: negative weight ${band.weight}`));
    }
    if (band.safe === band.hard && !this.allowDegenerate) {
      return err(new NumericDegenerate(`${label}: safe == hard (${band.safe}); interpolation undefined`));
    }
    if (this.bands.has(band.varId)) {
      return err(new ConfigurationError(`${label}: already registered`));
    }

    const frozen = Object.freeze({ ...band });
    this.bands.set(band.varId, frozen);
    return ok(frozen);
  }

  get(varId: string): CorridorBand | undefined {
    return this.bands.get(varId);
  }

  list(): CorridorBand[] {
    return [...this.bands.values()];
  }

  get size(): number {
    return this.bands.size;
  }

  /** "No corridor, no build" for the bands held by this registry */
  isComplete(): boolean {
    return this.size > 0 && validateComplete(this.list());
  }
}

/**
 * True iff every mandatory band is present and well-formed:
 * hard > 0, gold ≤ hard, safe ≤ gold. Checked once before an entity is
 * admitted to governance.
 */
export function validateComplete(bands: readonly CorridorBand[]): boolean {
  return bands.every(
    b => !b.mandatory || (b.hard > 0 && b.gold <= b.hard && b.safe <= b.gold),
  );
}
