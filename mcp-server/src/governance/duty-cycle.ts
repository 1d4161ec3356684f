/**
 * Duty-Cycle Controller
 *
 * Computes a bounded actuation intensity for one node from its
 * performance terms (mass removed, karma, geospatial weight), its power
 * cost, and the corridor penalty Φ of the levels it is predicted to emit.
 *
 *   Φ  = beeFactor × Σ_k ( max(L_k − Lmax,0)² + max(Lmin − L_k,0)² )
 *   w  = max(base,0) × exp(−αz·|dz|) × (excluded ? 0 : 1)
 *   u' = Π[0,1]( u + ηmass·m/mRef + ηkarma·k/kRef + ηgeo·w − ηpower·p − ηcorridor·Φ/φRef )
 *
 * Emission is permitted only with zero penalty outside exclusion zones.
 */

import type {
  CorridorEnvelope,
  KernelDecision,
  KernelParams,
  NodeActuationState,
} from '../types/actuation.js';
import type { CorridorKind } from '../types/corridors.js';
import { ConfigurationError, InputValidationError, err, ok } from '../types/errors.js';
import type { Result } from '../types/errors.js';

export interface DutyCycleSettings {
  params: KernelParams;
  /** Multiplier on Φ inside an exclusion zone */
  exclusionPenaltyFactor: number;
  /** Added to reference scales before dividing */
  referenceEpsilon: number;
}

export class DutyCycleController {
  private readonly envelopes: ReadonlyMap<CorridorKind, CorridorEnvelope>;

  private constructor(
    envelopes: readonly CorridorEnvelope[],
    private readonly settings: DutyCycleSettings,
  ) {
    // First envelope per kind wins.
    const byKind = new Map<CorridorKind, CorridorEnvelope>();
    for (const e of envelopes) {
      if (!byKind.has(e.kind)) byKind.set(e.kind, e);
    }
    this.envelopes = byKind;
  }

  static create(
    envelopes: readonly CorridorEnvelope[],
    settings: DutyCycleSettings,
  ): Result<DutyCycleController, ConfigurationError> {
    if (envelopes.length === 0) {
      return err(new ConfigurationError('No corridor envelopes provided'));
    }
    const malformed = envelopes.find(e => !(e.lMin <= e.lMax));
    if (malformed) {
      return err(new ConfigurationError(
        `Corridor envelope "${malformed.kind}": lMin ${malformed.lMin} > lMax ${malformed.lMax}`,
      ));
    }
    return ok(new DutyCycleController(envelopes, settings));
  }

  envelopeFor(kind: CorridorKind): CorridorEnvelope | undefined {
    return this.envelopes.get(kind);
  }

  /** Habitat multiplier applied to the raw corridor excess */
  beeFactor(node: NodeActuationState): number {
    return node.habitat.inExclusionZone
      ? this.settings.exclusionPenaltyFactor
      : Math.max(node.habitat.sensitivity, 1.0);
  }

  /**
   * Corridor penalty Φ. A level exactly at lMin or lMax contributes zero;
   * predicted levels for kinds without an envelope are ignored.
   */
  computePhi(node: NodeActuationState): number {
    let phi = 0;
    for (const pl of node.predictedLevels) {
      const env = this.envelopes.get(pl.kind);
      if (!env) continue;
      const over = Math.max(pl.level - env.lMax, 0);
      const under = Math.max(env.lMin - pl.level, 0);
      phi += over * over + under * under;
    }
    return phi * this.beeFactor(node);
  }

  /** Habitat-refined geospatial weight */
  computeGeoWeight(node: NodeActuationState): number {
    if (node.habitat.inExclusionZone) return 0;
    const base = Math.max(node.baseWeight, 0);
    const dz = Math.abs(node.habitat.verticalOffsetM);
    return base * Math.exp(-this.settings.params.alphaZ * dz);
  }

  /**
   * Eco-impact score in [0, 1]. The pollutant term peaks when karma equals
   * its reference and falls off linearly on either side; the corridor term
   * is the remaining margin below φRef.
   */
  computeEcoImpact(node: NodeActuationState, phi: number): number {
    const { kRef, phiRef, beta } = this.settings.params;
    const eps = this.settings.referenceEpsilon;

    const sMass = Math.min(node.karma / (kRef + eps), 2.0);
    const sPollutant = 1 - Math.abs(sMass - 1);
    const sBee = 1 - Math.min(phi / (phiRef + eps), 1);
    return clampUnit(beta * sPollutant + (1 - beta) * sBee);
  }

  evaluateNode(node: NodeActuationState): Result<KernelDecision, InputValidationError> {
    if (!Number.isFinite(node.dutyCycle) || node.dutyCycle < 0 || node.dutyCycle > 1) {
      return err(new InputValidationError(
        `Duty cycle must be in [0,1], got ${node.dutyCycle} for node "${node.nodeId}"`,
      ));
    }

    const p = this.settings.params;
    const eps = this.settings.referenceEpsilon;

    const phi = this.computePhi(node);
    const w = this.computeGeoWeight(node);

    const u = node.dutyCycle
      + p.etaMass * (node.massRemovedKg / (p.mRef + eps))
      + p.etaKarma * (node.karma / (p.kRef + eps))
      + p.etaGeo * w
      - p.etaPower * node.powerCost
      - p.etaCorridor * (phi / (p.phiRef + eps));

    return ok({
      entity_id: node.nodeId,
      safe_duty_cycle: clampUnit(u),
      permitted: phi === 0 && !node.habitat.inExclusionZone,
      phi_penalty: phi,
      eco_impact: this.computeEcoImpact(node, phi),
    });
  }
}

/** Project onto [0, 1]; NaN maps to 0 (no actuation) */
function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
