/**
 * MCP Tools Tests
 *
 * Verifies the tool handlers that the MCP server exposes:
 * - evaluate_corridors / check_corridor_permission (corridor tools)
 * - evaluate_node (actuation tool)
 * - onboard_hive / apply_adjustment / get_ledger / route_tasks / score_hive /
 *   evaluate_hive
 * - Zod schema validation
 * - JSON shape of results as returned to MCP clients
 *
 * Each test starts from a fresh governor state built on the defaults.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  checkCorridorPermission,
  checkPermissionSchema,
  evaluateCorridorState,
  evaluateCorridorsSchema,
} from '../tools/corridors.js';
import { evaluateNode, evaluateNodeSchema } from '../tools/actuation.js';
import {
  applyAdjustment,
  applyAdjustmentSchema,
  evaluateHive,
  evaluateHiveSchema,
  getLedger,
  onboardHive,
  onboardHiveSchema,
  routeHabitatTasks,
  scoreHive,
} from '../tools/hives.js';
import type { ApplyAdjustmentInput, OnboardHiveInput } from '../tools/hives.js';
import { createGovernorState, setGovernorState } from '../tools/state.js';
import { DEFAULT_GOVERNOR_CONFIG } from '../governance/config.js';
import type { CorridorBand } from '../types/corridors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const TEMP_BAND: CorridorBand = {
  varId: 'hive_temp_c',
  units: 'C',
  safe: 35,
  gold: 36,
  hard: 40,
  weight: 1,
  diagnosticChannel: 1,
  mandatory: true,
};

function makeEnvelope(overrides: Partial<OnboardHiveInput['envelope']> = {}): OnboardHiveInput['envelope'] {
  return {
    hiveId: 'hive-alpha',
    broodFrames: 8,
    nectarKg: 12,
    pollenKg: 4.5,
    temperatureC: 34,
    foragerLoad: 0.7,
    toxinPpb: 20,
    forageDiversity: 0.8,
    forageRadiusM: 1500,
    ecoImpactScore: 75,
    safeTemperatureMinC: 32,
    safeTemperatureMaxC: 36,
    safeToxinMaxPpb: 50,
    safeForageDiversityMin: 0.5,
    safeForageRadiusMinM: 1000,
    ...overrides,
  };
}

function makeAdjustment(
  overrides: Partial<ApplyAdjustmentInput['adjustment']> = {},
): ApplyAdjustmentInput['adjustment'] {
  return {
    id: 'adj-1',
    hiveId: 'hive-alpha',
    deltaPesticidePpb: 0,
    deltaShade: 0,
    deltaWaterAvailability: 0,
    deltaForageRadiusM: 0,
    deltaForageDiversity: 0,
    deltaLightNits: 0,
    deltaNoiseDb: 0,
    deltaEcoImpact: 0,
    ...overrides,
  };
}

/** What an MCP client sees after the server serializes a result */
function asClientJson(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value));
}

// ---------------------------------------------------------------------------
// Fresh state between tests
// ---------------------------------------------------------------------------

beforeEach(() => {
  setGovernorState(createGovernorState(DEFAULT_GOVERNOR_CONFIG));
});

afterEach(() => {
  vi.useRealTimers();
});

// ============================================================================
// evaluate_corridors
// ============================================================================

describe('evaluateCorridorState', () => {
  it('returns the residual without a previous cycle', () => {
    const result = evaluateCorridorState({
      bands: [TEMP_BAND],
      measurements: [{ varId: 'hive_temp_c', value: 37 }],
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.residual.total).toBeCloseTo(0.4);
    expect(result.value.residual.derate).toBe(true);
    expect(result.value.residual.stop).toBe(false);
    expect(result.value.worsening).toBe(false);
  });

  it('reports the potential gate over the same coordinates', () => {
    const result = evaluateCorridorState({
      bands: [TEMP_BAND],
      measurements: [{ varId: 'hive_temp_c', value: 37 }],
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    // 1 × 0.4²
    expect(result.value.potential.value).toBeCloseTo(0.16);
    expect(result.value.potential.maxRisk).toBeCloseTo(0.4);
    expect(result.value.potential.permitted).toBe(true);
  });

  it('escalates a growing residual with previous measurements', () => {
    const result = evaluateCorridorState({
      bands: [TEMP_BAND],
      measurements: [{ varId: 'hive_temp_c', value: 36.5 }],
      previousMeasurements: [{ varId: 'hive_temp_c', value: 36 }],
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.worsening).toBe(true);
    expect(result.value.residual.stop).toBe(true);
  });

  it('reports degenerate bands under the default configuration', () => {
    const result = evaluateCorridorState({
      bands: [{ ...TEMP_BAND, safe: 36, gold: 36, hard: 36 }],
      measurements: [{ varId: 'hive_temp_c', value: 36 }],
    });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('numeric_degenerate');
  });

  it('accepts degenerate bands when the configuration allows them', () => {
    setGovernorState(createGovernorState({ ...DEFAULT_GOVERNOR_CONFIG, allowDegenerateBands: true }));

    const result = evaluateCorridorState({
      bands: [{ ...TEMP_BAND, safe: 36, gold: 36, hard: 36 }],
      measurements: [{ varId: 'hive_temp_c', value: 36.1 }],
    });

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.residual.stop).toBe(true);
  });

  it('serializes errors with their kind', () => {
    const result = evaluateCorridorState({ bands: [TEMP_BAND], measurements: [] });

    expect(asClientJson(result)).toEqual({
      ok: false,
      error: {
        kind: 'input_validation',
        message: 'Missing measurement for mandatory corridor "hive_temp_c"',
      },
    });
  });
});

// ============================================================================
// check_corridor_permission
// ============================================================================

describe('checkCorridorPermission', () => {
  const bands = [{ kind: 'rf' as const, channelMin: 0.7, channelMax: 1.0, base: 0, noEffect: 2 }];

  it('uses the configured hard threshold', () => {
    const result = checkCorridorPermission({
      kind: 'rf',
      bands,
      measurements: [{ kind: 'rf', channel: 0.9, level: 1.6 }],
    });

    expect(result.ok && result.value.permitted).toBe(true);
  });

  it('lets the request tighten the threshold', () => {
    const result = checkCorridorPermission({
      kind: 'rf',
      bands,
      measurements: [{ kind: 'rf', channel: 0.9, level: 1.6 }],
      hardThreshold: 0.5,
    });

    expect(result.ok && result.value.permitted).toBe(false);
  });

  it('fails with a configuration error when no band matches the kind', () => {
    const result = checkCorridorPermission({ kind: 'acoustic', bands, measurements: [] });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('configuration');
  });
});

// ============================================================================
// evaluate_node
// ============================================================================

describe('evaluateNode', () => {
  const node = {
    nodeId: 'canopy-01',
    dutyCycle: 0.5,
    massRemovedKg: 0,
    karma: 0,
    powerCost: 0,
    baseWeight: 0,
    habitat: { sensitivity: 1, inExclusionZone: false, verticalOffsetM: 0 },
    predictedLevels: [{ kind: 'emf' as const, level: 0.5 }],
  };

  it('returns the decision in the published field names', () => {
    const result = evaluateNode({ envelopes: [{ kind: 'emf', lMin: 0, lMax: 1 }], node });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(Object.keys(result.value).sort())
      .toEqual(['eco_impact', 'entity_id', 'permitted', 'phi_penalty', 'safe_duty_cycle']);
    expect(result.value.entity_id).toBe('canopy-01');
    expect(result.value.safe_duty_cycle).toBe(0.5);
    expect(result.value.permitted).toBe(true);
    expect(result.value.phi_penalty).toBe(0);
    // Only the corridor share (1 − β) remains with zero karma
    expect(result.value.eco_impact).toBeCloseTo(0.3);
  });

  it('rejects an out-of-range duty cycle', () => {
    const result = evaluateNode({
      envelopes: [{ kind: 'emf', lMin: 0, lMax: 1 }],
      node: { ...node, dutyCycle: 1.5 },
    });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('input_validation');
  });
});

// ============================================================================
// Hive tools
// ============================================================================

describe('hive tools', () => {
  it('onboards, adjusts and records the ledger', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T00:00:00.000Z'));

    expect(onboardHive({ envelope: makeEnvelope() }).ok).toBe(true);

    const result = applyAdjustment({ adjustment: makeAdjustment({ deltaPesticidePpb: -5 }) });
    expect(result.ok && result.value.toxinPpb).toBe(15);

    const { events } = getLedger({});
    expect(events).toHaveLength(1);
    expect(events[0].adjustment.timestamp).toBe('2026-03-01T00:00:00.000Z');
    expect(events[0].preEnvelope.toxinPpb).toBe(20);
    expect(events[0].postEnvelope.toxinPpb).toBe(15);
  });

  it('keeps a caller-supplied timestamp', () => {
    onboardHive({ envelope: makeEnvelope() });
    applyAdjustment({ adjustment: makeAdjustment({ timestamp: '2026-02-01T12:00:00.000Z' }) });

    expect(getLedger({ hiveId: 'hive-alpha' }).events[0].adjustment.timestamp)
      .toBe('2026-02-01T12:00:00.000Z');
  });

  it('serializes invariant violations with their reason', () => {
    onboardHive({ envelope: makeEnvelope() });
    const result = applyAdjustment({ adjustment: makeAdjustment({ deltaNoiseDb: 3 }) });

    expect(asClientJson(result)).toEqual({
      ok: false,
      error: {
        kind: 'invariant_violation',
        message: 'Adjustment would increase artificial light or noise',
        reason: 'light-or-noise-increase',
      },
    });
    expect(getLedger({}).events).toHaveLength(0);
  });

  it('filters the ledger by hive', () => {
    onboardHive({ envelope: makeEnvelope() });
    onboardHive({ envelope: makeEnvelope({ hiveId: 'hive-gamma' }) });
    applyAdjustment({ adjustment: makeAdjustment({ deltaEcoImpact: 1 }) });

    expect(getLedger({ hiveId: 'hive-gamma' }).events).toHaveLength(0);
    expect(getLedger({ hiveId: 'hive-alpha' }).events).toHaveLength(1);
  });

  it('routes tasks across onboarded hives', () => {
    onboardHive({ envelope: makeEnvelope() });

    const [routed] = routeHabitatTasks({
      tasks: [{ id: 't1', kind: 'dim-lights', ecoRewardHint: 0.5 }],
    });

    expect(routed.accepted).toBe(true);
    expect(routed.hiveId).toBe('hive-alpha');
  });

  it('scores an onboarded hive', () => {
    onboardHive({ envelope: makeEnvelope({ toxinPpb: 25 }) });

    const result = scoreHive({ hiveId: 'hive-alpha', baselineC: 30 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.hiveId).toBe('hive-alpha');
    expect(result.value.ecoBand).toBe('safe');
    expect(result.value.ecoImpactScore).toBeCloseTo(76.85);
  });

  it('refuses an adjustment that grows the hive corridor residual', () => {
    onboardHive({ envelope: makeEnvelope({ temperatureC: 33 }) });

    const result = applyAdjustment({
      adjustment: makeAdjustment({ deltaShade: -1 }),
      bands: [{ ...TEMP_BAND, safe: 32, gold: 33 }],
    });

    expect(asClientJson(result)).toEqual({
      ok: false,
      error: {
        kind: 'invariant_violation',
        message: 'Adjustment would raise the hive corridor residual from 0.125 to 0.438',
        reason: 'corridor-residual-increase',
      },
    });
    expect(getLedger({}).events).toHaveLength(0);
  });

  it('refuses degenerate adjustment bands under the default configuration', () => {
    onboardHive({ envelope: makeEnvelope() });

    const result = applyAdjustment({
      adjustment: makeAdjustment({ deltaEcoImpact: 1 }),
      bands: [{ ...TEMP_BAND, safe: 36, gold: 36, hard: 36 }],
    });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('numeric_degenerate');
  });

  it('evaluates an onboarded hive against corridor bands', () => {
    onboardHive({ envelope: makeEnvelope() });

    const result = evaluateHive({
      hiveId: 'hive-alpha',
      bands: [
        TEMP_BAND,
        { ...TEMP_BAND, varId: 'toxin_ppb', units: 'ppb', safe: 0, gold: 10, hard: 50, weight: 2 },
      ],
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    // 1 × 0 + 2 × 20/50
    expect(result.value.total).toBeCloseTo(0.8);
    expect(result.value.derate).toBe(true);
    expect(result.value.stop).toBe(false);
  });

  it('refuses to evaluate an unknown hive', () => {
    const result = evaluateHive({ hiveId: 'hive-nowhere', bands: [TEMP_BAND] });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Unknown hive "hive-nowhere"');
  });

  it('refuses to score an unknown hive', () => {
    const result = scoreHive({ hiveId: 'hive-nowhere', baselineC: 30 });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Unknown hive "hive-nowhere"');
  });
});

// ============================================================================
// Schema Validation
// ============================================================================

describe('Schema validation', () => {
  it('evaluateCorridorsSchema requires bands and measurements', () => {
    expect(evaluateCorridorsSchema.safeParse({ bands: [] }).success).toBe(false);
    expect(evaluateCorridorsSchema.safeParse({ bands: [TEMP_BAND], measurements: [] }).success).toBe(true);
  });

  it('checkPermissionSchema rejects an unknown corridor kind', () => {
    const result = checkPermissionSchema.safeParse({ kind: 'uv', bands: [], measurements: [] });
    expect(result.success).toBe(false);
  });

  it('evaluateNodeSchema leaves the duty-cycle range to the controller', () => {
    const result = evaluateNodeSchema.safeParse({
      envelopes: [],
      node: {
        nodeId: 'n',
        dutyCycle: 3,
        massRemovedKg: 0,
        karma: 0,
        powerCost: 0,
        baseWeight: 0,
        habitat: { sensitivity: 1, inExclusionZone: false, verticalOffsetM: 0 },
        predictedLevels: [],
      },
    });
    expect(result.success).toBe(true);
  });

  it('onboardHiveSchema rejects forager load above 1', () => {
    const result = onboardHiveSchema.safeParse({ envelope: makeEnvelope({ foragerLoad: 1.2 }) });
    expect(result.success).toBe(false);
  });

  it('applyAdjustmentSchema rejects a malformed timestamp', () => {
    const result = applyAdjustmentSchema.safeParse({
      adjustment: makeAdjustment({ timestamp: 'yesterday' }),
    });
    expect(result.success).toBe(false);
  });

  it('applyAdjustmentSchema takes optional corridor bands', () => {
    expect(applyAdjustmentSchema.safeParse({ adjustment: makeAdjustment() }).success).toBe(true);
    expect(applyAdjustmentSchema.safeParse({
      adjustment: makeAdjustment(),
      bands: [TEMP_BAND],
    }).success).toBe(true);
  });

  it('evaluateHiveSchema requires bands', () => {
    expect(evaluateHiveSchema.safeParse({ hiveId: 'hive-alpha' }).success).toBe(false);
  });
});
