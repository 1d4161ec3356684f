/**
 * Actuation Tools
 *
 * MCP tool for the duty-cycle controller: turns a node's proposed duty
 * cycle and predicted corridor levels into a bounded KernelDecision.
 */

import { z } from 'zod';
import type { KernelDecision, Result } from '../types/index.js';
import { DutyCycleController } from '../governance/index.js';
import { corridorEnvelopeSchema, nodeStateSchema } from './schemas.js';
import { getGovernorState } from './state.js';
import { createLogger } from '../logger.js';

const log = createLogger('actuation');

/** Schema for evaluate_node tool input */
export const evaluateNodeSchema = z.object({
  envelopes: z.array(corridorEnvelopeSchema).describe('Corridor level bounds per kind'),
  node: nodeStateSchema,
});

export type EvaluateNodeInput = z.infer<typeof evaluateNodeSchema>;

export function evaluateNode(input: EvaluateNodeInput): Result<KernelDecision> {
  const { config } = getGovernorState();

  const controller = DutyCycleController.create(input.envelopes, {
    params: config.kernel,
    exclusionPenaltyFactor: config.exclusionPenaltyFactor,
    referenceEpsilon: config.referenceEpsilon,
  });
  if (!controller.ok) return controller;

  const decision = controller.value.evaluateNode(input.node);
  if (decision.ok && !decision.value.permitted) {
    log.warn(
      { nodeId: decision.value.entity_id, phi: decision.value.phi_penalty },
      'actuation not permitted',
    );
  }
  return decision;
}
