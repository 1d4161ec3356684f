#!/usr/bin/env node
/**
 * Corridor Governor MCP Server
 *
 * Exposes 9 MCP tools:
 * 1. evaluate_corridors        — Residual, derate/stop and monotonicity ratchet
 * 2. check_corridor_permission — "No corridor, no emission" gate for one kind
 * 3. evaluate_node             — Bounded duty cycle and permission for a node
 * 4. onboard_hive              — Admit a hive envelope to governance
 * 5. apply_adjustment          — Validate and apply an environmental adjustment
 * 6. get_ledger                — Audit trail of accepted adjustments
 * 7. route_tasks               — Route habitat tasks to hives, worst band first
 * 8. score_hive                — Habitat indices and eco-impact score
 * 9. evaluate_hive             — Hive residual against corridor bands
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import {
  evaluateCorridorState,
  evaluateCorridorsSchema,
  checkCorridorPermission,
  checkPermissionSchema,
} from './tools/corridors.js';

import { evaluateNode, evaluateNodeSchema } from './tools/actuation.js';

import {
  onboardHive,
  onboardHiveSchema,
  applyAdjustment,
  applyAdjustmentSchema,
  getLedger,
  getLedgerSchema,
  routeHabitatTasks,
  routeTasksSchema,
  scoreHive,
  scoreHiveSchema,
  evaluateHive,
  evaluateHiveSchema,
} from './tools/hives.js';

import { createGovernorState, setGovernorState } from './tools/state.js';
import { loadGovernorConfig } from './governance/config.js';
import { createLogger } from './logger.js';

const log = createLogger('server');

const server = new McpServer({
  name: 'corridor-governor',
  version: '0.1.0',
});

function asText(result: unknown) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
  };
}

// --- Tool Registration ---

server.tool(
  'evaluate_corridors',
  'Normalize measurements against corridor bands and return the weighted residual with derate/stop flags and the quadratic potential gate. With previous measurements, a growing residual outside the safe interior forces derate and stop.',
  evaluateCorridorsSchema.shape,
  (input) => asText(evaluateCorridorState(input)),
);

server.tool(
  'check_corridor_permission',
  'Gate emission for one corridor kind: the worst normalized excess over matched bands must stay below the hard threshold.',
  checkPermissionSchema.shape,
  (input) => asText(checkCorridorPermission(input)),
);

server.tool(
  'evaluate_node',
  'Compute a bounded, corridor-penalized duty cycle for a node. Returns entity_id, safe_duty_cycle, permitted, phi_penalty and eco_impact.',
  evaluateNodeSchema.shape,
  (input) => asText(evaluateNode(input)),
);

server.tool(
  'onboard_hive',
  'Admit a hive envelope to governance. The eco band (safe/warning/critical) is derived from its metrics.',
  onboardHiveSchema.shape,
  (input) => asText(onboardHive(input)),
);

server.tool(
  'apply_adjustment',
  'Validate an environmental adjustment against the hive invariants (pesticide, temperature, forage radius, light/noise, eco impact) and apply it atomically. With corridor bands, the hive residual must not grow either.',
  applyAdjustmentSchema.shape,
  (input) => asText(applyAdjustment(input)),
);

server.tool(
  'get_ledger',
  'Return the audit trail of accepted adjustments with pre/post envelope snapshots.',
  getLedgerSchema.shape,
  (input) => asText(getLedger(input)),
);

server.tool(
  'route_tasks',
  'Route protective habitat tasks to onboarded hives, offering each task to the worst-band hives first.',
  routeTasksSchema.shape,
  (input) => asText(routeHabitatTasks(input)),
);

server.tool(
  'score_hive',
  'Compute heat risk, toxin load, habitat stability and the 0-100 eco-impact score for an onboarded hive.',
  scoreHiveSchema.shape,
  (input) => asText(scoreHive(input)),
);

server.tool(
  'evaluate_hive',
  'Judge an onboarded hive against corridor bands over its metrics and return the residual with derate/stop flags.',
  evaluateHiveSchema.shape,
  (input) => asText(evaluateHive(input)),
);

// --- Server Startup ---

async function main(): Promise<void> {
  // Invalid configuration throws and stops startup
  const config = loadGovernorConfig();
  setGovernorState(createGovernorState(config));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('corridor governor listening on stdio');
}

main().catch((error) => {
  log.fatal({ err: error }, 'corridor governor failed to start');
  process.exit(1);
});
