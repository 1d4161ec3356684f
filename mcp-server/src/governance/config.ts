/**
 * Governor configuration loading.
 *
 * Merges, in increasing priority: built-in defaults, an optional JSON file
 * named by CORRIDOR_GOVERNOR_CONFIG, and CORRIDOR_GOVERNOR_* environment
 * overrides. The merged value is validated with zod; an invalid
 * configuration throws `ConfigurationError` and must stop startup.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';
import {
  ALLOW_DEGENERATE_BANDS,
  DEFAULT_KERNEL_PARAMS,
  DEFAULT_SIGMA,
  EXCLUSION_PENALTY_FACTOR,
  PERMISSION_DEFAULTS,
  POTENTIAL_GATE,
  REFERENCE_EPSILON,
  SHADE_MODEL,
} from './governor.config.js';

const nonNegative = z.number().finite().nonnegative();
const positive = z.number().finite().positive();

export const kernelParamsSchema = z.object({
  etaMass: nonNegative,
  etaKarma: nonNegative,
  etaGeo: nonNegative,
  etaPower: nonNegative,
  etaCorridor: nonNegative,
  mRef: positive,
  kRef: positive,
  phiRef: positive,
  alphaZ: nonNegative,
  beta: z.number().min(0).max(1),
});

export const governorConfigSchema = z.object({
  kernel: kernelParamsSchema,
  exclusionPenaltyFactor: z.number().finite().min(1),
  referenceEpsilon: z.number().finite().nonnegative(),
  permission: z.object({
    hardThreshold: positive,
    epsilon: positive,
  }),
  shade: z.object({
    coolingPerUnitC: nonNegative,
    warmingPerUnitC: nonNegative,
  }),
  potential: z.object({
    vSafe: nonNegative,
    rHard: z.number().min(0).max(1),
  }),
  defaultSigma: nonNegative,
  allowDegenerateBands: z.boolean(),
});

export type GovernorConfig = z.infer<typeof governorConfigSchema>;

/**
 * Shape accepted from a config file: any subset of the full config. Ranges
 * are checked once, on the merged value, by `parseGovernorConfig`.
 */
const configFileSchema = z
  .object({
    kernel: z
      .object({
        etaMass: z.number(),
        etaKarma: z.number(),
        etaGeo: z.number(),
        etaPower: z.number(),
        etaCorridor: z.number(),
        mRef: z.number(),
        kRef: z.number(),
        phiRef: z.number(),
        alphaZ: z.number(),
        beta: z.number(),
      })
      .partial()
      .strict(),
    exclusionPenaltyFactor: z.number(),
    referenceEpsilon: z.number(),
    permission: z.object({ hardThreshold: z.number(), epsilon: z.number() }).partial().strict(),
    shade: z.object({ coolingPerUnitC: z.number(), warmingPerUnitC: z.number() }).partial().strict(),
    potential: z.object({ vSafe: z.number(), rHard: z.number() }).partial().strict(),
    defaultSigma: z.number(),
    allowDegenerateBands: z.boolean(),
  })
  .partial()
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

const envSchema = z.object({
  CORRIDOR_GOVERNOR_CONFIG: z.string().min(1).optional(),
  CORRIDOR_GOVERNOR_PERMISSION_HARD_THRESHOLD: z.coerce.number().optional(),
  CORRIDOR_GOVERNOR_EXCLUSION_FACTOR: z.coerce.number().optional(),
  CORRIDOR_GOVERNOR_ALLOW_DEGENERATE_BANDS: z.enum(['true', 'false']).optional(),
});

export const DEFAULT_GOVERNOR_CONFIG: GovernorConfig = {
  kernel: { ...DEFAULT_KERNEL_PARAMS },
  exclusionPenaltyFactor: EXCLUSION_PENALTY_FACTOR,
  referenceEpsilon: REFERENCE_EPSILON,
  permission: { ...PERMISSION_DEFAULTS },
  shade: { ...SHADE_MODEL },
  potential: { ...POTENTIAL_GATE },
  defaultSigma: DEFAULT_SIGMA,
  allowDegenerateBands: ALLOW_DEGENERATE_BANDS,
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  readFile?: (path: string) => string;
}

/**
 * Build the effective configuration for this deployment.
 * Throws `ConfigurationError` when any layer is malformed.
 */
export function loadGovernorConfig(options: LoadConfigOptions = {}): GovernorConfig {
  const env = options.env ?? process.env;
  const readFile = options.readFile ?? ((path: string) => readFileSync(path, 'utf8'));

  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(parsedEnv.error)}`);
  }
  const vars = parsedEnv.data;

  const file = vars.CORRIDOR_GOVERNOR_CONFIG
    ? readConfigFile(vars.CORRIDOR_GOVERNOR_CONFIG, readFile)
    : {};

  const merged = mergeConfig(DEFAULT_GOVERNOR_CONFIG, file);

  if (vars.CORRIDOR_GOVERNOR_PERMISSION_HARD_THRESHOLD !== undefined) {
    merged.permission.hardThreshold = vars.CORRIDOR_GOVERNOR_PERMISSION_HARD_THRESHOLD;
  }
  if (vars.CORRIDOR_GOVERNOR_EXCLUSION_FACTOR !== undefined) {
    merged.exclusionPenaltyFactor = vars.CORRIDOR_GOVERNOR_EXCLUSION_FACTOR;
  }
  if (vars.CORRIDOR_GOVERNOR_ALLOW_DEGENERATE_BANDS !== undefined) {
    merged.allowDegenerateBands = vars.CORRIDOR_GOVERNOR_ALLOW_DEGENERATE_BANDS === 'true';
  }

  return parseGovernorConfig(merged);
}

/** Validate a complete configuration object */
export function parseGovernorConfig(input: unknown): GovernorConfig {
  const parsed = governorConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid governor configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function readConfigFile(path: string, readFile: (path: string) => string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFile(path));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read governor config ${path}: ${detail}`);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid governor config ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function mergeConfig(base: GovernorConfig, file: ConfigFile): GovernorConfig {
  return {
    kernel: { ...base.kernel, ...file.kernel },
    exclusionPenaltyFactor: file.exclusionPenaltyFactor ?? base.exclusionPenaltyFactor,
    referenceEpsilon: file.referenceEpsilon ?? base.referenceEpsilon,
    permission: { ...base.permission, ...file.permission },
    shade: { ...base.shade, ...file.shade },
    potential: { ...base.potential, ...file.potential },
    defaultSigma: file.defaultSigma ?? base.defaultSigma,
    allowDegenerateBands: file.allowDegenerateBands ?? base.allowDegenerateBands,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
