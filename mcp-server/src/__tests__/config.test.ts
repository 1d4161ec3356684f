/**
 * Governor Configuration Tests
 *
 * Defaults, JSON file overrides and CORRIDOR_GOVERNOR_* environment
 * overrides, merged in that order and validated before use.
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_GOVERNOR_CONFIG,
  loadGovernorConfig,
  parseGovernorConfig,
} from '../governance/config.js';
import { ConfigurationError } from '../types/errors.js';

const CONFIG_PATH = '/etc/corridor-governor.json';

function fileReader(contents: string) {
  return (path: string): string => {
    if (path !== CONFIG_PATH) throw new Error(`ENOENT: ${path}`);
    return contents;
  };
}

// --- Defaults ---

describe('loadGovernorConfig defaults', () => {
  it('returns the built-in defaults with no overrides', () => {
    const config = loadGovernorConfig({ env: {} });
    expect(config).toEqual(DEFAULT_GOVERNOR_CONFIG);
  });

  it('carries the kernel constants', () => {
    const { kernel } = loadGovernorConfig({ env: {} });
    expect(kernel.etaCorridor).toBe(0.2);
    expect(kernel.beta).toBe(0.7);
    expect(kernel.kRef).toBe(1e9);
  });

  it('rejects degenerate bands unless enabled', () => {
    expect(loadGovernorConfig({ env: {} }).allowDegenerateBands).toBe(false);
  });
});

// --- Overrides ---

describe('loadGovernorConfig overrides', () => {
  it('applies environment overrides', () => {
    const config = loadGovernorConfig({
      env: {
        CORRIDOR_GOVERNOR_PERMISSION_HARD_THRESHOLD: '0.8',
        CORRIDOR_GOVERNOR_EXCLUSION_FACTOR: '1000',
        CORRIDOR_GOVERNOR_ALLOW_DEGENERATE_BANDS: 'true',
      },
    });

    expect(config.permission.hardThreshold).toBe(0.8);
    expect(config.permission.epsilon).toBe(1e-9);
    expect(config.exclusionPenaltyFactor).toBe(1000);
    expect(config.allowDegenerateBands).toBe(true);
  });

  it('merges a partial config file over the defaults', () => {
    const config = loadGovernorConfig({
      env: { CORRIDOR_GOVERNOR_CONFIG: CONFIG_PATH },
      readFile: fileReader('{"kernel":{"etaCorridor":0.5},"defaultSigma":0.1}'),
    });

    expect(config.kernel.etaCorridor).toBe(0.5);
    expect(config.kernel.etaMass).toBe(0.05);
    expect(config.defaultSigma).toBe(0.1);
  });

  it('reads the potential gate from the file', () => {
    const config = loadGovernorConfig({
      env: { CORRIDOR_GOVERNOR_CONFIG: CONFIG_PATH },
      readFile: fileReader('{"potential":{"vSafe":0.5}}'),
    });

    expect(config.potential).toEqual({ vSafe: 0.5, rHard: 0.8 });
  });

  it('lets the environment win over the file', () => {
    const config = loadGovernorConfig({
      env: {
        CORRIDOR_GOVERNOR_CONFIG: CONFIG_PATH,
        CORRIDOR_GOVERNOR_PERMISSION_HARD_THRESHOLD: '0.5',
      },
      readFile: fileReader('{"permission":{"hardThreshold":0.9}}'),
    });

    expect(config.permission.hardThreshold).toBe(0.5);
  });

  it('does not mutate the defaults', () => {
    loadGovernorConfig({ env: { CORRIDOR_GOVERNOR_PERMISSION_HARD_THRESHOLD: '0.3' } });
    expect(DEFAULT_GOVERNOR_CONFIG.permission.hardThreshold).toBe(1);
  });
});

// --- Failures ---

describe('loadGovernorConfig failures', () => {
  it('rejects a non-numeric threshold', () => {
    expect(() => loadGovernorConfig({
      env: { CORRIDOR_GOVERNOR_PERMISSION_HARD_THRESHOLD: 'abc' },
    })).toThrow(ConfigurationError);
  });

  it('rejects a malformed boolean', () => {
    expect(() => loadGovernorConfig({
      env: { CORRIDOR_GOVERNOR_ALLOW_DEGENERATE_BANDS: 'yes' },
    })).toThrow(/^Invalid environment: /);
  });

  it('rejects an unreadable file', () => {
    expect(() => loadGovernorConfig({
      env: { CORRIDOR_GOVERNOR_CONFIG: '/missing.json' },
      readFile: fileReader('{}'),
    })).toThrow('Cannot read governor config /missing.json: ENOENT: /missing.json');
  });

  it('rejects invalid JSON', () => {
    expect(() => loadGovernorConfig({
      env: { CORRIDOR_GOVERNOR_CONFIG: CONFIG_PATH },
      readFile: fileReader('{not json'),
    })).toThrow(/^Cannot read governor config /);
  });

  it('rejects unknown keys in the file', () => {
    expect(() => loadGovernorConfig({
      env: { CORRIDOR_GOVERNOR_CONFIG: CONFIG_PATH },
      readFile: fileReader('{"exclusionFactor":10}'),
    })).toThrow(/^Invalid governor config \/etc\/corridor-governor\.json: /);
  });

  it('rejects unknown keys inside a file section', () => {
    expect(() => loadGovernorConfig({
      env: { CORRIDOR_GOVERNOR_CONFIG: CONFIG_PATH },
      readFile: fileReader('{"kernel":{"gamma":1}}'),
    })).toThrow(/^Invalid governor config \/etc\/corridor-governor\.json: /);
  });

  it('checks ranges on the merged value, not the file layer', () => {
    expect(() => loadGovernorConfig({
      env: { CORRIDOR_GOVERNOR_CONFIG: CONFIG_PATH },
      readFile: fileReader('{"potential":{"rHard":1.5}}'),
    })).toThrow(/^Invalid governor configuration: potential\.rHard: /);
  });

  it('rejects out-of-range merged values', () => {
    expect(() => loadGovernorConfig({
      env: { CORRIDOR_GOVERNOR_CONFIG: CONFIG_PATH },
      readFile: fileReader('{"kernel":{"beta":2}}'),
    })).toThrow(/^Invalid governor configuration: kernel\.beta: /);
  });

  it('rejects an exclusion factor below 1', () => {
    expect(() => loadGovernorConfig({
      env: { CORRIDOR_GOVERNOR_EXCLUSION_FACTOR: '0.5' },
    })).toThrow(ConfigurationError);
  });
});

describe('parseGovernorConfig', () => {
  it('accepts the defaults', () => {
    expect(parseGovernorConfig(DEFAULT_GOVERNOR_CONFIG)).toEqual(DEFAULT_GOVERNOR_CONFIG);
  });

  it('requires every section', () => {
    expect(() => parseGovernorConfig({ kernel: DEFAULT_GOVERNOR_CONFIG.kernel }))
      .toThrow(ConfigurationError);
  });
});
