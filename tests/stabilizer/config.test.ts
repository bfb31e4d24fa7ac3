/**
 * Stabilizer Config Test Suite
 *
 * 1. Parsing — defaults, overrides, collected errors
 * 2. Loading — explicit path, $RESONANCE_CONFIG, missing files
 * 3. Construction — seeded vectors from config
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import {
  parseStabilizerConfig,
  validateStabilizerConfig,
  loadStabilizerConfig,
  createFromConfig,
  defaultStabilizerConfig,
  create,
  createSeededRandom,
  InvalidConfigurationError,
  CONFIG_ENV_VAR,
} from '@resonance/stabilizer';

// ─── Test Helpers ─────────────────────────────────────────────────

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'stabilizer-config-test-'));
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  rmSync(tempDir, { recursive: true, force: true });
});

function writeConfig(name: string, body: string): string {
  const path = join(tempDir, name);
  writeFileSync(path, body, 'utf-8');
  return path;
}

// ─── Parsing ──────────────────────────────────────────────────────

describe('parseStabilizerConfig', () => {
  it('returns defaults for an empty document', () => {
    const result = parseStabilizerConfig('');
    expect(result.ok).toBe(true);
    expect(result.config).toEqual({ dimensionality: 11, factor: 0.1, seed: null });
  });

  it('reads every known key', () => {
    const result = parseStabilizerConfig('dimensionality: 5\nfactor: 0.25\nseed: 99\n');
    expect(result.ok).toBe(true);
    expect(result.config).toEqual({ dimensionality: 5, factor: 0.25, seed: 99 });
  });

  it('keeps defaults for omitted keys', () => {
    const result = parseStabilizerConfig('factor: 0.5\n');
    expect(result.config).toEqual({ dimensionality: 11, factor: 0.5, seed: null });
  });

  it('accepts a null seed', () => {
    const result = parseStabilizerConfig('seed: ~\n');
    expect(result.ok).toBe(true);
    expect(result.config?.seed).toBeNull();
  });

  it('collects every invalid field', () => {
    const result = parseStabilizerConfig('dimensionality: 0\nfactor: fast\nseed: 1.5\n');
    expect(result.ok).toBe(false);
    expect(result.config).toBeNull();
    expect(result.errors).toEqual([
      '"dimensionality" must be a positive integer',
      '"factor" must be a finite number',
      '"seed" must be an integer in [0, 2147483647]',
    ]);
  });

  it('rejects a non-object document', () => {
    const result = parseStabilizerConfig('- 1\n- 2\n');
    expect(result.ok).toBe(false);
    expect(result.errors).toEqual(['Stabilizer config must be an object']);
  });

  it('reports YAML syntax errors', () => {
    const result = parseStabilizerConfig('dimensionality: [1, 2\n');
    expect(result.ok).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].startsWith('YAML parse error: ')).toBe(true);
  });

  it('warns about and ignores unknown keys', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const result = validateStabilizerConfig({ factor: 0.3, speed: 2 });
    expect(result.ok).toBe(true);
    expect(result.config).toEqual({ dimensionality: 11, factor: 0.3, seed: null });
    expect(warn).toHaveBeenCalledWith('[Stabilizer] Ignoring unknown config key "speed"');
  });

  it('rejects seeds outside the generator range', () => {
    for (const seed of [-1, 2147483648, 4294967296]) {
      const result = validateStabilizerConfig({ seed });
      expect(result.ok).toBe(false);
      expect(result.errors).toEqual(['"seed" must be an integer in [0, 2147483647]']);
    }
  });

  it('accepts both ends of the seed range', () => {
    expect(validateStabilizerConfig({ seed: 0 }).config?.seed).toBe(0);
    expect(validateStabilizerConfig({ seed: 2147483647 }).config?.seed).toBe(2147483647);
  });

  it('does not place a bound on factor', () => {
    const result = parseStabilizerConfig('factor: -4\n');
    expect(result.config?.factor).toBe(-4);
  });
});

// ─── Loading ──────────────────────────────────────────────────────

describe('loadStabilizerConfig', () => {
  it('returns defaults when no file is named', () => {
    vi.stubEnv(CONFIG_ENV_VAR, '');
    expect(loadStabilizerConfig()).toEqual(defaultStabilizerConfig());
  });

  it('reads an explicit path', () => {
    const path = writeConfig('explicit.yaml', 'dimensionality: 3\nseed: 5\n');
    expect(loadStabilizerConfig(path)).toEqual({ dimensionality: 3, factor: 0.1, seed: 5 });
  });

  it('falls back to $RESONANCE_CONFIG', () => {
    const path = writeConfig('env.yaml', 'factor: 0.75\n');
    vi.stubEnv(CONFIG_ENV_VAR, path);
    expect(loadStabilizerConfig().factor).toBe(0.75);
  });

  it('throws when the named file is missing', () => {
    const missing = join(tempDir, 'nope.yaml');
    expect(() => loadStabilizerConfig(missing)).toThrow(
      `Config file does not exist: ${missing}`
    );
  });

  it('wraps read failures in InvalidConfigurationError', () => {
    // A directory exists but cannot be read as a file
    try {
      loadStabilizerConfig(tempDir);
      expect.unreachable('loadStabilizerConfig should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigurationError);
      expect((err as Error).message.startsWith(`Cannot read config file ${tempDir}: `)).toBe(true);
    }
  });

  it('throws with the collected errors for an invalid file', () => {
    const path = writeConfig('bad.yaml', 'dimensionality: -2\n');
    try {
      loadStabilizerConfig(path);
      expect.unreachable('loadStabilizerConfig should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigurationError);
      expect((err as InvalidConfigurationError).errors).toEqual([
        '"dimensionality" must be a positive integer',
      ]);
    }
  });
});

// ─── Construction ─────────────────────────────────────────────────

describe('createFromConfig', () => {
  it('seeds construction when a seed is set', () => {
    const fromConfig = createFromConfig({ dimensionality: 6, factor: 0.1, seed: 31 });
    const direct = create(6, createSeededRandom(31));
    expect(fromConfig.toArray()).toEqual(direct.toArray());
  });

  it('builds distinct vectors for distinct seeds', () => {
    const seeds = [0, 1, 2, 2147483647];
    const built = seeds.map(seed => createFromConfig({ dimensionality: 11, factor: 0.1, seed }).toArray());
    for (let i = 0; i < built.length; i++) {
      for (let j = i + 1; j < built.length; j++) {
        expect(built[i]).not.toEqual(built[j]);
      }
    }
  });

  it('rejects an out-of-range seed set directly on the config', () => {
    expect(() =>
      createFromConfig({ dimensionality: 3, factor: 0.1, seed: 4294967296 })
    ).toThrow(InvalidConfigurationError);
  });

  it('uses the configured dimensionality without a seed', () => {
    const v = createFromConfig({ dimensionality: 4, factor: 0.1, seed: null });
    expect(v.dimensionality).toBe(4);
    expect(v.isWithinBounds()).toBe(true);
  });
});
