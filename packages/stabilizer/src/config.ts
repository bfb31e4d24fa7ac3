/**
 * Stabilizer Config — Parse YAML config documents into typed settings.
 *
 * Keys:
 *   dimensionality  positive integer (default 11)
 *   factor          finite number   (default 0.1)
 *   seed            integer in [0, 2147483647] (optional; seeds construction)
 *
 * Lookup order for loadStabilizerConfig: explicit path, then
 * $RESONANCE_CONFIG, then built-in defaults.
 */

import { existsSync, readFileSync } from 'fs';
import yaml from 'js-yaml';
import type { ConfigParseResult, StabilizerConfig } from '@resonance/shared';
import { InvalidConfigurationError } from './errors.js';
import { MAX_SEED, createSeededRandom, defaultRandom, isValidSeed } from './random.js';
import { DEFAULT_DIMENSIONALITY, DEFAULT_FACTOR, StabilizingVector } from './stabilizing-vector.js';

const KNOWN_KEYS = new Set(['dimensionality', 'factor', 'seed']);

export const CONFIG_ENV_VAR = 'RESONANCE_CONFIG';

export function defaultStabilizerConfig(): StabilizerConfig {
  return { dimensionality: DEFAULT_DIMENSIONALITY, factor: DEFAULT_FACTOR, seed: null };
}

/**
 * Parse a YAML string into a validated StabilizerConfig.
 */
export function parseStabilizerConfig(yamlString: string): ConfigParseResult {
  let raw: unknown;
  try {
    raw = yaml.load(yamlString);
  } catch (err) {
    return { ok: false, config: null, errors: [`YAML parse error: ${(err as Error).message}`] };
  }

  // An empty document means "all defaults"
  if (raw === undefined || raw === null) {
    return { ok: true, config: defaultStabilizerConfig(), errors: [] };
  }

  return validateStabilizerConfig(raw);
}

/**
 * Validate a raw object (already parsed from YAML/JSON) into a StabilizerConfig.
 */
export function validateStabilizerConfig(raw: unknown): ConfigParseResult {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return { ok: false, config: null, errors: ['Stabilizer config must be an object'] };
  }

  const obj = raw as Record<string, unknown>;
  const errors: string[] = [];
  const config = defaultStabilizerConfig();

  for (const key of Object.keys(obj)) {
    if (!KNOWN_KEYS.has(key)) {
      console.warn(`[Stabilizer] Ignoring unknown config key "${key}"`);
    }
  }

  if (obj.dimensionality !== undefined) {
    if (typeof obj.dimensionality !== 'number' || !Number.isInteger(obj.dimensionality) || obj.dimensionality <= 0) {
      errors.push('"dimensionality" must be a positive integer');
    } else {
      config.dimensionality = obj.dimensionality;
    }
  }

  if (obj.factor !== undefined) {
    if (typeof obj.factor !== 'number' || !Number.isFinite(obj.factor)) {
      errors.push('"factor" must be a finite number');
    } else {
      config.factor = obj.factor;
    }
  }

  if (obj.seed !== undefined && obj.seed !== null) {
    if (typeof obj.seed !== 'number' || !isValidSeed(obj.seed)) {
      errors.push(`"seed" must be an integer in [0, ${MAX_SEED}]`);
    } else {
      config.seed = obj.seed;
    }
  }

  if (errors.length > 0) {
    return { ok: false, config: null, errors };
  }
  return { ok: true, config, errors: [] };
}

/**
 * Load config from disk. With no path and no $RESONANCE_CONFIG, returns defaults.
 */
export function loadStabilizerConfig(path?: string): StabilizerConfig {
  const configPath = path ?? process.env[CONFIG_ENV_VAR];
  if (!configPath) return defaultStabilizerConfig();

  if (!existsSync(configPath)) {
    throw new InvalidConfigurationError(`Config file does not exist: ${configPath}`);
  }

  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new InvalidConfigurationError(
      `Cannot read config file ${configPath}: ${(err as Error).message}`
    );
  }

  const result = parseStabilizerConfig(text);
  if (!result.ok) {
    throw new InvalidConfigurationError(
      `Invalid stabilizer config at ${configPath}: ${result.errors.join('; ')}`,
      result.errors
    );
  }
  return result.config;
}

/**
 * Build a vector from config, seeding construction when `seed` is set.
 */
export function createFromConfig(config: StabilizerConfig): StabilizingVector {
  const random = config.seed === null ? defaultRandom : createSeededRandom(config.seed);
  return StabilizingVector.random(config.dimensionality, random);
}
