/**
 * Stabilizer — Live Demo
 *
 * Pulls one seeded vector toward a fixed source and prints coherence,
 * stability factor and distance each step, then the divergence of the
 * update field at the final point.
 *
 * Run: npm run demo [-- path/to/config.yaml]
 */

import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { createFromConfig, loadStabilizerConfig, VERSION } from '@resonance/stabilizer';

// ─── ANSI Colors ───────────────────────────────────────────────────

const c = {
  reset:  '\x1b[0m',
  bold:   '\x1b[1m',
  dim:    '\x1b[2m',
  green:  '\x1b[32m',
  yellow: '\x1b[33m',
  cyan:   '\x1b[36m',
};

// ─── Helpers ───────────────────────────────────────────────────────

const STEPS = 25;

function line(char = '─', len = 62): string {
  return char.repeat(len);
}

function distance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

// ─── Main ──────────────────────────────────────────────────────────

function main(): void {
  const here = dirname(fileURLToPath(import.meta.url));
  const configPath = process.argv[2] ?? join(here, '..', 'config', 'stabilizer.yaml');
  const config = loadStabilizerConfig(configPath);

  const vector = createFromConfig(config);
  const source = new Array<number>(config.dimensionality).fill(0.5);

  console.log(`${c.bold}Resonance Stabilizer v${VERSION}${c.reset}`);
  console.log(`${c.dim}config: ${configPath}${c.reset}`);
  console.log(`dimensionality=${config.dimensionality} factor=${config.factor} seed=${config.seed ?? 'none'}`);
  console.log(line());
  console.log(`start  ${vector.toString()}  distance=${distance(vector.components, source).toFixed(4)}`);

  for (let step = 1; step <= STEPS; step++) {
    const plan = vector.advance(source, config.factor);

    const sf = plan.stabilityFactor < 0.75 ? c.green : c.yellow;
    console.log(
      `${c.cyan}#${String(step).padStart(2, '0')}${c.reset}  ` +
      `coherence=${plan.coherence.toFixed(4)}  ` +
      `${sf}stability=${plan.stabilityFactor.toFixed(4)}${c.reset}  ` +
      `distance=${distance(vector.components, source).toFixed(4)}`
    );
  }

  console.log(line());
  console.log(`end    ${vector.toString()}`);
  console.log(`divergence at end: ${vector.divergence(source).toFixed(6)}`);
}

try {
  main();
} catch (err) {
  console.error('[Stabilizer] demo failed:', (err as Error).message);
  process.exit(1);
}
