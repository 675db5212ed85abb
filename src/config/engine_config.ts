/**
 * @fileoverview Engine configuration.
 *
 * Numeric tolerances and size ceilings are explicit values rather than
 * constants buried in the rules. Operations take an optional `config`;
 * when absent they use {@link DEFAULT_ENGINE_CONFIG}.
 */

import { z } from 'zod';
import { readNumericEnv } from '../utils/runtime_controls.js';

export const EngineConfigSchema = z.object({
  /** Maximum |Σ masses - 1| for a mass function to count as normalized. */
  tolerance: z.number().positive().max(1e-3),
  /** Masses at or below this value are dropped after arithmetic. */
  pruneEpsilon: z.number().nonnegative().max(1e-6),
  /** Negative masses above -tolerance are clamped to zero without a warning. */
  negativeClampTolerance: z.number().nonnegative().max(1e-3),
  /** Largest frame the powerset algorithms (weights, contextual discounting) accept. */
  maxPowersetFrameSize: z.number().int().min(1).max(24),
  /** Largest frame representable; subsets are 32-bit masks. */
  maxFrameSize: z.number().int().min(1).max(30),
}).strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  tolerance: 1e-10,
  pruneEpsilon: 1e-12,
  negativeClampTolerance: 1e-9,
  maxPowersetFrameSize: 20,
  maxFrameSize: 30,
});

const ENV_KEYS: Record<keyof EngineConfig, string> = {
  tolerance: 'EVIDENCE_TOLERANCE',
  pruneEpsilon: 'EVIDENCE_PRUNE_EPSILON',
  negativeClampTolerance: 'EVIDENCE_NEGATIVE_CLAMP_TOLERANCE',
  maxPowersetFrameSize: 'EVIDENCE_MAX_POWERSET_FRAME',
  maxFrameSize: 'EVIDENCE_MAX_FRAME',
};

const CONFIG_KEYS: ReadonlyArray<keyof EngineConfig> = [
  'tolerance',
  'pruneEpsilon',
  'negativeClampTolerance',
  'maxPowersetFrameSize',
  'maxFrameSize',
];

/**
 * Resolves the effective configuration: defaults, then `EVIDENCE_*`
 * environment values, then explicit overrides.
 *
 * @throws ZodError if the merged configuration is out of range
 */
export function resolveEngineConfig(
  overrides: Partial<EngineConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  const fromEnv: Partial<EngineConfig> = {};
  for (const key of CONFIG_KEYS) {
    const value = readNumericEnv(ENV_KEYS[key], env);
    if (value !== undefined) fromEnv[key] = value;
  }
  return EngineConfigSchema.parse({ ...DEFAULT_ENGINE_CONFIG, ...fromEnv, ...overrides });
}

export interface ConfigOptions {
  readonly config?: EngineConfig;
}

export function configOf(options?: ConfigOptions): EngineConfig {
  return options?.config ?? DEFAULT_ENGINE_CONFIG;
}
