/**
 * @file packages/shared/src/types.ts
 * @description Runtime configuration contracts.
 */

import { z } from 'zod';
import { DEFAULT_CYCLE_TIMEOUT_MS, DEFAULT_OBFUSCATION_SALT } from './constants.js';

// ─── Simulation ───────────────────────────────────────────────

export const SimulationScenarioSchema = z.enum([
  'normal',
  'overload',
  'voltage_drop',
  'bad_power_quality',
]);
export type SimulationScenario = z.infer<typeof SimulationScenarioSchema>;

// ─── Logging ──────────────────────────────────────────────────

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

// ─── FieldLink Config ─────────────────────────────────────────

export const FieldLinkConfigSchema = z.object({
  logLevel: LogLevelSchema.default('info'),
  /** base64 / base64url of a 32-byte key. Generated once per process when absent. */
  aesKey: z.string().optional(),
  obfuscationSalt: z.string().min(1).default(DEFAULT_OBFUSCATION_SALT),
  cycleTimeoutMs: z.number().int().positive().default(DEFAULT_CYCLE_TIMEOUT_MS),
  missionsPath: z.string().optional(),
  simulationScenario: SimulationScenarioSchema.default('normal'),
});
export type FieldLinkConfig = z.infer<typeof FieldLinkConfigSchema>;
