/**
 * @file packages/gateway/src/config.ts
 * @description Loads runtime configuration from .env, fieldlink.config.yaml and the environment.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { config as loadDotenv } from 'dotenv';
import { FieldLinkConfigSchema, type FieldLinkConfig } from '@fieldlink/shared';
import { ConfigError } from './domain/errors/app-error.js';
export type { FieldLinkConfig };

export const CONFIG_FILENAME = 'fieldlink.config.yaml';

/** Loaded configs keyed by resolved project root. */
const cachedConfigs = new Map<string, FieldLinkConfig>();

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parses an integer environment value, leaving garbage for the schema to reject.
 */
const parseNumber = (value?: string): number | string | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : value;
};

/**
 * Drops undefined entries so they do not shadow lower-precedence sources.
 */
const compact = (values: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));

/**
 * Loads config. Environment variables override the YAML file; missing values
 * fall back to schema defaults.
 */
export function loadConfig(projectRoot?: string): FieldLinkConfig {
  const root = resolve(projectRoot || process.cwd());
  const cached = cachedConfigs.get(root);
  if (cached) return cached;

  const envPath = join(root, '.env');
  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }

  const configPath = join(root, CONFIG_FILENAME);
  let fileConfig: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Could not parse ${CONFIG_FILENAME}`, { cause: err });
    }
    if (isRecord(parsed)) {
      fileConfig = parsed;
    } else if (parsed !== null && parsed !== undefined) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping`);
    }
  }

  const envConfig = compact({
    logLevel: process.env.LOG_LEVEL,
    aesKey: process.env.FIELDLINK_AES_KEY,
    obfuscationSalt: process.env.FIELDLINK_OBFUSCATION_SALT,
    cycleTimeoutMs: parseNumber(process.env.FIELDLINK_CYCLE_TIMEOUT_MS),
    missionsPath: process.env.FIELDLINK_MISSIONS,
    simulationScenario: process.env.FIELDLINK_SCENARIO,
  });

  const merged: Record<string, unknown> = { ...fileConfig, ...envConfig };
  if (typeof merged.missionsPath === 'string') {
    merged.missionsPath = resolve(root, merged.missionsPath);
  }

  const result = FieldLinkConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  cachedConfigs.set(root, result.data);
  return result.data;
}

/**
 * Forgets every cached config so the next load re-reads every source.
 */
export function resetConfigCache(): void {
  cachedConfigs.clear();
}
