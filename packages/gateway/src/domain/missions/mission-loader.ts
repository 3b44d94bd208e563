/**
 * @file packages/gateway/src/domain/missions/mission-loader.ts
 * @description Reads mission profiles from JSON or YAML files.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { MissionProfile } from '@fieldlink/shared';
import { InvalidMissionError } from '../errors/app-error.js';
import { validateMission } from './mission-validator.js';

/**
 * Parses file content holding either one profile or a list of profiles.
 */
export function parseMissionDocument(content: string, format: 'json' | 'yaml'): MissionProfile[] {
  let data: unknown;
  try {
    data = format === 'json' ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new InvalidMissionError(
      `Mission document is not valid ${format.toUpperCase()}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const entries: unknown[] = Array.isArray(data) ? data : [data];
  if (entries.length === 0) {
    throw new InvalidMissionError('Mission document contains no profiles');
  }

  return entries.map((entry, index) => {
    try {
      return validateMission(entry);
    } catch (err) {
      if (err instanceof InvalidMissionError && entries.length > 1) {
        throw new InvalidMissionError(
          `Invalid mission profile at index ${index}`,
          err.issues,
        );
      }
      throw err;
    }
  });
}

export async function loadMissionFile(path: string): Promise<MissionProfile[]> {
  const extension = extname(path).toLowerCase();
  const format = extension === '.yaml' || extension === '.yml' ? 'yaml' : 'json';
  const content = await readFile(path, 'utf-8');
  return parseMissionDocument(content, format);
}
