/**
 * @file packages/gateway/src/domain/missions/mission-validator.ts
 * @description Validates mission profiles and compiles their trigger conditions.
 */

import {
  MissionProfileSchema,
  parseCondition,
  type Condition,
  type MissionProfile,
  type TriggerSpec,
} from '@fieldlink/shared';
import type { ZodIssue } from 'zod';
import { InvalidMissionError } from '../errors/app-error.js';

export interface CompiledTrigger {
  readonly spec: Readonly<TriggerSpec>;
  readonly condition: Condition;
}

export interface CompiledMission {
  readonly profile: MissionProfile;
  readonly triggers: readonly CompiledTrigger[];
}

const formatIssue = (issue: ZodIssue): string =>
  `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`;

/**
 * Validates a raw profile. Throws InvalidMissionError listing every problem.
 */
export function validateMission(input: unknown): MissionProfile {
  const result = MissionProfileSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidMissionError('Invalid mission profile', result.error.issues.map(formatIssue));
  }
  return result.data;
}

/**
 * Validates and freezes a private copy of a profile, pairing each trigger with
 * its parsed condition. Objects passed through in `parameters` are copied too.
 */
export function compileMission(input: unknown): CompiledMission {
  const profile = deepFreeze(structuredClone(validateMission(input)));
  const triggers = profile.triggers.map((spec): CompiledTrigger => {
    const parsed = parseCondition(spec.condition);
    if (!parsed.ok) {
      throw new InvalidMissionError('Invalid mission profile', [
        `trigger ${spec.trigger_name}: ${parsed.reason}`,
      ]);
    }
    return Object.freeze({ spec, condition: Object.freeze(parsed.condition) });
  });
  return Object.freeze({ profile, triggers: Object.freeze(triggers) });
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
