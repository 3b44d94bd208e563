/**
 * @file packages/shared/src/types/mission.test.ts
 * @description Mission profile schema tests.
 */

import { describe, it, expect } from 'vitest';
import { MissionProfileSchema, type MissionProfileInput } from './mission.js';

const baseProfile = (): MissionProfileInput => ({
  mission_id: 'M-SUBSTATION-01',
  agent_id_target: 'SENSOR-RF-007',
  function_name: 'voltage_stability_monitoring',
  priority: 1,
  parameters: { value_to_monitor: 'voltage_rms', monitoring_interval_seconds: 5 },
  triggers: [
    {
      trigger_name: 'critical_overvoltage',
      condition: 'value > 245.0',
      report_level: 'CRITICAL',
      cooldown_seconds: 300,
    },
  ],
  communication: { protocol: 'GibberLink-RF', target: 'CENTRAL' },
});

describe('MissionProfileSchema', () => {
  it('should apply defaults for active and destination', () => {
    const profile = MissionProfileSchema.parse(baseProfile());
    expect(profile.active).toBe(true);
    expect(profile.communication.destination).toBe('remote');
  });

  it('should keep extra parameters', () => {
    const input = baseProfile();
    input.parameters = { ...input.parameters, zone: 'north' };
    const profile = MissionProfileSchema.parse(input);
    expect(profile.parameters.zone).toBe('north');
  });

  it('should reject monitoring intervals longer than a timer can hold', () => {
    const input = baseProfile();
    input.parameters = { value_to_monitor: 'voltage_rms', monitoring_interval_seconds: 30 * 24 * 3600 };
    const result = MissionProfileSchema.safeParse(input);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['parameters', 'monitoring_interval_seconds']);
      expect(result.error.issues[0].message).toBe('must be at most 2147483 seconds');
    }

    input.parameters = { value_to_monitor: 'voltage_rms', monitoring_interval_seconds: 2_147_483 };
    expect(MissionProfileSchema.safeParse(input).success).toBe(true);
  });

  it('should reject duplicate trigger names', () => {
    const input = baseProfile();
    input.triggers = [
      { trigger_name: 'x', condition: 'value > 1', report_level: 'WARNING', cooldown_seconds: 0 },
      { trigger_name: 'x', condition: 'value < 1', report_level: 'WARNING', cooldown_seconds: 0 },
    ];
    const result = MissionProfileSchema.safeParse(input);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((i) => i.message)).toEqual(['duplicate trigger name "x"']);
      expect(result.error.issues[0].path).toEqual(['triggers', 1, 'trigger_name']);
    }
  });

  it('should reject an empty trigger list', () => {
    const input = baseProfile();
    input.triggers = [];
    const result = MissionProfileSchema.safeParse(input);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('mission must declare at least one trigger');
    }
  });

  it('should reject malformed conditions at parse time', () => {
    const input = baseProfile();
    input.triggers[0].condition = 'value ~ 3';
    const result = MissionProfileSchema.safeParse(input);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['triggers', 0, 'condition']);
    }
  });

  it('should reject a profile without value_to_monitor', () => {
    const input: Record<string, unknown> = { ...baseProfile(), parameters: { monitoring_interval_seconds: 5 } };
    expect(MissionProfileSchema.safeParse(input).success).toBe(false);
  });

  it('should reject negative priorities and cooldowns', () => {
    expect(MissionProfileSchema.safeParse({ ...baseProfile(), priority: -1 }).success).toBe(false);
    const input = baseProfile();
    input.triggers[0].cooldown_seconds = -5;
    expect(MissionProfileSchema.safeParse(input).success).toBe(false);
  });
});
