/**
 * @file packages/gateway/src/testing/fixtures.ts
 * @description Stand-ins shared by the gateway test suites.
 */

import type {
  MissionProfileInput,
  TransportEnvelope,
  TransportProtocol,
  TriggerSpec,
} from '@fieldlink/shared';
import { SecurityContext } from '../security/security-context.js';
import type { SensorReader } from '../infrastructure/sensors/sensor.interface.js';
import type { Transport } from '../infrastructure/transports/transport.interface.js';
import type { Clock } from '../domain/agents/mission-agent.js';

export const TEST_KEY = Buffer.alloc(32, 7);
export const TEST_SALT = 'test-salt';

export function makeSecurity(): SecurityContext {
  return new SecurityContext(TEST_KEY, Buffer.from(TEST_SALT, 'utf-8'));
}

export function trigger(
  trigger_name: string,
  condition: string,
  cooldown_seconds = 300,
  report_level = 'CRITICAL',
): TriggerSpec {
  return { trigger_name, condition, report_level, cooldown_seconds };
}

export function makeProfile(overrides: Partial<MissionProfileInput> = {}): MissionProfileInput {
  return {
    mission_id: 'M-SUBSTATION-01',
    agent_id_target: 'SENSOR-RF-007',
    function_name: 'voltage_stability_monitoring',
    priority: 1,
    active: true,
    parameters: { value_to_monitor: 'voltage_rms', monitoring_interval_seconds: 5 },
    triggers: [trigger('critical_overvoltage', 'value > 245.0')],
    communication: { protocol: 'GibberLink-RF', target: 'CENTRAL' },
    ...overrides,
  };
}

/**
 * Replays queued readings; an Error entry is thrown instead of returned.
 */
export class StubSensor implements SensorReader {
  readonly reads: string[] = [];
  private queue: Array<number | Error> = [];

  push(...values: Array<number | Error>): this {
    this.queue.push(...values);
    return this;
  }

  async read(quantity: string): Promise<number> {
    this.reads.push(quantity);
    const next = this.queue.shift();
    if (next === undefined) throw new Error('no reading queued');
    if (next instanceof Error) throw next;
    return next;
  }
}

export class RecordingTransport implements Transport {
  readonly sent: Array<{ envelope: TransportEnvelope; target: string }> = [];
  private failures = 0;

  constructor(readonly protocol: TransportProtocol = 'GibberLink-RF') {}

  failNext(count = 1): void {
    this.failures = count;
  }

  async send(envelope: TransportEnvelope, target: string): Promise<void> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('radio busy');
    }
    this.sent.push({ envelope, target });
  }
}

export class FakeClock {
  constructor(public now = 1_700_000_000_000) {}

  readonly clock: Clock = () => this.now;

  advance(seconds: number): void {
    this.now += seconds * 1000;
  }
}
