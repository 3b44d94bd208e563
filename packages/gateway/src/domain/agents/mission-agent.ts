/**
 * @file packages/gateway/src/domain/agents/mission-agent.ts
 * @description Mission state machine: samples a sensor, evaluates triggers and
 *              emits secured reports.
 *
 *   IDLE ──loadMission──▶ MONITORING ──trigger fires──▶ REPORTING
 *     ▲                     ▲   │                          │
 *     └────unloadMission────┘   └──────report sent─────────┘
 */

import {
  AgentEvents,
  MissionEvents,
  ReportEvents,
  evaluateCondition,
  type AgentState,
  type MissionProfile,
  type ReportPacket,
} from '@fieldlink/shared';
import type { SensorReader } from '../../infrastructure/sensors/sensor.interface.js';
import type { CommunicationsGateway } from '../../infrastructure/comms/communications-gateway.js';
import type { TransportRegistry } from '../../infrastructure/transports/transport-registry.js';
import type { EventBusService } from '../../infrastructure/events/event-bus.js';
import { logger as defaultLogger, type Logger } from '../../logger.js';
import {
  AppError,
  InvalidMissionError,
  SensorUnavailableError,
  UnsupportedProtocolError,
} from '../errors/app-error.js';
import { compileMission, type CompiledMission, type CompiledTrigger } from '../missions/mission-validator.js';
import { CooldownLedger } from './cooldown-ledger.js';

/** Milliseconds since the epoch. */
export type Clock = () => number;

export interface MissionAgentDeps {
  sensor: SensorReader;
  gateway: CommunicationsGateway;
  transports: TransportRegistry;
  eventBus: EventBusService;
  logger?: Logger;
  clock?: Clock;
}

export type CycleSkipReason = 'idle' | 'inactive' | 'busy' | 'sensor_unavailable';

export type CycleResult =
  | { status: 'skipped'; reason: CycleSkipReason }
  | { status: 'sampled'; value: number }
  | { status: 'reported'; value: number; trigger: string; packet: ReportPacket }
  | { status: 'send_failed'; value: number; trigger: string; error: string };

export class MissionAgent {
  private state: AgentState = 'IDLE';
  private mission: CompiledMission | null = null;
  private ledger = new CooldownLedger();
  private previousValue: number | null = null;
  private cycleInProgress = false;

  private readonly sensor: SensorReader;
  private readonly gateway: CommunicationsGateway;
  private readonly transports: TransportRegistry;
  private readonly eventBus: EventBusService;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    public readonly agentId: string,
    deps: MissionAgentDeps,
  ) {
    this.sensor = deps.sensor;
    this.gateway = deps.gateway;
    this.transports = deps.transports;
    this.eventBus = deps.eventBus;
    this.logger = deps.logger ?? defaultLogger;
    this.clock = deps.clock ?? Date.now;
  }

  getState(): AgentState {
    return this.state;
  }

  getMission(): MissionProfile | null {
    return this.mission?.profile ?? null;
  }

  getPreviousValue(): number | null {
    return this.previousValue;
  }

  /** Timestamp (ms) of the trigger's last fired report, if any. */
  lastFired(triggerName: string): number | undefined {
    return this.ledger.get(triggerName);
  }

  /**
   * Validates and installs a mission, replacing any loaded one.
   * On rejection the agent keeps its previous state and mission.
   */
  loadMission(profile: unknown): MissionProfile {
    let compiled: CompiledMission;
    try {
      compiled = compileMission(profile);
      this.assertDeliverable(compiled.profile);
    } catch (err) {
      if (err instanceof AppError) {
        this.logger.warn({ agentId: this.agentId, err: err.message }, 'Mission rejected');
        this.eventBus.publish(MissionEvents.REJECTED, { agentId: this.agentId, error: err.message }, this.source);
      }
      throw err;
    }

    this.mission = compiled;
    this.ledger.clear();
    this.previousValue = null;
    this.transition('MONITORING');

    const { mission_id, function_name } = compiled.profile;
    this.logger.info({ agentId: this.agentId, missionId: mission_id }, `Mission '${function_name}' loaded`);
    this.eventBus.publish(MissionEvents.LOADED, { agentId: this.agentId, missionId: mission_id }, this.source);
    return compiled.profile;
  }

  unloadMission(): void {
    if (!this.mission) return;
    const missionId = this.mission.profile.mission_id;
    this.mission = null;
    this.ledger.clear();
    this.previousValue = null;
    this.transition('IDLE');
    this.eventBus.publish(MissionEvents.UNLOADED, { agentId: this.agentId, missionId }, this.source);
  }

  /**
   * Runs one monitoring cycle. Overlapping calls on the same agent are skipped.
   * Transient sensor and transport failures never escape; they are reported in
   * the result and retried on the next cycle.
   */
  async runCycle(): Promise<CycleResult> {
    if (this.cycleInProgress) {
      this.logger.debug({ agentId: this.agentId }, 'Cycle already running, skipping');
      return { status: 'skipped', reason: 'busy' };
    }
    const mission = this.mission;
    if (this.state !== 'MONITORING' || !mission) {
      return { status: 'skipped', reason: 'idle' };
    }
    if (!mission.profile.active) {
      return { status: 'skipped', reason: 'inactive' };
    }

    this.cycleInProgress = true;
    try {
      return await this.executeCycle(mission);
    } finally {
      this.cycleInProgress = false;
    }
  }

  private async executeCycle(mission: CompiledMission): Promise<CycleResult> {
    const quantity = mission.profile.parameters.value_to_monitor;

    let value: number;
    try {
      value = await this.sensor.read(quantity);
      if (!Number.isFinite(value)) {
        throw new SensorUnavailableError(quantity, `non-finite reading ${value}`);
      }
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn({ agentId: this.agentId, quantity, err: reason }, 'Sensor read failed, skipping cycle');
      this.eventBus.publish(AgentEvents.CYCLE_SKIPPED, { agentId: this.agentId, reason }, this.source);
      return { status: 'skipped', reason: 'sensor_unavailable' };
    }

    // Mission may have been replaced while the sensor was being read.
    if (this.mission !== mission) {
      return { status: 'skipped', reason: 'idle' };
    }

    const now = this.clock();
    let result: CycleResult = { status: 'sampled', value };

    // Declared order is the tie-break: the first trigger that fires ends the scan.
    for (const trigger of mission.triggers) {
      const { trigger_name, cooldown_seconds } = trigger.spec;
      if (!this.ledger.isEligible(trigger_name, cooldown_seconds, now)) continue;
      if (!evaluateCondition(trigger.condition, value, this.previousValue)) continue;

      result = await this.report(mission, trigger, value, now);
      break;
    }

    if (this.mission === mission) {
      this.previousValue = value;
    }
    return result;
  }

  private async report(
    mission: CompiledMission,
    trigger: CompiledTrigger,
    value: number,
    now: number,
  ): Promise<CycleResult> {
    const { profile } = mission;
    const triggerName = trigger.spec.trigger_name;

    this.transition('REPORTING');
    const packet: ReportPacket = Object.freeze({
      timestamp: Math.floor(now / 1000),
      agent_id: this.agentId,
      mission_id: profile.mission_id,
      trigger_fired: triggerName,
      report_level: trigger.spec.report_level,
      measured_value: value,
      mission_function: profile.function_name,
    });

    try {
      const { protocol, target, destination } = profile.communication;
      const envelope = this.gateway.forward(this.gateway.encodeReport(packet), destination);
      await this.transports.get(protocol).send(envelope, target);

      this.ledger.record(triggerName, now);
      this.logger.info(
        { agentId: this.agentId, trigger: triggerName, level: packet.report_level, value, protocol },
        `Event '${triggerName}' reported`,
      );
      this.eventBus.publish(ReportEvents.EMITTED, packet, this.source, profile.mission_id);
      return { status: 'reported', value, trigger: triggerName, packet };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      this.logger.warn({ agentId: this.agentId, trigger: triggerName, err: error }, 'Report not sent, will retry next cycle');
      this.eventBus.publish(ReportEvents.SEND_FAILED, { packet, error }, this.source, profile.mission_id);
      return { status: 'send_failed', value, trigger: triggerName, error };
    } finally {
      if (this.mission === mission) {
        this.transition('MONITORING');
      }
    }
  }

  private assertDeliverable(profile: MissionProfile): void {
    try {
      this.transports.get(profile.communication.protocol);
    } catch (err) {
      if (err instanceof UnsupportedProtocolError) {
        throw new InvalidMissionError('Invalid mission profile', [`communication.protocol: ${err.message}`]);
      }
      throw err;
    }
    if (profile.agent_id_target !== this.agentId) {
      throw new InvalidMissionError('Invalid mission profile', [
        `agent_id_target: mission targets "${profile.agent_id_target}", not "${this.agentId}"`,
      ]);
    }
  }

  private transition(next: AgentState): void {
    if (this.state === next) return;
    const previous = this.state;
    this.state = next;
    this.logger.debug({ agentId: this.agentId, from: previous, to: next }, 'State change');
    this.eventBus.publish(AgentEvents.STATE_CHANGED, { agentId: this.agentId, from: previous, to: next }, this.source);
  }

  private get source(): string {
    return `agent:${this.agentId}`;
  }
}
