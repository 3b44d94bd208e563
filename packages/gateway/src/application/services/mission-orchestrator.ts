/**
 * @file packages/gateway/src/application/services/mission-orchestrator.ts
 * @description Registry of mission assignments and sink for inbound reports.
 */

import { inject, singleton } from 'tsyringe';
import {
  MissionEvents,
  ReportEvents,
  type MissionProfile,
  type ReportPacket,
  type TransportEnvelope,
} from '@fieldlink/shared';
import { CommunicationsGateway } from '../../infrastructure/comms/communications-gateway.js';
import { EventBusService } from '../../infrastructure/events/event-bus.js';
import { Logger } from '../../logger.js';
import { UnknownAgentError } from '../../domain/errors/app-error.js';
import { validateMission } from '../../domain/missions/mission-validator.js';
import type { Clock } from '../../domain/agents/mission-agent.js';

export type AssignmentStatus = 'ASSIGNED' | `REPORTED_${string}`;

export interface AgentAssignment {
  agentId: string;
  missionId: string;
  /** Lower is more urgent. */
  priority: number;
  profile: MissionProfile;
  status: AssignmentStatus;
  assignedAt: number;
  lastReportAt?: number;
  lastReport?: ReportPacket;
}

/**
 * Records which mission each agent should run. It never drives agents itself;
 * schedulers read assignments and load them into agent instances.
 */
@singleton()
export class MissionOrchestrator {
  private assignments = new Map<string, AgentAssignment>();

  constructor(
    @inject(CommunicationsGateway) private gateway: CommunicationsGateway,
    @inject(EventBusService) private eventBus: EventBusService,
    @inject(Logger) private logger: Logger,
    @inject('Clock') private clock: Clock,
  ) {}

  /**
   * Associates a validated profile with an agent. Last write wins.
   */
  assignMission(agentId: string, profile: unknown): AgentAssignment {
    const mission = validateMission(profile);
    const previous = this.assignments.get(agentId);
    const assignment: AgentAssignment = {
      agentId,
      missionId: mission.mission_id,
      priority: mission.priority,
      profile: mission,
      status: 'ASSIGNED',
      assignedAt: this.clock(),
    };
    this.assignments.set(agentId, assignment);

    if (previous) {
      this.logger.info(
        { agentId, from: previous.missionId, to: mission.mission_id },
        'Mission assignment replaced',
      );
    } else {
      this.logger.info({ agentId, missionId: mission.mission_id }, 'Mission assigned');
    }
    this.eventBus.publish(
      MissionEvents.ASSIGNED,
      { agentId, missionId: mission.mission_id, priority: mission.priority },
      'orchestrator',
    );
    return assignment;
  }

  getAssignment(agentId: string): AgentAssignment | undefined {
    return this.assignments.get(agentId);
  }

  /**
   * All assignments, most urgent first.
   */
  listAssignments(): AgentAssignment[] {
    return Array.from(this.assignments.values()).sort(
      (a, b) => a.priority - b.priority || a.agentId.localeCompare(b.agentId),
    );
  }

  handleIncomingReport(packet: ReportPacket): AgentAssignment {
    const assignment = this.assignments.get(packet.agent_id);
    if (!assignment) {
      throw new UnknownAgentError(packet.agent_id);
    }

    assignment.status = `REPORTED_${packet.report_level}`;
    assignment.lastReportAt = this.clock();
    assignment.lastReport = packet;

    this.logger.info(
      {
        agentId: packet.agent_id,
        level: packet.report_level,
        trigger: packet.trigger_fired,
        value: packet.measured_value,
      },
      'Report received',
    );
    this.eventBus.publish(ReportEvents.RECEIVED, packet, 'orchestrator', packet.mission_id);
    return assignment;
  }

  /**
   * Inbound path: unwrap the envelope, decode the report and record it.
   */
  receiveEnvelope(envelope: TransportEnvelope): AgentAssignment {
    const packet = this.gateway.decodeReport(this.gateway.receive(envelope));
    return this.handleIncomingReport(packet);
  }
}
