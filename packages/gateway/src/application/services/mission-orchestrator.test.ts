/**
 * @file packages/gateway/src/application/services/mission-orchestrator.test.ts
 */

import 'reflect-metadata';
import { describe, it, expect, beforeEach } from 'vitest';
import { ReportEvents, type FieldLinkEvent, type ReportPacket } from '@fieldlink/shared';
import { MissionOrchestrator } from './mission-orchestrator.js';
import { CommunicationsGateway } from '../../infrastructure/comms/communications-gateway.js';
import { EventBusService } from '../../infrastructure/events/event-bus.js';
import { Logger } from '../../logger.js';
import { InvalidMissionError, UnknownAgentError } from '../../domain/errors/app-error.js';
import { FakeClock, makeProfile, makeSecurity, trigger } from '../../testing/fixtures.js';

const packet = (overrides: Partial<ReportPacket> = {}): ReportPacket => ({
  timestamp: 1_700_000_000,
  agent_id: 'SENSOR-RF-007',
  mission_id: 'M-SUBSTATION-01',
  trigger_fired: 'critical_overvoltage',
  report_level: 'CRITICAL',
  measured_value: 250.0,
  mission_function: 'voltage_stability_monitoring',
  ...overrides,
});

describe('MissionOrchestrator', () => {
  let bus: EventBusService;
  let gateway: CommunicationsGateway;
  let clock: FakeClock;
  let orchestrator: MissionOrchestrator;

  beforeEach(() => {
    bus = new EventBusService();
    gateway = new CommunicationsGateway(makeSecurity());
    clock = new FakeClock();
    orchestrator = new MissionOrchestrator(gateway, bus, new Logger(), clock.clock);
  });

  describe('assignMission', () => {
    it('should record a validated assignment', () => {
      const assignment = orchestrator.assignMission('SENSOR-RF-007', makeProfile());

      expect(assignment).toMatchObject({
        agentId: 'SENSOR-RF-007',
        missionId: 'M-SUBSTATION-01',
        priority: 1,
        status: 'ASSIGNED',
        assignedAt: clock.now,
      });
      expect(assignment.profile.communication.destination).toBe('remote');
      expect(orchestrator.getAssignment('SENSOR-RF-007')).toBe(assignment);
    });

    it('should replace an earlier assignment for the same agent', () => {
      orchestrator.assignMission('SENSOR-RF-007', makeProfile());
      orchestrator.assignMission('SENSOR-RF-007', makeProfile({ mission_id: 'M-SUBSTATION-02' }));

      expect(orchestrator.listAssignments()).toHaveLength(1);
      expect(orchestrator.getAssignment('SENSOR-RF-007')?.missionId).toBe('M-SUBSTATION-02');
    });

    it('should reject an invalid profile without touching the registry', () => {
      const bad = makeProfile({ triggers: [trigger('x', 'value > 1'), trigger('x', 'value > 2')] });
      expect(() => orchestrator.assignMission('SENSOR-RF-007', bad)).toThrow(InvalidMissionError);
      expect(orchestrator.getAssignment('SENSOR-RF-007')).toBeUndefined();
    });
  });

  describe('listAssignments', () => {
    it('should order by priority, most urgent first, then by agent id', () => {
      orchestrator.assignMission('B', makeProfile({ agent_id_target: 'B', priority: 2 }));
      orchestrator.assignMission('C', makeProfile({ agent_id_target: 'C', priority: 0 }));
      orchestrator.assignMission('A', makeProfile({ agent_id_target: 'A', priority: 2 }));

      expect(orchestrator.listAssignments().map((a) => a.agentId)).toEqual(['C', 'A', 'B']);
    });
  });

  describe('handleIncomingReport', () => {
    it('should mark the assignment with the report level', () => {
      orchestrator.assignMission('SENSOR-RF-007', makeProfile());
      clock.advance(30);

      const assignment = orchestrator.handleIncomingReport(packet({ report_level: 'WARNING' }));

      expect(assignment.status).toBe('REPORTED_WARNING');
      expect(assignment.lastReportAt).toBe(1_700_000_030_000);
      expect(assignment.lastReport?.measured_value).toBe(250.0);
    });

    it('should publish the received report', () => {
      const received: ReportPacket[] = [];
      bus.subscribe<ReportPacket>(ReportEvents.RECEIVED, (event: FieldLinkEvent<ReportPacket>) => {
        received.push(event.payload);
      });
      orchestrator.assignMission('SENSOR-RF-007', makeProfile());
      orchestrator.handleIncomingReport(packet());

      expect(received).toEqual([packet()]);
    });

    it('should reject reports from unassigned agents', () => {
      expect(() => orchestrator.handleIncomingReport(packet({ agent_id: 'GHOST' }))).toThrow(UnknownAgentError);
    });
  });

  describe('receiveEnvelope', () => {
    it('should decode a secured envelope and record the report', () => {
      orchestrator.assignMission('SENSOR-RF-007', makeProfile());
      const envelope = gateway.forward(gateway.encodeReport(packet()), 'remote');

      const assignment = orchestrator.receiveEnvelope(envelope);
      expect(assignment.status).toBe('REPORTED_CRITICAL');
      expect(assignment.lastReport).toEqual(packet());
    });

    it('should accept plain relay envelopes', () => {
      orchestrator.assignMission('SENSOR-RF-007', makeProfile());
      const envelope = gateway.forward(gateway.encodeReport(packet({ report_level: 'INFO' })), 'local');

      expect(orchestrator.receiveEnvelope(envelope).status).toBe('REPORTED_INFO');
    });
  });
});
