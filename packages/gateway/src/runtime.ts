/**
 * @file packages/gateway/src/runtime.ts
 * @description Assigns missions, spawns their agents and runs the monitoring loops.
 */

import type { DependencyContainer } from 'tsyringe';
import type { MissionProfile } from '@fieldlink/shared';
import { Logger } from './logger.js';
import { AgentFactory } from './domain/agents/agent-factory.js';
import type { MissionAgent } from './domain/agents/mission-agent.js';
import { MissionOrchestrator } from './application/services/mission-orchestrator.js';
import { AgentScheduler, type ScheduleOptions } from './application/services/agent-scheduler.js';
import { SensorManager } from './infrastructure/sensors/sensor-manager.js';

export interface FieldLinkRuntime {
  agents: Map<string, MissionAgent>;
  /** Resolves once every loop has stopped. */
  done: Promise<void>;
  stop(): Promise<void>;
}

/**
 * Assigns each active profile to its target agent, loads it and starts a loop
 * per agent, most urgent mission first. Inactive profiles are assigned but not run.
 */
export async function startMissions(
  c: DependencyContainer,
  profiles: MissionProfile[],
  options: ScheduleOptions = {},
): Promise<FieldLinkRuntime> {
  const logger = c.resolve(Logger);
  const orchestrator = c.resolve(MissionOrchestrator);
  const factory = c.resolve(AgentFactory);
  const scheduler = c.resolve(AgentScheduler);
  const sensors = c.resolve(SensorManager);

  for (const profile of profiles) {
    orchestrator.assignMission(profile.agent_id_target, profile);
  }

  await sensors.startAll();

  const agents = new Map<string, MissionAgent>();
  const loops: Promise<void>[] = [];
  for (const assignment of orchestrator.listAssignments()) {
    if (!assignment.profile.active) {
      logger.info({ agentId: assignment.agentId, missionId: assignment.missionId }, 'Mission inactive, not started');
      continue;
    }
    const agent = factory.create(assignment.agentId);
    agent.loadMission(assignment.profile);
    agents.set(agent.agentId, agent);
    loops.push(scheduler.start(agent, options));
  }

  const done = Promise.all(loops).then(() => undefined);

  return {
    agents,
    done,
    async stop() {
      scheduler.stopAll();
      await done;
      await sensors.stopAll();
    },
  };
}
