/**
 * @file packages/gateway/src/application/services/agent-scheduler.ts
 * @description Drives one monitoring loop per agent with per-cycle timeouts.
 */

import { inject, singleton } from 'tsyringe';
import { MAX_TIMER_DELAY_MS } from '@fieldlink/shared';
import { Logger } from '../../logger.js';
import type { CycleResult, MissionAgent } from '../../domain/agents/mission-agent.js';

export interface ScheduleOptions {
  /** Stop after this many cycles. Runs until stopped when omitted. */
  maxCycles?: number;
  /** Overrides the mission's monitoring_interval_seconds. */
  intervalMs?: number;
}

type CycleOutcome = CycleResult | { status: 'timeout' };

interface ScheduledLoop {
  agent: MissionAgent;
  timer: NodeJS.Timeout;
  cycles: number;
  maxCycles?: number;
  inFlight: boolean;
  resolveDone: () => void;
}

/**
 * Cycles are serialized per agent: a tick that arrives while the previous one
 * is still running is skipped.
 */
@singleton()
export class AgentScheduler {
  private loops = new Map<string, ScheduledLoop>();

  constructor(
    @inject(Logger) private logger: Logger,
    @inject('CycleTimeoutMs') private cycleTimeoutMs: number,
  ) {}

  /**
   * Starts the agent's loop. Resolves once the loop stops.
   */
  start(agent: MissionAgent, options: ScheduleOptions = {}): Promise<void> {
    const mission = agent.getMission();
    if (!mission) {
      throw new Error(`Agent ${agent.agentId} has no mission loaded`);
    }
    const intervalMs = options.intervalMs ?? mission.parameters.monitoring_interval_seconds * 1000;
    if (!(intervalMs > 0 && intervalMs <= MAX_TIMER_DELAY_MS)) {
      throw new RangeError(`Interval of ${intervalMs} ms for ${agent.agentId} is outside 1-${MAX_TIMER_DELAY_MS} ms`);
    }
    this.stop(agent.agentId);
    this.logger.debug({ agentId: agent.agentId, intervalMs }, 'Starting monitoring loop');

    return new Promise<void>((resolve) => {
      const loop: ScheduledLoop = {
        agent,
        timer: setInterval(() => this.dispatch(loop), intervalMs),
        cycles: 0,
        maxCycles: options.maxCycles,
        inFlight: false,
        resolveDone: resolve,
      };
      this.loops.set(agent.agentId, loop);
      // Initial cycle immediately
      this.dispatch(loop);
    });
  }

  stop(agentId: string): void {
    const loop = this.loops.get(agentId);
    if (!loop) return;
    clearInterval(loop.timer);
    this.loops.delete(agentId);
    this.logger.debug({ agentId, cycles: loop.cycles }, 'Monitoring loop stopped');
    loop.resolveDone();
  }

  stopAll(): void {
    for (const agentId of Array.from(this.loops.keys())) {
      this.stop(agentId);
    }
  }

  isRunning(agentId: string): boolean {
    return this.loops.has(agentId);
  }

  private dispatch(loop: ScheduledLoop): void {
    if (loop.inFlight) {
      this.logger.debug({ agentId: loop.agent.agentId }, 'Previous cycle still running, skipping tick');
      return;
    }
    this.tick(loop).catch((err) => {
      this.logger.error({ err, agentId: loop.agent.agentId }, 'Monitoring tick failed');
    });
  }

  private async tick(loop: ScheduledLoop): Promise<void> {
    loop.inFlight = true;
    try {
      const outcome = await this.executeWithTimeout(loop.agent);
      if (outcome.status === 'timeout') {
        this.logger.warn(
          { agentId: loop.agent.agentId, timeoutMs: this.cycleTimeoutMs },
          'Cycle timed out, retrying next interval',
        );
      }
    } finally {
      loop.inFlight = false;
    }

    loop.cycles++;
    const current = this.loops.get(loop.agent.agentId) === loop;
    if (current && loop.maxCycles !== undefined && loop.cycles >= loop.maxCycles) {
      this.stop(loop.agent.agentId);
    }
  }

  private async executeWithTimeout(agent: MissionAgent): Promise<CycleOutcome> {
    let timeoutId: NodeJS.Timeout | undefined;
    try {
      return await Promise.race<CycleOutcome>([
        agent.runCycle(),
        new Promise<CycleOutcome>((resolve) => {
          timeoutId = setTimeout(() => resolve({ status: 'timeout' }), this.cycleTimeoutMs);
        }),
      ]);
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
    }
  }
}
