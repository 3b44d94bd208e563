#!/usr/bin/env node

/**
 * @file packages/gateway/src/cli/index.ts
 * @description Command-line entrypoints: run missions, validate files, manage keys.
 */

import 'reflect-metadata';
import { resolve } from 'node:path';
import { readFileSync } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import {
  FIELDLINK_VERSION,
  ReportEvents,
  SimulationScenarioSchema,
  TransportEvents,
  parseEnvelope,
  type FieldLinkEvent,
  type ReportPacket,
} from '@fieldlink/shared';
import { setupContainer } from '../container.js';
import { ConfigService } from '../infrastructure/config/config-service.js';
import { EventBusService } from '../infrastructure/events/event-bus.js';
import { CommunicationsGateway } from '../infrastructure/comms/communications-gateway.js';
import type { TransportFrame } from '../infrastructure/transports/transport.interface.js';
import { Logger } from '../logger.js';
import { loadMissionFile } from '../domain/missions/mission-loader.js';
import { AppError, ConfigError } from '../domain/errors/app-error.js';
import { generateKey } from '../security/security-context.js';
import { startMissions } from '../runtime.js';

const parsePositiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
};

const parseScenario = (value: string): string => {
  const result = SimulationScenarioSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`expected one of ${SimulationScenarioSchema.options.join(', ')}`);
  }
  return result.data;
};

const fail = (err: unknown): never => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red('\n  ✗ ') + message);
  if (process.env.DEBUG && !(err instanceof AppError)) console.error(err);
  process.exit(1);
};

const program = new Command();

program
  .name('fieldlink')
  .description('FieldLink: autonomous sensor agents with a secured radio uplink')
  .version(FIELDLINK_VERSION)
  .option('-r, --root <dir>', 'project root holding fieldlink.config.yaml and .env', process.cwd());

// ─── fieldlink run ────────────────────────────────────────────
program
  .command('run')
  .description('Assign missions from a JSON/YAML file and run their agents')
  .argument('[missions]', 'mission file (defaults to missionsPath from config)')
  .option('-c, --cycles <n>', 'stop each agent after n cycles', parsePositiveInt)
  .option('-i, --interval <ms>', 'override every monitoring interval (ms)', parsePositiveInt)
  .option('-s, --scenario <name>', 'simulated sensor scenario', parseScenario)
  .action(
    async (
      missionsArg: string | undefined,
      opts: { cycles?: number; interval?: number; scenario?: string },
    ) => {
      const root = resolve(program.opts<{ root: string }>().root);
      if (opts.scenario) process.env.FIELDLINK_SCENARIO = opts.scenario;

      const c = setupContainer({ projectRoot: root });
      const config = c.resolve(ConfigService).getFullConfig();
      c.resolve(Logger).setLevel(config.logLevel);

      const missionsPath = missionsArg ? resolve(root, missionsArg) : config.missionsPath;
      if (!missionsPath) {
        throw new ConfigError('No mission file given and missionsPath is not configured');
      }
      const profiles = await loadMissionFile(missionsPath);

      const bus = c.resolve(EventBusService);
      bus.subscribe<ReportPacket>(ReportEvents.EMITTED, (event: FieldLinkEvent<ReportPacket>) => {
        const p = event.payload;
        const color = p.report_level === 'CRITICAL' ? chalk.red : chalk.yellow;
        console.log(
          color(`  ▲ ${p.report_level}`) +
            chalk.white(` ${p.agent_id} ${p.trigger_fired}`) +
            chalk.dim(` value=${p.measured_value}`),
        );
      });
      bus.subscribe<TransportFrame>(TransportEvents.SENT, (event: FieldLinkEvent<TransportFrame>) => {
        const f = event.payload;
        console.log(chalk.dim(`    → [${f.protocol}] ${f.target} ${f.frameBytes}B ${f.envelope.protocol}`));
      });

      console.log(chalk.dim(`\n  Running ${profiles.length} mission(s) from ${missionsPath}\n`));
      const runtime = await startMissions(c, profiles, {
        maxCycles: opts.cycles,
        intervalMs: opts.interval,
      });

      process.once('SIGINT', () => {
        console.log(chalk.dim('\n  Stopping agents...'));
        runtime.stop().catch(fail);
      });

      await runtime.done;
      await runtime.stop();
      console.log(chalk.green('\n  ✓ ') + 'All agents stopped');
    },
  );

// ─── fieldlink validate ───────────────────────────────────────
program
  .command('validate')
  .description('Validate a mission file without running it')
  .argument('<missions>', 'mission file (JSON or YAML)')
  .action(async (missionsArg: string) => {
    const root = resolve(program.opts<{ root: string }>().root);
    const profiles = await loadMissionFile(resolve(root, missionsArg));
    for (const profile of profiles) {
      console.log(
        chalk.green('  ✓ ') +
          chalk.white(profile.mission_id) +
          chalk.dim(
            ` → ${profile.agent_id_target} (${profile.triggers.length} triggers, priority ${profile.priority})`,
          ),
      );
    }
  });

// ─── fieldlink keygen ─────────────────────────────────────────
program
  .command('keygen')
  .description('Print a fresh base64 AES-256 key for FIELDLINK_AES_KEY')
  .action(() => {
    console.log(generateKey());
  });

// ─── fieldlink receive ────────────────────────────────────────
program
  .command('receive')
  .description('Open an envelope (JSON string or file) with the configured key')
  .argument('<envelope>', 'envelope JSON or path to a file containing it')
  .action((envelopeArg: string) => {
    const root = resolve(program.opts<{ root: string }>().root);
    const raw = envelopeArg.trim().startsWith('{')
      ? envelopeArg
      : readFileSync(resolve(root, envelopeArg), 'utf-8');

    const envelope = parseEnvelope(raw);

    const c = setupContainer({ projectRoot: root });
    const config = c.resolve(ConfigService).getFullConfig();
    if (envelope.secured && !config.aesKey) {
      throw new ConfigError('FIELDLINK_AES_KEY must be set to open secured envelopes');
    }
    const payload = c.resolve(CommunicationsGateway).receive(envelope);
    console.log(payload.toString('utf-8'));
  });

program.parseAsync(process.argv).catch(fail);
