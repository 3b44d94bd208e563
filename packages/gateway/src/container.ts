/**
 * @file packages/gateway/src/container.ts
 * @description Dependency-injection wiring for the FieldLink runtime.
 */

import 'reflect-metadata';
import { container, instanceCachingFactory, type DependencyContainer } from 'tsyringe';
import { Logger } from './logger.js';
import { ConfigService } from './infrastructure/config/config-service.js';
import { EventBusService } from './infrastructure/events/event-bus.js';
import { SecurityContext, createSecurityContext } from './security/security-context.js';
import { CommunicationsGateway } from './infrastructure/comms/communications-gateway.js';
import { TransportRegistry } from './infrastructure/transports/transport-registry.js';
import { BleTransport } from './infrastructure/transports/ble-transport.js';
import { LoRaWanTransport } from './infrastructure/transports/lorawan-transport.js';
import { RfLinkTransport } from './infrastructure/transports/rf-link-transport.js';
import { SensorManager } from './infrastructure/sensors/sensor-manager.js';
import { SimulatedSensor } from './infrastructure/sensors/simulated-sensor.js';
import { AgentFactory } from './domain/agents/agent-factory.js';
import { MissionOrchestrator } from './application/services/mission-orchestrator.js';
import { AgentScheduler } from './application/services/agent-scheduler.js';
import type { Clock } from './domain/agents/mission-agent.js';

/**
 * Registers every service on `target` (the global container by default).
 * Pass a child container to get an isolated runtime, e.g. in tests.
 */
export function setupContainer(
  options: { projectRoot?: string } = {},
  target: DependencyContainer = container,
): DependencyContainer {
  const logger = new Logger();
  target.register(Logger, { useValue: logger });

  const configService = new ConfigService(logger);
  if (options.projectRoot) configService.setProjectRoot(options.projectRoot);
  target.register(ConfigService, { useValue: configService });
  target.registerSingleton(EventBusService);

  const clock: Clock = () => Date.now();
  target.register('Clock', { useValue: clock });
  target.register('CycleTimeoutMs', {
    useFactory: (c) => c.resolve(ConfigService).get('cycleTimeoutMs'),
  });

  // Key material is created once, on first use, and shared by every consumer.
  target.register(SecurityContext, {
    useFactory: instanceCachingFactory((c) => {
      const config = c.resolve(ConfigService).getFullConfig();
      const security = createSecurityContext({
        aesKey: config.aesKey,
        obfuscationSalt: config.obfuscationSalt,
      });
      c.resolve(Logger).info(
        { fingerprint: security.keyFingerprint, generated: !config.aesKey },
        'Security context initialized',
      );
      return security;
    }),
  });
  target.registerSingleton(CommunicationsGateway);

  // Transports
  target.registerSingleton(BleTransport);
  target.registerSingleton(LoRaWanTransport);
  target.registerSingleton(RfLinkTransport);
  target.register(TransportRegistry, {
    useFactory: instanceCachingFactory((c) => {
      const registry = new TransportRegistry();
      registry.register(c.resolve(BleTransport));
      registry.register(c.resolve(LoRaWanTransport));
      registry.register(c.resolve(RfLinkTransport));
      return registry;
    }),
  });

  // Sensors
  target.register(SensorManager, {
    useFactory: instanceCachingFactory((c) => {
      const manager = new SensorManager();
      manager.register(
        new SimulatedSensor({ scenario: c.resolve(ConfigService).get('simulationScenario') }),
      );
      return manager;
    }),
  });
  target.register('SensorReader', { useToken: SensorManager });

  // Agents
  target.registerSingleton(AgentFactory);
  target.registerSingleton(MissionOrchestrator);
  target.registerSingleton(AgentScheduler);

  return target;
}

export { container };
