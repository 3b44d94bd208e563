/**
 * @file packages/gateway/src/index.ts
 * @description Public surface of the FieldLink runtime.
 */

export { setupContainer, container } from './container.js';
export { startMissions, type FieldLinkRuntime } from './runtime.js';
export { loadConfig, resetConfigCache, type FieldLinkConfig } from './config.js';
export { Logger, logger } from './logger.js';
export * from './domain/errors/app-error.js';
export {
  SecurityContext,
  createSecurityContext,
  decodeKey,
  generateKey,
} from './security/security-context.js';
export { xorWithSalt } from './security/obfuscation.js';
export { CommunicationsGateway } from './infrastructure/comms/communications-gateway.js';
export { EventBusService } from './infrastructure/events/event-bus.js';
export type { Transport, TransportFrame } from './infrastructure/transports/transport.interface.js';
export { TransportRegistry } from './infrastructure/transports/transport-registry.js';
export { BleTransport } from './infrastructure/transports/ble-transport.js';
export { LoRaWanTransport } from './infrastructure/transports/lorawan-transport.js';
export { RfLinkTransport } from './infrastructure/transports/rf-link-transport.js';
export type { Sensor, SensorReader, SensorStatus } from './infrastructure/sensors/sensor.interface.js';
export { SensorManager } from './infrastructure/sensors/sensor-manager.js';
export { SimulatedSensor, ELECTRICAL_QUANTITIES } from './infrastructure/sensors/simulated-sensor.js';
export { MissionAgent, type CycleResult, type Clock } from './domain/agents/mission-agent.js';
export { AgentFactory } from './domain/agents/agent-factory.js';
export { CooldownLedger } from './domain/agents/cooldown-ledger.js';
export { compileMission, validateMission } from './domain/missions/mission-validator.js';
export { loadMissionFile, parseMissionDocument } from './domain/missions/mission-loader.js';
export { MissionOrchestrator, type AgentAssignment } from './application/services/mission-orchestrator.js';
export { AgentScheduler, type ScheduleOptions } from './application/services/agent-scheduler.js';
