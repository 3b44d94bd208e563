import { inject, singleton } from 'tsyringe';
import { CommunicationsGateway } from '../../infrastructure/comms/communications-gateway.js';
import { TransportRegistry } from '../../infrastructure/transports/transport-registry.js';
import { EventBusService } from '../../infrastructure/events/event-bus.js';
import type { SensorReader } from '../../infrastructure/sensors/sensor.interface.js';
import { Logger } from '../../logger.js';
import { MissionAgent, type Clock } from './mission-agent.js';

/**
 * Builds agents wired to the process-wide gateway, transports and sensors.
 */
@singleton()
export class AgentFactory {
  constructor(
    @inject('SensorReader') private sensor: SensorReader,
    @inject(CommunicationsGateway) private gateway: CommunicationsGateway,
    @inject(TransportRegistry) private transports: TransportRegistry,
    @inject(EventBusService) private eventBus: EventBusService,
    @inject(Logger) private logger: Logger,
    @inject('Clock') private clock: Clock,
  ) {}

  create(agentId: string): MissionAgent {
    return new MissionAgent(agentId, {
      sensor: this.sensor,
      gateway: this.gateway,
      transports: this.transports,
      eventBus: this.eventBus,
      logger: this.logger,
      clock: this.clock,
    });
  }
}
