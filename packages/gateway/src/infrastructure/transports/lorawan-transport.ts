/**
 * @file packages/gateway/src/infrastructure/transports/lorawan-transport.ts
 * @description Long-range LoRaWAN uplink with unconfirmed frames.
 */

import { inject, singleton } from 'tsyringe';
import { TRANSPORT_LIMITS } from '@fieldlink/shared';
import { EventBusService } from '../events/event-bus.js';
import { Logger } from '../../logger.js';
import { TransportError } from '../../domain/errors/app-error.js';
import { RadioTransport } from './radio-transport.js';

@singleton()
export class LoRaWanTransport extends RadioTransport {
  readonly protocol = 'LoRaWAN' as const;

  private fcntUp = 0;
  private port: number = TRANSPORT_LIMITS.loraDefaultPort;

  constructor(@inject(EventBusService) eventBus: EventBusService, @inject(Logger) logger: Logger) {
    super(eventBus, logger);
  }

  /**
   * Application port for subsequent uplinks (1-223).
   */
  setPort(port: number): void {
    if (
      !Number.isInteger(port) ||
      port < TRANSPORT_LIMITS.loraMinPort ||
      port > TRANSPORT_LIMITS.loraMaxPort
    ) {
      throw new TransportError(this.protocol, `application port ${port} is outside 1-223`);
    }
    this.port = port;
  }

  get frameCounter(): number {
    return this.fcntUp;
  }

  protected prepare(frame: Buffer): Record<string, unknown> {
    if (frame.length > TRANSPORT_LIMITS.loraMaxPayloadBytes) {
      throw new TransportError(
        this.protocol,
        `payload of ${frame.length} bytes exceeds the ${TRANSPORT_LIMITS.loraMaxPayloadBytes}-byte limit`,
      );
    }
    // 16-bit uplink counter wraps.
    this.fcntUp = (this.fcntUp + 1) & 0xffff;
    return { fcnt: this.fcntUp, port: this.port };
  }
}
