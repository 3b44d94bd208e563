/**
 * @file packages/gateway/src/infrastructure/transports/ble-transport.ts
 * @description Short-range Bluetooth Low Energy link.
 */

import { inject, singleton } from 'tsyringe';
import { TRANSPORT_LIMITS } from '@fieldlink/shared';
import { EventBusService } from '../events/event-bus.js';
import { Logger } from '../../logger.js';
import { TransportError } from '../../domain/errors/app-error.js';
import { RadioTransport } from './radio-transport.js';

@singleton()
export class BleTransport extends RadioTransport {
  readonly protocol = 'BLE' as const;

  constructor(@inject(EventBusService) eventBus: EventBusService, @inject(Logger) logger: Logger) {
    super(eventBus, logger);
  }

  protected prepare(frame: Buffer): Record<string, unknown> {
    if (frame.length > TRANSPORT_LIMITS.bleMaxFrameBytes) {
      throw new TransportError(
        this.protocol,
        `frame of ${frame.length} bytes exceeds the ${TRANSPORT_LIMITS.bleMaxFrameBytes}-byte ATT payload`,
      );
    }
    return {};
  }
}
