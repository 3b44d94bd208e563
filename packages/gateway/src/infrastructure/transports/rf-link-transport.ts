/**
 * @file packages/gateway/src/infrastructure/transports/rf-link-transport.ts
 * @description Custom GibberLink UHF/VHF link. Carries secured envelopes only.
 */

import { inject, singleton } from 'tsyringe';
import type { TransportEnvelope } from '@fieldlink/shared';
import { EventBusService } from '../events/event-bus.js';
import { Logger } from '../../logger.js';
import { TransportError } from '../../domain/errors/app-error.js';
import { RadioTransport } from './radio-transport.js';

@singleton()
export class RfLinkTransport extends RadioTransport {
  readonly protocol = 'GibberLink-RF' as const;

  constructor(@inject(EventBusService) eventBus: EventBusService, @inject(Logger) logger: Logger) {
    super(eventBus, logger);
  }

  protected prepare(_frame: Buffer, envelope: TransportEnvelope): Record<string, unknown> {
    if (!envelope.secured) {
      throw new TransportError(this.protocol, 'refusing to transmit an unsecured envelope');
    }
    return {};
  }
}
