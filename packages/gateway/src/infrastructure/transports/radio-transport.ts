/**
 * @file packages/gateway/src/infrastructure/transports/radio-transport.ts
 * @description Shared send path for the simulated radio links.
 */

import { TransportEvents, type TransportEnvelope, type TransportProtocol } from '@fieldlink/shared';
import type { EventBusService } from '../events/event-bus.js';
import type { Logger } from '../../logger.js';
import type { Transport, TransportFrame } from './transport.interface.js';

/**
 * Validates a frame against the link's constraints, then hands it to the event
 * bus, which stands in for the radio.
 */
export abstract class RadioTransport implements Transport {
  abstract readonly protocol: TransportProtocol;

  protected constructor(
    protected eventBus: EventBusService,
    protected logger: Logger,
  ) {}

  /**
   * Throws TransportError when the frame cannot go out on this link.
   * Returns link metadata recorded with the frame.
   */
  protected abstract prepare(frame: Buffer, envelope: TransportEnvelope): Record<string, unknown>;

  async send(envelope: TransportEnvelope, target: string): Promise<void> {
    const frame = Buffer.from(envelope.payload, 'base64');
    const metadata = this.prepare(frame, envelope);

    const sent: TransportFrame = {
      protocol: this.protocol,
      target,
      envelope,
      frameBytes: frame.length,
      metadata,
    };
    this.logger.debug(
      { protocol: this.protocol, target, bytes: frame.length, ...metadata },
      'Frame transmitted',
    );
    this.eventBus.publish(TransportEvents.SENT, sent, `transport:${this.protocol}`);
  }
}
