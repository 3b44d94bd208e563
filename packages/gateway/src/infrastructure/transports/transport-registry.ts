/**
 * @file packages/gateway/src/infrastructure/transports/transport-registry.ts
 * @description Selects a transport by the protocol named in a mission.
 */

import { singleton } from 'tsyringe';
import type { TransportProtocol } from '@fieldlink/shared';
import { logger } from '../../logger.js';
import { UnsupportedProtocolError } from '../../domain/errors/app-error.js';
import type { Transport } from './transport.interface.js';

@singleton()
export class TransportRegistry {
  private transports = new Map<TransportProtocol, Transport>();

  register(transport: Transport): void {
    if (this.transports.has(transport.protocol)) {
      logger.warn(`Transport ${transport.protocol} replaced`);
    }
    this.transports.set(transport.protocol, transport);
  }

  get(protocol: string): Transport {
    for (const [name, transport] of this.transports) {
      if (name === protocol) return transport;
    }
    throw new UnsupportedProtocolError(protocol);
  }

  list(): TransportProtocol[] {
    return Array.from(this.transports.keys());
  }
}
