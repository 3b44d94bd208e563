/**
 * @file packages/gateway/src/infrastructure/comms/communications-gateway.ts
 * @description Encapsulates payloads for the relay hop and secures remote traffic.
 */

import { inject, singleton } from 'tsyringe';
import {
  ENVELOPE_PROTOCOLS,
  RELAY_TAG,
  ReportPacketSchema,
  type ReportPacket,
  type TransportEnvelope,
} from '@fieldlink/shared';
import { SecurityContext } from '../../security/security-context.js';
import {
  CryptoError,
  InvalidEnvelopeError,
  UnsupportedDestinationError,
} from '../../domain/errors/app-error.js';

const RELAY_TAG_BYTES = Buffer.from(RELAY_TAG, 'ascii');

/**
 * Forward path:  payload → relay tag → (remote only) obfuscate → encrypt.
 * Receive path mirrors it.
 */
@singleton()
export class CommunicationsGateway {
  constructor(@inject(SecurityContext) private security: SecurityContext) {}

  /**
   * Builds the envelope for `destination`. Only `remote` and `local` exist.
   */
  forward(payload: Uint8Array, destination: string): TransportEnvelope {
    if (destination !== 'remote' && destination !== 'local') {
      throw new UnsupportedDestinationError(destination);
    }

    const tagged = Buffer.concat([RELAY_TAG_BYTES, payload]);

    if (destination === 'remote') {
      const token = this.security.encrypt(this.security.obfuscate(tagged));
      return { protocol: ENVELOPE_PROTOCOLS.secured, payload: token, secured: true };
    }

    return { protocol: ENVELOPE_PROTOCOLS.relay, payload: tagged.toString('base64'), secured: false };
  }

  /**
   * Recovers the original payload from an envelope produced by `forward`.
   */
  receive(envelope: TransportEnvelope): Buffer {
    if (envelope.protocol === ENVELOPE_PROTOCOLS.secured) {
      const tagged = this.security.deobfuscate(this.security.decrypt(envelope.payload));
      if (!hasRelayTag(tagged)) {
        throw new CryptoError('Decrypted payload is missing the relay tag');
      }
      return tagged.subarray(RELAY_TAG_BYTES.length);
    }

    if (envelope.protocol === ENVELOPE_PROTOCOLS.relay) {
      const tagged = Buffer.from(envelope.payload, 'base64');
      if (!hasRelayTag(tagged)) {
        throw new InvalidEnvelopeError('Relay payload is missing the relay tag');
      }
      return tagged.subarray(RELAY_TAG_BYTES.length);
    }

    throw new InvalidEnvelopeError(`Unknown envelope protocol "${String(envelope.protocol)}"`);
  }

  encodeReport(packet: ReportPacket): Buffer {
    return Buffer.from(JSON.stringify(packet), 'utf-8');
  }

  decodeReport(bytes: Uint8Array): ReportPacket {
    let data: unknown;
    try {
      data = JSON.parse(Buffer.from(bytes).toString('utf-8'));
    } catch (err) {
      throw new InvalidEnvelopeError('Report payload is not JSON', { cause: err });
    }
    const result = ReportPacketSchema.safeParse(data);
    if (!result.success) {
      throw new InvalidEnvelopeError(`Report payload is malformed: ${result.error.message}`);
    }
    return result.data;
  }
}

function hasRelayTag(bytes: Buffer): boolean {
  return bytes.length >= RELAY_TAG_BYTES.length && bytes.subarray(0, RELAY_TAG_BYTES.length).equals(RELAY_TAG_BYTES);
}
