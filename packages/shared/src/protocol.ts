/**
 * @file packages/shared/src/protocol.ts
 * @description Transport envelope wire format.
 */

import { z } from 'zod';
import { ENVELOPE_PROTOCOLS } from './constants.js';

// ─── Envelope ─────────────────────────────────────────────────

export const EnvelopeProtocolSchema = z.enum([
  ENVELOPE_PROTOCOLS.relay,
  ENVELOPE_PROTOCOLS.secured,
]);
export type EnvelopeProtocol = z.infer<typeof EnvelopeProtocolSchema>;

/**
 * Unit handed to a transport. `payload` is always base64: the raw
 * relay-tagged bytes for plain envelopes, the cipher token for secured ones.
 */
export const TransportEnvelopeSchema = z.object({
  protocol: EnvelopeProtocolSchema,
  payload: z.string(),
  secured: z.boolean(),
});
export type TransportEnvelope = z.infer<typeof TransportEnvelopeSchema>;

/**
 * Serializes an envelope for the wire.
 */
export function serializeEnvelope(envelope: TransportEnvelope): string {
  return JSON.stringify(envelope);
}

/**
 * Parses and validates a raw envelope string.
 */
export function parseEnvelope(raw: string): TransportEnvelope {
  const data: unknown = JSON.parse(raw);
  return TransportEnvelopeSchema.parse(data);
}
