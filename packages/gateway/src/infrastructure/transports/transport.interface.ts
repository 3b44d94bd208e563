import type { TransportEnvelope, TransportProtocol } from '@fieldlink/shared';

/**
 * Delivery capability for one radio link. Sends are fire-and-forget:
 * resolving means the frame left the device, not that it was acknowledged.
 */
export interface Transport {
  readonly protocol: TransportProtocol;
  send(envelope: TransportEnvelope, target: string): Promise<void>;
}

export interface TransportFrame {
  protocol: TransportProtocol;
  target: string;
  envelope: TransportEnvelope;
  frameBytes: number;
  metadata: Record<string, unknown>;
}
