/**
 * @file packages/shared/src/constants.ts
 * @description Protocol constants shared by agents, the gateway and the orchestrator.
 */

// ─── FieldLink Constants ──────────────────────────────────────

export const FIELDLINK_VERSION = '0.1.0';

/** Prefix marking a payload as re-encapsulated for the long-range relay hop. */
export const RELAY_TAG = 'LORA:';

export const ENVELOPE_PROTOCOLS = {
  relay: 'LoRaWAN',
  secured: 'GibberLink+AES256',
} as const;

export const TRANSPORT_PROTOCOLS = ['BLE', 'LoRaWAN', 'GibberLink-RF'] as const;

export const DESTINATIONS = ['remote', 'local'] as const;

export const CIPHER_ALGORITHM = 'aes-256-cfb';
export const KEY_LENGTH = 32;
export const NONCE_LENGTH = 16;

export const DEFAULT_OBFUSCATION_SALT = 'fieldlink2025';
export const DEFAULT_CYCLE_TIMEOUT_MS = 10_000;

/** Longest delay a Node timer honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;
export const MAX_MONITORING_INTERVAL_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

export const TRANSPORT_LIMITS = {
  /** ATT payload with BLE 4.2 data length extension. */
  bleMaxFrameBytes: 244,
  loraMaxPayloadBytes: 242,
  loraMinPort: 1,
  loraMaxPort: 223,
  loraDefaultPort: 2,
} as const;
