export type SensorStatus = 'active' | 'inactive' | 'error';

/**
 * Capability consumed by mission agents: a numeric reading for a named quantity.
 */
export interface SensorReader {
  read(quantity: string): Promise<number>;
}

/**
 * Standard interface for all sensors, simulated or hardware-backed.
 */
export interface Sensor extends SensorReader {
  id: string;
  name: string;
  /** Quantities this sensor can measure, e.g. "voltage_rms". */
  readonly quantities: readonly string[];
  getStatus(): SensorStatus;
  start(): Promise<void>;
  stop(): Promise<void>;
}
