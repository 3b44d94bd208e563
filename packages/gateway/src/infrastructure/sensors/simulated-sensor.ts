/**
 * @file packages/gateway/src/infrastructure/sensors/simulated-sensor.ts
 * @description Electrical-grid sensor simulator with fault scenarios.
 */

import type { SimulationScenario } from '@fieldlink/shared';
import { SensorUnavailableError } from '../../domain/errors/app-error.js';
import type { Sensor, SensorStatus } from './sensor.interface.js';

export const ELECTRICAL_QUANTITIES = [
  'voltage_rms',
  'current_rms',
  'active_power',
  'power_factor',
  'frequency',
  'thd_voltage',
  'thd_current',
] as const;

export type ElectricalQuantity = (typeof ELECTRICAL_QUANTITIES)[number];
export type ElectricalReading = Record<ElectricalQuantity, number>;

/** Uniform source in [0, 1). */
export type RandomSource = () => number;

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/**
 * Produces a full electrical snapshot per read. Readings follow a normal
 * distribution around a healthy 230 V / 50 Hz supply, shifted by the
 * active scenario.
 */
export class SimulatedSensor implements Sensor {
  public readonly id: string;
  public readonly name = 'Simulated Electrical Sensor';
  public readonly quantities: readonly string[] = ELECTRICAL_QUANTITIES;

  private status: SensorStatus = 'inactive';
  private scenario: SimulationScenario;
  private random: RandomSource;

  constructor(options: { id?: string; scenario?: SimulationScenario; random?: RandomSource } = {}) {
    this.id = options.id ?? 'simulated-electrical';
    this.scenario = options.scenario ?? 'normal';
    this.random = options.random ?? Math.random;
  }

  getStatus(): SensorStatus {
    return this.status;
  }

  async start(): Promise<void> {
    this.status = 'active';
  }

  async stop(): Promise<void> {
    this.status = 'inactive';
  }

  setScenario(scenario: SimulationScenario): void {
    this.scenario = scenario;
  }

  getScenario(): SimulationScenario {
    return this.scenario;
  }

  async read(quantity: string): Promise<number> {
    if (!isElectricalQuantity(quantity)) {
      throw new SensorUnavailableError(quantity, `not measured by ${this.id}`);
    }
    return this.generateReading()[quantity];
  }

  generateReading(): ElectricalReading {
    let voltage = this.gauss(234, 1.2);
    let current = this.gauss(9.5, 0.5);
    let activePower = voltage * current * this.uniform(0.97, 1.01);
    const powerFactor = this.gauss(0.99, 0.01);
    const frequency = this.gauss(49.95, 0.04);
    let thdVoltage = this.gauss(3.2, 0.5);
    let thdCurrent = this.gauss(4.7, 0.6);

    switch (this.scenario) {
      case 'overload':
        current *= this.uniform(1.5, 2.0);
        activePower = voltage * current * this.uniform(0.97, 1.01);
        break;
      case 'voltage_drop':
        voltage *= this.uniform(0.85, 0.93);
        activePower = voltage * current * this.uniform(0.97, 1.01);
        break;
      case 'bad_power_quality':
        thdVoltage *= this.uniform(2.0, 3.0);
        thdCurrent *= this.uniform(2.0, 3.0);
        break;
      case 'normal':
        break;
    }

    return {
      voltage_rms: round(voltage, 2),
      current_rms: round(current, 2),
      active_power: round(activePower, 1),
      power_factor: round(powerFactor, 3),
      frequency: round(frequency, 2),
      thd_voltage: round(thdVoltage, 1),
      thd_current: round(thdCurrent, 1),
    };
  }

  private uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }

  // Box-Muller; 1 - u keeps the log argument away from zero.
  private gauss(mean: number, stdDev: number): number {
    const u1 = 1 - this.random();
    const u2 = this.random();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + stdDev * z;
  }
}

function isElectricalQuantity(value: string): value is ElectricalQuantity {
  return (ELECTRICAL_QUANTITIES as readonly string[]).includes(value);
}
