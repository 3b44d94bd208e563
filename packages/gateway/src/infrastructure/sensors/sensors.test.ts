/**
 * @file packages/gateway/src/infrastructure/sensors/sensors.test.ts
 * @description Simulated sensor and sensor routing tests.
 */

import 'reflect-metadata';
import { describe, it, expect, beforeEach } from 'vitest';
import { SensorUnavailableError } from '../../domain/errors/app-error.js';
import { SensorManager } from './sensor-manager.js';
import { SimulatedSensor, ELECTRICAL_QUANTITIES } from './simulated-sensor.js';
import type { Sensor, SensorStatus } from './sensor.interface.js';

const midpoint = () => 0.5;

class FlakySensor implements Sensor {
  id = 'flaky';
  name = 'Flaky';
  quantities = ['pressure'];
  status: SensorStatus = 'active';
  next: number | Error = 1;

  getStatus(): SensorStatus {
    return this.status;
  }
  async start(): Promise<void> {}
  async stop(): Promise<void> {}
  async read(): Promise<number> {
    if (this.next instanceof Error) throw this.next;
    return this.next;
  }
}

describe('SimulatedSensor', () => {
  it('should produce a reading for every electrical quantity', () => {
    const reading = new SimulatedSensor({ random: midpoint }).generateReading();
    expect(Object.keys(reading).sort()).toEqual([...ELECTRICAL_QUANTITIES].sort());
  });

  it('should be deterministic for a fixed random source', () => {
    // u1 = u2 = 0.5 gives z = sqrt(2 ln 2) * cos(pi) ≈ -1.1774
    const reading = new SimulatedSensor({ random: midpoint }).generateReading();
    expect(reading.voltage_rms).toBeCloseTo(232.59, 2);
    expect(reading.frequency).toBeCloseTo(49.9, 2);
  });

  it('should lower the voltage in the voltage_drop scenario', async () => {
    const normal = new SimulatedSensor({ random: midpoint });
    const drop = new SimulatedSensor({ random: midpoint, scenario: 'voltage_drop' });
    // 232.587 * 0.89
    expect(await drop.read('voltage_rms')).toBeCloseTo(207.0, 1);
    expect(await drop.read('voltage_rms')).toBeLessThan(await normal.read('voltage_rms'));
  });

  it('should raise the current in the overload scenario', () => {
    const sensor = new SimulatedSensor({ random: midpoint });
    const baseline = sensor.generateReading().current_rms;
    sensor.setScenario('overload');
    expect(sensor.getScenario()).toBe('overload');
    expect(sensor.generateReading().current_rms).toBeGreaterThan(baseline * 1.5);
  });

  it('should reject quantities it does not measure', async () => {
    await expect(new SimulatedSensor().read('water_pressure')).rejects.toThrow(SensorUnavailableError);
  });
});

describe('SensorManager', () => {
  let manager: SensorManager;
  let flaky: FlakySensor;

  beforeEach(() => {
    manager = new SensorManager();
    flaky = new FlakySensor();
    manager.register(flaky);
  });

  it('should route reads to the sensor measuring the quantity', async () => {
    const simulated = new SimulatedSensor({ random: midpoint });
    await simulated.start();
    manager.register(simulated);

    flaky.next = 3.5;
    expect(await manager.read('pressure')).toBe(3.5);
    expect(await manager.read('voltage_rms')).toBeCloseTo(232.59, 2);
    expect(manager.getStatus()).toEqual({ flaky: 'active', 'simulated-electrical': 'active' });
  });

  it('should report unknown quantities as unavailable', async () => {
    await expect(manager.read('humidity')).rejects.toThrow(
      'Sensor for "humidity" unavailable: no registered sensor measures it',
    );
  });

  it('should refuse to read from an inactive sensor', async () => {
    flaky.status = 'inactive';
    await expect(manager.read('pressure')).rejects.toThrow('sensor flaky is inactive');
  });

  it('should wrap sensor failures and non-finite readings', async () => {
    flaky.next = new Error('i2c timeout');
    const failure = manager.read('pressure');
    await expect(failure).rejects.toThrow(SensorUnavailableError);
    await expect(failure).rejects.toMatchObject({ quantity: 'pressure', code: 'SENSOR_UNAVAILABLE' });

    flaky.next = Number.NaN;
    await expect(manager.read('pressure')).rejects.toThrow('sensor flaky returned NaN');
  });

  it('should start and stop every registered sensor', async () => {
    const simulated = new SimulatedSensor();
    manager.register(simulated);
    await manager.startAll();
    expect(simulated.getStatus()).toBe('active');
    await manager.stopAll();
    expect(simulated.getStatus()).toBe('inactive');
  });
});
