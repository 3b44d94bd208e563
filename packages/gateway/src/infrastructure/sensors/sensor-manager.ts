import { singleton } from 'tsyringe';
import { logger } from '../../logger.js';
import { SensorUnavailableError } from '../../domain/errors/app-error.js';
import type { Sensor, SensorReader } from './sensor.interface.js';

/**
 * Routes quantity reads to whichever registered sensor measures them.
 */
@singleton()
export class SensorManager implements SensorReader {
  private sensors: Map<string, Sensor> = new Map();

  register(sensor: Sensor): void {
    if (this.sensors.has(sensor.id)) {
      logger.warn(`Sensor ${sensor.id} already registered. Skipping.`);
      return;
    }
    this.sensors.set(sensor.id, sensor);
    logger.debug(`Sensor registered: ${sensor.name} (${sensor.id})`);
  }

  async read(quantity: string): Promise<number> {
    const sensor = this.findSensor(quantity);
    if (!sensor) {
      throw new SensorUnavailableError(quantity, 'no registered sensor measures it');
    }
    if (sensor.getStatus() !== 'active') {
      throw new SensorUnavailableError(quantity, `sensor ${sensor.id} is ${sensor.getStatus()}`);
    }

    let value: number;
    try {
      value = await sensor.read(quantity);
    } catch (err) {
      if (err instanceof SensorUnavailableError) throw err;
      throw new SensorUnavailableError(quantity, `sensor ${sensor.id} failed`, { cause: err });
    }
    if (!Number.isFinite(value)) {
      throw new SensorUnavailableError(quantity, `sensor ${sensor.id} returned ${value}`);
    }
    return value;
  }

  async startAll(): Promise<void> {
    logger.info('Starting all sensors...');
    const promises = Array.from(this.sensors.values()).map(async (sensor) => {
      try {
        await sensor.start();
        logger.info(`Sensor started: ${sensor.name}`);
      } catch (err) {
        logger.error({ err, sensor: sensor.id }, 'Failed to start sensor');
      }
    });
    await Promise.all(promises);
  }

  async stopAll(): Promise<void> {
    logger.info('Stopping all sensors...');
    const promises = Array.from(this.sensors.values()).map(async (sensor) => {
      try {
        await sensor.stop();
        logger.info(`Sensor stopped: ${sensor.name}`);
      } catch (err) {
        logger.error({ err, sensor: sensor.id }, 'Failed to stop sensor');
      }
    });
    await Promise.all(promises);
  }

  getStatus(): Record<string, string> {
    const status: Record<string, string> = {};
    for (const sensor of this.sensors.values()) {
      status[sensor.id] = sensor.getStatus();
    }
    return status;
  }

  private findSensor(quantity: string): Sensor | undefined {
    for (const sensor of this.sensors.values()) {
      if (sensor.quantities.includes(quantity)) return sensor;
    }
    return undefined;
  }
}
