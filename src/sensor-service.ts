import { Database } from './database';
import { CreateSensorInput, Sensor, SensorConfig, UpdateSensorInput } from './types';
import { parseSensorConfig } from './config';
import { ConfigurationError, NotFoundError } from './errors';

function toConfig(sensor: Sensor): SensorConfig {
  return {
    name: sensor.name,
    earliestStart: sensor.earliestStart,
    latestEnd: sensor.latestEnd,
    durationSeconds: sensor.durationSeconds,
    durationSignal: sensor.durationSignal,
    priceMode: sensor.priceMode,
    intervalMode: sensor.intervalMode,
    timezone: sensor.timezone,
  };
}

export class SensorService {
  constructor(
    private db: Database,
    private defaultTimezone: string = 'UTC'
  ) {}

  async create(input: CreateSensorInput): Promise<Sensor> {
    const config = parseSensorConfig({ ...input, timezone: input.timezone ?? this.defaultTimezone });

    // Check for duplicate name
    const existing = await this.db.getSensorByName(config.name);
    if (existing) {
      throw new ConfigurationError(`Sensor "${config.name}" already exists`);
    }

    const id = await this.db.insertSensor(config);
    const sensor = await this.db.getSensor(id);
    if (!sensor) {
      throw new Error('Failed to create sensor');
    }
    return sensor;
  }

  async get(id: number): Promise<Sensor | null> {
    return this.db.getSensor(id);
  }

  async getByName(name: string): Promise<Sensor | null> {
    return this.db.getSensorByName(name);
  }

  async list(): Promise<Sensor[]> {
    return this.db.getSensors();
  }

  async update(id: number, updates: UpdateSensorInput): Promise<Sensor> {
    const sensor = await this.db.getSensor(id);
    if (!sensor) {
      throw new NotFoundError(`Sensor ${id} not found`);
    }

    const config = parseSensorConfig({ ...toConfig(sensor), ...updates });

    // Check for name conflict if renaming
    if (config.name !== sensor.name) {
      const existing = await this.db.getSensorByName(config.name);
      if (existing) {
        throw new ConfigurationError(`Sensor "${config.name}" already exists`);
      }
    }

    await this.db.updateSensor(id, config);
    const updated = await this.db.getSensor(id);
    if (!updated) {
      throw new NotFoundError(`Sensor ${id} not found after update`);
    }
    return updated;
  }

  async delete(id: number): Promise<void> {
    const sensor = await this.db.getSensor(id);
    if (!sensor) {
      throw new NotFoundError(`Sensor ${id} not found`);
    }

    await this.db.deleteSensor(id);
  }
}
