/**
 * Home Assistant MQTT discovery
 *
 * Builds the retained config messages that make each inverter sensor show
 * up as an entity, and the state document those entities read from.
 */

import { DiscoveryError } from '../errors';
import type { InverterReading } from '../inverter';
import builtinModels from './models.json';
import { SENSORS, type SensorDefinition } from './sensors';

export type DeviceClass = 'energy' | 'power' | 'temperature';
export type StateClass = 'total_increasing' | 'measurement';

export interface DiscoveryOptions {
  discoveryPrefix: string;
  statePrefix: string;
  /** Merged over the built-in model table */
  models?: Record<string, string>;
}

export interface MqttMessage {
  topic: string;
  payload: string;
}

export interface DiscoveryPayload {
  device: {
    identifiers: string[];
    manufacturer: string;
    model: string;
    name: string;
    sw_version: string;
  };
  device_class: DeviceClass;
  name: string;
  state_class: StateClass;
  state_topic: string;
  unique_id: string;
  unit_of_measurement: string;
  value_template: string;
  expire_after: string;
  availability_mode: 'latest' | 'any';
}

const BUILTIN_MODELS: Record<string, string> = builtinModels;

const CLASSES_BY_UNIT: Record<string, { deviceClass: DeviceClass; stateClass: StateClass }> = {
  kWh: { deviceClass: 'energy', stateClass: 'total_increasing' },
  W: { deviceClass: 'power', stateClass: 'measurement' },
  '°C': { deviceClass: 'temperature', stateClass: 'measurement' },
};

export function stateTopic(serialNumber: string, statePrefix: string): string {
  return `${statePrefix}/${serialNumber}`;
}

export function deviceTopic(serialNumber: string, statePrefix: string): string {
  return `${stateTopic(serialNumber, statePrefix)}/logger`;
}

export function resolveModel(modelNumber: string, models: Record<string, string> = {}): string {
  return models[modelNumber] ?? BUILTIN_MODELS[modelNumber] ?? modelNumber;
}

export function classesForUnit(unit: string): { deviceClass: DeviceClass; stateClass: StateClass } {
  const classes = CLASSES_BY_UNIT[unit];
  if (!classes) {
    throw new DiscoveryError(`No Home Assistant device class for unit '${unit}'`);
  }
  return classes;
}

export function buildDiscoveryMessage(
  reading: InverterReading,
  sensor: SensorDefinition,
  options: DiscoveryOptions
): MqttMessage {
  const serial = reading.serialNumber;
  const model = resolveModel(reading.modelNumber, options.models);
  const { deviceClass, stateClass } = classesForUnit(sensor.unit);
  // Lifetime counters stay valid while the inverter sleeps
  const cumulative = stateClass === 'total_increasing';

  const payload: DiscoveryPayload = {
    device: {
      identifiers: [`solismqtt_${model}_${serial}`],
      manufacturer: 'Solis',
      model,
      name: 'Solar Inverter',
      sw_version: reading.firmwareVersion,
    },
    device_class: deviceClass,
    name: sensor.name,
    state_class: stateClass,
    state_topic: stateTopic(serial, options.statePrefix),
    unique_id: `${serial}_${sensor.key}_solismqtt`,
    unit_of_measurement: sensor.unit,
    value_template: `{{ value_json.${sensor.key} }}`,
    expire_after: cumulative ? '0' : '120',
    availability_mode: cumulative ? 'latest' : 'any',
  };

  return {
    topic: `${options.discoveryPrefix}/sensor/${serial}/${sensor.key}/config`,
    payload: JSON.stringify(payload),
  };
}

/**
 * One config message per sensor the inverter currently reports a value for
 */
export function buildDiscoveryMessages(reading: InverterReading, options: DiscoveryOptions): MqttMessage[] {
  return SENSORS
    .filter((sensor) => sensor.read(reading) !== null)
    .map((sensor) => buildDiscoveryMessage(reading, sensor, options));
}

export function buildStatePayload(reading: InverterReading): Partial<Record<SensorDefinition['key'], number>> {
  const state: Partial<Record<SensorDefinition['key'], number>> = {};
  for (const sensor of SENSORS) {
    const value = sensor.read(reading);
    if (value !== null) {
      state[sensor.key] = value;
    }
  }
  return state;
}
