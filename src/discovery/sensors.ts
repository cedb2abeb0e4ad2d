import type { InverterReading } from '../inverter';

export type SensorKey = 'power_current' | 'power_today' | 'power_total' | 'inverter_temperature';

export interface SensorDefinition {
  /** Key in the state document, also part of the entity's unique id */
  key: SensorKey;
  /** Entity name shown in Home Assistant */
  name: string;
  unit: string;
  read(reading: InverterReading): number | null;
}

export const SENSORS: readonly SensorDefinition[] = [
  { key: 'power_current', name: 'Current Power', unit: 'W', read: (r) => r.powerCurrent },
  { key: 'power_today', name: "Today's Production", unit: 'kWh', read: (r) => r.powerToday },
  { key: 'power_total', name: 'Total Production', unit: 'kWh', read: (r) => r.powerTotal },
  { key: 'inverter_temperature', name: 'Inverter Temperature', unit: '°C', read: (r) => r.inverterTemperature },
];
