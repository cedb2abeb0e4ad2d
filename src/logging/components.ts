/**
 * Logging Component Names
 *
 * Standardized component names for structured logging.
 *
 * Usage:
 *   logger.info('Connected to MQTT broker', { component: LogComponents.MQTT });
 */

export const LogComponents = {
  BRIDGE: 'Bridge',
  CONFIG: 'Config',
  INVERTER: 'Inverter',
  MQTT: 'Mqtt',
  PUBLISHER: 'Publisher',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];
