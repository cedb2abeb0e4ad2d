/**
 * Test fixtures: stick responses, readings and configuration
 */

import type { BridgeConfig } from '../../src/config';
import type { InverterReading } from '../../src/inverter';

export const INVERTER_BODY = '\0\0SN1234567890;V1.2.3;518;41.5;2350;12.3456;4567.8;NO\0\0';

export const INVERTER_BODY_UNKNOWN_TOTAL = 'SN1234567890;V1.2.3;999;38.0;0;0.5;d;yes';

export const DEVICE_BODY =
  '\0SN-STICK-01;ME_0D_270A_1.10;Enable;AP_TEST;10.10.100.254;;Enable;HomeWifi;87%;192.168.1.50;AA:BB:CC:DD:EE:FF;Connected;Unconnected\0';

export function createReading(overrides: Partial<InverterReading> = {}): InverterReading {
  return {
    serialNumber: 'SN1234567890',
    firmwareVersion: 'V1.2.3',
    modelNumber: '518',
    inverterTemperature: 41.5,
    powerCurrent: 2350,
    powerToday: 12.346,
    powerTotal: 4567.8,
    alertsEnabled: false,
    ...overrides,
  };
}

export function createTestConfig(overrides: Partial<BridgeConfig> = {}): BridgeConfig {
  return {
    intervalMs: 60000,
    uptimeUri: undefined,
    logLevel: 'info',
    inverter: {
      ip: '192.168.1.50',
      username: 'admin',
      password: 'test-password',
      timeoutMs: 20000,
      models: {},
    },
    mqtt: {
      broker: 'broker.local',
      port: 1883,
      username: 'solis',
      password: 'test-password',
    },
    homeAssistant: {
      discoveryPrefix: 'homeassistant',
      statePrefix: 'solismqtt',
    },
    ...overrides,
  };
}

export const VALID_CONFIG_YAML = `
global:
  interval_seconds: 30
  uptime_uri: http://uptime.local/ping
inverter:
  ip: 192.168.1.50
  username: admin
  password: 1234
mqtt:
  broker: broker.local
  username: solis
  password: test-password
`;
