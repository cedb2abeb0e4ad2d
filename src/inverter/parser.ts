import { InverterResponseError } from '../errors';
import type { DataLoggerStatus, InverterReading } from './types';

const INVERTER_FIELD_COUNT = 8;
const DEVICE_FIELD_COUNT = 13;

/** What the stick writes in place of a lifetime total it does not know */
const UNKNOWN_TOTAL = 'd';

/**
 * Split a stick response into its `;`-separated fields.
 * The firmware pads the line with NUL bytes at either end.
 */
export function splitFields(body: string): string[] {
  return body.replace(/^\0+|\0+$/g, '').split(';');
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

/** The whole field must be the number, unit suffixes included */
function parseField(value: string, pattern: RegExp, field: string, body: string): number {
  const trimmed = value.trim();
  if (!pattern.test(trimmed)) {
    throw new InverterResponseError(`Invalid ${field} in inverter response: '${value}'`, body);
  }
  return Number(trimmed);
}

function parseNumber(value: string, field: string, body: string): number {
  return parseField(value, DECIMAL, field, body);
}

function parseInteger(value: string, field: string, body: string): number {
  return parseField(value, INTEGER, field, body);
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function parseFlag(value: string, whenTrue: string, whenFalse: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (normalized === whenTrue) return true;
  if (normalized === whenFalse) return false;
  return null;
}

function nullable(value: string): string | null {
  return value === 'null' ? null : value;
}

export function parseInverterInfo(body: string): InverterReading {
  const fields = splitFields(body);
  if (fields.length < INVERTER_FIELD_COUNT) {
    throw new InverterResponseError(
      `Expected ${INVERTER_FIELD_COUNT} fields from inverter.cgi, got ${fields.length}`,
      body
    );
  }

  const [serialNumber, firmwareVersion, modelNumber, temperature, power, today, total, alarm] = fields;

  return {
    serialNumber,
    firmwareVersion,
    modelNumber,
    inverterTemperature: parseNumber(temperature, 'inverter temperature', body),
    powerCurrent: parseInteger(power, 'current power', body),
    powerToday: roundTo(parseNumber(today, 'production today', body), 3),
    powerTotal: total === UNKNOWN_TOTAL ? null : parseNumber(total, 'total production', body),
    alertsEnabled: parseFlag(alarm, 'yes', 'no'),
  };
}

export function parseDeviceStatus(body: string): DataLoggerStatus {
  const fields = splitFields(body);
  if (fields.length < DEVICE_FIELD_COUNT) {
    throw new InverterResponseError(
      `Expected ${DEVICE_FIELD_COUNT} fields from moniter.cgi, got ${fields.length}`,
      body
    );
  }

  // Field 5 is always empty and not shown by the stick's own UI
  return {
    serialNumber: fields[0],
    firmwareVersion: fields[1],
    wirelessAp: parseFlag(fields[2], 'enable', 'disable'),
    wirelessApSsid: nullable(fields[3]),
    wirelessApIp: nullable(fields[4]),
    wirelessSta: parseFlag(fields[6], 'enable', 'disable'),
    wirelessStaSsid: nullable(fields[7]),
    wirelessStaRssi: nullable(fields[8]),
    wirelessStaIp: nullable(fields[9]),
    wirelessStaMac: nullable(fields[10]),
    remoteServerAConnected: parseFlag(fields[11], 'connected', 'unconnected'),
    remoteServerBConnected: parseFlag(fields[12], 'connected', 'unconnected'),
  };
}
