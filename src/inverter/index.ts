export { InverterClient } from './client';
export { parseDeviceStatus, parseInverterInfo, splitFields } from './parser';
export type { DataLoggerStatus, InverterReading } from './types';
