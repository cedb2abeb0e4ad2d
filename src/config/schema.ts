import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../logging/logger';

/**
 * YAML may hand back numbers for credentials such as a numeric password
 */
const StringishSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value));

/** Longest delay a Node.js timer takes (2^31-1 ms), in whole seconds */
export const MAX_TIMER_SECONDS = 2147483;

/**
 * configuration.yaml schema (keys as written in the file)
 */
export const ConfigFileSchema = z.object({
  global: z.object({
    interval_seconds: z.coerce.number().int().positive().max(MAX_TIMER_SECONDS),
    uptime_uri: z.string().url().optional(),
    log_level: z.enum(LOG_LEVELS).optional().default('info'),
  }),
  inverter: z.object({
    ip: z.string().min(1),
    username: StringishSchema,
    password: StringishSchema,
    timeout_seconds: z.coerce.number().positive().max(MAX_TIMER_SECONDS).optional().default(20),
    models: z.record(z.string(), StringishSchema).optional().default({}),
  }),
  mqtt: z.object({
    broker: z.string().min(1),
    port: z.coerce.number().int().min(1).max(65535).optional().default(1883),
    username: StringishSchema,
    password: StringishSchema,
  }),
  homeassistant: z
    .object({
      discovery_prefix: z.string().min(1).optional().default('homeassistant'),
      state_prefix: z.string().min(1).optional().default('solismqtt'),
    })
    .optional()
    .default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface InverterConfig {
  ip: string;
  username: string;
  password: string;
  timeoutMs: number;
  /** Extra model-number to model-name entries, merged over the built-in table */
  models: Record<string, string>;
}

export interface MqttConfig {
  broker: string;
  port: number;
  username: string;
  password: string;
}

export interface HomeAssistantConfig {
  discoveryPrefix: string;
  statePrefix: string;
}

export interface BridgeConfig {
  intervalMs: number;
  uptimeUri?: string;
  logLevel: LogLevel;
  inverter: InverterConfig;
  mqtt: MqttConfig;
  homeAssistant: HomeAssistantConfig;
}
