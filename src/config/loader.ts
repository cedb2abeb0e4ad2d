/**
 * Configuration loading
 *
 * Reads configuration.yaml, validates it and maps it onto BridgeConfig.
 */

import { existsSync, readFileSync } from 'fs';
import { Command } from 'commander';
import { parse, YAMLParseError } from 'yaml';
import { ConfigError } from '../errors';
import {
  ConfigFileSchema,
  type BridgeConfig,
  type InverterConfig,
  type MqttConfig,
} from './schema';

export const DEFAULT_CONFIG_PATH = 'configuration.yaml';

/**
 * `--config` wins over CONFIG_PATH, which wins over ./configuration.yaml
 */
export function resolveConfigPath(
  argv: readonly string[],
  env: NodeJS.ProcessEnv
): string {
  const program = new Command();
  program
    .option('-c, --config <path>', 'Path to configuration.yaml')
    .allowUnknownOption(true)
    .allowExcessArguments(true)
    .exitOverride();

  program.parse([...argv]);

  const opts = program.opts<{ config?: string }>();
  return opts.config ?? env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
}

export function parseConfig(raw: unknown): BridgeConfig {
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const file = result.data;
  return {
    intervalMs: file.global.interval_seconds * 1000,
    uptimeUri: file.global.uptime_uri,
    logLevel: file.global.log_level,
    inverter: {
      ip: file.inverter.ip,
      username: file.inverter.username,
      password: file.inverter.password,
      timeoutMs: file.inverter.timeout_seconds * 1000,
      models: file.inverter.models,
    },
    mqtt: {
      broker: file.mqtt.broker,
      port: file.mqtt.port,
      username: file.mqtt.username,
      password: file.mqtt.password,
    },
    homeAssistant: {
      discoveryPrefix: file.homeassistant.discovery_prefix,
      statePrefix: file.homeassistant.state_prefix,
    },
  };
}

export function loadConfig(configPath: string): BridgeConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Configuration file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(configPath, 'utf8'));
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigError(`Invalid YAML in ${configPath}: ${error.message}`);
    }
    throw error;
  }

  return parseConfig(raw);
}

export function brokerUrl(mqtt: MqttConfig): string {
  if (/^(mqtts?|wss?|tcp|tls):\/\//.test(mqtt.broker)) {
    return mqtt.broker;
  }
  return `mqtt://${mqtt.broker}:${mqtt.port}`;
}

/**
 * The stick serves both pages under its own spelling: moniter.cgi
 */
export function inverterUrls(inverter: InverterConfig): { info: string; device: string } {
  return {
    info: `http://${inverter.ip}/inverter.cgi`,
    device: `http://${inverter.ip}/moniter.cgi`,
  };
}
