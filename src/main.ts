/**
 * Daemon wiring: logger, configuration, collaborators and signal handling
 */

import { InverterBridge } from './bridge';
import { loadConfig, resolveConfigPath, type BridgeConfig } from './config';
import { errorMessage } from './errors';
import { InverterClient } from './inverter';
import { FetchHttpClient } from './lib/http-client';
import { LogComponents } from './logging/components';
import { createLogger, parseLogLevel, type Logger } from './logging/logger';
import { MqttManager, type MqttConnectFn } from './mqtt/manager';
import { Publisher } from './publisher';

/** A logger whose level can be changed once the config is read */
export type LevelledLogger = Logger & { level: string };

export interface MainOptions {
  argv: readonly string[];
  env: NodeJS.ProcessEnv;
  /** Replaced in tests */
  logger?: LevelledLogger;
  connectFn?: MqttConnectFn;
}

/**
 * Run the bridge until it is stopped by a signal.
 * Resolves with the process exit code.
 */
export async function main(options: MainOptions): Promise<number> {
  const { argv, env } = options;
  const envLevel = parseLogLevel(env.LOG_LEVEL);
  const logger = options.logger ?? createLogger({
    level: envLevel,
    format: env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
    logDir: env.LOG_DIR,
  });

  if (env.LOG_LEVEL && !envLevel) {
    logger.warn(`Ignoring unknown LOG_LEVEL '${env.LOG_LEVEL}'`, { component: LogComponents.CONFIG });
  }

  let config: BridgeConfig;
  try {
    const configPath = resolveConfigPath(argv, env);
    logger.info(`Loading configuration from ${configPath}`, { component: LogComponents.CONFIG });
    config = loadConfig(configPath);
  } catch (error) {
    logger.error(errorMessage(error), { component: LogComponents.CONFIG });
    return 1;
  }

  logger.level = envLevel ?? config.logLevel;

  const httpClient = new FetchHttpClient();
  const mqtt = new MqttManager({ logger, connectFn: options.connectFn });
  const bridge = new InverterBridge({
    config,
    logger,
    inverter: new InverterClient(config.inverter, httpClient, logger),
    mqtt,
    publisher: new Publisher({ mqtt, httpClient, logger, uptimeUri: config.uptimeUri }),
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Stopping (signal=${signal})`, { component: LogComponents.BRIDGE });
    bridge.stop().catch((error: unknown) => {
      logger.error('Error during shutdown', { component: LogComponents.BRIDGE, error: errorMessage(error) });
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await bridge.start();
    return 0;
  } catch (error) {
    logger.error('Solis inverter bridge failed', { component: LogComponents.BRIDGE, error: errorMessage(error) });
    return 1;
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}
