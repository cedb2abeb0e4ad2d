/**
 * Configuration Module
 * ====================
 *
 * configuration.yaml loading and validation
 */

export {
  DEFAULT_CONFIG_PATH,
  brokerUrl,
  inverterUrls,
  loadConfig,
  parseConfig,
  resolveConfigPath,
} from './loader';
export { ConfigFileSchema, MAX_TIMER_SECONDS } from './schema';
export type {
  BridgeConfig,
  ConfigFile,
  HomeAssistantConfig,
  InverterConfig,
  MqttConfig,
} from './schema';
