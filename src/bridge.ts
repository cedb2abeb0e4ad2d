/**
 * Inverter Bridge
 * ===============
 *
 * Daemon lifecycle: wait for the inverter, announce its sensors to Home
 * Assistant, then publish a state document every poll interval.
 *
 * The data-logger stick powers its Wi-Fi module down with the inverter at
 * dusk, so an unreachable inverter is an expected state, not a fault.
 */

import { brokerUrl, type BridgeConfig } from './config';
import {
  buildDiscoveryMessages,
  buildStatePayload,
  deviceTopic,
  stateTopic,
  type MqttMessage,
} from './discovery';
import { InverterUnavailableError, errorMessage } from './errors';
import type { DataLoggerStatus, InverterReading } from './inverter';
import { LogComponents } from './logging/components';
import type { Logger } from './logging/logger';
import type { MqttCredentials, PublishOptions } from './mqtt/manager';
import type { PublishResult } from './publisher';
import { calculateBackoff, sleep as defaultSleep, type SleepFn } from './utils/backoff';

export const INVERTER_RETRY_BASE_MS = 1000;
export const INVERTER_RETRY_MAX_MS = 600000; // 10 minutes
export const DISCOVERY_RETRY_MS = 60000;

export interface BridgeInverter {
  readInverter(): Promise<InverterReading>;
  readDevice(): Promise<DataLoggerStatus>;
}

export interface BridgeMqtt {
  connect(brokerUrl: string, credentials: MqttCredentials): Promise<void>;
  disconnect(): Promise<void>;
  on(event: 'connect', listener: () => void): unknown;
  off(event: 'connect', listener: () => void): unknown;
}

export interface BridgePublisher {
  publishAll(messages: readonly MqttMessage[], options?: PublishOptions): Promise<PublishResult>;
}

export interface BridgeDependencies {
  config: BridgeConfig;
  logger: Logger;
  inverter: BridgeInverter;
  mqtt: BridgeMqtt;
  publisher: BridgePublisher;
  sleep?: SleepFn;
}

/**
 * Delay before the next inverter read after `failures` failed reads:
 * 1s, 2s, 4s ... capped at 10 minutes
 */
export function inverterRetryDelayMs(failures: number): number {
  return calculateBackoff(failures + 1, INVERTER_RETRY_BASE_MS, 2, INVERTER_RETRY_MAX_MS);
}

export class InverterBridge {
  private readonly config: BridgeConfig;
  private readonly logger: Logger;
  private readonly inverter: BridgeInverter;
  private readonly mqtt: BridgeMqtt;
  private readonly publisher: BridgePublisher;
  private readonly sleep: SleepFn;
  private readonly abortController = new AbortController();

  private running: Promise<void> | null = null;
  private discoveryMessages: MqttMessage[] = [];
  private currentStateTopic: string | null = null;

  constructor(deps: BridgeDependencies) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.inverter = deps.inverter;
    this.mqtt = deps.mqtt;
    this.publisher = deps.publisher;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Run until stop() is called. Resolves once MQTT is disconnected.
   */
  start(): Promise<void> {
    if (!this.running) {
      this.running = this.run();
    }
    return this.running;
  }

  async stop(): Promise<void> {
    this.abortController.abort();
    if (this.running) {
      await Promise.allSettled([this.running]);
    } else {
      await this.mqtt.disconnect();
    }
  }

  isStopping(): boolean {
    return this.abortController.signal.aborted;
  }

  getStateTopic(): string | null {
    return this.currentStateTopic;
  }

  /**
   * Read the inverter until it answers, backing off exponentially.
   * Returns undefined if the bridge is stopped first.
   */
  async waitForInverter(): Promise<InverterReading | undefined> {
    for (let failures = 0; !this.isStopping(); failures++) {
      try {
        return await this.inverter.readInverter();
      } catch (error) {
        const delayMs = inverterRetryDelayMs(failures);
        this.logger.warn(`Inverter not available. Retrying in ${delayMs / 1000} seconds`, {
          component: LogComponents.BRIDGE,
          error: errorMessage(error),
        });
        await this.sleep(delayMs, this.abortController.signal);
      }
    }
    return undefined;
  }

  /**
   * Publish retained discovery configs for every sensor with a value.
   * Retries the whole set every minute until the broker has taken all of it.
   */
  async announce(): Promise<InverterReading | undefined> {
    const reading = await this.waitForInverter();
    if (!reading) {
      return undefined;
    }

    const { discoveryPrefix, statePrefix } = this.config.homeAssistant;
    this.currentStateTopic = stateTopic(reading.serialNumber, statePrefix);
    this.discoveryMessages = buildDiscoveryMessages(reading, {
      discoveryPrefix,
      statePrefix,
      models: this.config.inverter.models,
    });

    this.logger.info('Publishing discovery topics', {
      component: LogComponents.BRIDGE,
      topics: this.discoveryMessages.map((message) => message.topic),
    });

    while (!this.isStopping()) {
      const result = await this.publisher.publishAll(this.discoveryMessages, { retain: true });
      if (result.failed === 0) {
        break;
      }

      this.logger.warn(`${result.failed} discovery topic(s) not delivered. Retrying in ${DISCOVERY_RETRY_MS / 1000} seconds`, {
        component: LogComponents.BRIDGE,
      });
      await this.sleep(DISCOVERY_RETRY_MS, this.abortController.signal);
    }

    return reading;
  }

  async publishDeviceStatus(serialNumber: string): Promise<void> {
    try {
      const status = await this.inverter.readDevice();
      await this.publisher.publishAll(
        [{ topic: deviceTopic(serialNumber, this.config.homeAssistant.statePrefix), payload: JSON.stringify(status) }],
        { retain: true }
      );
    } catch (error) {
      this.logger.warn('Could not read data-logger status', {
        component: LogComponents.BRIDGE,
        error: errorMessage(error),
      });
    }
  }

  async pollOnce(): Promise<void> {
    try {
      const reading = await this.inverter.readInverter();
      const topic = this.currentStateTopic ?? stateTopic(reading.serialNumber, this.config.homeAssistant.statePrefix);
      const state = buildStatePayload(reading);

      this.logger.info('Publishing data', { component: LogComponents.BRIDGE, topic, ...state });
      await this.publisher.publishAll([{ topic, payload: JSON.stringify(state) }]);
    } catch (error) {
      if (error instanceof InverterUnavailableError) {
        this.logger.warn('Inverter not available', { component: LogComponents.BRIDGE, error: error.message });
      } else {
        this.logger.error('Inverter poll failed', { component: LogComponents.BRIDGE, error: errorMessage(error) });
      }
    }
  }

  private async run(): Promise<void> {
    const { mqtt } = this.config;
    this.logger.info('Initialising Solis inverter bridge', {
      component: LogComponents.BRIDGE,
      inverter: this.config.inverter.ip,
      broker: brokerUrl(mqtt),
      intervalMs: this.config.intervalMs,
    });

    try {
      await this.mqtt.connect(brokerUrl(mqtt), { username: mqtt.username, password: mqtt.password });
      this.mqtt.on('connect', this.onReconnect);

      const reading = await this.announce();
      if (!reading || this.isStopping()) {
        return;
      }

      await this.publishDeviceStatus(reading.serialNumber);

      while (!this.isStopping()) {
        await this.pollOnce();
        await this.sleep(this.config.intervalMs, this.abortController.signal);
      }
    } finally {
      this.mqtt.off('connect', this.onReconnect);
      await this.mqtt.disconnect();
      this.logger.info('Solis inverter bridge stopped', { component: LogComponents.BRIDGE });
    }
  }

  /**
   * A broker without persistence forgets retained configs on restart
   */
  private readonly onReconnect = (): void => {
    if (this.discoveryMessages.length === 0) {
      return;
    }

    this.publisher
      .publishAll(this.discoveryMessages, { retain: true })
      .then((result) => {
        this.logger.info('Republished discovery topics after reconnect', {
          component: LogComponents.BRIDGE,
          ...result,
        });
      })
      .catch((error: unknown) => {
        this.logger.error('Failed to republish discovery topics', {
          component: LogComponents.BRIDGE,
          error: errorMessage(error),
        });
      });
  };
}
