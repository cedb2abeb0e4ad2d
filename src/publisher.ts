/**
 * Publisher
 *
 * Sends a batch of messages to the broker one by one and, after every
 * delivered message, pings the optional uptime monitor.
 */

import type { MqttMessage } from './discovery';
import { errorMessage } from './errors';
import type { HttpClient } from './lib/http-client';
import { LogComponents } from './logging/components';
import type { Logger } from './logging/logger';
import type { MqttManager, PublishOptions } from './mqtt/manager';

const HEARTBEAT_TIMEOUT_MS = 10000;

export interface PublishResult {
  published: number;
  failed: number;
}

export interface PublisherOptions {
  mqtt: Pick<MqttManager, 'publish'>;
  httpClient: HttpClient;
  logger: Logger;
  /** Called with GET after each successful publish */
  uptimeUri?: string;
}

export class Publisher {
  private readonly mqtt: Pick<MqttManager, 'publish'>;
  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly uptimeUri?: string;

  constructor(options: PublisherOptions) {
    this.mqtt = options.mqtt;
    this.httpClient = options.httpClient;
    this.logger = options.logger;
    this.uptimeUri = options.uptimeUri;
  }

  async publishAll(messages: readonly MqttMessage[], options: PublishOptions = {}): Promise<PublishResult> {
    const result: PublishResult = { published: 0, failed: 0 };

    for (const { topic, payload } of messages) {
      this.logger.debug(`${topic}: ${payload}`, { component: LogComponents.PUBLISHER });

      try {
        await this.mqtt.publish(topic, payload, options);
      } catch (error) {
        result.failed++;
        this.logger.error('Error publishing data', {
          component: LogComponents.PUBLISHER,
          topic,
          error: errorMessage(error),
        });
        continue;
      }

      result.published++;
      await this.heartbeat();
    }

    return result;
  }

  private async heartbeat(): Promise<void> {
    if (!this.uptimeUri) {
      return;
    }

    try {
      const response = await this.httpClient.get(this.uptimeUri, { timeout: HEARTBEAT_TIMEOUT_MS });
      if (!response.ok) {
        this.logger.warn(`Uptime heartbeat returned HTTP ${response.status}`, {
          component: LogComponents.PUBLISHER,
        });
      }
    } catch (error) {
      this.logger.warn('Uptime heartbeat failed', {
        component: LogComponents.PUBLISHER,
        error: errorMessage(error),
      });
    }
  }
}
