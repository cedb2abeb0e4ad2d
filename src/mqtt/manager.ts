import { connect as mqttConnect, type IClientOptions, type MqttClient } from 'mqtt';
import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { MqttNotConnectedError, MqttPublishTimeoutError, errorMessage } from '../errors';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/logger';

export type MqttConnectFn = (brokerUrl: string, options: IClientOptions) => MqttClient;

export interface MqttCredentials {
  username: string;
  password: string;
  clientId?: string;
}

export interface PublishOptions {
  retain?: boolean;
  qos?: 0 | 1 | 2;
}

export interface MqttManagerOptions {
  logger: Logger;
  /** Replaced in tests with an in-process client */
  connectFn?: MqttConnectFn;
  connectTimeoutMs?: number;
  publishTimeoutMs?: number;
  baseReconnectDelayMs?: number;
  maxReconnectDelayMs?: number;
}

export function createClientId(): string {
  return `solismqtt_${uuidv4().replace(/-/g, '')}`;
}

/**
 * MQTT connection manager
 *
 * Owns the single broker connection used by the bridge. Reconnects with
 * exponential backoff after a connection that was once up goes away.
 *
 * Events:
 * - 'connect': Emitted on every established connection, reconnects included
 */
export class MqttManager extends EventEmitter {
  private client: MqttClient | null = null;
  private connected = false;
  private everConnected = false;
  private closing = false;
  private connectionPromise: Promise<void> | null = null;
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private lastBrokerUrl?: string;
  private lastCredentials?: MqttCredentials;

  private readonly logger: Logger;
  private readonly connectFn: MqttConnectFn;
  private readonly connectTimeoutMs: number;
  private readonly publishTimeoutMs: number;
  private readonly baseReconnectDelayMs: number;
  private readonly maxReconnectDelayMs: number;

  constructor(options: MqttManagerOptions) {
    super();
    this.logger = options.logger;
    this.connectFn = options.connectFn ?? mqttConnect;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
    this.publishTimeoutMs = options.publishTimeoutMs ?? 30000;
    this.baseReconnectDelayMs = options.baseReconnectDelayMs ?? 1000;
    this.maxReconnectDelayMs = options.maxReconnectDelayMs ?? 30000;
  }

  /**
   * Connect to MQTT broker (idempotent - can be called multiple times)
   */
  public async connect(brokerUrl: string, credentials: MqttCredentials): Promise<void> {
    // Keep one client id across reconnects
    const clientId = credentials.clientId ?? this.lastCredentials?.clientId ?? createClientId();
    this.lastBrokerUrl = brokerUrl;
    this.lastCredentials = { ...credentials, clientId };
    this.closing = false;

    if (this.client && this.connected) {
      return;
    }

    if (this.connectionPromise) {
      return this.connectionPromise;
    }

    // Clean up old client (prevent listener leaks on reconnection)
    if (this.client) {
      this.client.removeAllListeners();
      this.client.end(true);
      this.client = null;
    }

    this.logger.debug('Connecting to MQTT broker', { component: LogComponents.MQTT, brokerUrl });

    const connection = new Promise<void>((resolve, reject) => {
      const client = this.connectFn(brokerUrl, {
        clientId,
        username: credentials.username,
        password: credentials.password,
        clean: true,
        reconnectPeriod: 0, // Reconnects are scheduled by the manager
        connectTimeout: this.connectTimeoutMs,
      });
      this.client = client;

      const connectionTimeout = setTimeout(() => {
        if (!this.connected) {
          this.connectionPromise = null;
          client.end(true);
          reject(new Error(`MQTT connection timeout after ${this.connectTimeoutMs}ms: ${brokerUrl}`));
        }
      }, this.connectTimeoutMs);

      client.on('connect', () => {
        clearTimeout(connectionTimeout);
        this.connected = true;
        this.everConnected = true;
        this.reconnectAttempts = 0;
        this.connectionPromise = null;

        this.logger.info('Connected to MQTT broker', { component: LogComponents.MQTT, brokerUrl });
        this.emit('connect');
        resolve();
      });

      client.on('error', (err) => {
        this.logger.error('MQTT connection error', {
          component: LogComponents.MQTT,
          brokerUrl,
          error: err.message,
        });

        if (!this.connected) {
          clearTimeout(connectionTimeout);
          this.connectionPromise = null;
          reject(err);
        }
      });

      client.on('offline', () => {
        this.connected = false;
        this.logger.warn('MQTT client offline', { component: LogComponents.MQTT });
      });

      client.on('close', () => {
        const wasConnected = this.connected;
        this.connected = false;

        if (this.closing) {
          return;
        }

        this.logger.warn('Disconnected from MQTT', {
          component: LogComponents.MQTT,
          wasConnected,
          reconnectAttempts: this.reconnectAttempts,
        });

        if (this.everConnected) {
          this.scheduleReconnect();
        }
      });
    });

    this.connectionPromise = connection;
    return connection;
  }

  /**
   * Publish message to MQTT topic WITHOUT queueing
   *
   * Rejects immediately if not connected, and if the broker has not taken the
   * message within the publish timeout.
   */
  public async publish(topic: string, payload: string, options: PublishOptions = {}): Promise<void> {
    const client = this.client;
    if (!client || !this.connected) {
      throw new MqttNotConnectedError(topic);
    }

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new MqttPublishTimeoutError(topic, this.publishTimeoutMs));
      }, this.publishTimeoutMs);

      client.publish(topic, payload, { retain: options.retain ?? false, qos: options.qos ?? 0 }, (error) => {
        clearTimeout(timeout);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  public isConnected(): boolean {
    return this.connected && this.client !== null;
  }

  /**
   * Disconnect from MQTT broker and stop reconnecting
   */
  public async disconnect(): Promise<void> {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    const client = this.client;
    if (!client) return;

    await new Promise<void>((resolve) => {
      client.end(false, {}, () => {
        this.connected = false;
        this.logger.info('Disconnected from MQTT broker', { component: LogComponents.MQTT });
        resolve();
      });
    });
    this.client = null;
  }

  /**
   * Schedule reconnect with exponential backoff
   */
  private scheduleReconnect(): void {
    if (this.reconnectTimer || !this.lastBrokerUrl || !this.lastCredentials) {
      return;
    }

    this.reconnectAttempts++;
    const delay = Math.min(
      this.maxReconnectDelayMs,
      this.baseReconnectDelayMs * Math.pow(2, this.reconnectAttempts - 1)
    );

    this.logger.info(`Scheduling MQTT reconnect attempt ${this.reconnectAttempts} in ${delay}ms`, {
      component: LogComponents.MQTT,
    });

    const brokerUrl = this.lastBrokerUrl;
    const credentials = this.lastCredentials;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.closing || this.connected || this.connectionPromise) {
        return;
      }
      this.connect(brokerUrl, credentials).catch((error: unknown) => {
        this.logger.error(`Reconnect attempt ${this.reconnectAttempts} failed`, {
          component: LogComponents.MQTT,
          error: errorMessage(error),
        });
      });
    }, delay);
  }
}
