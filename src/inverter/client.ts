/**
 * Inverter Client
 *
 * Reads the Solis Wi-Fi data-logger stick's status pages over HTTP basic auth.
 */

import { inverterUrls, type InverterConfig } from '../config';
import { InverterHttpError, InverterUnavailableError } from '../errors';
import { basicAuthHeader, type HttpClient, type HttpResponse } from '../lib/http-client';
import { LogComponents } from '../logging/components';
import type { Logger } from '../logging/logger';
import { getNetworkErrorType } from '../utils/network-errors';
import { parseDeviceStatus, parseInverterInfo } from './parser';
import type { DataLoggerStatus, InverterReading } from './types';

export class InverterClient {
  private readonly urls: { info: string; device: string };
  private readonly authorization: string;

  constructor(
    private readonly config: InverterConfig,
    private readonly httpClient: HttpClient,
    private readonly logger: Logger
  ) {
    this.urls = inverterUrls(config);
    this.authorization = basicAuthHeader(config.username, config.password);
  }

  async readInverter(): Promise<InverterReading> {
    this.logger.debug('Reading inverter', { component: LogComponents.INVERTER, url: this.urls.info });

    const body = await this.fetchPage(this.urls.info);
    const reading = parseInverterInfo(body);

    this.logger.info('Inverter data', { component: LogComponents.INVERTER, ...reading });
    return reading;
  }

  async readDevice(): Promise<DataLoggerStatus> {
    this.logger.debug('Reading data-logger status', { component: LogComponents.INVERTER, url: this.urls.device });

    const body = await this.fetchPage(this.urls.device);
    return parseDeviceStatus(body);
  }

  private async fetchPage(url: string): Promise<string> {
    let response: HttpResponse;
    try {
      response = await this.httpClient.get(url, {
        headers: { Authorization: this.authorization },
        timeout: this.config.timeoutMs,
      });
    } catch (error) {
      throw new InverterUnavailableError(url, getNetworkErrorType(error), error);
    }

    if (!response.ok) {
      throw new InverterHttpError(url, response.status, response.statusText);
    }

    return response.text();
  }
}
