import { InverterClient } from '../../../src/inverter';
import { InverterHttpError, InverterResponseError, InverterUnavailableError } from '../../../src/errors';
import { MockHttpClient } from '../../helpers/mock-http-client';
import { createMockLogger, type MockLogger } from '../../helpers/mock-logger';
import { DEVICE_BODY, INVERTER_BODY, createTestConfig } from '../../helpers/fixtures';

describe('InverterClient', () => {
  let httpClient: MockHttpClient;
  let logger: MockLogger;
  let client: InverterClient;

  beforeEach(() => {
    httpClient = new MockHttpClient();
    logger = createMockLogger();
    client = new InverterClient(createTestConfig().inverter, httpClient, logger);
  });

  afterEach(() => {
    httpClient.reset();
  });

  describe('readInverter', () => {
    it('should GET inverter.cgi with basic auth and the configured timeout', async () => {
      httpClient.mockGetSuccess(INVERTER_BODY);

      await client.readInverter();

      expect(httpClient.getStub.callCount).toBe(1);
      const [url, options] = httpClient.getStub.firstCall.args;
      expect(url).toBe('http://192.168.1.50/inverter.cgi');
      // admin:test-password
      expect(options?.headers?.Authorization).toBe('Basic YWRtaW46dGVzdC1wYXNzd29yZA==');
      expect(options?.timeout).toBe(20000);
    });

    it('should return the parsed reading and log it', async () => {
      httpClient.mockGetSuccess(INVERTER_BODY);

      const reading = await client.readInverter();

      expect(reading.serialNumber).toBe('SN1234567890');
      expect(reading.powerCurrent).toBe(2350);
      expect(logger.info).toHaveBeenCalledWith(
        'Inverter data',
        expect.objectContaining({ component: 'Inverter', serialNumber: 'SN1234567890', powerCurrent: 2350 })
      );
    });

    it('should throw InverterHttpError on a non-2xx status', async () => {
      httpClient.mockGetError(401, 'Unauthorized');

      await expect(client.readInverter()).rejects.toThrow(
        new InverterHttpError('http://192.168.1.50/inverter.cgi', 401, 'Unauthorized')
      );
    });

    it('should classify a refused connection as unavailable', async () => {
      httpClient.mockNetworkError('ECONNREFUSED');

      const error = await client.readInverter().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InverterUnavailableError);
      expect((error as InverterUnavailableError).kind).toBe('CONNECTION_REFUSED');
      expect((error as InverterUnavailableError).message).toBe(
        'Inverter not reachable (CONNECTION_REFUSED): http://192.168.1.50/inverter.cgi'
      );
    });

    it('should classify a request timeout as unavailable', async () => {
      httpClient.mockTimeout();

      const error = await client.readInverter().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InverterUnavailableError);
      expect((error as InverterUnavailableError).kind).toBe('TIMEOUT');
    });

    it('should surface a garbled body as InverterResponseError', async () => {
      httpClient.mockGetSuccess('garbage');

      await expect(client.readInverter()).rejects.toBeInstanceOf(InverterResponseError);
    });
  });

  describe('readDevice', () => {
    it('should GET moniter.cgi and parse the stick status', async () => {
      httpClient.mockGetSuccess(DEVICE_BODY);

      const status = await client.readDevice();

      expect(httpClient.getStub.firstCall.args[0]).toBe('http://192.168.1.50/moniter.cgi');
      expect(status.serialNumber).toBe('SN-STICK-01');
      expect(status.wirelessStaSsid).toBe('HomeWifi');
    });
  });
});
