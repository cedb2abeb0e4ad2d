import { MqttManager, createClientId } from '../../../src/mqtt/manager';
import { MqttNotConnectedError, MqttPublishTimeoutError } from '../../../src/errors';
import { createMockConnect, type MockMqttClient } from '../../helpers/mock-mqtt-client';
import { createMockLogger } from '../../helpers/mock-logger';
import type { IClientOptions } from 'mqtt';

const BROKER = 'mqtt://broker.local:1883';
const CREDENTIALS = { username: 'solis', password: 'test-password' };

async function waitFor(condition: () => boolean, timeoutMs = 1000): Promise<void> {
  const started = Date.now();
  while (!condition()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error('condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe('createClientId', () => {
  it('should prefix a dashless uuid', () => {
    expect(createClientId()).toMatch(/^solismqtt_[0-9a-f]{32}$/);
  });
});

describe('MqttManager', () => {
  let mock: ReturnType<typeof createMockConnect>;
  let manager: MqttManager;

  beforeEach(() => {
    mock = createMockConnect();
    manager = new MqttManager({
      logger: createMockLogger(),
      connectFn: mock.connectFn,
      connectTimeoutMs: 200,
      publishTimeoutMs: 50,
      baseReconnectDelayMs: 5,
      maxReconnectDelayMs: 20,
    });
  });

  afterEach(async () => {
    await manager.disconnect();
  });

  async function connect(): Promise<MockMqttClient> {
    const pending = manager.connect(BROKER, CREDENTIALS);
    const client = mock.clients[mock.clients.length - 1];
    client.simulateConnect();
    await pending;
    return client;
  }

  describe('connect', () => {
    it('should connect with credentials and manual reconnects', async () => {
      await connect();

      expect(manager.isConnected()).toBe(true);
      expect(mock.calls).toHaveLength(1);
      const { brokerUrl, options } = mock.calls[0];
      expect(brokerUrl).toBe(BROKER);
      expect(options).toMatchObject<IClientOptions>({
        username: 'solis',
        password: 'test-password',
        clean: true,
        reconnectPeriod: 0,
      });
      expect(options.clientId).toMatch(/^solismqtt_[0-9a-f]{32}$/);
    });

    it('should not open a second connection when already connected', async () => {
      await connect();
      await manager.connect(BROKER, CREDENTIALS);

      expect(mock.calls).toHaveLength(1);
    });

    it('should reject when the broker refuses the connection', async () => {
      const pending = manager.connect(BROKER, CREDENTIALS);
      mock.clients[0].simulateError(new Error('Connection refused: Not authorized'));

      await expect(pending).rejects.toThrow('Connection refused: Not authorized');
      expect(manager.isConnected()).toBe(false);
    });

    it('should time out when the broker never answers', async () => {
      await expect(manager.connect(BROKER, CREDENTIALS)).rejects.toThrow(
        `MQTT connection timeout after 200ms: ${BROKER}`
      );
      expect(mock.clients[0].endCalls).toEqual([true]);
    });
  });

  describe('publish', () => {
    it('should refuse to publish while disconnected', async () => {
      await expect(manager.publish('solismqtt/SN1', '{}')).rejects.toThrow(MqttNotConnectedError);
    });

    it('should publish with retain and qos options', async () => {
      const client = await connect();

      await manager.publish('homeassistant/sensor/SN1/power_current/config', '{"a":1}', { retain: true });

      expect(client.published).toEqual([
        {
          topic: 'homeassistant/sensor/SN1/power_current/config',
          payload: '{"a":1}',
          options: { retain: true, qos: 0 },
        },
      ]);
    });

    it('should reject when the client reports a publish error', async () => {
      const client = await connect();
      client.publishError = new Error('Connection closed');

      await expect(manager.publish('solismqtt/SN1', '{}')).rejects.toThrow('Connection closed');
    });

    it('should time out when the publish is never acknowledged', async () => {
      const client = await connect();
      client.ackPublishes = false;

      await expect(manager.publish('solismqtt/SN1', '{}')).rejects.toThrow(
        new MqttPublishTimeoutError('solismqtt/SN1', 50)
      );
    });
  });

  describe('reconnect', () => {
    it('should reconnect with the same client id after the connection drops', async () => {
      const first = await connect();
      const onConnect = jest.fn();
      manager.on('connect', onConnect);

      first.simulateClose();
      expect(manager.isConnected()).toBe(false);

      await waitFor(() => mock.clients.length === 2);
      mock.clients[1].simulateConnect();

      await waitFor(() => manager.isConnected());
      expect(onConnect).toHaveBeenCalledTimes(1);
      expect(mock.calls[1].options.clientId).toBe(mock.calls[0].options.clientId);
    });

    it('should not reconnect after disconnect()', async () => {
      const client = await connect();

      await manager.disconnect();
      client.simulateClose();
      await new Promise((resolve) => setTimeout(resolve, 40));

      expect(mock.clients).toHaveLength(1);
    });

    it('should not reconnect after a failed first connection', async () => {
      const pending = manager.connect(BROKER, CREDENTIALS);
      mock.clients[0].simulateError(new Error('ECONNREFUSED'));
      mock.clients[0].simulateClose();
      await expect(pending).rejects.toThrow('ECONNREFUSED');

      await new Promise((resolve) => setTimeout(resolve, 40));
      expect(mock.clients).toHaveLength(1);
    });
  });
});
