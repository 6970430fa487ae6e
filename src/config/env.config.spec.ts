import { ConfigModule, ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import envConfig from './env.config';

describe('env config', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('falls back to defaults', () => {
    delete process.env.BROKER_WS_URL;
    delete process.env.MAX_RECONNECT_ATTEMPTS;
    delete process.env.RECONNECT_BASE_DELAY_MS;
    delete process.env.SUBSCRIBE_TIMEOUT_MS;

    const config = envConfig();
    expect(config.broker).toMatchObject({
      url: 'wss://demo.broker.example/socket',
      maxReconnectAttempts: 10,
      reconnectBaseDelayMs: 5_000,
      subscribeTimeoutMs: 5_000,
    });
  });

  it('reads broker settings from the environment', () => {
    process.env.BROKER_WS_URL = 'ws://localhost:9001';
    process.env.BROKER_API_KEY = 'test-key';
    process.env.MAX_RECONNECT_ATTEMPTS = '3';
    process.env.MAX_ORDER_QUANTITY = '25';

    const config = envConfig();
    expect(config.maxOrderQuantity).toBe(25);
    expect(config.broker).toMatchObject({ url: 'ws://localhost:9001', apiKey: 'test-key', maxReconnectAttempts: 3 });
  });

  it('ignores values that are not integers', () => {
    process.env.REQUEST_TIMEOUT_MS = 'soon';

    expect(envConfig().broker.requestTimeoutMs).toBe(10_000);
  });

  it('serves parsed values through ConfigService while the variable is set', async () => {
    process.env.MAX_ORDER_QUANTITY = '25';
    process.env.DEBUG = 'true';

    const moduleRef = await Test.createTestingModule({
      imports: [ConfigModule.forRoot({ ignoreEnvFile: true, load: [envConfig] })],
    }).compile();
    const config = moduleRef.get(ConfigService);

    expect(config.get('maxOrderQuantity')).toBe(25);
    expect(config.get('debug')).toBe(true);
    expect(config.get('MAX_ORDER_QUANTITY')).toBe('25');
  });
});
