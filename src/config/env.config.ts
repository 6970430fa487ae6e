import { BrokerConfig } from '../broker/broker.types';

// Keys differ from the variable names: ConfigService.get() returns the raw
// process.env string for a key that is also an environment variable.
export interface EnvConfig {
  port: number;
  debug: boolean;
  appVersion: string;
  allowedOrigins: string;
  maxOrderQuantity: number;
  broker: BrokerConfig;
}

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export default (): EnvConfig => ({
  port: intFromEnv('PORT', 3000),
  debug: process.env.DEBUG === 'true',
  appVersion: process.env.APP_VERSION ?? '0.1.0',
  allowedOrigins: process.env.ALLOWED_ORIGINS ?? 'http://localhost:3000',
  maxOrderQuantity: intFromEnv('MAX_ORDER_QUANTITY', 10),
  broker: {
    url: process.env.BROKER_WS_URL ?? 'wss://demo.broker.example/socket',
    apiKey: process.env.BROKER_API_KEY ?? 'demo-key',
    apiSecret: process.env.BROKER_API_SECRET ?? 'demo-secret',
    requestTimeoutMs: intFromEnv('REQUEST_TIMEOUT_MS', 10_000),
    subscribeTimeoutMs: intFromEnv('SUBSCRIBE_TIMEOUT_MS', 5_000),
    authTimeoutMs: intFromEnv('AUTH_TIMEOUT_MS', 10_000),
    maxReconnectAttempts: intFromEnv('MAX_RECONNECT_ATTEMPTS', 10),
    reconnectBaseDelayMs: intFromEnv('RECONNECT_BASE_DELAY_MS', 5_000),
    reconnectMaxDelayMs: intFromEnv('RECONNECT_MAX_DELAY_MS', 60_000),
    pingIntervalMs: intFromEnv('PING_INTERVAL_MS', 20_000),
  },
});
