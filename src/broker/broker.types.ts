/** Lifecycle of the broker session. Only `ready` admits caller requests. */
export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'authenticating'
  | 'ready'
  | 'reconnecting'
  | 'failed';

export type OrderSide = 'buy' | 'sell';

export type OrderType = 'market' | 'limit' | 'stop' | 'stop_limit';

export interface OrderSpec {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  quantity: number;
  /** Limit price, required for `limit` and `stop_limit` */
  price?: number;
  /** Trigger price, required for `stop` and `stop_limit` */
  stopPrice?: number;
}

/** A decoded inbound frame. Everything but the tagged fields is kept in `body`. */
export interface BrokerFrame {
  /** Message discriminator, e.g. "market_data" or "order_update" */
  type?: string;
  /** Correlation id echoed back on responses */
  requestId?: string;
  status?: string;
  message?: string;
  /** Event payload for push messages */
  data?: Record<string, unknown>;
  /** The full JSON object as received */
  body: Record<string, unknown>;
}

export interface BrokerErrorNotice {
  message: string;
  body: Record<string, unknown>;
}

/** Push event kinds and the payload each handler receives. */
export interface BrokerEventMap {
  market_data: Record<string, unknown>;
  order_update: Record<string, unknown>;
  position_update: Record<string, unknown>;
  error: BrokerErrorNotice;
}

export type BrokerEventKind = keyof BrokerEventMap;

export type BrokerEventHandler<K extends BrokerEventKind> = (
  payload: BrokerEventMap[K],
) => void | Promise<void>;

export interface RequestOptions {
  /** Overrides the default deadline for this call */
  timeoutMs?: number;
}

export interface SubscribeOptions extends RequestOptions {
  /** Optional data-type filter forwarded to the broker, e.g. ["trades"] */
  dataTypes?: readonly string[];
}

export interface SubscriptionOutcome {
  status: 'subscribed' | 'already_subscribed' | 'unsubscribed' | 'not_subscribed';
  symbol: string;
  /** Broker acknowledgment, absent when nothing was sent */
  response?: Record<string, unknown>;
}

export interface ConnectionStats {
  connected: boolean;
  state: ConnectionState;
  reconnectAttempts: number;
  activeSubscriptionCount: number;
  pendingRequestCount: number;
  subscriptions: string[];
}

export interface BrokerConfig {
  url: string;
  apiKey: string;
  apiSecret: string;
  requestTimeoutMs: number;
  subscribeTimeoutMs: number;
  authTimeoutMs: number;
  maxReconnectAttempts: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  pingIntervalMs: number;
}

/** Payload of the `broker.state` application event. */
export interface BrokerStateChange {
  previous: ConnectionState;
  current: ConnectionState;
}
