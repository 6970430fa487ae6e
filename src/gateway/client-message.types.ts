import { BrokerEventKind, SubscriptionOutcome } from '../broker/broker.types';

export interface ClientSubscribeMessage {
  action: 'subscribe';
  symbol: string;
}

export interface ClientUnsubscribeMessage {
  action: 'unsubscribe';
  symbol: string;
}

export interface ClientPlaceOrderMessage {
  action: 'place_order';
  /** Validated separately so the client gets the exact reason */
  order: unknown;
}

export interface ClientCancelOrderMessage {
  action: 'cancel_order';
  orderId: unknown;
}

export interface ClientPingMessage {
  action: 'ping';
  timestamp?: unknown;
}

export type ClientMessage =
  | ClientSubscribeMessage
  | ClientUnsubscribeMessage
  | ClientPlaceOrderMessage
  | ClientCancelOrderMessage
  | ClientPingMessage;

export interface ServerWelcomeMessage {
  type: 'welcome';
  clientId: string;
  message: string;
}

export interface ServerSubscriptionMessage {
  type: 'subscribe_response' | 'unsubscribe_response';
  data: SubscriptionOutcome;
}

export interface ServerOrderMessage {
  type: 'order_confirmation' | 'cancel_confirmation';
  data: Record<string, unknown>;
}

export interface ServerPushMessage {
  type: Exclude<BrokerEventKind, 'error'>;
  data: Record<string, unknown>;
}

export interface ServerPongMessage {
  type: 'pong';
  timestamp: unknown;
}

export interface ServerErrorMessage {
  type: 'error' | 'validation_error';
  message: string;
}

export type ServerMessage =
  | ServerWelcomeMessage
  | ServerSubscriptionMessage
  | ServerOrderMessage
  | ServerPushMessage
  | ServerPongMessage
  | ServerErrorMessage;
