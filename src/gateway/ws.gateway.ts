import { WebSocketGateway, OnGatewayConnection, OnGatewayDisconnect } from '@nestjs/websockets';
import { Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import { IncomingMessage } from 'http';
import WebSocket from 'ws';
import { describeError } from '../broker/broker.errors';
import { BrokerService } from '../broker/broker.service';
import { validateOrder, validateOrderId } from '../orders/order-validation.util';
import { ClientConnectionService } from './client-connection.service';
import { ClientMessage, ServerErrorMessage } from './client-message.types';
import { validateClientMessage } from './validation.util';

const PUSH_KINDS = ['market_data', 'order_update', 'position_update'] as const;

/**
 * WebSocket gateway that accepts downstream client connections on `/ws`.
 *
 * Clients may subscribe to market data, place and cancel orders through the
 * broker session. Every broker push event is broadcast to all connected
 * clients as `{ type, data }`.
 */
@WebSocketGateway({
  path: '/ws'
})
export class BrokerGateway
  implements OnGatewayConnection, OnGatewayDisconnect, OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(BrokerGateway.name);
  private readonly allowedOrigins: string[];
  private readonly maxOrderQuantity: number;
  private unregister: Array<() => void> = [];

  constructor(
    private readonly broker: BrokerService,
    private readonly clients: ClientConnectionService,
    config: ConfigService,
  ) {
    this.allowedOrigins = config.get<string>('allowedOrigins', 'http://localhost:3000')
      .split(',')
      .map((o) => o.trim().replace(/\/+$/, ''));
    this.maxOrderQuantity = config.get<number>('maxOrderQuantity', 10);
  }

  onModuleInit() {
    this.unregister = PUSH_KINDS.map((kind) =>
      this.broker.on(kind, (data) => {
        if (Object.keys(data).length === 0) return;
        this.clients.broadcast({ type: kind, data });
      }),
    );
  }

  onModuleDestroy() {
    for (const off of this.unregister) off();
    this.unregister = [];
  }

  /** Tell every client the broker session has given up reconnecting. */
  @OnEvent('broker.failed')
  handleBrokerFailed(err: Error) {
    this.clients.broadcast({ type: 'error', message: err.message });
  }

  /** Validate origin, register the socket, greet it, and wire up the message handler. */
  handleConnection(client: WebSocket, req: IncomingMessage) {
    const origin = req.headers.origin ?? '';
    if (!this.allowedOrigins.includes(origin)) {
      this.logger.warn(`Rejected connection from origin: ${origin}`);
      client.close(4003, 'Origin not allowed');
      return;
    }

    const connectionId = this.clients.register(client);
    this.logger.log(`Client connected: ${connectionId} (total ${this.clients.size})`);
    this.clients.send(connectionId, {
      type: 'welcome',
      clientId: connectionId,
      message: 'Connected to broker gateway',
    });

    client.on('message', (data: WebSocket.RawData) => {
      this.handleRawMessage(client, data).catch((err: unknown) =>
        this.logger.error(`Error processing message from ${connectionId}: ${describeError(err)}`),
      );
    });
  }

  handleDisconnect(client: WebSocket) {
    const connectionId = this.clients.getId(client);
    if (!connectionId) return;
    this.clients.remove(connectionId);
    this.logger.log(`Client disconnected: ${connectionId} (remaining ${this.clients.size})`);
  }

  /** Parse, validate, and route an incoming client message. */
  async handleRawMessage(client: WebSocket, data: WebSocket.RawData) {
    const connectionId = this.clients.getId(client);
    if (!connectionId) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(data.toString());
    } catch {
      this.sendError(connectionId, 'Invalid JSON');
      return;
    }

    const msg = validateClientMessage(parsed);
    if (!msg.ok) {
      this.sendError(connectionId, msg.error);
      return;
    }

    try {
      await this.route(connectionId, msg.value);
    } catch (err) {
      this.sendError(connectionId, `${msg.value.action} failed: ${describeError(err)}`);
    }
  }

  private async route(connectionId: string, msg: ClientMessage) {
    switch (msg.action) {
      case 'subscribe': {
        const result = await this.broker.subscribe(msg.symbol);
        this.clients.send(connectionId, { type: 'subscribe_response', data: result });
        return;
      }
      case 'unsubscribe': {
        const result = await this.broker.unsubscribe(msg.symbol);
        this.clients.send(connectionId, { type: 'unsubscribe_response', data: result });
        return;
      }
      case 'place_order': {
        const order = validateOrder(msg.order, this.maxOrderQuantity);
        if (!order.ok) {
          this.sendError(connectionId, order.error, 'validation_error');
          return;
        }
        const result = await this.broker.placeOrder(order.value);
        this.clients.send(connectionId, { type: 'order_confirmation', data: result });
        return;
      }
      case 'cancel_order': {
        const orderId = validateOrderId(msg.orderId);
        if (!orderId.ok) {
          this.sendError(connectionId, orderId.error, 'validation_error');
          return;
        }
        const result = await this.broker.cancelOrder(orderId.value);
        this.clients.send(connectionId, { type: 'cancel_confirmation', data: result });
        return;
      }
      case 'ping':
        this.clients.send(connectionId, { type: 'pong', timestamp: msg.timestamp ?? null });
        return;
    }
  }

  private sendError(connectionId: string, message: string, type: ServerErrorMessage['type'] = 'error') {
    const err: ServerErrorMessage = { type, message };
    this.clients.send(connectionId, err);
  }
}
