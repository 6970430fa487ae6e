import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { reconnectDelay } from './backoff.util';
import {
  AuthenticationError,
  BrokerRejectedError,
  describeError,
  ConnectionLostError,
  NotReadyError,
  ReconnectExhaustedError,
  ShutdownError,
} from './broker.errors';
import {
  BrokerConfig,
  BrokerEventHandler,
  BrokerEventKind,
  BrokerFrame,
  BrokerStateChange,
  ConnectionState,
  ConnectionStats,
  OrderSpec,
  RequestOptions,
  SubscribeOptions,
  SubscriptionOutcome,
} from './broker.types';
import { CorrelationIdGenerator } from './correlation-id.util';
import { CorrelationTable } from './correlation-table';
import { EventDispatcher } from './event-dispatcher';
import { BrokerAction, decodeFrame, encodeRequest, isRejection } from './frame.codec';
import { SubscriptionRegistry } from './subscription-registry';
import { SESSION_TRANSPORT_FACTORY, SessionTransport, TransportFactory } from './ws-transport';

/**
 * The single broker session.
 *
 * Drives connect → authenticate → ready, and on connection loss reconnects
 * with linear backoff until `maxReconnectAttempts` is exhausted, at which
 * point the session is `failed` until {@link connect} is called again.
 * Requests are multiplexed over the socket by correlation id; push messages
 * are fanned out through {@link on}. Lifecycle changes are emitted as
 * `broker.state` and `broker.failed` application events.
 */
@Injectable()
export class BrokerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(BrokerService.name);
  private readonly settings: BrokerConfig;
  private readonly ids = new CorrelationIdGenerator();
  private readonly correlations = new CorrelationTable<BrokerFrame>();
  private readonly subscriptions = new SubscriptionRegistry();
  private readonly dispatcher = new EventDispatcher();

  private state: ConnectionState = 'disconnected';
  private transport: SessionTransport | null = null;
  private writeQueue: Promise<void> = Promise.resolve();
  private connecting: Promise<void> | null = null;
  private resubscription: Promise<void> = Promise.resolve();
  private reconnectAttempts = 0;
  private shuttingDown = false;
  private backoffTimer: ReturnType<typeof setTimeout> | null = null;
  private wakeFromBackoff: (() => void) | null = null;

  constructor(
    config: ConfigService,
    private readonly events: EventEmitter2,
    @Inject(SESSION_TRANSPORT_FACTORY) private readonly createTransport: TransportFactory,
  ) {
    this.settings = config.getOrThrow<BrokerConfig>('broker');
  }

  onModuleInit() {
    this.connect().catch((err: Error) =>
      this.logger.error(`Initial broker connection failed: ${err.message}`),
    );
  }

  async onModuleDestroy() {
    await this.disconnect();
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  /**
   * Bring the session to `ready`. Joins the connect or reconnect loop already
   * in progress, if any.
   *
   * @throws ReconnectExhaustedError if every attempt failed.
   * @throws ShutdownError if {@link disconnect} was called meanwhile.
   */
  async connect(): Promise<void> {
    if (this.state === 'ready') return;
    if (this.connecting && this.shuttingDown) await this.connecting;
    if (!this.connecting) {
      this.shuttingDown = false;
      this.reconnectAttempts = 0;
      this.startConnectLoop(true);
    }
    await this.connecting;

    // re-read: the loop moved the state while we waited
    const state: ConnectionState = this.connectionState;
    if (this.shuttingDown) throw new ShutdownError();
    if (state === 'failed') throw new ReconnectExhaustedError(this.settings.maxReconnectAttempts);
    if (state !== 'ready') throw new ConnectionLostError(`connect ended in state ${state}`);
  }

  /**
   * Stop reconnecting, fail every pending request, forget subscriptions and
   * close the socket. Safe to call repeatedly.
   */
  async disconnect(): Promise<void> {
    this.shuttingDown = true;
    this.cancelBackoff();

    const failed = this.correlations.failAll(new ShutdownError());
    if (failed > 0) this.logger.warn(`Failed ${failed} pending request(s) on shutdown`);
    this.subscriptions.clear();

    const transport = this.transport;
    this.transport = null;
    if (transport) {
      transport.close();
      this.logger.log('Disconnected from broker');
    }
    this.setState('disconnected');

    if (this.connecting) await this.connecting;
  }

  /** Subscribe to market data for `symbol`. A symbol already held is not re-sent. */
  async subscribe(symbol: string, options: SubscribeOptions = {}): Promise<SubscriptionOutcome> {
    if (this.subscriptions.has(symbol)) {
      return { status: 'already_subscribed', symbol };
    }
    const frame = await this.request(
      'subscribe',
      { symbol, data_types: options.dataTypes },
      options.timeoutMs ?? this.settings.subscribeTimeoutMs,
    );
    this.subscriptions.add(symbol, options.dataTypes);
    this.logger.log(`Subscribed to market data: ${symbol}`);
    return { status: 'subscribed', symbol, response: frame.body };
  }

  async unsubscribe(symbol: string, options: RequestOptions = {}): Promise<SubscriptionOutcome> {
    if (!this.subscriptions.has(symbol)) {
      return { status: 'not_subscribed', symbol };
    }
    const frame = await this.request(
      'unsubscribe',
      { symbol },
      options.timeoutMs ?? this.settings.subscribeTimeoutMs,
    );
    this.subscriptions.remove(symbol);
    this.logger.log(`Unsubscribed from: ${symbol}`);
    return { status: 'unsubscribed', symbol, response: frame.body };
  }

  async placeOrder(order: OrderSpec, options: RequestOptions = {}): Promise<Record<string, unknown>> {
    const frame = await this.request(
      'place_order',
      {
        symbol: order.symbol,
        side: order.side,
        order_type: order.type,
        quantity: order.quantity,
        price: order.price,
        stop_price: order.stopPrice,
      },
      options.timeoutMs,
    );
    this.logger.log(
      `Placed order: ${order.symbol} ${order.side} ${order.quantity} @ ${order.price ?? 'market'}`,
    );
    return frame.body;
  }

  async cancelOrder(orderId: string, options: RequestOptions = {}): Promise<Record<string, unknown>> {
    const frame = await this.request('cancel_order', { order_id: orderId }, options.timeoutMs);
    this.logger.log(`Cancelled order: ${orderId}`);
    return frame.body;
  }

  async queryPositions(options: RequestOptions = {}): Promise<Record<string, unknown>> {
    const frame = await this.request('get_positions', {}, options.timeoutMs);
    return frame.body;
  }

  async queryAccountInfo(options: RequestOptions = {}): Promise<Record<string, unknown>> {
    const frame = await this.request('get_account_info', {}, options.timeoutMs);
    return frame.body;
  }

  /** Register a push-event handler. Returns a function that removes it. */
  on<K extends BrokerEventKind>(kind: K, handler: BrokerEventHandler<K>): () => void {
    return this.dispatcher.register(kind, handler);
  }

  getConnectionStats(): ConnectionStats {
    return {
      connected: this.state === 'ready',
      state: this.state,
      reconnectAttempts: this.reconnectAttempts,
      activeSubscriptionCount: this.subscriptions.size,
      pendingRequestCount: this.correlations.size,
      subscriptions: this.subscriptions.current(),
    };
  }

  /** Settles once the resubscribe pass started by the last reconnect is done. */
  whenResubscribed(): Promise<void> {
    return this.resubscription;
  }

  /**
   * Send a request over the ready session and wait for its response.
   *
   * @throws NotReadyError outside the `ready` state.
   * @throws BrokerRejectedError if the broker answers with an error status.
   */
  private async request(
    action: BrokerAction,
    fields: Record<string, unknown>,
    timeoutMs: number = this.settings.requestTimeoutMs,
  ): Promise<BrokerFrame> {
    const transport = this.transport;
    if (this.state !== 'ready' || !transport) {
      throw new NotReadyError(this.state);
    }
    const frame = await this.exchange(transport, action, fields, timeoutMs);
    if (isRejection(frame)) {
      throw new BrokerRejectedError(action, frame.message ?? 'no reason given', frame);
    }
    return frame;
  }

  /**
   * Register a correlation slot, queue the frame, and wait for the slot to
   * settle. A failed write fails the slot and is treated as connection loss.
   */
  private async exchange(
    transport: SessionTransport,
    action: BrokerAction,
    fields: Record<string, unknown>,
    timeoutMs: number,
  ): Promise<BrokerFrame> {
    const id = this.ids.next();
    const handle = this.correlations.register(id, timeoutMs);

    const sent = this.write(transport, encodeRequest(action, id, fields)).catch((err: Error) => {
      const reason = `send failed: ${err.message}`;
      this.correlations.fail(id, new ConnectionLostError(reason));
      this.handleConnectionLost(transport, reason);
    });

    const [, response] = await Promise.all([sent, handle.result]);
    return response;
  }

  /** Serialize writes so the socket only ever has one writer. */
  private write(transport: SessionTransport, frame: string): Promise<void> {
    const next = this.writeQueue.then(() => transport.send(frame));
    // the queue only orders writes; failures reach the caller through `next`
    this.writeQueue = next.catch(() => undefined);
    return next;
  }

  private startConnectLoop(immediate: boolean) {
    const loop: Promise<void> = this.runConnectLoop(immediate).finally(() => {
      if (this.connecting === loop) this.connecting = null;
    });
    this.connecting = loop;
  }

  /**
   * Attempt sessions until one reaches `ready`, the retry budget runs out,
   * or shutdown is requested. When `immediate` is false every attempt,
   * including the first, waits out its backoff delay.
   */
  private async runConnectLoop(immediate: boolean): Promise<void> {
    let attemptNow = immediate;
    while (!this.shuttingDown) {
      if (!attemptNow) {
        if (this.reconnectAttempts >= this.settings.maxReconnectAttempts) {
          this.enterFailed();
          return;
        }
        this.reconnectAttempts++;
        const delay = reconnectDelay(
          this.reconnectAttempts,
          this.settings.reconnectBaseDelayMs,
          this.settings.reconnectMaxDelayMs,
        );
        this.setState('reconnecting');
        this.logger.log(
          `Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts}/${this.settings.maxReconnectAttempts})`,
        );
        await this.backoff(delay);
        if (this.shuttingDown) return;
      }
      attemptNow = false;

      let transport: SessionTransport;
      try {
        transport = await this.openSession();
      } catch (err) {
        this.logFailedAttempt(err);
        continue;
      }

      this.reconnectAttempts = 0;
      this.setState('ready');
      this.logger.log('Broker session ready');
      this.resubscription = this.resubscribeAll(transport);
      return;
    }
  }

  /** Open a fresh transport and authenticate on it. */
  private async openSession(): Promise<SessionTransport> {
    const transport = this.createTransport();
    this.transport = transport;
    this.writeQueue = Promise.resolve();
    transport.onFrame((raw) => {
      if (this.transport === transport) this.handleFrame(raw);
    });
    transport.onClose((reason) => this.handleConnectionLost(transport, reason));

    this.setState('connecting');
    this.logger.log(`Connecting to broker at ${this.settings.url}…`);
    try {
      await transport.open(this.settings.url);
      this.assertCurrent(transport);

      this.setState('authenticating');
      await this.authenticate(transport);
      this.assertCurrent(transport);
    } catch (err) {
      if (this.transport === transport) this.transport = null;
      transport.close();
      throw err;
    }
    return transport;
  }

  private async authenticate(transport: SessionTransport) {
    const frame = await this.exchange(
      transport,
      'authenticate',
      { api_key: this.settings.apiKey, secret: this.settings.apiSecret },
      this.settings.authTimeoutMs,
    );
    if (isRejection(frame)) {
      throw new AuthenticationError(frame.message ?? 'credentials rejected');
    }
  }

  private assertCurrent(transport: SessionTransport) {
    if (this.shuttingDown) throw new ShutdownError();
    if (this.transport !== transport) throw new ConnectionLostError('socket closed during handshake');
  }

  private logFailedAttempt(err: unknown) {
    if (err instanceof ShutdownError) return;
    if (err instanceof AuthenticationError) {
      this.logger.error(err.message);
      return;
    }
    this.logger.warn(`Broker connection attempt failed: ${describeError(err)}`);
  }

  /**
   * Tear down after the socket closed or a write failed. Only the current
   * transport counts; a loss out of `ready` starts the reconnect loop.
   */
  private handleConnectionLost(transport: SessionTransport, reason: string) {
    if (transport !== this.transport) return;
    this.transport = null;
    transport.close();

    const wasReady = this.state === 'ready';
    const failed = this.correlations.failAll(new ConnectionLostError(reason));
    this.logger.warn(`Broker connection lost: ${reason} (${failed} pending request(s) failed)`);
    if (this.shuttingDown || !wasReady) return;

    this.setState('disconnected');
    this.startConnectLoop(false);
  }

  /**
   * Re-send every registered subscription on a new session. A symbol the
   * broker rejects is dropped from the registry. One that times out or is
   * cut off by another loss is kept, so the next reconnect tries again.
   */
  private async resubscribeAll(transport: SessionTransport): Promise<void> {
    const entries = this.subscriptions.entries();
    if (entries.length === 0) return;
    this.logger.log(`Re-subscribing ${entries.length} symbol(s)…`);

    const results = await Promise.allSettled(
      entries.map((entry) =>
        this.exchange(
          transport,
          'subscribe',
          { symbol: entry.symbol, data_types: entry.dataTypes },
          this.settings.subscribeTimeoutMs,
        ),
      ),
    );

    results.forEach((result, i) => {
      const symbol = entries[i].symbol;
      if (result.status === 'rejected') {
        this.logger.error(`Re-subscribe failed for ${symbol}: ${describeError(result.reason)}`);
      } else if (isRejection(result.value)) {
        this.subscriptions.remove(symbol);
        this.logger.error(`Re-subscribe rejected for ${symbol}: ${result.value.message ?? 'no reason given'}`);
      } else {
        this.logger.log(`Re-subscribed: ${symbol}`);
      }
    });
  }

  /**
   * Route an inbound frame. A frame carrying a live correlation id settles
   * that request; otherwise its `type` selects a push event kind.
   */
  private handleFrame(raw: string) {
    let frame: BrokerFrame;
    try {
      frame = decodeFrame(raw);
    } catch (err) {
      this.logger.warn(`Dropping broker frame: ${describeError(err)}`);
      return;
    }

    const requestId = frame.requestId;
    if (requestId && this.correlations.has(requestId)) {
      this.correlations.resolve(requestId, frame);
      return;
    }

    const type = frame.type;
    switch (type) {
      case 'market_data':
      case 'order_update':
      case 'position_update':
        this.dispatcher.dispatch(type, frame.data ?? {});
        return;
      case 'error': {
        const message = frame.message ?? 'unknown error';
        this.logger.error(`Broker error: ${message}`);
        this.dispatcher.dispatch('error', { message, body: frame.body });
        return;
      }
      default:
        if (requestId) {
          this.logger.debug(`Ignoring late or unknown response ${requestId}`);
        } else {
          this.logger.debug(`Unhandled broker message type '${type ?? 'none'}'`);
        }
    }
  }

  private enterFailed() {
    const err = new ReconnectExhaustedError(this.reconnectAttempts);
    this.setState('failed');
    this.correlations.failAll(err);
    this.subscriptions.clear();
    this.logger.error(err.message);
    this.events.emit('broker.failed', err);
  }

  /** Every exit from `ready` fails whatever is still pending. */
  private setState(next: ConnectionState) {
    if (this.state === next) return;
    const previous = this.state;
    this.state = next;
    if (previous === 'ready') {
      this.correlations.failAll(new ConnectionLostError(`session left ready (${next})`));
    }
    const change: BrokerStateChange = { previous, current: next };
    this.events.emit('broker.state', change);
  }

  private backoff(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeFromBackoff = resolve;
      this.backoffTimer = setTimeout(() => {
        this.backoffTimer = null;
        this.wakeFromBackoff = null;
        resolve();
      }, ms);
    });
  }

  private cancelBackoff() {
    if (this.backoffTimer) {
      clearTimeout(this.backoffTimer);
      this.backoffTimer = null;
    }
    const wake = this.wakeFromBackoff;
    this.wakeFromBackoff = null;
    wake?.();
  }
}
