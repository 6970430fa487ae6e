import { Logger } from '@nestjs/common';
import { describeError } from './broker.errors';
import { BrokerEventHandler, BrokerEventKind, BrokerEventMap } from './broker.types';

type HandlerTable = { [K in BrokerEventKind]: Array<BrokerEventHandler<K>> };

/**
 * Routes push events to the handlers registered for their kind.
 *
 * Handlers run synchronously on the read path, in registration order. A
 * handler that throws, or returns a promise that rejects, is logged and
 * skipped; it never reaches the transport or the other handlers.
 */
export class EventDispatcher {
  private readonly logger = new Logger(EventDispatcher.name);
  private readonly handlers: HandlerTable = {
    market_data: [],
    order_update: [],
    position_update: [],
    error: [],
  };

  /** @returns A function that removes this registration. */
  register<K extends BrokerEventKind>(kind: K, handler: BrokerEventHandler<K>): () => void {
    const list: Array<BrokerEventHandler<K>> = this.handlers[kind];
    list.push(handler);
    return () => {
      const idx = list.indexOf(handler);
      if (idx !== -1) list.splice(idx, 1);
    };
  }

  /** @returns The number of handlers invoked. */
  dispatch<K extends BrokerEventKind>(kind: K, payload: BrokerEventMap[K]): number {
    const list: Array<BrokerEventHandler<K>> = [...this.handlers[kind]];
    for (const handler of list) {
      try {
        const result = handler(payload);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.logHandlerFailure(kind, err));
        }
      } catch (err) {
        this.logHandlerFailure(kind, err);
      }
    }
    return list.length;
  }

  count(kind: BrokerEventKind): number {
    return this.handlers[kind].length;
  }

  private logHandlerFailure(kind: BrokerEventKind, err: unknown) {
    this.logger.error(`${kind} handler failed: ${describeError(err)}`);
  }
}
