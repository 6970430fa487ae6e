import type { BrokerFrame } from './broker.types';

/** Base class for every failure raised by the broker session. */
export class BrokerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A request was issued while the session was not `ready`. */
export class NotReadyError extends BrokerError {
  constructor(readonly state: string) {
    super(`broker session not ready (state: ${state})`);
  }
}

/** The connection that was supposed to answer a request went away. */
export class ConnectionLostError extends BrokerError {
  constructor(reason: string) {
    super(`broker connection lost: ${reason}`);
  }
}

export class ShutdownError extends BrokerError {
  constructor() {
    super('broker session shutting down');
  }
}

export class RequestTimeoutError extends BrokerError {
  constructor(
    readonly requestId: string,
    readonly timeoutMs: number,
  ) {
    super(`request ${requestId} timed out after ${timeoutMs}ms`);
  }
}

/** The broker answered, but with an error status. */
export class BrokerRejectedError extends BrokerError {
  constructor(
    readonly action: string,
    reason: string,
    readonly response: BrokerFrame,
  ) {
    super(`${action} rejected by broker: ${reason}`);
  }
}

export class AuthenticationError extends BrokerError {
  constructor(reason: string) {
    super(`broker authentication failed: ${reason}`);
  }
}

export class ReconnectExhaustedError extends BrokerError {
  constructor(readonly attempts: number) {
    super(`giving up on broker after ${attempts} reconnect attempts`);
  }
}

export class FrameDecodeError extends BrokerError {
  constructor(reason: string) {
    super(`cannot decode broker frame: ${reason}`);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
