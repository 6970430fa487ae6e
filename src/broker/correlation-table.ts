import { Logger } from '@nestjs/common';
import { RequestTimeoutError } from './broker.errors';

interface PendingRequest<T> {
  resolve: (result: T) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export interface PendingHandle<T> {
  id: string;
  /** Epoch millis after which the request times out */
  deadline: number;
  /** Settles exactly once: payload, failure, or {@link RequestTimeoutError} */
  result: Promise<T>;
}

/**
 * Outstanding requests keyed by correlation id.
 *
 * Each entry settles once. Whichever of {@link resolve}, {@link fail} or the
 * deadline timer comes first removes the entry; later attempts return
 * `false`. The deadline is armed at registration, so time spent waiting on
 * the write queue counts against the caller.
 */
export class CorrelationTable<T> {
  private readonly logger = new Logger(CorrelationTable.name);
  private readonly pending = new Map<string, PendingRequest<T>>();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Create a pending slot for `id`.
   *
   * @throws If `id` is already live.
   */
  register(id: string, timeoutMs: number): PendingHandle<T> {
    if (this.pending.has(id)) {
      throw new Error(`correlation id ${id} is already pending`);
    }
    const deadline = this.now() + timeoutMs;

    const result = new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new RequestTimeoutError(id, timeoutMs));
      }, timeoutMs);
      this.pending.set(id, { resolve, reject, timer });
    });

    return { id, deadline, result };
  }

  /** Settle `id` with a payload. Unknown or already-settled ids are ignored. */
  resolve(id: string, payload: T): boolean {
    const entry = this.take(id);
    if (!entry) {
      this.logger.debug(`No pending request for ${id}, dropping late response`);
      return false;
    }
    entry.resolve(payload);
    return true;
  }

  fail(id: string, err: Error): boolean {
    const entry = this.take(id);
    if (!entry) return false;
    entry.reject(err);
    return true;
  }

  /** Fail every live entry with `err` and return how many there were. */
  failAll(err: Error): number {
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) {
      clearTimeout(entry.timer);
      entry.reject(err);
    }
    return entries.length;
  }

  has(id: string): boolean {
    return this.pending.has(id);
  }

  get size(): number {
    return this.pending.size;
  }

  private take(id: string): PendingRequest<T> | undefined {
    const entry = this.pending.get(id);
    if (!entry) return undefined;
    clearTimeout(entry.timer);
    this.pending.delete(id);
    return entry;
  }
}
