/**
 * Produces correlation ids of the form `req_<seq>_<epoch>`.
 *
 * The sequence is monotonic for the life of the generator; the epoch is the
 * creation time in base 36, so ids from a restarted process never collide
 * with late responses addressed to the previous one.
 */
export class CorrelationIdGenerator {
  private seq = 0;
  private readonly epoch: string;

  constructor(startedAt: number = Date.now()) {
    this.epoch = startedAt.toString(36);
  }

  next(): string {
    this.seq++;
    return `req_${this.seq}_${this.epoch}`;
  }

  /** Number of ids handed out so far. */
  get issued(): number {
    return this.seq;
  }
}
