import { reconnectDelay } from './backoff.util';

describe('reconnectDelay', () => {
  it('grows linearly and stops at the cap', () => {
    expect([1, 2, 3, 12, 13].map((n) => reconnectDelay(n, 5_000, 60_000))).toEqual([
      5_000, 10_000, 15_000, 60_000, 60_000,
    ]);
  });

  it('treats attempt zero like the first attempt', () => {
    expect(reconnectDelay(0, 5_000, 60_000)).toBe(5_000);
  });
});
