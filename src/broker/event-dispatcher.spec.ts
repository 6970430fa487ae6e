import { EventDispatcher } from './event-dispatcher';

describe('EventDispatcher', () => {
  it('routes each event to the handlers of its kind only', () => {
    const dispatcher = new EventDispatcher();
    const onMarket = jest.fn();
    const onPosition = jest.fn();
    dispatcher.register('market_data', onMarket);
    dispatcher.register('position_update', onPosition);

    expect(dispatcher.dispatch('market_data', { symbol: 'MES' })).toBe(1);

    expect(onMarket).toHaveBeenCalledWith({ symbol: 'MES' });
    expect(onPosition).not.toHaveBeenCalled();
  });

  it('calls handlers in registration order', () => {
    const dispatcher = new EventDispatcher();
    const calls: string[] = [];
    dispatcher.register('order_update', () => {
      calls.push('first');
    });
    dispatcher.register('order_update', () => {
      calls.push('second');
    });

    dispatcher.dispatch('order_update', {});

    expect(calls).toEqual(['first', 'second']);
  });

  it('isolates handlers that throw or reject', async () => {
    const dispatcher = new EventDispatcher();
    const after = jest.fn();
    dispatcher.register('market_data', () => {
      throw new Error('sync failure');
    });
    dispatcher.register('market_data', () => Promise.reject(new Error('async failure')));
    dispatcher.register('market_data', after);

    expect(() => dispatcher.dispatch('market_data', { symbol: 'ES' })).not.toThrow();
    await Promise.resolve();

    expect(after).toHaveBeenCalledTimes(1);
  });

  it('unregisters a handler', () => {
    const dispatcher = new EventDispatcher();
    const handler = jest.fn();
    const off = dispatcher.register('error', handler);

    off();
    off();

    expect(dispatcher.count('error')).toBe(0);
    expect(dispatcher.dispatch('error', { message: 'x', body: {} })).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });
});
