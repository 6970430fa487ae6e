import { Logger } from '@nestjs/common';
import { validateOrder, validateOrderId } from './order-validation.util';

describe('validateOrder', () => {
  const base = { symbol: 'mes', side: 'BUY', order_type: 'market', quantity: 2 };

  it('accepts a market order and normalizes its fields', () => {
    expect(validateOrder(base, 10)).toEqual({
      ok: true,
      value: { symbol: 'MES', side: 'buy', type: 'market', quantity: 2 },
    });
  });

  it('carries price and stop price for a stop limit order', () => {
    expect(
      validateOrder({ ...base, order_type: 'stop_limit', price: 5012.25, stop_price: 5010 }, 10),
    ).toEqual({
      ok: true,
      value: { symbol: 'MES', side: 'buy', type: 'stop_limit', quantity: 2, price: 5012.25, stopPrice: 5010 },
    });
  });

  it('warns about symbols outside the approved list but accepts them', () => {
    const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    const result = validateOrder({ ...base, symbol: 'cl' }, 10);
    expect(result.ok).toBe(true);
    expect(warn).toHaveBeenCalledWith('Trading symbol CL not in approved list');
    warn.mockRestore();
  });

  it.each([
    ['a non-object body', 'order', 'order must be an object'],
    ['a missing symbol', { ...base, symbol: '' }, 'symbol is required'],
    ['an unknown side', { ...base, side: 'hold' }, 'side must be one of buy, sell'],
    ['an unknown type', { ...base, order_type: 'iceberg' }, 'order_type must be one of market, limit, stop, stop_limit'],
    ['a fractional quantity', { ...base, quantity: 1.5 }, 'quantity must be a positive integer'],
    ['a zero quantity', { ...base, quantity: 0 }, 'quantity must be a positive integer'],
    ['a string quantity', { ...base, quantity: '2' }, 'quantity must be a positive integer'],
    ['too large a quantity', { ...base, quantity: 11 }, 'quantity cannot exceed 10'],
    ['a non-numeric price', { ...base, price: 'cheap' }, 'price must be a number'],
    ['a limit without price', { ...base, order_type: 'limit' }, 'price is required for limit and stop_limit orders'],
    ['a negative price', { ...base, order_type: 'limit', price: -1 }, 'price must be positive'],
    ['a stop without stop price', { ...base, order_type: 'stop' }, 'stop_price is required for stop and stop_limit orders'],
    ['a zero stop price', { ...base, order_type: 'stop', stop_price: 0 }, 'stop_price must be positive'],
  ])('rejects %s', (_label, raw, error) => {
    expect(validateOrder(raw, 10)).toEqual({ ok: false, error });
  });
});

describe('validateOrderId', () => {
  it('trims the id', () => {
    expect(validateOrderId('  ord-1 ')).toEqual({ ok: true, value: 'ord-1' });
  });

  it.each([[undefined], [''], ['   '], [12]])('rejects %p', (raw) => {
    expect(validateOrderId(raw)).toEqual({ ok: false, error: 'order_id cannot be empty' });
  });
});
