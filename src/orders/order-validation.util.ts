import { Logger } from '@nestjs/common';
import { OrderSide, OrderSpec, OrderType } from '../broker/broker.types';
import { isRecord } from '../broker/frame.codec';

const logger = new Logger('OrderValidation');

const KNOWN_SYMBOLS = new Set(['MES', 'ES', 'NQ', 'YM']);
const SIDES: readonly OrderSide[] = ['buy', 'sell'];
const TYPES: readonly OrderType[] = ['market', 'limit', 'stop', 'stop_limit'];

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Validate an order request body (`symbol`, `side`, `order_type`, `quantity`,
 * `price`, `stop_price`). Symbols are upper-cased; a symbol outside the known
 * contract list is accepted with a warning.
 */
export function validateOrder(raw: unknown, maxQuantity: number): ValidationResult<OrderSpec> {
  if (!isRecord(raw)) return invalid('order must be an object');

  if (typeof raw.symbol !== 'string' || !raw.symbol.trim()) return invalid('symbol is required');
  const symbol = raw.symbol.trim().toUpperCase();
  if (!KNOWN_SYMBOLS.has(symbol)) {
    logger.warn(`Trading symbol ${symbol} not in approved list`);
  }

  const side = SIDES.find((s) => s === lower(raw.side));
  if (!side) return invalid(`side must be one of ${SIDES.join(', ')}`);

  const type = TYPES.find((t) => t === lower(raw.order_type));
  if (!type) return invalid(`order_type must be one of ${TYPES.join(', ')}`);

  const quantity = raw.quantity;
  if (typeof quantity !== 'number' || !Number.isInteger(quantity) || quantity <= 0) {
    return invalid('quantity must be a positive integer');
  }
  if (quantity > maxQuantity) return invalid(`quantity cannot exceed ${maxQuantity}`);

  const price = optionalNumber(raw.price);
  if (price === null) return invalid('price must be a number');
  if ((type === 'limit' || type === 'stop_limit') && price === undefined) {
    return invalid('price is required for limit and stop_limit orders');
  }
  if (price !== undefined && price <= 0) return invalid('price must be positive');

  const stopPrice = optionalNumber(raw.stop_price);
  if (stopPrice === null) return invalid('stop_price must be a number');
  if ((type === 'stop' || type === 'stop_limit') && stopPrice === undefined) {
    return invalid('stop_price is required for stop and stop_limit orders');
  }
  if (stopPrice !== undefined && stopPrice <= 0) return invalid('stop_price must be positive');

  const order: OrderSpec = { symbol, side, type, quantity };
  if (price !== undefined) order.price = price;
  if (stopPrice !== undefined) order.stopPrice = stopPrice;
  return { ok: true, value: order };
}

export function validateOrderId(raw: unknown): ValidationResult<string> {
  if (typeof raw !== 'string' || !raw.trim()) return invalid('order_id cannot be empty');
  return { ok: true, value: raw.trim() };
}

function invalid<T>(error: string): ValidationResult<T> {
  return { ok: false, error };
}

function lower(value: unknown): string | undefined {
  return typeof value === 'string' ? value.toLowerCase() : undefined;
}

/** `undefined` when absent, `null` when present but not a finite number. */
function optionalNumber(value: unknown): number | undefined | null {
  if (value === undefined || value === null) return undefined;
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
