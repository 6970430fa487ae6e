import { isRecord } from '../broker/frame.codec';
import { ValidationResult } from '../orders/order-validation.util';
import { ClientMessage } from './client-message.types';

const INVALID_FORMAT = 'Invalid message format';

/**
 * Check the shape of a parsed client message. The error is the text sent
 * back to the client.
 */
export function validateClientMessage(raw: unknown): ValidationResult<ClientMessage> {
  if (!isRecord(raw)) return invalid(INVALID_FORMAT);
  const action = raw.action;
  if (typeof action !== 'string') return invalid(INVALID_FORMAT);

  switch (action) {
    case 'subscribe':
    case 'unsubscribe': {
      const symbol = normalizeSymbol(raw.symbol);
      if (!symbol) return invalid(INVALID_FORMAT);
      return action === 'subscribe'
        ? { ok: true, value: { action: 'subscribe', symbol } }
        : { ok: true, value: { action: 'unsubscribe', symbol } };
    }
    case 'place_order':
      if (raw.order === undefined) return invalid('Order data required');
      return { ok: true, value: { action: 'place_order', order: raw.order } };
    case 'cancel_order':
      return { ok: true, value: { action: 'cancel_order', orderId: raw.order_id } };
    case 'ping':
      return { ok: true, value: { action: 'ping', timestamp: raw.timestamp } };
    default:
      return invalid(`Unknown message type: ${action}`);
  }
}

function invalid(error: string): ValidationResult<ClientMessage> {
  return { ok: false, error };
}

function normalizeSymbol(raw: unknown): string | null {
  if (typeof raw !== 'string' || !raw.trim()) return null;
  return raw.trim().toUpperCase();
}
