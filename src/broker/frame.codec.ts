import { describeError, FrameDecodeError } from './broker.errors';
import { BrokerFrame } from './broker.types';

export type BrokerAction =
  | 'authenticate'
  | 'subscribe'
  | 'unsubscribe'
  | 'place_order'
  | 'cancel_order'
  | 'get_positions'
  | 'get_account_info';

/**
 * Serialize a request frame. Fields whose value is `undefined` are left out
 * so optional order attributes never reach the wire as `null`.
 */
export function encodeRequest(
  action: BrokerAction,
  requestId: string,
  fields: Record<string, unknown> = {},
  now: Date = new Date(),
): string {
  const frame: Record<string, unknown> = { action, request_id: requestId };
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) frame[key] = value;
  }
  frame.timestamp = now.toISOString();
  return JSON.stringify(frame);
}

/**
 * Parse one inbound text frame.
 *
 * @throws FrameDecodeError if the text is not JSON or not a JSON object.
 */
export function decodeFrame(raw: string): BrokerFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new FrameDecodeError(describeError(err));
  }
  if (!isRecord(parsed)) {
    throw new FrameDecodeError('frame is not a JSON object');
  }

  return {
    type: stringField(parsed, 'type'),
    requestId: stringField(parsed, 'request_id'),
    status: stringField(parsed, 'status'),
    message: stringField(parsed, 'message'),
    data: isRecord(parsed.data) ? parsed.data : undefined,
    body: parsed,
  };
}

/** A response the broker marked as failed. */
export function isRejection(frame: BrokerFrame): boolean {
  return frame.status === 'error' || frame.status === 'rejected' || frame.type === 'error';
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}
