import { Logger } from '@nestjs/common';
import WebSocket from 'ws';

/**
 * One physical connection to the broker. A transport is opened at most once;
 * reconnecting means creating a new one.
 */
export interface SessionTransport {
  readonly connected: boolean;
  /** Resolves once the socket is open, rejects if it fails or closes first. */
  open(url: string): Promise<void>;
  /** Resolves once the frame is handed to the socket. */
  send(frame: string): Promise<void>;
  /** Idempotent; safe to call in any state. */
  close(): void;
  onFrame(listener: (raw: string) => void): void;
  /** Called once when an open socket closes or breaks without {@link close}. */
  onClose(listener: (reason: string) => void): void;
}

export type TransportFactory = () => SessionTransport;

export const SESSION_TRANSPORT_FACTORY = Symbol('SESSION_TRANSPORT_FACTORY');

/** {@link SessionTransport} over a `ws` client socket with keepalive pings. */
export class WsTransport implements SessionTransport {
  private readonly logger = new Logger(WsTransport.name);
  private ws: WebSocket | null = null;
  private pingInterval: ReturnType<typeof setInterval> | null = null;
  private frameListener: ((raw: string) => void) | null = null;
  private closeListener: ((reason: string) => void) | null = null;
  private closing = false;

  constructor(private readonly pingIntervalMs: number) {}

  get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  onFrame(listener: (raw: string) => void) {
    this.frameListener = listener;
  }

  onClose(listener: (reason: string) => void) {
    this.closeListener = listener;
  }

  open(url: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.ws || this.closing) {
        return reject(new Error('transport already used'));
      }
      let opened = false;
      const ws = new WebSocket(url);
      this.ws = ws;

      ws.on('open', () => {
        opened = true;
        this.startPing();
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData) => {
        this.frameListener?.(data.toString());
      });

      ws.on('close', (code: number, reason: Buffer) => {
        this.stopPing();
        const text = `${code} ${reason.toString()}`.trim();
        if (!opened) {
          reject(new Error(`socket closed before open (${text})`));
          return;
        }
        if (!this.closing) this.closeListener?.(text);
      });

      ws.on('error', (err: Error) => {
        this.logger.error(`Broker socket error: ${err.message}`);
        if (!opened) reject(err);
      });
    });
  }

  send(frame: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = this.ws;
      if (!ws || ws.readyState !== WebSocket.OPEN) {
        return reject(new Error('socket not connected'));
      }
      ws.send(frame, (err?: Error) => (err ? reject(err) : resolve()));
    });
  }

  close() {
    this.closing = true;
    this.stopPing();
    const ws = this.ws;
    if (!ws) return;
    if (ws.readyState === WebSocket.CLOSING || ws.readyState === WebSocket.CLOSED) return;
    ws.close(1000, 'client closing');
  }

  private startPing() {
    this.stopPing();
    this.pingInterval = setInterval(() => {
      if (this.ws?.readyState === WebSocket.OPEN) {
        this.ws.ping();
      }
    }, this.pingIntervalMs);
  }

  private stopPing() {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }
}
