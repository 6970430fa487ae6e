import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import WebSocket from 'ws';
import { ServerMessage } from './client-message.types';

/**
 * Registry of connected downstream WebSocket clients.
 *
 * Maintains bidirectional mappings between connection UUIDs and WebSocket
 * instances so broker push events can be fanned out without other services
 * holding socket references.
 */
@Injectable()
export class ClientConnectionService {
  private readonly logger = new Logger(ClientConnectionService.name);
  private readonly idToWs = new Map<string, WebSocket>();
  private readonly wsToId = new Map<WebSocket, string>();

  /** Assign a UUID to the WebSocket and store both mappings. */
  register(ws: WebSocket): string {
    const connectionId = randomUUID();
    this.idToWs.set(connectionId, ws);
    this.wsToId.set(ws, connectionId);
    return connectionId;
  }

  getId(ws: WebSocket): string | undefined {
    return this.wsToId.get(ws);
  }

  remove(connectionId: string) {
    const ws = this.idToWs.get(connectionId);
    if (ws) {
      this.wsToId.delete(ws);
    }
    this.idToWs.delete(connectionId);
  }

  /**
   * JSON-serialize and send a message to one client. Returns `false` when the
   * socket is gone or the write throws.
   */
  send(connectionId: string, data: ServerMessage): boolean {
    const ws = this.idToWs.get(connectionId);
    if (!ws || ws.readyState !== WebSocket.OPEN) return false;
    try {
      ws.send(JSON.stringify(data));
      return true;
    } catch (err) {
      this.logger.error(`Failed to send to ${connectionId}: ${err}`);
      return false;
    }
  }

  /** Send to every client, dropping those whose send fails. */
  broadcast(data: ServerMessage): number {
    let delivered = 0;
    for (const connectionId of [...this.idToWs.keys()]) {
      if (this.send(connectionId, data)) {
        delivered++;
      } else {
        this.logger.warn(`Dropping unreachable client ${connectionId}`);
        this.remove(connectionId);
      }
    }
    return delivered;
  }

  get size(): number {
    return this.idToWs.size;
  }
}
