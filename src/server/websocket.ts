/**
 * WebSocket endpoint
 * Upgrades /ws requests and hands each socket to the fan-out hub.
 */

import type { IncomingHttpHeaders, Server } from 'http';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import type { ClientSocket, FanoutHub } from '../core/fanout-hub.js';

export const WS_PATH = '/ws';
export const ANONYMOUS_USER = 'anonymous';
export const DEFAULT_MAX_PAYLOAD = 512 * 1024;

export interface WebSocketOptions {
  path?: string;
  maxPayload?: number;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

/**
 * ClientSocket over a ws connection
 */
export class WsClientSocket implements ClientSocket {
  constructor(private readonly ws: WebSocket) {}

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.ws.send(data, err => (err ? reject(err) : resolve()));
    });
  }

  ping(): void {
    this.ws.ping();
  }

  close(code?: number, reason?: string): void {
    this.ws.close(code, reason);
  }

  terminate(): void {
    this.ws.terminate();
  }

  onMessage(listener: (data: string) => void): void {
    this.ws.on('message', (data: RawData) => listener(rawDataToString(data)));
  }

  onPong(listener: () => void): void {
    this.ws.on('pong', () => listener());
  }

  onClose(listener: () => void): void {
    this.ws.on('close', () => listener());
  }
}

/**
 * user_id query parameter, then X-User-ID header, else anonymous
 */
export function resolveUserId(url: URL, headers: IncomingHttpHeaders): string {
  const fromQuery = url.searchParams.get('user_id')?.trim();
  if (fromQuery) return fromQuery;

  const header = headers['x-user-id'];
  const fromHeader = (Array.isArray(header) ? header[0] : header)?.trim();
  if (fromHeader) return fromHeader;

  return ANONYMOUS_USER;
}

export function attachWebSocket(server: Server, hub: FanoutHub, options: WebSocketOptions = {}): WebSocketServer {
  const wsPath = options.path ?? WS_PATH;
  const wss = new WebSocketServer({ noServer: true, maxPayload: options.maxPayload ?? DEFAULT_MAX_PAYLOAD });

  server.on('upgrade', (request, socket, head) => {
    const onSocketError = (err: Error) => {
      console.warn(`[WebSocket] Upgrade socket error: ${err.message}`);
    };
    socket.on('error', onSocketError);

    const url = new URL(request.url ?? '/', `http://${request.headers.host ?? 'localhost'}`);
    if (url.pathname !== wsPath) {
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, ws => {
      socket.off('error', onSocketError);
      const userId = resolveUserId(url, request.headers);

      // Oversized or malformed frames surface here; ws then closes the socket
      // and the close listener unregisters the client.
      ws.on('error', err => {
        console.warn(`[WebSocket] Connection error for ${userId}: ${err.message}`);
      });
      hub.handleConnection(new WsClientSocket(ws), userId);
    });
  });

  wss.on('error', err => {
    console.error('[WebSocket] Server error:', err);
  });

  return wss;
}
