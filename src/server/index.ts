/**
 * Realtime HTTP Server
 * REST endpoints for operations plus the /ws fan-out endpoint
 */

import * as http from 'http';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { getRequestListener } from '@hono/node-server';
import type { WebSocketServer } from 'ws';

import type { RealtimeService } from '../services/realtime-service.js';
import { createApiRouter } from './api/index.js';
import { errorResponse } from './api/utils.js';
import { WS_PATH, attachWebSocket } from './websocket.js';

export interface ServerOptions {
  hostname?: string;
  port?: number;
  maxMessageBytes?: number;
  /** Request logging (default: true) */
  logRequests?: boolean;
}

export interface RunningServer {
  server: http.Server;
  wss: WebSocketServer;
  url: string;
  close(): Promise<void>;
}

export function createApp(service: RealtimeService, options: Pick<ServerOptions, 'logRequests'> = {}): Hono {
  const app = new Hono();

  // Middleware
  app.use('/*', cors());
  if (options.logRequests ?? true) {
    app.use('/*', logger());
  }

  // API routes
  app.route('/api', createApiRouter(service));

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  // Plain HTTP on the socket path
  app.get(WS_PATH, (c) => c.text('Upgrade Required', 426));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));
  app.onError((err, c) => errorResponse(c, err));

  return app;
}

/**
 * Start the HTTP server and attach the WebSocket endpoint
 */
export async function startServer(service: RealtimeService, options: ServerOptions = {}): Promise<RunningServer> {
  await service.initialize();

  const hostname = options.hostname ?? '127.0.0.1';
  const port = options.port ?? 8080;

  const app = createApp(service, options);
  const server = http.createServer(getRequestListener(app.fetch));
  const wss = attachWebSocket(server, service.hub, { maxPayload: options.maxMessageBytes });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, hostname, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const url = `http://${hostname}:${typeof address === 'object' && address ? address.port : port}`;
  console.log(`[Server] Listening on ${url} (WebSocket at ${WS_PATH})`);

  return {
    server,
    wss,
    url,
    close: async () => {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>(resolve => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    }
  };
}
