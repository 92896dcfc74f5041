/**
 * notes-realtime
 * Outbox dispatch, block/task synchronization, access resolution and WebSocket fan-out
 */

export * from './core/index.js';
export * from './services/realtime-service.js';
export { createApp, startServer } from './server/index.js';
export type { RunningServer, ServerOptions } from './server/index.js';
export { WsClientSocket, attachWebSocket, resolveUserId } from './server/websocket.js';
