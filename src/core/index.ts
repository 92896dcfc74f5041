/**
 * Core module exports
 */

// Types & errors
export * from './types.js';
export * from './errors.js';

// Storage
export * from './sqlite-wrapper.js';
export * from './event-outbox.js';
export * from './role-repo.js';
export * from './note-store.js';

// Access
export * from './resource-tree.js';
export * from './access-resolver.js';

// Transport
export * from './channel.js';
export * from './message-bus.js';
export * from './envelope.js';

// Workers
export * from './outbox-dispatcher.js';
export * from './block-task-sync.js';
export * from './resource-extractor.js';
export * from './fanout-hub.js';

// Config
export * from './config.js';
