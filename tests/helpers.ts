/**
 * Shared test fixtures: temp-dir stores, a recording bus and a fake socket.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { NoteStore } from '../src/core/note-store.js';
import { TransientError } from '../src/core/errors.js';
import type { BusHandler, BusMessage, BusSubscription, MessageBus } from '../src/core/message-bus.js';
import type { ClientSocket } from '../src/core/fanout-hub.js';

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'notes-realtime-test-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export async function createTestStore(dir: string): Promise<NoteStore> {
  const store = new NoteStore(path.join(dir, 'notes.sqlite'));
  await store.initialize();
  return store;
}

/**
 * Bus that records publishes and can be switched off to simulate an outage
 */
export class RecordingBus implements MessageBus {
  readonly published: BusMessage[] = [];
  available = true;
  failWhen: ((message: BusMessage) => boolean) | null = null;

  async publish(message: BusMessage): Promise<void> {
    if (!this.available || (this.failWhen && this.failWhen(message))) {
      throw new TransientError('bus unavailable');
    }
    this.published.push(message);
  }

  subscribe(topics: readonly string[], group: string, _handler: BusHandler): BusSubscription {
    return { topics, group, close: async () => undefined };
  }

  async close(): Promise<void> {
    this.available = false;
  }
}

/**
 * In-memory ClientSocket. `stalled` makes every send hang until release().
 */
export class FakeSocket implements ClientSocket {
  readonly sent: string[] = [];
  closed: { code?: number; reason?: string } | null = null;
  terminated = false;
  pings = 0;
  stalled = false;

  private messageListeners: Array<(data: string) => void> = [];
  private pongListeners: Array<() => void> = [];
  private closeListeners: Array<() => void> = [];
  private pendingSends: Array<() => void> = [];

  send(data: string): Promise<void> {
    if (this.stalled) {
      return new Promise(resolve => {
        this.pendingSends.push(() => {
          this.sent.push(data);
          resolve();
        });
      });
    }
    this.sent.push(data);
    return Promise.resolve();
  }

  ping(): void {
    this.pings++;
  }

  close(code?: number, reason?: string): void {
    if (this.closed) return;
    this.closed = { code, reason };
  }

  terminate(): void {
    this.terminated = true;
  }

  onMessage(listener: (data: string) => void): void {
    this.messageListeners.push(listener);
  }

  onPong(listener: () => void): void {
    this.pongListeners.push(listener);
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  /** Simulate an inbound frame from the client */
  receive(data: unknown): void {
    const raw = typeof data === 'string' ? data : JSON.stringify(data);
    for (const listener of this.messageListeners) listener(raw);
  }

  pong(): void {
    for (const listener of this.pongListeners) listener();
  }

  /** Simulate the peer disconnecting */
  disconnect(): void {
    for (const listener of this.closeListeners) listener();
  }

  release(): void {
    this.stalled = false;
    for (const resume of this.pendingSends.splice(0)) resume();
  }

  frames(): unknown[] {
    return this.sent.map(frame => JSON.parse(frame));
  }
}
