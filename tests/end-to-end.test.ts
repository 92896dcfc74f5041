/**
 * Full pipeline through RealtimeService: store -> outbox -> bus -> synchronizer and hub
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { randomUUID } from 'crypto';
import * as path from 'path';

import { RealtimeService } from '../src/services/realtime-service.js';
import { FakeSocket, createTempDir, removeTempDir } from './helpers.js';

function eventNames(socket: FakeSocket): unknown[] {
  return socket.frames()
    .filter((frame): frame is { type: string; event: unknown } =>
      typeof frame === 'object' && frame !== null && 'type' in frame && frame.type === 'event' && 'event' in frame)
    .map(frame => frame.event);
}

describe('RealtimeService end to end', () => {
  let tempDir: string;
  let service: RealtimeService;

  beforeEach(async () => {
    tempDir = createTempDir();
    service = new RealtimeService({
      databasePath: path.join(tempDir, 'notes.sqlite'),
      dispatcher: { pollIntervalMs: 60000 },
      debug: false
    });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    await service.initialize();
  });

  afterEach(async () => {
    await service.shutdown();
    removeTempDir(tempDir);
    vi.restoreAllMocks();
  });

  it('keeps a task and its block in step from creation to deletion', async () => {
    const { store } = service;
    const userId = randomUUID();
    const notebook = await store.createNotebook({ userId, name: 'Home' }, { actorId: userId });
    const note = await store.createNote({ userId, notebookId: notebook.id, title: 'Chores' }, { actorId: userId });
    await service.settle();

    // create a task pointing at the note, with no block
    const task = await store.createTask(
      { userId, title: 'Take out recycling', metadata: { note_id: note.id } },
      { actorId: userId }
    );
    await service.settle();

    const [block] = await store.listBlocksByNote(note.id);
    expect(block).toMatchObject({
      type: 'task',
      content: { text: 'Take out recycling' },
      metadata: { is_completed: false, task_id: task.id }
    });
    expect((await store.getTask(task.id))?.blockId).toBe(block.id);

    // complete the task
    await store.updateTask(task.id, { isCompleted: true }, { actorId: userId });
    const updateTask = vi.spyOn(store, 'updateTask');
    await service.settle();

    expect((await store.getBlock(block.id))?.metadata.is_completed).toBe(true);
    expect(updateTask).not.toHaveBeenCalled();

    // delete the block
    await store.deleteBlock(block.id, { actorId: userId });
    await service.settle();

    expect(await store.getTask(task.id)).toBeNull();
    expect(await store.outbox.getPending()).toEqual([]);
    expect(service.synchronizer.getStats().failed).toBe(0);
  });

  it('fans synchronized writes out to subscribed clients', async () => {
    const { store, hub } = service;
    const userId = randomUUID();
    const notebook = await store.createNotebook({ userId, name: 'Home' }, { actorId: userId });
    const note = await store.createNote({ userId, notebookId: notebook.id, title: 'Chores' }, { actorId: userId });
    await service.settle();

    const socket = new FakeSocket();
    hub.handleConnection(socket, userId);
    socket.receive({ type: 'subscribe', payload: { resource: 'note', id: note.id } });
    await hub.flush();

    await store.createTask({ userId, title: 'Sweep', metadata: { note_id: note.id } }, { actorId: userId });
    await service.settle();
    await hub.flush();

    await vi.waitFor(() => {
      expect(eventNames(socket)).toEqual(['task.created', 'block.created', 'task.updated']);
    });
  });

  it('reports status across components', async () => {
    const userId = randomUUID();
    await service.store.createNotebook({ userId, name: 'Home' }, { actorId: userId });

    const before = await service.getStatus();
    expect(before.outbox.pendingCount).toBe(1);

    const result = await service.settle();
    expect(result).toEqual({ dispatched: 1, failed: 0 });
    await service.hub.flush();

    const after = await service.getStatus();
    expect(after.outbox).toMatchObject({ pendingCount: 0, dispatchedCount: 1, oldestPendingAge: null });
    expect(after.hub.received).toBe(1);
  });
});
