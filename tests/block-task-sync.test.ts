/**
 * Tests for BlockTaskSynchronizer
 * Drives the synchronizer straight from dispatched bus messages.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { randomUUID } from 'crypto';

import { AccessResolver } from '../src/core/access-resolver.js';
import {
  BlockTaskSynchronizer,
  DEFAULT_TASK_TITLE,
  FALLBACK_CONTAINER_NAME,
  titleFromBlock,
  type SyncOutcome
} from '../src/core/block-task-sync.js';
import { OutboxDispatcher } from '../src/core/outbox-dispatcher.js';
import { MalformedInputError, UnauthorizedError } from '../src/core/errors.js';
import type { NoteStore } from '../src/core/note-store.js';
import type { Block, Note, Notebook } from '../src/core/types.js';
import { RecordingBus, createTempDir, createTestStore, removeTempDir } from './helpers.js';

const ECHO = { status: 'skipped', reason: 'echo of a synchronizer write' };

describe('BlockTaskSynchronizer', () => {
  let tempDir: string;
  let store: NoteStore;
  let bus: RecordingBus;
  let dispatcher: OutboxDispatcher;
  let sync: BlockTaskSynchronizer;
  let userId: string;
  let notebook: Notebook;
  let note: Note;

  /**
   * Dispatch pending rows and feed block/task messages to the synchronizer
   * until nothing new is published
   */
  async function pump(): Promise<SyncOutcome[]> {
    const outcomes: SyncOutcome[] = [];
    for (let round = 0; round < 10; round++) {
      const start = bus.published.length;
      await dispatcher.tick();
      const batch = bus.published.slice(start);
      if (batch.length === 0) break;

      for (const message of batch) {
        if (message.topic === 'block' || message.topic === 'task') {
          outcomes.push(await sync.handleMessage(message));
        }
      }
    }
    return outcomes;
  }

  async function taskBlock(text: string, target: Note = note): Promise<Block> {
    return store.createBlock(
      { noteId: target.id, userId: target.userId, type: 'task', content: { text } },
      { actorId: target.userId }
    );
  }

  beforeEach(async () => {
    tempDir = createTempDir();
    store = await createTestStore(tempDir);
    bus = new RecordingBus();
    dispatcher = new OutboxDispatcher(store.outbox, bus);
    const access = new AccessResolver(store.roles, store, { debug: false });
    sync = new BlockTaskSynchronizer(store, access, bus, { debug: false });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    userId = randomUUID();
    notebook = await store.createNotebook({ userId, name: 'Personal' }, { actorId: userId });
    note = await store.createNote({ userId, notebookId: notebook.id, title: 'Journal' }, { actorId: userId });
  });

  afterEach(async () => {
    await store.close();
    removeTempDir(tempDir);
    vi.restoreAllMocks();
  });

  describe('titleFromBlock', () => {
    it('keeps block text as stored and falls back to the default title when blank', async () => {
      expect(titleFromBlock(await taskBlock('  Buy milk  '))).toBe('  Buy milk  ');
      expect(titleFromBlock(await taskBlock('   '))).toBe(DEFAULT_TASK_TITLE);
    });
  });

  describe('block events', () => {
    it('creates a task for a new task block, then ignores the echo', async () => {
      const block = await taskBlock('Buy milk');

      const outcomes = await pump();

      const [task] = await store.findTasksByBlockId(block.id);
      expect(outcomes).toEqual([
        { status: 'applied', writes: [{ op: 'createTask', id: task.id }] },
        ECHO
      ]);
      expect(task).toMatchObject({
        userId,
        title: 'Buy milk',
        isCompleted: false,
        blockId: block.id,
        metadata: { note_id: note.id, _sync_source: 'task' }
      });
    });

    it('ignores blocks that are not tasks', async () => {
      await store.createBlock({ noteId: note.id, userId, type: 'text', content: { text: 'prose' } }, { actorId: userId });

      expect(await pump()).toEqual([{ status: 'skipped', reason: 'block is not a task' }]);
    });

    it('copies text and completion changes onto the linked task', async () => {
      const block = await taskBlock('Buy milk');
      await pump();

      await store.updateBlock(block.id, { content: { text: 'Buy oat milk' } }, { actorId: userId });
      await pump();
      await store.updateBlock(block.id, { metadata: { ...block.metadata, is_completed: true } }, { actorId: userId });
      const outcomes = await pump();

      const [task] = await store.findTasksByBlockId(block.id);
      expect(outcomes).toEqual([{ status: 'applied', writes: [{ op: 'updateTask', id: task.id }] }, ECHO]);
      expect(task.title).toBe('Buy oat milk');
      expect(task.isCompleted).toBe(true);
    });

    it('skips an update that changes nothing the task mirrors', async () => {
      const block = await taskBlock('Buy milk');
      await pump();

      await store.updateBlock(block.id, { order: 5 }, { actorId: userId });

      expect(await pump()).toEqual([{ status: 'skipped', reason: 'task already in sync' }]);
    });

    it('does not rewrite a task whose title keeps trailing whitespace', async () => {
      const task = await store.createTask(
        { userId, title: 'Buy milk ', metadata: { note_id: note.id } },
        { actorId: userId }
      );
      await pump();
      const [block] = await store.listBlocksByNote(note.id);
      expect(block.content.text).toBe('Buy milk ');

      await store.updateBlock(block.id, { order: 5 }, { actorId: userId });

      expect(await pump()).toEqual([{ status: 'skipped', reason: 'task already in sync' }]);
      expect((await store.getTask(task.id))?.title).toBe('Buy milk ');
    });

    it('writes the task at most once for a redelivered update', async () => {
      const block = await taskBlock('Buy milk');
      await pump();

      await store.updateBlock(block.id, { content: { text: 'Buy bread' } }, { actorId: userId });
      await dispatcher.tick();
      const message = bus.published.at(-1);
      expect(message?.key).toBe('block.updated');

      if (message) {
        const updateTask = vi.spyOn(store, 'updateTask');
        expect((await sync.handleMessage(message)).status).toBe('applied');
        expect(await sync.handleMessage(message)).toEqual({ status: 'skipped', reason: 'task already in sync' });
        expect(updateTask).toHaveBeenCalledTimes(1);
      }
    });

    it('deletes the task when the block stops being a task', async () => {
      const block = await taskBlock('Buy milk');
      await pump();
      const [task] = await store.findTasksByBlockId(block.id);

      await store.updateBlock(block.id, { type: 'text' }, { actorId: userId });
      const outcomes = await pump();

      expect(outcomes).toEqual([{ status: 'applied', writes: [{ op: 'deleteTask', id: task.id }] }, ECHO]);
      expect(await store.getTask(task.id)).toBeNull();
    });

    it('creates a task when a block becomes a task', async () => {
      const block = await store.createBlock(
        { noteId: note.id, userId, type: 'text', content: { text: 'Pay rent' } },
        { actorId: userId }
      );
      await pump();

      await store.updateBlock(block.id, { type: 'task' }, { actorId: userId });
      await pump();

      const tasks = await store.findTasksByBlockId(block.id);
      expect(tasks).toHaveLength(1);
      expect(tasks[0].title).toBe('Pay rent');
    });

    it('deletes the linked task with its block', async () => {
      const block = await taskBlock('Buy milk');
      await pump();
      const [task] = await store.findTasksByBlockId(block.id);

      await store.deleteBlock(block.id, { actorId: userId });
      const outcomes = await pump();

      expect(outcomes[0]).toEqual({ status: 'applied', writes: [{ op: 'deleteTask', id: task.id }] });
      expect(await store.getTask(task.id)).toBeNull();
    });

    it('reports a deleted block with no task as a no-op', async () => {
      const block = await store.createBlock({ noteId: note.id, userId, type: 'text' }, { actorId: userId });
      await pump();

      await store.deleteBlock(block.id, { actorId: userId });
      expect(await pump()).toEqual([{ status: 'skipped', reason: 'no linked task' }]);
    });
  });

  describe('task events', () => {
    it('synthesizes a block in the preferred note and links it back', async () => {
      const task = await store.createTask(
        { userId, title: 'Call the bank', metadata: { note_id: note.id } },
        { actorId: userId }
      );

      const outcomes = await pump();

      const blocks = await store.listBlocksByNote(note.id);
      expect(blocks).toHaveLength(1);
      expect(blocks[0]).toMatchObject({
        type: 'task',
        content: { text: 'Call the bank' },
        metadata: { is_completed: false, task_id: task.id, _sync_source: 'block' }
      });
      expect(outcomes).toEqual([
        {
          status: 'applied',
          writes: [
            { op: 'createBlock', id: blocks[0].id },
            { op: 'updateTask', id: task.id }
          ]
        },
        ECHO,
        ECHO
      ]);
      expect((await store.getTask(task.id))?.blockId).toBe(blocks[0].id);
    });

    it('falls back to the primary note when the preferred one is not editable', async () => {
      const stranger = randomUUID();
      const theirBook = await store.createNotebook({ userId: stranger, name: 'Theirs' }, { actorId: stranger });
      const theirNote = await store.createNote({ userId: stranger, notebookId: theirBook.id, title: 'Private' }, { actorId: stranger });
      const primary = await store.createNote(
        { userId, notebookId: notebook.id, title: 'Home', isPrimary: true },
        { actorId: userId }
      );

      await store.createTask({ userId, title: 'Water plants', metadata: { note_id: theirNote.id } }, { actorId: userId });
      await pump();

      expect(await store.listBlocksByNote(theirNote.id)).toEqual([]);
      expect((await store.listBlocksByNote(primary.id)).map(b => b.content.text)).toEqual(['Water plants']);
    });

    it('uses the first note when there is no primary', async () => {
      await store.createTask({ userId, title: 'Stretch' }, { actorId: userId });
      await pump();

      expect((await store.listBlocksByNote(note.id)).map(b => b.content.text)).toEqual(['Stretch']);
    });

    it('creates a notebook and note for a user with none', async () => {
      const newcomer = randomUUID();
      const task = await store.createTask({ userId: newcomer, title: 'Set up profile' }, { actorId: newcomer });

      const outcomes = await pump();

      const [createdBook] = await store.listNotebooksByUser(newcomer);
      const [createdNote] = await store.listNotesByUser(newcomer);
      expect(createdBook.name).toBe(FALLBACK_CONTAINER_NAME);
      expect(createdNote).toMatchObject({ title: 'Tasks', notebookId: createdBook.id });

      const [block] = await store.listBlocksByNote(createdNote.id);
      expect(outcomes[0]).toEqual({
        status: 'applied',
        writes: [
          { op: 'createNotebook', id: createdBook.id },
          { op: 'createNote', id: createdNote.id },
          { op: 'createBlock', id: block.id },
          { op: 'updateTask', id: task.id }
        ]
      });
      expect(outcomes.slice(1)).toEqual([ECHO, ECHO]);
    });

    it('copies task changes onto the block without echoing back', async () => {
      const task = await store.createTask({ userId, title: 'Call the bank', metadata: { note_id: note.id } }, { actorId: userId });
      await pump();

      await store.updateTask(task.id, { title: 'Call the bank today', isCompleted: true }, { actorId: userId });
      const updateTask = vi.spyOn(store, 'updateTask');
      const outcomes = await pump();

      const [block] = await store.listBlocksByNote(note.id);
      expect(outcomes).toEqual([{ status: 'applied', writes: [{ op: 'updateBlock', id: block.id }] }, ECHO]);
      expect(block.content.text).toBe('Call the bank today');
      expect(block.metadata.is_completed).toBe(true);
      expect(updateTask).not.toHaveBeenCalled();
    });

    it('skips a task update the block already reflects', async () => {
      const task = await store.createTask({ userId, title: 'Call the bank', metadata: { note_id: note.id } }, { actorId: userId });
      await pump();

      await store.updateTask(task.id, { title: 'Call the bank' }, { actorId: userId });

      expect(await pump()).toEqual([{ status: 'skipped', reason: 'block already in sync' }]);
    });

    it('turns a linked block of another type into a task block', async () => {
      const block = await store.createBlock(
        { noteId: note.id, userId, type: 'text', content: { text: 'draft' } },
        { actorId: userId }
      );
      await pump();

      const task = await store.createTask({ userId, title: 'Finish draft', blockId: block.id }, { actorId: userId });
      const outcomes = await pump();

      expect(outcomes).toEqual([{ status: 'applied', writes: [{ op: 'updateBlock', id: block.id }] }, ECHO]);
      expect(await store.getBlock(block.id)).toMatchObject({
        type: 'task',
        content: { text: 'Finish draft' },
        metadata: { is_completed: false, task_id: task.id }
      });
    });

    it('keeps the block and marks it when its task is deleted', async () => {
      const task = await store.createTask({ userId, title: 'Call the bank', metadata: { note_id: note.id } }, { actorId: userId });
      await pump();

      await store.deleteTask(task.id, { actorId: userId });
      const outcomes = await pump();

      const [block] = await store.listBlocksByNote(note.id);
      expect(outcomes).toEqual([{ status: 'applied', writes: [{ op: 'updateBlock', id: block.id }] }, ECHO]);
      expect(block.metadata).toMatchObject({ task_deleted: true, task_id: task.id });
      expect(typeof block.metadata.deleted_at).toBe('string');
    });

    it('ignores deletion of a task that never had a block', async () => {
      const task = await store.createTask({ userId, title: 'Loose' }, { actorId: userId });
      await store.deleteTask(task.id, { actorId: userId });

      // task.created finds the task already gone
      expect(await pump()).toEqual([
        { status: 'skipped', reason: 'task not found' },
        { status: 'skipped', reason: 'no block reference' }
      ]);
    });
  });

  describe('failures', () => {
    it('refuses to write a block the acting user cannot edit', async () => {
      const block = await store.createBlock(
        { noteId: note.id, userId, type: 'text', content: { text: 'mine' } },
        { actorId: userId }
      );
      await pump();

      const intruder = randomUUID();
      await store.createTask({ userId: intruder, title: 'hijack', blockId: block.id }, { actorId: intruder });
      await dispatcher.tick();
      const message = bus.published.at(-1);
      expect(message?.key).toBe('task.created');

      if (message) {
        await expect(sync.handleMessage(message)).rejects.toBeInstanceOf(UnauthorizedError);
      }
      expect((await store.getBlock(block.id))?.type).toBe('text');
    });

    it('rejects a malformed envelope', async () => {
      await expect(sync.handleMessage({ topic: 'block', key: 'block.created', value: '{"entity":"block"}' }))
        .rejects.toBeInstanceOf(MalformedInputError);
    });
  });
});
