/**
 * Block <-> Task Synchronizer
 * Keeps a task-typed Block and its Task record consistent in both directions.
 *
 * Every write made here carries _sync_source naming the side being written to,
 * and any inbound payload that carries _sync_source is dropped as an echo.
 */

import type { AccessResolver } from './access-resolver.js';
import type { BusMessage, BusSubscription, MessageBus } from './message-bus.js';
import type { NoteStore, UpdateBlockInput, UpdateTaskInput, WriteOptions } from './note-store.js';
import { ENTITY_TOPICS, hasSyncMarker, parseEnvelope } from './envelope.js';
import { UnauthorizedError, errorMessage } from './errors.js';
import {
  EVENT_TYPES,
  type Block,
  type BlockEnvelope,
  type BlockEventData,
  type Note,
  type ResourceKind,
  type Task,
  type TaskEnvelope,
  type TaskEventData
} from './types.js';

export const DEFAULT_TASK_TITLE = 'Untitled Task';
export const FALLBACK_CONTAINER_NAME = 'Tasks';

export type SyncWriteOp =
  | 'createTask'
  | 'updateTask'
  | 'deleteTask'
  | 'createBlock'
  | 'updateBlock'
  | 'createNote'
  | 'createNotebook';

export interface SyncWrite {
  op: SyncWriteOp;
  id: string;
}

export type SyncOutcome =
  | { status: 'skipped'; reason: string }
  | { status: 'applied'; writes: SyncWrite[] };

export interface SynchronizerStats {
  received: number;
  applied: number;
  skipped: number;
  failed: number;
}

export interface SynchronizerOptions {
  group?: string;
  debug?: boolean;
}

function skipped(reason: string): SyncOutcome {
  return { status: 'skipped', reason };
}

function applied(writes: SyncWrite[]): SyncOutcome {
  return { status: 'applied', writes };
}

/**
 * Block text as stored, or null when blank
 */
export function blockText(block: Block): string | null {
  const text = block.content.text;
  return text !== undefined && text.trim().length > 0 ? text : null;
}

/**
 * Title for a task created from a block
 */
export function titleFromBlock(block: Block): string {
  return blockText(block) ?? DEFAULT_TASK_TITLE;
}

export function completionFromBlock(block: Block): boolean {
  return block.metadata.is_completed ?? false;
}

export class BlockTaskSynchronizer {
  private readonly group: string;
  private readonly debug: boolean;
  private subscription: BusSubscription | null = null;
  private stats: SynchronizerStats = { received: 0, applied: 0, skipped: 0, failed: 0 };

  constructor(
    private readonly store: NoteStore,
    private readonly access: AccessResolver,
    private readonly bus: MessageBus,
    options: SynchronizerOptions = {}
  ) {
    this.group = options.group ?? 'block-task-sync';
    this.debug = options.debug ?? process.env.NOTES_RT_DEBUG === 'true';
  }

  /**
   * Subscribe to block and task topics with one sequential consumer
   */
  start(): void {
    if (this.subscription) return;

    this.subscription = this.bus.subscribe(
      [ENTITY_TOPICS.block, ENTITY_TOPICS.task],
      this.group,
      message => this.consume(message)
    );
    console.log(`[BlockTaskSync] Consuming ${ENTITY_TOPICS.block}, ${ENTITY_TOPICS.task} as ${this.group}`);
  }

  async stop(): Promise<void> {
    const subscription = this.subscription;
    this.subscription = null;
    if (subscription) {
      await subscription.close();
    }
  }

  getStats(): SynchronizerStats {
    return { ...this.stats };
  }

  /**
   * Apply one bus message. Throws MalformedInputError for bad envelopes,
   * UnauthorizedError when the acting user may not write the counterpart.
   */
  async handleMessage(message: BusMessage): Promise<SyncOutcome> {
    const envelope = parseEnvelope(message.value);

    if (hasSyncMarker(envelope.data)) {
      return skipped('echo of a synchronizer write');
    }

    switch (envelope.entity) {
      case 'block':
        return this.handleBlockEvent(envelope);
      case 'task':
        return this.handleTaskEvent(envelope);
      default:
        return skipped(`entity ${envelope.entity} is not synchronized`);
    }
  }

  private async consume(message: BusMessage): Promise<void> {
    this.stats.received++;
    try {
      const outcome = await this.handleMessage(message);
      if (outcome.status === 'applied') {
        this.stats.applied++;
        this.log(`${message.key}: ${outcome.writes.map(w => `${w.op} ${w.id}`).join(', ')}`);
      } else {
        this.stats.skipped++;
        this.log(`${message.key}: skipped (${outcome.reason})`);
      }
    } catch (error) {
      this.stats.failed++;
      console.error(`[BlockTaskSync] Dropped ${message.key}: ${errorMessage(error)}`);
    }
  }

  // ============================================================
  // Block -> Task
  // ============================================================

  private async handleBlockEvent(envelope: BlockEnvelope): Promise<SyncOutcome> {
    switch (envelope.type) {
      case EVENT_TYPES.blockCreated:
        return this.onBlockCreated(envelope.data);
      case EVENT_TYPES.blockUpdated:
        return this.onBlockUpdated(envelope.data);
      case EVENT_TYPES.blockDeleted:
        return this.deleteTasksForBlock(envelope.data.block_id, envelope.data.user_id);
      default:
        return skipped(`unhandled event ${envelope.type}`);
    }
  }

  private async onBlockCreated(data: BlockEventData): Promise<SyncOutcome> {
    const block = await this.store.getBlock(data.block_id);
    if (!block) return skipped('block not found');
    if (block.type !== 'task') return skipped('block is not a task');

    return this.ensureTaskForBlock(block);
  }

  private async onBlockUpdated(data: BlockEventData): Promise<SyncOutcome> {
    const block = await this.store.getBlock(data.block_id);
    if (!block) return skipped('block not found');

    const previousType = data.previous_type;

    if (previousType === 'task' && block.type !== 'task') {
      return this.deleteTasksForBlock(block.id, block.userId);
    }
    if (block.type !== 'task') return skipped('block is not a task');
    if (previousType !== undefined && previousType !== 'task') {
      return this.ensureTaskForBlock(block);
    }

    const tasks = await this.store.findTasksByBlockId(block.id);
    if (tasks.length === 0) {
      return this.ensureTaskForBlock(block);
    }

    const title = blockText(block);
    const isCompleted = completionFromBlock(block);
    const writes: SyncWrite[] = [];

    for (const task of tasks) {
      const patch: UpdateTaskInput = {};
      if (title !== null && task.title !== title) patch.title = title;
      if (task.isCompleted !== isCompleted) patch.isCompleted = isCompleted;
      if (Object.keys(patch).length === 0) continue;

      await this.authorize(block.userId, task.id, 'task');
      await this.store.updateTask(task.id, patch, this.writeTo('task', block.userId));
      writes.push({ op: 'updateTask', id: task.id });
    }

    return writes.length > 0 ? applied(writes) : skipped('task already in sync');
  }

  private async ensureTaskForBlock(block: Block): Promise<SyncOutcome> {
    const existing = await this.store.findTasksByBlockId(block.id);
    if (existing.length > 0) return skipped('task already linked');

    await this.authorize(block.userId, block.noteId, 'note');
    const task = await this.store.createTask(
      {
        userId: block.userId,
        title: titleFromBlock(block),
        isCompleted: completionFromBlock(block),
        blockId: block.id,
        metadata: { note_id: block.noteId }
      },
      this.writeTo('task', block.userId)
    );

    return applied([{ op: 'createTask', id: task.id }]);
  }

  private async deleteTasksForBlock(blockId: string, actorId: string): Promise<SyncOutcome> {
    const tasks = await this.store.findTasksByBlockId(blockId);
    if (tasks.length === 0) return skipped('no linked task');

    const writes: SyncWrite[] = [];
    for (const task of tasks) {
      await this.authorize(actorId, task.id, 'task');
      await this.store.deleteTask(task.id, this.writeTo('task', actorId));
      writes.push({ op: 'deleteTask', id: task.id });
    }
    return applied(writes);
  }

  // ============================================================
  // Task -> Block
  // ============================================================

  private async handleTaskEvent(envelope: TaskEnvelope): Promise<SyncOutcome> {
    switch (envelope.type) {
      case EVENT_TYPES.taskCreated:
        return this.onTaskChanged(envelope.data, true);
      case EVENT_TYPES.taskUpdated:
        return this.onTaskChanged(envelope.data, false);
      case EVENT_TYPES.taskDeleted:
        return this.onTaskDeleted(envelope.data);
      default:
        return skipped(`unhandled event ${envelope.type}`);
    }
  }

  private async onTaskChanged(data: TaskEventData, created: boolean): Promise<SyncOutcome> {
    const task = await this.store.getTask(data.task_id);
    if (!task) return skipped('task not found');

    const block = task.blockId ? await this.store.getBlock(task.blockId) : null;
    if (!block) {
      return this.synthesizeBlock(task);
    }
    if (block.type !== 'task') {
      return this.coerceBlock(task, block);
    }
    if (created) {
      return skipped('block already a task');
    }

    const patch: UpdateBlockInput = {};
    if (data.title !== undefined && block.content.text !== data.title) {
      patch.content = { ...block.content, text: data.title };
    }
    if (data.is_completed !== undefined && completionFromBlock(block) !== data.is_completed) {
      patch.metadata = { ...block.metadata, is_completed: data.is_completed };
    }
    if (patch.content === undefined && patch.metadata === undefined) {
      return skipped('block already in sync');
    }

    await this.authorize(task.userId, block.id, 'block');
    await this.store.updateBlock(block.id, patch, this.writeTo('block', task.userId));
    return applied([{ op: 'updateBlock', id: block.id }]);
  }

  private async onTaskDeleted(data: TaskEventData): Promise<SyncOutcome> {
    if (!data.block_id) return skipped('no block reference');

    const block = await this.store.getBlock(data.block_id);
    if (!block) return skipped('block not found');

    await this.authorize(data.user_id, block.id, 'block');
    await this.store.updateBlock(
      block.id,
      {
        metadata: {
          ...block.metadata,
          task_deleted: true,
          deleted_at: new Date().toISOString(),
          task_id: data.task_id
        }
      },
      this.writeTo('block', data.user_id)
    );
    return applied([{ op: 'updateBlock', id: block.id }]);
  }

  /**
   * Turn an existing block of another type into the task's block
   */
  private async coerceBlock(task: Task, block: Block): Promise<SyncOutcome> {
    await this.authorize(task.userId, block.id, 'block');
    await this.store.updateBlock(
      block.id,
      {
        type: 'task',
        content: { ...block.content, text: task.title },
        metadata: { ...block.metadata, is_completed: task.isCompleted, task_id: task.id }
      },
      this.writeTo('block', task.userId)
    );
    return applied([{ op: 'updateBlock', id: block.id }]);
  }

  /**
   * Create a task block in the resolved target note and link the task to it
   */
  private async synthesizeBlock(task: Task): Promise<SyncOutcome> {
    const writes: SyncWrite[] = [];
    const note = await this.resolveTargetNote(task, writes);

    await this.authorize(task.userId, note.id, 'note');
    const block = await this.store.createBlock(
      {
        noteId: note.id,
        userId: task.userId,
        type: 'task',
        content: { text: task.title },
        metadata: { is_completed: task.isCompleted, task_id: task.id }
      },
      this.writeTo('block', task.userId)
    );
    writes.push({ op: 'createBlock', id: block.id });

    await this.authorize(task.userId, task.id, 'task');
    await this.store.updateTask(
      task.id,
      { blockId: block.id, metadata: { ...task.metadata, note_id: note.id } },
      this.writeTo('task', task.userId)
    );
    writes.push({ op: 'updateTask', id: task.id });

    return applied(writes);
  }

  /**
   * Preferred note from metadata if editable, else primary, else first, else a new one
   */
  private async resolveTargetNote(task: Task, writes: SyncWrite[]): Promise<Note> {
    const preferredId = task.metadata.note_id;
    if (preferredId) {
      const preferred = await this.store.getNote(preferredId);
      if (preferred && await this.access.hasAccess(task.userId, preferred.id, 'note', 'editor')) {
        return preferred;
      }
    }

    const primary = await this.store.getPrimaryNote(task.userId);
    if (primary) return primary;

    const first = (await this.store.listNotesByUser(task.userId)).at(0);
    if (first) return first;

    const opts: WriteOptions = { actorId: task.userId };
    let notebook = (await this.store.listNotebooksByUser(task.userId)).at(0);
    if (!notebook) {
      notebook = await this.store.createNotebook(
        { userId: task.userId, name: FALLBACK_CONTAINER_NAME },
        opts
      );
      writes.push({ op: 'createNotebook', id: notebook.id });
    }

    const note = await this.store.createNote(
      { userId: task.userId, notebookId: notebook.id, title: FALLBACK_CONTAINER_NAME },
      opts
    );
    writes.push({ op: 'createNote', id: note.id });
    return note;
  }

  private async authorize(actorId: string, resourceId: string, kind: ResourceKind): Promise<void> {
    const allowed = await this.access.hasAccess(actorId, resourceId, kind, 'editor');
    if (!allowed) {
      throw new UnauthorizedError(`User ${actorId} may not edit ${kind} ${resourceId}`);
    }
  }

  private writeTo(side: 'block' | 'task', actorId: string): WriteOptions {
    return { actorId, syncSource: side };
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[BlockTaskSync] ${message}`);
    }
  }
}
