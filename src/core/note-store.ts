/**
 * Note Store - SQLite persistence for notebooks, notes, blocks and tasks
 * Every mutation appends its outbox Event in the same transaction.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  createSQLiteDatabase,
  sqliteAll,
  sqliteClose,
  sqliteExec,
  sqliteGet,
  sqliteRun,
  sqliteTransaction,
  toDateFromSQLite,
  toSQLiteBool,
  toSQLiteTimestamp,
  type SQLiteDatabase,
  type SQLiteOptions
} from './sqlite-wrapper.js';
import { EventOutbox } from './event-outbox.js';
import { RoleRepo } from './role-repo.js';
import { NotFoundError } from './errors.js';
import { RESOURCE_TREE, type ResourceGraph, type ResourceRef } from './resource-tree.js';
import {
  BlockContentSchema,
  BlockMetadataSchema,
  BlockTypeSchema,
  EVENT_TYPES,
  SYNC_SOURCE_KEY,
  TaskMetadataSchema,
  type Block,
  type BlockContent,
  type BlockMetadata,
  type BlockType,
  type Note,
  type Notebook,
  type OutboxEventInput,
  type SyncSource,
  type Task,
  type TaskMetadata
} from './types.js';

export interface WriteOptions {
  /** User recorded as the event actor */
  actorId: string;
  /** Set only by the block/task synchronizer: the side being written to */
  syncSource?: SyncSource;
}

export interface CreateNotebookInput {
  userId: string;
  name: string;
  description?: string;
}

export interface CreateNoteInput {
  userId: string;
  notebookId: string;
  title: string;
  isPrimary?: boolean;
}

export interface CreateBlockInput {
  noteId: string;
  userId: string;
  type: BlockType;
  content?: BlockContent;
  metadata?: BlockMetadata;
  order?: number;
}

export interface UpdateBlockInput {
  type?: BlockType;
  content?: BlockContent;
  metadata?: BlockMetadata;
  order?: number;
}

export interface CreateTaskInput {
  userId: string;
  title: string;
  description?: string;
  isCompleted?: boolean;
  blockId?: string | null;
  metadata?: TaskMetadata;
}

export interface UpdateTaskInput {
  title?: string;
  description?: string;
  isCompleted?: boolean;
  blockId?: string | null;
  metadata?: TaskMetadata;
}

const NotebookRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  name: z.string(),
  description: z.string(),
  created_at: z.string(),
  updated_at: z.string()
});

const NoteRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  notebook_id: z.string(),
  title: z.string(),
  is_primary: z.number(),
  created_at: z.string(),
  updated_at: z.string()
});

const BlockRowSchema = z.object({
  id: z.string(),
  note_id: z.string(),
  user_id: z.string(),
  type: BlockTypeSchema,
  content: z.string(),
  metadata: z.string(),
  position: z.number(),
  created_at: z.string(),
  updated_at: z.string()
});

const TaskRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  title: z.string(),
  description: z.string(),
  is_completed: z.number(),
  block_id: z.string().nullable(),
  metadata: z.string(),
  created_at: z.string(),
  updated_at: z.string()
});

const MaxPositionRowSchema = z.object({ max_position: z.number().nullable() });

export const NOTE_STORE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS notebooks (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS notes (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    notebook_id TEXT NOT NULL REFERENCES notebooks(id),
    title TEXT NOT NULL,
    is_primary INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS blocks (
    id TEXT PRIMARY KEY,
    note_id TEXT NOT NULL REFERENCES notes(id),
    user_id TEXT NOT NULL,
    type TEXT NOT NULL,
    content TEXT NOT NULL DEFAULT '{}',
    metadata TEXT NOT NULL DEFAULT '{}',
    position REAL NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  -- block_id is a plain reference: a task may outlive its block
  CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    title TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    is_completed INTEGER NOT NULL DEFAULT 0,
    block_id TEXT,
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_notes_user ON notes(user_id);
  CREATE INDEX IF NOT EXISTS idx_blocks_note ON blocks(note_id, position);
  CREATE INDEX IF NOT EXISTS idx_tasks_block ON tasks(block_id);
`;

function markBlockMetadata(metadata: BlockMetadata, syncSource: SyncSource | undefined): BlockMetadata {
  const next: BlockMetadata = { ...metadata };
  if (syncSource) {
    next._sync_source = syncSource;
  } else {
    delete next._sync_source;
  }
  return next;
}

function markTaskMetadata(metadata: TaskMetadata, syncSource: SyncSource | undefined): TaskMetadata {
  const next: TaskMetadata = { ...metadata };
  if (syncSource) {
    next._sync_source = syncSource;
  } else {
    delete next._sync_source;
  }
  return next;
}

function withSyncMarker(payload: Record<string, unknown>, syncSource: SyncSource | undefined): Record<string, unknown> {
  return syncSource ? { ...payload, [SYNC_SOURCE_KEY]: syncSource } : payload;
}

export class NoteStore implements ResourceGraph {
  private readonly db: SQLiteDatabase;
  readonly outbox: EventOutbox;
  readonly roles: RoleRepo;
  private initialized = false;

  constructor(dbPath: string, options: SQLiteOptions = { walMode: true }) {
    this.db = createSQLiteDatabase(dbPath, options);
    this.outbox = new EventOutbox(this.db);
    this.roles = new RoleRepo(this.db);
  }

  /**
   * Create tables if missing
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    sqliteExec(this.db, NOTE_STORE_SCHEMA);
    this.outbox.ensureSchema();
    this.roles.ensureSchema();

    this.initialized = true;
  }

  async close(): Promise<void> {
    sqliteClose(this.db);
  }

  // ============================================================
  // Notebooks
  // ============================================================

  async createNotebook(input: CreateNotebookInput, opts: WriteOptions): Promise<Notebook> {
    const now = new Date();
    const notebook: Notebook = {
      id: randomUUID(),
      userId: input.userId,
      name: input.name,
      description: input.description ?? '',
      createdAt: now,
      updatedAt: now
    };

    sqliteTransaction(this.db, () => {
      sqliteRun(
        this.db,
        `INSERT INTO notebooks (id, user_id, name, description, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
          notebook.id,
          notebook.userId,
          notebook.name,
          notebook.description,
          toSQLiteTimestamp(now),
          toSQLiteTimestamp(now)
        ]
      );
      this.roles.upsertRoleSync({
        userId: notebook.userId,
        resourceId: notebook.id,
        resourceType: 'notebook',
        role: 'owner'
      });
      this.appendEvent({
        eventType: EVENT_TYPES.notebookCreated,
        entity: 'notebook',
        operation: 'create',
        actorId: opts.actorId,
        payload: { notebook_id: notebook.id, user_id: notebook.userId, name: notebook.name }
      });
    });

    return notebook;
  }

  async getNotebook(notebookId: string): Promise<Notebook | null> {
    const row = sqliteGet(this.db, `SELECT * FROM notebooks WHERE id = ?`, [notebookId]);
    return row === undefined ? null : this.rowToNotebook(row);
  }

  async listNotebooksByUser(userId: string): Promise<Notebook[]> {
    return sqliteAll(
      this.db,
      `SELECT * FROM notebooks WHERE user_id = ? ORDER BY created_at ASC, rowid ASC`,
      [userId]
    ).map(row => this.rowToNotebook(row));
  }

  // ============================================================
  // Notes
  // ============================================================

  async createNote(input: CreateNoteInput, opts: WriteOptions): Promise<Note> {
    const now = new Date();
    const note: Note = {
      id: randomUUID(),
      userId: input.userId,
      notebookId: input.notebookId,
      title: input.title,
      isPrimary: input.isPrimary ?? false,
      createdAt: now,
      updatedAt: now
    };

    sqliteTransaction(this.db, () => {
      if (sqliteGet(this.db, `SELECT id FROM notebooks WHERE id = ?`, [note.notebookId]) === undefined) {
        throw new NotFoundError('notebook', note.notebookId);
      }

      sqliteRun(
        this.db,
        `INSERT INTO notes (id, user_id, notebook_id, title, is_primary, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [
          note.id,
          note.userId,
          note.notebookId,
          note.title,
          toSQLiteBool(note.isPrimary),
          toSQLiteTimestamp(now),
          toSQLiteTimestamp(now)
        ]
      );
      this.roles.upsertRoleSync({
        userId: note.userId,
        resourceId: note.id,
        resourceType: 'note',
        role: 'owner'
      });
      this.appendEvent({
        eventType: EVENT_TYPES.noteCreated,
        entity: 'note',
        operation: 'create',
        actorId: opts.actorId,
        payload: {
          note_id: note.id,
          notebook_id: note.notebookId,
          user_id: note.userId,
          title: note.title
        }
      });
    });

    return note;
  }

  async getNote(noteId: string): Promise<Note | null> {
    const row = sqliteGet(this.db, `SELECT * FROM notes WHERE id = ?`, [noteId]);
    return row === undefined ? null : this.rowToNote(row);
  }

  async getPrimaryNote(userId: string): Promise<Note | null> {
    const row = sqliteGet(
      this.db,
      `SELECT * FROM notes WHERE user_id = ? AND is_primary = 1 ORDER BY created_at ASC, rowid ASC LIMIT 1`,
      [userId]
    );
    return row === undefined ? null : this.rowToNote(row);
  }

  async listNotesByUser(userId: string): Promise<Note[]> {
    return sqliteAll(
      this.db,
      `SELECT * FROM notes WHERE user_id = ? ORDER BY created_at ASC, rowid ASC`,
      [userId]
    ).map(row => this.rowToNote(row));
  }

  /**
   * Delete a note and its blocks. Emits block.deleted per block, then note.deleted.
   */
  async deleteNote(noteId: string, opts: WriteOptions): Promise<void> {
    sqliteTransaction(this.db, () => {
      const note = this.getNoteSync(noteId);
      if (!note) {
        throw new NotFoundError('note', noteId);
      }

      for (const block of this.listBlocksSync(noteId)) {
        sqliteRun(this.db, `DELETE FROM blocks WHERE id = ?`, [block.id]);
        this.appendEvent({
          eventType: EVENT_TYPES.blockDeleted,
          entity: 'block',
          operation: 'delete',
          actorId: opts.actorId,
          payload: withSyncMarker({
            block_id: block.id,
            note_id: block.noteId,
            user_id: block.userId,
            type: block.type
          }, opts.syncSource)
        });
      }

      sqliteRun(this.db, `DELETE FROM notes WHERE id = ?`, [noteId]);
      this.appendEvent({
        eventType: EVENT_TYPES.noteDeleted,
        entity: 'note',
        operation: 'delete',
        actorId: opts.actorId,
        payload: { note_id: note.id, notebook_id: note.notebookId, user_id: note.userId }
      });
    });
  }

  // ============================================================
  // Blocks
  // ============================================================

  async createBlock(input: CreateBlockInput, opts: WriteOptions): Promise<Block> {
    return sqliteTransaction(this.db, () => {
      if (!this.getNoteSync(input.noteId)) {
        throw new NotFoundError('note', input.noteId);
      }

      const now = new Date();
      const block: Block = {
        id: randomUUID(),
        noteId: input.noteId,
        userId: input.userId,
        type: input.type,
        content: input.content ?? {},
        metadata: markBlockMetadata(input.metadata ?? {}, opts.syncSource),
        order: input.order ?? this.nextPosition(input.noteId),
        createdAt: now,
        updatedAt: now
      };

      sqliteRun(
        this.db,
        `INSERT INTO blocks (id, note_id, user_id, type, content, metadata, position, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          block.id,
          block.noteId,
          block.userId,
          block.type,
          JSON.stringify(block.content),
          JSON.stringify(block.metadata),
          block.order,
          toSQLiteTimestamp(now),
          toSQLiteTimestamp(now)
        ]
      );

      this.appendEvent({
        eventType: EVENT_TYPES.blockCreated,
        entity: 'block',
        operation: 'create',
        actorId: opts.actorId,
        payload: withSyncMarker({
          block_id: block.id,
          note_id: block.noteId,
          user_id: block.userId,
          type: block.type,
          content: block.content,
          metadata: block.metadata,
          order: block.order
        }, opts.syncSource)
      });

      return block;
    });
  }

  async getBlock(blockId: string): Promise<Block | null> {
    return this.getBlockSync(blockId);
  }

  async listBlocksByNote(noteId: string): Promise<Block[]> {
    return this.listBlocksSync(noteId);
  }

  /**
   * Patch a block. previous_type is included in the event when the type changes.
   */
  async updateBlock(blockId: string, patch: UpdateBlockInput, opts: WriteOptions): Promise<Block> {
    return sqliteTransaction(this.db, () => {
      const current = this.getBlockSync(blockId);
      if (!current) {
        throw new NotFoundError('block', blockId);
      }

      const updated: Block = {
        ...current,
        type: patch.type ?? current.type,
        content: patch.content ?? current.content,
        metadata: markBlockMetadata(patch.metadata ?? current.metadata, opts.syncSource),
        order: patch.order ?? current.order,
        updatedAt: new Date()
      };

      sqliteRun(
        this.db,
        `UPDATE blocks
         SET type = ?, content = ?, metadata = ?, position = ?, updated_at = ?
         WHERE id = ?`,
        [
          updated.type,
          JSON.stringify(updated.content),
          JSON.stringify(updated.metadata),
          updated.order,
          toSQLiteTimestamp(updated.updatedAt),
          blockId
        ]
      );

      const payload: Record<string, unknown> = {
        block_id: updated.id,
        note_id: updated.noteId,
        user_id: updated.userId,
        type: updated.type
      };
      if (updated.type !== current.type) payload.previous_type = current.type;
      if (patch.content !== undefined) payload.content = updated.content;
      if (patch.metadata !== undefined) payload.metadata = updated.metadata;
      if (patch.order !== undefined) payload.order = updated.order;

      this.appendEvent({
        eventType: EVENT_TYPES.blockUpdated,
        entity: 'block',
        operation: 'update',
        actorId: opts.actorId,
        payload: withSyncMarker(payload, opts.syncSource)
      });

      return updated;
    });
  }

  async deleteBlock(blockId: string, opts: WriteOptions): Promise<void> {
    sqliteTransaction(this.db, () => {
      const block = this.getBlockSync(blockId);
      if (!block) {
        throw new NotFoundError('block', blockId);
      }

      sqliteRun(this.db, `DELETE FROM blocks WHERE id = ?`, [blockId]);
      this.appendEvent({
        eventType: EVENT_TYPES.blockDeleted,
        entity: 'block',
        operation: 'delete',
        actorId: opts.actorId,
        payload: withSyncMarker({
          block_id: block.id,
          note_id: block.noteId,
          user_id: block.userId,
          type: block.type
        }, opts.syncSource)
      });
    });
  }

  // ============================================================
  // Tasks
  // ============================================================

  async createTask(input: CreateTaskInput, opts: WriteOptions): Promise<Task> {
    return sqliteTransaction(this.db, () => {
      const now = new Date();
      const task: Task = {
        id: randomUUID(),
        userId: input.userId,
        title: input.title,
        description: input.description ?? '',
        isCompleted: input.isCompleted ?? false,
        blockId: input.blockId ?? null,
        metadata: markTaskMetadata(input.metadata ?? {}, opts.syncSource),
        createdAt: now,
        updatedAt: now
      };

      sqliteRun(
        this.db,
        `INSERT INTO tasks (id, user_id, title, description, is_completed, block_id, metadata, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          task.id,
          task.userId,
          task.title,
          task.description,
          toSQLiteBool(task.isCompleted),
          task.blockId,
          JSON.stringify(task.metadata),
          toSQLiteTimestamp(now),
          toSQLiteTimestamp(now)
        ]
      );
      this.roles.upsertRoleSync({
        userId: task.userId,
        resourceId: task.id,
        resourceType: 'task',
        role: 'owner'
      });

      this.appendEvent({
        eventType: EVENT_TYPES.taskCreated,
        entity: 'task',
        operation: 'create',
        actorId: opts.actorId,
        payload: withSyncMarker({
          ...this.taskIdentity(task),
          title: task.title,
          description: task.description,
          is_completed: task.isCompleted
        }, opts.syncSource)
      });

      return task;
    });
  }

  async getTask(taskId: string): Promise<Task | null> {
    return this.getTaskSync(taskId);
  }

  async findTasksByBlockId(blockId: string): Promise<Task[]> {
    return sqliteAll(
      this.db,
      `SELECT * FROM tasks WHERE block_id = ? ORDER BY created_at ASC, rowid ASC`,
      [blockId]
    ).map(row => this.rowToTask(row));
  }

  /**
   * Patch a task. The event carries the task's identity plus only the patched fields.
   */
  async updateTask(taskId: string, patch: UpdateTaskInput, opts: WriteOptions): Promise<Task> {
    return sqliteTransaction(this.db, () => {
      const current = this.getTaskSync(taskId);
      if (!current) {
        throw new NotFoundError('task', taskId);
      }

      const updated: Task = {
        ...current,
        title: patch.title ?? current.title,
        description: patch.description ?? current.description,
        isCompleted: patch.isCompleted ?? current.isCompleted,
        blockId: patch.blockId === undefined ? current.blockId : patch.blockId,
        metadata: markTaskMetadata(patch.metadata ?? current.metadata, opts.syncSource),
        updatedAt: new Date()
      };

      sqliteRun(
        this.db,
        `UPDATE tasks
         SET title = ?, description = ?, is_completed = ?, block_id = ?, metadata = ?, updated_at = ?
         WHERE id = ?`,
        [
          updated.title,
          updated.description,
          toSQLiteBool(updated.isCompleted),
          updated.blockId,
          JSON.stringify(updated.metadata),
          toSQLiteTimestamp(updated.updatedAt),
          taskId
        ]
      );

      const payload: Record<string, unknown> = this.taskIdentity(updated);
      if (patch.title !== undefined) payload.title = updated.title;
      if (patch.description !== undefined) payload.description = updated.description;
      if (patch.isCompleted !== undefined) payload.is_completed = updated.isCompleted;
      if (patch.metadata !== undefined) payload.metadata = updated.metadata;

      this.appendEvent({
        eventType: EVENT_TYPES.taskUpdated,
        entity: 'task',
        operation: 'update',
        actorId: opts.actorId,
        payload: withSyncMarker(payload, opts.syncSource)
      });

      return updated;
    });
  }

  /**
   * Delete a task and the grants pointing at it
   */
  async deleteTask(taskId: string, opts: WriteOptions): Promise<void> {
    sqliteTransaction(this.db, () => {
      const task = this.getTaskSync(taskId);
      if (!task) {
        throw new NotFoundError('task', taskId);
      }

      sqliteRun(this.db, `DELETE FROM tasks WHERE id = ?`, [taskId]);
      this.roles.deleteRolesForResource(taskId, 'task');

      const payload: Record<string, unknown> = { task_id: task.id, user_id: task.userId };
      if (task.blockId) payload.block_id = task.blockId;

      this.appendEvent({
        eventType: EVENT_TYPES.taskDeleted,
        entity: 'task',
        operation: 'delete',
        actorId: opts.actorId,
        payload: withSyncMarker(payload, opts.syncSource)
      });
    });
  }

  // ============================================================
  // ResourceGraph
  // ============================================================

  async parentOf(ref: ResourceRef): Promise<ResourceRef | null> {
    const parentKind = RESOURCE_TREE[ref.kind].parent;
    if (!parentKind) return null;

    switch (ref.kind) {
      case 'block': {
        const block = this.getBlockSync(ref.id);
        return block ? { kind: parentKind, id: block.noteId } : null;
      }
      case 'task': {
        const task = this.getTaskSync(ref.id);
        if (!task?.blockId) return null;
        const block = this.getBlockSync(task.blockId);
        return block ? { kind: parentKind, id: block.noteId } : null;
      }
      case 'note': {
        const note = this.getNoteSync(ref.id);
        return note ? { kind: parentKind, id: note.notebookId } : null;
      }
      default:
        return null;
    }
  }

  async ownerOf(ref: ResourceRef): Promise<string | null> {
    switch (ref.kind) {
      case 'note':
        return this.getNoteSync(ref.id)?.userId ?? null;
      case 'notebook':
        return (await this.getNotebook(ref.id))?.userId ?? null;
      case 'block':
        return this.getBlockSync(ref.id)?.userId ?? null;
      case 'task':
        return this.getTaskSync(ref.id)?.userId ?? null;
      case 'user':
        return ref.id;
    }
  }

  // ============================================================
  // Internals
  // ============================================================

  private appendEvent(input: OutboxEventInput): void {
    this.outbox.append(input);
  }

  private taskIdentity(task: Task): Record<string, unknown> {
    const identity: Record<string, unknown> = { task_id: task.id, user_id: task.userId };
    if (task.blockId) {
      identity.block_id = task.blockId;
    }
    const noteId = (task.blockId ? this.getBlockSync(task.blockId)?.noteId : undefined) ?? task.metadata.note_id;
    if (noteId) {
      identity.note_id = noteId;
    }
    return identity;
  }

  private nextPosition(noteId: string): number {
    const row = MaxPositionRowSchema.parse(
      sqliteGet(this.db, `SELECT MAX(position) AS max_position FROM blocks WHERE note_id = ?`, [noteId])
    );
    return row.max_position === null ? 0 : row.max_position + 1;
  }

  private getNoteSync(noteId: string): Note | null {
    const row = sqliteGet(this.db, `SELECT * FROM notes WHERE id = ?`, [noteId]);
    return row === undefined ? null : this.rowToNote(row);
  }

  private getBlockSync(blockId: string): Block | null {
    const row = sqliteGet(this.db, `SELECT * FROM blocks WHERE id = ?`, [blockId]);
    return row === undefined ? null : this.rowToBlock(row);
  }

  private listBlocksSync(noteId: string): Block[] {
    return sqliteAll(
      this.db,
      `SELECT * FROM blocks WHERE note_id = ? ORDER BY position ASC, rowid ASC`,
      [noteId]
    ).map(row => this.rowToBlock(row));
  }

  private getTaskSync(taskId: string): Task | null {
    const row = sqliteGet(this.db, `SELECT * FROM tasks WHERE id = ?`, [taskId]);
    return row === undefined ? null : this.rowToTask(row);
  }

  private rowToNotebook(raw: unknown): Notebook {
    const row = NotebookRowSchema.parse(raw);
    return {
      id: row.id,
      userId: row.user_id,
      name: row.name,
      description: row.description,
      createdAt: toDateFromSQLite(row.created_at),
      updatedAt: toDateFromSQLite(row.updated_at)
    };
  }

  private rowToNote(raw: unknown): Note {
    const row = NoteRowSchema.parse(raw);
    return {
      id: row.id,
      userId: row.user_id,
      notebookId: row.notebook_id,
      title: row.title,
      isPrimary: row.is_primary === 1,
      createdAt: toDateFromSQLite(row.created_at),
      updatedAt: toDateFromSQLite(row.updated_at)
    };
  }

  private rowToBlock(raw: unknown): Block {
    const row = BlockRowSchema.parse(raw);
    return {
      id: row.id,
      noteId: row.note_id,
      userId: row.user_id,
      type: row.type,
      content: BlockContentSchema.parse(JSON.parse(row.content)),
      metadata: BlockMetadataSchema.parse(JSON.parse(row.metadata)),
      order: row.position,
      createdAt: toDateFromSQLite(row.created_at),
      updatedAt: toDateFromSQLite(row.updated_at)
    };
  }

  private rowToTask(raw: unknown): Task {
    const row = TaskRowSchema.parse(raw);
    return {
      id: row.id,
      userId: row.user_id,
      title: row.title,
      description: row.description,
      isCompleted: row.is_completed === 1,
      blockId: row.block_id,
      metadata: TaskMetadataSchema.parse(JSON.parse(row.metadata)),
      createdAt: toDateFromSQLite(row.created_at),
      updatedAt: toDateFromSQLite(row.updated_at)
    };
  }
}
