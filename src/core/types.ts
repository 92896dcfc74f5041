/**
 * Core types for the realtime consistency core
 * Every persisted or wire-level shape is a Zod schema; TS types are inferred from it.
 */

import { z } from 'zod';

// ============================================================
// Resources & Roles
// ============================================================

export const ResourceKindSchema = z.enum(['note', 'notebook', 'block', 'task', 'user']);
export type ResourceKind = z.infer<typeof ResourceKindSchema>;

export const RoleTypeSchema = z.enum(['admin', 'owner', 'editor', 'viewer']);
export type RoleType = z.infer<typeof RoleTypeSchema>;

export const ROLE_RANK: Readonly<Record<RoleType, number>> = {
  admin: 4,
  owner: 3,
  editor: 2,
  viewer: 1
};

export const RoleSchema = z.object({
  id: z.string(),
  userId: z.string(),
  resourceId: z.string(),
  resourceType: ResourceKindSchema,
  role: RoleTypeSchema,
  createdAt: z.date(),
  updatedAt: z.date()
});
export type Role = z.infer<typeof RoleSchema>;

export interface RoleFilter {
  userId?: string;
  resourceId?: string;
  resourceType?: ResourceKind;
  role?: RoleType;
}

// ============================================================
// Sync marker
// ============================================================

/**
 * Side a synchronizer write was made TO. A payload carrying it is an echo.
 */
export const SyncSourceSchema = z.enum(['block', 'task']);
export type SyncSource = z.infer<typeof SyncSourceSchema>;

export const SYNC_SOURCE_KEY = '_sync_source';

// ============================================================
// Notebook / Note
// ============================================================

export const NotebookSchema = z.object({
  id: z.string(),
  userId: z.string(),
  name: z.string(),
  description: z.string(),
  createdAt: z.date(),
  updatedAt: z.date()
});
export type Notebook = z.infer<typeof NotebookSchema>;

export const NoteSchema = z.object({
  id: z.string(),
  userId: z.string(),
  notebookId: z.string(),
  title: z.string(),
  isPrimary: z.boolean(),
  createdAt: z.date(),
  updatedAt: z.date()
});
export type Note = z.infer<typeof NoteSchema>;

// ============================================================
// Block
// ============================================================

export const BlockTypeSchema = z.enum(['text', 'heading', 'checklist', 'code', 'image', 'task']);
export type BlockType = z.infer<typeof BlockTypeSchema>;

export const BlockContentSchema = z.object({
  text: z.string().optional()
}).passthrough();
export type BlockContent = z.infer<typeof BlockContentSchema>;

export const BlockMetadataSchema = z.object({
  is_completed: z.boolean().optional(),
  task_id: z.string().optional(),
  task_deleted: z.boolean().optional(),
  deleted_at: z.string().optional(),
  _sync_source: SyncSourceSchema.optional()
}).passthrough();
export type BlockMetadata = z.infer<typeof BlockMetadataSchema>;

export const BlockSchema = z.object({
  id: z.string(),
  noteId: z.string(),
  userId: z.string(),
  type: BlockTypeSchema,
  content: BlockContentSchema,
  metadata: BlockMetadataSchema,
  order: z.number(),
  createdAt: z.date(),
  updatedAt: z.date()
});
export type Block = z.infer<typeof BlockSchema>;

// ============================================================
// Task
// ============================================================

export const TaskMetadataSchema = z.object({
  note_id: z.string().optional(),
  _sync_source: SyncSourceSchema.optional()
}).passthrough();
export type TaskMetadata = z.infer<typeof TaskMetadataSchema>;

export const TaskSchema = z.object({
  id: z.string(),
  userId: z.string(),
  title: z.string(),
  description: z.string(),
  isCompleted: z.boolean(),
  blockId: z.string().nullable(),
  metadata: TaskMetadataSchema,
  createdAt: z.date(),
  updatedAt: z.date()
});
export type Task = z.infer<typeof TaskSchema>;

// ============================================================
// Outbox Event (persisted)
// ============================================================

export const EventOperationSchema = z.enum(['create', 'update', 'delete']);
export type EventOperation = z.infer<typeof EventOperationSchema>;

export const OutboxStatusSchema = z.enum(['pending', 'completed']);
export type OutboxStatus = z.infer<typeof OutboxStatusSchema>;

export const OutboxEventSchema = z.object({
  id: z.string(),
  eventType: z.string(),
  version: z.number().int(),
  entity: z.string(),
  operation: EventOperationSchema,
  actorId: z.string(),
  timestamp: z.date(),
  payload: z.record(z.unknown()),
  status: OutboxStatusSchema,
  dispatched: z.boolean(),
  dispatchedAt: z.date().nullable()
});
export type OutboxEvent = z.infer<typeof OutboxEventSchema>;

export interface OutboxEventInput {
  eventType: string;
  entity: ResourceKind;
  operation: EventOperation;
  actorId: string;
  payload: Record<string, unknown>;
}

// ============================================================
// Event payloads (one schema per entity kind)
// ============================================================

const syncMarker = { _sync_source: SyncSourceSchema.optional() };

export const BlockEventDataSchema = z.object({
  block_id: z.string().min(1),
  note_id: z.string().min(1),
  user_id: z.string().min(1),
  type: BlockTypeSchema.optional(),
  previous_type: BlockTypeSchema.optional(),
  content: BlockContentSchema.optional(),
  metadata: BlockMetadataSchema.optional(),
  order: z.number().optional(),
  ...syncMarker
}).passthrough();
export type BlockEventData = z.infer<typeof BlockEventDataSchema>;

export const TaskEventDataSchema = z.object({
  task_id: z.string().min(1),
  user_id: z.string().min(1),
  block_id: z.string().optional(),
  note_id: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  is_completed: z.boolean().optional(),
  ...syncMarker
}).passthrough();
export type TaskEventData = z.infer<typeof TaskEventDataSchema>;

export const NoteEventDataSchema = z.object({
  note_id: z.string().min(1),
  notebook_id: z.string().optional(),
  user_id: z.string().optional(),
  title: z.string().optional()
}).passthrough();
export type NoteEventData = z.infer<typeof NoteEventDataSchema>;

export const NotebookEventDataSchema = z.object({
  notebook_id: z.string().min(1),
  user_id: z.string().optional(),
  name: z.string().optional()
}).passthrough();
export type NotebookEventData = z.infer<typeof NotebookEventDataSchema>;

export const UserEventDataSchema = z.object({
  user_id: z.string().min(1)
}).passthrough();
export type UserEventData = z.infer<typeof UserEventDataSchema>;

// ============================================================
// Event Envelope (bus message)
// ============================================================

const envelopeBase = {
  event_id: z.string(),
  timestamp: z.string(),
  type: z.string(),
  note_id: z.string().optional(),
  notebook_id: z.string().optional(),
  block_id: z.string().optional(),
  task_id: z.string().optional(),
  user_id: z.string().optional()
};

export const EventEnvelopeSchema = z.discriminatedUnion('entity', [
  z.object({ ...envelopeBase, entity: z.literal('block'), data: BlockEventDataSchema }),
  z.object({ ...envelopeBase, entity: z.literal('task'), data: TaskEventDataSchema }),
  z.object({ ...envelopeBase, entity: z.literal('note'), data: NoteEventDataSchema }),
  z.object({ ...envelopeBase, entity: z.literal('notebook'), data: NotebookEventDataSchema }),
  z.object({ ...envelopeBase, entity: z.literal('user'), data: UserEventDataSchema })
]);
export type EventEnvelope = z.infer<typeof EventEnvelopeSchema>;
export type BlockEnvelope = Extract<EventEnvelope, { entity: 'block' }>;
export type TaskEnvelope = Extract<EventEnvelope, { entity: 'task' }>;

/**
 * Envelope as produced by the dispatcher, before per-entity validation
 */
export interface RawEnvelope {
  event_id: string;
  timestamp: string;
  entity: string;
  type: string;
  data: Record<string, unknown>;
  note_id?: string;
  notebook_id?: string;
  block_id?: string;
  task_id?: string;
  user_id?: string;
}

export const HOISTED_ID_FIELDS = ['note_id', 'notebook_id', 'block_id', 'task_id', 'user_id'] as const;
export type HoistedIdField = typeof HOISTED_ID_FIELDS[number];

// ============================================================
// Event types
// ============================================================

export const EVENT_TYPES = {
  noteCreated: 'note.created',
  noteUpdated: 'note.updated',
  noteDeleted: 'note.deleted',
  notebookCreated: 'notebook.created',
  notebookUpdated: 'notebook.updated',
  notebookDeleted: 'notebook.deleted',
  blockCreated: 'block.created',
  blockUpdated: 'block.updated',
  blockDeleted: 'block.deleted',
  taskCreated: 'task.created',
  taskUpdated: 'task.updated',
  taskDeleted: 'task.deleted',
  userCreated: 'user.created',
  userUpdated: 'user.updated',
  userDeleted: 'user.deleted'
} as const;

// ============================================================
// WebSocket control protocol
// ============================================================

export const SubscriptionPayloadSchema = z.object({
  resource: z.string().min(1),
  id: z.string().optional()
});
export type SubscriptionPayload = z.infer<typeof SubscriptionPayloadSchema>;

export const ClientControlMessageSchema = z.object({
  type: z.enum(['subscribe', 'unsubscribe']),
  payload: SubscriptionPayloadSchema
});
export type ClientControlMessage = z.infer<typeof ClientControlMessageSchema>;

export type ServerMessage =
  | { type: 'event'; event: string; payload: Record<string, unknown> }
  | { type: 'subscription'; event: 'confirmed'; payload: { resource: string; id: string } }
  | { type: 'error'; event: 'invalid_message'; payload: { message: string } };
