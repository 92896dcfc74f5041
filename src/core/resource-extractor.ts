/**
 * Resource extraction for fan-out routing
 * Works on untyped envelopes so events from any producer can be routed.
 */

export interface ExtractedResource {
  type: string;
  id: string | null;
  notebookId: string | null;
}

const ID_FIELDS = [
  ['note_id', 'note'],
  ['notebook_id', 'notebook'],
  ['block_id', 'block'],
  ['task_id', 'task']
] as const;

const SHAPE_HINTS = [
  ['title', 'note'],
  ['name', 'notebook'],
  ['content', 'block']
] as const;

export const UNKNOWN_RESOURCE = 'unknown';

export function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

function readString(record: Record<string, unknown>, field: string): string | null {
  const value = record[field];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Places ids may live, most specific first: the envelope itself, a wrapped
 * payload, that payload's data, then the envelope's data.
 */
function searchLevels(envelope: Record<string, unknown>): Record<string, unknown>[] {
  const levels: Record<string, unknown>[] = [envelope];

  const payload = asRecord(envelope.payload);
  if (payload) {
    levels.push(payload);
    const payloadData = asRecord(payload.data);
    if (payloadData) levels.push(payloadData);
  }

  const data = asRecord(envelope.data);
  if (data) levels.push(data);

  return levels;
}

export function extractResource(envelope: Record<string, unknown>, eventType?: string): ExtractedResource {
  const levels = searchLevels(envelope);

  let notebookId: string | null = null;
  for (const level of levels) {
    notebookId = readString(level, 'notebook_id');
    if (notebookId) break;
  }

  for (const level of levels) {
    for (const [field, type] of ID_FIELDS) {
      const id = readString(level, field);
      if (id) return { type, id, notebookId };
    }
  }

  for (const level of levels) {
    const id = readString(level, 'id');
    const entity = readString(level, 'entity');
    if (id && entity) return { type: entity, id, notebookId };
  }

  for (const level of levels) {
    for (const [field, type] of SHAPE_HINTS) {
      if (level[field] !== undefined) {
        return { type, id: readString(level, 'id'), notebookId };
      }
    }
  }

  const name = eventType ?? readString(envelope, 'type') ?? '';
  const prefix = name.split('.')[0];
  if (prefix) {
    return { type: prefix, id: null, notebookId };
  }

  return { type: UNKNOWN_RESOURCE, id: null, notebookId };
}

/**
 * Subscription keys an event satisfies. A client receives the event if it holds any of them.
 */
export function matchKeys(resource: ExtractedResource, eventType: string | null): string[] {
  const keys = ['all', resource.type, `${resource.type}s`];

  if (eventType) keys.push(eventType);
  if (resource.id) keys.push(`${resource.type}:${resource.id}`);
  if (resource.type === 'note' && resource.notebookId) {
    keys.push(`notebook:${resource.notebookId}`, `notebook:notes:${resource.notebookId}`);
  }

  return keys;
}

export function subscriptionKey(resource: string, id?: string): string {
  return id ? `${resource}:${id}` : resource;
}
