/**
 * Event envelope codec
 * Outbox row -> bus message, and bus message -> typed envelope.
 */

import { MalformedInputError } from './errors.js';
import {
  EventEnvelopeSchema,
  HOISTED_ID_FIELDS,
  ResourceKindSchema,
  SYNC_SOURCE_KEY,
  type EventEnvelope,
  type OutboxEvent,
  type RawEnvelope,
  type ResourceKind
} from './types.js';

export const FALLBACK_TOPIC = 'sync_events';

export const ENTITY_TOPICS: Readonly<Record<ResourceKind, string>> = {
  note: 'note',
  notebook: 'notebook',
  block: 'block',
  task: 'task',
  user: 'user'
};

export const ALL_TOPICS: readonly string[] = [...Object.values(ENTITY_TOPICS), FALLBACK_TOPIC];

/**
 * One topic per entity kind; anything else goes to the fallback topic
 */
export function topicForEntity(entity: string): string {
  const kind = ResourceKindSchema.safeParse(entity);
  return kind.success ? ENTITY_TOPICS[kind.data] : FALLBACK_TOPIC;
}

/**
 * Build the bus envelope for an outbox row, hoisting resource ids out of the payload
 */
export function buildEnvelope(event: OutboxEvent): RawEnvelope {
  const envelope: RawEnvelope = {
    event_id: event.id,
    timestamp: event.timestamp.toISOString(),
    entity: event.entity,
    type: event.eventType,
    data: event.payload
  };

  for (const field of HOISTED_ID_FIELDS) {
    const value = event.payload[field];
    if (typeof value === 'string' && value.length > 0) {
      envelope[field] = value;
    }
  }

  return envelope;
}

export function encodeEnvelope(envelope: RawEnvelope): string {
  return JSON.stringify(envelope);
}

/**
 * Parse and validate a bus message value. Throws MalformedInputError.
 */
export function parseEnvelope(value: string): EventEnvelope {
  let json: unknown;
  try {
    json = JSON.parse(value);
  } catch (error) {
    throw new MalformedInputError('Envelope is not valid JSON', { cause: error });
  }

  const result = EventEnvelopeSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'envelope';
    throw new MalformedInputError(`Invalid envelope at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

/**
 * True when the payload was written by the synchronizer
 */
export function hasSyncMarker(data: Record<string, unknown>): boolean {
  if (data[SYNC_SOURCE_KEY] !== undefined) return true;

  const metadata = data.metadata;
  return typeof metadata === 'object'
    && metadata !== null
    && SYNC_SOURCE_KEY in metadata;
}
