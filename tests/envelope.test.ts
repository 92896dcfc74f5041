import { describe, it, expect } from 'vitest';

import {
  ALL_TOPICS,
  FALLBACK_TOPIC,
  buildEnvelope,
  encodeEnvelope,
  hasSyncMarker,
  parseEnvelope,
  topicForEntity
} from '../src/core/envelope.js';
import { MalformedInputError } from '../src/core/errors.js';
import type { OutboxEvent } from '../src/core/types.js';

function outboxEvent(overrides: Partial<OutboxEvent> = {}): OutboxEvent {
  return {
    id: 'evt-1',
    eventType: 'block.updated',
    version: 1,
    entity: 'block',
    operation: 'update',
    actorId: 'user-1',
    timestamp: new Date('2024-05-01T10:00:00.000Z'),
    payload: { block_id: 'block-1', note_id: 'note-1', user_id: 'user-1', type: 'task' },
    status: 'pending',
    dispatched: false,
    dispatchedAt: null,
    ...overrides
  };
}

describe('topicForEntity', () => {
  it('maps each entity kind to its own topic', () => {
    expect(['note', 'notebook', 'block', 'task', 'user'].map(topicForEntity))
      .toEqual(['note', 'notebook', 'block', 'task', 'user']);
  });

  it('sends anything else to the fallback topic', () => {
    expect(topicForEntity('comment')).toBe(FALLBACK_TOPIC);
    expect(topicForEntity('')).toBe('sync_events');
    expect(ALL_TOPICS).toContain('sync_events');
  });
});

describe('buildEnvelope', () => {
  it('hoists non-empty id fields and keeps the payload as data', () => {
    const envelope = buildEnvelope(outboxEvent());

    expect(envelope).toEqual({
      event_id: 'evt-1',
      timestamp: '2024-05-01T10:00:00.000Z',
      entity: 'block',
      type: 'block.updated',
      block_id: 'block-1',
      note_id: 'note-1',
      user_id: 'user-1',
      data: { block_id: 'block-1', note_id: 'note-1', user_id: 'user-1', type: 'task' }
    });
  });

  it('skips empty and non-string ids', () => {
    const envelope = buildEnvelope(outboxEvent({
      payload: { block_id: 'block-1', note_id: '', task_id: 42, user_id: 'user-1' }
    }));

    expect(envelope.block_id).toBe('block-1');
    expect(envelope).not.toHaveProperty('note_id');
    expect(envelope).not.toHaveProperty('task_id');
  });
});

describe('parseEnvelope', () => {
  it('validates the payload shape for the entity', () => {
    const parsed = parseEnvelope(encodeEnvelope(buildEnvelope(outboxEvent())));

    expect(parsed.entity).toBe('block');
    if (parsed.entity === 'block') {
      expect(parsed.data.block_id).toBe('block-1');
      expect(parsed.data.type).toBe('task');
    }
  });

  it('rejects invalid JSON', () => {
    expect(() => parseEnvelope('{not json')).toThrow(MalformedInputError);
    expect(() => parseEnvelope('{not json')).toThrow('Envelope is not valid JSON');
  });

  it('names the offending field', () => {
    const value = encodeEnvelope(buildEnvelope(outboxEvent({
      payload: { note_id: 'note-1', user_id: 'user-1' }
    })));

    expect(() => parseEnvelope(value)).toThrow('Invalid envelope at data.block_id: Required');
  });

  it('rejects entities outside the resource kinds', () => {
    const value = encodeEnvelope(buildEnvelope(outboxEvent({ entity: 'comment' })));
    expect(() => parseEnvelope(value)).toThrow(/^Invalid envelope at entity: /);
  });
});

describe('hasSyncMarker', () => {
  it('finds the marker at the top level or inside metadata', () => {
    expect(hasSyncMarker({ _sync_source: 'task' })).toBe(true);
    expect(hasSyncMarker({ metadata: { _sync_source: 'block' } })).toBe(true);
  });

  it('ignores payloads without it', () => {
    expect(hasSyncMarker({ block_id: 'b' })).toBe(false);
    expect(hasSyncMarker({ metadata: null })).toBe(false);
    expect(hasSyncMarker({ metadata: { is_completed: true } })).toBe(false);
  });
});
