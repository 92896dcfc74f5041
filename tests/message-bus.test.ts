import { describe, it, expect, vi } from 'vitest';

import { Channel } from '../src/core/channel.js';
import { InProcessBus, type BusMessage } from '../src/core/message-bus.js';
import { TransientError } from '../src/core/errors.js';

function message(topic: string, key: string, value = '{}'): BusMessage {
  return { topic, key, value };
}

describe('Channel', () => {
  it('delivers buffered values in order', async () => {
    const channel = new Channel<number>();
    channel.send(1);
    channel.send(2);

    expect(await channel.receive()).toBe(1);
    expect(await channel.receive()).toBe(2);
  });

  it('hands a value straight to a waiting receiver', async () => {
    const channel = new Channel<string>(1);
    const next = channel.receive();

    expect(channel.trySend('a')).toBe(true);
    expect(await next).toBe('a');
    expect(channel.size).toBe(0);
  });

  it('refuses trySend when full but accepts send', () => {
    const channel = new Channel<string>(1);

    expect(channel.trySend('a')).toBe(true);
    expect(channel.trySend('b')).toBe(false);
    expect(channel.send('c')).toBe(true);
    expect(channel.size).toBe(2);
  });

  it('drains then yields undefined after close', async () => {
    const channel = new Channel<string>();
    const waiting = new Channel<string>();
    const pending = waiting.receive();
    channel.send('last');
    channel.close();
    waiting.close();

    expect(channel.isClosed).toBe(true);
    expect(channel.trySend('x')).toBe(false);
    expect(await channel.receive()).toBe('last');
    expect(await channel.receive()).toBeUndefined();
    expect(await pending).toBeUndefined();
  });
});

describe('InProcessBus', () => {
  it('delivers only subscribed topics, in publish order', async () => {
    const bus = new InProcessBus();
    const seen: string[] = [];
    bus.subscribe(['block', 'task'], 'sync', async msg => {
      seen.push(`${msg.topic}:${msg.key}`);
    });

    await bus.publish(message('block', 'block.created'));
    await bus.publish(message('note', 'note.created'));
    await bus.publish(message('task', 'task.updated'));
    await bus.drain();

    expect(seen).toEqual(['block:block.created', 'task:task.updated']);
    await bus.close();
  });

  it('gives every group its own copy', async () => {
    const bus = new InProcessBus();
    const first: string[] = [];
    const second: string[] = [];
    bus.subscribe(['note'], 'a', async msg => { first.push(msg.key); });
    bus.subscribe(['note'], 'b', async msg => { second.push(msg.key); });

    await bus.publish(message('note', 'note.created'));
    await bus.drain();

    expect(first).toEqual(['note.created']);
    expect(second).toEqual(['note.created']);
    await bus.close();
  });

  it('handles one message at a time per subscription', async () => {
    const bus = new InProcessBus();
    let active = 0;
    let maxActive = 0;
    bus.subscribe(['task'], 'sync', async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active--;
    });

    for (let i = 0; i < 4; i++) {
      await bus.publish(message('task', `task.${i}`));
    }
    await bus.drain();

    expect(maxActive).toBe(1);
    await bus.close();
  });

  it('logs a failing handler and keeps consuming', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const bus = new InProcessBus();
    const seen: string[] = [];
    bus.subscribe(['block'], 'sync', async msg => {
      if (msg.key === 'bad') throw new Error('boom');
      seen.push(msg.key);
    });

    await bus.publish(message('block', 'bad'));
    await bus.publish(message('block', 'good'));
    await bus.drain();

    expect(seen).toEqual(['good']);
    expect(errors).toHaveBeenCalledWith('[InProcessBus] sync failed on block/bad: boom');
    errors.mockRestore();
    await bus.close();
  });

  it('stops delivering to a closed subscription', async () => {
    const bus = new InProcessBus();
    const seen: string[] = [];
    const subscription = bus.subscribe(['note'], 'hub', async msg => { seen.push(msg.key); });

    await subscription.close();
    await bus.publish(message('note', 'note.created'));
    await bus.drain();

    expect(seen).toEqual([]);
    await bus.close();
  });

  it('rejects publish after close', async () => {
    const bus = new InProcessBus();
    await bus.close();

    await expect(bus.publish(message('note', 'note.created'))).rejects.toBeInstanceOf(TransientError);
    expect(() => bus.subscribe(['note'], 'late', async () => undefined)).toThrow(TransientError);
  });
});
