/**
 * Message bus abstraction
 * Opaque publish/subscribe transport between the dispatcher and its consumers.
 */

import { Channel } from './channel.js';
import { TransientError, errorMessage } from './errors.js';

export interface BusMessage {
  topic: string;
  /** Event type */
  key: string;
  /** JSON envelope */
  value: string;
}

export type BusHandler = (message: BusMessage) => Promise<void>;

export interface BusSubscription {
  readonly topics: readonly string[];
  readonly group: string;
  close(): Promise<void>;
}

export interface MessageBus {
  publish(message: BusMessage): Promise<void>;
  /**
   * Register a consumer group. Messages reach the handler one at a time, in publish order.
   */
  subscribe(topics: readonly string[], group: string, handler: BusHandler): BusSubscription;
  close(): Promise<void>;
}

class InProcessSubscription implements BusSubscription {
  private readonly queue = new Channel<BusMessage>();
  private readonly loop: Promise<void>;
  private pending = 0;

  constructor(
    readonly topics: readonly string[],
    readonly group: string,
    private readonly handler: BusHandler,
    private readonly onClose: (subscription: InProcessSubscription) => void
  ) {
    this.loop = this.consume();
  }

  accepts(topic: string): boolean {
    return this.topics.includes(topic);
  }

  enqueue(message: BusMessage): boolean {
    const accepted = this.queue.send(message);
    if (accepted) this.pending++;
    return accepted;
  }

  /**
   * Resolves when every message queued so far has been handled
   */
  async drain(): Promise<void> {
    while (this.pending > 0) {
      await new Promise<void>(resolve => setImmediate(resolve));
    }
  }

  async close(): Promise<void> {
    this.queue.close();
    this.onClose(this);
    await this.loop;
  }

  private async consume(): Promise<void> {
    for (;;) {
      const message = await this.queue.receive();
      if (message === undefined) return;

      try {
        await this.handler(message);
      } catch (error) {
        console.error(`[InProcessBus] ${this.group} failed on ${message.topic}/${message.key}: ${errorMessage(error)}`);
      } finally {
        this.pending--;
      }
    }
  }
}

/**
 * Single-process bus. Each subscription owns a sequential delivery queue,
 * so a slow consumer never blocks publish.
 */
export class InProcessBus implements MessageBus {
  private readonly subscriptions = new Set<InProcessSubscription>();
  private closed = false;

  async publish(message: BusMessage): Promise<void> {
    if (this.closed) {
      throw new TransientError('Message bus is closed');
    }
    for (const subscription of this.subscriptions) {
      if (subscription.accepts(message.topic)) {
        subscription.enqueue(message);
      }
    }
  }

  subscribe(topics: readonly string[], group: string, handler: BusHandler): BusSubscription {
    if (this.closed) {
      throw new TransientError('Message bus is closed');
    }
    const subscription = new InProcessSubscription(
      [...topics],
      group,
      handler,
      sub => this.subscriptions.delete(sub)
    );
    this.subscriptions.add(subscription);
    return subscription;
  }

  /**
   * Wait until every subscription has handled what was published so far
   */
  async drain(): Promise<void> {
    for (const subscription of [...this.subscriptions]) {
      await subscription.drain();
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await Promise.all([...this.subscriptions].map(sub => sub.close()));
  }
}
