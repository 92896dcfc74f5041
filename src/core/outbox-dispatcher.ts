/**
 * Outbox Dispatcher - drains pending Event rows to the message bus
 * Polls on a fixed interval. A row whose publish fails stays pending and is
 * retried on the next tick; there is no retry cap.
 */

import { EventOutbox } from './event-outbox.js';
import type { MessageBus } from './message-bus.js';
import { buildEnvelope, encodeEnvelope, topicForEntity } from './envelope.js';
import { errorMessage } from './errors.js';

export interface OutboxDispatcherConfig {
  pollIntervalMs: number;   // Tick interval (default: 1000)
  batchSize?: number;       // Rows per tick (default: unlimited)
}

const DEFAULT_CONFIG: OutboxDispatcherConfig = {
  pollIntervalMs: 1000
};

export interface DispatcherStats {
  lastTickAt: Date | null;
  ticks: number;
  dispatched: number;
  failed: number;
  errors: number;
  status: 'idle' | 'dispatching' | 'error' | 'stopped';
}

export interface TickResult {
  dispatched: number;
  failed: number;
}

export class OutboxDispatcher {
  private config: OutboxDispatcherConfig;
  private intervalHandle: NodeJS.Timeout | null = null;
  private running = false;
  private inFlight: Promise<TickResult> | null = null;
  private stats: DispatcherStats = {
    lastTickAt: null,
    ticks: 0,
    dispatched: 0,
    failed: 0,
    errors: 0,
    status: 'idle'
  };

  constructor(
    private outbox: EventOutbox,
    private bus: MessageBus,
    config?: Partial<OutboxDispatcherConfig>
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Start polling. Calling start on a running dispatcher is a no-op.
   */
  start(): void {
    if (this.running) return;

    this.running = true;
    this.stats.status = 'idle';

    this.runTick();
    this.intervalHandle = setInterval(() => this.runTick(), this.config.pollIntervalMs);
  }

  /**
   * Stop polling. An in-flight tick finishes on its own.
   */
  stop(): void {
    this.running = false;
    this.stats.status = 'stopped';

    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
  }

  /**
   * Stop and wait for the in-flight tick
   */
  async shutdown(): Promise<void> {
    this.stop();
    if (this.inFlight) {
      await this.inFlight.catch(() => undefined);
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one tick now. Concurrent callers share the tick already in flight.
   */
  async tick(): Promise<TickResult> {
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.dispatchPending();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  getStats(): DispatcherStats {
    return { ...this.stats };
  }

  private runTick(): void {
    this.tick().catch(err => {
      console.error('[OutboxDispatcher] Tick failed:', err);
    });
  }

  private async dispatchPending(): Promise<TickResult> {
    const result: TickResult = { dispatched: 0, failed: 0 };
    if (this.running) {
      this.stats.status = 'dispatching';
    }

    try {
      const pending = await this.outbox.getPending(this.config.batchSize);

      for (const event of pending) {
        const envelope = buildEnvelope(event);
        try {
          await this.bus.publish({
            topic: topicForEntity(event.entity),
            key: event.eventType,
            value: encodeEnvelope(envelope)
          });
        } catch (error) {
          result.failed++;
          console.warn(`[OutboxDispatcher] Publish failed for ${event.eventType} ${event.id}: ${errorMessage(error)}`);
          continue;
        }

        await this.outbox.markDispatched(event.id);
        result.dispatched++;
      }

      this.stats.ticks++;
      this.stats.lastTickAt = new Date();
      this.stats.dispatched += result.dispatched;
      this.stats.failed += result.failed;
      this.stats.status = this.running ? 'idle' : 'stopped';

      if (result.dispatched > 0 || result.failed > 0) {
        console.log(`[OutboxDispatcher] Dispatched ${result.dispatched}, failed ${result.failed}`);
      }
      return result;
    } catch (error) {
      this.stats.errors++;
      this.stats.status = 'error';
      throw error;
    }
  }
}
