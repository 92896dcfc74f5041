/**
 * Realtime Service - process-wide wiring of the realtime core
 * Store, access resolver, bus, dispatcher, synchronizer and hub are built once
 * here and handed to their consumers.
 */

import { NoteStore } from '../core/note-store.js';
import { AccessResolver } from '../core/access-resolver.js';
import { InProcessBus, type MessageBus } from '../core/message-bus.js';
import {
  OutboxDispatcher,
  type DispatcherStats,
  type OutboxDispatcherConfig,
  type TickResult
} from '../core/outbox-dispatcher.js';
import { BlockTaskSynchronizer, type SynchronizerStats } from '../core/block-task-sync.js';
import { FanoutHub, type FanoutHubConfig, type HubStats } from '../core/fanout-hub.js';
import type { OutboxMetrics } from '../core/event-outbox.js';
import type { RealtimeConfig } from '../core/config.js';

export interface RealtimeServiceConfig {
  databasePath: string;
  /** Defaults to an in-process bus owned by the service */
  bus?: MessageBus;
  dispatcher?: Partial<OutboxDispatcherConfig>;
  hub?: Partial<FanoutHubConfig>;
  /** Start dispatcher, synchronizer and hub on initialize (default: true) */
  startWorkers?: boolean;
  debug?: boolean;
}

export interface RealtimeStatus {
  outbox: OutboxMetrics;
  dispatcher: DispatcherStats;
  synchronizer: SynchronizerStats;
  hub: HubStats;
}

export class RealtimeService {
  readonly store: NoteStore;
  readonly access: AccessResolver;
  readonly bus: MessageBus;
  readonly dispatcher: OutboxDispatcher;
  readonly synchronizer: BlockTaskSynchronizer;
  readonly hub: FanoutHub;

  private readonly ownsBus: boolean;
  private readonly startWorkers: boolean;
  private initialized = false;
  private closed = false;

  constructor(config: RealtimeServiceConfig) {
    this.store = new NoteStore(config.databasePath);
    this.access = new AccessResolver(this.store.roles, this.store, { debug: config.debug });

    this.ownsBus = config.bus === undefined;
    this.bus = config.bus ?? new InProcessBus();

    this.dispatcher = new OutboxDispatcher(this.store.outbox, this.bus, config.dispatcher);
    this.synchronizer = new BlockTaskSynchronizer(this.store, this.access, this.bus, { debug: config.debug });
    this.hub = new FanoutHub(this.bus, config.hub, this.access);
    this.startWorkers = config.startWorkers ?? true;
  }

  /**
   * Create tables and start background workers
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    await this.store.initialize();

    if (this.startWorkers) {
      this.synchronizer.start();
      this.hub.start();
      this.dispatcher.start();
    }

    this.initialized = true;
  }

  /**
   * Tick until the outbox stays empty, letting in-process consumers run between
   * ticks so their own writes are dispatched too
   */
  async settle(maxRounds: number = 10): Promise<TickResult> {
    await this.initialize();
    const total: TickResult = { dispatched: 0, failed: 0 };

    for (let round = 0; round < maxRounds; round++) {
      const result = await this.dispatcher.tick();
      total.dispatched += result.dispatched;
      total.failed += result.failed;

      if (this.bus instanceof InProcessBus) {
        await this.bus.drain();
      }
      if (result.dispatched === 0 && (await this.store.outbox.getPending(1)).length === 0) break;
    }

    return total;
  }

  async cleanupOutbox(olderThanDays: number): Promise<number> {
    await this.initialize();
    return this.store.outbox.cleanup(olderThanDays);
  }

  async getStatus(): Promise<RealtimeStatus> {
    await this.initialize();
    return {
      outbox: await this.store.outbox.getMetrics(),
      dispatcher: this.dispatcher.getStats(),
      synchronizer: this.synchronizer.getStats(),
      hub: this.hub.getStats()
    };
  }

  /**
   * Stop workers, close the bus if owned, then the store
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await this.dispatcher.shutdown();
    await this.synchronizer.stop();
    await this.hub.stop();

    if (this.ownsBus) {
      await this.bus.close();
    }

    await this.store.close();
  }
}

export function createRealtimeService(config: RealtimeServiceConfig): RealtimeService {
  return new RealtimeService(config);
}

/**
 * Service settings derived from the loaded config file
 */
export function serviceConfigFrom(config: RealtimeConfig, overrides: Partial<RealtimeServiceConfig> = {}): RealtimeServiceConfig {
  return {
    databasePath: config.databasePath,
    dispatcher: { pollIntervalMs: config.outbox.pollIntervalMs },
    hub: {
      clientBufferSize: config.hub.clientBufferSize,
      pingIntervalMs: config.hub.pingIntervalMs,
      readTimeoutMs: config.hub.readTimeoutMs
    },
    ...overrides
  };
}
