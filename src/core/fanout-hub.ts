/**
 * Realtime Fan-out Hub
 * Relays bus envelopes to connected clients whose subscriptions match.
 *
 * One registry loop owns the client map and consumes a single command queue.
 * Each client has a bounded outbound channel drained by its own writer; a
 * client whose channel is full is evicted instead of being waited on.
 *
 * Events about a concrete resource only reach subscribers holding viewer on
 * it. Those checks run off the registry loop, one event at a time, and come
 * back as release commands so each client still sees events in bus order.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { Channel } from './channel.js';
import { ALL_TOPICS } from './envelope.js';
import { errorMessage } from './errors.js';
import type { BusMessage, BusSubscription, MessageBus } from './message-bus.js';
import { asRecord, extractResource, matchKeys, subscriptionKey } from './resource-extractor.js';
import type { ResourceRef } from './resource-tree.js';
import {
  ClientControlMessageSchema,
  ResourceKindSchema,
  type ResourceKind,
  type RoleType,
  type ServerMessage
} from './types.js';

/**
 * Transport seam: the ws adapter in the server implements this
 */
export interface ClientSocket {
  send(data: string): Promise<void>;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  onMessage(listener: (data: string) => void): void;
  onPong(listener: () => void): void;
  onClose(listener: () => void): void;
}

/**
 * Recipient check; AccessResolver satisfies it
 */
export interface RecipientAccess {
  hasAccess(principal: string, resourceId: string, resourceType: ResourceKind, minRole: RoleType): Promise<boolean>;
}

export interface FanoutHubConfig {
  clientBufferSize: number;   // Outbound frames buffered per client (default: 256)
  pingIntervalMs: number;     // Heartbeat interval (default: 30000)
  readTimeoutMs: number;      // Evict if nothing heard for this long (default: 60000)
  group: string;              // Bus consumer group
}

const DEFAULT_CONFIG: FanoutHubConfig = {
  clientBufferSize: 256,
  pingIntervalMs: 30000,
  readTimeoutMs: 60000,
  group: 'realtime-hub'
};

export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_POLICY_VIOLATION = 1008;

/** Event types anonymous clients may receive */
export const PUBLIC_EVENT_PREFIX = 'public.';

const UuidSchema = z.string().uuid();

/** Hoisted parent ids tried after the resource itself on delete events */
const PARENT_ID_FIELDS: ReadonlyArray<readonly [string, ResourceKind]> = [
  ['block_id', 'block'],
  ['note_id', 'note'],
  ['notebook_id', 'notebook']
];

export interface HubStats {
  clients: number;
  received: number;
  delivered: number;
  evicted: number;
}

interface HubClient {
  id: string;
  userId: string;
  socket: ClientSocket;
  subscriptions: Set<string>;
  outbound: Channel<string>;
  lastSeen: number;
  heartbeat: NodeJS.Timeout | null;
}

type HubCommand =
  | { kind: 'register'; client: HubClient }
  | { kind: 'unregister'; clientId: string; reason: string }
  | { kind: 'control'; clientId: string; raw: string }
  | { kind: 'deliver'; eventType: string; envelope: Record<string, unknown> }
  | { kind: 'release'; frame: string; clientIds: string[] }
  | { kind: 'barrier'; resolve: () => void }
  | { kind: 'shutdown' };

export class FanoutHub {
  private config: FanoutHubConfig;
  private readonly clients = new Map<string, HubClient>();
  private readonly commands = new Channel<HubCommand>();
  private readonly loop: Promise<void>;
  private subscription: BusSubscription | null = null;
  private readonly debug: boolean;
  private stats = { received: 0, delivered: 0, evicted: 0 };
  private authorizations: Promise<void> = Promise.resolve();
  private pendingReleases = 0;

  /**
   * Without `access` every subscribed client is a recipient
   */
  constructor(
    private readonly bus: MessageBus,
    config?: Partial<FanoutHubConfig>,
    private readonly access: RecipientAccess | null = null
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.debug = process.env.NOTES_RT_DEBUG === 'true';
    this.loop = this.run();
  }

  /**
   * Consume every entity topic plus the fallback topic
   */
  start(): void {
    if (this.subscription) return;

    this.subscription = this.bus.subscribe(
      ALL_TOPICS,
      this.config.group,
      async message => this.onBusMessage(message)
    );
    console.log(`[FanoutHub] Consuming ${ALL_TOPICS.join(', ')}`);
  }

  /**
   * Close every client and end the registry loop
   */
  async stop(): Promise<void> {
    const subscription = this.subscription;
    this.subscription = null;
    if (subscription) {
      await subscription.close();
    }

    this.commands.send({ kind: 'shutdown' });
    this.commands.close();
    await this.loop;
    await this.authorizations;
  }

  /**
   * Register a connected socket. Returns the client id.
   */
  handleConnection(socket: ClientSocket, userId: string): string {
    const client: HubClient = {
      id: randomUUID(),
      userId,
      socket,
      subscriptions: new Set(),
      outbound: new Channel<string>(this.config.clientBufferSize),
      lastSeen: Date.now(),
      heartbeat: null
    };

    socket.onMessage(raw => {
      client.lastSeen = Date.now();
      this.commands.send({ kind: 'control', clientId: client.id, raw });
    });
    socket.onPong(() => {
      client.lastSeen = Date.now();
    });
    socket.onClose(() => {
      this.commands.send({ kind: 'unregister', clientId: client.id, reason: 'connection closed' });
    });

    if (!this.commands.send({ kind: 'register', client })) {
      socket.close(CLOSE_GOING_AWAY, 'server shutting down');
    }
    return client.id;
  }

  /**
   * Route an envelope as if it had arrived from the bus
   */
  broadcastMessage(envelope: Record<string, unknown>, key?: string): void {
    const eventType = key ?? (typeof envelope.type === 'string' ? envelope.type : '');
    this.commands.send({ kind: 'deliver', eventType, envelope });
  }

  /**
   * Resolves once every command queued before it has been applied,
   * including deliveries still waiting on access checks
   */
  async flush(): Promise<void> {
    await this.barrier();
    await this.authorizations;
    await this.barrier();
  }

  private barrier(): Promise<void> {
    return new Promise(resolve => {
      if (!this.commands.send({ kind: 'barrier', resolve })) {
        resolve();
      }
    });
  }

  getStats(): HubStats {
    return { clients: this.clients.size, ...this.stats };
  }

  private async onBusMessage(message: BusMessage): Promise<void> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(message.value);
    } catch (error) {
      console.warn(`[FanoutHub] Dropping undecodable ${message.topic}/${message.key}: ${errorMessage(error)}`);
      return;
    }

    const envelope = asRecord(parsed);
    if (!envelope) {
      console.warn(`[FanoutHub] Dropping non-object message on ${message.topic}`);
      return;
    }
    this.broadcastMessage(envelope, message.key || undefined);
  }

  // ============================================================
  // Registry loop
  // ============================================================

  private async run(): Promise<void> {
    for (;;) {
      const command = await this.commands.receive();
      if (command === undefined) return;

      try {
        this.apply(command);
      } catch (error) {
        console.error(`[FanoutHub] ${command.kind} failed: ${errorMessage(error)}`);
      }
    }
  }

  private apply(command: HubCommand): void {
    switch (command.kind) {
      case 'register':
        this.register(command.client);
        break;
      case 'unregister': {
        const client = this.clients.get(command.clientId);
        if (client) this.evict(client, command.reason);
        break;
      }
      case 'control': {
        const client = this.clients.get(command.clientId);
        if (client) this.handleControl(client, command.raw);
        break;
      }
      case 'deliver':
        this.deliver(command.eventType, command.envelope);
        break;
      case 'release':
        this.pendingReleases--;
        for (const clientId of command.clientIds) {
          const client = this.clients.get(clientId);
          if (client) this.push(client, command.frame);
        }
        break;
      case 'barrier':
        command.resolve();
        break;
      case 'shutdown':
        for (const client of [...this.clients.values()]) {
          this.evict(client, 'server shutting down', CLOSE_GOING_AWAY);
        }
        break;
    }
  }

  private register(client: HubClient): void {
    this.clients.set(client.id, client);
    client.heartbeat = setInterval(() => this.heartbeat(client), this.config.pingIntervalMs);
    this.writeLoop(client).catch(err => {
      console.error(`[FanoutHub] Writer for ${client.id} failed:`, err);
    });
    console.log(`[FanoutHub] Client ${client.id} registered for user ${client.userId} (${this.clients.size} connected)`);
  }

  private evict(client: HubClient, reason: string, code: number = CLOSE_POLICY_VIOLATION): void {
    if (!this.clients.delete(client.id)) return;

    if (client.heartbeat) {
      clearInterval(client.heartbeat);
      client.heartbeat = null;
    }
    client.outbound.close();
    client.socket.close(code, reason);
    this.stats.evicted++;
    console.log(`[FanoutHub] Client ${client.id} removed: ${reason} (${this.clients.size} connected)`);
  }

  private deliver(eventType: string, envelope: Record<string, unknown>): void {
    this.stats.received++;

    const resource = extractResource(envelope, eventType || undefined);
    const keys = matchKeys(resource, eventType || null);
    const frame = JSON.stringify({ type: 'event', event: eventType, payload: envelope } satisfies ServerMessage);
    const subscribed = [...this.clients.values()].filter(client => keys.some(key => client.subscriptions.has(key)));

    if (this.debug) {
      console.log(`[FanoutHub] ${eventType} -> ${resource.type}:${resource.id ?? '*'} (${subscribed.length} subscribed)`);
    }
    if (subscribed.length === 0) return;

    const kind = ResourceKindSchema.safeParse(resource.type);
    if (!this.access || resource.id === null || !kind.success) {
      this.release(frame, subscribed, new Map(), []);
      return;
    }

    if (!UuidSchema.safeParse(resource.id).success) {
      console.warn(`[FanoutHub] Dropping ${eventType}: resource id ${resource.id} is not a UUID`);
      return;
    }

    const isPublic = eventType.startsWith(PUBLIC_EVENT_PREFIX);
    const open: HubClient[] = [];
    const byUser = new Map<string, string[]>();
    for (const client of subscribed) {
      if (!UuidSchema.safeParse(client.userId).success) {
        if (isPublic) open.push(client);
        continue;
      }
      const ids = byUser.get(client.userId) ?? [];
      ids.push(client.id);
      byUser.set(client.userId, ids);
    }

    this.release(frame, open, byUser, accessTargets({ kind: kind.data, id: resource.id }, envelope, eventType));
  }

  /**
   * Push straight away when nothing needs checking and no earlier event is
   * still waiting; otherwise queue behind the pending checks.
   */
  private release(frame: string, open: HubClient[], byUser: Map<string, string[]>, targets: ResourceRef[]): void {
    if (byUser.size === 0 && this.pendingReleases === 0) {
      for (const client of open) this.push(client, frame);
      return;
    }

    const clientIds = open.map(client => client.id);
    this.pendingReleases++;
    this.authorizations = this.authorizations
      .then(() => this.authorize(frame, clientIds, byUser, targets))
      .catch(error => {
        console.error(`[FanoutHub] Access check chain failed: ${errorMessage(error)}`);
      });
  }

  private async authorize(
    frame: string,
    clientIds: string[],
    byUser: Map<string, string[]>,
    targets: ResourceRef[]
  ): Promise<void> {
    try {
      for (const [userId, ids] of byUser) {
        if (await this.canView(userId, targets)) clientIds.push(...ids);
      }
    } finally {
      this.commands.send({ kind: 'release', frame, clientIds });
    }
  }

  private async canView(userId: string, targets: ResourceRef[]): Promise<boolean> {
    if (!this.access) return true;

    for (const target of targets) {
      try {
        if (await this.access.hasAccess(userId, target.id, target.kind, 'viewer')) return true;
      } catch (error) {
        console.warn(`[FanoutHub] Access check for ${userId} on ${target.kind}:${target.id} failed: ${errorMessage(error)}`);
      }
    }
    return false;
  }

  private push(client: HubClient, frame: string): void {
    if (client.outbound.trySend(frame)) {
      this.stats.delivered++;
    } else {
      this.evict(client, 'outbound buffer full');
    }
  }

  private handleControl(client: HubClient, raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.enqueue(client, invalidMessage('Message is not valid JSON'));
      return;
    }

    // Accept the flat {type, resource, id} form as well as {type, payload}
    const record = asRecord(json);
    const candidate = record && record.payload === undefined
      ? { type: record.type, payload: { resource: record.resource, id: record.id } }
      : json;

    const parsed = ClientControlMessageSchema.safeParse(candidate);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      this.enqueue(client, invalidMessage(issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid message'));
      return;
    }

    const { type, payload } = parsed.data;
    const key = subscriptionKey(payload.resource, payload.id);

    if (type === 'subscribe') {
      if (client.subscriptions.has(key)) return;
      client.subscriptions.add(key);
      this.enqueue(client, {
        type: 'subscription',
        event: 'confirmed',
        payload: { resource: payload.resource, id: payload.id ?? '' }
      });
    } else {
      client.subscriptions.delete(key);
    }
  }

  private enqueue(client: HubClient, message: ServerMessage): void {
    if (!client.outbound.trySend(JSON.stringify(message))) {
      this.evict(client, 'outbound buffer full');
    }
  }

  private heartbeat(client: HubClient): void {
    if (Date.now() - client.lastSeen > this.config.readTimeoutMs) {
      client.socket.terminate();
      this.commands.send({ kind: 'unregister', clientId: client.id, reason: 'liveness timeout' });
      return;
    }
    try {
      client.socket.ping();
    } catch (error) {
      this.commands.send({ kind: 'unregister', clientId: client.id, reason: `ping failed: ${errorMessage(error)}` });
    }
  }

  private async writeLoop(client: HubClient): Promise<void> {
    for (;;) {
      const frame = await client.outbound.receive();
      if (frame === undefined) return;

      try {
        await client.socket.send(frame);
      } catch (error) {
        this.commands.send({ kind: 'unregister', clientId: client.id, reason: `write failed: ${errorMessage(error)}` });
        return;
      }
    }
  }
}

/**
 * The resource itself, then for delete events the parents the envelope names,
 * since a deleted resource no longer links to them.
 */
function accessTargets(primary: ResourceRef, envelope: Record<string, unknown>, eventType: string): ResourceRef[] {
  const targets = [primary];
  if (!eventType.endsWith('.deleted')) return targets;

  for (const [field, kind] of PARENT_ID_FIELDS) {
    const id = envelope[field];
    if (typeof id !== 'string' || id === primary.id || !UuidSchema.safeParse(id).success) continue;
    targets.push({ kind, id });
  }
  return targets;
}

function invalidMessage(message: string): ServerMessage {
  return { type: 'error', event: 'invalid_message', payload: { message } };
}
