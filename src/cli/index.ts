#!/usr/bin/env node
/**
 * notes-rt CLI
 * Run the realtime server and operate on its outbox and roles
 */

import { Command } from 'commander';
import {
  DEFAULT_STORAGE_DIR,
  getConfigPath,
  getDefaultConfig,
  loadConfig,
  readConfigFile,
  writeConfigFile,
  type RealtimeConfig
} from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import {
  createRealtimeService,
  serviceConfigFrom,
  type RealtimeService
} from '../services/realtime-service.js';
import { startServer } from '../server/index.js';

const program = new Command();

program
  .name('notes-rt')
  .description('Realtime consistency core for the notes backend')
  .version('0.1.0')
  .option('-d, --data-dir <path>', 'Storage directory', DEFAULT_STORAGE_DIR);

function dataDir(): string {
  return program.opts<{ dataDir: string }>().dataDir;
}

function currentConfig(): RealtimeConfig {
  return loadConfig(dataDir());
}

/**
 * Run fn against a service without background polling, then shut it down
 */
async function withService<T>(fn: (service: RealtimeService) => Promise<T>, startWorkers = false): Promise<T> {
  const service = createRealtimeService(serviceConfigFrom(currentConfig(), { startWorkers }));
  try {
    await service.initialize();
    return await fn(service);
  } finally {
    await service.shutdown();
  }
}

function fail(action: string, error: unknown): never {
  console.error(`${action} failed: ${errorMessage(error)}`);
  process.exit(1);
}

/**
 * Serve command
 */
program
  .command('serve')
  .description('Start the HTTP/WebSocket server with dispatcher, synchronizer and hub')
  .option('-p, --port <number>', 'Port (overrides config)')
  .option('-H, --host <hostname>', 'Hostname (overrides config)')
  .action(async (options: { port?: string; host?: string }) => {
    try {
      const config = currentConfig();
      const service = createRealtimeService(serviceConfigFrom(config));
      const running = await startServer(service, {
        hostname: options.host ?? config.hostname,
        port: options.port ? parseInt(options.port, 10) : config.port,
        maxMessageBytes: config.hub.maxMessageBytes
      });

      const stop = async (signal: string): Promise<void> => {
        console.log(`\n[Server] ${signal} received, shutting down`);
        await service.shutdown();
        await running.close();
        process.exit(0);
      };
      process.once('SIGINT', () => {
        stop('SIGINT').catch(err => fail('Shutdown', err));
      });
      process.once('SIGTERM', () => {
        stop('SIGTERM').catch(err => fail('Shutdown', err));
      });
    } catch (error) {
      fail('Serve', error);
    }
  });

/**
 * Config commands
 */
const configCommand = program
  .command('config')
  .description('Manage the config file');

configCommand
  .command('init')
  .description('Write a default config file')
  .option('-f, --force', 'Overwrite an existing file')
  .action((options: { force?: boolean }) => {
    const dir = dataDir();
    if (readConfigFile(dir) && !options.force) {
      console.log(`Config already exists at ${getConfigPath(dir)} (use --force to overwrite)`);
      return;
    }
    writeConfigFile(dir, getDefaultConfig(dir));
    console.log(`✅ Wrote ${getConfigPath(dir)}`);
  });

configCommand
  .command('show')
  .description('Print the effective config (file plus environment overrides)')
  .action(() => {
    console.log(JSON.stringify(currentConfig(), null, 2));
  });

/**
 * Outbox commands
 */
const outboxCommand = program
  .command('outbox')
  .description('Inspect and drain the event outbox');

outboxCommand
  .command('stats')
  .description('Show outbox backlog')
  .action(async () => {
    try {
      await withService(async (service) => {
        const { outbox } = await service.getStatus();
        console.log('\n📤 Outbox\n');
        console.log(`Pending:    ${outbox.pendingCount}`);
        console.log(`Dispatched: ${outbox.dispatchedCount}`);
        console.log(`Oldest pending: ${outbox.oldestPendingAge === null ? '-' : `${Math.round(outbox.oldestPendingAge / 1000)}s`}`);
      });
    } catch (error) {
      fail('Outbox stats', error);
    }
  });

outboxCommand
  .command('flush')
  .description('Dispatch pending events through the in-process synchronizer until the outbox is empty')
  .option('-r, --rounds <number>', 'Maximum dispatch rounds', '10')
  .action(async (options: { rounds: string }) => {
    try {
      const result = await withService(
        service => service.settle(parseInt(options.rounds, 10)),
        true
      );
      console.log(`Dispatched ${result.dispatched} event(s), ${result.failed} failed`);
    } catch (error) {
      fail('Outbox flush', error);
    }
  });

outboxCommand
  .command('cleanup')
  .description('Delete dispatched events older than the retention window')
  .option('--days <number>', 'Retention in days (default: from config)')
  .action(async (options: { days?: string }) => {
    try {
      const days = options.days ? parseInt(options.days, 10) : currentConfig().outbox.cleanupDays;
      const removed = await withService(service => service.cleanupOutbox(days));
      console.log(`Removed ${removed} dispatched event(s) older than ${days} day(s)`);
    } catch (error) {
      fail('Outbox cleanup', error);
    }
  });

/**
 * Role commands
 */
const rolesCommand = program
  .command('roles')
  .description('Manage role grants');

rolesCommand
  .command('grant <userId> <resourceType> <resourceId> <role>')
  .description('Grant (or change) a role on a resource')
  .action(async (userId: string, resourceType: string, resourceId: string, role: string) => {
    try {
      const granted = await withService(service =>
        service.access.assignRole(userId, resourceId, resourceType, role)
      );
      console.log(`✅ ${granted.userId} is ${granted.role} on ${granted.resourceType} ${granted.resourceId} (${granted.id})`);
    } catch (error) {
      fail('Grant', error);
    }
  });

rolesCommand
  .command('list')
  .description('List role grants')
  .option('-u, --user <userId>', 'Filter by user')
  .option('-r, --resource <resourceId>', 'Filter by resource')
  .action(async (options: { user?: string; resource?: string }) => {
    try {
      const roles = await withService(service =>
        service.access.listRoles({ userId: options.user, resourceId: options.resource })
      );
      if (roles.length === 0) {
        console.log('No roles found');
        return;
      }
      for (const role of roles) {
        console.log(`${role.id}  ${role.userId}  ${role.role.padEnd(6)}  ${role.resourceType}:${role.resourceId}`);
      }
    } catch (error) {
      fail('List roles', error);
    }
  });

rolesCommand
  .command('revoke <roleId>')
  .description('Remove a role grant')
  .action(async (roleId: string) => {
    try {
      const removed = await withService(service => service.access.removeRole(roleId));
      console.log(removed ? `Removed ${roleId}` : `Role ${roleId} not found`);
      if (!removed) process.exit(1);
    } catch (error) {
      fail('Revoke', error);
    }
  });

/**
 * Access check
 */
program
  .command('access')
  .description('Access checks')
  .command('check <userId> <resourceType> <resourceId>')
  .description('Check whether a user holds at least a role on a resource')
  .option('--role <role>', 'Minimum role', 'viewer')
  .action(async (userId: string, resourceType: string, resourceId: string, options: { role: string }) => {
    try {
      const allowed = await withService(service =>
        service.access.hasAccess(userId, resourceId, resourceType, options.role)
      );
      console.log(`${allowed ? 'ALLOW' : 'DENY'} ${userId} ${options.role} ${resourceType}:${resourceId}`);
      if (!allowed) process.exit(2);
    } catch (error) {
      fail('Access check', error);
    }
  });

program.parseAsync().catch(err => fail('Command', err));
