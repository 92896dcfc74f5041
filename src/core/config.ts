/**
 * Realtime Config
 * JSON config stored under the storage directory, with environment overrides.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export type RealtimeConfig = {
  version: 1;
  /** SQLite database file */
  databasePath: string;
  hostname: string;
  port: number;
  outbox: {
    pollIntervalMs: number;
    /** Dispatched rows older than this are removed by `outbox cleanup` */
    cleanupDays: number;
  };
  hub: {
    clientBufferSize: number;
    pingIntervalMs: number;
    readTimeoutMs: number;
    maxMessageBytes: number;
  };
};

export const DEFAULT_STORAGE_DIR = path.join(os.homedir(), '.notes-realtime');
export const CONFIG_FILE_NAME = 'notes-realtime.json';

export function getDefaultConfig(storagePath: string = DEFAULT_STORAGE_DIR): RealtimeConfig {
  return {
    version: 1,
    databasePath: path.join(storagePath, 'notes.sqlite'),
    hostname: '127.0.0.1',
    port: 8080,
    outbox: {
      pollIntervalMs: 1000,
      cleanupDays: 7
    },
    hub: {
      clientBufferSize: 256,
      pingIntervalMs: 30000,
      readTimeoutMs: 60000,
      maxMessageBytes: 512 * 1024
    }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asNonEmptyString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const s = value.trim();
  return s.length > 0 ? s : null;
}

function asPositiveInt(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    const n = Math.trunc(value);
    return n > 0 ? n : null;
  }
  if (typeof value === 'string') {
    const n = parseInt(value, 10);
    return Number.isFinite(n) && n > 0 ? n : null;
  }
  return null;
}

function asPort(value: unknown): number | null {
  const n = asPositiveInt(value);
  return n !== null && n <= 65535 ? n : null;
}

export function getConfigPath(storagePath: string): string {
  return path.join(storagePath, CONFIG_FILE_NAME);
}

/**
 * Normalize an arbitrary JSON value into a config. Unusable fields fall back to defaults.
 * Returns null when the document is not a version 1 config.
 */
export function normalizeConfig(raw: unknown, storagePath: string = DEFAULT_STORAGE_DIR): RealtimeConfig | null {
  if (!isRecord(raw) || raw.version !== 1) return null;

  const defaults = getDefaultConfig(storagePath);
  const outbox = isRecord(raw.outbox) ? raw.outbox : {};
  const hub = isRecord(raw.hub) ? raw.hub : {};

  return {
    version: 1,
    databasePath: asNonEmptyString(raw.databasePath) ?? defaults.databasePath,
    hostname: asNonEmptyString(raw.hostname) ?? defaults.hostname,
    port: asPort(raw.port) ?? defaults.port,
    outbox: {
      pollIntervalMs: asPositiveInt(outbox.pollIntervalMs) ?? defaults.outbox.pollIntervalMs,
      cleanupDays: asPositiveInt(outbox.cleanupDays) ?? defaults.outbox.cleanupDays
    },
    hub: {
      clientBufferSize: asPositiveInt(hub.clientBufferSize) ?? defaults.hub.clientBufferSize,
      pingIntervalMs: asPositiveInt(hub.pingIntervalMs) ?? defaults.hub.pingIntervalMs,
      readTimeoutMs: asPositiveInt(hub.readTimeoutMs) ?? defaults.hub.readTimeoutMs,
      maxMessageBytes: asPositiveInt(hub.maxMessageBytes) ?? defaults.hub.maxMessageBytes
    }
  };
}

export function readConfigFile(storagePath: string): RealtimeConfig | null {
  const configPath = getConfigPath(storagePath);
  if (!fs.existsSync(configPath)) return null;

  try {
    const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    return normalizeConfig(raw, storagePath);
  } catch (error) {
    console.warn(`[Config] Ignoring unreadable ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

export function writeConfigFile(storagePath: string, config: RealtimeConfig): RealtimeConfig {
  if (!fs.existsSync(storagePath)) {
    fs.mkdirSync(storagePath, { recursive: true });
  }

  const configPath = getConfigPath(storagePath);
  const tmpPath = `${configPath}.tmp`;

  fs.writeFileSync(tmpPath, JSON.stringify(config, null, 2));
  fs.renameSync(tmpPath, configPath);

  return config;
}

/**
 * NOTES_RT_DB_PATH, NOTES_RT_HOST, NOTES_RT_PORT, NOTES_RT_POLL_MS win over the file
 */
export function applyEnvOverrides(config: RealtimeConfig, env: NodeJS.ProcessEnv = process.env): RealtimeConfig {
  return {
    ...config,
    databasePath: asNonEmptyString(env.NOTES_RT_DB_PATH) ?? config.databasePath,
    hostname: asNonEmptyString(env.NOTES_RT_HOST) ?? config.hostname,
    port: asPort(env.NOTES_RT_PORT) ?? config.port,
    outbox: {
      ...config.outbox,
      pollIntervalMs: asPositiveInt(env.NOTES_RT_POLL_MS) ?? config.outbox.pollIntervalMs
    }
  };
}

/**
 * File config (or defaults) with environment overrides applied
 */
export function loadConfig(
  storagePath: string = DEFAULT_STORAGE_DIR,
  env: NodeJS.ProcessEnv = process.env
): RealtimeConfig {
  const base = readConfigFile(storagePath) ?? getDefaultConfig(storagePath);
  return applyEnvOverrides(base, env);
}
