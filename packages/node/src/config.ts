import { readFileSync, existsSync, statSync } from 'node:fs';
import path from 'node:path';
import {
  DEFAULT_PROTOCOL,
  DEFAULT_RECEIVE_TIMEOUT,
  DEFAULT_SEND_TIMEOUT,
  type DriverOptions,
  type PeersAddress,
} from '@peerwire/driver';

/** Driver options as written in the config file. */
export interface DriverConfig {
  /** 'tcp', 'inproc' or 'libp2p'. Default 'tcp'. */
  protocol?: string;
  /** Send timeout in ms (-1 = none). */
  sendTimeout?: number;
  /** Receive timeout in ms (-1 = none). */
  receiveTimeout?: number;
  /** Host advertised to peers. Defaults to the first non-internal IPv4 address. */
  host?: string;
}

/** peerwire configuration file shape. */
export interface PeerwireConfig {
  /** Peer name used as the source of messages sent by this node. */
  name?: string;
  driver?: DriverConfig;
  /** Peers to connect to on start: peer name to channel kind to address. */
  peers?: PeersAddress;
}

export const DEFAULT_CONFIG_PATHS = ['peerwire.config.json', '.peerwire.json'];

function readTimeout(name: string, value: unknown): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const timeout = typeof value === 'string' ? Number(value) : value;
  if (typeof timeout !== 'number' || !Number.isInteger(timeout) || timeout < -1) {
    throw new Error(`Invalid ${name}: expected an integer >= -1, got ${String(value)}`);
  }
  return timeout;
}

/**
 * Resolve driver options: PEERWIRE_* env vars (first), then config.driver, then
 * the driver defaults.
 */
export function resolveDriverOptions(config: PeerwireConfig = {}): DriverOptions {
  const driver = config.driver ?? {};
  const env = process.env;
  const options: DriverOptions = {
    protocol: env['PEERWIRE_PROTOCOL'] || driver.protocol || DEFAULT_PROTOCOL,
    sendTimeout:
      readTimeout('PEERWIRE_SEND_TIMEOUT', env['PEERWIRE_SEND_TIMEOUT']) ??
      readTimeout('driver.sendTimeout', driver.sendTimeout) ??
      DEFAULT_SEND_TIMEOUT,
    receiveTimeout:
      readTimeout('PEERWIRE_RECEIVE_TIMEOUT', env['PEERWIRE_RECEIVE_TIMEOUT']) ??
      readTimeout('driver.receiveTimeout', driver.receiveTimeout) ??
      DEFAULT_RECEIVE_TIMEOUT,
  };
  const host = env['PEERWIRE_HOST'] || driver.host;
  if (host) {
    options.host = host;
  }
  return options;
}

function isPeersAddress(value: unknown): value is PeersAddress {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (addresses) =>
      typeof addresses === 'object' &&
      addresses !== null &&
      !Array.isArray(addresses) &&
      Object.values(addresses).every((address) => typeof address === 'string'),
  );
}

function validateConfig(raw: unknown, source: string): PeerwireConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Config file ${source} must hold a JSON object`);
  }
  const config = raw as Record<string, unknown>;
  if (config.name !== undefined && typeof config.name !== 'string') {
    throw new Error(`Invalid "name" in config file ${source}: expected a string`);
  }
  if (
    config.driver !== undefined &&
    (typeof config.driver !== 'object' || config.driver === null || Array.isArray(config.driver))
  ) {
    throw new Error(`Invalid "driver" in config file ${source}: expected an object`);
  }
  const driver = (config.driver ?? {}) as Record<string, unknown>;
  for (const key of ['protocol', 'host']) {
    if (driver[key] !== undefined && typeof driver[key] !== 'string') {
      throw new Error(`Invalid "driver.${key}" in config file ${source}: expected a string`);
    }
  }
  if (config.peers !== undefined && !isPeersAddress(config.peers)) {
    throw new Error(
      `Invalid "peers" in config file ${source}: expected peer name -> channel kind -> address`,
    );
  }
  return raw as PeerwireConfig;
}

/**
 * Load config from file. If PEERWIRE_CONFIG_PATH is set: when it is a file path, that file is used;
 * when it is a directory, peerwire.config.json / .peerwire.json are searched there. Otherwise searches cwd.
 */
export function loadConfig(explicitPath?: string): PeerwireConfig {
  const envPath = process.env['PEERWIRE_CONFIG_PATH'];
  const resolvedEnv = envPath ? path.resolve(envPath) : undefined;
  let paths: string[];
  if (explicitPath) {
    paths = [path.resolve(explicitPath)];
  } else if (resolvedEnv !== undefined && existsSync(resolvedEnv)) {
    paths = statSync(resolvedEnv).isFile()
      ? [resolvedEnv]
      : DEFAULT_CONFIG_PATHS.map((p) => path.resolve(resolvedEnv, p));
  } else {
    paths = DEFAULT_CONFIG_PATHS.map((p) => path.resolve(process.cwd(), p));
  }

  for (const p of paths) {
    if (existsSync(p)) {
      const raw = readFileSync(p, 'utf8');
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid JSON in config file ${p}: ${message}`);
      }
      return validateConfig(parsed, p);
    }
  }

  return {};
}
