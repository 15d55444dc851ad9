import { logger } from '@libp2p/logger';
import { Driver, type DriverOptions } from '@peerwire/driver';
import { loadConfig, resolveDriverOptions, type PeerwireConfig } from './config.js';

const log = logger('peerwire:node');

/** A started driver together with the config it was started from. */
export interface RunningNode {
  name: string;
  config: PeerwireConfig;
  driver: Driver;
}

/**
 * Create a driver from config and connect it to the configured peers. The
 * driver is closed again when connecting fails.
 */
export async function startNode(
  config: PeerwireConfig,
  overrides: Partial<DriverOptions> = {},
): Promise<RunningNode> {
  const driver = await Driver.create({ ...resolveDriverOptions(config), ...overrides });
  const name = config.name ?? 'peerwire-node';
  log('%s listening at %o', name, driver.address);

  const peers = config.peers ?? {};
  try {
    await driver.connect(peers);
  } catch (error) {
    await driver.close();
    throw error;
  }
  log('%s connected to %d peers', name, Object.keys(peers).length);

  return { name, config, driver };
}

/** Load config from file (see loadConfig) and start a node from it. */
export async function runNode(configPath?: string): Promise<RunningNode> {
  return startNode(loadConfig(configPath));
}
