export { runNode, startNode } from './runner.js';
export type { RunningNode } from './runner.js';
export { DEFAULT_CONFIG_PATHS, loadConfig, resolveDriverOptions } from './config.js';
export type { DriverConfig, PeerwireConfig } from './config.js';
