// Core module exports for repomd-reader

// Repository metadata
export * from './metadata';

// Config
export { ConfigManager, getConfigManager, DEFAULT_CONFIG } from './config';
export type { Config, ConfigKey } from './config';
