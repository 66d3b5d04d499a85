export { ConfigManager, DEFAULT_CONFIG_PATH } from './config-manager';
export { resolveOptions, ENV_FILE, ENV_MODE, type MockableOptions, type ResolvedOptions } from './options';
