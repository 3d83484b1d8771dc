export { ConfigSchema, SyntaxErrorPolicySchema, LogLevelSchema } from './schema.js';
export type { Config, SyntaxErrorPolicy } from './schema.js';
export { loadConfig, getDefaultConfig, mergeConfig, getConfigPath } from './loader.js';
