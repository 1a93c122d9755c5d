export { loadStagefileConfig, DEFAULT_CONFIG_FILE } from './loader.js';
export { ConfigError } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
export { cleanNullValues } from './clean-null-values.js';
