// Main exports for @workspace/shared-utils

export { Logger, createLogger, resolveLogLevel, isLogLevel } from './logger.js';
export type { LogLevel } from './logger.js';
export { env, envNumber } from './env.js';
export { nowIso, toIsoString } from './date.js';
