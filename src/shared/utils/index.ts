/**
 * Shared Utilities
 */

export { logger, Logger, LogLevel } from './logger';
export type { LogMeta } from './logger';
export { generateId } from './uuid';
export { withTimeout } from './timeout';
export { parseIntEnv, parseFloatEnv, parseListEnv, parseRecordEnv } from './env';
