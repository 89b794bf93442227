/**
 * Logging Module
 */

export * from './types';
export { Logger } from './logger';
export type { LogContext } from './logger';
export { ComponentLogger } from './component-logger';
export { LocalLogBackend } from './local-backend';
export type { LocalLogBackendOptions } from './local-backend';
