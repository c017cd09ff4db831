/**
 * Shared library utilities
 */
export { sleep } from './sleep';
export { logger, setVerbose } from './logger';
export { ConfigError } from './errors';
