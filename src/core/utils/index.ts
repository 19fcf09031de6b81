/**
 * Core utilities barrel exports
 */

// Rendering-boundary conversions
export * from './mathUtils';

// Logging
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './logger';
