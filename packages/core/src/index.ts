import 'reflect-metadata';

// Types
export * from './types';

// Pre-authorize declarations, attribute registry and decision manager
export * from './method-security';

// Expression engines
export * from './cel';

// Configuration
export * from './config';

// Logging
export { Logger, getDefaultLogger, type LogLevel, type LoggerOptions } from './utils/logger';
