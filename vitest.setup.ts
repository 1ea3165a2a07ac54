import { configureLogging } from './src/logger.js';

process.env.NODE_ENV = 'test';
// The CLI reads LOG_LEVEL before its config file's level.
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';

configureLogging({ level: 'error', file: null });
