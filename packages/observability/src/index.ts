export { log, type LogLevel } from './logger.js';
export { createServiceLogger, type ServiceLogger, type ServiceLoggerConfig } from './service-logger.js';
