export { log, type LogLevel, type LogOptions } from './logger.js';
export {
    createServiceLogger,
    redactUrl,
    type Logger,
    type ServiceLoggerConfig
} from './service-logger.js';
