export { formatLabel, getLogger, initLogger, type Logger, type LoggerOverrides } from './logger.js';
export { loggerEnvSchema, logLevels, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
