export { formatLabel, getLogger, resetLoggers, type Logger } from './logger.js';
export { logLevels, loggerEnvSchema, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
