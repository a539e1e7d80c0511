export { formatLabel, getLogger, resetLoggers, type Logger } from './pino-logger.js';
export { loggerEnvSchema, logLevels, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
