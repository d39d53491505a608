import pino from 'pino';
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV_VAR } from '../config/constants';

type LogMeta = Record<string, unknown>;

// JSON lines on stderr; stdout is left to the caller
const baseLogger = pino(
  {
    name: 'stance-github',
    level: process.env[LOG_LEVEL_ENV_VAR] || DEFAULT_LOG_LEVEL,
    serializers: { error: pino.stdSerializers.err },
  },
  pino.destination(2)
);

/**
 * Module-wide logger taking `(message, meta)` in that order
 */
export const logger = {
  debug(message: string, meta: LogMeta = {}) {
    baseLogger.debug(meta, message);
  },
  info(message: string, meta: LogMeta = {}) {
    baseLogger.info(meta, message);
  },
  warn(message: string, meta: LogMeta = {}) {
    baseLogger.warn(meta, message);
  },
  error(message: string, meta: LogMeta = {}) {
    baseLogger.error(meta, message);
  },
};
