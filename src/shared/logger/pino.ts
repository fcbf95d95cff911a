import { pino, type Logger } from 'pino';

import { env } from '../config/env.js';

export const logger: Logger = pino({
  name: 'gif-playback',
  level: env.LOG_LEVEL,
  base: { env: env.NODE_ENV },
});

export const createChildLogger = (bindings: Record<string, unknown>): Logger =>
  logger.child(bindings);
