import { pino, type Bindings, type Logger } from 'pino';

import { loadConfig } from '../config/env.js';

export const logger: Logger = pino({
  name: 'spritebake',
  level: loadConfig().logLevel,
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    error: pino.stdSerializers.err,
  },
});

export function createChildLogger(bindings: Bindings): Logger {
  return logger.child(bindings);
}
