import pino, { type Logger } from 'pino';

import { getEnvironment } from '../config/environment.js';

export const rootLogger: Logger = pino({
  name: 'sprite-frame-player',
  level: getEnvironment().LOG_LEVEL,
});

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return rootLogger.child(bindings);
}
