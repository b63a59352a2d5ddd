import type { Logger } from 'pino';

export type PlayerLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error' | 'fatal'>;
