export * from './domain/frame-player/index.js';
export * from './application/frame-player/index.js';
export * from './infrastructure/frame-player/index.js';
export { AppError, isAppError, type ErrorCategory } from './shared/errors/app-error.js';
export { createChildLogger } from './shared/logger/pino.js';
