export * from './contracts/animation-player.js';
export * from './contracts/draw-surface.js';
export * from './contracts/image-source.js';
export * from './contracts/image-transformer.js';
export * from './contracts/player-logger.js';
export * from './entities/animation-definition.js';
export * from './entities/observer-registry.js';
export * from './entities/playback-state.js';
export * from './value-objects/bounds.js';
export * from './value-objects/frame-store.js';
export * from './value-objects/play-mode.js';
export * from './value-objects/raster-image.js';
