export * from './cache/frame-cache.js';
export * from './debug/debug-overlay.js';
export * from './frame-player.js';
export * from './imaging/placeholder.js';
export * from './imaging/raster-transformer.js';
export * from './sources/map-image-source.js';
export * from './sources/png-file-image-source.js';
export * from './surfaces/canvas-draw-surface.js';
