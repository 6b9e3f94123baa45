export * from './config/defaults.js';
export * from './utils/env-manager.js';
export * from './world/errors.js';
export * from './world/identity.js';
export * from './world/lazy.js';
export * from './world/source.js';
export * from './world/slot-cache.js';
export * from './world/dependencies.js';
export * from './world/world.js';
export * from './fonts/book.js';
export * from './fonts/searcher.js';
export * from './engine/types.js';
export * from './engine/plain-engine.js';
export * from './engine/loader.js';
export * from './compile/diagnostics.js';
export * from './compile/recompile.js';
