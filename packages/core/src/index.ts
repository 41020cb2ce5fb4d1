/**
 * @module @pubwatch/core
 */

export * from './errors.js';
export * from './redact.js';
export * from './shell-adapter.js';
export * from './poll.js';
export * from './version-resolver.js';
export * from './version-source.js';
export * from './version-info.js';
export * from './branch.js';
export * from './publisher.js';
export * from './availability.js';
export * from './registry/index.js';
export * from './config.js';
export * from './stages/build-stage.js';
export * from './stages/publish-stage.js';
export * from './runner.js';
export * from './reporters/index.js';
