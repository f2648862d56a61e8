/**
 * Core packaging policy: configuration, image resolution, target selection,
 * the application registry and the renderers built on top of them
 */

export * from './core/config/index.js';
export * from './core/dependencies/index.js';
export * from './core/diagram/index.js';
export * from './core/diff/index.js';
export * from './core/errors.js';
export * from './core/images/index.js';
export * from './core/logging/index.js';
export * from './core/registry/index.js';
export * from './core/serialization/index.js';
export * from './core/targets/index.js';
export * from './core/types/index.js';
