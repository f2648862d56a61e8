/**
 * Manifest factories
 */

export * from './application/index.js';
export * from './kubernetes/index.js';
export { APP_NAME_LABEL, appLabels, createResource } from './shared.js';
