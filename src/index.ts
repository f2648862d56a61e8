/**
 * simkube-manifests - Kubernetes manifests for the simulation platform, as a
 * dev dependency graph or as kustomize release overlays.
 */

export * from './applications/index.js';
export { CLI_NAME, type CliDependencies, type CliOptions, createProgram, EXIT_CODES, runCli } from './cli.js';
export * from './core.js';
export * from './factories/index.js';
export * from './packaging/index.js';
