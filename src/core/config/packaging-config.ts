/**
 * Packaging configuration
 *
 * The environment and command-line flags are read exactly once, here, and
 * turned into a frozen PackagingConfig that everything else receives.
 */

import * as path from 'node:path';
import { InvalidConfigurationError } from '../errors.js';
import { APP_VERSION_ENV_VAR, DEFAULT_REGISTRY_PREFIX } from '../images/index.js';
import { type PackagingConfig, PackagingMode } from '../types/index.js';

export const BUILD_DIR_ENV_VAR = 'BUILD_DIR';
export const DEFAULT_BUILD_DIR = '.build';
export const DEFAULT_OUT_DIR = path.join('dist', 'k8s');

export interface PackagingOptions {
  kustomize?: boolean;
  outDir?: string;
  diffBase?: string;
  registryPrefix?: string;
}

export function packagingModeFromFlag(kustomize: boolean | undefined): PackagingMode {
  return kustomize ? PackagingMode.ReleaseKustomize : PackagingMode.DevGraph;
}

export function loadPackagingConfig(options: PackagingOptions, env: NodeJS.ProcessEnv): PackagingConfig {
  const outDir = options.outDir ?? DEFAULT_OUT_DIR;
  if (outDir.trim() === '') {
    throw new InvalidConfigurationError('Output directory must not be empty', 'outDir', outDir);
  }

  const registryPrefix = (options.registryPrefix ?? DEFAULT_REGISTRY_PREFIX).replace(/\/+$/, '');
  if (registryPrefix === '') {
    throw new InvalidConfigurationError(
      'Registry prefix must not be empty',
      'registryPrefix',
      options.registryPrefix
    );
  }

  const buildDir = env[BUILD_DIR_ENV_VAR]?.trim() || DEFAULT_BUILD_DIR;
  const appVersion = env[APP_VERSION_ENV_VAR]?.trim();

  return Object.freeze({
    mode: packagingModeFromFlag(options.kustomize),
    buildDir,
    outDir,
    registryPrefix,
    ...(appVersion && { appVersion }),
    ...(options.diffBase && { diffBase: options.diffBase }),
  });
}
