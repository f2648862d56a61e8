import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  DEFAULT_BUILD_DIR,
  DEFAULT_OUT_DIR,
  loadPackagingConfig,
  packagingModeFromFlag,
} from '../../src/core/config/index.js';
import { InvalidConfigurationError } from '../../src/core/errors.js';
import { PackagingMode } from '../../src/core/types/index.js';

describe('Packaging configuration', () => {
  it('should default to the dev graph with the local build directory', () => {
    expect(loadPackagingConfig({}, {})).toEqual({
      mode: PackagingMode.DevGraph,
      buildDir: '.build',
      outDir: path.join('dist', 'k8s'),
      registryPrefix: 'quay.io/appliedcomputing',
    });
    expect(DEFAULT_BUILD_DIR).toBe('.build');
    expect(DEFAULT_OUT_DIR).toBe(path.join('dist', 'k8s'));
  });

  it('should select release packaging from the kustomize flag', () => {
    expect(packagingModeFromFlag(true)).toBe(PackagingMode.ReleaseKustomize);
    expect(packagingModeFromFlag(false)).toBe(PackagingMode.DevGraph);
    expect(packagingModeFromFlag(undefined)).toBe(PackagingMode.DevGraph);
  });

  it('should read the build directory and version from the environment', () => {
    const config = loadPackagingConfig(
      { kustomize: true, outDir: 'out', diffBase: 'previous.k8s.yaml' },
      { BUILD_DIR: '/tmp/build', APP_VERSION: ' 1.4.0 ' }
    );

    expect(config).toEqual({
      mode: PackagingMode.ReleaseKustomize,
      buildDir: '/tmp/build',
      appVersion: '1.4.0',
      outDir: 'out',
      diffBase: 'previous.k8s.yaml',
      registryPrefix: 'quay.io/appliedcomputing',
    });
  });

  it('should leave an empty version unset so release resolution can fail on it', () => {
    expect(loadPackagingConfig({ kustomize: true }, { APP_VERSION: '' }).appVersion).toBeUndefined();
  });

  it('should strip trailing slashes from the registry prefix', () => {
    expect(loadPackagingConfig({ registryPrefix: 'registry.example.com/sim/' }, {}).registryPrefix).toBe(
      'registry.example.com/sim'
    );
  });

  it('should reject empty output directories and registry prefixes', () => {
    expect(() => loadPackagingConfig({ outDir: ' ' }, {})).toThrow(InvalidConfigurationError);
    expect(() => loadPackagingConfig({ registryPrefix: '/' }, {})).toThrow('Registry prefix must not be empty');
  });

  it('should return a frozen config', () => {
    expect(Object.isFrozen(loadPackagingConfig({}, {}))).toBe(true);
  });
});
