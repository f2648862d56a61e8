/**
 * Manifest packaging entry points
 */

import * as path from 'node:path';
import type { ApplicationRegistry } from '../core/registry/index.js';
import type { PackagingConfig } from '../core/types/index.js';
import { compilePackage } from './compile.js';
import type { PackagingResult } from './types.js';
import { writePackage } from './writer.js';

export { compilePackage } from './compile.js';
export {
  compileDevGraph,
  DAG_FILENAME,
  DEV_MANIFEST_FILENAME,
  type DevGraphInput,
  type DevGraphSelection,
  DIFF_FILENAME,
} from './dev-graph.js';
export {
  BASE_NAMESPACE_FILENAME,
  compileReleaseKustomize,
  KUSTOMIZATION_FILENAME,
  type ReleaseKustomizeInput,
  type ReleaseSelection,
  stagedManifestName,
} from './release-kustomize.js';
export type {
  CompiledPackage,
  PackageFile,
  PackagingResult,
  StagedManifest,
} from './types.js';
export { writePackage } from './writer.js';

/**
 * Compile and write one packaging run
 */
export function runPackaging(registry: ApplicationRegistry, config: PackagingConfig): PackagingResult {
  const compiled = compilePackage(registry, config);
  writePackage(compiled, config.outDir);

  const resolve = (relative: string): string => path.join(config.outDir, relative);
  return {
    mode: compiled.mode,
    outDir: config.outDir,
    manifests: compiled.manifests.map(resolve),
    artifacts: compiled.artifacts.map(resolve),
    overlays: compiled.overlays.map(resolve),
  };
}
