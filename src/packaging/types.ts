import type { OverlayDirectory, PackagingMode } from '../core/types/index.js';

/**
 * A file to write, relative to the output directory
 */
export interface PackageFile {
  path: string;
  content: string;
}

/**
 * A manifest written under its numbered library-style name, then moved into
 * its overlay directory
 */
export interface StagedManifest {
  stagedPath: string;
  finalPath: string;
  content: string;
}

/**
 * Everything a run will write, computed before the first write happens
 */
export interface CompiledPackage {
  mode: PackagingMode;
  files: PackageFile[];
  staged: StagedManifest[];
  /** Relative paths of the manifest outputs */
  manifests: string[];
  /** Relative paths of the side artifacts (diagram, diff) */
  artifacts: string[];
  /** Overlay directories, release mode only */
  overlays: OverlayDirectory[];
}

export interface PackagingResult {
  mode: PackagingMode;
  outDir: string;
  manifests: string[];
  artifacts: string[];
  overlays: string[];
}
