import type { OverlayName } from './application.js';

export const PackagingMode = {
  DevGraph: 'dev-graph',
  ReleaseKustomize: 'release-kustomize',
} as const;
export type PackagingMode = (typeof PackagingMode)[keyof typeof PackagingMode];

export type ImageSourceKind = 'release' | 'build-file' | 'placeholder' | 'fixed';

/**
 * Outcome of image resolution for one application; frozen once computed
 */
export interface ResolvedImage {
  readonly appId: string;
  readonly reference: string;
  readonly source: ImageSourceKind;
}

export type OverlayDirectory = 'base' | OverlayName;

export type TargetSelection =
  | {
      readonly mode: typeof PackagingMode.DevGraph;
      readonly outputShape: 'single-stream';
      readonly emitsDiagram: true;
      readonly emitsDiff: true;
      readonly debugCapabilitiesEnabled: true;
      readonly applyNodeSelectors: true;
    }
  | {
      readonly mode: typeof PackagingMode.ReleaseKustomize;
      readonly outputShape: 'kustomize-overlays';
      readonly overlays: readonly OverlayDirectory[];
      readonly emitsDiagram: false;
      readonly emitsDiff: false;
      readonly debugCapabilitiesEnabled: false;
      readonly applyNodeSelectors: false;
    };

/**
 * Everything a packaging run needs, read once at the process boundary
 */
export interface PackagingConfig {
  readonly mode: PackagingMode;
  readonly buildDir: string;
  readonly appVersion?: string;
  readonly outDir: string;
  readonly diffBase?: string;
  readonly registryPrefix: string;
}
