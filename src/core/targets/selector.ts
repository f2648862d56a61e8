import type { OverlayDirectory, TargetSelection } from '../types/index.js';
import { PackagingMode } from '../types/index.js';

export const RELEASE_OVERLAYS: readonly OverlayDirectory[] = Object.freeze(['base', 'prod', 'sim']);

/**
 * Decide output shape and container posture for a packaging mode.
 *
 * Release output is not guaranteed to land on a local multi-node kind cluster,
 * so it never carries the kind-specific node selectors or debug capabilities.
 */
export function selectTarget(mode: PackagingMode): TargetSelection {
  switch (mode) {
    case PackagingMode.DevGraph: {
      const selection: TargetSelection = {
        mode,
        outputShape: 'single-stream',
        emitsDiagram: true,
        emitsDiff: true,
        debugCapabilitiesEnabled: true,
        applyNodeSelectors: true,
      };
      return Object.freeze(selection);
    }
    case PackagingMode.ReleaseKustomize: {
      const selection: TargetSelection = {
        mode,
        outputShape: 'kustomize-overlays',
        overlays: RELEASE_OVERLAYS,
        emitsDiagram: false,
        emitsDiff: false,
        debugCapabilitiesEnabled: false,
        applyNodeSelectors: false,
      };
      return Object.freeze(selection);
    }
  }
}
