import { describe, expect, it } from 'vitest';
import { RELEASE_OVERLAYS, selectTarget } from '../../src/core/targets/index.js';
import { PackagingMode } from '../../src/core/types/index.js';

describe('selectTarget', () => {
  it('should render the dev graph as one stream with debug posture', () => {
    expect(selectTarget(PackagingMode.DevGraph)).toEqual({
      mode: 'dev-graph',
      outputShape: 'single-stream',
      emitsDiagram: true,
      emitsDiff: true,
      debugCapabilitiesEnabled: true,
      applyNodeSelectors: true,
    });
  });

  it('should render releases as kustomize overlays without kind-specific settings', () => {
    const selection = selectTarget(PackagingMode.ReleaseKustomize);

    expect(selection.outputShape).toBe('kustomize-overlays');
    expect(selection.emitsDiagram).toBe(false);
    expect(selection.emitsDiff).toBe(false);
    expect(selection.debugCapabilitiesEnabled).toBe(false);
    expect(selection.applyNodeSelectors).toBe(false);
    if (selection.outputShape === 'kustomize-overlays') {
      expect(selection.overlays).toEqual(['base', 'prod', 'sim']);
    }
  });

  it('should return frozen selections', () => {
    expect(Object.isFrozen(selectTarget(PackagingMode.DevGraph))).toBe(true);
    expect(Object.isFrozen(selectTarget(PackagingMode.ReleaseKustomize))).toBe(true);
    expect(Object.isFrozen(RELEASE_OVERLAYS)).toBe(true);
  });
});
