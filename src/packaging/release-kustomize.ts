/**
 * Release packaging: a kustomize layout with a shared `base` and one overlay
 * per target cluster. Each application is rendered to a numbered file first
 * and then moved into the overlay it ships in.
 */

import * as path from 'node:path';
import type { ApplicationRegistry } from '../core/registry/index.js';
import { toYaml, toYamlStream } from '../core/serialization/index.js';
import {
  type OverlayName,
  PackagingMode,
  type ResolvedImage,
  type TargetSelection,
} from '../core/types/index.js';
import { buildApplicationManifests, buildNamespaceManifests, kustomization } from '../factories/index.js';
import type { CompiledPackage, PackageFile, StagedManifest } from './types.js';

export const KUSTOMIZATION_FILENAME = 'kustomization.yml';
export const BASE_NAMESPACE_FILENAME = 'namespace.yml';

export type ReleaseSelection = Extract<TargetSelection, { outputShape: 'kustomize-overlays' }>;

export interface ReleaseKustomizeInput {
  registry: ApplicationRegistry;
  images: ReadonlyMap<string, ResolvedImage>;
  selection: ReleaseSelection;
}

export function stagedManifestName(index: number, appId: string): string {
  return `${String(index).padStart(4, '0')}-${appId}.k8s.yaml`;
}

export function compileReleaseKustomize(input: ReleaseKustomizeInput): CompiledPackage {
  const { registry, images, selection } = input;
  const applications = registry.releaseApplications();

  const staged: StagedManifest[] = applications.map((application, index) => {
    const image = images.get(application.id);
    if (!image) {
      throw new Error(`No image was resolved for application '${application.id}'`);
    }
    if (!application.overlay || !selection.overlays.includes(application.overlay)) {
      throw new Error(`Application '${application.id}' does not ship in any selected overlay`);
    }
    return {
      stagedPath: stagedManifestName(index, application.id),
      finalPath: path.join(application.overlay, `${application.id}.yml`),
      content: toYamlStream(buildApplicationManifests(application, image, selection)),
    };
  });

  const files: PackageFile[] = [
    {
      path: path.join('base', BASE_NAMESPACE_FILENAME),
      content: toYamlStream(buildNamespaceManifests(applications)),
    },
    {
      path: path.join('base', KUSTOMIZATION_FILENAME),
      content: toYaml(kustomization({ resources: [BASE_NAMESPACE_FILENAME] })),
    },
  ];

  const overlays = selection.overlays.filter((overlay): overlay is OverlayName => overlay !== 'base');
  for (const overlay of overlays) {
    const resources = registry.releaseApplications(overlay).map((application) => `${application.id}.yml`);
    files.push({
      path: path.join(overlay, KUSTOMIZATION_FILENAME),
      content: toYaml(kustomization({ resources: ['../base', ...resources] })),
    });
  }

  return {
    mode: PackagingMode.ReleaseKustomize,
    files,
    staged,
    manifests: [...files.map((file) => file.path), ...staged.map((manifest) => manifest.finalPath)],
    artifacts: [],
    overlays: [...selection.overlays],
  };
}
