/**
 * Dev packaging: one dependency-ordered manifest stream for the local kind
 * cluster, plus the dependency diagram and a diff against a baseline.
 */

import { renderDependencyDiagram } from '../core/diagram/index.js';
import { diffManifestStreams, renderManifestDiff } from '../core/diff/index.js';
import type { ApplicationRegistry } from '../core/registry/index.js';
import { toYamlStream } from '../core/serialization/index.js';
import type { ApplicationManifest, ResolvedImage, TargetSelection } from '../core/types/index.js';
import { PackagingMode } from '../core/types/index.js';
import { buildApplicationManifests, buildNamespaceManifests } from '../factories/index.js';
import type { CompiledPackage, PackageFile } from './types.js';

export const DEV_MANIFEST_FILENAME = 'simkube.k8s.yaml';
export const DAG_FILENAME = 'dag.mermaid';
export const DIFF_FILENAME = 'k8s.df';

export type DevGraphSelection = Extract<TargetSelection, { outputShape: 'single-stream' }>;

export interface DevGraphInput {
  registry: ApplicationRegistry;
  images: ReadonlyMap<string, ResolvedImage>;
  selection: DevGraphSelection;
  /** Previously rendered manifest stream to diff against */
  baseline?: string;
}

export function compileDevGraph(input: DevGraphInput): CompiledPackage {
  const { registry, images, selection } = input;
  const applications = registry.orderedApplications();

  const manifests: ApplicationManifest[] = buildNamespaceManifests(applications);
  for (const application of applications) {
    const image = images.get(application.id);
    if (!image) {
      throw new Error(`No image was resolved for application '${application.id}'`);
    }
    manifests.push(...buildApplicationManifests(application, image, selection));
  }

  const stream = toYamlStream(manifests);
  const files: PackageFile[] = [{ path: DEV_MANIFEST_FILENAME, content: stream }];
  const artifacts: string[] = [];

  if (selection.emitsDiagram) {
    const diagram = renderDependencyDiagram({
      nodes: registry.listApplications().map((application) => application.id),
      edges: registry.dependencyEdges(),
    });
    files.push({ path: DAG_FILENAME, content: diagram });
    artifacts.push(DAG_FILENAME);
  }

  if (selection.emitsDiff) {
    const diff = renderManifestDiff(diffManifestStreams(input.baseline, stream));
    files.push({ path: DIFF_FILENAME, content: diff });
    artifacts.push(DIFF_FILENAME);
  }

  return {
    mode: PackagingMode.DevGraph,
    files,
    staged: [],
    manifests: [DEV_MANIFEST_FILENAME],
    artifacts,
    overlays: [],
  };
}
