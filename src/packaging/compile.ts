import * as fs from 'node:fs';
import { InvalidConfigurationError, isNodeError } from '../core/errors.js';
import { resolveApplicationImage } from '../core/images/index.js';
import { getApplicationLogger, getComponentLogger } from '../core/logging/index.js';
import type { ApplicationRegistry } from '../core/registry/index.js';
import { selectTarget } from '../core/targets/index.js';
import type { ApplicationSpec, PackagingConfig, ResolvedImage } from '../core/types/index.js';
import { compileDevGraph } from './dev-graph.js';
import { compileReleaseKustomize } from './release-kustomize.js';
import type { CompiledPackage } from './types.js';

const logger = getComponentLogger('packaging');

/**
 * Compile a whole run in memory. Throws before anything is written if an
 * image, the baseline or the registry cannot be resolved.
 */
export function compilePackage(registry: ApplicationRegistry, config: PackagingConfig): CompiledPackage {
  const selection = selectTarget(config.mode);
  logger.info('Packaging manifests', { mode: config.mode, outputShape: selection.outputShape });

  switch (selection.outputShape) {
    case 'single-stream': {
      const images = resolveImages(registry.orderedApplications(), config);
      const baseline = config.diffBase === undefined ? undefined : readBaseline(config.diffBase);
      return compileDevGraph({ registry, images, selection, ...(baseline !== undefined && { baseline }) });
    }
    case 'kustomize-overlays': {
      const images = resolveImages(registry.releaseApplications(), config);
      return compileReleaseKustomize({ registry, images, selection });
    }
  }
}

function resolveImages(
  applications: readonly ApplicationSpec[],
  config: PackagingConfig
): Map<string, ResolvedImage> {
  const images = new Map<string, ResolvedImage>();
  for (const application of applications) {
    const image = resolveApplicationImage(application, config);
    getApplicationLogger(application.id).debug('Resolved image', {
      reference: image.reference,
      source: image.source,
    });
    images.set(application.id, image);
  }
  return images;
}

function readBaseline(diffBase: string): string {
  try {
    return fs.readFileSync(diffBase, 'utf8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new InvalidConfigurationError(`Diff baseline not found: ${diffBase}`, 'diffBase', diffBase);
    }
    throw error;
  }
}
