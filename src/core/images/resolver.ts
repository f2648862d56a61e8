/**
 * Image resolution
 *
 * Release packaging points every application at its versioned registry image.
 * Dev packaging uses whatever the local build last produced, falling back to a
 * placeholder so incremental builds still yield a complete manifest set.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ImageResolutionError, isNodeError, MissingRequiredConfigurationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { ApplicationSpec, ImageSourceKind, PackagingConfig, ResolvedImage } from '../types/index.js';
import { PackagingMode } from '../types/index.js';

export const PLACEHOLDER_IMAGE = 'PLACEHOLDER';
export const DEFAULT_REGISTRY_PREFIX = 'quay.io/appliedcomputing';
export const APP_VERSION_ENV_VAR = 'APP_VERSION';

export type ImageResolutionContext = Pick<
  PackagingConfig,
  'mode' | 'buildDir' | 'appVersion' | 'registryPrefix'
>;

const logger = getComponentLogger('image-resolver');

/**
 * Path of the file a local build writes an application's image reference to
 */
export function imageFilePath(appId: string, buildDir: string): string {
  return path.join(buildDir, `${appId}-image`);
}

export function resolveImage(appId: string, context: ImageResolutionContext): ResolvedImage {
  if (context.mode === PackagingMode.ReleaseKustomize) {
    return frozenImage(appId, releaseImageReference(appId, context), 'release');
  }

  const imageFile = imageFilePath(appId, context.buildDir);
  let contents: string;
  try {
    contents = fs.readFileSync(imageFile, 'utf8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      logger.debug('No built image found, using placeholder', { appId, imageFile });
      return frozenImage(appId, PLACEHOLDER_IMAGE, 'placeholder');
    }
    throw new ImageResolutionError(appId, imageFile, error);
  }

  const reference = contents.trim();
  if (reference === '') {
    logger.warn('Image file is empty, using placeholder', { appId, imageFile });
    return frozenImage(appId, PLACEHOLDER_IMAGE, 'placeholder');
  }

  return frozenImage(appId, reference, 'build-file');
}

/**
 * Resolve the image for an application, honouring fixed third-party images
 */
export function resolveApplicationImage(
  application: Pick<ApplicationSpec, 'id' | 'image'>,
  context: ImageResolutionContext
): ResolvedImage {
  if (application.image.source === 'fixed') {
    return frozenImage(application.id, application.image.reference, 'fixed');
  }
  return resolveImage(application.id, context);
}

function releaseImageReference(appId: string, context: ImageResolutionContext): string {
  const version = context.appVersion?.trim();
  if (!version) {
    throw new MissingRequiredConfigurationError(
      APP_VERSION_ENV_VAR,
      `release packaging needs a version to build the image reference for '${appId}'`
    );
  }

  const tag = version.startsWith('v') ? version : `v${version}`;
  return `${context.registryPrefix}/${appId}:${tag}`;
}

function frozenImage(appId: string, reference: string, source: ImageSourceKind): ResolvedImage {
  return Object.freeze({ appId, reference, source });
}
