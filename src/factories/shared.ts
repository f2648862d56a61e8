/**
 * Shared utilities for factory functions
 */

import type { KubernetesObject, V1ObjectMeta } from '@kubernetes/client-node';
import type { Manifest } from '../core/types/index.js';

export const APP_NAME_LABEL = 'app.kubernetes.io/name';

/**
 * Stamp type information onto a resource and make sure it carries a name
 */
export function createResource<T extends KubernetesObject>(
  typeInfo: { apiVersion: string; kind: string },
  resource: T
): Manifest<T> {
  const metadata: V1ObjectMeta = resource.metadata ?? {};
  const name = metadata.name ?? `unnamed-${typeInfo.kind.toLowerCase()}`;

  return {
    ...resource,
    apiVersion: typeInfo.apiVersion,
    kind: typeInfo.kind,
    metadata: { ...metadata, name },
  };
}

export function appLabels(appId: string): Record<string, string> {
  return { [APP_NAME_LABEL]: appId };
}
