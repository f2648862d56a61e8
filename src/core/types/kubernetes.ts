/**
 * Kubernetes object types produced by the manifest factories
 */

import type {
  KubernetesObject,
  V1ClusterRoleBinding,
  V1ConfigMap,
  V1Deployment,
  V1Namespace,
  V1ObjectMeta,
  V1Service,
  V1ServiceAccount,
} from '@kubernetes/client-node';

export type NamedObjectMeta = V1ObjectMeta & { name: string };

/**
 * A Kubernetes object whose type information and name are always present
 */
export type Manifest<T extends KubernetesObject = KubernetesObject> = T & {
  apiVersion: string;
  kind: string;
  metadata: NamedObjectMeta;
};

export type ApplicationManifest =
  | Manifest<V1ConfigMap>
  | Manifest<V1ServiceAccount>
  | Manifest<V1ClusterRoleBinding>
  | Manifest<V1Deployment>
  | Manifest<V1Service>
  | Manifest<V1Namespace>;

/**
 * kustomize's own configuration file; not a cluster object
 */
export interface KustomizationFile {
  apiVersion: 'kustomize.config.k8s.io/v1beta1';
  kind: 'Kustomization';
  namespace?: string;
  resources: string[];
}

/**
 * Stable identity of a manifest inside a rendered stream
 */
export function manifestKey(manifest: Pick<Manifest, 'kind' | 'metadata'>): string {
  const namespace = manifest.metadata.namespace ?? '_cluster';
  return `${manifest.kind}/${namespace}/${manifest.metadata.name}`;
}
