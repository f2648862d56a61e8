import type { KustomizationFile } from '../../../core/types/index.js';

export interface KustomizationConfig {
  resources: string[];
  namespace?: string;
}

/**
 * A kustomization.yml listing resources relative to its own directory
 */
export function kustomization(config: KustomizationConfig): KustomizationFile {
  return {
    apiVersion: 'kustomize.config.k8s.io/v1beta1',
    kind: 'Kustomization',
    ...(config.namespace && { namespace: config.namespace }),
    resources: [...config.resources],
  };
}
