import type { V1ClusterRoleBinding } from '@kubernetes/client-node';
import type { Manifest } from '../../../core/types/index.js';
import { createResource } from '../../shared.js';

export function clusterRoleBinding(resource: V1ClusterRoleBinding): Manifest<V1ClusterRoleBinding> {
  return createResource(
    { apiVersion: 'rbac.authorization.k8s.io/v1', kind: 'ClusterRoleBinding' },
    resource
  );
}
