import type { V1ConfigMap } from '@kubernetes/client-node';
import type { Manifest } from '../../../core/types/index.js';
import { createResource } from '../../shared.js';

// ConfigMaps keep data at the root level; there is no spec
export function configMap(resource: V1ConfigMap): Manifest<V1ConfigMap> {
  return createResource({ apiVersion: 'v1', kind: 'ConfigMap' }, resource);
}
