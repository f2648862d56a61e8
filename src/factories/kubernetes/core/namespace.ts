import type { V1Namespace } from '@kubernetes/client-node';
import type { Manifest } from '../../../core/types/index.js';
import { createResource } from '../../shared.js';

export function namespace(resource: V1Namespace): Manifest<V1Namespace> {
  return createResource({ apiVersion: 'v1', kind: 'Namespace' }, resource);
}
