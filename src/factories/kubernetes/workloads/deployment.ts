import type { V1Deployment } from '@kubernetes/client-node';
import type { Manifest } from '../../../core/types/index.js';
import { createResource } from '../../shared.js';

export function deployment(resource: V1Deployment): Manifest<V1Deployment> {
  return createResource({ apiVersion: 'apps/v1', kind: 'Deployment' }, resource);
}
