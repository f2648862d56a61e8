import type { V1Service } from '@kubernetes/client-node';
import type { Manifest } from '../../../core/types/index.js';
import { createResource } from '../../shared.js';

export function service(resource: V1Service): Manifest<V1Service> {
  return createResource({ apiVersion: 'v1', kind: 'Service' }, resource);
}
