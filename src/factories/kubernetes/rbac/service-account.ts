import type { V1ServiceAccount } from '@kubernetes/client-node';
import type { Manifest } from '../../../core/types/index.js';
import { createResource } from '../../shared.js';

export function serviceAccount(resource: V1ServiceAccount): Manifest<V1ServiceAccount> {
  return createResource({ apiVersion: 'v1', kind: 'ServiceAccount' }, resource);
}
