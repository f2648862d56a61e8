import { defineApplication } from '../core/registry/index.js';
import { CLUSTER_ADMIN_ROLE, KIND_WORKER_SELECTOR, SIMKUBE_NAMESPACE } from './constants.js';

export const CLOUDPROV_ID = 'sk-cloudprov';
export const CLOUDPROV_GRPC_PORT = 8086;

export const skCloudProv = defineApplication({
  id: CLOUDPROV_ID,
  namespace: SIMKUBE_NAMESPACE,
  image: { source: 'build' },
  entrypointArgs: ['/sk-cloudprov'],
  ports: [CLOUDPROV_GRPC_PORT],
  service: true,
  clusterRole: CLUSTER_ADMIN_ROLE,
  nodeSelector: { ...KIND_WORKER_SELECTOR },
});
