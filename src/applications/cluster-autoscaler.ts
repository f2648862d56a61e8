import { configFilePath, defineApplication, serviceAddress } from '../core/registry/index.js';
import { CLUSTER_ADMIN_ROLE, KIND_CONTROL_PLANE_SELECTOR, SIMKUBE_NAMESPACE } from './constants.js';
import { CLOUDPROV_GRPC_PORT, CLOUDPROV_ID } from './sk-cloudprov.js';

export const AUTOSCALER_ID = 'cluster-autoscaler';
export const AUTOSCALER_IMAGE = 'localhost:5000/cluster-autoscaler:latest';

const CONFIG_MOUNT = '/config';
const CONFIG_FILE = 'cluster-autoscaler-config.yml';

const autoscalerConfig = `---
address: ${serviceAddress(CLOUDPROV_ID, SIMKUBE_NAMESPACE, CLOUDPROV_GRPC_PORT)}
`;

export const clusterAutoscaler = defineApplication({
  id: AUTOSCALER_ID,
  namespace: 'kube-system',
  image: { source: 'fixed', reference: AUTOSCALER_IMAGE },
  entrypointArgs: [
    '/cluster-autoscaler',
    '--cloud-provider',
    'externalgrpc',
    '--cloud-config',
    configFilePath(CONFIG_MOUNT, CONFIG_FILE),
    '--scale-down-delay-after-add',
    '1m',
    '--scale-down-unneeded-time',
    '1m',
    '--v',
    '4',
  ],
  volumeMounts: [{ name: 'config', mountPath: CONFIG_MOUNT, configMap: { [CONFIG_FILE]: autoscalerConfig } }],
  clusterRole: CLUSTER_ADMIN_ROLE,
  nodeSelector: { ...KIND_CONTROL_PLANE_SELECTOR },
  tolerations: [{ key: 'node-role.kubernetes.io/control-plane', effect: 'NoSchedule' }],
  debuggable: false,
  dependsOn: [CLOUDPROV_ID],
});
