import { configFilePath, defineApplication } from '../core/registry/index.js';
import { CLUSTER_ADMIN_ROLE, KIND_WORKER_SELECTOR, SIMKUBE_NAMESPACE } from './constants.js';

export const VNODE_ID = 'sk-vnode';

const CONFIG_MOUNT = '/config';
const NODE_SKELETON_FILE = 'node.yml';

const nodeSkeleton = `---
apiVersion: v1
kind: Node
status:
  allocatable:
    cpu: "1"
    memory: "1Gi"
  capacity:
    cpu: "1"
    memory: "1Gi"
`;

export const skVnode = defineApplication({
  id: VNODE_ID,
  namespace: SIMKUBE_NAMESPACE,
  image: { source: 'build' },
  entrypointArgs: ['/sk-vnode', '--node-skeleton', configFilePath(CONFIG_MOUNT, NODE_SKELETON_FILE)],
  requiredEnv: {
    POD_NAME: { fieldRef: 'pod-name' },
    POD_NAMESPACE: { fieldRef: 'pod-namespace' },
  },
  volumeMounts: [
    { name: 'node-skeleton', mountPath: CONFIG_MOUNT, configMap: { [NODE_SKELETON_FILE]: nodeSkeleton } },
  ],
  clusterRole: CLUSTER_ADMIN_ROLE,
  nodeSelector: { ...KIND_WORKER_SELECTOR },
});
