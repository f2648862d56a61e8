import { defineApplication } from '../core/registry/index.js';
import { SIMKUBE_NAMESPACE, VIRTUAL_NODE_SELECTOR } from './constants.js';
import { VNODE_ID } from './sk-vnode.js';

export const TEST_DEPLOYMENT_ID = 'test';

/**
 * A workload that only fits on virtual nodes
 */
export const testDeployment = defineApplication({
  id: TEST_DEPLOYMENT_ID,
  namespace: SIMKUBE_NAMESPACE,
  image: { source: 'fixed', reference: 'nginx:latest' },
  resources: { cpu: '1' },
  tolerations: [{ key: 'simkube.io/virtual-node', value: 'true' }],
  nodeSelector: { ...VIRTUAL_NODE_SELECTOR },
  debuggable: false,
  dependsOn: [VNODE_ID],
});
