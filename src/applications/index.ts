/**
 * The platform's applications, in definition order
 */

import { ApplicationRegistry } from '../core/registry/index.js';
import type { ApplicationSpec } from '../core/types/index.js';
import { clusterAutoscaler } from './cluster-autoscaler.js';
import { skCloudProv } from './sk-cloudprov.js';
import { skCtrl } from './sk-ctrl.js';
import { skTracer } from './sk-tracer.js';
import { skVnode } from './sk-vnode.js';
import { testDeployment } from './test-deployment.js';

export { AUTOSCALER_ID, AUTOSCALER_IMAGE, clusterAutoscaler } from './cluster-autoscaler.js';
export * from './constants.js';
export { CLOUDPROV_GRPC_PORT, CLOUDPROV_ID, skCloudProv } from './sk-cloudprov.js';
export { CTRL_ID, CTRL_NS_ENV_VAR, POD_SVC_ACCOUNT_ENV_VAR, skCtrl } from './sk-ctrl.js';
export { POD_OWNER_ENV_VAR, skTracer, TRACER_ID, TRACER_SERVER_PORT } from './sk-tracer.js';
export { skVnode, VNODE_ID } from './sk-vnode.js';
export { TEST_DEPLOYMENT_ID, testDeployment } from './test-deployment.js';

export function defaultApplications(): ApplicationSpec[] {
  return [skCloudProv, skVnode, skTracer, skCtrl, testDeployment, clusterAutoscaler];
}

export function createDefaultRegistry(): ApplicationRegistry {
  return ApplicationRegistry.create(defaultApplications());
}
