export { configMap } from './config/config-map.js';
export { namespace } from './core/namespace.js';
export { type KustomizationConfig, kustomization } from './kustomize/kustomization.js';
export { service } from './networking/service.js';
export { clusterRoleBinding } from './rbac/cluster-role-binding.js';
export { serviceAccount } from './rbac/service-account.js';
export { deployment } from './workloads/deployment.js';
