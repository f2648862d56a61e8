import { defineApplication } from '../core/registry/index.js';
import {
  CLUSTER_ADMIN_ROLE,
  KIND_WORKER_SELECTOR,
  RUST_BACKTRACE_ENV,
  SIMKUBE_NAMESPACE,
} from './constants.js';

export const CTRL_ID = 'sk-ctrl';

export const POD_SVC_ACCOUNT_ENV_VAR = 'POD_SVC_ACCOUNT';
export const CTRL_NS_ENV_VAR = 'CTRL_NAMESPACE';

export const skCtrl = defineApplication({
  id: CTRL_ID,
  namespace: SIMKUBE_NAMESPACE,
  image: { source: 'build' },
  entrypointArgs: [
    '/sk-ctrl',
    '--driver-secrets',
    'simkube',
    '--use-cert-manager',
    '--cert-manager-issuer',
    'selfsigned',
  ],
  requiredEnv: {
    ...RUST_BACKTRACE_ENV,
    [POD_SVC_ACCOUNT_ENV_VAR]: { fieldRef: 'service-account-name' },
    [CTRL_NS_ENV_VAR]: { fieldRef: 'pod-namespace' },
  },
  clusterRole: CLUSTER_ADMIN_ROLE,
  nodeSelector: { ...KIND_WORKER_SELECTOR },
  overlay: 'sim',
});
