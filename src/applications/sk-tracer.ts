import { configFilePath, defineApplication } from '../core/registry/index.js';
import { deploymentName } from '../factories/index.js';
import { KIND_WORKER_SELECTOR, RUST_BACKTRACE_ENV, SIMKUBE_NAMESPACE } from './constants.js';

export const TRACER_ID = 'sk-tracer';
export const TRACER_SERVER_PORT = 7777;
export const POD_OWNER_ENV_VAR = 'POD_OWNER';

const CONFIG_MOUNT = '/config';
const CONFIG_FILE = 'tracer-config.yml';

const tracerConfig = `---
trackedObjects:
  apps/v1.Deployment:
    podSpecTemplatePaths:
      - /spec/template
  apps/v1.StatefulSet:
    podSpecTemplatePaths:
      - /spec/template
  batch/v1.CronJob:
    podSpecTemplatePaths:
      - /spec/jobTemplate/spec/template
    trackLifecycle: true
`;

export const skTracer = defineApplication({
  id: TRACER_ID,
  namespace: SIMKUBE_NAMESPACE,
  image: { source: 'build' },
  entrypointArgs: [
    '/sk-tracer',
    '--server-port',
    `${TRACER_SERVER_PORT}`,
    '-c',
    configFilePath(CONFIG_MOUNT, CONFIG_FILE),
  ],
  requiredEnv: {
    ...RUST_BACKTRACE_ENV,
    [POD_OWNER_ENV_VAR]: { value: deploymentName(TRACER_ID) },
  },
  volumeMounts: [{ name: 'tracer-config', mountPath: CONFIG_MOUNT, configMap: { [CONFIG_FILE]: tracerConfig } }],
  ports: [TRACER_SERVER_PORT],
  service: true,
  // the tracer only watches objects
  clusterRole: 'view',
  nodeSelector: { ...KIND_WORKER_SELECTOR },
  overlay: 'prod',
});
