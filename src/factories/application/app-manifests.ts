/**
 * Application manifest assembly
 *
 * Turns one application spec, its resolved image and the selected target
 * posture into the Kubernetes objects that realize it. Object names follow
 * `{id}-{suffix}` so they stay stable across runs.
 */

import type {
  V1Container,
  V1EnvVar,
  V1PodSpec,
  V1Toleration,
  V1Volume,
} from '@kubernetes/client-node';
import {
  type ApplicationManifest,
  type ApplicationSpec,
  DOWNWARD_FIELD_PATHS,
  type EnvSource,
  type ResolvedImage,
  type TargetSelection,
  type Toleration,
} from '../../core/types/index.js';
import { serviceName } from '../../core/registry/index.js';
import {
  clusterRoleBinding,
  configMap,
  deployment,
  namespace,
  service,
  serviceAccount,
} from '../kubernetes/index.js';
import { appLabels } from '../shared.js';

export const DEBUG_CAPABILITIES: readonly string[] = ['SYS_PTRACE'];

const SYSTEM_NAMESPACES = new Set(['default', 'kube-system', 'kube-public', 'kube-node-lease']);

export type ContainerPosture = Pick<TargetSelection, 'debugCapabilitiesEnabled' | 'applyNodeSelectors'>;

export function deploymentName(appId: string): string {
  return `${appId}-depl`;
}

export function serviceAccountName(appId: string): string {
  return `${appId}-sa`;
}

export function configMapName(appId: string, volumeName: string): string {
  return `${appId}-${volumeName}`;
}

/**
 * Build every object for an application, in apply order
 */
export function buildApplicationManifests(
  application: ApplicationSpec,
  image: ResolvedImage,
  posture: ContainerPosture
): ApplicationManifest[] {
  if (image.appId !== application.id) {
    throw new Error(
      `Image resolved for '${image.appId}' cannot be used for application '${application.id}'`
    );
  }

  const { id } = application;
  const labels = appLabels(id);
  const manifests: ApplicationManifest[] = [];

  for (const volume of application.volumeMounts) {
    manifests.push(
      configMap({
        metadata: { name: configMapName(id, volume.name), namespace: application.namespace, labels },
        data: { ...volume.configMap },
      })
    );
  }

  if (application.clusterRole) {
    manifests.push(
      serviceAccount({
        metadata: { name: serviceAccountName(id), namespace: application.namespace, labels },
      }),
      clusterRoleBinding({
        metadata: { name: `${id}-crb`, labels },
        roleRef: {
          apiGroup: 'rbac.authorization.k8s.io',
          kind: 'ClusterRole',
          name: application.clusterRole,
        },
        subjects: [
          {
            kind: 'ServiceAccount',
            name: serviceAccountName(id),
            namespace: application.namespace,
          },
        ],
      })
    );
  }

  manifests.push(
    deployment({
      metadata: { name: deploymentName(id), namespace: application.namespace, labels },
      spec: {
        replicas: 1,
        selector: { matchLabels: labels },
        template: {
          metadata: { labels },
          spec: buildPodSpec(application, image, posture),
        },
      },
    })
  );

  if (application.service) {
    manifests.push(
      service({
        metadata: { name: serviceName(id), namespace: application.namespace, labels },
        spec: {
          ports: application.ports.map((port) => ({ port, targetPort: port })),
          selector: labels,
        },
      })
    );
  }

  return manifests;
}

/**
 * Namespace objects for every non-system namespace the applications live in
 */
export function buildNamespaceManifests(applications: readonly ApplicationSpec[]): ApplicationManifest[] {
  const names = new Set<string>();
  for (const application of applications) {
    if (!SYSTEM_NAMESPACES.has(application.namespace)) {
      names.add(application.namespace);
    }
  }
  return Array.from(names, (name) => namespace({ metadata: { name } }));
}

function buildPodSpec(
  application: ApplicationSpec,
  image: ResolvedImage,
  posture: ContainerPosture
): V1PodSpec {
  const podSpec: V1PodSpec = {
    containers: [buildContainer(application, image, posture)],
  };

  if (application.clusterRole) {
    podSpec.serviceAccountName = serviceAccountName(application.id);
  }
  if (posture.applyNodeSelectors && Object.keys(application.nodeSelector).length > 0) {
    podSpec.nodeSelector = { ...application.nodeSelector };
  }
  if (application.tolerations.length > 0) {
    podSpec.tolerations = application.tolerations.map(toToleration);
  }
  if (application.volumeMounts.length > 0) {
    podSpec.volumes = application.volumeMounts.map(
      (volume): V1Volume => ({
        name: volume.name,
        configMap: {
          name: configMapName(application.id, volume.name),
          items: Object.keys(volume.configMap)
            .sort()
            .map((key) => ({ key, path: key })),
        },
      })
    );
  }

  return podSpec;
}

function buildContainer(
  application: ApplicationSpec,
  image: ResolvedImage,
  posture: ContainerPosture
): V1Container {
  const container: V1Container = {
    name: application.id,
    image: image.reference,
  };

  if (application.entrypointArgs.length > 0) {
    container.args = [...application.entrypointArgs];
  }

  const env = Object.entries(application.requiredEnv).map(([name, source]) => toEnvVar(name, source));
  if (env.length > 0) {
    container.env = env;
  }

  if (application.ports.length > 0) {
    container.ports = application.ports.map((containerPort) => ({ containerPort }));
  }

  if (application.volumeMounts.length > 0) {
    container.volumeMounts = application.volumeMounts.map(({ name, mountPath }) => ({ name, mountPath }));
  }

  if (application.resources && Object.keys(application.resources).length > 0) {
    container.resources = { requests: { ...application.resources } };
  }

  if (posture.debugCapabilitiesEnabled && application.debuggable) {
    container.securityContext = { capabilities: { add: [...DEBUG_CAPABILITIES] } };
  }

  return container;
}

function toEnvVar(name: string, source: EnvSource): V1EnvVar {
  if ('value' in source) {
    return { name, value: source.value };
  }
  return {
    name,
    valueFrom: { fieldRef: { fieldPath: DOWNWARD_FIELD_PATHS[source.fieldRef] } },
  };
}

function toToleration(toleration: Toleration): V1Toleration {
  return {
    key: toleration.key,
    operator: toleration.value === undefined ? 'Exists' : 'Equal',
    ...(toleration.value !== undefined && { value: toleration.value }),
    ...(toleration.effect && { effect: toleration.effect }),
  };
}
