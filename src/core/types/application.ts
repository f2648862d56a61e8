/**
 * Application spec types and their runtime schema
 */

import { type } from 'arktype';

export const OVERLAY_NAMES = ['prod', 'sim'] as const;
export type OverlayName = (typeof OVERLAY_NAMES)[number];

/**
 * Pod metadata that can be injected through the downward API
 */
export const DOWNWARD_FIELD_PATHS = {
  'pod-name': 'metadata.name',
  'pod-namespace': 'metadata.namespace',
  'service-account-name': 'spec.serviceAccountName',
} as const;
export type DownwardField = keyof typeof DOWNWARD_FIELD_PATHS;

const DnsLabel = type('/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/');

export const EnvSourceSchema = type({ value: 'string' }).or({
  fieldRef: "'pod-name' | 'pod-namespace' | 'service-account-name'",
});
export type EnvSource = typeof EnvSourceSchema.infer;

export const ConfigVolumeSchema = type({
  name: DnsLabel,
  mountPath: /^\//,
  configMap: { '[string]': 'string' },
});
export type ConfigVolume = typeof ConfigVolumeSchema.infer;

export const TolerationSchema = type({
  key: 'string > 0',
  'value?': 'string',
  'effect?': "'NoSchedule' | 'PreferNoSchedule' | 'NoExecute'",
});
export type Toleration = typeof TolerationSchema.infer;

export const ImageSourceSchema = type({ source: "'build'" }).or({
  source: "'fixed'",
  reference: 'string > 0',
});
export type ImageSource = typeof ImageSourceSchema.infer;

export const ApplicationSpecSchema = type({
  id: DnsLabel,
  namespace: DnsLabel,
  image: ImageSourceSchema,
  entrypointArgs: 'string[]',
  requiredEnv: { '[string]': EnvSourceSchema },
  volumeMounts: ConfigVolumeSchema.array(),
  dependsOn: 'string[]',
  nodeSelector: { '[string]': 'string' },
  tolerations: TolerationSchema.array(),
  ports: type('1 <= number.integer <= 65535').array(),
  service: 'boolean',
  'clusterRole?': 'string > 0',
  'resources?': { '[string]': 'string' },
  debuggable: 'boolean',
  'overlay?': "'prod' | 'sim'",
});

/**
 * One deployable unit of the platform
 */
export type ApplicationSpec = typeof ApplicationSpecSchema.infer;

/**
 * Authoring shape for an application: everything but the id, namespace and
 * image is optional and defaults to empty
 */
export type ApplicationDefinition = Pick<ApplicationSpec, 'id' | 'namespace' | 'image'> &
  Partial<Omit<ApplicationSpec, 'id' | 'namespace' | 'image'>>;
