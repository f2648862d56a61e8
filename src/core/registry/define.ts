import type { ApplicationDefinition, ApplicationSpec } from '../types/index.js';

/**
 * Fill in the empty defaults for an application definition
 */
export function defineApplication(definition: ApplicationDefinition): ApplicationSpec {
  return {
    entrypointArgs: [],
    requiredEnv: {},
    volumeMounts: [],
    dependsOn: [],
    nodeSelector: {},
    tolerations: [],
    ports: [],
    service: false,
    debuggable: true,
    ...definition,
  };
}

/**
 * In-cluster address of the Service fronting an application
 */
export function serviceAddress(appId: string, namespace: string, port: number): string {
  return `${serviceName(appId)}.${namespace}.svc:${port}`;
}

export function serviceName(appId: string): string {
  return `${appId}-svc`;
}

/**
 * Path a config-map file is mounted at inside the container
 */
export function configFilePath(mountPath: string, fileName: string): string {
  return `${mountPath.replace(/\/+$/, '')}/${fileName}`;
}
