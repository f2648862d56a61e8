export {
  buildApplicationManifests,
  buildNamespaceManifests,
  configMapName,
  type ContainerPosture,
  DEBUG_CAPABILITIES,
  deploymentName,
  serviceAccountName,
} from './app-manifests.js';
