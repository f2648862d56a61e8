export {
  APP_VERSION_ENV_VAR,
  DEFAULT_REGISTRY_PREFIX,
  type ImageResolutionContext,
  imageFilePath,
  PLACEHOLDER_IMAGE,
  resolveApplicationImage,
  resolveImage,
} from './resolver.js';
