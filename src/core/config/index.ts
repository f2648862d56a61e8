export {
  BUILD_DIR_ENV_VAR,
  DEFAULT_BUILD_DIR,
  DEFAULT_OUT_DIR,
  loadPackagingConfig,
  packagingModeFromFlag,
  type PackagingOptions,
} from './packaging-config.js';
