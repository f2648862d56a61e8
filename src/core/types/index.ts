export {
  ApplicationSpecSchema,
  ConfigVolumeSchema,
  DOWNWARD_FIELD_PATHS,
  EnvSourceSchema,
  ImageSourceSchema,
  OVERLAY_NAMES,
  TolerationSchema,
} from './application.js';
export type {
  ApplicationDefinition,
  ApplicationSpec,
  ConfigVolume,
  DownwardField,
  EnvSource,
  ImageSource,
  OverlayName,
  Toleration,
} from './application.js';
export { PackagingMode } from './packaging.js';
export type {
  ImageSourceKind,
  OverlayDirectory,
  PackagingConfig,
  ResolvedImage,
  TargetSelection,
} from './packaging.js';
export { manifestKey } from './kubernetes.js';
export type {
  ApplicationManifest,
  KustomizationFile,
  Manifest,
  NamedObjectMeta,
} from './kubernetes.js';
