export { diffManifestStreams, type ManifestDiff, type ObjectChange, renderManifestDiff } from './manifest-diff.js';
