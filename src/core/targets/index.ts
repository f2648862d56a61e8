export { RELEASE_OVERLAYS, selectTarget } from './selector.js';
