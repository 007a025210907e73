export { VersionStore } from './version-store.js';
