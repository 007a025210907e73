export { versionCommand } from './version.js';
export { forceCommand } from './force.js';
export { runCommand } from './run.js';
export { dropCommand } from './drop.js';
export { lockKeyCommand } from './lock-key.js';
