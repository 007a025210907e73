export { LockCoordinator } from './lock-coordinator.js';
export type { LockCoordinatorConfig } from './lock-coordinator.js';
export { getLockingKey, crc32, ADVISORY_LOCK_ID_SALT } from './lock-key.js';
