export { PostgresDriver, createDriver, readMigration } from './driver.js';
