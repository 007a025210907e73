export * from './output.js';
export * from './errors.js';
export * from './validation.js';
export * from './connection.js';
