/**
 * Lock store connection exports.
 */
export { createStoreConnection, describeStore } from './factory.js';
export * from './types.js';
