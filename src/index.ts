/**
 * resmap - AWS resource inventory across services and regions
 *
 * Main library exports
 */

// Export types
export * from './types/config.js';
export * from './types/aws.js';
export * from './types/catalog.js';
export * from './types/inventory.js';

// Export core functionality
export * from './core/errors.js';
export * from './core/catalog/index.js';
export * from './core/collectors/index.js';
export * from './core/scan/index.js';
export * from './core/report/index.js';
export * from './core/config/index.js';
export * from './core/aws/index.js';
