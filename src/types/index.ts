/**
 * Type exports
 */

export * from './inventory.js';
export * from './endpoints.js';
export * from './openapi.js';
