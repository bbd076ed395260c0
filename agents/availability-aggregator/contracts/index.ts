/**
 * Availability Aggregator Agent - Contracts
 */

export * from './schemas.js';
export * from './validation.js';
