/**
 * Domain model exports.
 */

export * from './account';
export * from './errors';
