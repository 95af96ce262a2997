/**
 * Domain model exports.
 */

export * from './artifact';
export * from './error-presentation';
export * from './errors';
export * from './layout';
export * from './project';
