/**
 * Domain model exports.
 */

export * from './entities';
export * from './environment';
export * from './errors';
export * from './run';
