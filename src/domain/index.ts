/**
 * Domain model exports.
 */

export * from './deny-event';
export * from './errors';
export * from './job';
export * from './outcome';
export * from './raw-records';
export * from './run';
