/**
 * @file packages/shared/src/index.ts
 * @description Public surface of the shared contracts package.
 */

export * from './types.js';
export * from './protocol.js';
export * from './constants.js';
export * from './condition.js';
export * from './events/index.js';
export * from './types/mission.js';
