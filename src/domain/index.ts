/**
 * Domain model exports.
 */

export * from './artifact';
export * from './clock';
export * from './contracts';
export * from './delegation';
export * from './errors';
export * from './escrow';
export * from './events';
export * from './intents';
export * from './mint';
export * from './principal';
export * from './results';
