export * from './common.js';
export * from './electricity.js';
export * from './gas.js';
export * from './providers.js';
export * from './water.js';
