export * from './curve.types.js';
export * from './errors.js';
export * from './bonding-curve.interface.js';
export * from './linear-curve.js';
