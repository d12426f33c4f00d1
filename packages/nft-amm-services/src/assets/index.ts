export * from './asset-ledger.interface.js';
export * from './in-memory-asset-ledger.js';
