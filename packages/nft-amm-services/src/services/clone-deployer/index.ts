export * from './clone-bytecode.js';
export * from './clone-deployer-service.js';
