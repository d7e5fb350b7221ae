export * from './types.js';
export * from './schema.js';
export * from './steps.js';
export { contractsSchemaId, contractsVersion } from './version.js';
