export * from './asset.schema.js';
export * from './modulation.schema.js';
