export * from './constants.js';
export * from './types.js';
export * from './errors.js';
export * from './eligibility.js';
export * from './function-extractor.js';
export * from './catalog-builder.js';
export * from './fuzzy-resolver.js';
export * from './execution-bridge.js';
