export * from './errors.js';
export * from './options.js';
export * from './record.js';
export * from './resolution.js';
export * from './store.js';
export * from './vocabulary.js';
