export * from './execution/index.js';
export * from './fx/index.js';
