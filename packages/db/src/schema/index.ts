export * from './audit.js';
export * from './payments.js';
export * from './quotes.js';
