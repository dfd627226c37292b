export * from './document.js';
export * from './analysis.js';
export * from './progress.js';
export * from './errors.js';
export * from './events.js';
