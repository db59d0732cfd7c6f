export * from './research.js';
export * from './data-source.js';
export * from './events.js';
