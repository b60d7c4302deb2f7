export * from './errors.js';
export * from './value.js';
export * from './parsers.js';
export * from './duration.js';
export * from './lists.js';
export * from './enum.js';
export * from './kinds.js';
