export * from './section.js';
export * from './flags.js';
export * from './help.js';
