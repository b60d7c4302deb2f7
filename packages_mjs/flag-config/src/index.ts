export * from './errors.js';
export * from './logger.js';
export * from './sensitive.js';
export * from './flag.js';
export * from './tokenizer.js';
export * from './flag-set.js';
export * from './env-names.js';
export * from './options.js';
export * from './flatten.js';
export * from './plain-parser.js';
export * from './parse.js';
export * from './command.js';
