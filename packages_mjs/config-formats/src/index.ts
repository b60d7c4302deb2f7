export * from './json.js';
export * from './yaml.js';
export * from './toml.js';
export * from './dotenv.js';
export * from './env-file.js';
export * from './detect.js';
