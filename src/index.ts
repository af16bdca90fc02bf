export * from './http-client/index.js';
export { loadConfigFromEnv } from './config.js';
