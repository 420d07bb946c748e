export { createServer } from './server.js';
export type { ServerDeps } from './server.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
