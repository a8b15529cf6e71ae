export * from './patcher/index.js';
export * from './settings/index.js';
export * from './security/index.js';
export * from './schemas/index.js';
export { runCli } from './run-cli.js';
