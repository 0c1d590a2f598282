export { createApp } from './app.js';
export type { AppDependencies, FetchHandler } from './app.js';
export { CLIENT_CLOSED_REQUEST, toErrorResponse } from './http/errors.js';
export { startServer, toWebRequest } from './node.js';
export { createRuntime } from './runtime.js';
export type { Runtime } from './runtime.js';
export {
  CONFIG_FILES,
  findConfigFile,
  loadConfigFile,
  loadSettings,
  parseConfigFile,
} from './lib/config.js';
export { SERVICE_NAME, VERSION } from './version.js';
