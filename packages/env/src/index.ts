export {
  getHandlerTimeoutMs,
  getNodeEnv,
  getRejectionPolicy,
  isDevelopment,
  isProduction,
  isTest,
  resetEnvCache,
  type ValidatedEnv,
} from './config.js';
