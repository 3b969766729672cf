export {
  getDataDirectory,
  getDatabasePath,
  getDefaultAdminCredentials,
  getPublicBaseUrl,
  parseEnv,
  resetEnvCache,
  type ValidatedEnv,
} from './config.js';
