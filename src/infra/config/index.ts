/**
 * Configuration module - barrel exports
 */

export {
  getGlobalConfigDir,
  getGlobalConfigPath,
  getGlobalLogsDir,
  getGitCredentialsPath,
  getApplicationsDir,
  ensureDir,
} from './paths.js';

export {
  GlobalConfigManager,
  loadGlobalConfig,
  invalidateGlobalConfigCache,
} from './global/globalConfig.js';

export { applyGlobalConfigEnvOverrides, envVarNameFromPath } from './env/config-env-overrides.js';
