/**
 * Global configuration loader
 *
 * Manages ~/.vpush/config.yaml.
 * GlobalConfigManager encapsulates the config cache as a singleton.
 */

import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { GlobalConfigSchema } from '../../../core/models/index.js';
import type { GlobalConfig } from '../../../core/models/index.js';
import { getGlobalConfigPath } from '../paths.js';
import { applyGlobalConfigEnvOverrides } from '../env/config-env-overrides.js';
import {
  DEFAULT_BRANCH,
  DEFAULT_COMMIT_LIMIT,
  DEFAULT_CREDENTIAL_SERVICE,
  DEFAULT_GITHUB_API_URL,
  DEFAULT_MANIFEST_FILE,
  DEFAULT_SKIP_DIRS,
} from '../../../shared/constants.js';

/**
 * Manages global configuration loading and caching.
 * Singleton — use GlobalConfigManager.getInstance().
 */
export class GlobalConfigManager {
  private static instance: GlobalConfigManager | null = null;
  private cachedConfig: GlobalConfig | null = null;

  private constructor() {}

  static getInstance(): GlobalConfigManager {
    if (!GlobalConfigManager.instance) {
      GlobalConfigManager.instance = new GlobalConfigManager();
    }
    return GlobalConfigManager.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    GlobalConfigManager.instance = null;
  }

  invalidateCache(): void {
    this.cachedConfig = null;
  }

  /** Load global configuration (cached) */
  load(): GlobalConfig {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }
    const configPath = getGlobalConfigPath();

    const rawConfig: Record<string, unknown> = {};
    if (existsSync(configPath)) {
      const parsedRaw: unknown = parseYaml(readFileSync(configPath, 'utf-8'));
      if (parsedRaw && typeof parsedRaw === 'object' && !Array.isArray(parsedRaw)) {
        Object.assign(rawConfig, parsedRaw);
      } else if (parsedRaw != null) {
        throw new Error(`Configuration error: ${configPath} must be a YAML object.`);
      }
    }

    applyGlobalConfigEnvOverrides(rawConfig);

    const parsed = GlobalConfigSchema.parse(rawConfig);
    const config: GlobalConfig = {
      logLevel: parsed.log_level,
      verbose: parsed.verbose,
      debug: parsed.debug ? {
        enabled: parsed.debug.enabled,
        logFile: parsed.debug.log_file,
      } : undefined,
      github: {
        apiUrl: (parsed.github?.api_url ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, ''),
        defaultBranch: parsed.github?.default_branch ?? DEFAULT_BRANCH,
        commitLimit: parsed.github?.commit_limit ?? DEFAULT_COMMIT_LIMIT,
      },
      pushTags: parsed.push_tags,
      manifest: {
        fileName: parsed.manifest?.file_name ?? DEFAULT_MANIFEST_FILE,
        skipDirs: parsed.manifest?.skip_dirs ?? [...DEFAULT_SKIP_DIRS],
      },
      credentialService: parsed.credentials?.service ?? DEFAULT_CREDENTIAL_SERVICE,
    };
    this.cachedConfig = config;
    return config;
  }
}

export function loadGlobalConfig(): GlobalConfig {
  return GlobalConfigManager.getInstance().load();
}

export function invalidateGlobalConfigCache(): void {
  GlobalConfigManager.getInstance().invalidateCache();
}
