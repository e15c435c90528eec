import { afterEach, describe, expect, it } from 'vitest';
import { applyGlobalConfigEnvOverrides, envVarNameFromPath } from '../infra/config/env/config-env-overrides.js';

describe('config env overrides', () => {
  const envBackup = { ...process.env };

  afterEach(() => {
    for (const key of Object.keys(process.env)) {
      if (!(key in envBackup)) {
        delete process.env[key];
      }
    }
    for (const [key, value] of Object.entries(envBackup)) {
      process.env[key] = value;
    }
  });

  it('should convert dotted and camelCase paths to VPUSH env variable names', () => {
    expect(envVarNameFromPath('verbose')).toBe('VPUSH_VERBOSE');
    expect(envVarNameFromPath('github.commitLimit')).toBe('VPUSH_GITHUB_COMMIT_LIMIT');
    expect(envVarNameFromPath('manifest.skip_dirs')).toBe('VPUSH_MANIFEST_SKIP_DIRS');
  });

  it('should apply typed global env overrides', () => {
    process.env.VPUSH_LOG_LEVEL = 'debug';
    process.env.VPUSH_PUSH_TAGS = 'false';
    process.env.VPUSH_GITHUB_COMMIT_LIMIT = '50';
    process.env.VPUSH_MANIFEST_SKIP_DIRS = '["node_modules","dist"]';

    const raw: Record<string, unknown> = {};
    applyGlobalConfigEnvOverrides(raw);

    expect(raw).toEqual({
      log_level: 'debug',
      push_tags: false,
      github: { commit_limit: 50 },
      manifest: { skip_dirs: ['node_modules', 'dist'] },
    });
  });

  it('should merge a nested override into an existing section', () => {
    process.env.VPUSH_GITHUB_DEFAULT_BRANCH = 'trunk';

    const raw: Record<string, unknown> = { github: { api_url: 'https://ghe.example.test/api/v3' } };
    applyGlobalConfigEnvOverrides(raw);

    expect(raw.github).toEqual({ api_url: 'https://ghe.example.test/api/v3', default_branch: 'trunk' });
  });

  it('should reject a boolean that is not true or false', () => {
    process.env.VPUSH_VERBOSE = 'yes';

    expect(() => applyGlobalConfigEnvOverrides({})).toThrow('VPUSH_VERBOSE must be one of: true, false');
  });

  it('should reject a non-numeric number', () => {
    process.env.VPUSH_GITHUB_COMMIT_LIMIT = 'many';

    expect(() => applyGlobalConfigEnvOverrides({})).toThrow('VPUSH_GITHUB_COMMIT_LIMIT must be a number');
  });
});
