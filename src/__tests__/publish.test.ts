/**
 * Tests for the version bump and publish sequence
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { spawnSync } from 'node:child_process';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('node:child_process', () => ({
  spawnSync: vi.fn(),
}));

const mockSpawnSync = vi.mocked(spawnSync);

import type { ProjectSelection } from '../core/models/index.js';
import { GitOutputLog, getGitOutputText } from '../infra/git/index.js';
import { runPublishSequence } from '../features/repository/index.js';
import { createGitStub, type GitStub } from './helpers/git-stub.js';

let projectDir: string;
let manifestPath: string;
let git: GitStub;

function useGit(responses: Parameters<typeof createGitStub>[0]): void {
  git = createGitStub(responses);
  mockSpawnSync.mockImplementation((command, args) => git.run(command, args));
}

function selection(): ProjectSelection {
  return { projectDir, manifestPath, currentVersion: '1.2.0', branch: 'main', remoteUrl: null };
}

beforeEach(() => {
  vi.clearAllMocks();
  GitOutputLog.resetInstance();
  projectDir = mkdtempSync(join(tmpdir(), 'vpush-publish-'));
  manifestPath = join(projectDir, 'package.json');
  writeFileSync(manifestPath, JSON.stringify({ name: 'widgets', version: '1.2.0', private: true }, null, 2) + '\n');
  useGit({});
});

afterEach(() => {
  rmSync(projectDir, { recursive: true, force: true });
});

describe('runPublishSequence', () => {
  it('should bump, commit, tag and push in order', () => {
    // When
    const report = runPublishSequence({
      selection: selection(),
      newVersion: '1.3.0',
      commitMessage: 'Release 1.3.0',
      pushTags: true,
    });

    // Then
    expect(report.outcome).toEqual({ ok: true, message: 'Version updated, committed, tagged and pushed successfully!' });
    expect(report.completed).toEqual(['manifest', 'add', 'commit', 'tag', 'push', 'push-tags']);
    expect(git.commands()).toEqual([
      'add package.json',
      'commit -m Release 1.3.0',
      'tag v1.3.0',
      'push',
      'push --tags',
    ]);
    expect(readFileSync(manifestPath, 'utf-8')).toBe(
      '{\n  "name": "widgets",\n  "version": "1.3.0",\n  "private": true\n}\n',
    );
  });

  it('should push once when push tags is off', () => {
    runPublishSequence({ selection: selection(), newVersion: '1.3.0', commitMessage: 'Release', pushTags: false });

    expect(git.commands().filter((command) => command.startsWith('push'))).toEqual(['push']);
  });

  it('should stop at the first failing step', () => {
    // Given
    useGit({ 'tag v1.3.0': { status: 128, stderr: "fatal: tag 'v1.3.0' already exists\n" } });

    // When
    const report = runPublishSequence({
      selection: selection(),
      newVersion: '1.3.0',
      commitMessage: 'Release',
      pushTags: true,
    });

    // Then
    expect(report.failedStep).toBe('tag');
    expect(report.completed).toEqual(['manifest', 'add', 'commit']);
    expect(report.outcome).toEqual({
      ok: false,
      kind: 'subprocess',
      message: "Error: fatal: tag 'v1.3.0' already exists",
    });
    expect(git.commands()).toEqual(['add package.json', 'commit -m Release', 'tag v1.3.0']);
  });

  it('should leave the bumped manifest in place after a later failure', () => {
    useGit({ push: { status: 1, stderr: 'rejected' } });

    runPublishSequence({ selection: selection(), newVersion: '2.0.0', commitMessage: 'Release', pushTags: true });

    expect(JSON.parse(readFileSync(manifestPath, 'utf-8'))).toEqual({ name: 'widgets', version: '2.0.0', private: true });
  });

  it('should note the version change in the git output', () => {
    runPublishSequence({ selection: selection(), newVersion: '1.3.0', commitMessage: 'Release', pushTags: false });

    expect(getGitOutputText().split('\n')[0]).toBe('Version updated: 1.2.0 → 1.3.0');
  });

  it('should trim the version and message before use', () => {
    runPublishSequence({ selection: selection(), newVersion: ' 1.3.1 ', commitMessage: ' Fix \n', pushTags: false });

    expect(git.commands()).toEqual(['add package.json', 'commit -m Fix', 'tag v1.3.1', 'push']);
  });

  it('should require both version and message', () => {
    const report = runPublishSequence({ selection: selection(), newVersion: '1.3.0', commitMessage: '  ', pushTags: true });

    expect(report.outcome).toEqual({
      ok: false,
      kind: 'precondition',
      message: 'You must enter both the new version and commit message.',
    });
    expect(git.calls).toHaveLength(0);
    expect(readFileSync(manifestPath, 'utf-8')).toContain('"version": "1.2.0"');
  });

  it('should require a project', () => {
    const report = runPublishSequence({ selection: null, newVersion: '1.3.0', commitMessage: 'Release', pushTags: true });

    expect(report.outcome.message).toBe('Select a project folder and package.json first.');
    expect(report.failedStep).toBeNull();
  });

  it('should run no git command when the manifest cannot be parsed', () => {
    writeFileSync(manifestPath, '{ not json');

    const report = runPublishSequence({ selection: selection(), newVersion: '1.3.0', commitMessage: 'Release', pushTags: true });

    expect(report.failedStep).toBe('manifest');
    expect(report.outcome.ok).toBe(false);
    expect(report.outcome.message.startsWith('Failed to update package.json: ')).toBe(true);
    expect(git.calls).toHaveLength(0);
  });
});
