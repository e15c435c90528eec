/**
 * Scripted `git` for tests that mock node:child_process.spawnSync.
 *
 * Each call is recorded as its argument vector; responses are looked up
 * by the joined arguments, and unknown commands succeed with no output.
 */

import type { SpawnSyncReturns } from 'node:child_process';

export interface GitResponse {
  status?: number;
  stdout?: string;
  stderr?: string;
}

export interface GitStub {
  calls: string[][];
  /** `args.join(' ')` → response */
  responses: Map<string, GitResponse>;
  run: (command: string, args?: readonly string[]) => SpawnSyncReturns<string>;
  commands: () => string[];
}

export function createGitStub(responses: Record<string, GitResponse> = {}): GitStub {
  const stub: GitStub = {
    calls: [],
    responses: new Map(Object.entries(responses)),
    run: (_command, args = []) => {
      stub.calls.push([...args]);
      const response = stub.responses.get(args.join(' ')) ?? {};
      const stdout = response.stdout ?? '';
      const stderr = response.stderr ?? '';
      return {
        pid: 0,
        output: [null, stdout, stderr],
        stdout,
        stderr,
        status: response.status ?? 0,
        signal: null,
      };
    },
    commands: () => stub.calls.map((args) => args.join(' ')),
  };
  return stub;
}
