/**
 * Version manifest (package.json) discovery and rewriting
 */

import { readdirSync, readFileSync, writeFileSync, type Dirent } from 'node:fs';
import { join } from 'node:path';
import { ManifestSchema } from '../../core/models/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';

const log = createLogger('manifest');

export interface FindManifestOptions {
  fileName: string;
  skipDirs: readonly string[];
}

/**
 * Walk rootDir recursively and collect every file named `fileName`.
 * Results are sorted; unreadable directories are skipped.
 */
export function findManifests(rootDir: string, options: FindManifestOptions): string[] {
  const found: string[] = [];
  const pending = [rootDir];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      log.debug('Skipping unreadable directory', { dir, error: getErrorMessage(err) });
      continue;
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (!options.skipDirs.includes(entry.name)) {
          pending.push(join(dir, entry.name));
        }
      } else if (entry.isFile() && entry.name === options.fileName) {
        found.push(join(dir, entry.name));
      }
    }
  }

  return found.sort();
}

/** Case-insensitive substring filter used by the manifest picker */
export function filterCandidates(candidates: readonly string[], query: string): string[] {
  const needle = query.trim().toLowerCase();
  return candidates.filter((candidate) => candidate.toLowerCase().includes(needle));
}

export type ManifestRead =
  | { success: true; data: Record<string, unknown>; version: string }
  | { success: false; message: string };

/** Read and parse the manifest; a missing version reads as `unknown`. */
export function readManifest(manifestPath: string): ManifestRead {
  try {
    const raw: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
    const parsed = ManifestSchema.safeParse(raw);
    if (!parsed.success) {
      return { success: false, message: `${manifestPath} is not a JSON object with a string version` };
    }
    return { success: true, data: parsed.data, version: parsed.data.version ?? 'unknown' };
  } catch (err) {
    return { success: false, message: getErrorMessage(err) };
  }
}

export type ManifestWrite =
  | { success: true; previousVersion: string | undefined }
  | { success: false; message: string };

/**
 * Set `version` in place, keeping every other key and the key order.
 * Written back with 2-space indentation and a trailing newline.
 */
export function writeManifestVersion(manifestPath: string, version: string): ManifestWrite {
  const current = readManifest(manifestPath);
  if (!current.success) {
    return current;
  }

  const previous = current.data.version;
  const updated = { ...current.data, version };

  try {
    writeFileSync(manifestPath, JSON.stringify(updated, null, 2) + '\n', 'utf-8');
  } catch (err) {
    return { success: false, message: getErrorMessage(err) };
  }

  log.info('Manifest version updated', { manifestPath, from: previous, to: version });
  return { success: true, previousVersion: typeof previous === 'string' ? previous : undefined };
}
