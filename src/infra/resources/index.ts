/**
 * Bundled resources
 *
 * Text shipped with the package under resources/ at the project root.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Get the resources directory path
 * Supports both development (src/) and production (dist/) environments
 */
export function getResourcesDir(): string {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  // From src/infra/resources or dist/infra/resources, go up to project root then into resources/
  return join(currentDir, '..', '..', '..', 'resources');
}

/** Text of the Help tab */
export function readHelpText(): string {
  return readFileSync(join(getResourcesDir(), 'help.txt'), 'utf-8');
}
