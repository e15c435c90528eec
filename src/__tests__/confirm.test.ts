/**
 * Tests for multiline input
 */

import { describe, it, expect } from 'vitest';
import { Readable } from 'node:stream';
import { readMultilineFromStream } from '../shared/prompt/index.js';

describe('readMultilineFromStream', () => {
  it('should stop at the first empty line', async () => {
    const input = Readable.from(['Looks good overall.\nOne nit below.\n\nignored\n']);

    expect(await readMultilineFromStream(input)).toBe('Looks good overall.\nOne nit below.');
  });

  it('should return null when the first line is empty', async () => {
    expect(await readMultilineFromStream(Readable.from(['\nlater\n']))).toBeNull();
  });

  it('should keep what was typed when the stream ends', async () => {
    expect(await readMultilineFromStream(Readable.from(['single line']))).toBe('single line');
  });
});
