/**
 * Tests for exit codes
 */

import { describe, it, expect } from 'vitest';
import {
  EXIT_SUCCESS,
  EXIT_GENERAL_ERROR,
  EXIT_UNSUPPORTED_PLATFORM,
  EXIT_NOT_INTERACTIVE,
  EXIT_SIGINT,
} from '../shared/exitCodes.js';

describe('exit codes', () => {
  it('should have distinct values', () => {
    const codes = [EXIT_SUCCESS, EXIT_GENERAL_ERROR, EXIT_UNSUPPORTED_PLATFORM, EXIT_NOT_INTERACTIVE, EXIT_SIGINT];
    const unique = new Set(codes);
    expect(unique.size).toBe(codes.length);
  });

  it('should match the documented values', () => {
    expect(EXIT_SUCCESS).toBe(0);
    expect(EXIT_GENERAL_ERROR).toBe(1);
    expect(EXIT_UNSUPPORTED_PLATFORM).toBe(2);
    expect(EXIT_NOT_INTERACTIVE).toBe(3);
    expect(EXIT_SIGINT).toBe(130);
  });
});
