/**
 * Error handling utilities
 */

import type { ActionOutcome, FailureKind } from '../../core/models/index.js';

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function succeeded(message: string): ActionOutcome {
  return { ok: true, message };
}

export function failed(kind: FailureKind, message: string): ActionOutcome {
  return { ok: false, kind, message };
}
