/**
 * GitHub API error classification
 */

import { getErrorMessage } from '../../shared/utils/index.js';

/** A 2xx response whose body does not have the expected shape */
export class GitHubResponseError extends Error {
  constructor(
    readonly resource: string,
    readonly detail: string,
  ) {
    super(`Unexpected ${resource} response: ${detail}`);
    this.name = 'GitHubResponseError';
  }
}

/** Non-2xx response as thrown by Octokit's request layer */
export interface HttpStatusError {
  status: number;
  message: string;
  response?: { data?: unknown };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isHttpStatusError(err: unknown): err is HttpStatusError {
  return err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400;
}

/** `message` field of a GitHub error body, when present */
function responseMessage(err: HttpStatusError): string | undefined {
  const data = err.response?.data;
  if (isRecord(data) && typeof data.message === 'string' && data.message.length > 0) {
    return data.message;
  }
  return undefined;
}

/**
 * One-line description of a failed API call: `<status> <message>` for
 * HTTP errors, the error message otherwise.
 */
export function formatApiError(err: unknown): string {
  if (isHttpStatusError(err)) {
    const message = responseMessage(err);
    return message ? `${err.status} ${message}` : String(err.status);
  }
  return getErrorMessage(err);
}
