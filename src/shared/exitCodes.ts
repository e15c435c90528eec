/**
 * Process exit codes for the vpush CLI
 */

export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;
export const EXIT_UNSUPPORTED_PLATFORM = 2;
export const EXIT_NOT_INTERACTIVE = 3;
export const EXIT_SIGINT = 130; // 128 + SIGINT(2), UNIX convention
