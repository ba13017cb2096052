/**
 * Process exit codes shared by every geo-harvest command
 */
export const EXIT_CODES = {
  /** Dataset written (and uploaded unless --no-upload) */
  SUCCESS: 0,
  /** Run finished but produced no data, nothing exported */
  WARNINGS: 1,
  /** Export or feed download failed */
  ERRORS: 2,
  /** Invalid configuration or postal-code range */
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
