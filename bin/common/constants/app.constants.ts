export const APP_NAME = "cipherbox";
export const APP_VERSION = "1.0.0";

// ============================================================================
// CLI EXIT CODES
// ============================================================================

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
  INVALID_ENCODING: 3,
} as const;
