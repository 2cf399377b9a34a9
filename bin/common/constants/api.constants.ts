/**
 * Centralized API Configuration and Constants
 */

// ============================================================================
// API VERSIONS
// ============================================================================

export const API_VERSIONS = {
  V0: "v0",
} as const;

export const CURRENT_API_VERSION = API_VERSIONS.V0;

// ============================================================================
// API BASE PATHS
// ============================================================================

export const API_PATHS = {
  STATUS: "/api/status",
  TRANSFORMS: "/api/transforms",
} as const;

// ============================================================================
// FULL API ROUTES (with version)
// ============================================================================

export const API_ROUTES = {
  STATUS: {
    BASE: `${API_PATHS.STATUS}/${CURRENT_API_VERSION}`,
    HEALTH: "/health",
    LOGS: "/logs",
  },

  TRANSFORMS: {
    BASE: `${API_PATHS.TRANSFORMS}/${CURRENT_API_VERSION}`,
    ALGORITHMS: "/algorithms",
    ENCRYPT: "/encrypt",
    DECRYPT: "/decrypt",
  },
} as const;

// ============================================================================
// HTTP STATUS CODES
// ============================================================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
} as const;
