/**
 * Error Constants for r3d-asset-codec
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  MALFORMED_HEADER: 'R3D_MALFORMED_HEADER',
  UNSUPPORTED_VERSION: 'R3D_UNSUPPORTED_VERSION',
  UNEXPECTED_EOF: 'R3D_UNEXPECTED_EOF',
  INVALID_FIELD_VALUE: 'R3D_INVALID_FIELD_VALUE',
  UNSUPPORTED_PIXEL_FORMAT: 'R3D_UNSUPPORTED_PIXEL_FORMAT',
  CONFIG_VALIDATION_ERROR: 'R3D_CONFIG_VALIDATION_ERROR',
  FILE_SYSTEM_ERROR: 'R3D_FILE_SYSTEM_ERROR',
} as const;
