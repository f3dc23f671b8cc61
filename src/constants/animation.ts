/**
 * Animation Constants
 */
export const ANIMATION = {
  /**
   * Frame rate used when a legacy file stores 0.
   */
  FALLBACK_FPS: 30,

  /**
   * Decimal digits kept when building palette keys.
   * Values that round to the same key share one palette entry.
   */
  PALETTE_KEY_DIGITS: 6,

  /**
   * Full scale of the u16 time and vector quantization.
   */
  QUANTIZED_MAX: 65535,

  /**
   * Joint index and transform type share the u16 of a compressed frame.
   */
  JOINT_INDEX_MASK: 0x3fff,
  TRANSFORM_TYPE_SHIFT: 14,

  /**
   * Legacy track names are fixed-width.
   */
  LEGACY_NAME_LENGTH: 32,
} as const;
