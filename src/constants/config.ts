/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  DEBUG: false,
  LOG_LEVEL: 'info' as const,
  // Largest decoded image accepted before a pixel buffer is allocated
  MAX_PIXEL_COUNT: 100_000_000,
  DEFAULT_FPS: 30,
  SKN_WRITE_MAJOR: 1 as const,
} as const;

/**
 * File Extensions
 */
export const FILE_EXTENSIONS = {
  SKN: '.skn',
  SKL: '.skl',
  ANM: '.anm',
  SCB: '.scb',
  SCO: '.sco',
  TEX: '.tex',
  DDS: '.dds',
} as const;
