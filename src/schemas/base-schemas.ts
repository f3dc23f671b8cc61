/**
 * Base Schemas
 *
 * Common validation schemas used across different codecs.
 */

import { z } from 'zod';

const finite = () => z.number().finite();

export const Vec2Schema = z.tuple([finite(), finite()]);

export const Vec3Schema = z.tuple([finite(), finite(), finite()]);

/**
 * Quaternion in [x, y, z, w] order
 */
export const QuatSchema = z.tuple([finite(), finite(), finite(), finite()]);

export const TransformSchema = z.object({
  translation: Vec3Schema,
  rotation: QuatSchema,
  scale: Vec3Schema,
});

/**
 * Log Level Schema
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Pixel formats a texture container can carry
 */
export const TextureFormatSchema = z.enum(['dxt1', 'dxt5', 'bgra8']);

/**
 * Vertical order of pixel rows in a host buffer
 */
export const RowOrderSchema = z.enum(['top-down', 'bottom-up']);

export const TextureContainerSchema = z.enum(['tex', 'dds']);

/**
 * Type exports for TypeScript inference
 */
export type Vec2 = z.infer<typeof Vec2Schema>;
export type Vec3 = z.infer<typeof Vec3Schema>;
export type Quat = z.infer<typeof QuatSchema>;
export type Transform = z.infer<typeof TransformSchema>;
export type TextureFormat = z.infer<typeof TextureFormatSchema>;
export type RowOrder = z.infer<typeof RowOrderSchema>;
export type TextureContainer = z.infer<typeof TextureContainerSchema>;
