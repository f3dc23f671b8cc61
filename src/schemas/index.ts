/**
 * Zod Schemas for r3d-asset-codec
 *
 * All validation schemas using Zod for type safety and validation.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import {
  LogLevelSchema,
  RowOrderSchema,
  TextureContainerSchema,
} from './base-schemas';

/**
 * Codec Configuration Schema
 */
export const CodecConfigSchema = z.object({
  debug: z.boolean().optional().default(DEFAULT_CONFIG.DEBUG),
  logLevel: LogLevelSchema.optional().default(DEFAULT_CONFIG.LOG_LEVEL),
  // Decoded textures above this many pixels are rejected before allocation
  maxPixelCount: z.number().int().positive().optional().default(DEFAULT_CONFIG.MAX_PIXEL_COUNT),
  defaultFps: z.number().positive().optional().default(DEFAULT_CONFIG.DEFAULT_FPS),
  sknWriteMajor: z.union([z.literal(1), z.literal(4)]).optional().default(DEFAULT_CONFIG.SKN_WRITE_MAJOR),
});

/**
 * Texture Decode Options Schema
 */
export const TextureDecodeOptionsSchema = z.object({
  rowOrder: RowOrderSchema.optional().default('top-down'),
  output: z.enum(['rgba8', 'float']).optional().default('rgba8'),
  mipLevel: z.number().int().nonnegative().optional().default(0),
  maxPixelCount: z.number().int().positive().optional().default(DEFAULT_CONFIG.MAX_PIXEL_COUNT),
});

/**
 * Texture Encode Options Schema
 */
export const TextureEncodeOptionsSchema = z.object({
  container: TextureContainerSchema.optional().default('tex'),
  // Row order of the pixels handed in
  rowOrder: RowOrderSchema.optional().default('top-down'),
});

/**
 * Mesh Write Options Schema
 */
export const MeshWriteOptionsSchema = z.object({
  major: z.union([z.literal(1), z.literal(4)]).optional().default(DEFAULT_CONFIG.SKN_WRITE_MAJOR),
});

/**
 * Type exports for TypeScript inference
 */
export type CodecConfig = z.input<typeof CodecConfigSchema>;
export type ResolvedCodecConfig = z.infer<typeof CodecConfigSchema>;
export type TextureDecodeOptions = z.input<typeof TextureDecodeOptionsSchema>;
export type TextureEncodeOptions = z.input<typeof TextureEncodeOptionsSchema>;
export type MeshWriteOptions = z.input<typeof MeshWriteOptionsSchema>;

// Re-export base schemas
export {
  Vec2Schema,
  Vec3Schema,
  QuatSchema,
  TransformSchema,
  LogLevelSchema,
  TextureFormatSchema,
  RowOrderSchema,
  TextureContainerSchema,
  type Vec2,
  type Vec3,
  type Quat,
  type Transform,
  type TextureFormat,
  type RowOrder,
  type TextureContainer,
} from './base-schemas';

// Re-export model schemas
export {
  JointInputSchema,
  SkeletonInputSchema,
  SkinnedVertexSchema,
  SubmeshSchema,
  SkinnedMeshInputSchema,
  PoseSchema,
  AnimationTrackInputSchema,
  AnimationInputSchema,
  type JointInput,
  type SkeletonInput,
  type SkinnedVertexInput,
  type Submesh,
  type SkinnedMeshInput,
  type Pose,
  type AnimationTrackInput,
  type AnimationInput,
} from './model-schemas';
