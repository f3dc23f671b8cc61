/**
 * Model Schemas
 *
 * Validation schemas for the host-supplied models the writers serialize.
 */

import { z } from 'zod';
import { MESH_LIMITS, SKELETON } from '../constants/skeleton';
import { QuatSchema, TransformSchema, Vec2Schema, Vec3Schema } from './base-schemas';

const u8 = () => z.number().int().min(0).max(SKELETON.MAX_INFLUENCE_INDEX);
const weight = () => z.number().finite();
// Names are stored as single-byte strings and hashed as written
const asciiName = () => z.string().regex(/^[\x20-\x7e]*$/, 'Name must be printable ASCII');

/**
 * Joint Input Schema
 */
export const JointInputSchema = z.object({
  name: asciiName().min(1, 'Joint name cannot be empty'),
  parentIndex: z.number().int().min(-1).max(0x7fff),
  local: TransformSchema,
  // Computed from the local hierarchy when absent
  inverseBind: TransformSchema.optional(),
  radius: z.number().finite().optional().default(SKELETON.DEFAULT_JOINT_RADIUS),
  flags: z.number().int().min(0).max(0xffff).optional().default(0),
});

export const SkeletonInputSchema = z.object({
  joints: z.array(JointInputSchema).max(0xffff),
  influences: z.array(z.number().int().min(0).max(0xffff)).optional(),
});

/**
 * Skinned Vertex Schema
 */
export const SkinnedVertexSchema = z.object({
  position: Vec3Schema,
  normal: Vec3Schema.optional().default([0, 0, 0]),
  uv: Vec2Schema.optional().default([0, 0]),
  influences: z.tuple([u8(), u8(), u8(), u8()]),
  weights: z.tuple([weight(), weight(), weight(), weight()]),
});

/**
 * Submesh Schema
 */
export const SubmeshSchema = z.object({
  name: asciiName().max(MESH_LIMITS.SUBMESH_NAME_LENGTH - 1),
  vertexStart: z.number().int().nonnegative(),
  vertexCount: z.number().int().nonnegative(),
  indexStart: z.number().int().nonnegative(),
  indexCount: z.number().int().nonnegative(),
});

export const SkinnedMeshInputSchema = z.object({
  submeshes: z.array(SubmeshSchema).min(1),
  vertices: z.array(SkinnedVertexSchema),
  indices: z.array(z.number().int().nonnegative()),
});

/**
 * One sampled pose; absent components are carried from the previous frame
 */
export const PoseSchema = z.object({
  translation: Vec3Schema.optional(),
  rotation: QuatSchema.optional(),
  scale: Vec3Schema.optional(),
});

export const AnimationTrackInputSchema = z.object({
  jointHash: z.number().int().min(0).max(0xffffffff).optional(),
  name: asciiName().optional(),
  poses: z.map(z.number().int().nonnegative(), PoseSchema),
}).refine(
  track => track.jointHash !== undefined || (track.name !== undefined && track.name.length > 0),
  { message: 'Track needs a jointHash or a name' }
);

/**
 * Animation Input Schema
 */
export const AnimationInputSchema = z.object({
  fps: z.number().finite().positive(),
  frameCount: z.number().int().positive().max(0xffffffff),
  tracks: z.array(AnimationTrackInputSchema),
});

/**
 * Type exports for TypeScript inference
 */
export type JointInput = z.input<typeof JointInputSchema>;
export type SkeletonInput = z.input<typeof SkeletonInputSchema>;
export type SkinnedVertexInput = z.input<typeof SkinnedVertexSchema>;
export type Submesh = z.infer<typeof SubmeshSchema>;
export type SkinnedMeshInput = z.input<typeof SkinnedMeshInputSchema>;
export type Pose = z.infer<typeof PoseSchema>;
export type AnimationTrackInput = z.input<typeof AnimationTrackInputSchema>;
export type AnimationInput = z.input<typeof AnimationInputSchema>;
