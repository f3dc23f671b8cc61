/**
 * Core Interfaces for r3d-asset-codec
 *
 * Canonical in-memory models produced by the readers. Every wire variant of
 * a format decodes into one of these.
 */

import type {
  Pose,
  Quat,
  RowOrder,
  Submesh,
  TextureFormat,
  Transform,
  Vec2,
  Vec3,
} from '../schemas';
import type { Logger } from '../utils/logger';

/**
 * Options every reader and writer accepts
 */
export interface CodecOptions {
  /**
   * Defaults to the shared package logger
   */
  logger?: Logger;
}

/**
 * Column-major 4x4 matrix
 */
export type Mat4 = number[];

/**
 * Skeleton joint
 */
export interface Joint {
  name: string;
  /**
   * Always equals elfHash(name)
   */
  hash: number;
  /**
   * -1 marks a root
   */
  parentIndex: number;
  radius: number;
  flags: number;
  local: Transform;
  inverseBind: Transform;
}

export interface Skeleton {
  joints: Joint[];
  /**
   * Maps the bone index stored in a vertex to a joint index
   */
  influences: number[];
}

export interface SkinnedVertex {
  position: Vec3;
  normal: Vec3;
  uv: Vec2;
  influences: [number, number, number, number];
  weights: [number, number, number, number];
}

export interface MeshVersion {
  major: number;
  minor: number;
}

export interface SkinnedMesh {
  version: MeshVersion;
  submeshes: Submesh[];
  vertices: SkinnedVertex[];
  indices: number[];
}

export type AnimationFormat = 'compressed' | 'v5' | 'v4' | 'legacy';

export interface AnimationTrack {
  jointHash: number;
  /**
   * Only legacy files store names
   */
  name?: string;
  poses: Map<number, Pose>;
}

export interface Animation {
  format: AnimationFormat;
  fps: number;
  /**
   * Seconds
   */
  duration: number;
  frameCount: number;
  tracks: AnimationTrack[];
}

/**
 * Raw texture payload, mips largest first
 */
export interface TextureImage {
  width: number;
  height: number;
  format: TextureFormat;
  mips: Uint8Array[];
  /**
   * TEX header flags byte, carried through unchanged
   */
  flags?: number;
}

export interface DecodedTexture {
  width: number;
  height: number;
  format: TextureFormat;
  rowOrder: RowOrder;
  mipCount: number;
  pixels: Uint8Array | Float32Array;
}

/**
 * Static mesh from .scb or .sco; one uv per face corner
 */
export interface StaticMesh {
  name: string;
  material: string;
  vertices: Vec3[];
  /**
   * Triangle corners into `vertices`
   */
  indices: number[];
  /**
   * Per corner, parallel to `indices`
   */
  uvs: Vec2[];
  central: Vec3;
  pivot?: Vec3;
  flags: number;
}

export type { Pose, Quat, Submesh, Transform, Vec2, Vec3 };
