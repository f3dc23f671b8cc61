/**
 * Core Types
 *
 * Re-export types from schemas and interfaces under one module.
 */

export type {
  Vec2,
  Vec3,
  Quat,
  Transform,
  TextureFormat,
  RowOrder,
  TextureContainer,
  Submesh,
  Pose,
  JointInput,
  SkeletonInput,
  SkinnedVertexInput,
  SkinnedMeshInput,
  AnimationTrackInput,
  AnimationInput,
  CodecConfig,
  ResolvedCodecConfig,
  TextureDecodeOptions,
  TextureEncodeOptions,
  MeshWriteOptions,
} from './schemas';

export type {
  CodecOptions,
  Mat4,
  Joint,
  Skeleton,
  SkinnedVertex,
  MeshVersion,
  SkinnedMesh,
  AnimationFormat,
  AnimationTrack,
  Animation,
  TextureImage,
  DecodedTexture,
  StaticMesh,
} from './interfaces';
