/**
 * Skeleton Constants
 *
 * Sizes and limits of the skeleton and skinned mesh layouts.
 */

export const SKELETON = {
  /**
   * Bone indices are stored as u8 in the vertex record.
   */
  MAX_INFLUENCE_INDEX: 255,

  /**
   * Radius written for every joint; readers do not use it.
   */
  DEFAULT_JOINT_RADIUS: 2.1,

  /**
   * Weight sums under this value are treated as empty.
   */
  WEIGHT_EPSILON: 1e-4,
} as const;

export const MESH_LIMITS = {
  /**
   * Indices are u16 on disk.
   */
  MAX_VERTEX_COUNT: 65535,
  MAX_SUBMESH_COUNT: 32,
  SUBMESH_NAME_LENGTH: 64,
} as const;
