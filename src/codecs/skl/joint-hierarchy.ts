/**
 * Joint Hierarchy
 *
 * Global transforms of a joint forest. Parents may appear after their
 * children in the joint array, so globals are resolved depth first.
 */

import { CodecErrorFactory } from '../../errors';
import type { Mat4, Transform } from '../../types';
import { composeMatrix, decomposeMatrix, invertMatrix4x4, multiplyMatrices } from '../../utils/matrix-utils';

export interface HierarchyJoint {
  name?: string;
  parentIndex: number;
  local: Transform;
}

/**
 * Returns model-space matrices (column-major), one per joint.
 * Fails on out-of-range parents and on cycles.
 */
export function computeGlobalTransforms(joints: readonly HierarchyJoint[]): Mat4[] {
  const globals = new Array<Mat4 | undefined>(joints.length).fill(undefined);
  const visiting = new Set<number>();

  const resolve = (index: number): Mat4 => {
    const cached = globals[index];
    if (cached) return cached;

    const joint = joints[index];
    if (visiting.has(index)) {
      throw CodecErrorFactory.invalidField(
        `joints[${index}].parentIndex`,
        'an acyclic hierarchy',
        joint.parentIndex,
        `Joint hierarchy has a cycle through joint ${index}${joint.name ? ` (${joint.name})` : ''}`
      );
    }
    if (joint.parentIndex < -1 || joint.parentIndex >= joints.length || joint.parentIndex === index) {
      throw CodecErrorFactory.invalidField(`joints[${index}].parentIndex`, `-1..${joints.length - 1}, not ${index}`, joint.parentIndex);
    }

    visiting.add(index);
    const local = composeMatrix(joint.local);
    const global = joint.parentIndex < 0 ? local : multiplyMatrices(resolve(joint.parentIndex), local);
    visiting.delete(index);
    globals[index] = global;
    return global;
  };

  return joints.map((_, index) => resolve(index));
}

/**
 * Inverse of each joint's global transform, as TRS.
 */
export function computeInverseBindTransforms(joints: readonly HierarchyJoint[]): Transform[] {
  return computeGlobalTransforms(joints).map(global => decomposeMatrix(invertMatrix4x4(global)));
}
