export { readSkeleton, writeSkeleton } from './skl-codec';
export { computeGlobalTransforms, computeInverseBindTransforms, type HierarchyJoint } from './joint-hierarchy';
