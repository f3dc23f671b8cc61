/**
 * SKL Codec
 *
 * Header (64 bytes):
 *   u32 resourceSize, u32 magic, u32 version (0), u16 flags, u16 jointCount,
 *   u32 influenceCount, i32 jointsOffset, i32 jointIndicesOffset,
 *   i32 influencesOffset, i32 reserved x2, i32 jointNamesOffset, u32 reserved x5
 *
 * Joint record (100 bytes):
 *   u16 flags, u16 id, i16 parent, u16 flags2, u32 hash, f32 radius,
 *   local T / S / R, inverse-bind T / S / R (rotations stored x, y, z, w),
 *   i32 name offset relative to the offset field itself
 */

import { SKL } from '../../constants/formats';
import { CodecErrorFactory } from '../../errors';
import { SkeletonInputSchema } from '../../schemas';
import type {
  CodecOptions,
  Joint,
  JointInput,
  Skeleton,
  SkeletonInput,
  Transform,
} from '../../types';
import { BinaryCursor, BinaryWriter } from '../../utils/binary-cursor';
import { elfHash } from '../../utils/elf-hash';
import { logger as defaultLogger } from '../../utils/logger';
import { computeGlobalTransforms, computeInverseBindTransforms } from './joint-hierarchy';

function readTransform(cursor: BinaryCursor, label: string): Transform {
  const translation = cursor.readVec3(`${label} translation`);
  const scale = cursor.readVec3(`${label} scale`);
  const rotation = cursor.readQuat(`${label} rotation`);
  return { translation, rotation, scale };
}

function writeTransform(writer: BinaryWriter, transform: Transform): void {
  writer.writeVec3(transform.translation);
  writer.writeVec3(transform.scale);
  writer.writeQuat(transform.rotation);
}

/**
 * Reads a version 0 skeleton.
 */
export function readSkeleton(bytes: Uint8Array, options: CodecOptions = {}): Skeleton {
  const log = options.logger ?? defaultLogger;
  const cursor = new BinaryCursor(bytes);

  cursor.readU32('SKL resourceSize');
  const magic = cursor.readU32('SKL magic');
  if (magic !== SKL.MAGIC) {
    throw CodecErrorFactory.malformedHeader('SKL', `0x${SKL.MAGIC.toString(16)}`, `0x${magic.toString(16)}`);
  }
  const version = cursor.readU32('SKL version');
  if (version !== SKL.VERSION) {
    throw CodecErrorFactory.unsupportedVersion('SKL', version);
  }

  cursor.readU16('SKL flags');
  const jointCount = cursor.readU16('SKL jointCount');
  const influenceCount = cursor.readU32('SKL influenceCount');
  const jointsOffset = cursor.readI32('SKL jointsOffset');
  cursor.readI32('SKL jointIndicesOffset');
  const influencesOffset = cursor.readI32('SKL influencesOffset');

  log.debug('Reading SKL', { version, jointCount, influenceCount, offset: jointsOffset });

  const joints: Joint[] = [];
  if (jointsOffset > 0 && jointCount > 0) {
    cursor.seekAbsolute(jointsOffset);
    for (let i = 0; i < jointCount; i++) {
      const field = `joints[${i}]`;
      const flags = cursor.readU16(`${field}.flags`);
      cursor.readU16(`${field}.id`);
      const parentIndex = cursor.readI16(`${field}.parentIndex`);
      cursor.readU16(`${field}.flags2`);
      const storedHash = cursor.readU32(`${field}.hash`);
      const radius = cursor.readF32(`${field}.radius`);
      const local = readTransform(cursor, `${field}.local`);
      const inverseBind = readTransform(cursor, `${field}.inverseBind`);
      const nameRef = cursor.readRelativeOffset(`${field}.nameOffset`);

      let name = cursor.resolveCString(nameRef, `${field}.name`);
      if (i === 0 && name === '') {
        // Step past the empty string's terminator plus one padding byte
        name = cursor.resolveCString({ base: nameRef.base, relative: nameRef.relative + 2 }, `${field}.name`);
      }

      if (parentIndex < -1 || parentIndex >= jointCount || parentIndex === i) {
        throw CodecErrorFactory.invalidField(`${field}.parentIndex`, `-1..${jointCount - 1}, not ${i}`, parentIndex);
      }

      const hash = elfHash(name);
      if (hash !== storedHash) {
        log.warn(`Joint '${name}' stores hash 0x${storedHash.toString(16)}, using 0x${hash.toString(16)}`, {
          format: 'SKL',
          joint: i,
        });
      }

      joints.push({ name, hash, parentIndex, radius, flags, local, inverseBind });
    }
  }

  const influences: number[] = [];
  if (influencesOffset > 0 && influenceCount > 0) {
    cursor.seekAbsolute(influencesOffset);
    for (let i = 0; i < influenceCount; i++) {
      influences.push(cursor.readU16(`influences[${i}]`));
    }
  }

  return { joints, influences };
}

/**
 * Writes a version 0 skeleton. Hashes are derived from names; missing
 * inverse-bind transforms are computed from the local hierarchy.
 */
export function writeSkeleton(input: SkeletonInput | JointInput[], options: CodecOptions = {}): Uint8Array {
  const log = options.logger ?? defaultLogger;
  const parsed = SkeletonInputSchema.safeParse(Array.isArray(input) ? { joints: input } : input);
  if (!parsed.success) {
    throw CodecErrorFactory.schemaError('skeleton', parsed.error);
  }
  const { joints } = parsed.data;
  const jointCount = joints.length;

  const seen = new Map<string, number>();
  joints.forEach((joint, index) => {
    const previous = seen.get(joint.name);
    if (previous !== undefined) {
      throw CodecErrorFactory.invalidField(
        `joints[${index}].name`,
        'a unique joint name',
        joint.name,
        `Joint name '${joint.name}' is used by joints ${previous} and ${index}`
      );
    }
    seen.set(joint.name, index);
  });

  // Validates parents and cycles even when every inverse bind is supplied
  computeGlobalTransforms(joints);
  const needsInverse = joints.some(joint => joint.inverseBind === undefined);
  const computed = needsInverse ? computeInverseBindTransforms(joints) : [];

  const influences = parsed.data.influences ?? joints.map((_, index) => index);
  influences.forEach((jointIndex, slot) => {
    if (jointIndex >= jointCount) {
      throw CodecErrorFactory.invalidField(`influences[${slot}]`, `< ${jointCount}`, jointIndex);
    }
  });

  const jointsOffset = SKL.HEADER_SIZE;
  const jointIndicesOffset = jointsOffset + jointCount * SKL.JOINT_SIZE;
  const influencesOffset = jointIndicesOffset + jointCount * SKL.JOINT_INDEX_SIZE;
  const jointNamesOffset = influencesOffset + influences.length * 2;

  const nameOffsets: number[] = [];
  let namePosition = jointNamesOffset;
  for (const joint of joints) {
    nameOffsets.push(namePosition);
    namePosition += joint.name.length + 1;
  }

  const writer = new BinaryWriter(namePosition);
  writer.reserveU32('resourceSize');
  writer.writeU32(SKL.MAGIC);
  writer.writeU32(SKL.VERSION);
  writer.writeU16(0);
  writer.writeU16(jointCount);
  writer.writeU32(influences.length);
  writer.writeI32(jointsOffset);
  writer.writeI32(jointIndicesOffset);
  writer.writeI32(influencesOffset);
  writer.writeI32(0);
  writer.writeI32(0);
  writer.writeI32(jointNamesOffset);
  for (let i = 0; i < 5; i++) {
    writer.writeU32(SKL.RESERVED_OFFSET);
  }

  joints.forEach((joint, index) => {
    writer.writeU16(joint.flags);
    writer.writeU16(index);
    writer.writeI16(joint.parentIndex);
    writer.writeU16(0);
    writer.writeU32(elfHash(joint.name));
    writer.writeF32(joint.radius);
    writeTransform(writer, joint.local);
    writeTransform(writer, joint.inverseBind ?? computed[index]);
    writer.writeI32(nameOffsets[index] - writer.position);
  });

  joints.forEach((joint, index) => {
    writer.writeU16(index);
    writer.writeU16(0);
    writer.writeU32(elfHash(joint.name));
  });

  for (const jointIndex of influences) {
    writer.writeU16(jointIndex);
  }

  joints.forEach((joint, index) => {
    writer.writeCString(joint.name, `joints[${index}].name`);
  });

  writer.resolve('resourceSize', writer.length);
  log.debug('Wrote SKL', { jointCount, influenceCount: influences.length, byteLength: writer.length });
  return writer.toUint8Array();
}
