/**
 * ANM Reader
 *
 * Decodes all four wire layouts into the canonical `Animation`.
 */

import { ANIMATION } from '../../constants/animation';
import { CodecErrorFactory } from '../../errors';
import type { Animation, AnimationTrack, CodecOptions, Pose, Quat, Vec3 } from '../../types';
import { BinaryCursor } from '../../utils/binary-cursor';
import { elfHash } from '../../utils/elf-hash';
import { logger as defaultLogger } from '../../utils/logger';
import { roundHalfEven } from '../../utils/number-utils';
import { PACKED_QUAT_SIZE, unpackQuat } from '../quat/quantized-quat';
import {
  readAnmHeader,
  type AnmHeader,
  type CompressedAnmHeader,
  type LegacyAnmHeader,
  type V4AnmHeader,
  type V5AnmHeader,
} from './anm-header';

const TRANSFORM_ROTATION = 0;
const TRANSFORM_TRANSLATION = 1;
const TRANSFORM_SCALE = 2;

function paletteCount(start: number, end: number, stride: number, field: string): number {
  if (end < start) {
    throw CodecErrorFactory.invalidField(field, `section end >= ${start}`, end);
  }
  return Math.floor((end - start) / stride);
}

function readHashes(cursor: BinaryCursor, offset: number, count: number): number[] {
  cursor.seekAbsolute(offset);
  const hashes: number[] = [];
  for (let i = 0; i < count; i++) {
    hashes.push(cursor.readU32(`jointHashes[${i}]`));
  }
  return hashes;
}

function readVectorPalette(cursor: BinaryCursor, offset: number, count: number): Vec3[] {
  cursor.seekAbsolute(offset);
  const palette: Vec3[] = [];
  for (let i = 0; i < count; i++) {
    palette.push(cursor.readVec3(`vectors[${i}]`));
  }
  return palette;
}

function lookup<T extends readonly number[]>(palette: readonly T[], index: number, field: string): T {
  if (index >= palette.length) {
    throw CodecErrorFactory.invalidField(field, `< ${palette.length}`, index);
  }
  return palette[index];
}

function dequantize(payload: Uint8Array, min: Vec3, max: Vec3): Vec3 {
  const result: Vec3 = [0, 0, 0];
  for (let axis = 0; axis < 3; axis++) {
    const quantized = payload[axis * 2] | (payload[axis * 2 + 1] << 8);
    result[axis] = ((max[axis] - min[axis]) / ANIMATION.QUANTIZED_MAX) * quantized + min[axis];
  }
  return result;
}

function decodeCompressed(cursor: BinaryCursor, header: CompressedAnmHeader): Animation {
  const { fps, maxTime } = header;
  const duration = maxTime + 1 / fps;
  const tracks: AnimationTrack[] = readHashes(cursor, header.jointHashesOffset, header.jointCount)
    .map(jointHash => ({ jointHash, poses: new Map<number, Pose>() }));

  cursor.seekAbsolute(header.framesOffset);
  for (let i = 0; i < header.entryCount; i++) {
    const compressedTime = cursor.readU16(`entries[${i}].time`);
    const bits = cursor.readU16(`entries[${i}].bits`);
    const payload = cursor.readBytes(PACKED_QUAT_SIZE, `entries[${i}].payload`);

    const jointIndex = bits & ANIMATION.JOINT_INDEX_MASK;
    if (jointIndex >= tracks.length) continue;

    const time = (compressedTime / ANIMATION.QUANTIZED_MAX) * maxTime;
    const frame = roundHalfEven(time * fps);
    const { poses } = tracks[jointIndex];
    let pose = poses.get(frame);
    if (!pose) {
      pose = {};
      poses.set(frame, pose);
    }

    switch (bits >> ANIMATION.TRANSFORM_TYPE_SHIFT) {
      case TRANSFORM_ROTATION:
        pose.rotation = unpackQuat(payload);
        break;
      case TRANSFORM_TRANSLATION:
        pose.translation = dequantize(payload, header.translationMin, header.translationMax);
        break;
      case TRANSFORM_SCALE:
        pose.scale = dequantize(payload, header.scaleMin, header.scaleMax);
        break;
      default:
        break;
    }
  }

  return { format: 'compressed', fps, duration, frameCount: roundHalfEven(duration * fps), tracks };
}

function decodeV5(cursor: BinaryCursor, header: V5AnmHeader): Animation {
  const hashes = readHashes(cursor, header.jointHashesOffset, header.trackCount);
  const vectors = readVectorPalette(
    cursor,
    header.vectorsOffset,
    paletteCount(header.vectorsOffset, header.quatsOffset, 12, 'ANM quatsOffset')
  );

  const quatCount = paletteCount(header.quatsOffset, header.jointHashesOffset, PACKED_QUAT_SIZE, 'ANM jointHashesOffset');
  cursor.seekAbsolute(header.quatsOffset);
  const quats: Quat[] = [];
  for (let i = 0; i < quatCount; i++) {
    quats.push(unpackQuat(cursor.readBytes(PACKED_QUAT_SIZE, `quats[${i}]`)));
  }

  const tracks: AnimationTrack[] = hashes.map(jointHash => ({ jointHash, poses: new Map<number, Pose>() }));
  cursor.seekAbsolute(header.framesOffset);
  for (let frame = 0; frame < header.frameCount; frame++) {
    for (const track of tracks) {
      const field = `frames[${frame}]`;
      const translation = lookup(vectors, cursor.readU16(`${field}.translation`), `${field}.translationIndex`);
      const scale = lookup(vectors, cursor.readU16(`${field}.scale`), `${field}.scaleIndex`);
      const rotation = lookup(quats, cursor.readU16(`${field}.rotation`), `${field}.rotationIndex`);
      track.poses.set(frame, { translation: [...translation], rotation: [...rotation], scale: [...scale] });
    }
  }

  const fps = 1 / header.frameDuration;
  return { format: 'v5', fps, duration: header.frameCount * header.frameDuration, frameCount: header.frameCount, tracks };
}

function decodeV4(cursor: BinaryCursor, header: V4AnmHeader): Animation {
  const vectors = readVectorPalette(
    cursor,
    header.vectorsOffset,
    paletteCount(header.vectorsOffset, header.quatsOffset, 12, 'ANM quatsOffset')
  );

  const quatCount = paletteCount(header.quatsOffset, header.framesOffset, 16, 'ANM framesOffset');
  cursor.seekAbsolute(header.quatsOffset);
  const quats: Quat[] = [];
  for (let i = 0; i < quatCount; i++) {
    quats.push(cursor.readQuat(`quats[${i}]`));
  }

  const tracks: AnimationTrack[] = [];
  const byHash = new Map<number, AnimationTrack>();
  cursor.seekAbsolute(header.framesOffset);
  for (let frame = 0; frame < header.frameCount; frame++) {
    for (let t = 0; t < header.trackCount; t++) {
      const field = `frames[${frame}][${t}]`;
      const jointHash = cursor.readU32(`${field}.jointHash`);
      const translation = lookup(vectors, cursor.readU16(`${field}.translation`), `${field}.translationIndex`);
      const scale = lookup(vectors, cursor.readU16(`${field}.scale`), `${field}.scaleIndex`);
      const rotation = lookup(quats, cursor.readU16(`${field}.rotation`), `${field}.rotationIndex`);
      cursor.readU16(`${field}.padding`);

      let track = byHash.get(jointHash);
      if (!track) {
        track = { jointHash, poses: new Map<number, Pose>() };
        byHash.set(jointHash, track);
        tracks.push(track);
      }
      track.poses.set(frame, { translation: [...translation], rotation: [...rotation], scale: [...scale] });
    }
  }

  const fps = 1 / header.frameDuration;
  return { format: 'v4', fps, duration: header.frameCount * header.frameDuration, frameCount: header.frameCount, tracks };
}

function decodeLegacy(cursor: BinaryCursor, header: LegacyAnmHeader): Animation {
  cursor.seekAbsolute(header.tracksStart);
  const tracks: AnimationTrack[] = [];
  for (let t = 0; t < header.trackCount; t++) {
    const name = cursor.readFixedString(ANIMATION.LEGACY_NAME_LENGTH, `tracks[${t}].name`);
    cursor.readU32(`tracks[${t}].flags`);
    const poses = new Map<number, Pose>();
    for (let frame = 0; frame < header.frameCount; frame++) {
      const rotation = cursor.readQuat(`tracks[${t}].frames[${frame}].rotation`);
      const translation = cursor.readVec3(`tracks[${t}].frames[${frame}].translation`);
      poses.set(frame, { translation, rotation, scale: [1, 1, 1] });
    }
    tracks.push({ jointHash: elfHash(name), name, poses });
  }

  return {
    format: 'legacy',
    fps: header.fps,
    duration: header.frameCount / header.fps,
    frameCount: header.frameCount,
    tracks,
  };
}

function decode(cursor: BinaryCursor, header: AnmHeader): Animation {
  switch (header.kind) {
    case 'compressed':
      return decodeCompressed(cursor, header);
    case 'v5':
      return decodeV5(cursor, header);
    case 'v4':
      return decodeV4(cursor, header);
    case 'legacy':
      return decodeLegacy(cursor, header);
  }
}

/**
 * Reads an animation in any of the supported layouts.
 */
export function readAnimation(bytes: Uint8Array, options: CodecOptions = {}): Animation {
  const log = options.logger ?? defaultLogger;
  const cursor = new BinaryCursor(bytes);
  const header = readAnmHeader(cursor);
  log.debug('Reading ANM', { format: header.kind });

  const animation = decode(cursor, header);
  log.debug('Read ANM', {
    format: animation.format,
    fps: animation.fps,
    frameCount: animation.frameCount,
    tracks: animation.tracks.length,
  });
  return animation;
}
