/**
 * ANM Header
 *
 * Every animation file starts with an 8-byte magic and a u32 version. The
 * rest of the header is decoded once into one variant of `AnmHeader`; the
 * frame decoders only ever see that union.
 *
 * Section offsets of the r3d2 variants are stored relative to byte 12.
 */

import { ANIMATION } from '../../constants/animation';
import { ANM } from '../../constants/formats';
import { CodecErrorFactory } from '../../errors';
import type { Vec3 } from '../../types';
import type { BinaryCursor } from '../../utils/binary-cursor';

export interface CompressedAnmHeader {
  kind: 'compressed';
  version: number;
  jointCount: number;
  entryCount: number;
  maxTime: number;
  fps: number;
  translationMin: Vec3;
  translationMax: Vec3;
  scaleMin: Vec3;
  scaleMax: Vec3;
  framesOffset: number;
  jointHashesOffset: number;
}

export interface V5AnmHeader {
  kind: 'v5';
  trackCount: number;
  frameCount: number;
  frameDuration: number;
  jointHashesOffset: number;
  vectorsOffset: number;
  quatsOffset: number;
  framesOffset: number;
}

export interface V4AnmHeader {
  kind: 'v4';
  trackCount: number;
  frameCount: number;
  frameDuration: number;
  vectorsOffset: number;
  quatsOffset: number;
  framesOffset: number;
}

export interface LegacyAnmHeader {
  kind: 'legacy';
  version: number;
  trackCount: number;
  frameCount: number;
  fps: number;
  /**
   * Position of the first track record
   */
  tracksStart: number;
}

export type AnmHeader = CompressedAnmHeader | V5AnmHeader | V4AnmHeader | LegacyAnmHeader;

function absolute(offset: number, field: string): number {
  if (offset < 0) {
    throw CodecErrorFactory.invalidField(field, 'a non-negative offset', offset);
  }
  return offset + ANM.OFFSET_BASE;
}

function readFrameDuration(cursor: BinaryCursor): number {
  const frameDuration = cursor.readF32('ANM frameDuration');
  if (!(frameDuration > 0) || !Number.isFinite(frameDuration)) {
    throw CodecErrorFactory.invalidField('ANM frameDuration', 'a positive duration', frameDuration);
  }
  return frameDuration;
}

function readCompressedHeader(cursor: BinaryCursor, version: number): CompressedAnmHeader {
  cursor.readU32('ANM resourceSize');
  cursor.readU32('ANM formatToken');
  cursor.readU32('ANM flags');
  const jointCount = cursor.readU32('ANM jointCount');
  const entryCount = cursor.readU32('ANM frameCount');
  cursor.readU32('ANM jumpCacheCount');
  const maxTime = cursor.readF32('ANM maxTime');
  const fps = cursor.readF32('ANM fps');
  if (!(fps > 0) || !Number.isFinite(fps)) {
    throw CodecErrorFactory.invalidField('ANM fps', 'a positive frame rate', fps);
  }
  // Error metrics of the quantization, unused on read
  cursor.seekRelative(24);
  const translationMin = cursor.readVec3('ANM translationMin');
  const translationMax = cursor.readVec3('ANM translationMax');
  const scaleMin = cursor.readVec3('ANM scaleMin');
  const scaleMax = cursor.readVec3('ANM scaleMax');
  const framesOffset = absolute(cursor.readI32('ANM framesOffset'), 'ANM framesOffset');
  cursor.readI32('ANM jumpCachesOffset');
  const jointHashesOffset = absolute(cursor.readI32('ANM jointHashesOffset'), 'ANM jointHashesOffset');

  return {
    kind: 'compressed',
    version,
    jointCount,
    entryCount,
    maxTime,
    fps,
    translationMin,
    translationMax,
    scaleMin,
    scaleMax,
    framesOffset,
    jointHashesOffset,
  };
}

function readV5Header(cursor: BinaryCursor): V5AnmHeader {
  // resourceSize, formatToken, version, flags
  cursor.seekRelative(16);
  const trackCount = cursor.readU32('ANM trackCount');
  const frameCount = cursor.readU32('ANM frameCount');
  const frameDuration = readFrameDuration(cursor);
  const jointHashesOffset = absolute(cursor.readI32('ANM jointHashesOffset'), 'ANM jointHashesOffset');
  // asset name and time offsets
  cursor.seekRelative(8);
  const vectorsOffset = absolute(cursor.readI32('ANM vectorsOffset'), 'ANM vectorsOffset');
  const quatsOffset = absolute(cursor.readI32('ANM quatsOffset'), 'ANM quatsOffset');
  const framesOffset = absolute(cursor.readI32('ANM framesOffset'), 'ANM framesOffset');

  return { kind: 'v5', trackCount, frameCount, frameDuration, jointHashesOffset, vectorsOffset, quatsOffset, framesOffset };
}

function readV4Header(cursor: BinaryCursor): V4AnmHeader {
  cursor.seekRelative(16);
  const trackCount = cursor.readU32('ANM trackCount');
  const frameCount = cursor.readU32('ANM frameCount');
  const frameDuration = readFrameDuration(cursor);
  // tracks, asset name and time offsets
  cursor.seekRelative(12);
  const vectorsOffset = absolute(cursor.readI32('ANM vectorsOffset'), 'ANM vectorsOffset');
  const quatsOffset = absolute(cursor.readI32('ANM quatsOffset'), 'ANM quatsOffset');
  const framesOffset = absolute(cursor.readI32('ANM framesOffset'), 'ANM framesOffset');

  return { kind: 'v4', trackCount, frameCount, frameDuration, vectorsOffset, quatsOffset, framesOffset };
}

function readLegacyHeader(cursor: BinaryCursor, version: number): LegacyAnmHeader {
  cursor.readU32('ANM skeletonId');
  const trackCount = cursor.readU32('ANM trackCount');
  const frameCount = cursor.readU32('ANM frameCount');
  const storedFps = cursor.readU32('ANM fps');
  return {
    kind: 'legacy',
    version,
    trackCount,
    frameCount,
    fps: storedFps === 0 ? ANIMATION.FALLBACK_FPS : storedFps,
    tracksStart: cursor.position,
  };
}

/**
 * Reads the header at the start of the buffer and leaves the cursor after it.
 * Files without a known magic are read with the legacy layout.
 */
export function readAnmHeader(cursor: BinaryCursor): AnmHeader {
  cursor.seekAbsolute(0);
  const magic = cursor.readAscii(8, 'ANM magic');
  const version = cursor.readU32('ANM version');

  if (magic === ANM.COMPRESSED_MAGIC) {
    return readCompressedHeader(cursor, version);
  }
  if (magic === ANM.UNCOMPRESSED_MAGIC) {
    if (version === 5) return readV5Header(cursor);
    if (version === 4) return readV4Header(cursor);
    if (version > 5) {
      throw CodecErrorFactory.unsupportedVersion('ANM', version);
    }
  }
  return readLegacyHeader(cursor, version);
}
