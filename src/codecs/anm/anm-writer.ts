/**
 * ANM Writer
 *
 * Writes the uncompressed v4 layout:
 *   char[8] 'r3d2anmd', u32 4, u32 resourceSize, u32 formatToken, u32 0,
 *   u32 flags, u32 trackCount, u32 frameCount, f32 frameDuration,
 *   i32 0 x3, i32 vectorsOffset (64), i32 quatsOffset, i32 framesOffset,
 *   12 bytes padding, vector palette, quaternion palette (x, y, z, w), then
 *   per frame and per track: u32 jointHash, u16 t, u16 s, u16 r, u16 0.
 */

import { ANIMATION } from '../../constants/animation';
import { ANM } from '../../constants/formats';
import { CodecErrorFactory } from '../../errors';
import { AnimationInputSchema } from '../../schemas';
import type { AnimationInput, CodecOptions, Quat, Vec3 } from '../../types';
import { BinaryWriter } from '../../utils/binary-cursor';
import { elfHash } from '../../utils/elf-hash';
import { logger as defaultLogger } from '../../utils/logger';
import { normalizeQuat } from '../../utils/matrix-utils';
import { roundHalfEven } from '../../utils/number-utils';

const PALETTE_SCALE = 10 ** ANIMATION.PALETTE_KEY_DIGITS;

/**
 * Insertion-ordered palette keyed by values rounded to a fixed number of
 * decimals. Values sharing a key collapse onto the first one inserted.
 */
export class RoundedPalette<T extends readonly number[]> {
  private readonly indexByKey = new Map<string, number>();
  readonly values: T[] = [];

  static keyOf(values: readonly number[]): string {
    return values
      .map(value => {
        const rounded = roundHalfEven(value * PALETTE_SCALE) / PALETTE_SCALE;
        // -0 and 0 share a key
        return rounded === 0 ? '0' : String(rounded);
      })
      .join(',');
  }

  add(value: T): number {
    const key = RoundedPalette.keyOf(value);
    const existing = this.indexByKey.get(key);
    if (existing !== undefined) return existing;
    const index = this.values.length;
    this.indexByKey.set(key, index);
    this.values.push(value);
    return index;
  }

  get size(): number {
    return this.values.length;
  }
}

interface FrameCell {
  translation: number;
  scale: number;
  rotation: number;
}

/**
 * Writes an animation as v4. Tracks are ordered by joint hash; frames a track
 * does not sample carry the previous frame's value, starting from identity.
 */
export function writeAnimation(input: AnimationInput, options: CodecOptions = {}): Uint8Array {
  const log = options.logger ?? defaultLogger;
  const parsed = AnimationInputSchema.safeParse(input);
  if (!parsed.success) {
    throw CodecErrorFactory.schemaError('animation', parsed.error);
  }
  const { fps, frameCount } = parsed.data;

  const tracks = parsed.data.tracks.map((track, index) => {
    const jointHash = track.jointHash ?? elfHash(track.name ?? '');
    for (const frame of track.poses.keys()) {
      if (frame >= frameCount) {
        throw CodecErrorFactory.invalidField(`tracks[${index}].poses`, `frame < ${frameCount}`, frame);
      }
    }
    return { jointHash, poses: track.poses };
  });

  const seen = new Set<number>();
  for (const { jointHash } of tracks) {
    if (seen.has(jointHash)) {
      throw CodecErrorFactory.invalidField('tracks', 'one track per joint hash', `0x${jointHash.toString(16)}`);
    }
    seen.add(jointHash);
  }
  tracks.sort((a, b) => a.jointHash - b.jointHash);

  const vectors = new RoundedPalette<Vec3>();
  const quats = new RoundedPalette<Quat>();
  const current: { translation: Vec3; rotation: Quat; scale: Vec3 }[] = tracks.map(() => ({
    translation: [0, 0, 0],
    rotation: [0, 0, 0, 1],
    scale: [1, 1, 1],
  }));

  // cells[frame][track]
  const cells: FrameCell[][] = [];
  for (let frame = 0; frame < frameCount; frame++) {
    const row: FrameCell[] = [];
    tracks.forEach((track, t) => {
      const state = current[t];
      const pose = track.poses.get(frame);
      if (pose?.translation) state.translation = pose.translation;
      if (pose?.rotation) state.rotation = normalizeQuat(pose.rotation);
      if (pose?.scale) state.scale = pose.scale;
      row.push({
        translation: vectors.add(state.translation),
        scale: vectors.add(state.scale),
        rotation: quats.add(state.rotation),
      });
    });
    cells.push(row);
  }

  if (vectors.size > 0x10000 || quats.size > 0x10000) {
    throw CodecErrorFactory.invalidField(
      'palette size',
      'at most 65536 entries',
      Math.max(vectors.size, quats.size),
      'Animation palettes exceed the u16 index range'
    );
  }

  const writer = new BinaryWriter(
    ANM.V4_VECTORS_OFFSET + ANM.OFFSET_BASE + vectors.size * 12 + quats.size * 16
      + frameCount * tracks.length * ANM.V4_FRAME_SIZE
  );
  writer.writeAscii(ANM.UNCOMPRESSED_MAGIC);
  writer.writeU32(4);
  writer.reserveU32('resourceSize');
  writer.writeU32(ANM.FORMAT_TOKEN);
  writer.writeU32(0);
  writer.writeU32(0);
  writer.writeU32(tracks.length);
  writer.writeU32(frameCount);
  writer.writeF32(1 / fps);
  writer.writeI32(0);
  writer.writeI32(0);
  writer.writeI32(0);
  writer.writeI32(ANM.V4_VECTORS_OFFSET);
  writer.reserveI32('quatsOffset');
  writer.reserveI32('framesOffset');
  writer.writeZeros(ANM.V4_VECTORS_OFFSET + ANM.OFFSET_BASE - writer.position);

  for (const vector of vectors.values) {
    writer.writeVec3(vector);
  }
  writer.resolve('quatsOffset', writer.position - ANM.OFFSET_BASE);
  for (const quat of quats.values) {
    writer.writeQuat(quat);
  }
  writer.resolve('framesOffset', writer.position - ANM.OFFSET_BASE);

  for (const row of cells) {
    row.forEach((cell, t) => {
      writer.writeU32(tracks[t].jointHash);
      writer.writeU16(cell.translation);
      writer.writeU16(cell.scale);
      writer.writeU16(cell.rotation);
      writer.writeU16(0);
    });
  }

  writer.resolve('resourceSize', writer.length);
  log.debug('Wrote ANM', {
    format: 'v4',
    tracks: tracks.length,
    frameCount,
    vectors: vectors.size,
    quats: quats.size,
    byteLength: writer.length,
  });
  return writer.toUint8Array();
}
