import { describe, expect, it } from 'vitest';
import { findTrack, readAnimation, RoundedPalette, writeAnimation } from '../src/codecs/anm';
import { packQuat } from '../src/codecs/quat/quantized-quat';
import { InvalidFieldValueError, UnexpectedEofError, UnsupportedVersionError } from '../src/errors';
import type { AnimationInput, Pose } from '../src/types';
import { BinaryWriter } from '../src/utils/binary-cursor';
import { elfHash } from '../src/utils/elf-hash';

function u16Triplet(writer: BinaryWriter, values: [number, number, number]): void {
  for (const value of values) writer.writeU16(value);
}

/**
 * v5 file: one 'root' track, two frames, two vectors, two packed rotations
 */
function buildV5(): Uint8Array {
  const writer = new BinaryWriter();
  writer.writeAscii('r3d2anmd');
  writer.writeU32(5);
  writer.writeZeros(16);
  writer.writeU32(1);
  writer.writeU32(2);
  writer.writeF32(0.25);
  writer.writeI32(100 - 12);
  writer.writeZeros(8);
  writer.writeI32(64 - 12);
  writer.writeI32(88 - 12);
  writer.writeI32(104 - 12);

  writer.writeVec3([0, 0, 0]);
  writer.writeVec3([1, 1, 1]);
  writer.writeBytes(packQuat([0, 0, 0, 1]));
  writer.writeBytes(packQuat([0, 0, Math.SQRT1_2, Math.SQRT1_2]));
  writer.writeU32(elfHash('root'));
  // translation, scale, rotation per frame
  u16Triplet(writer, [0, 1, 0]);
  u16Triplet(writer, [1, 1, 1]);
  return writer.toUint8Array();
}

interface CompressedEntry {
  time: number;
  jointIndex: number;
  type: number;
  payload: Uint8Array;
}

function quantizedVector(values: [number, number, number]): Uint8Array {
  return new Uint8Array([values[0] & 0xff, values[0] >> 8, values[1] & 0xff, values[1] >> 8, values[2] & 0xff, values[2] >> 8]);
}

/**
 * Compressed file with one joint at 10 fps
 */
function buildCompressed(entries: CompressedEntry[], maxTime = 1): Uint8Array {
  const writer = new BinaryWriter();
  writer.writeAscii('r3d2canm');
  writer.writeU32(1);
  writer.writeU32(0);
  writer.writeU32(0);
  writer.writeU32(0);
  writer.writeU32(1);
  writer.writeU32(entries.length);
  writer.writeU32(0);
  writer.writeF32(maxTime);
  writer.writeF32(10);
  writer.writeZeros(24);
  writer.writeVec3([0, 0, 0]);
  writer.writeVec3([2, 4, 6]);
  writer.writeVec3([0, 0, 0]);
  writer.writeVec3([2, 2, 2]);
  writer.writeI32(132 - 12);
  writer.writeI32(0);
  writer.writeI32(128 - 12);

  writer.writeU32(elfHash('root'));
  for (const entry of entries) {
    writer.writeU16(entry.time);
    writer.writeU16((entry.type << 14) | entry.jointIndex);
    writer.writeBytes(entry.payload);
  }
  return writer.toUint8Array();
}

/**
 * Legacy file with one 'Pelvis' track of two frames, stored fps 0
 */
function buildLegacy(): Uint8Array {
  const writer = new BinaryWriter();
  writer.writeAscii('r3d2anim');
  writer.writeU32(3);
  writer.writeU32(0);
  writer.writeU32(1);
  writer.writeU32(2);
  writer.writeU32(0);
  writer.writeFixedString('Pelvis', 32);
  writer.writeU32(0);
  writer.writeQuat([0, 0, 0, 1]);
  writer.writeVec3([1, 2, 3]);
  writer.writeQuat([0, 1, 0, 0]);
  writer.writeVec3([4, 5, 6]);
  return writer.toUint8Array();
}

function pose(translation: [number, number, number]): Pose {
  return { translation };
}

const walk: AnimationInput = {
  fps: 4,
  frameCount: 3,
  tracks: [
    { name: 'root', poses: new Map([[0, pose([0, 0, 0])], [1, pose([1, 0, 0])], [2, pose([2, 0, 0])]]) },
    { name: 'spine', poses: new Map() },
  ],
};

describe('RoundedPalette', () => {
  it('merges values that round to the same key', () => {
    const palette = new RoundedPalette<[number, number, number]>();
    expect(palette.add([0.1234564, 0, 0])).toBe(0);
    expect(palette.add([0.1234561, 0, 0])).toBe(0);
    expect(palette.add([1, 0, 0])).toBe(1);
    expect(palette.add([-0, 0, 0])).toBe(2);
    expect(palette.add([0, 0, 0])).toBe(2);
    expect(palette.size).toBe(3);
    expect(palette.values[0]).toEqual([0.1234564, 0, 0]);
  });

  it('builds keys from rounded values', () => {
    expect(RoundedPalette.keyOf([0.5, -0, 1e-7])).toBe('0.5,0,0');
  });

  it('rounds exact halves of the last digit to even', () => {
    expect(RoundedPalette.keyOf([5e-7, 1.5e-6, 2.5e-6])).toBe('0,0.000002,0.000002');
  });
});

describe('ANM v4 writer', () => {
  it('sizes the file from the palettes', () => {
    const bytes = writeAnimation(walk);
    // 76 header + 4 vectors + 1 rotation + 3 frames x 2 tracks
    expect(bytes.length).toBe(76 + 4 * 12 + 16 + 3 * 2 * 16);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    expect(view.getUint32(12, true)).toBe(bytes.length);
    expect(view.getUint32(16, true)).toBe(0xbe0794d3);
    expect(view.getInt32(52, true)).toBe(64);
    expect(view.getInt32(56, true)).toBe(76 + 48 - 12);
    expect(view.getInt32(60, true)).toBe(76 + 48 + 16 - 12);
  });

  it('round-trips sampled translations', () => {
    const animation = readAnimation(writeAnimation(walk));
    expect(animation.format).toBe('v4');
    expect(animation.fps).toBe(4);
    expect(animation.frameCount).toBe(3);
    expect(animation.duration).toBe(0.75);
    expect(findTrack(animation, 'root')?.poses.get(1)?.translation?.[0]).toBe(1);
    expect(findTrack(animation, 'ROOT')?.poses.get(2)?.translation).toEqual([2, 0, 0]);
  });

  it('fills untouched tracks with identity', () => {
    const animation = readAnimation(writeAnimation(walk));
    const spine = findTrack(animation, elfHash('spine'));
    expect(spine?.poses.get(2)).toEqual({ translation: [0, 0, 0], rotation: [0, 0, 0, 1], scale: [1, 1, 1] });
  });

  it('orders tracks by joint hash', () => {
    const animation = readAnimation(writeAnimation(walk));
    const hashes = animation.tracks.map(track => track.jointHash);
    expect(hashes).toEqual([...hashes].sort((a, b) => a - b));
  });

  it('carries the last sample forward and normalizes rotations', () => {
    const animation = readAnimation(writeAnimation({
      fps: 30,
      frameCount: 3,
      tracks: [{ jointHash: 42, poses: new Map<number, Pose>([[0, { translation: [5, 0, 0], rotation: [0, 0, 0, 2] }]]) }],
    }));
    const track = findTrack(animation, 42);
    expect(track?.poses.get(2)?.translation).toEqual([5, 0, 0]);
    expect(track?.poses.get(2)?.rotation).toEqual([0, 0, 0, 1]);
    expect(animation.fps).toBeCloseTo(30, 4);
  });

  it('rejects samples past the last frame and duplicate joints', () => {
    expect(() => writeAnimation({ ...walk, frameCount: 2 })).toThrow(InvalidFieldValueError);
    expect(() => writeAnimation({
      fps: 30,
      frameCount: 1,
      tracks: [{ name: 'Root', poses: new Map() }, { name: 'root', poses: new Map() }],
    })).toThrow(InvalidFieldValueError);
    expect(() => writeAnimation({ fps: 30, frameCount: 1, tracks: [{ poses: new Map() }] })).toThrow(InvalidFieldValueError);
    expect(() => writeAnimation({ fps: 30, frameCount: 1, tracks: [{ name: 'h\u00fcfte', poses: new Map() }] }))
      .toThrow('Invalid animation.tracks.0.name: Name must be printable ASCII');
  });
});

describe('ANM reader', () => {
  it('reads v5 frames through both palettes', () => {
    const animation = readAnimation(buildV5());
    expect(animation.format).toBe('v5');
    expect(animation.fps).toBe(4);
    expect(animation.duration).toBe(0.5);

    const root = findTrack(animation, 'root');
    expect(root?.poses.get(0)?.translation).toEqual([0, 0, 0]);
    expect(root?.poses.get(1)?.translation).toEqual([1, 1, 1]);
    const rotation = root?.poses.get(1)?.rotation ?? [0, 0, 0, 0];
    expect(rotation[2]).toBeCloseTo(Math.SQRT1_2, 4);
    expect(rotation[3]).toBeCloseTo(Math.SQRT1_2, 4);
  });

  it('merges compressed entries into per-frame poses', () => {
    const animation = readAnimation(buildCompressed([
      { time: 0, jointIndex: 0, type: 1, payload: quantizedVector([65535, 0, 32768]) },
      { time: 65535, jointIndex: 0, type: 0, payload: packQuat([0, 0, 0, 1]) },
      { time: 32768, jointIndex: 0, type: 2, payload: quantizedVector([65535, 65535, 65535]) },
      { time: 0, jointIndex: 3, type: 1, payload: quantizedVector([1, 1, 1]) },
    ]));
    expect(animation.format).toBe('compressed');
    expect(animation.fps).toBe(10);
    expect(animation.duration).toBeCloseTo(1.1, 6);
    expect(animation.frameCount).toBe(11);

    const root = findTrack(animation, 'root');
    expect([...(root?.poses.keys() ?? [])].sort((a, b) => a - b)).toEqual([0, 5, 10]);
    const translation = root?.poses.get(0)?.translation ?? [0, 0, 0];
    expect(translation[0]).toBeCloseTo(2, 6);
    expect(translation[1]).toBe(0);
    expect(translation[2]).toBeCloseTo(3.0000458, 6);
    expect(root?.poses.get(5)?.scale?.[1]).toBeCloseTo(2, 6);
    expect(root?.poses.get(10)?.rotation?.[3]).toBeCloseTo(1, 4);
    expect(root?.poses.get(10)?.translation).toBeUndefined();
  });

  it('rounds frame times that fall on a half frame to the even frame', () => {
    // time 0.25 s at 10 fps is frame 2.5
    const animation = readAnimation(buildCompressed([
      { time: 65535, jointIndex: 0, type: 2, payload: quantizedVector([0, 0, 0]) },
    ], 0.25));
    expect([...(findTrack(animation, 'root')?.poses.keys() ?? [])]).toEqual([2]);
    expect(animation.frameCount).toBe(4);
  });

  it('reads legacy tracks by name with the fallback frame rate', () => {
    const animation = readAnimation(buildLegacy());
    expect(animation.format).toBe('legacy');
    expect(animation.fps).toBe(30);
    expect(animation.frameCount).toBe(2);
    expect(animation.tracks[0].name).toBe('Pelvis');
    expect(animation.tracks[0].jointHash).toBe(elfHash('pelvis'));
    expect(animation.tracks[0].poses.get(1)).toEqual({ translation: [4, 5, 6], rotation: [0, 1, 0, 0], scale: [1, 1, 1] });
  });

  it('rejects palette indices past the palette', () => {
    const bytes = writeAnimation(walk);
    // first frame cell starts after the header, 4 vectors and 1 rotation
    bytes[76 + 48 + 16 + 4] = 99;
    expect(() => readAnimation(bytes)).toThrow(InvalidFieldValueError);
  });

  it('rejects newer uncompressed versions', () => {
    const bytes = writeAnimation(walk);
    bytes[8] = 6;
    expect(() => readAnimation(bytes)).toThrow(UnsupportedVersionError);
  });

  it('fails on a truncated frame section', () => {
    const bytes = writeAnimation(walk);
    expect(() => readAnimation(bytes.subarray(0, bytes.length - 1))).toThrow(UnexpectedEofError);
  });
});
