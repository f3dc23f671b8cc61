import { describe, expect, it } from 'vitest';
import { packQuat, unpackQuat } from '../src/codecs/quat/quantized-quat';
import { UnexpectedEofError } from '../src/errors';
import type { Quat } from '../src/types';

/**
 * Deterministic generator so failures reproduce
 */
function lcg(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

function randomRotation(next: () => number): Quat {
  // Uniform over the 3-sphere
  const u1 = next();
  const u2 = next() * 2 * Math.PI;
  const u3 = next() * 2 * Math.PI;
  const a = Math.sqrt(1 - u1);
  const b = Math.sqrt(u1);
  return [a * Math.sin(u2), a * Math.cos(u2), b * Math.sin(u3), b * Math.cos(u3)];
}

function angleBetween(p: Quat, q: Quat): number {
  const dot = Math.abs(p[0] * q[0] + p[1] * q[1] + p[2] * q[2] + p[3] * q[3]);
  return 2 * Math.acos(Math.min(1, dot));
}

describe('quantized quaternion', () => {
  it('keeps random rotations within 0.01 rad', () => {
    const next = lcg(1234);
    let worst = 0;
    for (let i = 0; i < 10000; i++) {
      const q = randomRotation(next);
      worst = Math.max(worst, angleBetween(q, unpackQuat(packQuat(q))));
    }
    expect(worst).toBeLessThan(0.01);
  });

  it('treats q and -q as the same rotation', () => {
    const q: Quat = [0.1, -0.7, 0.3, -0.6];
    const negated: Quat = [-0.1, 0.7, -0.3, 0.6];
    expect(Array.from(packQuat(q))).toEqual(Array.from(packQuat(negated)));
  });

  it('rebuilds the dropped component in its own slot', () => {
    const axes: Quat[] = [[1, 0, 0, 0], [0, 1, 0, 0], [0, 0, 1, 0], [0, 0, 0, 1]];
    axes.forEach((axis, slot) => {
      const decoded = unpackQuat(packQuat(axis));
      decoded.forEach((value, i) => {
        expect(value).toBeCloseTo(i === slot ? 1 : 0, 4);
      });
    });
  });

  it('decodes the stored fields around the dropped y component', () => {
    // dropped index 1, fields 32767 / 0 / 16384
    const decoded = unpackQuat(new Uint8Array([0, 64, 0, 192, 255, 63]));
    expect(decoded[0]).toBeCloseTo(Math.SQRT1_2, 6);
    expect(decoded[1]).toBeCloseTo(0, 6);
    expect(decoded[2]).toBeCloseTo(-Math.SQRT1_2, 6);
    expect(decoded[3]).toBeCloseTo(0, 4);
  });

  it('decodes at an offset and checks the buffer length', () => {
    const packed = packQuat([0, 0, 0, 1]);
    const padded = new Uint8Array(10);
    padded.set(packed, 4);
    expect(unpackQuat(padded, 4)[3]).toBeCloseTo(1, 6);
    expect(() => unpackQuat(padded, 5)).toThrow(UnexpectedEofError);
  });

  it('normalizes the input before packing', () => {
    const decoded = unpackQuat(packQuat([0, 0, 0, 5]));
    expect(decoded[3]).toBeCloseTo(1, 6);
  });
});
