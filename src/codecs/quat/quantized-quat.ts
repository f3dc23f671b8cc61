/**
 * Quantized Quaternion
 *
 * 48-bit rotation encoding: the largest component is dropped and rebuilt
 * from the unit-length constraint, the other three are stored as 15-bit
 * fixed point over [-1/sqrt2, 1/sqrt2].
 *
 * Bit layout of the little-endian 48-bit value:
 *   45-46  index of the dropped component (0 = x .. 3 = w)
 *   30-44  first stored component
 *   15-29  second stored component
 *    0-14  third stored component
 * Stored components fill the remaining slots in x, y, z, w order.
 */

import { CodecErrorFactory } from '../../errors';
import type { Quat } from '../../types';
import { normalizeQuat } from '../../utils/matrix-utils';

export const PACKED_QUAT_SIZE = 6;

const FIELD_MASK = 0x7fff;
const STEP = Math.SQRT2 / 32767;
const INV_STEP = 32767 / Math.SQRT2;

function dequantize(value: number): number {
  return value * STEP - Math.SQRT1_2;
}

function quantize(value: number): number {
  return Math.min(FIELD_MASK, Math.max(0, Math.round((value + Math.SQRT1_2) * INV_STEP)));
}

/**
 * Decodes six bytes at `offset` into [x, y, z, w].
 */
export function unpackQuat(bytes: Uint8Array, offset = 0): Quat {
  if (offset < 0 || offset + PACKED_QUAT_SIZE > bytes.length) {
    throw CodecErrorFactory.unexpectedEof('packed quaternion', offset, PACKED_QUAT_SIZE, Math.max(0, bytes.length - offset));
  }

  const first = BigInt(bytes[offset] | (bytes[offset + 1] << 8));
  const second = BigInt(bytes[offset + 2] | (bytes[offset + 3] << 8));
  const third = BigInt(bytes[offset + 4] | (bytes[offset + 5] << 8));
  const bits = first | (second << 16n) | (third << 32n);

  const maxIndex = Number((bits >> 45n) & 3n);
  const a = dequantize(Number((bits >> 30n) & 0x7fffn));
  const b = dequantize(Number((bits >> 15n) & 0x7fffn));
  const c = dequantize(Number(bits & 0x7fffn));
  const d = Math.sqrt(Math.max(0, 1 - (a * a + b * b + c * c)));

  switch (maxIndex) {
    case 0:
      return [d, a, b, c];
    case 1:
      return [a, d, b, c];
    case 2:
      return [a, b, d, c];
    default:
      return [a, b, c, d];
  }
}

/**
 * Encodes a rotation into six bytes. The input is normalized first; the
 * sign is flipped when needed so the dropped component is non-negative.
 */
export function packQuat(rotation: Quat): Uint8Array {
  let q = normalizeQuat(rotation);

  let maxIndex = 0;
  for (let i = 1; i < 4; i++) {
    if (Math.abs(q[i]) > Math.abs(q[maxIndex])) maxIndex = i;
  }
  if (q[maxIndex] < 0) {
    q = [-q[0], -q[1], -q[2], -q[3]];
  }

  const stored = q.filter((_, index) => index !== maxIndex).map(quantize);
  const bits = (BigInt(maxIndex) << 45n)
    | (BigInt(stored[0]) << 30n)
    | (BigInt(stored[1]) << 15n)
    | BigInt(stored[2]);

  const out = new Uint8Array(PACKED_QUAT_SIZE);
  for (let i = 0; i < PACKED_QUAT_SIZE; i++) {
    out[i] = Number((bits >> BigInt(i * 8)) & 0xffn);
  }
  return out;
}
