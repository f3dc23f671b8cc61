/**
 * Mip Chain Helpers
 *
 * Level sizes shared by the TEX and DDS containers. Levels halve each axis
 * down to 1x1; block formats round every level up to whole 4x4 blocks.
 */

import { CodecErrorFactory } from '../../errors';
import type { TextureFormat } from '../../types';
import { imageDataSize } from './block-codec';

/**
 * floor(log2(max(width, height))) + 1
 */
export function expectedMipCount(width: number, height: number): number {
  return Math.floor(Math.log2(Math.max(width, height, 1))) + 1;
}

export function mipDimensions(width: number, height: number, level: number): [number, number] {
  return [Math.max(1, width >> level), Math.max(1, height >> level)];
}

export function mipLevelSizes(width: number, height: number, format: TextureFormat, count: number): number[] {
  const sizes: number[] = [];
  for (let level = 0; level < count; level++) {
    const [w, h] = mipDimensions(width, height, level);
    sizes.push(imageDataSize(w, h, format));
  }
  return sizes;
}

/**
 * Slices `data` into levels laid out in `storage` order and returns them
 * largest first.
 */
export function splitMipChain(
  data: Uint8Array,
  sizes: number[],
  storage: 'largest-first' | 'smallest-first'
): Uint8Array[] {
  const total = sizes.reduce((sum, size) => sum + size, 0);
  if (data.length < total) {
    throw CodecErrorFactory.unexpectedEof('mip chain', 0, total, data.length);
  }

  const order = storage === 'largest-first' ? sizes.map((_, level) => level) : sizes.map((_, level) => sizes.length - 1 - level);
  const mips: Uint8Array[] = new Array<Uint8Array>(sizes.length);
  let offset = 0;
  for (const level of order) {
    mips[level] = data.slice(offset, offset + sizes[level]);
    offset += sizes[level];
  }
  return mips;
}

/**
 * Checks that `mips` is a single level or a complete chain of the right sizes.
 */
export function validateMipChain(width: number, height: number, format: TextureFormat, mips: Uint8Array[]): void {
  if (mips.length === 0) {
    throw CodecErrorFactory.invalidField('mips', 'at least one level', 0);
  }
  const expected = expectedMipCount(width, height);
  if (mips.length > 1 && mips.length !== expected) {
    throw CodecErrorFactory.invalidField('mip count', expected, mips.length);
  }
  const sizes = mipLevelSizes(width, height, format, mips.length);
  mips.forEach((mip, level) => {
    if (mip.length !== sizes[level]) {
      throw CodecErrorFactory.invalidField(`mips[${level}] size`, sizes[level], mip.length);
    }
  });
}
