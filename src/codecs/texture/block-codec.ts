/**
 * Block Codec
 *
 * Software DXT1 / DXT5 decoder and encoder plus the raw BGRA8 path.
 * Blocks cover 4x4 texels and decode to 16 RGBA8 texels in row-major order.
 *
 * The encoder is single pass: alpha endpoints are the block min and max,
 * color endpoints are the darkest and brightest texels by 2R+4G+B, and every
 * texel takes the nearest palette entry (first entry wins on ties).
 */

import { BLOCK_BYTES, BLOCK_DIMENSION } from '../../constants/formats';
import { DEFAULT_CONFIG } from '../../constants/config';
import { CodecErrorFactory } from '../../errors';
import type { RowOrder, TextureFormat } from '../../types';

export const TEXELS_PER_BLOCK = BLOCK_DIMENSION * BLOCK_DIMENSION;

/**
 * Pixel input accepted by the encoder: RGBA8 bytes or RGBA floats in [0, 1]
 */
export type PixelSource = Uint8Array | Uint8ClampedArray | Float32Array;

export interface DecodeImageOptions {
  rowOrder?: RowOrder;
  output?: 'rgba8' | 'float';
  maxPixelCount?: number;
}

export interface EncodeImageOptions {
  /**
   * Row order of the input pixels; output blocks are always top-down
   */
  rowOrder?: RowOrder;
}

/**
 * Expands a 565 color to 888 by replicating the high bits into the low bits.
 */
export function expand565(color: number): [number, number, number] {
  const r = (color >> 11) & 0x1f;
  const g = (color >> 5) & 0x3f;
  const b = color & 0x1f;
  return [(r << 3) | (r >> 2), (g << 2) | (g >> 4), (b << 3) | (b >> 2)];
}

export function pack565(r: number, g: number, b: number): number {
  return ((r >> 3) << 11) | ((g >> 2) << 5) | (b >> 3);
}

/**
 * Four RGBA entries. With `punchThrough` and c0 <= c1 the palette is
 * [c0, c1, average, transparent black].
 */
function buildColorPalette(c0: number, c1: number, punchThrough: boolean): Uint8Array {
  const [r0, g0, b0] = expand565(c0);
  const [r1, g1, b1] = expand565(c1);
  const palette = new Uint8Array(16);
  palette.set([r0, g0, b0, 255, r1, g1, b1, 255]);

  if (!punchThrough || c0 > c1) {
    palette.set([
      Math.floor((2 * r0 + r1) / 3), Math.floor((2 * g0 + g1) / 3), Math.floor((2 * b0 + b1) / 3), 255,
      Math.floor((r0 + 2 * r1) / 3), Math.floor((g0 + 2 * g1) / 3), Math.floor((b0 + 2 * b1) / 3), 255,
    ], 8);
  } else {
    palette.set([
      Math.floor((r0 + r1) / 2), Math.floor((g0 + g1) / 2), Math.floor((b0 + b1) / 2), 255,
      0, 0, 0, 0,
    ], 8);
  }
  return palette;
}

/**
 * Eight-entry alpha ramp. a0 > a1 gives six interpolated steps at k/7;
 * otherwise four at k/5 followed by 0 and 255.
 */
export function buildAlphaRamp(a0: number, a1: number): number[] {
  const ramp = [a0, a1];
  if (a0 > a1) {
    for (let i = 1; i < 7; i++) ramp.push(Math.floor(((7 - i) * a0 + i * a1) / 7));
  } else {
    for (let i = 1; i < 5; i++) ramp.push(Math.floor(((5 - i) * a0 + i * a1) / 5));
    ramp.push(0, 255);
  }
  return ramp;
}

function readU16(bytes: Uint8Array, offset: number): number {
  return bytes[offset] | (bytes[offset + 1] << 8);
}

function readU32(bytes: Uint8Array, offset: number): number {
  return (bytes[offset] | (bytes[offset + 1] << 8) | (bytes[offset + 2] << 16) | (bytes[offset + 3] << 24)) >>> 0;
}

function requireBlock(block: Uint8Array, offset: number, size: number, kind: string): void {
  if (offset < 0 || offset + size > block.length) {
    throw CodecErrorFactory.unexpectedEof(`${kind} block`, offset, size, Math.max(0, block.length - offset));
  }
}

function decodeColorHalf(block: Uint8Array, offset: number, punchThrough: boolean, out: Uint8Array): void {
  const palette = buildColorPalette(readU16(block, offset), readU16(block, offset + 2), punchThrough);
  const indices = readU32(block, offset + 4);
  for (let i = 0; i < TEXELS_PER_BLOCK; i++) {
    const entry = ((indices >>> (2 * i)) & 3) * 4;
    out[i * 4] = palette[entry];
    out[i * 4 + 1] = palette[entry + 1];
    out[i * 4 + 2] = palette[entry + 2];
    out[i * 4 + 3] = palette[entry + 3];
  }
}

/**
 * Decodes 8 bytes into 16 RGBA8 texels.
 */
export function decodeDxt1Block(block: Uint8Array, offset = 0): Uint8Array {
  requireBlock(block, offset, BLOCK_BYTES.dxt1, 'DXT1');
  const out = new Uint8Array(TEXELS_PER_BLOCK * 4);
  decodeColorHalf(block, offset, true, out);
  return out;
}

/**
 * Decodes 16 bytes into 16 RGBA8 texels. The color half is always four-color.
 */
export function decodeDxt5Block(block: Uint8Array, offset = 0): Uint8Array {
  requireBlock(block, offset, BLOCK_BYTES.dxt5, 'DXT5');
  const out = new Uint8Array(TEXELS_PER_BLOCK * 4);
  decodeColorHalf(block, offset + 8, false, out);

  const ramp = buildAlphaRamp(block[offset], block[offset + 1]);
  // 48 index bits split into two 24-bit halves of eight indices each
  const low = block[offset + 2] | (block[offset + 3] << 8) | (block[offset + 4] << 16);
  const high = block[offset + 5] | (block[offset + 6] << 8) | (block[offset + 7] << 16);
  for (let i = 0; i < TEXELS_PER_BLOCK; i++) {
    const bits = i < 8 ? low >> (3 * i) : high >> (3 * (i - 8));
    out[i * 4 + 3] = ramp[bits & 7];
  }
  return out;
}

function requireTexels(texels: Uint8Array): void {
  if (texels.length < TEXELS_PER_BLOCK * 4) {
    throw CodecErrorFactory.invalidField('block texels', TEXELS_PER_BLOCK * 4, texels.length);
  }
}

function encodeColorHalf(texels: Uint8Array, out: Uint8Array, offset: number): void {
  let minLum = Infinity;
  let maxLum = -Infinity;
  let darkest = 0;
  let brightest = 0;
  for (let i = 0; i < TEXELS_PER_BLOCK; i++) {
    const lum = texels[i * 4] * 2 + texels[i * 4 + 1] * 4 + texels[i * 4 + 2];
    if (lum < minLum) {
      minLum = lum;
      darkest = i;
    }
    if (lum > maxLum) {
      maxLum = lum;
      brightest = i;
    }
  }

  let c0 = pack565(texels[darkest * 4], texels[darkest * 4 + 1], texels[darkest * 4 + 2]);
  let c1 = pack565(texels[brightest * 4], texels[brightest * 4 + 1], texels[brightest * 4 + 2]);
  // c0 >= c1 keeps the block in four-color mode
  if (c0 < c1) {
    [c0, c1] = [c1, c0];
  }

  const palette = buildColorPalette(c0, c1, false);
  let indices = 0;
  for (let i = 0; i < TEXELS_PER_BLOCK; i++) {
    let best = 0;
    let bestDistance = Infinity;
    for (let entry = 0; entry < 4; entry++) {
      const dr = texels[i * 4] - palette[entry * 4];
      const dg = texels[i * 4 + 1] - palette[entry * 4 + 1];
      const db = texels[i * 4 + 2] - palette[entry * 4 + 2];
      const distance = dr * dr + dg * dg + db * db;
      if (distance < bestDistance) {
        bestDistance = distance;
        best = entry;
      }
    }
    indices |= best << (2 * i);
  }

  out[offset] = c0 & 0xff;
  out[offset + 1] = c0 >> 8;
  out[offset + 2] = c1 & 0xff;
  out[offset + 3] = c1 >> 8;
  const unsigned = indices >>> 0;
  out[offset + 4] = unsigned & 0xff;
  out[offset + 5] = (unsigned >>> 8) & 0xff;
  out[offset + 6] = (unsigned >>> 16) & 0xff;
  out[offset + 7] = (unsigned >>> 24) & 0xff;
}

/**
 * Encodes 16 RGBA8 texels into a DXT1 block. Alpha is ignored.
 */
export function encodeDxt1Block(texels: Uint8Array): Uint8Array {
  requireTexels(texels);
  const out = new Uint8Array(BLOCK_BYTES.dxt1);
  encodeColorHalf(texels, out, 0);
  return out;
}

/**
 * Encodes 16 RGBA8 texels into a DXT5 block.
 */
export function encodeDxt5Block(texels: Uint8Array): Uint8Array {
  requireTexels(texels);
  const out = new Uint8Array(BLOCK_BYTES.dxt5);

  let minAlpha = 255;
  let maxAlpha = 0;
  for (let i = 0; i < TEXELS_PER_BLOCK; i++) {
    const alpha = texels[i * 4 + 3];
    if (alpha < minAlpha) minAlpha = alpha;
    if (alpha > maxAlpha) maxAlpha = alpha;
  }

  const ramp = buildAlphaRamp(maxAlpha, minAlpha);
  let low = 0;
  let high = 0;
  for (let i = 0; i < TEXELS_PER_BLOCK; i++) {
    const alpha = texels[i * 4 + 3];
    let best = 0;
    let bestDiff = Infinity;
    for (let entry = 0; entry < ramp.length; entry++) {
      const diff = Math.abs(alpha - ramp[entry]);
      if (diff < bestDiff) {
        bestDiff = diff;
        best = entry;
      }
    }
    if (i < 8) {
      low |= best << (3 * i);
    } else {
      high |= best << (3 * (i - 8));
    }
  }

  out[0] = maxAlpha;
  out[1] = minAlpha;
  out[2] = low & 0xff;
  out[3] = (low >> 8) & 0xff;
  out[4] = (low >> 16) & 0xff;
  out[5] = high & 0xff;
  out[6] = (high >> 8) & 0xff;
  out[7] = (high >> 16) & 0xff;

  encodeColorHalf(texels, out, 8);
  return out;
}

/**
 * Byte size of one mip level.
 */
export function imageDataSize(width: number, height: number, format: TextureFormat): number {
  if (format === 'bgra8') {
    return width * height * BLOCK_BYTES.bgra8;
  }
  const blocksX = Math.ceil(width / BLOCK_DIMENSION);
  const blocksY = Math.ceil(height / BLOCK_DIMENSION);
  return blocksX * blocksY * BLOCK_BYTES[format];
}

function validateDimensions(width: number, height: number, maxPixelCount: number): void {
  if (!Number.isInteger(width) || width <= 0) {
    throw CodecErrorFactory.invalidField('width', 'a positive integer', width);
  }
  if (!Number.isInteger(height) || height <= 0) {
    throw CodecErrorFactory.invalidField('height', 'a positive integer', height);
  }
  if (width * height > maxPixelCount) {
    throw CodecErrorFactory.invalidField(
      'pixel count',
      `at most ${maxPixelCount}`,
      width * height,
      `Texture of ${width}x${height} exceeds the limit of ${maxPixelCount} pixels`
    );
  }
}

/**
 * Decodes one mip level to RGBA. Source rows are top-down; `rowOrder`
 * selects the row order of the returned buffer. Texels of overhanging
 * blocks that fall outside the image are dropped.
 */
export function decodeImage(
  data: Uint8Array,
  width: number,
  height: number,
  format: TextureFormat,
  options: DecodeImageOptions = {}
): Uint8Array | Float32Array {
  const rowOrder = options.rowOrder ?? 'top-down';
  validateDimensions(width, height, options.maxPixelCount ?? DEFAULT_CONFIG.MAX_PIXEL_COUNT);

  const needed = imageDataSize(width, height, format);
  if (data.length < needed) {
    throw CodecErrorFactory.unexpectedEof(`${format} image data`, 0, needed, data.length);
  }

  const rgba = new Uint8Array(width * height * 4);
  const destRow = (y: number) => (rowOrder === 'top-down' ? y : height - 1 - y);

  if (format === 'bgra8') {
    for (let y = 0; y < height; y++) {
      const src = y * width * 4;
      const dst = destRow(y) * width * 4;
      for (let x = 0; x < width; x++) {
        const s = src + x * 4;
        const d = dst + x * 4;
        rgba[d] = data[s + 2];
        rgba[d + 1] = data[s + 1];
        rgba[d + 2] = data[s];
        rgba[d + 3] = data[s + 3];
      }
    }
  } else {
    const blockSize = BLOCK_BYTES[format];
    const blocksX = Math.ceil(width / BLOCK_DIMENSION);
    const blocksY = Math.ceil(height / BLOCK_DIMENSION);
    let offset = 0;
    for (let by = 0; by < blocksY; by++) {
      for (let bx = 0; bx < blocksX; bx++) {
        const texels = format === 'dxt1' ? decodeDxt1Block(data, offset) : decodeDxt5Block(data, offset);
        offset += blockSize;
        for (let py = 0; py < BLOCK_DIMENSION; py++) {
          const y = by * BLOCK_DIMENSION + py;
          if (y >= height) continue;
          const rowStart = destRow(y) * width;
          for (let px = 0; px < BLOCK_DIMENSION; px++) {
            const x = bx * BLOCK_DIMENSION + px;
            if (x >= width) continue;
            const s = (py * BLOCK_DIMENSION + px) * 4;
            rgba.set(texels.subarray(s, s + 4), (rowStart + x) * 4);
          }
        }
      }
    }
  }

  if (options.output === 'float') {
    const floats = new Float32Array(rgba.length);
    for (let i = 0; i < rgba.length; i++) floats[i] = rgba[i] / 255;
    return floats;
  }
  return rgba;
}

/**
 * Reads one RGBA texel from the source as bytes; texels outside the image read as zero.
 */
function readTexel(pixels: PixelSource, index: number): [number, number, number, number] {
  if (pixels instanceof Float32Array) {
    const toByte = (value: number) => Math.round(Math.min(1, Math.max(0, value)) * 255);
    return [toByte(pixels[index]), toByte(pixels[index + 1]), toByte(pixels[index + 2]), toByte(pixels[index + 3])];
  }
  return [pixels[index], pixels[index + 1], pixels[index + 2], pixels[index + 3]];
}

/**
 * Encodes RGBA pixels into one mip level of `format`. Output rows are top-down.
 */
export function encodeImage(
  pixels: PixelSource,
  width: number,
  height: number,
  format: TextureFormat,
  options: EncodeImageOptions = {}
): Uint8Array {
  const rowOrder = options.rowOrder ?? 'top-down';
  validateDimensions(width, height, Number.MAX_SAFE_INTEGER);
  if (pixels.length < width * height * 4) {
    throw CodecErrorFactory.invalidField('pixels', width * height * 4, pixels.length, `Expected ${width * height * 4} pixel values for ${width}x${height}, got ${pixels.length}`);
  }

  const sourceRow = (y: number) => (rowOrder === 'top-down' ? y : height - 1 - y);
  const out = new Uint8Array(imageDataSize(width, height, format));

  if (format === 'bgra8') {
    for (let y = 0; y < height; y++) {
      const src = sourceRow(y) * width * 4;
      for (let x = 0; x < width; x++) {
        const [r, g, b, a] = readTexel(pixels, src + x * 4);
        out.set([b, g, r, a], (y * width + x) * 4);
      }
    }
    return out;
  }

  const blockSize = BLOCK_BYTES[format];
  const blocksX = Math.ceil(width / BLOCK_DIMENSION);
  const blocksY = Math.ceil(height / BLOCK_DIMENSION);
  const texels = new Uint8Array(TEXELS_PER_BLOCK * 4);
  let offset = 0;
  for (let by = 0; by < blocksY; by++) {
    for (let bx = 0; bx < blocksX; bx++) {
      texels.fill(0);
      for (let py = 0; py < BLOCK_DIMENSION; py++) {
        const y = by * BLOCK_DIMENSION + py;
        if (y >= height) continue;
        const rowStart = sourceRow(y) * width;
        for (let px = 0; px < BLOCK_DIMENSION; px++) {
          const x = bx * BLOCK_DIMENSION + px;
          if (x >= width) continue;
          texels.set(readTexel(pixels, (rowStart + x) * 4), (py * BLOCK_DIMENSION + px) * 4);
        }
      }
      out.set(format === 'dxt1' ? encodeDxt1Block(texels) : encodeDxt5Block(texels), offset);
      offset += blockSize;
    }
  }
  return out;
}
