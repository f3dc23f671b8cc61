/**
 * TEX Container
 *
 * Layout (little-endian):
 *   u32 magic 'TEX\0', u16 width, u16 height, u8 reserved (1),
 *   u8 format (10 DXT1, 12 DXT5, 20 BGRA8), u8 flags, u8 hasMips,
 *   then the mip chain stored smallest level first.
 */

import { TEX, TEX_FORMAT_CODES } from '../../constants/formats';
import { CodecErrorFactory } from '../../errors';
import type { CodecOptions, TextureFormat, TextureImage } from '../../types';
import { BinaryCursor, BinaryWriter } from '../../utils/binary-cursor';
import { logger as defaultLogger } from '../../utils/logger';
import { expectedMipCount, mipLevelSizes, splitMipChain, validateMipChain } from './mip-chain';

const FORMAT_BY_CODE: ReadonlyMap<number, TextureFormat> = new Map<number, TextureFormat>([
  [TEX_FORMAT_CODES.dxt1, 'dxt1'],
  [TEX_FORMAT_CODES.dxt5, 'dxt5'],
  [TEX_FORMAT_CODES.bgra8, 'bgra8'],
]);

function formatFromCode(code: number): TextureFormat {
  const format = FORMAT_BY_CODE.get(code);
  if (!format) {
    throw CodecErrorFactory.unsupportedPixelFormat(`TEX format code ${code}`, { code });
  }
  return format;
}

export function isTex(bytes: Uint8Array): boolean {
  return bytes.length >= 4
    && new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0, true) === TEX.MAGIC;
}

/**
 * Reads a TEX file; mips are returned largest first.
 */
export function readTex(bytes: Uint8Array, options: CodecOptions = {}): TextureImage {
  const log = options.logger ?? defaultLogger;
  const cursor = new BinaryCursor(bytes);

  const magic = cursor.readU32('TEX magic');
  if (magic !== TEX.MAGIC) {
    throw CodecErrorFactory.malformedHeader('TEX', `0x${TEX.MAGIC.toString(16)}`, `0x${magic.toString(16)}`);
  }
  const width = cursor.readU16('TEX width');
  const height = cursor.readU16('TEX height');
  cursor.readU8('TEX reserved');
  const format = formatFromCode(cursor.readU8('TEX format'));
  const flags = cursor.readU8('TEX flags');
  const hasMips = cursor.readU8('TEX hasMips') !== 0;

  if (width === 0 || height === 0) {
    throw CodecErrorFactory.invalidField('TEX dimensions', 'non-zero width and height', `${width}x${height}`);
  }

  const mipCount = hasMips ? expectedMipCount(width, height) : 1;
  const sizes = mipLevelSizes(width, height, format, mipCount);
  const mips = splitMipChain(cursor.readBytes(cursor.remaining, 'TEX data'), sizes, 'smallest-first');

  log.debug('Read TEX', { format, width, height, mipCount, flags });
  return { width, height, format, mips, flags };
}

/**
 * Writes a TEX file from mips given largest first.
 */
export function writeTex(image: TextureImage, options: CodecOptions = {}): Uint8Array {
  const log = options.logger ?? defaultLogger;
  const { width, height, format, mips } = image;

  if (!Number.isInteger(width) || width <= 0 || width > 0xffff) {
    throw CodecErrorFactory.invalidField('TEX width', '1..65535', width);
  }
  if (!Number.isInteger(height) || height <= 0 || height > 0xffff) {
    throw CodecErrorFactory.invalidField('TEX height', '1..65535', height);
  }
  validateMipChain(width, height, format, mips);

  const writer = new BinaryWriter(TEX.HEADER_SIZE + mips.reduce((sum, mip) => sum + mip.length, 0));
  writer.writeU32(TEX.MAGIC);
  writer.writeU16(width);
  writer.writeU16(height);
  writer.writeU8(TEX.RESERVED);
  writer.writeU8(TEX_FORMAT_CODES[format]);
  writer.writeU8(image.flags ?? 0);
  writer.writeU8(mips.length > 1 ? 1 : 0);

  for (let level = mips.length - 1; level >= 0; level--) {
    writer.writeBytes(mips[level]);
  }

  log.debug('Wrote TEX', { format, width, height, mipCount: mips.length });
  return writer.toUint8Array();
}
