/**
 * Texture API
 *
 * Container-agnostic decode to RGBA and encode from RGBA.
 */

import { CodecErrorFactory } from '../../errors';
import {
  TextureDecodeOptionsSchema,
  TextureEncodeOptionsSchema,
  TextureFormatSchema,
} from '../../schemas';
import type {
  CodecOptions,
  DecodedTexture,
  TextureDecodeOptions,
  TextureEncodeOptions,
  TextureFormat,
  TextureImage,
} from '../../types';
import { logger as defaultLogger } from '../../utils/logger';
import { decodeImage, encodeImage, type PixelSource } from './block-codec';
import { isDds, readDds, writeDds } from './dds';
import { mipDimensions } from './mip-chain';
import { isTex, readTex, writeTex } from './tex-container';

/**
 * Reads either container, detected by magic.
 */
export function readTextureContainer(bytes: Uint8Array, options: CodecOptions = {}): TextureImage {
  if (isDds(bytes)) return readDds(bytes, options);
  if (isTex(bytes)) return readTex(bytes, options);
  throw CodecErrorFactory.malformedHeader('texture', "'DDS ' or 'TEX\\0'", describeMagic(bytes));
}

function describeMagic(bytes: Uint8Array): string {
  return Array.from(bytes.subarray(0, 4), byte => byte.toString(16).padStart(2, '0')).join(' ') || 'empty buffer';
}

/**
 * Decodes one mip level (default 0) of a TEX or DDS file to RGBA.
 * Dimensions over `maxPixelCount` are rejected before any pixel buffer exists.
 */
export function decodeTexture(
  bytes: Uint8Array,
  options: TextureDecodeOptions & CodecOptions = {}
): DecodedTexture {
  const parsed = TextureDecodeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw CodecErrorFactory.schemaError('decodeTexture options', parsed.error);
  }
  const { rowOrder, output, mipLevel, maxPixelCount } = parsed.data;
  const log = options.logger ?? defaultLogger;

  const image = readTextureContainer(bytes, { logger: log });
  if (mipLevel >= image.mips.length) {
    throw CodecErrorFactory.invalidField('mipLevel', `< ${image.mips.length}`, mipLevel);
  }
  const [width, height] = mipDimensions(image.width, image.height, mipLevel);

  return log.withTimingSync('decodeTexture', () => ({
    width,
    height,
    format: image.format,
    rowOrder,
    mipCount: image.mips.length,
    pixels: decodeImage(image.mips[mipLevel], width, height, image.format, { rowOrder, output, maxPixelCount }),
  }), { format: image.format, width, height });
}

/**
 * Encodes RGBA pixels (bytes or [0, 1] floats) into a single-level TEX or DDS file.
 */
export function encodeTexture(
  pixels: PixelSource,
  width: number,
  height: number,
  targetFormat: TextureFormat,
  options: TextureEncodeOptions & CodecOptions = {}
): Uint8Array {
  const format = TextureFormatSchema.safeParse(targetFormat);
  if (!format.success) {
    throw CodecErrorFactory.unsupportedPixelFormat(String(targetFormat));
  }
  const parsed = TextureEncodeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw CodecErrorFactory.schemaError('encodeTexture options', parsed.error);
  }
  const { container, rowOrder } = parsed.data;
  const log = options.logger ?? defaultLogger;

  const data = log.withTimingSync(
    'encodeTexture',
    () => encodeImage(pixels, width, height, format.data, { rowOrder }),
    { format: format.data, width, height }
  );
  const image: TextureImage = { width, height, format: format.data, mips: [data] };
  return container === 'dds' ? writeDds(image, { logger: log }) : writeTex(image, { logger: log });
}

export {
  buildAlphaRamp,
  decodeDxt1Block,
  decodeDxt5Block,
  decodeImage,
  encodeDxt1Block,
  encodeDxt5Block,
  encodeImage,
  expand565,
  imageDataSize,
  pack565,
  type DecodeImageOptions,
  type EncodeImageOptions,
  type PixelSource,
} from './block-codec';
export { ddsToTex, isDds, readDds, texToDds, writeDds } from './dds';
export { expectedMipCount, mipDimensions } from './mip-chain';
export { isTex, readTex, writeTex } from './tex-container';
