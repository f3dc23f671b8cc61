/**
 * DDS Container
 *
 * The DirectDraw Surface subset that maps onto TEX: FourCC DXT1 / DXT5,
 * a DX10 extension header carrying BC1 or BC3, and 32-bit uncompressed
 * pixels with single-byte channel masks (normalized to BGRA8 on read).
 */

import {
  DDS,
  DDS_CAPS,
  DDS_FLAGS,
  DDS_MASK_TO_BYTE,
  DDS_PIXEL_FLAGS,
} from '../../constants/formats';
import { CodecErrorFactory } from '../../errors';
import type { CodecOptions, TextureFormat, TextureImage } from '../../types';
import { BinaryCursor, BinaryWriter } from '../../utils/binary-cursor';
import { logger as defaultLogger } from '../../utils/logger';
import { expectedMipCount, mipLevelSizes, splitMipChain, validateMipChain } from './mip-chain';
import { readTex, writeTex } from './tex-container';

/**
 * Pixel format block of the DDS header
 */
interface DdsPixelFormat {
  flags: number;
  fourCC: number;
  rgbBitCount: number;
  rMask: number;
  gMask: number;
  bMask: number;
  aMask: number;
}

function fourCCToString(fourCC: number): string {
  return String.fromCharCode(fourCC & 0xff, (fourCC >>> 8) & 0xff, (fourCC >>> 16) & 0xff, (fourCC >>> 24) & 0xff);
}

export function isDds(bytes: Uint8Array): boolean {
  return bytes.length >= 4
    && new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0, true) === DDS.MAGIC;
}

function maskIndex(mask: number, channel: string): number {
  const index = DDS_MASK_TO_BYTE.get(mask);
  if (index === undefined) {
    throw CodecErrorFactory.invalidField(
      `DDS ${channel} mask`,
      'one of 0xff, 0xff00, 0xff0000, 0xff000000',
      `0x${mask.toString(16)}`
    );
  }
  return index;
}

/**
 * Byte positions of B, G, R and A in each source pixel, or null when the
 * masks already describe BGRA8.
 */
function resolveChannelOrder(pf: DdsPixelFormat): [number, number, number, number] | null {
  const order: [number, number, number, number] = [
    maskIndex(pf.bMask, 'blue'),
    maskIndex(pf.gMask, 'green'),
    maskIndex(pf.rMask, 'red'),
    maskIndex(pf.aMask, 'alpha'),
  ];
  return order.every((byte, i) => byte === i) ? null : order;
}

function remapToBgra(data: Uint8Array, order: [number, number, number, number]): Uint8Array {
  const out = new Uint8Array(data.length - (data.length % 4));
  for (let i = 0; i < out.length; i += 4) {
    out[i] = data[i + order[0]];
    out[i + 1] = data[i + order[1]];
    out[i + 2] = data[i + order[2]];
    out[i + 3] = data[i + order[3]];
  }
  return out;
}

/**
 * Reads a DDS file; mips are returned largest first.
 */
export function readDds(bytes: Uint8Array, options: CodecOptions = {}): TextureImage {
  const log = options.logger ?? defaultLogger;
  const cursor = new BinaryCursor(bytes);

  const magic = cursor.readU32('DDS magic');
  if (magic !== DDS.MAGIC) {
    throw CodecErrorFactory.malformedHeader('DDS', `0x${DDS.MAGIC.toString(16)}`, `0x${magic.toString(16)}`);
  }

  cursor.seekAbsolute(12);
  const height = cursor.readU32('DDS height');
  const width = cursor.readU32('DDS width');
  cursor.seekAbsolute(28);
  const declaredMips = cursor.readU32('DDS mipMapCount');

  cursor.seekAbsolute(80);
  const pf: DdsPixelFormat = {
    flags: cursor.readU32('DDS pixel flags'),
    fourCC: cursor.readU32('DDS fourCC'),
    rgbBitCount: cursor.readU32('DDS rgbBitCount'),
    rMask: cursor.readU32('DDS red mask'),
    gMask: cursor.readU32('DDS green mask'),
    bMask: cursor.readU32('DDS blue mask'),
    aMask: cursor.readU32('DDS alpha mask'),
  };

  if (width === 0 || height === 0) {
    throw CodecErrorFactory.invalidField('DDS dimensions', 'non-zero width and height', `${width}x${height}`);
  }

  let dataOffset: number = DDS.DATA_OFFSET;
  let format: TextureFormat;
  let channelOrder: [number, number, number, number] | null = null;

  if (pf.fourCC === DDS.FOURCC_DXT1) {
    format = 'dxt1';
  } else if (pf.fourCC === DDS.FOURCC_DXT5) {
    format = 'dxt5';
  } else if (pf.fourCC === DDS.FOURCC_DX10) {
    cursor.seekAbsolute(DDS.DATA_OFFSET);
    const dxgiFormat = cursor.readU32('DX10 dxgiFormat');
    dataOffset += DDS.DX10_HEADER_SIZE;
    if (dxgiFormat === DDS.DXGI_BC1_UNORM) {
      format = 'dxt1';
    } else if (dxgiFormat === DDS.DXGI_BC3_UNORM) {
      format = 'dxt5';
    } else {
      throw CodecErrorFactory.unsupportedPixelFormat(`DXGI format ${dxgiFormat}`, { dxgiFormat });
    }
  } else if ((pf.flags & DDS_PIXEL_FLAGS.RGBA) === DDS_PIXEL_FLAGS.RGBA) {
    if (pf.rgbBitCount !== 32) {
      throw CodecErrorFactory.invalidField('DDS rgbBitCount', 32, pf.rgbBitCount);
    }
    format = 'bgra8';
    channelOrder = resolveChannelOrder(pf);
  } else {
    throw CodecErrorFactory.unsupportedPixelFormat(
      pf.fourCC !== 0 ? `FourCC '${fourCCToString(pf.fourCC)}'` : `pixel flags 0x${pf.flags.toString(16)}`,
      { fourCC: pf.fourCC, flags: pf.flags }
    );
  }

  let mipCount = 1;
  if (declaredMips > 1) {
    const expected = expectedMipCount(width, height);
    if (declaredMips !== expected) {
      throw CodecErrorFactory.invalidField('DDS mipMapCount', expected, declaredMips);
    }
    mipCount = declaredMips;
  }

  cursor.seekAbsolute(Math.min(dataOffset, bytes.length));
  let data = cursor.readBytes(cursor.remaining, 'DDS data');
  if (channelOrder) {
    log.debug('Remapping DDS channels to BGRA8', { order: channelOrder });
    data = remapToBgra(data, channelOrder);
  }

  const mips = splitMipChain(data, mipLevelSizes(width, height, format, mipCount), 'largest-first');
  log.debug('Read DDS', { format, width, height, mipCount });
  return { width, height, format, mips };
}

/**
 * Writes a DDS file with a legacy header; mips are given largest first.
 */
export function writeDds(image: TextureImage, options: CodecOptions = {}): Uint8Array {
  const log = options.logger ?? defaultLogger;
  const { width, height, format, mips } = image;
  validateMipChain(width, height, format, mips);
  const hasMips = mips.length > 1;

  const writer = new BinaryWriter(DDS.DATA_OFFSET + mips.reduce((sum, mip) => sum + mip.length, 0));
  writer.writeU32(DDS.MAGIC);
  writer.writeU32(DDS.HEADER_SIZE);
  writer.writeU32(DDS_FLAGS.REQUIRED | (hasMips ? DDS_FLAGS.MIPMAPCOUNT : 0));
  writer.writeU32(height);
  writer.writeU32(width);
  writer.writeU32(0); // pitch or linear size
  writer.writeU32(0); // depth
  writer.writeU32(hasMips ? mips.length : 0);
  writer.writeZeros(44);

  writer.writeU32(DDS.PIXEL_FORMAT_SIZE);
  if (format === 'bgra8') {
    writer.writeU32(DDS_PIXEL_FLAGS.RGBA);
    writer.writeU32(0);
    writer.writeU32(32);
    writer.writeU32(0x00ff0000);
    writer.writeU32(0x0000ff00);
    writer.writeU32(0x000000ff);
    writer.writeU32(0xff000000);
  } else {
    writer.writeU32(DDS_PIXEL_FLAGS.FOURCC);
    writer.writeU32(format === 'dxt1' ? DDS.FOURCC_DXT1 : DDS.FOURCC_DXT5);
    writer.writeZeros(20);
  }

  writer.writeU32(DDS_CAPS.TEXTURE | (hasMips ? DDS_CAPS.MIPMAP | DDS_CAPS.COMPLEX : 0));
  writer.writeZeros(16); // caps2..caps4, reserved2

  for (const mip of mips) {
    writer.writeBytes(mip);
  }

  log.debug('Wrote DDS', { format, width, height, mipCount: mips.length });
  return writer.toUint8Array();
}

/**
 * Converts DDS bytes into TEX bytes, keeping the mip chain.
 */
export function ddsToTex(bytes: Uint8Array, options: CodecOptions = {}): Uint8Array {
  return writeTex(readDds(bytes, options), options);
}

/**
 * Converts TEX bytes into DDS bytes, keeping the mip chain.
 */
export function texToDds(bytes: Uint8Array, options: CodecOptions = {}): Uint8Array {
  return writeDds(readTex(bytes, options), options);
}
