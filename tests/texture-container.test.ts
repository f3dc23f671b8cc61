import { describe, expect, it } from 'vitest';
import {
  ddsToTex,
  decodeTexture,
  encodeTexture,
  readDds,
  readTex,
  readTextureContainer,
  texToDds,
  writeDds,
  writeTex,
} from '../src/codecs/texture';
import { DDS } from '../src/constants/formats';
import {
  InvalidFieldValueError,
  MalformedHeaderError,
  UnsupportedPixelFormatError,
} from '../src/errors';
import type { TextureImage } from '../src/types';
import { BinaryWriter } from '../src/utils/binary-cursor';

function filled(length: number, value: number): Uint8Array {
  return new Uint8Array(length).fill(value);
}

const redDxt1Block = [0x00, 0xf8, 0x00, 0xf8, 0, 0, 0, 0];

interface DdsHeaderFields {
  width: number;
  height: number;
  mipCount?: number;
  pixelFlags: number;
  fourCC?: number;
  masks?: [number, number, number, number];
}

/**
 * Legacy 128-byte DDS header followed by `payload`
 */
function buildDds(fields: DdsHeaderFields, payload: number[]): Uint8Array {
  const writer = new BinaryWriter();
  writer.writeU32(DDS.MAGIC);
  writer.writeU32(DDS.HEADER_SIZE);
  writer.writeU32(0x1007);
  writer.writeU32(fields.height);
  writer.writeU32(fields.width);
  writer.writeU32(0);
  writer.writeU32(0);
  writer.writeU32(fields.mipCount ?? 0);
  writer.writeZeros(44);
  writer.writeU32(DDS.PIXEL_FORMAT_SIZE);
  writer.writeU32(fields.pixelFlags);
  writer.writeU32(fields.fourCC ?? 0);
  if (fields.masks) {
    writer.writeU32(32);
    for (const mask of fields.masks) writer.writeU32(mask);
  } else {
    writer.writeZeros(20);
  }
  writer.writeU32(0x1000);
  writer.writeZeros(16);
  writer.writeBytes(new Uint8Array(payload));
  return writer.toUint8Array();
}

describe('TEX container', () => {
  const chain: TextureImage = {
    width: 4,
    height: 4,
    format: 'bgra8',
    mips: [filled(64, 1), filled(16, 2), filled(4, 3)],
  };

  it('stores the mip chain smallest first', () => {
    const bytes = writeTex(chain);
    expect(bytes.length).toBe(12 + 4 + 16 + 64);
    expect(Array.from(bytes.subarray(0, 12))).toEqual([0x54, 0x45, 0x58, 0x00, 4, 0, 4, 0, 1, 20, 0, 1]);
    expect(bytes[12]).toBe(3);
    expect(bytes[16]).toBe(2);
    expect(bytes[32]).toBe(1);
  });

  it('reads the chain back largest first', () => {
    const image = readTex(writeTex(chain));
    expect(image.format).toBe('bgra8');
    expect(image.mips.map(mip => mip.length)).toEqual([64, 16, 4]);
    expect(image.mips.map(mip => mip[0])).toEqual([1, 2, 3]);
    expect(image.flags).toBe(0);
  });

  it('rejects incomplete chains', () => {
    expect(() => writeTex({ ...chain, mips: [filled(64, 1), filled(16, 2)] })).toThrow(InvalidFieldValueError);
    expect(() => writeTex({ ...chain, mips: [filled(60, 1)] })).toThrow(InvalidFieldValueError);
  });

  it('rejects unknown format codes', () => {
    const bytes = writeTex({ width: 1, height: 1, format: 'bgra8', mips: [filled(4, 0)] });
    bytes[9] = 11;
    expect(() => readTex(bytes)).toThrow(UnsupportedPixelFormatError);
  });
});

describe('DDS container', () => {
  it('rejects a mip count that does not match the dimensions', () => {
    const bytes = writeDds({ width: 8, height: 8, format: 'dxt1', mips: [filled(32, 0)] });
    bytes[28] = 5;
    expect(() => readDds(bytes)).toThrow(InvalidFieldValueError);
  });

  it('remaps RGBA channel masks to BGRA8', () => {
    const bytes = buildDds(
      { width: 1, height: 1, pixelFlags: 0x41, masks: [0xff, 0xff00, 0xff0000, 0xff000000] },
      [10, 20, 30, 40]
    );
    const image = readDds(bytes);
    expect(image.format).toBe('bgra8');
    expect(Array.from(image.mips[0])).toEqual([30, 20, 10, 40]);
    expect(Array.from(decodeTexture(bytes).pixels)).toEqual([10, 20, 30, 40]);
  });

  it('rejects masks that are not whole bytes', () => {
    const bytes = buildDds(
      { width: 1, height: 1, pixelFlags: 0x41, masks: [0xf00, 0xff00, 0xff0000, 0xff000000] },
      [0, 0, 0, 0]
    );
    expect(() => readDds(bytes)).toThrow(InvalidFieldValueError);
  });

  it('reads BC1 through the DX10 header', () => {
    const bytes = buildDds(
      { width: 4, height: 4, pixelFlags: 0x4, fourCC: DDS.FOURCC_DX10 },
      [DDS.DXGI_BC1_UNORM, 0, 0, 0, 3, 0, 0, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0, ...redDxt1Block]
    );
    const image = readDds(bytes);
    expect(image.format).toBe('dxt1');
    expect(Array.from(image.mips[0])).toEqual(redDxt1Block);
  });

  it('rejects other FourCC codes', () => {
    // 'ATI2'
    const bytes = buildDds({ width: 4, height: 4, pixelFlags: 0x4, fourCC: 0x32495441 }, new Array<number>(16).fill(0));
    expect(() => readDds(bytes)).toThrow(UnsupportedPixelFormatError);
    expect(() => readDds(bytes)).toThrow("FourCC 'ATI2'");
  });

  it('converts to TEX and back without touching the data', () => {
    const dds = writeDds({ width: 4, height: 4, format: 'dxt1', mips: [new Uint8Array(redDxt1Block)] });
    const tex = ddsToTex(dds);
    expect(Array.from(tex.subarray(0, 12))).toEqual([0x54, 0x45, 0x58, 0x00, 4, 0, 4, 0, 1, 10, 0, 0]);
    expect(Array.from(tex.subarray(12))).toEqual(redDxt1Block);
    expect(Array.from(texToDds(tex))).toEqual(Array.from(dds));
  });
});

describe('texture API', () => {
  it('detects the container by magic', () => {
    const tex = writeTex({ width: 1, height: 1, format: 'bgra8', mips: [filled(4, 9)] });
    expect(readTextureContainer(tex).width).toBe(1);
    expect(() => readTextureContainer(new Uint8Array([1, 2, 3, 4]))).toThrow(MalformedHeaderError);
  });

  it('encodes and decodes a solid DXT5 texture', () => {
    const pixels = new Uint8Array(64);
    for (let i = 0; i < 16; i++) pixels.set([255, 0, 0, 128], i * 4);
    const bytes = encodeTexture(pixels, 4, 4, 'dxt5', { container: 'dds' });
    const decoded = decodeTexture(bytes);
    expect(decoded).toMatchObject({ width: 4, height: 4, format: 'dxt5', mipCount: 1, rowOrder: 'top-down' });
    expect(Array.from(decoded.pixels.subarray(0, 4))).toEqual([255, 0, 0, 128]);
  });

  it('decodes a smaller mip level', () => {
    const bytes = writeTex({
      width: 4,
      height: 4,
      format: 'bgra8',
      mips: [filled(64, 1), new Uint8Array([1, 2, 3, 4, 1, 2, 3, 4, 1, 2, 3, 4, 1, 2, 3, 4]), filled(4, 3)],
    });
    const decoded = decodeTexture(bytes, { mipLevel: 1 });
    expect(decoded.width).toBe(2);
    expect(Array.from(decoded.pixels.subarray(0, 4))).toEqual([3, 2, 1, 4]);
    expect(() => decodeTexture(bytes, { mipLevel: 3 })).toThrow(InvalidFieldValueError);
  });
});
