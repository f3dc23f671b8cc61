import { describe, expect, it } from 'vitest';
import { InvalidFieldValueError, UnexpectedEofError } from '../src/errors';
import { BinaryCursor, BinaryWriter } from '../src/utils/binary-cursor';

describe('BinaryCursor', () => {
  it('reads little-endian integers', () => {
    const cursor = new BinaryCursor(new Uint8Array([0x01, 0x02, 0x03, 0x04, 0xff, 0xff, 0xff, 0xff]));
    expect(cursor.readU16()).toBe(0x0201);
    expect(cursor.readU16()).toBe(0x0403);
    expect(cursor.readI32()).toBe(-1);
    expect(cursor.remaining).toBe(0);
  });

  it('names the field when the buffer runs out', () => {
    const cursor = new BinaryCursor(new Uint8Array([1, 2, 3]));
    try {
      cursor.readU32('header size');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnexpectedEofError);
      if (error instanceof UnexpectedEofError) {
        expect(error.field).toBe('header size');
        expect(error.offset).toBe(0);
        expect(error.needed).toBe(4);
        expect(error.available).toBe(3);
      }
    }
    expect(cursor.position).toBe(0);
  });

  it('rejects seeks outside the buffer', () => {
    const cursor = new BinaryCursor(new Uint8Array(4));
    cursor.seekAbsolute(4);
    expect(cursor.remaining).toBe(0);
    expect(() => cursor.seekAbsolute(5)).toThrow(UnexpectedEofError);
    expect(() => cursor.seekRelative(-5)).toThrow(UnexpectedEofError);
  });

  it('reads fixed-width and zero-terminated strings', () => {
    const cursor = new BinaryCursor(new Uint8Array([0x61, 0x62, 0, 0x7a, 0x68, 0x69, 0, 0x78]));
    expect(cursor.readFixedString(4)).toBe('ab');
    expect(cursor.readCString()).toBe('hi');
    expect(cursor.position).toBe(7);
    expect(() => cursor.readCString('name')).toThrow(UnexpectedEofError);
  });

  it('resolves strings through offsets relative to the offset field', () => {
    const writer = new BinaryWriter();
    writer.writeU32(0);
    writer.writeI32(8);
    writer.writeZeros(4);
    writer.writeCString('pelvis');
    const cursor = new BinaryCursor(writer.toUint8Array());
    cursor.seekAbsolute(4);
    const ref = cursor.readRelativeOffset();
    expect(ref).toEqual({ base: 4, relative: 8 });
    expect(cursor.resolveCString(ref)).toBe('pelvis');
    expect(cursor.position).toBe(8);
  });

  it('reads vectors and quaternions in stored order', () => {
    const writer = new BinaryWriter();
    writer.writeVec3([1, 2, 3]);
    writer.writeQuat([0, 0, 0.5, 1]);
    const cursor = new BinaryCursor(writer.toUint8Array());
    expect(cursor.readVec3()).toEqual([1, 2, 3]);
    expect(cursor.readQuat()).toEqual([0, 0, 0.5, 1]);
  });
});

describe('BinaryWriter', () => {
  it('grows past its initial size', () => {
    const writer = new BinaryWriter(16);
    for (let i = 0; i < 40; i++) writer.writeU8(i);
    const bytes = writer.toUint8Array();
    expect(bytes.length).toBe(40);
    expect(bytes[39]).toBe(39);
  });

  it('fills reserved fields without moving the cursor', () => {
    const writer = new BinaryWriter();
    writer.reserveU32('size');
    writer.reserveI32('offset');
    writer.writeU16(7);
    writer.resolve('offset', -2);
    writer.resolve('size', writer.length);
    expect(writer.position).toBe(10);

    const cursor = new BinaryCursor(writer.toUint8Array());
    expect(cursor.readU32()).toBe(10);
    expect(cursor.readI32()).toBe(-2);
    expect(cursor.readU16()).toBe(7);
  });

  it('refuses to finish with an open placeholder', () => {
    const writer = new BinaryWriter();
    writer.reserveU32('resourceSize');
    expect(() => writer.toUint8Array()).toThrow(InvalidFieldValueError);
    expect(() => writer.toUint8Array()).toThrow('Unresolved placeholders: resourceSize');
  });

  it('rejects strings that leave no room for the terminator', () => {
    const writer = new BinaryWriter();
    expect(() => writer.writeFixedString('abcd', 4)).toThrow(InvalidFieldValueError);
    writer.writeFixedString('abc', 4);
    expect(Array.from(writer.toUint8Array())).toEqual([0x61, 0x62, 0x63, 0]);
  });

  it('rejects characters outside ASCII instead of truncating them', () => {
    const writer = new BinaryWriter();
    expect(() => writer.writeCString('bon\u0113', 'joints[0].name')).toThrow(
      'joints[0].name has a non-ASCII character at position 3'
    );
    expect(() => writer.writeFixedString('caf\u00e9', 8)).toThrow(InvalidFieldValueError);
  });
});
