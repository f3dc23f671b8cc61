/**
 * Binary Cursor
 *
 * Little-endian read and write primitives shared by every format codec.
 * Reads are bounds-checked and fail with `UnexpectedEofError` naming the
 * field being read.
 */

import { CodecErrorFactory } from '../errors';
import type { Quat, Vec2, Vec3 } from '../types';

/**
 * A string pointer stored as an i32 offset from a base position.
 * `base` is the position of the offset field itself.
 */
export interface RelativeOffset {
  base: number;
  relative: number;
}

/**
 * Decodes single-byte characters up to the first zero byte.
 */
function decodeZeroTerminated(bytes: Uint8Array): string {
  let end = 0;
  while (end < bytes.length && bytes[end] !== 0) end++;
  let result = '';
  for (let i = 0; i < end; i++) {
    result += String.fromCharCode(bytes[i]);
  }
  return result;
}

/**
 * Bounds-checked little-endian reader over a byte buffer.
 */
export class BinaryCursor {
  private readonly view: DataView;
  private readonly bytes: Uint8Array;
  private pos = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.bytes.byteLength;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.pos;
  }

  seekAbsolute(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position > this.length) {
      throw CodecErrorFactory.unexpectedEof('seek target', position, 0, Math.max(0, this.length - position));
    }
    this.pos = position;
  }

  seekRelative(delta: number): void {
    this.seekAbsolute(this.pos + delta);
  }

  private require(field: string, byteCount: number, at: number = this.pos): void {
    if (byteCount < 0 || at < 0 || at + byteCount > this.length) {
      throw CodecErrorFactory.unexpectedEof(field, at, byteCount, Math.max(0, this.length - at));
    }
  }

  readU8(field = 'u8'): number {
    this.require(field, 1);
    return this.view.getUint8(this.pos++);
  }

  readU16(field = 'u16'): number {
    this.require(field, 2);
    const value = this.view.getUint16(this.pos, true);
    this.pos += 2;
    return value;
  }

  readI16(field = 'i16'): number {
    this.require(field, 2);
    const value = this.view.getInt16(this.pos, true);
    this.pos += 2;
    return value;
  }

  readU32(field = 'u32'): number {
    this.require(field, 4);
    const value = this.view.getUint32(this.pos, true);
    this.pos += 4;
    return value;
  }

  readI32(field = 'i32'): number {
    this.require(field, 4);
    const value = this.view.getInt32(this.pos, true);
    this.pos += 4;
    return value;
  }

  readF32(field = 'f32'): number {
    this.require(field, 4);
    const value = this.view.getFloat32(this.pos, true);
    this.pos += 4;
    return value;
  }

  /**
   * Returns a view into the underlying buffer, not a copy.
   */
  readBytes(byteCount: number, field = 'bytes'): Uint8Array {
    this.require(field, byteCount);
    const slice = this.bytes.subarray(this.pos, this.pos + byteCount);
    this.pos += byteCount;
    return slice;
  }

  readVec2(field = 'vec2'): Vec2 {
    this.require(field, 8);
    return [this.readF32(field), this.readF32(field)];
  }

  readVec3(field = 'vec3'): Vec3 {
    this.require(field, 12);
    return [this.readF32(field), this.readF32(field), this.readF32(field)];
  }

  /**
   * Reads four f32 stored in x, y, z, w order.
   */
  readQuat(field = 'quat'): Quat {
    this.require(field, 16);
    return [this.readF32(field), this.readF32(field), this.readF32(field), this.readF32(field)];
  }

  /**
   * Fixed-width zero-padded string.
   */
  readFixedString(byteCount: number, field = 'string'): string {
    return decodeZeroTerminated(this.readBytes(byteCount, field));
  }

  /**
   * Exactly `byteCount` characters, zero bytes included.
   */
  readAscii(byteCount: number, field = 'ascii'): string {
    const bytes = this.readBytes(byteCount, field);
    let result = '';
    for (const byte of bytes) result += String.fromCharCode(byte);
    return result;
  }

  /**
   * Zero-terminated string at the cursor; consumes the terminator.
   */
  readCString(field = 'cstring'): string {
    const start = this.pos;
    const end = this.findTerminator(start, field);
    this.pos = end + 1;
    return decodeZeroTerminated(this.bytes.subarray(start, end));
  }

  readRelativeOffset(field = 'offset'): RelativeOffset {
    const base = this.pos;
    const relative = this.readI32(field);
    return { base, relative };
  }

  /**
   * Reads the zero-terminated string a relative offset points at.
   * The cursor does not move.
   */
  resolveCString(ref: RelativeOffset, field = 'cstring'): string {
    const start = ref.base + ref.relative;
    this.require(field, 1, start);
    const end = this.findTerminator(start, field);
    return decodeZeroTerminated(this.bytes.subarray(start, end));
  }

  private findTerminator(start: number, field: string): number {
    let end = start;
    while (end < this.length && this.bytes[end] !== 0) end++;
    if (end >= this.length) {
      throw CodecErrorFactory.unexpectedEof(`${field} terminator`, start, end - start + 1, this.length - start);
    }
    return end;
  }
}

/**
 * Little-endian writer over a growable buffer.
 *
 * Size and offset fields whose values are only known once the body is
 * written are reserved under a label and resolved later; `toUint8Array`
 * refuses to finish while any label is still open.
 */
export class BinaryWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private pos = 0;
  private end = 0;
  private readonly placeholders = new Map<string, { position: number; signed: boolean }>();

  constructor(initialSize = 4096) {
    this.buffer = new Uint8Array(Math.max(16, initialSize));
    this.view = new DataView(this.buffer.buffer);
  }

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.end;
  }

  private ensure(byteCount: number): void {
    const needed = this.pos + byteCount;
    if (needed > this.buffer.byteLength) {
      const grown = new Uint8Array(Math.max(this.buffer.byteLength * 2, needed));
      grown.set(this.buffer);
      this.buffer = grown;
      this.view = new DataView(this.buffer.buffer);
    }
    this.end = Math.max(this.end, needed);
  }

  /**
   * Seeks within the bytes written so far.
   */
  seekAbsolute(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position > this.end) {
      throw CodecErrorFactory.invalidField('writer position', `0..${this.end}`, position);
    }
    this.pos = position;
  }

  writeU8(value: number): void {
    this.ensure(1);
    this.view.setUint8(this.pos, value);
    this.pos += 1;
  }

  writeU16(value: number): void {
    this.ensure(2);
    this.view.setUint16(this.pos, value, true);
    this.pos += 2;
  }

  writeI16(value: number): void {
    this.ensure(2);
    this.view.setInt16(this.pos, value, true);
    this.pos += 2;
  }

  writeU32(value: number): void {
    this.ensure(4);
    this.view.setUint32(this.pos, value >>> 0, true);
    this.pos += 4;
  }

  writeI32(value: number): void {
    this.ensure(4);
    this.view.setInt32(this.pos, value, true);
    this.pos += 4;
  }

  writeF32(value: number): void {
    this.ensure(4);
    this.view.setFloat32(this.pos, value, true);
    this.pos += 4;
  }

  writeBytes(data: Uint8Array): void {
    this.ensure(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  writeZeros(byteCount: number): void {
    this.ensure(byteCount);
    this.buffer.fill(0, this.pos, this.pos + byteCount);
    this.pos += byteCount;
  }

  writeVec2(value: Vec2): void {
    this.writeF32(value[0]);
    this.writeF32(value[1]);
  }

  writeVec3(value: Vec3): void {
    this.writeF32(value[0]);
    this.writeF32(value[1]);
    this.writeF32(value[2]);
  }

  writeQuat(value: Quat): void {
    this.writeF32(value[0]);
    this.writeF32(value[1]);
    this.writeF32(value[2]);
    this.writeF32(value[3]);
  }

  /**
   * Writes ASCII character codes without a terminator.
   */
  writeAscii(text: string, field = 'ascii'): void {
    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);
      if (code > 0x7f) {
        throw CodecErrorFactory.invalidField(field, 'ASCII text', text, `${field} has a non-ASCII character at position ${i}`);
      }
      this.writeU8(code);
    }
  }

  /**
   * Writes `text` zero-padded to `byteCount`; one byte is kept for the terminator.
   */
  writeFixedString(text: string, byteCount: number, field = 'string'): void {
    if (text.length >= byteCount) {
      throw CodecErrorFactory.invalidField(
        field,
        `at most ${byteCount - 1} characters`,
        text.length
      );
    }
    this.writeAscii(text, field);
    this.writeZeros(byteCount - text.length);
  }

  writeCString(text: string, field = 'cstring'): void {
    this.writeAscii(text, field);
    this.writeU8(0);
  }

  reserveU32(label: string): void {
    this.reserve(label, false);
  }

  reserveI32(label: string): void {
    this.reserve(label, true);
  }

  private reserve(label: string, signed: boolean): void {
    if (this.placeholders.has(label)) {
      throw CodecErrorFactory.invalidField('placeholder', 'unique label', label);
    }
    this.placeholders.set(label, { position: this.pos, signed });
    this.writeU32(0);
  }

  /**
   * Fills a reserved field without moving the cursor.
   */
  resolve(label: string, value: number): void {
    const placeholder = this.placeholders.get(label);
    if (!placeholder) {
      throw CodecErrorFactory.invalidField('placeholder', 'a reserved label', label);
    }
    if (placeholder.signed) {
      this.view.setInt32(placeholder.position, value, true);
    } else {
      this.view.setUint32(placeholder.position, value >>> 0, true);
    }
    this.placeholders.delete(label);
  }

  toUint8Array(): Uint8Array {
    if (this.placeholders.size > 0) {
      const open = [...this.placeholders.keys()].join(', ');
      throw CodecErrorFactory.invalidField('placeholder', 'all placeholders resolved', open, `Unresolved placeholders: ${open}`);
    }
    return this.buffer.slice(0, this.end);
  }
}
