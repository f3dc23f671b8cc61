import { describe, expect, it } from 'vitest';
import { readScb, readSco } from '../src/codecs/scb';
import {
  InvalidFieldValueError,
  MalformedHeaderError,
  UnexpectedEofError,
  UnsupportedVersionError,
} from '../src/errors';
import type { Vec3 } from '../src/types';
import { BinaryWriter } from '../src/utils/binary-cursor';

interface ScbFace {
  corners: [number, number, number];
  material: string;
  uvs: [number, number, number, number, number, number];
}

interface ScbFixture {
  major: number;
  minor: number;
  name: string;
  vertices: Vec3[];
  faces: ScbFace[];
  vertexType?: number;
}

function buildScb(fixture: ScbFixture): Uint8Array {
  const writer = new BinaryWriter();
  writer.writeAscii('r3d2Mesh');
  writer.writeU16(fixture.major);
  writer.writeU16(fixture.minor);
  writer.writeFixedString(fixture.name, 128);
  writer.writeU32(fixture.vertices.length);
  writer.writeU32(fixture.faces.length);
  writer.writeU32(0);
  writer.writeZeros(24);
  if (fixture.major === 3 && fixture.minor === 2) {
    writer.writeU32(fixture.vertexType ?? 0);
  }
  for (const vertex of fixture.vertices) writer.writeVec3(vertex);
  if (fixture.vertexType === 1) {
    for (let i = 0; i < fixture.vertices.length; i++) writer.writeU32(0xffffffff);
  }
  writer.writeVec3([0.5, 0.5, 0]);
  for (const face of fixture.faces) {
    for (const corner of face.corners) writer.writeU32(corner);
    writer.writeFixedString(face.material, 64);
    for (const value of face.uvs) writer.writeF32(value);
  }
  return writer.toUint8Array();
}

const triangle: Vec3[] = [[0, 0, 0], [1, 0, 0], [0, 1, 0]];

describe('readScb', () => {
  it('reads faces with per-corner uvs past the vertex colors', () => {
    const mesh = readScb(buildScb({
      major: 3,
      minor: 2,
      name: 'boulder',
      vertexType: 1,
      vertices: triangle,
      faces: [
        { corners: [0, 0, 1], material: 'other', uvs: [0, 0, 0, 0, 0, 0] },
        { corners: [0, 1, 2], material: 'rock', uvs: [0, 1, 0.5, 0, 0, 1] },
      ],
    }));
    expect(mesh.name).toBe('boulder');
    expect(mesh.material).toBe('rock');
    expect(mesh.vertices).toEqual(triangle);
    expect(mesh.indices).toEqual([0, 1, 2]);
    expect(mesh.uvs).toEqual([[0, 0], [1, 0], [0.5, 1]]);
    expect(mesh.central).toEqual([0.5, 0.5, 0]);
  });

  it('falls back to the given name and the default material', () => {
    const mesh = readScb(buildScb({
      major: 2,
      minor: 1,
      name: '',
      vertices: triangle,
      faces: [{ corners: [1, 1, 2], material: 'rock', uvs: [0, 0, 0, 0, 0, 0] }],
    }), { name: 'crate' });
    expect(mesh.name).toBe('crate');
    expect(mesh.material).toBe('lambert1');
    expect(mesh.indices).toEqual([]);
  });

  it('rejects bad signatures, versions and indices', () => {
    const good = buildScb({ major: 3, minor: 1, name: 'a', vertices: triangle, faces: [] });

    const badMagic = good.slice();
    badMagic[0] = 0x52;
    expect(() => readScb(badMagic)).toThrow(MalformedHeaderError);

    const badVersion = good.slice();
    badVersion[8] = 4;
    expect(() => readScb(badVersion)).toThrow(UnsupportedVersionError);

    expect(() => readScb(buildScb({
      major: 3,
      minor: 1,
      name: 'a',
      vertices: triangle,
      faces: [{ corners: [0, 1, 3], material: 'rock', uvs: [0, 0, 0, 0, 0, 0] }],
    }))).toThrow(InvalidFieldValueError);
  });

  it('checks the geometry length before reading it', () => {
    const bytes = buildScb({
      major: 3,
      minor: 1,
      name: 'a',
      vertices: triangle,
      faces: [{ corners: [0, 1, 2], material: 'rock', uvs: [0, 0, 0, 0, 0, 0] }],
    });
    expect(() => readScb(bytes.subarray(0, bytes.length - 1))).toThrow(UnexpectedEofError);
  });
});

const crate = [
  '[ObjectBegin]',
  'Name= crate',
  'CentralPoint= 1 2 3',
  'PivotPoint= 0 0 0',
  'Verts= 3',
  '0 0 0',
  '1 0 0',
  '0 1 0',
  'Faces= 2',
  '3 1 1 2 plank 0 0 0 0 0 0',
  '3 0 1 2 wood 0 0 1 0 0 1',
  '[ObjectEnd]',
].join('\r\n');

describe('readSco', () => {
  it('parses the text layout', () => {
    const mesh = readSco(crate);
    expect(mesh.name).toBe('crate');
    expect(mesh.central).toEqual([1, 2, 3]);
    expect(mesh.pivot).toEqual([0, 0, 0]);
    expect(mesh.vertices).toEqual(triangle);
    expect(mesh.indices).toEqual([0, 1, 2]);
    expect(mesh.material).toBe('wood');
    expect(mesh.uvs).toEqual([[0, 0], [1, 0], [0, 1]]);
  });

  it('accepts bytes', () => {
    expect(readSco(new TextEncoder().encode(crate)).name).toBe('crate');
  });

  it('rejects text without the begin marker', () => {
    expect(() => readSco('Name= crate')).toThrow(MalformedHeaderError);
  });

  it('rejects short faces, bad numbers and missing lines', () => {
    expect(() => readSco(crate.replace('3 0 1 2 wood 0 0 1 0 0 1', '3 0 1 2 wood 0 0'))).toThrow(InvalidFieldValueError);
    expect(() => readSco(crate.replace('1 0 0', '1 zero 0'))).toThrow(InvalidFieldValueError);
    expect(() => readSco(crate.split('\r\n').slice(0, 6).join('\n'))).toThrow(UnexpectedEofError);
  });

  it('rejects indices past the vertex list', () => {
    expect(() => readSco(crate.replace('3 0 1 2 wood', '3 0 1 5 wood'))).toThrow(InvalidFieldValueError);
  });
});
