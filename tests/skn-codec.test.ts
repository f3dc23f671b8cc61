import { describe, expect, it } from 'vitest';
import { dropDegenerateTriangles, readMesh, writeMesh } from '../src/codecs/skn';
import { InvalidFieldValueError, MalformedHeaderError, UnsupportedVersionError } from '../src/errors';
import type { SkinnedMeshInput, SkinnedVertexInput, Submesh } from '../src/types';
import { BinaryWriter } from '../src/utils/binary-cursor';
import { captureLogger } from './helpers';

function vertex(x: number, y: number, z: number): SkinnedVertexInput {
  return {
    position: [x, y, z],
    normal: [0, 0, 1],
    uv: [x, y],
    influences: [0, 1, 0, 0],
    weights: [0.75, 0.25, 0, 0],
  };
}

const quad: SkinnedMeshInput = {
  submeshes: [
    { name: 'body', vertexStart: 0, vertexCount: 4, indexStart: 0, indexCount: 3 },
    { name: 'cape', vertexStart: 0, vertexCount: 4, indexStart: 3, indexCount: 3 },
  ],
  vertices: [vertex(0, 0, 0), vertex(1, 0, 0), vertex(1, 1, 0), vertex(0, 1, 0)],
  indices: [0, 1, 2, 0, 2, 3],
};

describe('dropDegenerateTriangles', () => {
  it('shrinks submesh ranges to the triangles they keep', () => {
    const submeshes: Submesh[] = [
      { name: 'a', vertexStart: 0, vertexCount: 4, indexStart: 0, indexCount: 6 },
      { name: 'b', vertexStart: 0, vertexCount: 4, indexStart: 6, indexCount: 6 },
    ];
    const result = dropDegenerateTriangles([0, 0, 1, 0, 1, 2, 1, 2, 3, 3, 3, 3], submeshes);
    expect(result.indices).toEqual([0, 1, 2, 1, 2, 3]);
    expect(result.dropped).toBe(2);
    expect(result.submeshes.map(s => [s.indexStart, s.indexCount])).toEqual([[0, 3], [3, 3]]);
  });
});

describe('SKN codec', () => {
  it('round-trips a major 1 mesh', () => {
    const bytes = writeMesh(quad);
    // header 12 + table 2 * 80 + counts 8 + 6 indices + 4 vertices
    expect(bytes.length).toBe(12 + 160 + 8 + 12 + 4 * 52);

    const mesh = readMesh(bytes);
    expect(mesh.version).toEqual({ major: 1, minor: 1 });
    expect(mesh.submeshes.map(s => s.name)).toEqual(['body', 'cape']);
    expect(mesh.indices).toEqual([0, 1, 2, 0, 2, 3]);
    expect(mesh.vertices[2]).toEqual({
      position: [1, 1, 0],
      normal: [0, 0, 1],
      uv: [1, 1],
      influences: [0, 1, 0, 0],
      weights: [0.75, 0.25, 0, 0],
    });
  });

  it('round-trips a major 4 mesh with bounds', () => {
    const bytes = writeMesh(quad, { major: 4 });
    expect(bytes.length).toBe(12 + 160 + 4 + 8 + 8 + 40 + 12 + 4 * 52);

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    // bounds follow flags, counts, vertexSize and vertexType
    const bounds = 12 + 160 + 4 + 8 + 8;
    expect(view.getUint32(bounds - 8, true)).toBe(52);
    expect([view.getFloat32(bounds + 12, true), view.getFloat32(bounds + 16, true)]).toEqual([1, 1]);
    expect(view.getFloat32(bounds + 36, true)).toBeCloseTo(Math.SQRT1_2, 6);

    const mesh = readMesh(bytes);
    expect(mesh.version.major).toBe(4);
    expect(mesh.vertices.map(v => v.position)).toEqual(quad.vertices.map(v => v.position));
  });

  it('drops a degenerate triangle on write', () => {
    const mesh = readMesh(writeMesh({
      submeshes: [{ name: 'body', vertexStart: 0, vertexCount: 2, indexStart: 0, indexCount: 3 }],
      vertices: [vertex(0, 0, 0), vertex(1, 0, 0)],
      indices: [0, 0, 1],
    }));
    expect(mesh.indices).toEqual([]);
    expect(mesh.submeshes[0].indexCount).toBe(0);
  });

  it('normalizes weights on write', () => {
    const mesh = readMesh(writeMesh({
      submeshes: [{ name: 'body', vertexStart: 0, vertexCount: 3, indexStart: 0, indexCount: 3 }],
      vertices: [
        { ...vertex(0, 0, 0), weights: [2, 2, 0, 0] },
        { ...vertex(1, 0, 0), weights: [0, 0, 0, 0] },
        vertex(0, 1, 0),
      ],
      indices: [0, 1, 2],
    }));
    expect(mesh.vertices[0].weights).toEqual([0.5, 0.5, 0, 0]);
    expect(mesh.vertices[1].weights).toEqual([1, 0, 0, 0]);
  });

  it('rejects more vertices than u16 indices address', () => {
    const vertices = new Array<SkinnedVertexInput>(65536).fill(vertex(0, 0, 0));
    expect(() => writeMesh({ ...quad, vertices })).toThrow(InvalidFieldValueError);
  });

  it('rejects submesh names outside printable ASCII', () => {
    const submeshes: Submesh[] = [{ name: 't\u00eate', vertexStart: 0, vertexCount: 4, indexStart: 0, indexCount: 6 }];
    expect(() => writeMesh({ ...quad, submeshes })).toThrow('Invalid mesh.submeshes.0.name: Name must be printable ASCII');
  });

  it('rejects out-of-range indices and submesh ranges', () => {
    expect(() => writeMesh({ ...quad, indices: [0, 1, 4, 0, 2, 3] })).toThrow(InvalidFieldValueError);
    expect(() => writeMesh({ ...quad, indices: [0, 1, 2, 3] })).toThrow(InvalidFieldValueError);
    expect(() => writeMesh({
      ...quad,
      submeshes: [{ name: 'body', vertexStart: 0, vertexCount: 4, indexStart: 3, indexCount: 6 }],
    })).toThrow(InvalidFieldValueError);
  });

  it('reads the major 0 layout as one Base submesh', () => {
    const writer = new BinaryWriter();
    writer.writeU32(0x00112233);
    writer.writeU16(0);
    writer.writeU16(1);
    writer.writeU32(3);
    writer.writeU32(3);
    for (const index of [0, 1, 2]) writer.writeU16(index);
    for (let i = 0; i < 3; i++) {
      writer.writeVec3([i, 0, 0]);
      writer.writeBytes(new Uint8Array([0, 0, 0, 0]));
      for (const weight of [1, 0, 0, 0]) writer.writeF32(weight);
      writer.writeVec3([0, 1, 0]);
      writer.writeVec2([0, 0]);
    }

    const mesh = readMesh(writer.toUint8Array());
    expect(mesh.submeshes).toEqual([{ name: 'Base', vertexStart: 0, vertexCount: 3, indexStart: 0, indexCount: 3 }]);
    expect(mesh.vertices[2].position).toEqual([2, 0, 0]);
  });

  it('skips the extra bytes of vertex type 1', () => {
    const bytes = writeMesh(quad, { major: 4 });
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const vertexTypeAt = 12 + 160 + 4 + 8 + 4;
    view.setUint32(vertexTypeAt, 1, true);

    const vertexStart = vertexTypeAt + 4 + 40 + 12;
    const widened = new Uint8Array(vertexStart + 4 * 56);
    widened.set(bytes.subarray(0, vertexStart));
    for (let i = 0; i < 4; i++) {
      widened.set(bytes.subarray(vertexStart + i * 52, vertexStart + (i + 1) * 52), vertexStart + i * 56);
    }

    const mesh = readMesh(widened);
    expect(mesh.vertices.map(v => v.position)).toEqual(quad.vertices.map(v => v.position));
  });

  it('warns about a trailing partial triangle', () => {
    const writer = new BinaryWriter();
    writer.writeU32(0x00112233);
    writer.writeU16(0);
    writer.writeU16(1);
    writer.writeU32(4);
    writer.writeU32(3);
    for (const index of [0, 1, 2, 2]) writer.writeU16(index);
    writer.writeZeros(3 * 52);

    const { logger, messages } = captureLogger();
    const mesh = readMesh(writer.toUint8Array(), { logger });
    expect(mesh.indices).toEqual([0, 1, 2]);
    expect(messages.some(message => message.includes('Index count 4 is not a multiple of 3'))).toBe(true);
  });

  it('checks magic, version and indices on read', () => {
    const bytes = writeMesh(quad);

    const badMagic = bytes.slice();
    badMagic[0] = 0;
    expect(() => readMesh(badMagic)).toThrow(MalformedHeaderError);

    const badVersion = bytes.slice();
    badVersion[4] = 3;
    expect(() => readMesh(badVersion)).toThrow(UnsupportedVersionError);

    const badIndex = bytes.slice();
    // first index follows the header, table and counts
    badIndex[12 + 160 + 8] = 9;
    expect(() => readMesh(badIndex)).toThrow(InvalidFieldValueError);
  });
});
