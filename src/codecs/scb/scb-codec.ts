/**
 * SCB Reader
 *
 * char[8] 'r3d2Mesh', u16 major (2 or 3), u16 minor, char[128] name,
 * u32 vertexCount, u32 faceCount, u32 flags, f32[6] bounding box,
 * u32 vertexType (3.2 only), vec3 vertices, u32 colors (vertexType 1),
 * vec3 central point, then faces of
 * u32[3] indices, char[64] material, f32[6] uv (u0 u1 u2 v0 v1 v2).
 */

import { SCB } from '../../constants/formats';
import { CodecErrorFactory } from '../../errors';
import type { CodecOptions, StaticMesh, Vec2, Vec3 } from '../../types';
import { BinaryCursor } from '../../utils/binary-cursor';
import { logger as defaultLogger } from '../../utils/logger';

export interface StaticMeshReadOptions extends CodecOptions {
  /**
   * Used when the file stores no name
   */
  name?: string;
}

const FACE_SIZE = 12 + SCB.MATERIAL_LENGTH + 24;

export function readScb(bytes: Uint8Array, options: StaticMeshReadOptions = {}): StaticMesh {
  const log = options.logger ?? defaultLogger;
  const cursor = new BinaryCursor(bytes);

  const magic = cursor.readAscii(8, 'SCB magic');
  if (magic !== SCB.MAGIC) {
    throw CodecErrorFactory.malformedHeader('SCB', SCB.MAGIC, magic);
  }
  const major = cursor.readU16('SCB major');
  const minor = cursor.readU16('SCB minor');
  if (major !== 2 && major !== 3) {
    throw CodecErrorFactory.unsupportedVersion('SCB', `${major}.${minor}`);
  }

  const storedName = cursor.readFixedString(SCB.NAME_LENGTH, 'SCB name');
  const vertexCount = cursor.readU32('SCB vertexCount');
  const faceCount = cursor.readU32('SCB faceCount');
  const flags = cursor.readU32('SCB flags');
  // Bounding box, recomputable from the vertices
  cursor.seekRelative(24);
  const vertexType = major === 3 && minor === 2 ? cursor.readU32('SCB vertexType') : 0;

  const needed = vertexCount * (vertexType === 1 ? 16 : 12) + 12 + faceCount * FACE_SIZE;
  if (needed > cursor.remaining) {
    throw CodecErrorFactory.unexpectedEof('SCB geometry', cursor.position, needed, cursor.remaining);
  }

  const vertices: Vec3[] = [];
  for (let i = 0; i < vertexCount; i++) {
    vertices.push(cursor.readVec3(`vertices[${i}]`));
  }
  if (vertexType === 1) {
    cursor.seekRelative(4 * vertexCount);
  }
  const central = cursor.readVec3('SCB central');

  const indices: number[] = [];
  const uvs: Vec2[] = [];
  let material: string | undefined;
  let dropped = 0;
  for (let f = 0; f < faceCount; f++) {
    const field = `faces[${f}]`;
    const corners = [cursor.readU32(`${field}.index`), cursor.readU32(`${field}.index`), cursor.readU32(`${field}.index`)];
    const faceMaterial = cursor.readFixedString(SCB.MATERIAL_LENGTH, `${field}.material`);
    const [u0, u1, u2, v0, v1, v2] = [
      cursor.readF32(`${field}.uv`),
      cursor.readF32(`${field}.uv`),
      cursor.readF32(`${field}.uv`),
      cursor.readF32(`${field}.uv`),
      cursor.readF32(`${field}.uv`),
      cursor.readF32(`${field}.uv`),
    ];

    corners.forEach(index => {
      if (index >= vertexCount) {
        throw CodecErrorFactory.invalidField(`${field}.index`, `< ${vertexCount}`, index);
      }
    });
    const [a, b, c] = corners;
    if (a === b || b === c || a === c) {
      dropped++;
      continue;
    }
    if (material === undefined) material = faceMaterial;
    indices.push(a, b, c);
    uvs.push([u0, v0], [u1, v1], [u2, v2]);
  }

  if (dropped > 0) {
    log.debug(`Dropped ${dropped} degenerate face(s)`, { format: 'SCB' });
  }
  log.debug('Read SCB', { version: `${major}.${minor}`, vertexCount, faceCount, vertexType });

  return {
    name: storedName || options.name || '',
    material: material || SCB.DEFAULT_MATERIAL,
    vertices,
    indices,
    uvs,
    central,
    flags,
  };
}
