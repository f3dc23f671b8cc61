/**
 * SCO Reader
 *
 * Text static mesh:
 *   [ObjectBegin]
 *   Name= <name>
 *   CentralPoint= x y z
 *   PivotPoint= x y z
 *   Verts= n        followed by n lines of "x y z"
 *   Faces= n        followed by n lines of "3 i0 i1 i2 material u0 v0 u1 v1 u2 v2"
 *   [ObjectEnd]
 */

import { SCB, SCO } from '../../constants/formats';
import { CodecErrorFactory } from '../../errors';
import type { StaticMesh, Vec2, Vec3 } from '../../types';
import { logger as defaultLogger } from '../../utils/logger';
import type { StaticMeshReadOptions } from './scb-codec';

const FACE_TOKENS = 11;

function parseNumber(token: string | undefined, field: string, line: number): number {
  const value = token === undefined ? NaN : Number(token);
  if (!Number.isFinite(value)) {
    throw CodecErrorFactory.invalidField(field, 'a number', token ?? '<missing>', `Line ${line}: ${field} is not a number`);
  }
  return value;
}

function parseIndex(token: string | undefined, field: string, line: number): number {
  const value = parseNumber(token, field, line);
  if (!Number.isInteger(value) || value < 0) {
    throw CodecErrorFactory.invalidField(field, 'a non-negative integer', value, `Line ${line}: ${field} is not an index`);
  }
  return value;
}

function parseVec3(tokens: string[], field: string, line: number): Vec3 {
  return [parseNumber(tokens[0], field, line), parseNumber(tokens[1], field, line), parseNumber(tokens[2], field, line)];
}

/**
 * Text after the first '='; the key is everything before it.
 */
function valueOf(line: string): string {
  return line.slice(line.indexOf('=') + 1).trim();
}

export function readSco(input: string | Uint8Array, options: StaticMeshReadOptions = {}): StaticMesh {
  const log = options.logger ?? defaultLogger;
  const text = typeof input === 'string' ? input : new TextDecoder('latin1').decode(input);
  const lines = text.split(/\r?\n/).map(line => line.trim());

  if (lines[0] !== SCO.BEGIN) {
    throw CodecErrorFactory.malformedHeader('SCO', SCO.BEGIN, lines[0] ?? '');
  }

  const mesh: StaticMesh = {
    name: options.name ?? '',
    material: SCB.DEFAULT_MATERIAL,
    vertices: [],
    indices: [],
    uvs: [],
    central: [0, 0, 0],
    flags: 0,
  };
  let materialSet = false;
  let dropped = 0;

  // Consumes the next line of a Verts= or Faces= block
  let i = 1;
  const nextLine = (field: string): string => {
    i++;
    const line = lines[i];
    if (line === undefined || line === SCO.END) {
      throw CodecErrorFactory.unexpectedEof(field, i, 1, 0);
    }
    return line;
  };

  for (; i < lines.length; i++) {
    const line = lines[i];
    if (line === '' || line === SCO.END) continue;
    const lineNumber = i + 1;

    if (line.startsWith('Name=')) {
      mesh.name = valueOf(line) || mesh.name;
    } else if (line.startsWith('CentralPoint=')) {
      mesh.central = parseVec3(valueOf(line).split(/\s+/), 'CentralPoint', lineNumber);
    } else if (line.startsWith('PivotPoint=')) {
      mesh.pivot = parseVec3(valueOf(line).split(/\s+/), 'PivotPoint', lineNumber);
    } else if (line.startsWith('Verts=')) {
      const count = parseIndex(valueOf(line), 'Verts', lineNumber);
      for (let v = 0; v < count; v++) {
        const vertexLine = nextLine(`vertices[${v}]`);
        mesh.vertices.push(parseVec3(vertexLine.split(/\s+/), `vertices[${v}]`, i + 1));
      }
    } else if (line.startsWith('Faces=')) {
      const count = parseIndex(valueOf(line), 'Faces', lineNumber);
      for (let f = 0; f < count; f++) {
        const field = `faces[${f}]`;
        const tokens = nextLine(field).split(/\s+/);
        const faceLine = i + 1;
        if (tokens.length < FACE_TOKENS) {
          throw CodecErrorFactory.invalidField(field, `${FACE_TOKENS} tokens`, tokens.length, `Line ${faceLine}: face has ${tokens.length} tokens`);
        }
        const corners = [
          parseIndex(tokens[1], `${field}.index`, faceLine),
          parseIndex(tokens[2], `${field}.index`, faceLine),
          parseIndex(tokens[3], `${field}.index`, faceLine),
        ];
        const [a, b, c] = corners;
        if (a === b || b === c || a === c) {
          dropped++;
          continue;
        }
        if (!materialSet) {
          mesh.material = tokens[4];
          materialSet = true;
        }
        const uv = tokens.slice(5, 11).map(token => parseNumber(token, `${field}.uv`, faceLine));
        const cornerUvs: Vec2[] = [[uv[0], uv[1]], [uv[2], uv[3]], [uv[4], uv[5]]];
        mesh.indices.push(a, b, c);
        mesh.uvs.push(...cornerUvs);
      }
    }
  }

  mesh.indices.forEach((index, position) => {
    if (index >= mesh.vertices.length) {
      throw CodecErrorFactory.invalidField(`indices[${position}]`, `< ${mesh.vertices.length}`, index);
    }
  });
  if (dropped > 0) {
    log.debug(`Dropped ${dropped} degenerate face(s)`, { format: 'SCO' });
  }
  log.debug('Read SCO', { vertexCount: mesh.vertices.length, faceCount: mesh.indices.length / 3 });
  return mesh;
}
