/**
 * SKN Codec
 *
 * Major 0: u32 magic, u16 major, u16 minor, u32 indexCount, u32 vertexCount,
 * one implicit "Base" submesh.
 * Majors 1, 2 and 4: u32 submeshCount, submesh table (char[64] name,
 * u32 vertexStart, vertexCount, indexStart, indexCount), u32 flags (4 only),
 * u32 indexCount, u32 vertexCount, then for major 4 u32 vertexSize,
 * u32 vertexType and 40 bytes of bounds.
 *
 * Indices are u16. Vertices are 52 bytes: position, u8[4] bone indices,
 * f32[4] weights, normal, uv; vertexType 1 appends 4 bytes, type 2 another 16.
 */

import { SKN } from '../../constants/formats';
import { MESH_LIMITS, SKELETON } from '../../constants/skeleton';
import { CodecErrorFactory } from '../../errors';
import { MeshWriteOptionsSchema, SkinnedMeshInputSchema } from '../../schemas';
import type {
  CodecOptions,
  MeshWriteOptions,
  SkinnedMesh,
  SkinnedMeshInput,
  SkinnedVertex,
  Submesh,
  Vec3,
} from '../../types';
import { BinaryCursor, BinaryWriter } from '../../utils/binary-cursor';
import { logger as defaultLogger } from '../../utils/logger';

const SUPPORTED_MAJORS: ReadonlySet<number> = new Set([0, 1, 2, 4]);

/**
 * Removes triangles that repeat a corner and shrinks each submesh's index
 * range to the triangles it keeps.
 */
export function dropDegenerateTriangles(
  indices: readonly number[],
  submeshes: readonly Submesh[]
): { indices: number[]; submeshes: Submesh[]; dropped: number } {
  const triangleCount = Math.floor(indices.length / 3);
  // keptBefore[t] = surviving triangles among the first t
  const keptBefore = new Array<number>(triangleCount + 1).fill(0);
  const kept: number[] = [];

  for (let t = 0; t < triangleCount; t++) {
    const a = indices[t * 3];
    const b = indices[t * 3 + 1];
    const c = indices[t * 3 + 2];
    const degenerate = a === b || b === c || a === c;
    if (!degenerate) kept.push(a, b, c);
    keptBefore[t + 1] = keptBefore[t] + (degenerate ? 0 : 1);
  }

  const clampTriangle = (indexPosition: number) => Math.min(triangleCount, Math.floor(indexPosition / 3));
  const remapped = submeshes.map(submesh => {
    const first = clampTriangle(submesh.indexStart);
    const last = clampTriangle(submesh.indexStart + submesh.indexCount);
    return {
      ...submesh,
      indexStart: keptBefore[first] * 3,
      indexCount: (keptBefore[last] - keptBefore[first]) * 3,
    };
  });

  return { indices: kept, submeshes: remapped, dropped: triangleCount - kept.length / 3 };
}

function validateSubmeshRanges(submeshes: readonly Submesh[], vertexCount: number, indexCount: number): void {
  submeshes.forEach((submesh, index) => {
    if (submesh.vertexStart + submesh.vertexCount > vertexCount) {
      throw CodecErrorFactory.invalidField(
        `submeshes[${index}] vertex range`,
        `end <= ${vertexCount}`,
        submesh.vertexStart + submesh.vertexCount
      );
    }
    if (submesh.indexStart + submesh.indexCount > indexCount) {
      throw CodecErrorFactory.invalidField(
        `submeshes[${index}] index range`,
        `end <= ${indexCount}`,
        submesh.indexStart + submesh.indexCount
      );
    }
  });
}

/**
 * Reads a skinned mesh. Degenerate triangles are dropped; weights are
 * returned as stored.
 */
export function readMesh(bytes: Uint8Array, options: CodecOptions = {}): SkinnedMesh {
  const log = options.logger ?? defaultLogger;
  const cursor = new BinaryCursor(bytes);

  const magic = cursor.readU32('SKN magic');
  if (magic !== SKN.MAGIC) {
    throw CodecErrorFactory.malformedHeader('SKN', `0x${SKN.MAGIC.toString(16)}`, `0x${magic.toString(16)}`);
  }
  const major = cursor.readU16('SKN major');
  const minor = cursor.readU16('SKN minor');
  if (!SUPPORTED_MAJORS.has(major)) {
    throw CodecErrorFactory.unsupportedVersion('SKN', `${major}.${minor}`);
  }

  let submeshes: Submesh[] = [];
  let indexCount: number;
  let vertexCount: number;
  let vertexType = 0;

  if (major === 0) {
    indexCount = cursor.readU32('SKN indexCount');
    vertexCount = cursor.readU32('SKN vertexCount');
    submeshes.push({
      name: SKN.LEGACY_BASE_SUBMESH,
      vertexStart: 0,
      vertexCount,
      indexStart: 0,
      indexCount,
    });
  } else {
    const submeshCount = cursor.readU32('SKN submeshCount');
    for (let i = 0; i < submeshCount; i++) {
      submeshes.push({
        name: cursor.readFixedString(MESH_LIMITS.SUBMESH_NAME_LENGTH, `submeshes[${i}].name`),
        vertexStart: cursor.readU32(`submeshes[${i}].vertexStart`),
        vertexCount: cursor.readU32(`submeshes[${i}].vertexCount`),
        indexStart: cursor.readU32(`submeshes[${i}].indexStart`),
        indexCount: cursor.readU32(`submeshes[${i}].indexCount`),
      });
    }
    if (major >= 4) {
      cursor.readU32('SKN flags');
    }
    indexCount = cursor.readU32('SKN indexCount');
    vertexCount = cursor.readU32('SKN vertexCount');
    if (major >= 4) {
      cursor.readU32('SKN vertexSize');
      vertexType = cursor.readU32('SKN vertexType');
      cursor.seekRelative(SKN.BOUNDS_SIZE);
    }
  }

  validateSubmeshRanges(submeshes, vertexCount, indexCount);
  log.debug('Reading SKN', { version: `${major}.${minor}`, submeshes: submeshes.length, indexCount, vertexCount, vertexType });

  const rawIndices: number[] = new Array<number>(indexCount);
  for (let i = 0; i < indexCount; i++) {
    const index = cursor.readU16('SKN indices');
    if (index >= vertexCount) {
      throw CodecErrorFactory.invalidField(`indices[${i}]`, `< ${vertexCount}`, index);
    }
    rawIndices[i] = index;
  }
  if (indexCount % 3 !== 0) {
    log.warn(`Index count ${indexCount} is not a multiple of 3; trailing indices ignored`, { format: 'SKN' });
  }

  const cleaned = dropDegenerateTriangles(rawIndices, submeshes);
  submeshes = cleaned.submeshes;
  if (cleaned.dropped > 0) {
    log.debug(`Dropped ${cleaned.dropped} degenerate triangle(s)`, { format: 'SKN' });
  }

  const extraBytes = vertexType >= 1 ? (vertexType === 2 ? 20 : 4) : 0;
  const vertices: SkinnedVertex[] = [];
  for (let i = 0; i < vertexCount; i++) {
    const field = `vertices[${i}]`;
    const position = cursor.readVec3(`${field}.position`);
    const bones = cursor.readBytes(4, `${field}.influences`);
    const weights: [number, number, number, number] = [
      cursor.readF32(`${field}.weights`),
      cursor.readF32(`${field}.weights`),
      cursor.readF32(`${field}.weights`),
      cursor.readF32(`${field}.weights`),
    ];
    const normal = cursor.readVec3(`${field}.normal`);
    const uv = cursor.readVec2(`${field}.uv`);
    if (extraBytes > 0) {
      cursor.seekRelative(extraBytes);
    }
    vertices.push({
      position,
      normal,
      uv,
      influences: [bones[0], bones[1], bones[2], bones[3]],
      weights,
    });
  }

  return { version: { major, minor }, submeshes, vertices, indices: cleaned.indices };
}

function normalizeWeights(weights: readonly number[]): [number, number, number, number] {
  const sum = weights[0] + weights[1] + weights[2] + weights[3];
  if (!(sum > SKELETON.WEIGHT_EPSILON)) {
    return [1, 0, 0, 0];
  }
  return [weights[0] / sum, weights[1] / sum, weights[2] / sum, weights[3] / sum];
}

/**
 * Axis-aligned box plus the sphere around its center.
 */
function computeBounds(vertices: readonly { position: Vec3 }[]): { min: Vec3; max: Vec3; center: Vec3; radius: number } {
  if (vertices.length === 0) {
    return { min: [0, 0, 0], max: [0, 0, 0], center: [0, 0, 0], radius: 0 };
  }
  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];
  for (const { position } of vertices) {
    for (let axis = 0; axis < 3; axis++) {
      min[axis] = Math.min(min[axis], position[axis]);
      max[axis] = Math.max(max[axis], position[axis]);
    }
  }
  const center: Vec3 = [(min[0] + max[0]) / 2, (min[1] + max[1]) / 2, (min[2] + max[2]) / 2];
  let radius = 0;
  for (const { position } of vertices) {
    radius = Math.max(radius, Math.hypot(position[0] - center[0], position[1] - center[1], position[2] - center[2]));
  }
  return { min, max, center, radius };
}

/**
 * Writes a skinned mesh as major 1 (default) or major 4.
 */
export function writeMesh(mesh: SkinnedMeshInput, options: MeshWriteOptions & CodecOptions = {}): Uint8Array {
  const log = options.logger ?? defaultLogger;

  if (mesh.vertices.length > MESH_LIMITS.MAX_VERTEX_COUNT) {
    throw CodecErrorFactory.invalidField(
      'vertexCount',
      `at most ${MESH_LIMITS.MAX_VERTEX_COUNT}`,
      mesh.vertices.length,
      `Too many vertices: ${mesh.vertices.length}, u16 indices address at most ${MESH_LIMITS.MAX_VERTEX_COUNT}`
    );
  }
  if (mesh.submeshes.length > MESH_LIMITS.MAX_SUBMESH_COUNT) {
    throw CodecErrorFactory.invalidField('submeshCount', `at most ${MESH_LIMITS.MAX_SUBMESH_COUNT}`, mesh.submeshes.length);
  }

  const parsedOptions = MeshWriteOptionsSchema.safeParse(options);
  if (!parsedOptions.success) {
    throw CodecErrorFactory.schemaError('mesh options', parsedOptions.error);
  }
  const parsed = SkinnedMeshInputSchema.safeParse(mesh);
  if (!parsed.success) {
    throw CodecErrorFactory.schemaError('mesh', parsed.error);
  }
  const { major } = parsedOptions.data;
  const { vertices } = parsed.data;
  const vertexCount = vertices.length;

  if (parsed.data.indices.length % 3 !== 0) {
    throw CodecErrorFactory.invalidField('indexCount', 'a multiple of 3', parsed.data.indices.length);
  }
  parsed.data.indices.forEach((index, position) => {
    if (index >= vertexCount) {
      throw CodecErrorFactory.invalidField(`indices[${position}]`, `< ${vertexCount}`, index);
    }
  });
  validateSubmeshRanges(parsed.data.submeshes, vertexCount, parsed.data.indices.length);

  const { indices, submeshes, dropped } = dropDegenerateTriangles(parsed.data.indices, parsed.data.submeshes);
  if (dropped > 0) {
    log.debug(`Dropped ${dropped} degenerate triangle(s)`, { format: 'SKN' });
  }

  const writer = new BinaryWriter(64 + submeshes.length * 80 + indices.length * 2 + vertexCount * SKN.VERTEX_SIZE);
  writer.writeU32(SKN.MAGIC);
  writer.writeU16(major);
  writer.writeU16(SKN.DEFAULT_MINOR);
  writer.writeU32(submeshes.length);
  submeshes.forEach((submesh, index) => {
    writer.writeFixedString(submesh.name, MESH_LIMITS.SUBMESH_NAME_LENGTH, `submeshes[${index}].name`);
    writer.writeU32(submesh.vertexStart);
    writer.writeU32(submesh.vertexCount);
    writer.writeU32(submesh.indexStart);
    writer.writeU32(submesh.indexCount);
  });
  if (major >= 4) {
    writer.writeU32(0);
  }
  writer.writeU32(indices.length);
  writer.writeU32(vertexCount);
  if (major >= 4) {
    const bounds = computeBounds(vertices);
    writer.writeU32(SKN.VERTEX_SIZE);
    writer.writeU32(0);
    writer.writeVec3(bounds.min);
    writer.writeVec3(bounds.max);
    writer.writeVec3(bounds.center);
    writer.writeF32(bounds.radius);
  }

  for (const index of indices) {
    writer.writeU16(index);
  }

  for (const vertex of vertices) {
    writer.writeVec3(vertex.position);
    for (const bone of vertex.influences) {
      writer.writeU8(bone);
    }
    for (const weight of normalizeWeights(vertex.weights)) {
      writer.writeF32(weight);
    }
    writer.writeVec3(vertex.normal);
    writer.writeVec2(vertex.uv);
  }

  log.debug('Wrote SKN', { version: `${major}.${SKN.DEFAULT_MINOR}`, vertexCount, indexCount: indices.length });
  return writer.toUint8Array();
}
