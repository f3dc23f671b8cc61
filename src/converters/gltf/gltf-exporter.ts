/**
 * glTF Exporter
 *
 * Builds a glTF document from decoded assets: skinned mesh, optional
 * skeleton (joints become nodes, inverse binds go to the skin), sampled
 * animations and a PNG base color texture.
 */

import {
  Accessor,
  Document,
  Material,
  Node,
  NodeIO,
  Skin,
  type Buffer as GltfBuffer,
} from '@gltf-transform/core';
import { PNG } from 'pngjs';
import { SKELETON } from '../../constants/skeleton';
import { CodecErrorFactory } from '../../errors';
import type {
  Animation,
  CodecOptions,
  DecodedTexture,
  Skeleton,
  SkinnedMesh,
} from '../../types';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { composeMatrix } from '../../utils/matrix-utils';

export interface NamedAnimation {
  name: string;
  animation: Animation;
}

export interface GltfSceneInput {
  mesh: SkinnedMesh;
  skeleton?: Skeleton;
  animations?: NamedAnimation[];
  texture?: DecodedTexture;
  /**
   * Scene and mesh node name
   */
  name?: string;
}

type PosePath = 'translation' | 'rotation' | 'scale';

const POSE_PATHS: readonly PosePath[] = ['translation', 'rotation', 'scale'];

function createAccessor(
  document: Document,
  buffer: GltfBuffer,
  type: 'SCALAR' | 'VEC2' | 'VEC3' | 'VEC4' | 'MAT4',
  array: Float32Array | Uint16Array | Uint32Array
): Accessor {
  return document.createAccessor().setType(type).setArray(array).setBuffer(buffer);
}

/**
 * Encodes RGBA pixels as PNG with rows top-down.
 */
export function encodePng(texture: DecodedTexture): Uint8Array {
  const { width, height, pixels, rowOrder } = texture;
  const png = new PNG({ width, height });
  const rowBytes = width * 4;
  for (let y = 0; y < height; y++) {
    const sourceRow = rowOrder === 'bottom-up' ? height - 1 - y : y;
    for (let x = 0; x < rowBytes; x++) {
      const value = pixels[sourceRow * rowBytes + x];
      png.data[y * rowBytes + x] = pixels instanceof Float32Array
        ? Math.round(Math.min(1, Math.max(0, value)) * 255)
        : value;
    }
  }
  return PNG.sync.write(png);
}

function buildJointNodes(document: Document, skeleton: Skeleton, buffer: GltfBuffer): { nodes: Node[]; skin: Skin } {
  const nodes = skeleton.joints.map(joint =>
    document
      .createNode(joint.name)
      .setTranslation(joint.local.translation)
      .setRotation(joint.local.rotation)
      .setScale(joint.local.scale)
  );

  skeleton.joints.forEach((joint, index) => {
    if (joint.parentIndex >= 0) {
      nodes[joint.parentIndex].addChild(nodes[index]);
    }
  });

  const inverseBinds = new Float32Array(skeleton.joints.length * 16);
  skeleton.joints.forEach((joint, index) => {
    inverseBinds.set(composeMatrix(joint.inverseBind), index * 16);
  });

  const skin = document.createSkin('skin').setInverseBindMatrices(createAccessor(document, buffer, 'MAT4', inverseBinds));
  for (const node of nodes) {
    skin.addJoint(node);
  }
  const root = skeleton.joints.findIndex(joint => joint.parentIndex < 0);
  if (root >= 0) {
    skin.setSkeleton(nodes[root]);
  }
  return { nodes, skin };
}

function buildSkinAttributes(mesh: SkinnedMesh, skeleton: Skeleton): { joints: Uint16Array; weights: Float32Array } {
  const joints = new Uint16Array(mesh.vertices.length * 4);
  const weights = new Float32Array(mesh.vertices.length * 4);
  const influenceTable = skeleton.influences.length > 0 ? skeleton.influences : skeleton.joints.map((_, index) => index);

  mesh.vertices.forEach((vertex, v) => {
    const sum = vertex.weights[0] + vertex.weights[1] + vertex.weights[2] + vertex.weights[3];
    for (let slot = 0; slot < 4; slot++) {
      const bone = vertex.influences[slot];
      const weight = sum > SKELETON.WEIGHT_EPSILON ? vertex.weights[slot] / sum : slot === 0 ? 1 : 0;
      if (weight === 0) continue;
      if (bone >= influenceTable.length) {
        throw CodecErrorFactory.invalidField(`vertices[${v}].influences[${slot}]`, `< ${influenceTable.length}`, bone);
      }
      joints[v * 4 + slot] = influenceTable[bone];
      weights[v * 4 + slot] = weight;
    }
  });
  return { joints, weights };
}

function buildMaterials(document: Document, mesh: SkinnedMesh, texture: DecodedTexture | undefined): Material[] {
  const baseColor = texture
    ? document.createTexture('baseColor').setImage(encodePng(texture)).setMimeType('image/png')
    : null;
  return mesh.submeshes.map(submesh => {
    const material = document.createMaterial(submesh.name);
    if (baseColor) {
      material.setBaseColorTexture(baseColor);
    }
    return material;
  });
}

function buildAnimation(
  document: Document,
  buffer: GltfBuffer,
  { name, animation }: NamedAnimation,
  nodeByHash: Map<number, Node>,
  log: Logger
): void {
  const gltfAnimation = document.createAnimation(name);
  let skipped = 0;

  for (const track of animation.tracks) {
    const node = nodeByHash.get(track.jointHash);
    if (!node) {
      skipped++;
      continue;
    }
    const frames = [...track.poses.keys()].sort((a, b) => a - b);

    for (const path of POSE_PATHS) {
      const times: number[] = [];
      const values: number[] = [];
      for (const frame of frames) {
        const value = track.poses.get(frame)?.[path];
        if (!value) continue;
        times.push(frame / animation.fps);
        values.push(...value);
      }
      if (times.length === 0) continue;

      const sampler = document
        .createAnimationSampler()
        .setInput(createAccessor(document, buffer, 'SCALAR', new Float32Array(times)))
        .setOutput(createAccessor(document, buffer, path === 'rotation' ? 'VEC4' : 'VEC3', new Float32Array(values)))
        .setInterpolation('LINEAR');
      const channel = document.createAnimationChannel().setTargetNode(node).setTargetPath(path).setSampler(sampler);
      gltfAnimation.addSampler(sampler).addChannel(channel);
    }
  }

  if (skipped > 0) {
    log.warn(`Animation '${name}': ${skipped} track(s) match no joint`, { format: 'glTF' });
  }
}

/**
 * Builds a glTF document; one primitive per submesh.
 */
export function buildGltfDocument(input: GltfSceneInput, options: CodecOptions = {}): Document {
  const log = options.logger ?? defaultLogger;
  const { mesh, skeleton } = input;
  const name = input.name ?? 'mesh';

  const document = new Document();
  const buffer = document.createBuffer();
  const scene = document.createScene(name);

  const positions = new Float32Array(mesh.vertices.length * 3);
  const normals = new Float32Array(mesh.vertices.length * 3);
  const uvs = new Float32Array(mesh.vertices.length * 2);
  mesh.vertices.forEach((vertex, v) => {
    positions.set(vertex.position, v * 3);
    normals.set(vertex.normal, v * 3);
    uvs.set(vertex.uv, v * 2);
  });

  const position = createAccessor(document, buffer, 'VEC3', positions);
  const normal = createAccessor(document, buffer, 'VEC3', normals);
  const texcoord = createAccessor(document, buffer, 'VEC2', uvs);
  const skinAttributes = skeleton
    ? buildSkinAttributes(mesh, skeleton)
    : null;
  const jointsAccessor = skinAttributes ? createAccessor(document, buffer, 'VEC4', skinAttributes.joints) : null;
  const weightsAccessor = skinAttributes ? createAccessor(document, buffer, 'VEC4', skinAttributes.weights) : null;

  const materials = buildMaterials(document, mesh, input.texture);
  const gltfMesh = document.createMesh(name);
  mesh.submeshes.forEach((submesh, index) => {
    const indices = new Uint32Array(mesh.indices.slice(submesh.indexStart, submesh.indexStart + submesh.indexCount));
    const primitive = document
      .createPrimitive()
      .setAttribute('POSITION', position)
      .setAttribute('NORMAL', normal)
      .setAttribute('TEXCOORD_0', texcoord)
      .setIndices(createAccessor(document, buffer, 'SCALAR', indices))
      .setMaterial(materials[index]);
    if (jointsAccessor && weightsAccessor) {
      primitive.setAttribute('JOINTS_0', jointsAccessor).setAttribute('WEIGHTS_0', weightsAccessor);
    }
    gltfMesh.addPrimitive(primitive);
  });

  const meshNode = document.createNode(name).setMesh(gltfMesh);
  scene.addChild(meshNode);

  if (skeleton) {
    const { nodes, skin } = buildJointNodes(document, skeleton, buffer);
    meshNode.setSkin(skin);
    skeleton.joints.forEach((joint, index) => {
      if (joint.parentIndex < 0) scene.addChild(nodes[index]);
    });

    const nodeByHash = new Map<number, Node>();
    skeleton.joints.forEach((joint, index) => nodeByHash.set(joint.hash, nodes[index]));
    for (const animation of input.animations ?? []) {
      buildAnimation(document, buffer, animation, nodeByHash, log);
    }
  } else if (input.animations && input.animations.length > 0) {
    log.warn('Animations need a skeleton and were not exported', { format: 'glTF' });
  }

  log.debug('Built glTF document', {
    format: 'glTF',
    submeshes: mesh.submeshes.length,
    joints: skeleton?.joints.length ?? 0,
    animations: input.animations?.length ?? 0,
  });
  return document;
}

/**
 * Serializes the scene as GLB.
 */
export async function exportGlb(input: GltfSceneInput, options: CodecOptions = {}): Promise<Uint8Array> {
  const log = options.logger ?? defaultLogger;
  const document = buildGltfDocument(input, options);
  return log.withTiming('exportGlb', () => new NodeIO().writeBinary(document), { format: 'glTF' });
}
