/**
 * glTF Export
 *
 * Main entry point for building glTF / GLB output from decoded assets.
 */

export {
  buildGltfDocument,
  encodePng,
  exportGlb,
  type GltfSceneInput,
  type NamedAnimation,
} from './gltf-exporter';
