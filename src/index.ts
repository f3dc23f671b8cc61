/**
 * r3d-asset-codec
 *
 * Reads and writes r3d2 skinned meshes, skeletons, animations, static meshes
 * and TEX/DDS textures, and exports them as glTF.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'r3d-asset-codec';
 *
 * const codec = defineConfig({ logLevel: 'debug' });
 *
 * const asset = codec.decodeFile('./assets/hero.skn');
 * if (asset.kind === 'skn') {
 *   console.log(asset.mesh.submeshes.map(s => s.name));
 * }
 * ```
 */

import { ZodError } from 'zod';
import { readAnimation, writeAnimation } from './codecs/anm';
import { readScb, readSco } from './codecs/scb';
import { readSkeleton, writeSkeleton } from './codecs/skl';
import { readMesh, writeMesh } from './codecs/skn';
import { decodeTexture, encodeTexture, readTextureContainer, type PixelSource } from './codecs/texture';
import { ANM, DDS, SCB, SCO, SKL, SKN, TEX } from './constants/formats';
import { FILE_EXTENSIONS } from './constants/config';
import { exportGlb, type GltfSceneInput } from './converters/gltf';
import { CodecErrorFactory } from './errors';
import { CodecConfigSchema, type CodecConfig, type ResolvedCodecConfig } from './schemas';
import type {
  Animation,
  AnimationInput,
  DecodedTexture,
  JointInput,
  Skeleton,
  SkeletonInput,
  SkinnedMesh,
  SkinnedMeshInput,
  StaticMesh,
  TextureDecodeOptions,
  TextureEncodeOptions,
  TextureFormat,
  TextureImage,
} from './types';
import { getBasenameWithoutExt, getExtension, readAssetFile, writeAssetFile } from './utils/file-utils';
import { createLogger, LogLevel, type Logger } from './utils/logger';

/**
 * Result of `decode`, tagged by the detected format
 */
export type DecodedAsset =
  | { kind: 'skn'; mesh: SkinnedMesh }
  | { kind: 'skl'; skeleton: Skeleton }
  | { kind: 'anm'; animation: Animation }
  | { kind: 'scb'; mesh: StaticMesh }
  | { kind: 'sco'; mesh: StaticMesh }
  | { kind: 'texture'; image: TextureImage };

export type AssetKind = DecodedAsset['kind'];

const LOG_LEVELS: Record<ResolvedCodecConfig['logLevel'], LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

const KIND_BY_EXTENSION: ReadonlyMap<string, AssetKind> = new Map<string, AssetKind>([
  [FILE_EXTENSIONS.SKN, 'skn'],
  [FILE_EXTENSIONS.SKL, 'skl'],
  [FILE_EXTENSIONS.ANM, 'anm'],
  [FILE_EXTENSIONS.SCB, 'scb'],
  [FILE_EXTENSIONS.SCO, 'sco'],
  [FILE_EXTENSIONS.TEX, 'texture'],
  [FILE_EXTENSIONS.DDS, 'texture'],
]);

function startsWithAscii(bytes: Uint8Array, text: string): boolean {
  if (bytes.length < text.length) return false;
  for (let i = 0; i < text.length; i++) {
    if (bytes[i] !== text.charCodeAt(i)) return false;
  }
  return true;
}

function u32At(bytes: Uint8Array, offset: number): number | undefined {
  if (bytes.length < offset + 4) return undefined;
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(offset, true);
}

/**
 * Identifies a buffer by its signature. Legacy animations carry none and
 * are only recognized through their extension.
 */
export function detectAssetKind(bytes: Uint8Array): AssetKind | undefined {
  if (startsWithAscii(bytes, ANM.COMPRESSED_MAGIC) || startsWithAscii(bytes, ANM.UNCOMPRESSED_MAGIC)) return 'anm';
  if (startsWithAscii(bytes, SCB.MAGIC)) return 'scb';
  if (startsWithAscii(bytes, SCO.BEGIN)) return 'sco';
  const first = u32At(bytes, 0);
  if (first === SKN.MAGIC) return 'skn';
  if (first === DDS.MAGIC || first === TEX.MAGIC) return 'texture';
  if (u32At(bytes, 4) === SKL.MAGIC) return 'skl';
  return undefined;
}

/**
 * Main codec class
 */
export class R3dCodec {
  private readonly config: ResolvedCodecConfig;
  private readonly logger: Logger;

  constructor(config: CodecConfig = {}) {
    try {
      this.config = CodecConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw CodecErrorFactory.configError(
          'Invalid configuration',
          'CodecConfig',
          { zodError: error }
        );
      }
      throw error;
    }

    this.logger = createLogger({
      level: this.config.debug ? LogLevel.DEBUG : LOG_LEVELS[this.config.logLevel],
      timestamp: true,
      duration: true,
      prefix: 'R3dCodec',
    });
    this.logger.logConfig({ ...this.config });
  }

  /**
   * Decodes any supported asset. The extension, when given, wins over the
   * signature.
   *
   * @param extension - e.g. '.anm'; needed for legacy animations
   */
  decode(bytes: Uint8Array, extension?: string): DecodedAsset {
    const kind = (extension ? KIND_BY_EXTENSION.get(extension.toLowerCase()) : undefined) ?? detectAssetKind(bytes);
    const options = { logger: this.logger };

    switch (kind) {
      case 'skn':
        return { kind, mesh: readMesh(bytes, options) };
      case 'skl':
        return { kind, skeleton: readSkeleton(bytes, options) };
      case 'anm':
        return { kind, animation: readAnimation(bytes, options) };
      case 'scb':
        return { kind, mesh: readScb(bytes, options) };
      case 'sco':
        return { kind, mesh: readSco(bytes, options) };
      case 'texture':
        return { kind, image: readTextureContainer(bytes, options) };
      case undefined:
        throw CodecErrorFactory.malformedHeader(
          'asset',
          'a known signature or extension',
          extension ?? Array.from(bytes.subarray(0, 8), byte => byte.toString(16).padStart(2, '0')).join(' ')
        );
    }
  }

  /**
   * Reads and decodes a file; static meshes are named after the file.
   */
  decodeFile(filePath: string): DecodedAsset {
    const bytes = readAssetFile(filePath);
    const asset = this.decode(bytes, getExtension(filePath));
    if ((asset.kind === 'scb' || asset.kind === 'sco') && asset.mesh.name === '') {
      asset.mesh.name = getBasenameWithoutExt(filePath);
    }
    return asset;
  }

  readMesh(bytes: Uint8Array): SkinnedMesh {
    return readMesh(bytes, { logger: this.logger });
  }

  writeMesh(mesh: SkinnedMeshInput): Uint8Array {
    return writeMesh(mesh, { major: this.config.sknWriteMajor, logger: this.logger });
  }

  readSkeleton(bytes: Uint8Array): Skeleton {
    return readSkeleton(bytes, { logger: this.logger });
  }

  writeSkeleton(input: SkeletonInput | JointInput[]): Uint8Array {
    return writeSkeleton(input, { logger: this.logger });
  }

  readAnimation(bytes: Uint8Array): Animation {
    return readAnimation(bytes, { logger: this.logger });
  }

  /**
   * Writes v4; `fps` falls back to the configured default.
   */
  writeAnimation(input: Omit<AnimationInput, 'fps'> & { fps?: number }): Uint8Array {
    return writeAnimation({ ...input, fps: input.fps ?? this.config.defaultFps }, { logger: this.logger });
  }

  decodeTexture(bytes: Uint8Array, options: TextureDecodeOptions = {}): DecodedTexture {
    return decodeTexture(bytes, { maxPixelCount: this.config.maxPixelCount, ...options, logger: this.logger });
  }

  encodeTexture(
    pixels: PixelSource,
    width: number,
    height: number,
    targetFormat: TextureFormat,
    options: TextureEncodeOptions = {}
  ): Uint8Array {
    return encodeTexture(pixels, width, height, targetFormat, { ...options, logger: this.logger });
  }

  exportGlb(input: GltfSceneInput): Promise<Uint8Array> {
    return exportGlb(input, { logger: this.logger });
  }

  /**
   * Writes bytes to a file, creating directories as needed
   */
  writeFile(filePath: string, bytes: Uint8Array): void {
    writeAssetFile(filePath, bytes);
    this.logger.debug(`Wrote ${filePath}`, { byteLength: bytes.length });
  }

  /**
   * Get current configuration
   */
  getConfig(): ResolvedCodecConfig {
    return { ...this.config };
  }
}

/**
 * Create codec instance with configuration
 *
 * @example
 * ```typescript
 * const codec = defineConfig({ maxPixelCount: 4096 * 4096 });
 * const texture = codec.decodeTexture(bytes);
 * ```
 */
export function defineConfig(config: CodecConfig = {}): R3dCodec {
  return new R3dCodec(config);
}

/**
 * TypeScript type exports
 */
export type * from './types';

/**
 * Direct codec exports
 */
export { findTrack, readAnimation, writeAnimation } from './codecs/anm';
export { readScb, readSco, type StaticMeshReadOptions } from './codecs/scb';
export { computeGlobalTransforms, computeInverseBindTransforms, readSkeleton, writeSkeleton } from './codecs/skl';
export { readMesh, writeMesh } from './codecs/skn';
export { packQuat, unpackQuat } from './codecs/quat/quantized-quat';
export {
  ddsToTex,
  decodeImage,
  decodeTexture,
  encodeImage,
  encodeTexture,
  readDds,
  readTex,
  readTextureContainer,
  texToDds,
  writeDds,
  writeTex,
} from './codecs/texture';
export { buildGltfDocument, exportGlb } from './converters/gltf';
export { BinaryCursor, BinaryWriter } from './utils/binary-cursor';
export { elfHash } from './utils/elf-hash';
export { createLogger, Logger, LogLevel, type LoggerContext, type LoggerOptions } from './utils/logger';
export * from './errors';
export {
  AnimationInputSchema,
  CodecConfigSchema,
  JointInputSchema,
  SkinnedMeshInputSchema,
} from './schemas';
