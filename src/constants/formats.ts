/**
 * Format Constants
 *
 * Magic numbers, header sizes and enum codes of the supported file formats.
 */

/**
 * Skinned mesh (.skn)
 */
export const SKN = {
  MAGIC: 0x00112233,
  LEGACY_BASE_SUBMESH: 'Base',
  VERTEX_SIZE: 52,
  DEFAULT_MINOR: 1,
  BOUNDS_SIZE: 40,
} as const;

/**
 * Skeleton (.skl)
 */
export const SKL = {
  MAGIC: 0x22fd4fc3,
  VERSION: 0,
  HEADER_SIZE: 64,
  JOINT_SIZE: 100,
  JOINT_INDEX_SIZE: 8,
  RESERVED_OFFSET: 0xffffffff,
} as const;

/**
 * Animation (.anm)
 */
export const ANM = {
  COMPRESSED_MAGIC: 'r3d2canm',
  UNCOMPRESSED_MAGIC: 'r3d2anmd',
  FORMAT_TOKEN: 0xbe0794d3,
  // Section offsets are stored relative to the end of magic + version
  OFFSET_BASE: 12,
  V4_VECTORS_OFFSET: 64,
  V4_FRAME_SIZE: 16,
} as const;

/**
 * Static mesh (.scb / .sco)
 */
export const SCB = {
  MAGIC: 'r3d2Mesh',
  NAME_LENGTH: 128,
  MATERIAL_LENGTH: 64,
  DEFAULT_MATERIAL: 'lambert1',
} as const;

export const SCO = {
  BEGIN: '[ObjectBegin]',
  END: '[ObjectEnd]',
} as const;

/**
 * Texture container (.tex)
 */
export const TEX = {
  MAGIC: 0x00584554,
  HEADER_SIZE: 12,
  RESERVED: 1,
} as const;

/**
 * On-disk format codes of the texture container
 */
export const TEX_FORMAT_CODES = {
  dxt1: 10,
  dxt5: 12,
  bgra8: 20,
} as const;

/**
 * DirectDraw Surface (.dds)
 */
export const DDS = {
  MAGIC: 0x20534444,
  HEADER_SIZE: 124,
  PIXEL_FORMAT_SIZE: 32,
  DX10_HEADER_SIZE: 20,
  DATA_OFFSET: 128,
  FOURCC_DXT1: 0x31545844,
  FOURCC_DXT5: 0x35545844,
  FOURCC_DX10: 0x30315844,
  DXGI_BC1_UNORM: 71,
  DXGI_BC3_UNORM: 77,
} as const;

export const DDS_FLAGS = {
  MIPMAPCOUNT: 0x20000,
  // CAPS | HEIGHT | WIDTH | PIXELFORMAT
  REQUIRED: 0x1007,
} as const;

export const DDS_PIXEL_FLAGS = {
  FOURCC: 0x4,
  // RGB (0x40) | ALPHAPIXELS (0x1)
  RGBA: 0x41,
} as const;

export const DDS_CAPS = {
  COMPLEX: 0x8,
  TEXTURE: 0x1000,
  MIPMAP: 0x400000,
} as const;

/**
 * Canonical single-byte channel masks of a 32-bit pixel, mapped to byte position
 */
export const DDS_MASK_TO_BYTE: ReadonlyMap<number, number> = new Map([
  [0x000000ff, 0],
  [0x0000ff00, 1],
  [0x00ff0000, 2],
  [0xff000000, 3],
]);

/**
 * Bytes per 4x4 block (compressed) or per texel (bgra8)
 */
export const BLOCK_BYTES = {
  dxt1: 8,
  dxt5: 16,
  bgra8: 4,
} as const;

export const BLOCK_DIMENSION = 4;
