/**
 * File Utilities
 *
 * Utility functions for file system operations.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CodecErrorFactory } from '../errors';

/**
 * Check if path exists
 */
export function pathExists(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Lower-cased extension including the dot
 * Example: "/path/to/Idle.ANM" -> ".anm"
 */
export function getExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * Get basename of file without extension
 * Example: "/path/to/annie.skn" -> "annie"
 */
export function getBasenameWithoutExt(filePath: string): string {
  const basename = path.basename(filePath);
  return basename.replace(/\.[^/.]+$/, '');
}

/**
 * Reads a whole asset file into memory
 */
export function readAssetFile(filePath: string): Uint8Array {
  const resolved = path.resolve(filePath);
  if (!pathExists(resolved)) {
    throw CodecErrorFactory.fileSystemError(`File not found: ${resolved}`, resolved, 'read');
  }
  try {
    const buffer = fs.readFileSync(resolved);
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  } catch (error) {
    throw CodecErrorFactory.fileSystemError(
      `Failed to read ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
      resolved,
      'read'
    );
  }
}

/**
 * Writes bytes to a file, creating parent directories
 */
export function writeAssetFile(filePath: string, bytes: Uint8Array): void {
  const resolved = path.resolve(filePath);
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, bytes);
  } catch (error) {
    throw CodecErrorFactory.fileSystemError(
      `Failed to write ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
      resolved,
      'write'
    );
  }
}
