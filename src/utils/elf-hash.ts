/**
 * ELF Hash
 *
 * Case-insensitive 32-bit name hash used to match joints between skeleton
 * and animation files.
 */

export function elfHash(name: string): number {
  const lower = name.toLowerCase();
  let h = 0;
  for (let i = 0; i < lower.length; i++) {
    h = ((h << 4) + lower.charCodeAt(i)) >>> 0;
    const high = h & 0xf0000000;
    if (high !== 0) {
      h ^= high >>> 24;
    }
    h &= ~high;
    h >>>= 0;
  }
  return h;
}
