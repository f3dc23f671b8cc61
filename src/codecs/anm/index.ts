import type { Animation, AnimationTrack } from '../../types';
import { elfHash } from '../../utils/elf-hash';

/**
 * Looks a track up by joint name (hashed, case-insensitive) or by hash.
 */
export function findTrack(animation: Animation, nameOrHash: string | number): AnimationTrack | undefined {
  const hash = typeof nameOrHash === 'number' ? nameOrHash >>> 0 : elfHash(nameOrHash);
  return animation.tracks.find(track => track.jointHash === hash);
}

export { readAnimation } from './anm-reader';
export { RoundedPalette, writeAnimation } from './anm-writer';
export { readAnmHeader, type AnmHeader } from './anm-header';
