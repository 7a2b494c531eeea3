/**
 * Release Tag Utilities
 *
 * Classification and ordering of version tags shaped like
 * `2024.10.0`, `2024.10.1` or `2024.10.0.dev3`.
 *
 * @module release_tag
 */

import type { LatestTags, TagLineage } from './release_tag.types';

const DEV_MARKER = '.dev';
const RELEASE_FAMILY_PATTERN = /^[0-9]{4}\.[0-9]{1,2}/;
const VERSION_CHUNK_PATTERN = /\d+|\D+/g;
const DIGITS_PATTERN = /^\d+$/;

/**
 * Returns true for pre-release tags (any tag containing `.dev`).
 *
 * @example
 * isDevTag('2024.10.0.dev1') // true
 * isDevTag('2024.10.0')      // false
 */
export function isDevTag(tag: string): boolean {
  return tag.includes(DEV_MARKER);
}

export function getTagLineage(tag: string): TagLineage {
  return isDevTag(tag) ? 'dev' : 'stable';
}

/**
 * Extracts the `YYYY.MM` release family from a tag.
 *
 * @returns The family, or null when the tag does not start with one
 *
 * @example
 * getReleaseFamily('2024.10.0')      // '2024.10'
 * getReleaseFamily('2025.4.0.dev0')  // '2025.4'
 * getReleaseFamily('v1.2.3')         // null
 */
export function getReleaseFamily(tag: string): string | null {
  const match = RELEASE_FAMILY_PATTERN.exec(tag);
  return match ? match[0] : null;
}

/**
 * Compares two version strings by precedence, in the manner of `sort -V`:
 * runs of digits compare numerically, everything else lexically, and a
 * string that is a prefix of the other sorts first.
 *
 * @returns Negative when `a` precedes `b`, positive when it follows, 0 when equal
 *
 * @example
 * compareVersions('2024.9.0', '2024.10.0')             // < 0
 * compareVersions('2024.10.0.dev10', '2024.10.0.dev2') // > 0
 */
export function compareVersions(a: string, b: string): number {
  const chunksA = a.match(VERSION_CHUNK_PATTERN) ?? [];
  const chunksB = b.match(VERSION_CHUNK_PATTERN) ?? [];
  const length = Math.min(chunksA.length, chunksB.length);

  for (let i = 0; i < length; i++) {
    const chunkA = chunksA[i] ?? '';
    const chunkB = chunksB[i] ?? '';
    if (chunkA === chunkB) {
      continue;
    }

    const isNumericA = DIGITS_PATTERN.test(chunkA);
    const isNumericB = DIGITS_PATTERN.test(chunkB);

    if (isNumericA && isNumericB) {
      const diff = compareNumericChunks(chunkA, chunkB);
      if (diff !== 0) {
        return diff;
      }
      continue;
    }

    // Digits sort before non-digits at the same position
    if (isNumericA !== isNumericB) {
      return isNumericA ? -1 : 1;
    }

    return chunkA < chunkB ? -1 : 1;
  }

  if (chunksA.length !== chunksB.length) {
    return chunksA.length - chunksB.length;
  }
  // Equal precedence ("2024.01" vs "2024.1"): fall back to plain order so sorting stays total
  return a === b ? 0 : a < b ? -1 : 1;
}

/**
 * Compares digit runs of arbitrary length without converting to numbers.
 */
function compareNumericChunks(a: string, b: string): number {
  const trimmedA = a.replace(/^0+(?=\d)/, '');
  const trimmedB = b.replace(/^0+(?=\d)/, '');
  if (trimmedA.length !== trimmedB.length) {
    return trimmedA.length - trimmedB.length;
  }
  return trimmedA === trimmedB ? 0 : trimmedA < trimmedB ? -1 : 1;
}

/**
 * Returns the highest-precedence tag accepted by `predicate`, or null.
 */
export function findHighestTag(
  tags: readonly string[],
  predicate: (tag: string) => boolean = () => true
): string | null {
  let highest: string | null = null;
  for (const tag of tags) {
    if (!predicate(tag)) {
      continue;
    }
    if (highest === null || compareVersions(tag, highest) > 0) {
      highest = tag;
    }
  }
  return highest;
}

/**
 * Finds the latest dev tag and latest stable tag of a tag set.
 *
 * @example
 * getLatestTags(['2024.5.0', '2024.10.0', '2025.4.0.dev0'])
 * // => { latestDevTag: '2025.4.0.dev0', latestStableTag: '2024.10.0' }
 */
export function getLatestTags(tags: readonly string[]): LatestTags {
  return {
    latestDevTag: findHighestTag(tags, isDevTag),
    latestStableTag: findHighestTag(tags, (tag) => !isDevTag(tag)),
  };
}
