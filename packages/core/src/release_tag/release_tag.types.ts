/**
 * Types for release tags of the form `YYYY.MM[.patch][.devN]`.
 */

/** Which release lineage a tag belongs to */
export type TagLineage = 'dev' | 'stable';

/**
 * Latest tag of each lineage in a tag set.
 */
export type LatestTags = {
  /** Highest-precedence tag containing `.dev` */
  latestDevTag: string | null;
  /** Highest-precedence tag without `.dev` */
  latestStableTag: string | null;
};
