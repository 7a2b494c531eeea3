/**
 * Release tag model: lineage classification, release family and precedence.
 *
 * @module release_tag
 */

export {
  isDevTag,
  getTagLineage,
  getReleaseFamily,
  compareVersions,
  findHighestTag,
  getLatestTags,
} from './release_tag';

export type { TagLineage, LatestTags } from './release_tag.types';

export { InvalidReleaseTagError } from './errors';
