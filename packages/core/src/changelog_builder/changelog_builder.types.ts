import type { IGitModule, CommitRecord } from '../git';
import type { Logger } from '../logger';

/**
 * Closed set of changelog categories, in display order.
 */
export const CHANGELOG_CATEGORIES = [
  'features',
  'fixes',
  'maintenance',
  'documentation',
  'other',
] as const;

export type ChangelogCategory = typeof CHANGELOG_CATEGORIES[number];

/**
 * Result of classifying one commit subject.
 */
export type ClassifiedSubject = {
  category: ChangelogCategory;
  /** Subject with the recognized prefix removed, or the subject verbatim */
  text: string;
};

/**
 * Where commit hashes link to: `<serverUrl>/<repository>/commit/<hash>`.
 */
export type CommitLinkOptions = {
  /** e.g. https://github.com */
  serverUrl: string;
  /** owner/repo */
  repository: string;
};

/**
 * One rendered block of the changelog. Never empty.
 */
export type ChangelogSection = {
  category: ChangelogCategory;
  heading: string;
  lines: string[];
};

export type ChangelogDocument = {
  releaseTag: string;
  previousTag: string;
  /** YYYY.MM prefix of the release tag, null when the tag does not match */
  releaseFamily: string | null;
  sections: ChangelogSection[];
};

export type ChangelogBuilderOptions = {
  releaseTag: string;
  previousTag: string;
  links: CommitLinkOptions;
  /** Reject release tags without a YYYY.MM family instead of dropping the label */
  strict?: boolean;
};

export type ChangelogGeneratorDependencies = {
  git: IGitModule;
  logger?: Logger;
};

export type GenerateChangelogOptions = ChangelogBuilderOptions;

export type GeneratedChangelog = {
  document: ChangelogDocument;
  /** Rendered markdown, ending in a newline */
  markdown: string;
  commits: CommitRecord[];
};

export interface IChangelogGenerator {
  generate(options: GenerateChangelogOptions): Promise<GeneratedChangelog>;
}
