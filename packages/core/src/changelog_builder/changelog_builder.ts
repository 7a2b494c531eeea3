import type { CommitRecord } from '../git';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { getReleaseFamily, InvalidReleaseTagError } from '../release_tag';
import { CHANGELOG_CATEGORIES } from './changelog_builder.types';
import type {
  ChangelogBuilderOptions,
  ChangelogCategory,
  ChangelogDocument,
  ChangelogSection,
  ClassifiedSubject,
  CommitLinkOptions,
} from './changelog_builder.types';

export const CATEGORY_HEADINGS: Record<ChangelogCategory, string> = {
  features: '✨ New features',
  fixes: '🐛 Bug fixes',
  maintenance: '🔧 Maintenance',
  documentation: '📚 Documentation',
  other: '🔄 Other changes',
};

const PREFIX_CATEGORIES: Record<string, ChangelogCategory> = {
  ENH: 'features',
  IMP: 'features',
  ADD: 'features',
  BUG: 'fixes',
  FIX: 'fixes',
  MAINT: 'maintenance',
  CI: 'maintenance',
  TEST: 'maintenance',
  DOC: 'documentation',
};

const PREFIX_PATTERN = /^(ENH|IMP|ADD|BUG|FIX|MAINT|CI|TEST|DOC):\s*/i;

/**
 * Maps a commit subject to its category by its `PREFIX:` marker.
 * Total: subjects without a recognized prefix land in "other", unchanged.
 */
export function classifyCommit(subject: string): ClassifiedSubject {
  const match = PREFIX_PATTERN.exec(subject);
  const prefix = match?.[1];
  const category = prefix ? PREFIX_CATEGORIES[prefix.toUpperCase()] : undefined;

  if (!match || !category) {
    return { category: 'other', text: subject };
  }

  const rest = subject.slice(match[0].length);
  return { category, text: rest.charAt(0).toLowerCase() + rest.slice(1) };
}

export function buildCommitUrl(hash: string, links: CommitLinkOptions): string {
  const serverUrl = links.serverUrl.replace(/\/+$/, '');
  return `${serverUrl}/${links.repository}/commit/${hash}`;
}

export function formatCommitLine(text: string, hash: string, links: CommitLinkOptions): string {
  return `- ${text} ([${hash}](${buildCommitUrl(hash, links)}))`;
}

/**
 * ChangelogBuilder - Accumulates classified commits for one release
 *
 * Owns one ordered list of lines per category. Commits keep the order in
 * which they are added; categories render in fixed display order.
 */
export class ChangelogBuilder {
  private readonly options: ChangelogBuilderOptions;
  private readonly releaseFamily: string | null;
  private readonly entries: Record<ChangelogCategory, string[]> = {
    features: [],
    fixes: [],
    maintenance: [],
    documentation: [],
    other: [],
  };

  constructor(options: ChangelogBuilderOptions, logger: Logger = createLogger('[ChangelogBuilder] ')) {
    if (!options.releaseTag) {
      throw new InvalidReleaseTagError('No release tag provided', options.releaseTag);
    }

    this.options = options;
    this.releaseFamily = getReleaseFamily(options.releaseTag);

    if (this.releaseFamily === null) {
      if (options.strict) {
        throw new InvalidReleaseTagError(
          `Release tag "${options.releaseTag}" does not start with a YYYY.MM release family`,
          options.releaseTag
        );
      }
      logger.warn(`Release tag "${options.releaseTag}" has no YYYY.MM release family, omitting it from the heading`);
    }
  }

  add(commit: CommitRecord): ChangelogCategory {
    const { category, text } = classifyCommit(commit.subject);
    this.entries[category].push(formatCommitLine(text, commit.hash, this.options.links));
    return category;
  }

  addAll(commits: readonly CommitRecord[]): this {
    for (const commit of commits) {
      this.add(commit);
    }
    return this;
  }

  build(): ChangelogDocument {
    const sections: ChangelogSection[] = [];
    for (const category of CHANGELOG_CATEGORIES) {
      const lines = this.entries[category];
      if (lines.length > 0) {
        sections.push({ category, heading: CATEGORY_HEADINGS[category], lines: [...lines] });
      }
    }

    return {
      releaseTag: this.options.releaseTag,
      previousTag: this.options.previousTag,
      releaseFamily: this.releaseFamily,
      sections,
    };
  }
}

/**
 * Renders a changelog document to markdown. Every section is followed by a
 * blank line and the output always ends in a newline.
 */
export function renderChangelog(document: ChangelogDocument): string {
  const title = document.releaseFamily
    ? `# 📋 ${document.releaseFamily} Changelog`
    : '# 📋 Changelog';

  let markdown = `${title}\n\n`;
  for (const section of document.sections) {
    markdown += `## ${section.heading}\n`;
    markdown += section.lines.map((line) => `${line}\n`).join('');
    markdown += '\n';
  }
  return markdown;
}
