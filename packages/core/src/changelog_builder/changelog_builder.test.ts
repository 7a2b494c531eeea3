/**
 * Changelog Builder Unit Tests
 *
 * EARS Blocks:
 * - A: Classification
 * - B: Line formatting
 * - C: Accumulation and rendering
 * - D: Release family handling
 * - E: ChangelogGenerator over a commit range
 */

import {
  ChangelogBuilder,
  ChangelogGenerator,
  classifyCommit,
  formatCommitLine,
  renderChangelog,
} from './index';
import type { CommitLinkOptions } from './index';
import type { CommitRecord } from '../git';
import { MemoryGitModule } from '../git/memory';
import { InvalidReleaseTagError } from '../release_tag';
import type { Logger } from '../logger';

const links: CommitLinkOptions = {
  serverUrl: 'https://github.com',
  repository: 'example-org/example-plugin',
};

function commit(hash: string, subject: string): CommitRecord {
  return { hash, subject, authorName: 'Test User', authorEmail: 'test@example.com' };
}

function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

describe('ChangelogBuilder', () => {
  describe('4.1. Classification (EARS-A1 to EARS-A5)', () => {
    it.each([
      ['ENH: add widget', 'features', 'add widget'],
      ['IMP: Faster startup', 'features', 'faster startup'],
      ['ADD: new reader', 'features', 'new reader'],
      ['BUG: crash on empty input', 'fixes', 'crash on empty input'],
      ['FIX: broken parser', 'fixes', 'broken parser'],
      ['MAINT: bump dependencies', 'maintenance', 'bump dependencies'],
      ['CI: cache wheels', 'maintenance', 'cache wheels'],
      ['TEST: cover edge case', 'maintenance', 'cover edge case'],
      ['DOC: Fix typo in README', 'documentation', 'fix typo in README'],
    ])('[EARS-A1] should classify "%s" as %s', (subject, category, text) => {
      expect(classifyCommit(subject)).toEqual({ category, text });
    });

    it('[EARS-A2] should match prefixes case-insensitively', () => {
      expect(classifyCommit('fix: Handle nulls')).toEqual({ category: 'fixes', text: 'handle nulls' });
      expect(classifyCommit('Enh: Widget')).toEqual({ category: 'features', text: 'widget' });
    });

    it('[EARS-A3] should keep unmatched subjects verbatim under other changes', () => {
      expect(classifyCommit('Refactor internals')).toEqual({ category: 'other', text: 'Refactor internals' });
      expect(classifyCommit('Merge pull request #12 from fork/branch')).toEqual({
        category: 'other',
        text: 'Merge pull request #12 from fork/branch',
      });
    });

    it('[EARS-A4] should require the colon right after a known prefix', () => {
      expect(classifyCommit('FIXUP: squash me').category).toBe('other');
      expect(classifyCommit('DOCS: guide').category).toBe('other');
      expect(classifyCommit('fix the build').category).toBe('other');
      expect(classifyCommit(' FIX: leading space').category).toBe('other');
    });

    it('[EARS-A5] should be deterministic for the same subject', () => {
      const first = classifyCommit('MAINT: Tidy up');
      const second = classifyCommit('MAINT: Tidy up');

      expect(second).toEqual(first);
      expect(first).toEqual({ category: 'maintenance', text: 'tidy up' });
    });
  });

  describe('4.2. Line formatting (EARS-B1 to EARS-B2)', () => {
    it('[EARS-B1] should link the short hash to the commit page', () => {
      expect(formatCommitLine('add widget', 'a1', links)).toBe(
        '- add widget ([a1](https://github.com/example-org/example-plugin/commit/a1))'
      );
    });

    it('[EARS-B2] should not double the slash after a server URL ending in one', () => {
      const line = formatCommitLine('x', 'f00d', { serverUrl: 'https://git.example.com/', repository: 'o/r' });

      expect(line).toBe('- x ([f00d](https://git.example.com/o/r/commit/f00d))');
    });
  });

  describe('4.3. Accumulation and rendering (EARS-C1 to EARS-C5)', () => {
    it('[EARS-C1] should group commits into non-empty sections in display order', () => {
      const builder = new ChangelogBuilder({ releaseTag: '2024.10.0', previousTag: '2024.5.0', links });

      builder.addAll([
        commit('a1', 'ENH: add widget'),
        commit('b2', 'FIX: broken parser'),
        commit('c3', 'refactor internals'),
      ]);
      const document = builder.build();

      expect(document.releaseFamily).toBe('2024.10');
      expect(document.sections).toEqual([
        {
          category: 'features',
          heading: '✨ New features',
          lines: ['- add widget ([a1](https://github.com/example-org/example-plugin/commit/a1))'],
        },
        {
          category: 'fixes',
          heading: '🐛 Bug fixes',
          lines: ['- broken parser ([b2](https://github.com/example-org/example-plugin/commit/b2))'],
        },
        {
          category: 'other',
          heading: '🔄 Other changes',
          lines: ['- refactor internals ([c3](https://github.com/example-org/example-plugin/commit/c3))'],
        },
      ]);
    });

    it('[EARS-C2] should render the exact markdown document', () => {
      const builder = new ChangelogBuilder({ releaseTag: '2024.10.0', previousTag: '2024.5.0', links });
      builder.addAll([
        commit('a1', 'ENH: add widget'),
        commit('b2', 'FIX: broken parser'),
        commit('d4', 'FIX: Off by one'),
        commit('c3', 'refactor internals'),
      ]);

      expect(renderChangelog(builder.build())).toBe(
        '# 📋 2024.10 Changelog\n' +
          '\n' +
          '## ✨ New features\n' +
          '- add widget ([a1](https://github.com/example-org/example-plugin/commit/a1))\n' +
          '\n' +
          '## 🐛 Bug fixes\n' +
          '- broken parser ([b2](https://github.com/example-org/example-plugin/commit/b2))\n' +
          '- off by one ([d4](https://github.com/example-org/example-plugin/commit/d4))\n' +
          '\n' +
          '## 🔄 Other changes\n' +
          '- refactor internals ([c3](https://github.com/example-org/example-plugin/commit/c3))\n' +
          '\n'
      );
    });

    it('[EARS-C3] should only emit the documentation section for documentation-only commits', () => {
      const builder = new ChangelogBuilder({ releaseTag: '2024.10.0', previousTag: '2024.5.0', links });
      builder.add(commit('e5', 'DOC: describe options'));

      const markdown = renderChangelog(builder.build());

      expect(markdown).toBe(
        '# 📋 2024.10 Changelog\n\n' +
          '## 📚 Documentation\n' +
          '- describe options ([e5](https://github.com/example-org/example-plugin/commit/e5))\n\n'
      );
    });

    it('[EARS-C4] should render a heading and no sections for an empty range', () => {
      const builder = new ChangelogBuilder({ releaseTag: '2024.10.0', previousTag: '2024.10.0', links });

      const document = builder.build();

      expect(document.sections).toEqual([]);
      expect(renderChangelog(document)).toBe('# 📋 2024.10 Changelog\n\n');
    });

    it('[EARS-C5] should report the category of each added commit', () => {
      const builder = new ChangelogBuilder({ releaseTag: '2024.10.0', previousTag: '2024.5.0', links });

      expect(builder.add(commit('a1', 'CI: pin runner'))).toBe('maintenance');
      expect(builder.add(commit('b2', 'misc'))).toBe('other');
    });
  });

  describe('4.4. Release family (EARS-D1 to EARS-D4)', () => {
    it('[EARS-D1] should label the heading with the YYYY.MM family of a dev tag', () => {
      const builder = new ChangelogBuilder({ releaseTag: '2025.4.0.dev3', previousTag: '2025.4.0.dev2', links });

      expect(renderChangelog(builder.build())).toBe('# 📋 2025.4 Changelog\n\n');
    });

    it('[EARS-D2] should omit the family and warn when the tag has none', () => {
      const logger = createMockLogger();
      const builder = new ChangelogBuilder({ releaseTag: 'v1.2.3', previousTag: 'v1.2.2', links }, logger);

      const document = builder.build();

      expect(document.releaseFamily).toBeNull();
      expect(renderChangelog(document)).toBe('# 📋 Changelog\n\n');
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('[EARS-D3] should reject a tag without family in strict mode', () => {
      expect(
        () => new ChangelogBuilder({ releaseTag: 'v1.2.3', previousTag: 'v1.2.2', links, strict: true }, createMockLogger())
      ).toThrow(InvalidReleaseTagError);
    });

    it('[EARS-D4] should reject an empty release tag', () => {
      expect(() => new ChangelogBuilder({ releaseTag: '', previousTag: 'abc', links })).toThrow('No release tag provided');
    });
  });
});

describe('ChangelogGenerator', () => {
  describe('4.5. Commit range (EARS-E1 to EARS-E3)', () => {
    let git: MemoryGitModule;

    beforeEach(() => {
      git = new MemoryGitModule();
      git.addCommits([
        { hash: 'r0', subject: 'Initial commit' },
        { hash: 'a1', subject: 'ENH: add widget' },
      ]);
      git.setTag('2024.5.0', 'a1');
      git.addCommits([
        { hash: 'b2', subject: 'FIX: broken parser' },
        { hash: 'c3', subject: 'refactor internals' },
        { hash: 'd4', subject: 'ADD: Second widget' },
      ]);
      git.setTag('2024.10.0', 'd4');
    });

    it('[EARS-E1] should render commits of previousTag..releaseTag newest first', async () => {
      const generator = new ChangelogGenerator({ git, logger: createMockLogger() });

      const result = await generator.generate({ releaseTag: '2024.10.0', previousTag: '2024.5.0', links });

      expect(result.commits.map((c) => c.hash)).toEqual(['d4', 'c3', 'b2']);
      expect(result.markdown).toBe(
        '# 📋 2024.10 Changelog\n\n' +
          '## ✨ New features\n' +
          '- second widget ([d4](https://github.com/example-org/example-plugin/commit/d4))\n\n' +
          '## 🐛 Bug fixes\n' +
          '- broken parser ([b2](https://github.com/example-org/example-plugin/commit/b2))\n\n' +
          '## 🔄 Other changes\n' +
          '- refactor internals ([c3](https://github.com/example-org/example-plugin/commit/c3))\n\n'
      );
    });

    it('[EARS-E2] should accept a root commit hash as the previous reference', async () => {
      const generator = new ChangelogGenerator({ git, logger: createMockLogger() });

      const result = await generator.generate({ releaseTag: '2024.5.0', previousTag: 'r0', links });

      expect(result.document.sections).toEqual([
        {
          category: 'features',
          heading: '✨ New features',
          lines: ['- add widget ([a1](https://github.com/example-org/example-plugin/commit/a1))'],
        },
      ]);
    });

    it('[EARS-E3] should fail in strict mode before querying git', async () => {
      const getCommitLog = jest.spyOn(git, 'getCommitLog');
      const generator = new ChangelogGenerator({ git, logger: createMockLogger() });

      await expect(
        generator.generate({ releaseTag: 'nightly', previousTag: '2024.5.0', links, strict: true })
      ).rejects.toThrow(InvalidReleaseTagError);
      expect(getCommitLog).not.toHaveBeenCalled();
    });
  });
});
