// Mock DependencyInjectionService before importing
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ChangelogCommand } from './changelog-command';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { ChangelogBuilder, Config, Logger, TagResolver } from '@relkit/core';
import { MemoryGitModule } from '@relkit/core/memory';

// Mock console methods to capture output
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();
const mockStdoutWrite = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);

const REPOSITORY = 'example-org/example-plugin';

describe('ChangelogCommand', () => {
  let command: ChangelogCommand;
  let git: MemoryGitModule;
  let config: Config.RuntimeConfig;
  let tempDir: string;
  let outputPath: string;
  let mockActions: {
    setOutput: jest.Mock<Promise<void>, [string, string]>;
    appendSummary: jest.Mock<Promise<void>, [string]>;
    exportVariable: jest.Mock<Promise<void>, [string, string]>;
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'relkit-changelog-'));
    outputPath = path.join(tempDir, 'changelog.md');

    git = new MemoryGitModule();
    git.addCommits([
      { hash: 'r0', subject: 'Initial commit' },
      { hash: 'a1', subject: 'ENH: First release' },
    ]);
    git.setTag('2024.5.0', 'a1');
    git.addCommits([
      { hash: 'b2', subject: 'FIX: broken parser' },
      { hash: 'c3', subject: 'DOC: usage notes' },
    ]);
    git.setTag('2024.10.0', 'c3');

    config = Config.loadRuntimeConfig({});
    mockActions = {
      setOutput: jest.fn<Promise<void>, [string, string]>().mockResolvedValue(undefined),
      appendSummary: jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined),
      exportVariable: jest.fn<Promise<void>, [string, string]>().mockResolvedValue(undefined),
    };

    const mockDependencyService = {
      getRuntimeConfig: jest.fn(() => config),
      getGitModule: jest.fn().mockResolvedValue(git),
      getTagResolver: jest.fn().mockResolvedValue(new TagResolver.TagResolver({ git })),
      getChangelogGenerator: jest.fn().mockResolvedValue(new ChangelogBuilder.ChangelogGenerator({ git })),
      getActionsOutput: jest.fn(() => mockActions),
    };
    (DependencyInjectionService.getInstance as jest.Mock).mockReturnValue(mockDependencyService);

    command = new ChangelogCommand();
  });

  afterEach(async () => {
    Logger.setDefaultLogLevel(undefined);
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const expectedRelease =
    '# 📋 2024.10 Changelog\n\n' +
    '## 🐛 Bug fixes\n' +
    '- broken parser ([b2](https://github.com/example-org/example-plugin/commit/b2))\n\n' +
    '## 📚 Documentation\n' +
    '- usage notes ([c3](https://github.com/example-org/example-plugin/commit/c3))\n\n';

  describe('4.1. Argument handling (EARS-A1 to EARS-A4)', () => {
    it('[EARS-A1] should render the range from an explicit previous reference', async () => {
      await command.execute('2024.10.0', 'r0', { output: outputPath, repository: REPOSITORY });

      expect(await fs.readFile(outputPath, 'utf8')).toBe(
        '# 📋 2024.10 Changelog\n\n' +
          '## ✨ New features\n' +
          '- first release ([a1](https://github.com/example-org/example-plugin/commit/a1))\n\n' +
          '## 🐛 Bug fixes\n' +
          '- broken parser ([b2](https://github.com/example-org/example-plugin/commit/b2))\n\n' +
          '## 📚 Documentation\n' +
          '- usage notes ([c3](https://github.com/example-org/example-plugin/commit/c3))\n\n'
      );
    });

    it('[EARS-A2] should resolve the previous tag when none is given', async () => {
      await command.execute('2024.10.0', undefined, { output: outputPath, repository: REPOSITORY });

      expect(await fs.readFile(outputPath, 'utf8')).toBe(expectedRelease);
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('[EARS-A3] should exit with usage and write nothing without a release tag', async () => {
      await command.execute(undefined, undefined, { output: outputPath, repository: REPOSITORY });

      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Usage: relkit changelog <release_tag> [previous_tag]\nA release tag is required'
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      await expect(fs.access(outputPath)).rejects.toThrow();
      expect(mockStdoutWrite).not.toHaveBeenCalled();
      expect(mockActions.setOutput).not.toHaveBeenCalled();
    });

    it('[EARS-A4] should take both references from the environment', async () => {
      config = Config.loadRuntimeConfig({
        RELEASE_TAG: '2024.5.0',
        PREVIOUS_TAG: 'r0',
        GITHUB_REPOSITORY: REPOSITORY,
      });

      await command.execute(undefined, undefined, { output: outputPath });

      expect(await fs.readFile(outputPath, 'utf8')).toBe(
        '# 📋 2024.5 Changelog\n\n' +
          '## ✨ New features\n' +
          '- first release ([a1](https://github.com/example-org/example-plugin/commit/a1))\n\n'
      );
    });
  });

  describe('4.2. Output (EARS-B1 to EARS-B4)', () => {
    it('[EARS-B1] should print exactly the bytes written to the file', async () => {
      await command.execute('2024.10.0', '2024.5.0', { output: outputPath, repository: REPOSITORY });

      expect(mockStdoutWrite).toHaveBeenCalledTimes(1);
      expect(mockStdoutWrite).toHaveBeenCalledWith(expectedRelease);
      expect(await fs.readFile(outputPath, 'utf8')).toBe(expectedRelease);
      expect(mockConsoleLog).not.toHaveBeenCalled();
    });

    it('[EARS-B2] should publish the changelog as step output and job summary', async () => {
      await command.execute('2024.10.0', '2024.5.0', { output: outputPath, repository: REPOSITORY });

      expect(mockActions.setOutput).toHaveBeenCalledWith('changelog', expectedRelease);
      expect(mockActions.appendSummary).toHaveBeenCalledWith(expectedRelease);
    });

    it('[EARS-B3] should link commits to the origin remote when no repository is configured', async () => {
      git.setRemote('origin', 'git@github.com:example-org/from-remote.git');

      await command.execute('2024.10.0', 'a1', { output: outputPath });

      expect(await fs.readFile(outputPath, 'utf8')).toContain(
        '- broken parser ([b2](https://github.com/example-org/from-remote/commit/b2))\n'
      );
    });

    it('[EARS-B4] should link commits to a custom server URL', async () => {
      await command.execute('2024.10.0', '2024.5.0', {
        output: outputPath,
        repository: REPOSITORY,
        serverUrl: 'https://git.example.com',
      });

      expect(await fs.readFile(outputPath, 'utf8')).toContain(
        '- usage notes ([c3](https://git.example.com/example-org/example-plugin/commit/c3))\n'
      );
    });
  });

  describe('4.3. Errors (EARS-C1 to EARS-C4)', () => {
    it('[EARS-C1] should fail without any repository for commit links', async () => {
      await command.execute('2024.10.0', '2024.5.0', { output: outputPath });

      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Error: Repository not configured: pass --repository, set GITHUB_REPOSITORY or add a GitHub origin remote'
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      await expect(fs.access(outputPath)).rejects.toThrow();
    });

    it('[EARS-C2] should reject a release tag without family under --strict', async () => {
      git.setTag('nightly', 'c3');

      await command.execute('nightly', '2024.5.0', { output: outputPath, repository: REPOSITORY, strict: true });

      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Error: Release tag "nightly" does not start with a YYYY.MM release family'
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('[EARS-C3] should report an unknown previous reference', async () => {
      await command.execute('2024.10.0', 'no-such-ref', { output: outputPath, repository: REPOSITORY });

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Error: Reference not found: no-such-ref');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('[EARS-C4] should print the changelog even when a runner file cannot be written', async () => {
      mockActions.setOutput.mockRejectedValue(new Error('EACCES: permission denied'));

      await command.execute('2024.10.0', '2024.5.0', { output: outputPath, repository: REPOSITORY });

      expect(mockStdoutWrite).toHaveBeenCalledTimes(1);
      expect(mockStdoutWrite).toHaveBeenCalledWith(expectedRelease);
      expect(await fs.readFile(outputPath, 'utf8')).toBe(expectedRelease);
      expect(mockConsoleError).toHaveBeenCalledWith('❌ Error: EACCES: permission denied');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(mockActions.appendSummary).not.toHaveBeenCalled();
    });
  });

  describe('4.4. Logging (EARS-D1 to EARS-D2)', () => {
    it('[EARS-D1] should keep logs on stderr and only the changelog on stdout with --verbose', async () => {
      await command.execute('2024.10.0', '2024.5.0', { output: outputPath, repository: REPOSITORY, verbose: true });

      expect(mockConsoleError).toHaveBeenCalledWith('[ChangelogGenerator] Found 2 commits between 2024.5.0 and 2024.10.0');
      expect(mockStdoutWrite).toHaveBeenCalledTimes(1);
      expect(mockStdoutWrite).toHaveBeenCalledWith(expectedRelease);
      expect(mockConsoleLog).not.toHaveBeenCalled();
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('[EARS-D2] should silence info logs with --quiet', async () => {
      await command.execute('2024.10.0', '2024.5.0', { output: outputPath, repository: REPOSITORY, quiet: true });

      expect(mockConsoleError).not.toHaveBeenCalled();
      expect(mockStdoutWrite).toHaveBeenCalledWith(expectedRelease);
    });
  });
});
