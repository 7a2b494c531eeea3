import { spawn } from 'child_process';
import { Octokit } from '@octokit/rest';
import { ActionsOutput, ChangelogBuilder, Config, Git, GitHub, TagResolver } from '@relkit/core';

/**
 * Dependency Injection Service for the relkit CLI
 *
 * Builds the core modules once per process from the runtime environment.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private runtimeConfig: Config.RuntimeConfig | null = null;
  private gitModule: Git.IGitModule | null = null;
  private tagResolver: TagResolver.ITagResolver | null = null;
  private changelogGenerator: ChangelogBuilder.IChangelogGenerator | null = null;
  private actionsOutput: ActionsOutput.IActionsOutput | null = null;
  private octokit: Octokit | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Drops the singleton (tests)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  getRuntimeConfig(): Config.RuntimeConfig {
    if (!this.runtimeConfig) {
      this.runtimeConfig = Config.loadRuntimeConfig(process.env);
    }
    return this.runtimeConfig;
  }

  /**
   * GitModule over the git binary; the repository is found from the current directory
   */
  async getGitModule(): Promise<Git.IGitModule> {
    if (this.gitModule) {
      return this.gitModule;
    }

    // Resolves on every exit code; the git module interprets failures
    const execCommand: Git.ExecCommandFn = (command, args, options) => {
      return new Promise<Git.ExecResult>((resolve) => {
        const proc = spawn(command, args, {
          cwd: options?.cwd || process.cwd(),
          env: { ...process.env },
        });

        let stdout = '';
        let stderr = '';

        proc.stdout?.on('data', (data: Buffer) => { stdout += data.toString(); });
        proc.stderr?.on('data', (data: Buffer) => { stderr += data.toString(); });

        proc.on('close', (code: number | null) => {
          resolve({ exitCode: code ?? 1, stdout, stderr });
        });

        proc.on('error', (error: Error) => {
          resolve({ exitCode: 1, stdout, stderr: error.message });
        });
      });
    };

    this.gitModule = new Git.LocalGitModule({ execCommand });
    return this.gitModule;
  }

  async getTagResolver(): Promise<TagResolver.ITagResolver> {
    if (!this.tagResolver) {
      this.tagResolver = new TagResolver.TagResolver({ git: await this.getGitModule() });
    }
    return this.tagResolver;
  }

  async getChangelogGenerator(): Promise<ChangelogBuilder.IChangelogGenerator> {
    if (!this.changelogGenerator) {
      this.changelogGenerator = new ChangelogBuilder.ChangelogGenerator({ git: await this.getGitModule() });
    }
    return this.changelogGenerator;
  }

  getActionsOutput(): ActionsOutput.IActionsOutput {
    if (!this.actionsOutput) {
      this.actionsOutput = new ActionsOutput.ActionsOutput({ paths: this.getRuntimeConfig().actions });
    }
    return this.actionsOutput;
  }

  /**
   * Octokit authenticated with GITHUB_TOKEN when set (anonymous otherwise)
   */
  getOctokit(): Octokit {
    if (!this.octokit) {
      const { githubToken } = this.getRuntimeConfig();
      this.octokit = new Octokit(githubToken ? { auth: githubToken } : {});
    }
    return this.octokit;
  }

  getTagSource(repository: string): GitHub.ITagSource {
    return new GitHub.GitHubTagSource({ octokit: this.getOctokit(), repository });
  }

  getMilestoneManager(): GitHub.IMilestoneManager {
    return new GitHub.GitHubMilestoneManager({ octokit: this.getOctokit() });
  }
}
