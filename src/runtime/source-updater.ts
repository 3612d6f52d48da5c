/**
 * Source Updater - updates the install directory from its git remote
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConsoleError } from '../errors/console-error';
import { ErrorCode } from '../errors/error-codes';
import { getConsoleLogger, type ConsoleLogger } from '../logging/console-logger';
import type { CommandRunner } from './command-runner';

export interface UpdateCheck {
  upToDate: boolean;
  /** One-line summaries of incoming commits, newest first */
  pendingCommits: string[];
}

export interface PullResult {
  changedFiles: string[];
}

const MAX_LISTED_COMMITS = 5;

export class SourceUpdater {
  private readonly logger: ConsoleLogger;

  constructor(
    private readonly runner: CommandRunner,
    private readonly repoDir: string,
    options: { logger?: ConsoleLogger } = {}
  ) {
    this.logger = options.logger ?? getConsoleLogger();
  }

  isRepository(): boolean {
    return fs.existsSync(path.join(this.repoDir, '.git'));
  }

  /**
   * Fetch and compare the local branch with its upstream
   */
  async check(): Promise<UpdateCheck> {
    await this.git(['fetch', '--quiet']);
    const local = (await this.git(['rev-parse', 'HEAD'])).trim();
    const remote = (await this.git(['rev-parse', '@{u}'])).trim();
    if (local === remote) {
      return { upToDate: true, pendingCommits: [] };
    }
    const log = await this.git(['log', '--oneline', `-${MAX_LISTED_COMMITS}`, 'HEAD..@{u}']);
    return {
      upToDate: false,
      pendingCommits: log.split('\n').filter((line) => line.trim() !== ''),
    };
  }

  /**
   * Fast-forward to upstream
   */
  async pull(): Promise<PullResult> {
    const before = (await this.git(['rev-parse', 'HEAD'])).trim();
    await this.git(['pull', '--ff-only']);
    const diff = await this.git(['diff', '--name-only', before, 'HEAD']);
    const changedFiles = diff.split('\n').filter((line) => line.trim() !== '');
    this.logger.info('RUNTIME', 'Pulled source updates', { from: before, changedFiles });
    return { changedFiles };
  }

  private async git(args: string[]): Promise<string> {
    const result = await this.runner.run('git', args, { cwd: this.repoDir });
    if (result.exitCode !== 0) {
      throw new ConsoleError(
        ErrorCode.E303_SOURCE_UPDATE_FAILURE,
        result.stderr.trim() || `git ${args.join(' ')} exited with code ${result.exitCode}`
      );
    }
    return result.stdout;
  }
}
