/**
 * Git access for the agent workspace.
 *
 * The approval flow only needs a handful of operations, so they sit behind
 * the `Repository` interface; `GitRepository` is the simple-git backed one.
 */

import { existsSync } from 'node:fs';
import { CheckRepoActions, simpleGit, type SimpleGit } from 'simple-git';
import { RepositoryError, describeError } from './errors.js';

export interface WorkingTreeStatus {
  branch: string;
  isClean: boolean;
  staged: string[];
  modified: string[];
  untracked: string[];
}

export interface WorkingTreeDiff {
  hasChanges: boolean;
  patch: string;
  filesChanged: string[];
  insertions: number;
  deletions: number;
}

export interface CommitInfo {
  hash: string;
  author: string;
  date: string;
  /** Subject line only. */
  message: string;
  body: string;
}

export interface Repository {
  readonly path: string;
  isRepository(): Promise<boolean>;
  init(): Promise<void>;
  status(): Promise<WorkingTreeStatus>;
  diff(): Promise<WorkingTreeDiff>;
  stageAll(): Promise<void>;
  /** Commits the index and returns the short hash. */
  commit(message: string): Promise<string>;
  /** Resets tracked files to HEAD and removes untracked files and directories. */
  discardChanges(): Promise<void>;
  log(count: number): Promise<CommitInfo[]>;
}

export const DEFAULT_COMMITTER = { name: 'codegate', email: 'codegate@localhost' };

export class GitRepository implements Repository {
  private readonly git: SimpleGit;

  constructor(readonly path: string) {
    if (!existsSync(path)) {
      throw new RepositoryError(`Workspace does not exist: ${path}`);
    }
    this.git = simpleGit({ baseDir: path });
  }

  async isRepository(): Promise<boolean> {
    try {
      // The workspace itself must be the root, not a folder inside some other repo.
      return await this.git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT);
    } catch {
      return false;
    }
  }

  /** Initialize a repository with a local committer identity. No-op if one exists. */
  async init(): Promise<void> {
    if (await this.isRepository()) return;
    await this.guard('init', async () => {
      await this.git.init();
      await this.git.addConfig('user.name', DEFAULT_COMMITTER.name);
      await this.git.addConfig('user.email', DEFAULT_COMMITTER.email);
    });
    console.log(`[git] initialized repository in ${this.path}`);
  }

  async status(): Promise<WorkingTreeStatus> {
    await this.requireRepository();
    const status = await this.guard('status', () => this.git.status());
    return {
      branch: status.current ?? 'HEAD',
      isClean: status.isClean(),
      staged: status.staged,
      modified: status.modified,
      untracked: status.not_added,
    };
  }

  async diff(): Promise<WorkingTreeDiff> {
    await this.requireRepository();
    // Against HEAD so staged and unstaged edits both show; an unborn branch has no HEAD.
    const range = (await this.hasHead()) ? ['HEAD'] : [];
    const [patch, summary] = await this.guard('diff', () =>
      Promise.all([this.git.diff(range), this.git.diffSummary(range)]),
    );
    return {
      hasChanges: patch.length > 0,
      patch,
      filesChanged: summary.files.map((f) => f.file),
      insertions: summary.insertions,
      deletions: summary.deletions,
    };
  }

  async stageAll(): Promise<void> {
    await this.requireRepository();
    await this.guard('add', () => this.git.add('-A'));
  }

  async commit(message: string): Promise<string> {
    if (!message.trim()) {
      throw new RepositoryError('Commit message cannot be empty');
    }
    await this.requireRepository();
    const result = await this.guard('commit', () => this.git.commit(message));
    if (!result.commit) {
      throw new RepositoryError('Nothing to commit');
    }
    const hash = await this.guard('rev-parse', () => this.git.revparse(['--short', 'HEAD']));
    console.log(`[git] created commit ${hash}: ${message.split('\n')[0].slice(0, 50)}`);
    return hash.trim();
  }

  async discardChanges(): Promise<void> {
    await this.requireRepository();
    if (await this.hasHead()) {
      await this.guard('reset', () => this.git.reset(['--hard', 'HEAD']));
    } else {
      // Nothing committed yet: unstage everything so clean can remove it.
      await this.guard('read-tree', () => this.git.raw(['read-tree', '--empty']));
    }
    await this.guard('clean', () => this.git.clean('fd'));
    console.log(`[git] discarded working tree changes in ${this.path}`);
  }

  async log(count: number): Promise<CommitInfo[]> {
    await this.requireRepository();
    if (!(await this.hasHead())) return [];
    const log = await this.guard('log', () => this.git.log({ maxCount: count }));
    return log.all.map((entry) => ({
      hash: entry.hash.slice(0, 7),
      author: entry.author_name,
      date: entry.date,
      message: entry.message,
      body: entry.body.trim(),
    }));
  }

  // ── Private ──────────────────────────────────────────────────────

  private async hasHead(): Promise<boolean> {
    try {
      await this.git.revparse(['--verify', 'HEAD']);
      return true;
    } catch {
      return false;
    }
  }

  private async requireRepository(): Promise<void> {
    if (!(await this.isRepository())) {
      throw new RepositoryError(`Not a git repository: ${this.path}`);
    }
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof RepositoryError) throw err;
      console.error(`[git] ${operation} failed in ${this.path}: ${describeError(err)}`);
      throw new RepositoryError(`git ${operation} failed: ${describeError(err)}`, { cause: err });
    }
  }
}
