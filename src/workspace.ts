import { mkdirSync } from 'node:fs';
import { GitRepository } from './git.js';

/**
 * Make sure the agent's workspace directory exists and is a git repository.
 * Never touches existing content or history.
 */
export async function ensureWorkspace(workspacePath: string): Promise<GitRepository> {
  mkdirSync(workspacePath, { recursive: true });
  const repository = new GitRepository(workspacePath);
  await repository.init();
  return repository;
}
