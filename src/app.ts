import type { AppConfig } from './config.js';
import { approvalsDir, sessionsDir } from './config.js';
import type { ProcessRunner } from './process-runner.js';
import type { Repository } from './git.js';
import { ApprovalStateMachine, isApprovalState } from './approval.js';
import { TaskExecutor } from './executor.js';
import { TaskPipeline } from './pipeline.js';
import { RateLimiter } from './rate-limiter.js';
import { SessionTracker, isSession } from './session.js';
import { JsonFileStore } from './store.js';
import { ensureWorkspace } from './workspace.js';

export interface PipelineOverrides {
  runner?: ProcessRunner;
  repository?: Repository;
}

/**
 * Wire the four core components against file-backed stores under
 * `config.stateDir` and the git workspace at `config.workspacePath`.
 */
export async function createPipeline(config: AppConfig, overrides: PipelineOverrides = {}): Promise<TaskPipeline> {
  const repository = overrides.repository ?? (await ensureWorkspace(config.workspacePath));

  const executor = new TaskExecutor({
    workspacePath: config.workspacePath,
    command: config.agentCommand,
    timeoutMs: config.timeoutMs,
    compactTimeoutMs: config.compactTimeoutMs,
    maxTurns: config.maxTurns,
    runner: overrides.runner,
  });

  const sessions = new SessionTracker(
    new JsonFileStore(sessionsDir(config), isSession),
    config.compactionThreshold,
  );

  const approvals = new ApprovalStateMachine(
    new JsonFileStore(approvalsDir(config), isApprovalState),
    repository,
    { historyLimit: config.historyLimit },
  );

  const rateLimiter = new RateLimiter({ windows: config.rateLimits });

  return new TaskPipeline({ executor, sessions, approvals, rateLimiter, repository });
}
