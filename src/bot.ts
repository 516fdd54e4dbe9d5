import { Bot, InlineKeyboard, type Context } from 'grammy';
import type { CallerId, ToolProgress } from './types.js';
import type { CallerStatus, CompactOutcome, SubmitOutcome, TaskPipeline } from './pipeline.js';
import type { TransitionOutcome } from './approval.js';
import type { WorkingTreeStatus } from './git.js';
import { LOG_PREFIX } from './config.js';
import { describeError, generateErrorRef } from './errors.js';
import { DedupSet } from './dedup.js';

const TELEGRAM_MAX_LENGTH = 4096;
const SWEEP_INTERVAL_MS = 10 * 60_000;
const DEDUP_WINDOW_MS = 10 * 60_000;
const PROGRESS_INTERVAL_MS = 2000;
const PROGRESS_RECENT_STEPS = 5;
const FILES_PER_SECTION = 10;

/** A message to send back, optionally with Approve/Reject buttons for a change. */
export interface BotReply {
  text: string;
  approvalFor?: string;
}

/**
 * Split a string into chunks of at most `maxLen` characters, preferring the
 * last newline before the limit.
 */
export function splitMessage(text: string, maxLen = TELEGRAM_MAX_LENGTH): string[] {
  if (text.length <= maxLen) return [text];

  const chunks: string[] = [];
  let remaining = text;
  while (remaining.length > maxLen) {
    let splitIdx = remaining.lastIndexOf('\n', maxLen);
    if (splitIdx <= 0) splitIdx = maxLen;
    chunks.push(remaining.slice(0, splitIdx));
    remaining = remaining.slice(splitIdx).replace(/^\n/, '');
  }
  if (remaining.length > 0) chunks.push(remaining);
  return chunks;
}

// ── Rendering ────────────────────────────────────────────────────────

export function renderSubmitOutcome(outcome: SubmitOutcome): BotReply[] {
  switch (outcome.kind) {
    case 'rate-limited':
      return outcome.decision.notice ? [{ text: outcome.decision.notice }] : [];

    case 'pending-change':
      return [{
        text: `Change ${outcome.change.id} is still waiting for a decision. Approve or reject it first.`,
        approvalFor: outcome.change.id,
      }];

    case 'failed': {
      const error = outcome.result.error;
      return [{ text: `Agent run failed (${error?.reason ?? 'unknown'}): ${error?.message ?? 'no details'}` }];
    }

    case 'proposed': {
      const { result, change, session } = outcome;
      const details = [
        `Turn ${session.turnCount}`,
        result.toolsUsed.length > 0 ? `tools: ${result.toolsUsed.join(', ')}` : null,
        result.modifiedFiles.length > 0 ? `files: ${result.modifiedFiles.join(', ')}` : null,
      ].filter((line): line is string => line !== null);
      if (outcome.compaction) {
        details.push(outcome.compaction.ok ? 'session compacted' : `compaction failed: ${outcome.compaction.error}`);
      }

      const chunks = splitMessage(result.output);
      const replies: BotReply[] = chunks.map((text) => ({ text }));
      replies.push({ text: details.join(' · '), approvalFor: change.id });
      return replies;
    }
  }
}

export function renderTransition(outcome: TransitionOutcome): string {
  switch (outcome.kind) {
    case 'committed':
      return `Approved and committed as ${outcome.commitHash}.`;
    case 'approved-clean':
      return `Approved: ${outcome.message}.`;
    case 'rolled-back':
      return 'Rejected. Working tree reset to the last commit.';
    case 'rejected-clean':
      return 'Rejected. There was nothing to roll back.';
    case 'already-resolved':
      return `Change ${outcome.changeId} was already ${outcome.state}.`;
    case 'unknown':
      return `No change ${outcome.changeId} found.`;
    case 'repository-error':
      return `Repository error, change is still pending: ${outcome.error}`;
  }
}

export function renderStatus(status: CallerStatus): string {
  const { session, pending } = status;
  const lines = [
    `Session: ${session.sessionId ?? 'none'}`,
    `Turns since compaction: ${session.turnCount}/${status.compactionThreshold}`,
    `Pending change: ${pending ? `${pending.id} (${pending.prompt.slice(0, 60)})` : 'none'}`,
    `History: ${status.approvedCount} approved, ${status.rejectedCount} rejected`,
    `Rate: ${status.rateLimit.map((w) => `${w.used}/${w.limit} per ${w.name}`).join(', ')}`,
  ];
  return lines.join('\n');
}

export function renderCompaction(outcome: CompactOutcome): string {
  switch (outcome.kind) {
    case 'compacted':
      return 'Session compacted. Turn count reset.';
    case 'no-session':
      return 'No active session to compact.';
    case 'failed':
      return `Compaction failed: ${outcome.error}`;
  }
}

function fileSection(title: string, files: string[]): string[] {
  if (files.length === 0) return [];
  const shown = files.slice(0, FILES_PER_SECTION).map((f) => `  ${f}`);
  const more = files.length > FILES_PER_SECTION ? [`  ...and ${files.length - FILES_PER_SECTION} more`] : [];
  return ['', `${title} (${files.length}):`, ...shown, ...more];
}

export function renderWorkingTree(status: WorkingTreeStatus): string {
  const lines = [`Branch: ${status.branch}`];
  if (status.isClean) {
    lines.push('Working tree clean');
    return lines.join('\n');
  }
  lines.push(
    ...fileSection('Staged', status.staged),
    ...fileSection('Modified', status.modified),
    ...fileSection('Untracked', status.untracked),
  );
  return lines.join('\n');
}

export function renderProgress(progress: ToolProgress): string {
  const detail = progress.detail ? `: ${progress.detail}` : '';
  return `🔧 ${progress.tool}${detail} (step ${progress.step})`;
}

/**
 * Relays tool calls to the chat while the agent works, showing the most
 * recent steps. Updates are spaced at least `intervalMs` apart to stay clear
 * of Telegram's flood limits; steps in between show up with the next update.
 */
export class ProgressRelay {
  private readonly steps: string[] = [];
  private lastUpdateAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly update: (text: string) => Promise<void>,
    private readonly intervalMs = PROGRESS_INTERVAL_MS,
  ) {}

  push(progress: ToolProgress): void {
    this.steps.push(renderProgress(progress));
    const now = Date.now();
    if (this.lastUpdateAt !== null && now - this.lastUpdateAt < this.intervalMs) return;
    this.lastUpdateAt = now;

    const text = ['Working...', '', ...this.steps.slice(-PROGRESS_RECENT_STEPS)].join('\n');
    this.queue = this.queue
      .then(() => this.update(text))
      .catch((err: unknown) => {
        console.warn(`[bot] progress update failed: ${describeError(err)}`);
      });
  }

  /** Resolves once every update queued so far has been sent. */
  settled(): Promise<void> {
    return this.queue;
  }
}

// ── Handlers ─────────────────────────────────────────────────────────

export type PipelinePort = Pick<
  TaskPipeline,
  | 'submitTask'
  | 'approve'
  | 'reject'
  | 'getStatus'
  | 'clearSession'
  | 'compactSession'
  | 'retryLast'
  | 'diff'
  | 'workingTree'
  | 'log'
  | 'sweepIdle'
>;

type ProgressListener = (progress: ToolProgress) => void;

/**
 * Transport-independent command handlers. Each returns the replies to send;
 * `startBot` turns them into Telegram messages.
 */
export function createHandlers(pipeline: PipelinePort) {
  return {
    async text(callerId: CallerId, text: string, onProgress?: ProgressListener): Promise<BotReply[]> {
      return renderSubmitOutcome(await pipeline.submitTask(callerId, text, { onProgress }));
    },

    async decision(callerId: CallerId, action: 'approve' | 'reject', changeId: string): Promise<BotReply[]> {
      const outcome = action === 'approve'
        ? await pipeline.approve(callerId, changeId)
        : await pipeline.reject(callerId, changeId);
      return [{ text: renderTransition(outcome) }];
    },

    async status(callerId: CallerId): Promise<BotReply[]> {
      return [{ text: renderStatus(await pipeline.getStatus(callerId)) }];
    },

    async clear(callerId: CallerId): Promise<BotReply[]> {
      const { discarded } = await pipeline.clearSession(callerId, { discardPending: true });
      const suffix = discarded ? ` Dropped unresolved change ${discarded.id}.` : '';
      return [{ text: `Session cleared. The next message starts a new conversation.${suffix}` }];
    },

    async compact(callerId: CallerId): Promise<BotReply[]> {
      return [{ text: renderCompaction(await pipeline.compactSession(callerId)) }];
    },

    async retry(callerId: CallerId, onProgress?: ProgressListener): Promise<BotReply[]> {
      const outcome = await pipeline.retryLast(callerId, { onProgress });
      return outcome ? renderSubmitOutcome(outcome) : [{ text: 'Nothing to retry yet.' }];
    },

    async diff(): Promise<BotReply[]> {
      const diff = await pipeline.diff();
      if (!diff.hasChanges) return [{ text: 'No uncommitted changes to tracked files.' }];
      const header = `${diff.filesChanged.length} file(s), +${diff.insertions} -${diff.deletions}`;
      return splitMessage(`${header}\n\n${diff.patch}`).map((text) => ({ text }));
    },

    async gitStatus(): Promise<BotReply[]> {
      return [{ text: renderWorkingTree(await pipeline.workingTree()) }];
    },

    async log(): Promise<BotReply[]> {
      const commits = await pipeline.log(10);
      if (commits.length === 0) return [{ text: 'No commits yet.' }];
      return [{ text: commits.map((c) => `${c.hash} ${c.message} (${c.author})`).join('\n') }];
    },
  };
}

// ── Telegram wiring ──────────────────────────────────────────────────

async function send(ctx: Context, replies: BotReply[]): Promise<void> {
  for (const reply of replies) {
    if (reply.text.trim().length === 0) continue;
    const keyboard = reply.approvalFor
      ? new InlineKeyboard()
        .text('Approve', `approve:${reply.approvalFor}`)
        .text('Reject', `reject:${reply.approvalFor}`)
      : undefined;
    await ctx.reply(reply.text, keyboard ? { reply_markup: keyboard } : undefined);
  }
}

/** Posts the first progress update as a message and edits it for later ones. */
function progressMessage(ctx: Context, chatId: number): (text: string) => Promise<void> {
  let messageId: number | null = null;
  return async (text) => {
    if (messageId === null) {
      messageId = (await ctx.reply(text)).message_id;
    } else {
      await ctx.api.editMessageText(chatId, messageId, text);
    }
  };
}

/** Run `work` with a progress relay bound to the chat, then let pending updates land first. */
async function withProgress(
  ctx: Context,
  chatId: number,
  work: (onProgress: ProgressListener) => Promise<BotReply[]>,
): Promise<BotReply[]> {
  const relay = new ProgressRelay(progressMessage(ctx, chatId));
  const replies = await work((progress) => relay.push(progress));
  await relay.settled();
  return replies;
}

export interface BotOptions {
  allowedCallers: string[];
}

export async function startBot(token: string, pipeline: PipelinePort, options: BotOptions): Promise<void> {
  const bot = new Bot(token);
  const handlers = createHandlers(pipeline);
  const allowed = new Set(options.allowedCallers);
  const recentMessages = new DedupSet<CallerId>(DEDUP_WINDOW_MS);

  function callerOf(ctx: Context): CallerId | null {
    if (ctx.chat?.type !== 'private') return null;
    const id = String(ctx.chat.id);
    if (allowed.size > 0 && !allowed.has(id)) {
      console.warn(`[bot] ignoring unauthorized chat ${id}`);
      return null;
    }
    return id;
  }

  async function respond(ctx: Context, work: (callerId: CallerId) => Promise<BotReply[]>): Promise<void> {
    const callerId = callerOf(ctx);
    if (!callerId) return;
    try {
      await send(ctx, await work(callerId));
    } catch (err) {
      const ref = generateErrorRef();
      console.error(`[bot] ref=${ref} caller=${callerId}: ${describeError(err)}`);
      await ctx.reply(`Sorry, something went wrong (ref: ${ref}).`);
    }
  }

  try {
    await bot.api.deleteWebhook({ drop_pending_updates: false });
  } catch (err) {
    console.warn(`[${LOG_PREFIX}] failed to clear webhook: ${describeError(err)}`);
  }

  bot.command('status', (ctx) => respond(ctx, handlers.status));
  bot.command('clear', (ctx) => respond(ctx, handlers.clear));
  bot.command('compact', (ctx) => respond(ctx, handlers.compact));
  bot.command('diff', (ctx) => respond(ctx, () => handlers.diff()));
  bot.command('gitstatus', (ctx) => respond(ctx, () => handlers.gitStatus()));
  bot.command('log', (ctx) => respond(ctx, () => handlers.log()));
  bot.command('retry', (ctx) => {
    const chatId = ctx.message?.chat.id;
    if (chatId === undefined) return;
    return respond(ctx, (callerId) => withProgress(ctx, chatId, (onProgress) => handlers.retry(callerId, onProgress)));
  });

  bot.callbackQuery(/^(approve|reject):(.+)$/, async (ctx) => {
    const match = ctx.match;
    await ctx.answerCallbackQuery();
    const action = match[1] === 'approve' ? 'approve' : 'reject';
    await respond(ctx, (callerId) => handlers.decision(callerId, action, match[2]));
  });

  bot.on('message:text', (ctx) => {
    const { text, message_id: messageId, chat } = ctx.message;
    // Agent runs take minutes; don't hold up the update loop for other chats.
    void respond(ctx, async (callerId) => {
      if (recentMessages.isDuplicate(callerId, messageId)) {
        console.log(`[bot] dropped duplicate message_id=${messageId} caller=${callerId}`);
        return [];
      }
      await ctx.replyWithChatAction('typing');
      return withProgress(ctx, chat.id, (onProgress) => handlers.text(callerId, text, onProgress));
    }).catch((err: unknown) => {
      console.error(`[bot] failed to deliver reply: ${describeError(err)}`);
    });
  });

  bot.catch((err) => {
    console.error(`[bot] update ${err.ctx.update.update_id} failed: ${describeError(err.error)}`);
  });

  const sweepTimer = setInterval(() => {
    const callers = pipeline.sweepIdle();
    const messageIds = recentMessages.sweep();
    if (callers > 0 || messageIds > 0) {
      console.log(`[bot] housekeeping: forgot ${callers} idle caller(s), ${messageIds} message id(s)`);
    }
  }, SWEEP_INTERVAL_MS);
  sweepTimer.unref();

  const shutdown = async () => {
    console.log(`[${LOG_PREFIX}] shutting down...`);
    clearInterval(sweepTimer);
    await bot.stop();
    console.log(`[${LOG_PREFIX}] disconnected from Telegram`);
  };
  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      console.error(`[${LOG_PREFIX}] shutdown failed: ${describeError(err)}`);
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  await bot.start({
    onStart: (botInfo) => {
      console.log(`[${LOG_PREFIX}] connected as @${botInfo.username} (pid=${process.pid})`);
    },
  });
}
