import type { AgentEvent, ExecutionUsage, ToolProgress } from './types.js';

/** Tools whose input names a file the agent wrote to. */
const FILE_EDITING_TOOLS = new Set(['Write', 'Edit', 'MultiEdit', 'NotebookEdit']);
const COMMAND_DETAIL_MAX = 40;

export interface ParsedStream {
  text: string;
  sessionId?: string;
  toolsUsed: string[];
  modifiedFiles: string[];
  events: AgentEvent[];
  skippedLines: number;
  usage?: ExecutionUsage;
  /** First entry of a `result` event's `errors` array, if any. */
  reportedError?: string;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAgentEvent(value: unknown): value is AgentEvent {
  return isObject(value) && typeof value.type === 'string';
}

function basename(filePath: string): string {
  return filePath.split('/').pop() || filePath;
}

function toolDetail(name: string, input: unknown): string | undefined {
  if (!isObject(input)) return undefined;
  const target = input.file_path ?? input.notebook_path;
  if (typeof target === 'string' && target.length > 0) return basename(target);
  if (name === 'Bash' && typeof input.command === 'string' && input.command.length > 0) {
    return input.command.slice(0, COMMAND_DETAIL_MAX);
  }
  return undefined;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * Incremental parser for the agent's `--output-format stream-json` output.
 *
 * Handles both event shapes the CLI has emitted over time:
 * - `content_block_delta` / `content_block_start` (incremental deltas)
 * - `assistant` (complete message with text and tool_use blocks)
 *
 * plus `system`/`init` for the session id and `result` for usage figures.
 * A line that is not a JSON event is counted and skipped.
 *
 * `onToolUse` hears about each tool call once, as soon as it shows up. A
 * `tool_use` block announced by `content_block_start` and repeated in the
 * `assistant` message counts as one step when both carry the same id.
 */
export class StreamParser {
  private readonly textParts: string[] = [];
  private readonly tools = new Set<string>();
  private readonly files = new Set<string>();
  private readonly events: AgentEvent[] = [];
  private readonly announcedToolIds = new Set<string>();
  private toolSteps = 0;
  private skipped = 0;
  private sessionId: string | undefined;
  private model: string | undefined;
  private resultText: string | undefined;
  private reportedError: string | undefined;
  private usage: Omit<ExecutionUsage, 'model'> | undefined;
  /** Deltas already carried text for the message an `assistant` event repeats. */
  private sawDeltaSinceAssistant = false;

  constructor(private readonly onToolUse?: (progress: ToolProgress) => void) {}

  pushLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      this.skip(trimmed, 'not JSON');
      return;
    }
    if (!isAgentEvent(parsed)) {
      this.skip(trimmed, 'not an event object');
      return;
    }

    this.events.push(parsed);
    this.handle(parsed);
  }

  finish(): ParsedStream {
    let text = this.textParts.join('').trim();
    if (!text && this.resultText) {
      text = this.resultText.trim();
    }

    const parsed: ParsedStream = {
      text,
      toolsUsed: [...this.tools],
      modifiedFiles: [...this.files],
      events: [...this.events],
      skippedLines: this.skipped,
    };
    if (this.sessionId) parsed.sessionId = this.sessionId;
    if (this.reportedError) parsed.reportedError = this.reportedError;
    if (this.usage || this.model) {
      parsed.usage = {
        costUsd: 0,
        inputTokens: 0,
        outputTokens: 0,
        durationMs: 0,
        ...this.usage,
        ...(this.model ? { model: this.model } : {}),
      };
    }
    return parsed;
  }

  // ── Event handlers ───────────────────────────────────────────────

  private handle(event: AgentEvent): void {
    switch (event.type) {
      case 'system':
        if (event.subtype === 'init') {
          this.captureSession(event.session_id);
          if (typeof event.model === 'string') this.model = event.model;
        }
        return;

      case 'content_block_delta': {
        const delta = event.delta;
        if (isObject(delta) && delta.type === 'text_delta' && typeof delta.text === 'string') {
          this.textParts.push(delta.text);
          this.sawDeltaSinceAssistant = true;
        }
        return;
      }

      case 'content_block_start': {
        const block = event.content_block;
        if (isObject(block) && block.type === 'tool_use') {
          this.recordTool(block);
        }
        return;
      }

      case 'assistant':
        this.handleAssistant(event);
        return;

      case 'result':
        this.handleResult(event);
        return;
    }
  }

  private handleAssistant(event: AgentEvent): void {
    const message = event.message;
    const content = isObject(message) && Array.isArray(message.content) ? message.content : [];
    const textAlreadyStreamed = this.sawDeltaSinceAssistant;
    this.sawDeltaSinceAssistant = false;

    for (const block of content) {
      if (!isObject(block)) continue;
      if (block.type === 'text' && typeof block.text === 'string') {
        if (!textAlreadyStreamed) this.textParts.push(block.text);
      } else if (block.type === 'tool_use') {
        this.recordTool(block);
      }
    }
  }

  private handleResult(event: AgentEvent): void {
    // Fallback only; system/init normally carries it first.
    this.captureSession(event.session_id);

    if (typeof event.result === 'string' && event.result.length > 0) {
      this.resultText = event.result;
    }
    if (Array.isArray(event.errors) && typeof event.errors[0] === 'string') {
      this.reportedError = event.errors[0];
    }

    const usage = isObject(event.usage) ? event.usage : {};
    this.usage = {
      costUsd: numberOr(event.total_cost_usd, 0),
      durationMs: numberOr(event.duration_ms, 0),
      inputTokens: numberOr(usage.input_tokens, 0),
      outputTokens: numberOr(usage.output_tokens, 0),
    };
  }

  private captureSession(value: unknown): void {
    if (this.sessionId === undefined && typeof value === 'string' && value.length > 0) {
      this.sessionId = value;
    }
  }

  private recordTool(block: JsonObject): void {
    const name = typeof block.name === 'string' ? block.name : 'unknown';
    this.tools.add(name);
    this.announceTool(name, block);

    if (FILE_EDITING_TOOLS.has(name) && isObject(block.input)) {
      const target = block.input.file_path ?? block.input.notebook_path;
      if (typeof target === 'string' && target.length > 0) {
        this.files.add(target);
      }
    }
  }

  private announceTool(name: string, block: JsonObject): void {
    if (typeof block.id === 'string') {
      if (this.announcedToolIds.has(block.id)) return;
      this.announcedToolIds.add(block.id);
    }
    this.toolSteps += 1;
    if (!this.onToolUse) return;

    const progress: ToolProgress = { tool: name, step: this.toolSteps };
    const detail = toolDetail(name, block.input);
    if (detail) progress.detail = detail;
    try {
      this.onToolUse(progress);
    } catch (err) {
      console.warn(`[executor] progress listener failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private skip(line: string, why: string): void {
    this.skipped += 1;
    console.warn(`[executor] skipping stream line (${why}): ${line.slice(0, 100)}`);
  }
}
