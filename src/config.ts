import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import path from 'node:path';
import type { RateLimitWindow } from './types.js';
import { ConfigError } from './errors.js';

export const LOG_PREFIX = 'codegate';
export const CONFIG_DIR = '.codegate';

export interface AppConfig {
  telegramToken: string | null;
  workspacePath: string;
  stateDir: string;
  agentCommand: string;
  timeoutMs: number;
  compactTimeoutMs: number;
  maxTurns: number;
  compactionThreshold: number;
  historyLimit: number;
  rateLimits: RateLimitWindow[];
  /** Empty means every caller is allowed. */
  allowedCallers: string[];
}

type Env = Record<string, string | undefined>;

/**
 * Copy values from ~/.codegate/config.json into `env` where not already set.
 * A missing or unreadable file is ignored; the environment stays as it was.
 */
export function applyConfigFile(env: Env = process.env, file = path.join(homedir(), CONFIG_DIR, 'config.json')): void {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, 'utf8'));
  } catch {
    return;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    console.warn(`[${LOG_PREFIX}] ignoring ${file}: expected a JSON object`);
    return;
  }
  for (const [key, value] of Object.entries(parsed)) {
    if (!env[key] && typeof value === 'string') {
      env[key] = value;
    }
  }
}

/**
 * Read and validate configuration from environment variables.
 * Every invalid value is collected so one ConfigError lists them all.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  function int(name: string, fallback: number, min = 1): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      problems.push(`${name} must be an integer >= ${min}, got "${raw}"`);
      return fallback;
    }
    return value;
  }

  const config: AppConfig = {
    telegramToken: env.TELEGRAM_BOT_TOKEN?.trim() || null,
    workspacePath: path.resolve(env.CODEGATE_WORKSPACE?.trim() || 'workspace'),
    stateDir: path.resolve(env.CODEGATE_STATE_DIR?.trim() || path.join(homedir(), CONFIG_DIR)),
    agentCommand: env.CODEGATE_AGENT_COMMAND?.trim() || 'claude',
    timeoutMs: int('CODEGATE_TIMEOUT_MS', 120_000),
    compactTimeoutMs: int('CODEGATE_COMPACT_TIMEOUT_MS', 30_000),
    maxTurns: int('CODEGATE_MAX_TURNS', 10),
    compactionThreshold: int('CODEGATE_COMPACT_THRESHOLD', 20),
    historyLimit: int('CODEGATE_HISTORY_LIMIT', 20),
    rateLimits: [
      { name: 'minute', durationMs: 60_000, limit: int('CODEGATE_RATE_PER_MINUTE', 5) },
      { name: 'hour', durationMs: 60 * 60_000, limit: int('CODEGATE_RATE_PER_HOUR', 60) },
      { name: 'day', durationMs: 24 * 60 * 60_000, limit: int('CODEGATE_RATE_PER_DAY', 300) },
    ],
    allowedCallers: (env.CODEGATE_ALLOWED_CALLERS ?? '')
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0),
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}

export function sessionsDir(config: AppConfig): string {
  return path.join(config.stateDir, 'sessions');
}

export function approvalsDir(config: AppConfig): string {
  return path.join(config.stateDir, 'approvals');
}
