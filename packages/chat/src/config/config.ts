import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '@toolchat/llm';
import type { SessionConfig } from '../types/index.js';
import { LOG_LEVELS, type LogLevel } from '../logging/logger.js';
import { DEFAULT_MAX_TOOL_ROUNDS } from '../session/loop.js';

export const DEFAULT_MODEL = 'gemini-2.5-flash-lite';
export const DEFAULT_HISTORY_DIR = 'data';
export const DEFAULT_SYSTEM_INSTRUCTION_FILE = 'data/system_instruction.txt';
export const DEFAULT_SYSTEM_INSTRUCTION =
  'You are an exceptionally helpful and friendly chatbot. Your purpose is to provide concise and ' +
  'accurate information as requested by the user. If a question is outside of your capabilities, ' +
  'politely inform the user that you are unable to help with that request.';

export type ChatConfig = SessionConfig & {
  readonly apiKey: string;
  readonly autoApprove: boolean;
  readonly logLevel: LogLevel;
};

export type Env = Readonly<Record<string, string | undefined>>;

// Blank variables count as unset.
const blankAsUnset = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankAsUnset, z.string().trim().optional());

const flag = z.preprocess(
  blankAsUnset,
  z
    .string()
    .optional()
    .transform((value) => value !== undefined && ['true', '1', 'yes'].includes(value.trim().toLowerCase())),
);

const EnvSchema = z.object({
  GEMINI_API_KEY: optionalText,
  GOOGLE_API_KEY: optionalText,
  GEMINI_MODEL: z.preprocess(blankAsUnset, z.string().trim().default(DEFAULT_MODEL)),
  GEMINI_SAVE_CHAT_HISTORY: flag,
  CHAT_HISTORY_DIR: z.preprocess(blankAsUnset, z.string().default(DEFAULT_HISTORY_DIR)),
  CHAT_SYSTEM_INSTRUCTION_FILE: optionalText,
  CHAT_MAX_TOOL_ROUNDS: z.preprocess(blankAsUnset, z.coerce.number().int().min(1).default(DEFAULT_MAX_TOOL_ROUNDS)),
  CHAT_TEMPERATURE: z.preprocess(blankAsUnset, z.coerce.number().min(0).max(2).default(0)),
  CHAT_REQUEST_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().optional()),
  CHAT_AUTO_APPROVE: flag,
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankAsUnset(value.trim().toLowerCase()) : value),
    z.enum(LOG_LEVELS).default('warn'),
  ),
});

export type LoadConfigOptions = {
  /** Base for relative paths; defaults to process.cwd(). */
  readonly cwd?: string;
};

/**
 * Reads and validates the environment once. The returned object is frozen.
 */
export function loadConfig(env: Env = process.env, options: LoadConfigOptions = {}): ChatConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  const apiKey = vars.GEMINI_API_KEY ?? vars.GOOGLE_API_KEY;
  if (apiKey === undefined) {
    throw new ConfigurationError('GEMINI_API_KEY is not set in the .env file or environment variables');
  }

  const cwd = options.cwd ?? process.cwd();

  return Object.freeze({
    apiKey,
    model: vars.GEMINI_MODEL,
    systemInstruction: readSystemInstruction(cwd, vars.CHAT_SYSTEM_INSTRUCTION_FILE),
    temperature: vars.CHAT_TEMPERATURE,
    maxToolRounds: vars.CHAT_MAX_TOOL_ROUNDS,
    requestTimeoutMs: vars.CHAT_REQUEST_TIMEOUT_MS ?? null,
    saveHistory: vars.GEMINI_SAVE_CHAT_HISTORY,
    historyDir: resolve(cwd, vars.CHAT_HISTORY_DIR),
    autoApprove: vars.CHAT_AUTO_APPROVE,
    logLevel: vars.LOG_LEVEL,
  });
}

/**
 * The default file is optional and falls back to the built-in instruction; a file
 * named explicitly must exist.
 */
function readSystemInstruction(cwd: string, configuredPath: string | undefined): string {
  const path = resolve(cwd, configuredPath ?? DEFAULT_SYSTEM_INSTRUCTION_FILE);

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    if (configuredPath === undefined && isMissingFile(err)) {
      return DEFAULT_SYSTEM_INSTRUCTION;
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read system instruction file ${path}: ${reason}`);
  }

  const trimmed = text.trim();
  return trimmed.length > 0 ? trimmed : DEFAULT_SYSTEM_INSTRUCTION;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
