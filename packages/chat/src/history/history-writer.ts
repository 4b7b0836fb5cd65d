import { mkdir, open, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ChatMessage } from '../types/index.js';

const MAX_NAME_ATTEMPTS = 1000;

export type HistoryWriter = {
  /** The file this writer owns; null until the first save claims one. */
  readonly path: () => string | null;
  /** Rewrites the session file with the full message list. */
  readonly save: (messages: ReadonlyArray<ChatMessage>) => Promise<void>;
};

export type HistoryWriterOptions = {
  readonly directory: string;
  readonly startedAt: Date;
};

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * chat_history20250314093005.json in local time; later claims of the same second
 * get chat_history20250314093005_2.json, _3 and so on.
 */
export function historyFileName(startedAt: Date, attempt = 1): string {
  const stamp = [
    pad(startedAt.getFullYear(), 4),
    pad(startedAt.getMonth() + 1),
    pad(startedAt.getDate()),
    pad(startedAt.getHours()),
    pad(startedAt.getMinutes()),
    pad(startedAt.getSeconds()),
  ].join('');
  return attempt === 1 ? `chat_history${stamp}.json` : `chat_history${stamp}_${attempt}.json`;
}

function isExistingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

/**
 * Creates the first free file name for the start time. The exclusive create makes
 * two writers started in the same second end up with different files.
 */
async function claimFile(options: HistoryWriterOptions): Promise<string> {
  for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
    const candidate = join(options.directory, historyFileName(options.startedAt, attempt));
    try {
      const handle = await open(candidate, 'wx');
      await handle.close();
      return candidate;
    } catch (err) {
      if (!isExistingFile(err)) {
        throw err;
      }
    }
  }
  throw new Error(`No free history file name for ${historyFileName(options.startedAt)} in ${options.directory}`);
}

export function createHistoryWriter(options: HistoryWriterOptions): HistoryWriter {
  let claimed: string | null = null;

  return {
    path: () => claimed,
    async save(messages: ReadonlyArray<ChatMessage>): Promise<void> {
      await mkdir(options.directory, { recursive: true });
      const path = claimed ?? (await claimFile(options));
      claimed = path;
      await writeFile(path, `${JSON.stringify(messages, null, 2)}\n`, 'utf-8');
    },
  };
}
