export type SessionState = 'IDLE' | 'PROCESSING';

/**
 * The settings a session reads. Loaded once at start-up and never mutated.
 */
export type SessionConfig = {
  readonly model: string;
  readonly systemInstruction: string;
  readonly temperature: number;
  readonly maxToolRounds: number;
  readonly requestTimeoutMs: number | null;
  readonly saveHistory: boolean;
  readonly historyDir: string;
};
