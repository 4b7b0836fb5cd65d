// @toolchat/llm — provider-neutral model client

export * from './types/index.js';
export * from './client/index.js';
export { fetchWithTimeout, type FetchOptions, type FetchResult } from './utils/http.js';
export { mapHttpError } from './utils/error-mapping.js';
export { GeminiAdapter, GEMINI_BASE_URL } from './providers/gemini/index.js';
