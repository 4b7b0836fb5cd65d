import type { LLMRequest, LLMResponse, ModelClient } from '@toolchat/llm';
import { responseText, responseToolCalls } from '@toolchat/llm';
import type { ToolCallRequest } from '../types/index.js';

export type ModelReply =
  | { readonly kind: 'FINAL_TEXT'; readonly text: string; readonly response: LLMResponse }
  | {
      readonly kind: 'TOOL_CALL_BATCH';
      readonly text: string;
      readonly calls: ReadonlyArray<ToolCallRequest>;
      readonly response: LLMResponse;
    }
  | { readonly kind: 'TRANSPORT_ERROR'; readonly error: Error };

export function classifyResponse(response: LLMResponse): ModelReply {
  const text = responseText(response);
  const calls = responseToolCalls(response);

  if (calls.length > 0) {
    return { kind: 'TOOL_CALL_BATCH', text, calls, response };
  }
  return { kind: 'FINAL_TEXT', text, response };
}

/**
 * Sends one request and classifies the outcome. A rejected call comes back as
 * TRANSPORT_ERROR instead of throwing.
 */
export async function requestReply(client: ModelClient, request: LLMRequest): Promise<ModelReply> {
  let response: LLMResponse;
  try {
    response = await client.complete(request);
  } catch (err) {
    return { kind: 'TRANSPORT_ERROR', error: err instanceof Error ? err : new Error(String(err)) };
  }
  return classifyResponse(response);
}
