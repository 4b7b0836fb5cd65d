import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { LLMResponse, ContentPart, FinishReason } from '../../types/index.js';
import { ProviderError } from '../../types/index.js';

const FunctionCallSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  args: z.record(z.unknown()).optional(),
});

const PartSchema = z.object({
  text: z.string().optional(),
  thought: z.boolean().optional(),
  functionCall: FunctionCallSchema.optional(),
});

const CandidateSchema = z.object({
  content: z
    .object({
      parts: z.array(PartSchema).optional(),
    })
    .optional(),
  finishReason: z.string().optional(),
});

const GenerateContentResponseSchema = z.object({
  candidates: z.array(CandidateSchema).optional(),
  promptFeedback: z
    .object({
      blockReason: z.string().optional(),
    })
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
  modelVersion: z.string().optional(),
  responseId: z.string().optional(),
});

export function translateResponse(raw: unknown, requestedModel: string): LLMResponse {
  const parsed = GenerateContentResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderError(`Malformed generateContent response: ${parsed.error.message}`, 200, 'gemini', raw);
  }

  const data = parsed.data;
  const firstCandidate = data.candidates?.[0];
  const contentParts: Array<ContentPart> = [];

  for (const part of firstCandidate?.content?.parts ?? []) {
    if (part.functionCall) {
      contentParts.push({
        kind: 'TOOL_CALL',
        toolCallId: part.functionCall.id ?? randomUUID(),
        toolName: part.functionCall.name,
        args: part.functionCall.args ?? {},
      });
    } else if (part.text && !part.thought) {
      contentParts.push({
        kind: 'TEXT',
        text: part.text,
      });
    }
  }

  const usage = {
    inputTokens: data.usageMetadata?.promptTokenCount ?? 0,
    outputTokens: data.usageMetadata?.candidatesTokenCount ?? 0,
    totalTokens: data.usageMetadata?.totalTokenCount ?? 0,
  };

  return {
    id: data.responseId ?? randomUUID(),
    model: data.modelVersion ?? requestedModel,
    content: contentParts,
    finishReason: mapFinishReason(
      firstCandidate?.finishReason,
      data.promptFeedback?.blockReason,
      contentParts,
    ),
    usage,
  };
}

function mapFinishReason(
  rawFinishReason: string | undefined,
  blockReason: string | undefined,
  content: ReadonlyArray<ContentPart>,
): FinishReason {
  if (blockReason) {
    return 'content_filter';
  }

  if (content.some((part) => part.kind === 'TOOL_CALL')) {
    return 'tool_calls';
  }

  switch (rawFinishReason) {
    case 'MAX_TOKENS':
      return 'length';
    case 'SAFETY':
    case 'RECITATION':
    case 'BLOCKLIST':
    case 'PROHIBITED_CONTENT':
      return 'content_filter';
    case 'MALFORMED_FUNCTION_CALL':
      return 'error';
    default:
      return 'stop';
  }
}
