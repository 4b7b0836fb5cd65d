import type { ContentPart, LLMRequest, Message } from '../../types/index.js';
import { messageParts } from '../../types/index.js';

export type GeminiPart =
  | { readonly text: string }
  | { readonly functionCall: { readonly name: string; readonly args: Record<string, unknown> } }
  | {
      readonly functionResponse: {
        readonly name: string;
        readonly response: Record<string, unknown>;
      };
    };

export type GeminiContent = {
  readonly role: 'user' | 'model';
  readonly parts: Array<GeminiPart>;
};

export type TranslateRequestResult = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

function translatePart(part: ContentPart): GeminiPart | null {
  switch (part.kind) {
    case 'TEXT':
      return part.text ? { text: part.text } : null;

    case 'TOOL_CALL':
      return { functionCall: { name: part.toolName, args: part.args } };

    case 'TOOL_RESULT':
      return {
        functionResponse: {
          name: part.toolName,
          response: part.isError ? { error: part.content } : { result: part.content },
        },
      };
  }
}

/**
 * Gemini wants strictly alternating user/model contents; tool results travel as
 * user-role functionResponse parts, so adjacent same-role messages are merged.
 */
export function translateContents(messages: ReadonlyArray<Message>): Array<GeminiContent> {
  const contents: Array<GeminiContent> = [];

  for (const message of messages) {
    const role = message.role === 'assistant' ? 'model' : 'user';
    const parts: Array<GeminiPart> = [];

    for (const part of messageParts(message)) {
      const translated = translatePart(part);
      if (translated) {
        parts.push(translated);
      }
    }

    if (parts.length === 0) {
      continue;
    }

    const previous = contents[contents.length - 1];
    if (previous && previous.role === role) {
      previous.parts.push(...parts);
    } else {
      contents.push({ role, parts });
    }
  }

  return contents;
}

export function translateRequest(
  request: Readonly<LLMRequest>,
  apiKey: string,
  baseUrl: string,
): TranslateRequestResult {
  const url = `${baseUrl}/v1beta/models/${request.model}:generateContent`;

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'x-goog-api-key': apiKey,
  };

  const body: Record<string, unknown> = {};

  if (request.system) {
    body['systemInstruction'] = {
      role: 'user',
      parts: [{ text: request.system }],
    };
  }

  const contents = translateContents(request.messages);
  if (contents.length > 0) {
    body['contents'] = contents;
  }

  if (request.tools && request.tools.length > 0) {
    body['tools'] = [
      {
        function_declarations: request.tools.map((tool) => ({
          name: tool.name,
          description: tool.description || '',
          parameters: tool.parameters,
        })),
      },
    ];
  }

  const generationConfig: Record<string, unknown> = {};

  if (request.maxTokens !== undefined) {
    generationConfig['maxOutputTokens'] = request.maxTokens;
  }

  if (request.temperature !== undefined) {
    generationConfig['temperature'] = request.temperature;
  }

  if (Object.keys(generationConfig).length > 0) {
    body['generationConfig'] = generationConfig;
  }

  return {
    url,
    headers,
    body,
  };
}
