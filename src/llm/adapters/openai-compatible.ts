import { z } from 'zod';

import { TriageEnvelopeError } from '../../http/errors';
import { HttpTransport } from '../../http/transport';
import type { InferenceAdapter, InferenceEndpointConfig, PromptRequest } from '../provider';

export const DEFAULT_OPENAI_COMPATIBLE_MODEL = 'llama3.2';
export const DEFAULT_OPENAI_COMPATIBLE_URL = 'http://localhost:11434';

const ContentPartSchema = z.union([z.string(), z.object({ type: z.string(), text: z.string().optional() })]);

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.union([z.string(), z.array(ContentPartSchema)])
        })
      })
    )
    .min(1)
});

type ChatContent = z.infer<typeof ChatCompletionSchema>['choices'][number]['message']['content'];

function endpointFor(baseUrl: string): string {
  const root = baseUrl.replace(/\/$/, '');
  if (root.endsWith('/v1')) {
    return `${root}/chat/completions`;
  }
  return `${root}/v1/chat/completions`;
}

function flattenContent(content: ChatContent): string {
  if (typeof content === 'string') {
    return content;
  }

  return content
    .map((item) => {
      if (typeof item === 'string') {
        return item;
      }
      if (item.type === 'text' && typeof item.text === 'string') {
        return item.text;
      }
      return '';
    })
    .filter(Boolean)
    .join('\n')
    .trim();
}

export function createOpenAICompatibleAdapter(transport: HttpTransport = new HttpTransport()): InferenceAdapter {
  return {
    provider: 'openai-compatible',
    async complete(request: PromptRequest, endpoint: InferenceEndpointConfig): Promise<string> {
      const response = await transport.request({
        method: 'POST',
        url: endpointFor(endpoint.endpointUrl),
        timeoutMs: endpoint.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
          ...(endpoint.apiKey ? { Authorization: `Bearer ${endpoint.apiKey}` } : {})
        },
        body: JSON.stringify({
          model: endpoint.modelId,
          temperature: request.generationConfig.temperature,
          top_p: request.generationConfig.topP,
          max_tokens: request.generationConfig.maxTokens,
          messages: [{ role: 'user', content: request.renderedText }]
        })
      });

      const envelope = ChatCompletionSchema.safeParse(response.data);
      if (!envelope.success) {
        throw new TriageEnvelopeError('Inference response is missing choices[0].message.content.');
      }
      return flattenContent(envelope.data.choices[0].message.content);
    }
  };
}
