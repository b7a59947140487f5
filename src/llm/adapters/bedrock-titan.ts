import { z } from 'zod';

import { TriageEnvelopeError } from '../../http/errors';
import { HttpTransport } from '../../http/transport';
import type { InferenceAdapter, InferenceEndpointConfig, PromptRequest } from '../provider';

export const DEFAULT_TITAN_MODEL_ID = 'amazon.titan-text-premier-v1:0';

const TitanResponseSchema = z.object({
  results: z
    .array(
      z.object({
        outputText: z.string(),
        tokenCount: z.number().optional(),
        completionReason: z.string().nullable().optional()
      })
    )
    .min(1)
});

export function bedrockRuntimeUrl(region: string): string {
  return `https://bedrock-runtime.${region}.amazonaws.com`;
}

function invokeUrl(endpoint: InferenceEndpointConfig): string {
  return `${endpoint.endpointUrl.replace(/\/$/, '')}/model/${encodeURIComponent(endpoint.modelId)}/invoke`;
}

export function createBedrockTitanAdapter(transport: HttpTransport = new HttpTransport()): InferenceAdapter {
  return {
    provider: 'bedrock-titan',
    async complete(request: PromptRequest, endpoint: InferenceEndpointConfig): Promise<string> {
      const response = await transport.request({
        method: 'POST',
        url: invokeUrl(endpoint),
        timeoutMs: endpoint.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          ...(endpoint.apiKey ? { Authorization: `Bearer ${endpoint.apiKey}` } : {})
        },
        body: JSON.stringify({
          inputText: request.renderedText,
          textGenerationConfig: {
            temperature: request.generationConfig.temperature,
            topP: request.generationConfig.topP,
            maxTokenCount: request.generationConfig.maxTokens
          }
        })
      });

      const envelope = TitanResponseSchema.safeParse(response.data);
      if (!envelope.success) {
        throw new TriageEnvelopeError('Inference response is missing results[0].outputText.');
      }
      return envelope.data.results[0].outputText;
    }
  };
}
