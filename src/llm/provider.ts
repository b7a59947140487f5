import { createBedrockTitanAdapter } from './adapters/bedrock-titan';
import { createOpenAICompatibleAdapter } from './adapters/openai-compatible';
import type { TriageSettings } from '../config/settings';
import { TriageEnvelopeError, TriageHttpError, TriageTimeoutError } from '../http/errors';
import { HttpTransport } from '../http/transport';
import { getLogger } from '../observability/logger';
import { withSpan } from '../observability/tracing';

export type InferenceProvider = 'bedrock-titan' | 'openai-compatible';

export interface GenerationConfig {
  temperature: number;
  topP: number;
  maxTokens: number;
}

export const DEFAULT_GENERATION_CONFIG: Readonly<GenerationConfig> = Object.freeze({
  temperature: 0,
  topP: 1,
  maxTokens: 1000
});

export interface PromptRequest {
  renderedText: string;
  generationConfig: GenerationConfig;
}

export type TransportFailureKind = 'network' | 'timeout' | 'auth' | 'http' | 'envelope';

export interface InferenceSuccess {
  ok: true;
  rawText: string;
}

export interface TransportFailure {
  ok: false;
  kind: TransportFailureKind;
  message: string;
  status?: number;
}

export type InferenceResult = InferenceSuccess | TransportFailure;

/** Given a prompt string, returns a completion or a transport failure. Never rejects. */
export interface InferenceClient {
  invoke(prompt: string): Promise<InferenceResult>;
}

export interface InferenceEndpointConfig {
  modelId: string;
  endpointUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * Provider-specific wire format. Implementations throw `TriageError` subclasses (or whatever
 * `fetch` throws); `LLMInferenceClient` turns those into `TransportFailure` values.
 */
export interface InferenceAdapter {
  provider: InferenceProvider;
  complete(request: PromptRequest, endpoint: InferenceEndpointConfig): Promise<string>;
}

export interface LLMInferenceClientOptions {
  adapter: InferenceAdapter;
  endpoint: InferenceEndpointConfig;
  generation?: GenerationConfig;
}

function describeDetails(details: unknown): string | undefined {
  if (!details || typeof details !== 'object') {
    return undefined;
  }
  if ('message' in details && typeof details.message === 'string') {
    return details.message;
  }
  if ('error' in details) {
    const nested = details.error;
    if (typeof nested === 'string') {
      return nested;
    }
    return describeDetails(nested);
  }
  return undefined;
}

export function toTransportFailure(error: unknown): TransportFailure {
  if (error instanceof TriageTimeoutError) {
    return { ok: false, kind: 'timeout', message: error.message };
  }

  if (error instanceof TriageHttpError) {
    const detail = describeDetails(error.details);
    const message = detail ? `${error.message}: ${detail}` : error.message;
    const kind: TransportFailureKind = error.status === 401 || error.status === 403 ? 'auth' : 'http';
    return { ok: false, kind, message, status: error.status };
  }

  if (error instanceof TriageEnvelopeError) {
    return { ok: false, kind: 'envelope', message: error.message };
  }

  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return { ok: false, kind: 'network', message: `${error.message}${cause}` };
  }

  return { ok: false, kind: 'network', message: String(error) };
}

export class LLMInferenceClient implements InferenceClient {
  readonly provider: InferenceProvider;
  readonly generation: Readonly<GenerationConfig>;
  private readonly adapter: InferenceAdapter;
  private readonly endpoint: InferenceEndpointConfig;
  private readonly logger = getLogger();

  constructor(options: LLMInferenceClientOptions) {
    this.adapter = options.adapter;
    this.provider = options.adapter.provider;
    this.endpoint = options.endpoint;
    this.generation = Object.freeze({ ...(options.generation ?? DEFAULT_GENERATION_CONFIG) });
  }

  async invoke(prompt: string): Promise<InferenceResult> {
    const request: PromptRequest = {
      renderedText: prompt,
      generationConfig: { ...this.generation }
    };

    try {
      const rawText = await withSpan(
        'triage.inference',
        {
          'triage.provider': this.provider,
          'triage.model': this.endpoint.modelId,
          'triage.prompt.length': prompt.length
        },
        () => this.adapter.complete(request, this.endpoint)
      );
      return { ok: true, rawText };
    } catch (error) {
      const failure = toTransportFailure(error);
      this.logger.debug(
        { provider: this.provider, model: this.endpoint.modelId, kind: failure.kind, status: failure.status },
        failure.message
      );
      return failure;
    }
  }
}

export function createInferenceAdapter(provider: InferenceProvider, transport: HttpTransport): InferenceAdapter {
  if (provider === 'openai-compatible') {
    return createOpenAICompatibleAdapter(transport);
  }
  return createBedrockTitanAdapter(transport);
}

/** One client per batch run; nothing here is cached process-wide. */
export function createInferenceClient(settings: TriageSettings): LLMInferenceClient {
  const transport = new HttpTransport({ timeoutMs: settings.timeoutMs });
  return new LLMInferenceClient({
    adapter: createInferenceAdapter(settings.provider, transport),
    endpoint: {
      modelId: settings.modelId,
      endpointUrl: settings.endpointUrl,
      apiKey: settings.apiKey,
      timeoutMs: settings.timeoutMs
    },
    generation: settings.generation
  });
}
