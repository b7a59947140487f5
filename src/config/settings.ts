import { z } from 'zod';

import { bedrockRuntimeUrl, DEFAULT_TITAN_MODEL_ID } from '../llm/adapters/bedrock-titan';
import { DEFAULT_OPENAI_COMPATIBLE_MODEL, DEFAULT_OPENAI_COMPATIBLE_URL } from '../llm/adapters/openai-compatible';
import { DEFAULT_GENERATION_CONFIG, type GenerationConfig, type InferenceProvider } from '../llm/provider';
import { DEFAULT_TIMEOUT_MS } from '../http/transport';
import { TriageConfigError } from '../http/errors';

export interface TriageSettings {
  provider: InferenceProvider;
  modelId: string;
  region: string;
  endpointUrl: string;
  apiKey?: string;
  timeoutMs: number;
  generation: GenerationConfig;
}

export interface SettingsOverrides {
  provider?: string;
  modelId?: string;
  region?: string;
  endpointUrl?: string;
  timeoutMs?: string;
}

type Env = Record<string, string | undefined>;

const DEFAULT_REGION = 'us-east-1';

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const RawSettingsSchema = z.object({
  provider: z.preprocess(blankToUndefined, z.enum(['bedrock-titan', 'openai-compatible']).default('bedrock-titan')),
  modelId: optionalText,
  region: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_REGION)),
  endpointUrl: z.preprocess(blankToUndefined, z.string().trim().url().optional()),
  apiKey: optionalText,
  timeoutMs: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS)),
  temperature: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(0).max(1).default(DEFAULT_GENERATION_CONFIG.temperature)
  ),
  topP: z.preprocess(blankToUndefined, z.coerce.number().gt(0).max(1).default(DEFAULT_GENERATION_CONFIG.topP)),
  maxTokens: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_GENERATION_CONFIG.maxTokens)
  )
});

// Blank variables count as unset, so they never shadow the next name in a fallback chain.
function firstSet(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '');
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`).join('; ');
}

/**
 * Deployment settings, resolved once per run. CLI overrides win over environment variables.
 */
export function resolveSettings(env: Env = process.env, overrides: SettingsOverrides = {}): TriageSettings {
  const parsed = RawSettingsSchema.safeParse({
    provider: firstSet(overrides.provider, env.TRIAGE_PROVIDER),
    modelId: firstSet(overrides.modelId, env.TRIAGE_MODEL_ID),
    region: firstSet(overrides.region, env.TRIAGE_REGION, env.AWS_REGION),
    endpointUrl: firstSet(overrides.endpointUrl, env.TRIAGE_ENDPOINT_URL),
    apiKey: firstSet(env.TRIAGE_API_KEY, env.AWS_BEARER_TOKEN_BEDROCK),
    timeoutMs: firstSet(overrides.timeoutMs, env.TRIAGE_TIMEOUT_MS),
    temperature: env.TRIAGE_TEMPERATURE,
    topP: env.TRIAGE_TOP_P,
    maxTokens: env.TRIAGE_MAX_TOKENS
  });

  if (!parsed.success) {
    throw new TriageConfigError(`Invalid settings: ${formatIssues(parsed.error)}`);
  }

  const raw = parsed.data;
  const bedrock = raw.provider === 'bedrock-titan';

  return {
    provider: raw.provider,
    modelId: raw.modelId ?? (bedrock ? DEFAULT_TITAN_MODEL_ID : DEFAULT_OPENAI_COMPATIBLE_MODEL),
    region: raw.region,
    endpointUrl: raw.endpointUrl ?? (bedrock ? bedrockRuntimeUrl(raw.region) : DEFAULT_OPENAI_COMPATIBLE_URL),
    apiKey: raw.apiKey,
    timeoutMs: raw.timeoutMs,
    generation: {
      temperature: raw.temperature,
      topP: raw.topP,
      maxTokens: raw.maxTokens
    }
  };
}

export function maskSecret(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  if (value.length <= 8) {
    return '****';
  }
  return `${value.slice(0, 4)}…${value.slice(-2)}`;
}

export function describeSettings(settings: TriageSettings): Record<string, unknown> {
  return {
    ...settings,
    apiKey: maskSecret(settings.apiKey) ?? null
  };
}
