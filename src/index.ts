export { renderTicketClassificationPrompt, buildPromptRequest, TICKET_CLASSIFICATION_TEMPLATE } from './llm/prompts/ticket-classification';

export {
  LLMInferenceClient,
  createInferenceClient,
  createInferenceAdapter,
  toTransportFailure,
  DEFAULT_GENERATION_CONFIG
} from './llm/provider';
export type {
  InferenceClient,
  InferenceAdapter,
  InferenceEndpointConfig,
  InferenceProvider,
  InferenceResult,
  InferenceSuccess,
  TransportFailure,
  TransportFailureKind,
  GenerationConfig,
  PromptRequest
} from './llm/provider';
export { createBedrockTitanAdapter } from './llm/adapters/bedrock-titan';
export { createOpenAICompatibleAdapter } from './llm/adapters/openai-compatible';

export { parseClassificationResponse } from './workflows/response-parser';
export type { ParsedClassification, ParseOptions } from './workflows/response-parser';
export { runBatchClassification, classifyTicket } from './workflows/batch-classify';
export type { BatchOptions } from './workflows/batch-classify';
export type {
  Ticket,
  ClassificationRecord,
  ClassificationOutcome,
  Priority,
  Sentiment,
  ReportRow,
  BatchResult,
  BatchSummary
} from './workflows/types';

export { parseTicketCsv, loadTicketsFromCsv, formatReportCsv, formatReportJson, writeReport } from './io/ticket-table';
export { resolveSettings } from './config/settings';
export type { TriageSettings, SettingsOverrides } from './config/settings';
export { TriageError, TriageHttpError, TriageEnvelopeError, TriageTimeoutError, TriageConfigError } from './http/errors';
