import { extractFirstJsonObject, isJsonObject, parseJson } from '../utils/json';
import {
  ERROR,
  PRIORITIES,
  SENTIMENTS,
  UNKNOWN,
  type ClassificationField,
  type ClassificationRecord,
  type Priority,
  type Sentiment
} from './types';

export const NO_REPLY_GENERATED = 'No reply generated';
export const PARSE_FAILURE_PREFIX = "Error decoding the model's JSON response";
export const TRANSPORT_FAILURE_PREFIX = 'Inference request failed';

export interface ParseOptions {
  extractEmbeddedJson?: boolean;
}

export interface ParsedClassification {
  outcome: 'complete' | 'partial' | 'parse_failure';
  record: ClassificationRecord;
  missingFields: ClassificationField[];
}

export function errorRecord(generatedReply: string): ClassificationRecord {
  return {
    category: ERROR,
    tags: [ERROR],
    priority: ERROR,
    suggestedEta: ERROR,
    generatedReply,
    sentiment: ERROR
  };
}

export function parseFailureRecord(detail: string): ClassificationRecord {
  return errorRecord(`${PARSE_FAILURE_PREFIX}: ${detail}`);
}

export function transportFailureRecord(message: string): ClassificationRecord {
  return errorRecord(`${TRANSPORT_FAILURE_PREFIX}: ${message}`);
}

function readText(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function readEnum<T extends string>(value: unknown, allowed: readonly T[]): T | undefined {
  const text = readText(value)?.toLowerCase();
  return allowed.find((item) => item === text);
}

function readTags(value: unknown): string[] | undefined {
  if (Array.isArray(value)) {
    return value.map(readText).filter((tag): tag is string => tag !== undefined);
  }
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((tag) => tag.trim())
      .filter(Boolean);
  }
  return undefined;
}

/**
 * Turns a raw completion into a classification record. Never throws.
 *
 * Valid JSON objects with absent or unusable fields yield `Unknown`-style defaults
 * (`partial`); anything that is not a JSON object yields the `Error` sentinel.
 */
export function parseClassificationResponse(rawText: string, options: ParseOptions = {}): ParsedClassification {
  const parsed = options.extractEmbeddedJson ? extractFirstJsonObject(rawText) : parseJson(rawText);

  if (!parsed.ok) {
    return {
      outcome: 'parse_failure',
      record: parseFailureRecord(parsed.error),
      missingFields: []
    };
  }

  if (!isJsonObject(parsed.value)) {
    const actual = Array.isArray(parsed.value) ? 'array' : parsed.value === null ? 'null' : typeof parsed.value;
    return {
      outcome: 'parse_failure',
      record: parseFailureRecord(`expected a JSON object, got ${actual}`),
      missingFields: []
    };
  }

  const json = parsed.value;
  const missingFields: ClassificationField[] = [];

  function field<T>(name: ClassificationField, value: T | undefined, fallback: T): T {
    if (value === undefined) {
      missingFields.push(name);
      return fallback;
    }
    return value;
  }

  const record: ClassificationRecord = {
    category: field('category', readText(json.category), UNKNOWN),
    tags: field('tags', readTags(json.tags), []),
    priority: field<Priority>('priority', readEnum(json.priority, PRIORITIES), UNKNOWN),
    suggestedEta: field('suggestedEta', readText(json.suggested_eta), UNKNOWN),
    generatedReply: field('generatedReply', readText(json.generated_reply), NO_REPLY_GENERATED),
    sentiment: field<Sentiment>('sentiment', readEnum(json.sentiment, SENTIMENTS), UNKNOWN)
  };

  return {
    outcome: missingFields.length ? 'partial' : 'complete',
    record,
    missingFields
  };
}
