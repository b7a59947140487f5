import { describe, expect, it } from 'vitest';

import {
  NO_REPLY_GENERATED,
  parseClassificationResponse,
  PARSE_FAILURE_PREFIX,
  transportFailureRecord
} from '../src/workflows/response-parser';
import { LAPTOP_COMPLETION } from './support/fake-inference-client';

describe('response parser', () => {
  it('extracts all six fields from a conforming completion', () => {
    const parsed = parseClassificationResponse(LAPTOP_COMPLETION);

    expect(parsed.outcome).toBe('complete');
    expect(parsed.missingFields).toEqual([]);
    expect(parsed.record).toEqual({
      category: 'hardware issues',
      tags: ['boot failure'],
      priority: 'high',
      suggestedEta: '2 hours',
      generatedReply: "We're sorry...",
      sentiment: 'negative'
    });
  });

  it('defaults absent fields without failing the record', () => {
    const parsed = parseClassificationResponse('{"category":"billing","priority":"low"}');

    expect(parsed.outcome).toBe('partial');
    expect(parsed.missingFields).toEqual(['tags', 'suggestedEta', 'generatedReply', 'sentiment']);
    expect(parsed.record).toEqual({
      category: 'billing',
      tags: [],
      priority: 'low',
      suggestedEta: 'Unknown',
      generatedReply: NO_REPLY_GENERATED,
      sentiment: 'Unknown'
    });
  });

  it('defaults every field for an empty object', () => {
    expect(parseClassificationResponse('{}').record).toEqual({
      category: 'Unknown',
      tags: [],
      priority: 'Unknown',
      suggestedEta: 'Unknown',
      generatedReply: 'No reply generated',
      sentiment: 'Unknown'
    });
  });

  it('returns the Error sentinel for non-JSON text', () => {
    const parsed = parseClassificationResponse('not json');

    expect(parsed.outcome).toBe('parse_failure');
    expect(parsed.record.category).toBe('Error');
    expect(parsed.record.tags).toEqual(['Error']);
    expect(parsed.record.priority).toBe('Error');
    expect(parsed.record.suggestedEta).toBe('Error');
    expect(parsed.record.sentiment).toBe('Error');
    expect(parsed.record.generatedReply.startsWith(`${PARSE_FAILURE_PREFIX}: `)).toBe(true);
  });

  it('treats JSON that is not an object as a parse failure', () => {
    expect(parseClassificationResponse('["hardware"]').record.generatedReply).toBe(
      "Error decoding the model's JSON response: expected a JSON object, got array"
    );
    expect(parseClassificationResponse('null').record.generatedReply).toBe(
      "Error decoding the model's JSON response: expected a JSON object, got null"
    );
    expect(parseClassificationResponse('42').outcome).toBe('parse_failure');
  });

  it('keeps malformed and partial completions distinguishable', () => {
    const malformed = parseClassificationResponse('{"category": "network"').record;
    const partial = parseClassificationResponse('{"category": "network"}').record;

    expect(malformed.category).toBe('Error');
    expect(partial.category).toBe('network');
    expect(malformed.priority).not.toBe(partial.priority);
    expect(malformed.sentiment).not.toBe(partial.sentiment);
    expect(malformed.tags).not.toEqual(partial.tags);
  });

  it('normalizes enum casing and rejects values outside the enumeration', () => {
    const parsed = parseClassificationResponse('{"priority":" HIGH ","sentiment":"furious"}');
    expect(parsed.record.priority).toBe('high');
    expect(parsed.record.sentiment).toBe('Unknown');
    expect(parsed.missingFields).toContain('sentiment');
    expect(parsed.missingFields).not.toContain('priority');
  });

  it('accepts tags as a comma-separated string and drops non-string items', () => {
    expect(parseClassificationResponse('{"tags":"data loss, wifi ,"}').record.tags).toEqual(['data loss', 'wifi']);
    expect(parseClassificationResponse('{"tags":["vpn", 3, "", " sso "]}').record.tags).toEqual(['vpn', 'sso']);
    expect(parseClassificationResponse('{"tags":{"a":1}}').missingFields).toContain('tags');
  });

  it('counts blank and non-string scalars as missing', () => {
    const parsed = parseClassificationResponse('{"category":"  ","suggested_eta":4}');
    expect(parsed.record.category).toBe('Unknown');
    expect(parsed.record.suggestedEta).toBe('Unknown');
  });

  it('only reads embedded JSON when asked to', () => {
    const wrapped = `Sure! Here is the result:\n\`\`\`json\n${LAPTOP_COMPLETION}\n\`\`\``;

    expect(parseClassificationResponse(wrapped).outcome).toBe('parse_failure');
    const lenient = parseClassificationResponse(wrapped, { extractEmbeddedJson: true });
    expect(lenient.outcome).toBe('complete');
    expect(lenient.record.category).toBe('hardware issues');
  });

  it('never throws for arbitrary input', () => {
    for (const input of ['', ' ', '{', '}{', '"str"', 'true', '{"tags":null}', '\u0000']) {
      expect(() => parseClassificationResponse(input, { extractEmbeddedJson: true })).not.toThrow();
    }
  });

  it('prefixes transport failures differently from parse failures', () => {
    expect(transportFailureRecord('timeout').generatedReply).toBe('Inference request failed: timeout');
  });
});
