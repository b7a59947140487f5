import { describe, expect, it, vi } from 'vitest';

import { renderTicketClassificationPrompt } from '../src/llm/prompts/ticket-classification';
import { formatReportCsv } from '../src/io/ticket-table';
import { runBatchClassification } from '../src/workflows/batch-classify';
import type { Ticket } from '../src/workflows/types';
import { FakeInferenceClient, LAPTOP_COMPLETION, transportFailure } from './support/fake-inference-client';

const laptop: Ticket = { id: 'T1', text: "My laptop won't boot" };

describe('batch classification', () => {
  it('maps a valid completion onto the report row', async () => {
    const client = new FakeInferenceClient([LAPTOP_COMPLETION]);
    const { rows } = await runBatchClassification([laptop], { client });

    expect(client.prompts).toEqual([renderTicketClassificationPrompt("My laptop won't boot")]);
    expect(rows).toEqual([
      {
        ticketId: 'T1',
        ticketText: "My laptop won't boot",
        category: 'hardware issues',
        tags: ['boot failure'],
        priority: 'high',
        suggestedEta: '2 hours',
        generatedReply: "We're sorry...",
        sentiment: 'negative',
        outcome: 'complete'
      }
    ]);
    expect(formatReportCsv(rows).split('\n')[1]).toBe('T1,hardware issues,boot failure,high,2 hours,We\'re sorry...,negative');
  });

  it('turns a non-JSON completion into the Error sentinel', async () => {
    const { rows } = await runBatchClassification([laptop], { client: new FakeInferenceClient(['not json']) });

    expect(rows[0].category).toBe('Error');
    expect(rows[0].outcome).toBe('parse_failure');
    expect(rows[0].generatedReply).toMatch(/^Error decoding the model's JSON response: /);
  });

  it('turns a thrown transport error into a sentinel row carrying its message', async () => {
    const { rows } = await runBatchClassification([laptop], {
      client: new FakeInferenceClient([new Error('timeout')])
    });

    expect(rows[0].category).toBe('Error');
    expect(rows[0].outcome).toBe('transport_failure');
    expect(rows[0].generatedReply).toBe('Inference request failed: timeout');
  });

  it('turns a returned transport failure into a sentinel row', async () => {
    const { rows } = await runBatchClassification([laptop], {
      client: new FakeInferenceClient([transportFailure('Request timed out after 5ms', 'timeout')])
    });

    expect(rows[0].generatedReply).toBe('Inference request failed: Request timed out after 5ms');
    expect(rows[0].tags).toEqual(['Error']);
  });

  it('defaults missing tags without treating the row as an error', async () => {
    const completion = JSON.stringify({
      category: 'account access',
      priority: 'medium',
      suggested_eta: '1 day',
      generated_reply: 'We will reset your password.',
      sentiment: 'neutral'
    });
    const { rows } = await runBatchClassification([{ id: 'T2', text: 'Locked out' }], {
      client: new FakeInferenceClient([completion])
    });

    expect(rows[0]).toMatchObject({
      category: 'account access',
      tags: [],
      priority: 'medium',
      suggestedEta: '1 day',
      generatedReply: 'We will reset your password.',
      sentiment: 'neutral',
      outcome: 'partial'
    });
  });

  it('returns one row per ticket in input order whatever fails', async () => {
    const tickets: Ticket[] = ['A', 'B', 'C', 'D', 'E'].map((id) => ({ id, text: `ticket ${id}` }));
    const client = new FakeInferenceClient([
      LAPTOP_COMPLETION,
      new Error('connection reset'),
      transportFailure('HTTP 403 Forbidden', 'auth'),
      '<html>oops</html>',
      '{"category":"other"}'
    ]);

    const { rows, summary } = await runBatchClassification(tickets, { client });

    expect(client.prompts).toHaveLength(5);
    expect(rows.map((row) => row.ticketId)).toEqual(['A', 'B', 'C', 'D', 'E']);
    expect(rows.map((row) => row.outcome)).toEqual([
      'complete',
      'transport_failure',
      'transport_failure',
      'parse_failure',
      'partial'
    ]);
    expect(summary).toEqual({ total: 5, complete: 1, partial: 1, parseFailures: 1, transportFailures: 2 });
  });

  it('returns an empty report for an empty batch', async () => {
    const client = new FakeInferenceClient([]);
    const result = await runBatchClassification([], { client });

    expect(result.rows).toEqual([]);
    expect(result.summary.total).toBe(0);
    expect(client.prompts).toEqual([]);
  });

  it('traces each ticket in verbose mode without changing the rows', async () => {
    const replies = [LAPTOP_COMPLETION, new Error('timeout')];
    const tickets: Ticket[] = [laptop, { id: 'T9', text: 'Printer jammed' }];
    const trace = { write: vi.fn() };

    const quiet = await runBatchClassification(tickets, { client: new FakeInferenceClient(replies) });
    const verbose = await runBatchClassification(tickets, {
      client: new FakeInferenceClient(replies),
      verbose: true,
      trace
    });

    expect(verbose).toEqual(quiet);
    expect(trace.write).toHaveBeenCalledTimes(2);

    const first = String(trace.write.mock.calls[0][0]).split('\n');
    expect(first.slice(0, 4)).toEqual([
      '--- ticket T1 ---',
      "input: My laptop won't boot",
      `completion: ${LAPTOP_COMPLETION}`,
      'outcome: complete'
    ]);

    const second = String(trace.write.mock.calls[1][0]).split('\n');
    expect(second[2]).toBe('transport failure (network): timeout');
    expect(second).toContain('generated_reply: Inference request failed: timeout');
  });

  it('does not trace when verbose is off', async () => {
    const trace = { write: vi.fn() };
    await runBatchClassification([laptop], { client: new FakeInferenceClient([LAPTOP_COMPLETION]), trace });
    expect(trace.write).not.toHaveBeenCalled();
  });

  it('reports progress after every ticket', async () => {
    const onProgress = vi.fn();
    await runBatchClassification([laptop, laptop], {
      client: new FakeInferenceClient([LAPTOP_COMPLETION, 'nope']),
      onProgress
    });

    expect(onProgress.mock.calls.map((call) => [call[0], call[1], call[2].outcome])).toEqual([
      [1, 2, 'complete'],
      [2, 2, 'parse_failure']
    ]);
  });

  it('keeps one request in flight at a time', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const client = {
      async invoke() {
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 1));
        inFlight -= 1;
        return { ok: true as const, rawText: '{}' };
      }
    };

    await runBatchClassification([laptop, laptop, laptop], { client });
    expect(maxInFlight).toBe(1);
  });
});
