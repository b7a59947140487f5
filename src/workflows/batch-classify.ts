import { toTransportFailure, type InferenceClient, type InferenceResult } from '../llm/provider';
import { renderTicketClassificationPrompt } from '../llm/prompts/ticket-classification';
import { getLogger } from '../observability/logger';
import { withSpan } from '../observability/tracing';
import { parseClassificationResponse, transportFailureRecord } from './response-parser';
import type { BatchResult, BatchSummary, ClassificationRecord, ReportRow, Ticket } from './types';

type TraceStream = { write(chunk: string): unknown };

export interface BatchOptions {
  client: InferenceClient;
  extractEmbeddedJson?: boolean;
  verbose?: boolean;
  trace?: TraceStream;
  onProgress?: (index: number, total: number, row: ReportRow) => void;
}

function emptySummary(total: number): BatchSummary {
  return { total, complete: 0, partial: 0, parseFailures: 0, transportFailures: 0 };
}

function countRow(summary: BatchSummary, row: ReportRow): void {
  if (row.outcome === 'complete') {
    summary.complete += 1;
  } else if (row.outcome === 'partial') {
    summary.partial += 1;
  } else if (row.outcome === 'parse_failure') {
    summary.parseFailures += 1;
  } else {
    summary.transportFailures += 1;
  }
}

function formatTrace(ticket: Ticket, result: InferenceResult, row: ReportRow): string {
  const lines = [`--- ticket ${ticket.id || '(no id)'} ---`, `input: ${ticket.text}`];
  if (result.ok) {
    lines.push(`completion: ${result.rawText}`);
  } else {
    lines.push(`transport failure (${result.kind}): ${result.message}`);
  }
  lines.push(
    `outcome: ${row.outcome}`,
    `category: ${row.category}`,
    `tags: ${row.tags.join(', ')}`,
    `priority: ${row.priority}`,
    `suggested_eta: ${row.suggestedEta}`,
    `sentiment: ${row.sentiment}`,
    `generated_reply: ${row.generatedReply}`
  );
  return `${lines.join('\n')}\n`;
}

function toRow(ticket: Ticket, record: ClassificationRecord, outcome: ReportRow['outcome']): ReportRow {
  return { ticketId: ticket.id, ticketText: ticket.text, ...record, outcome };
}

// A client that throws despite the contract still only costs this one row.
async function invokeIsolated(client: InferenceClient, prompt: string): Promise<InferenceResult> {
  try {
    return await client.invoke(prompt);
  } catch (error) {
    return toTransportFailure(error);
  }
}

export async function classifyTicket(
  ticket: Ticket,
  options: Pick<BatchOptions, 'client' | 'extractEmbeddedJson'>
): Promise<{ result: InferenceResult; row: ReportRow }> {
  const logger = getLogger();
  const prompt = renderTicketClassificationPrompt(ticket.text);
  const result = await invokeIsolated(options.client, prompt);

  if (!result.ok) {
    logger.warn({ ticketId: ticket.id, kind: result.kind, status: result.status }, `Inference failed: ${result.message}`);
    return { result, row: toRow(ticket, transportFailureRecord(result.message), 'transport_failure') };
  }

  const parsed = parseClassificationResponse(result.rawText, { extractEmbeddedJson: options.extractEmbeddedJson });
  if (parsed.outcome === 'parse_failure') {
    logger.warn({ ticketId: ticket.id, completion: result.rawText }, 'Completion is not a JSON object');
  } else if (parsed.outcome === 'partial') {
    logger.info({ ticketId: ticket.id, missingFields: parsed.missingFields }, 'Completion is missing fields');
  }

  return { result, row: toRow(ticket, parsed.record, parsed.outcome) };
}

/**
 * Classifies tickets strictly in input order, one request in flight at a time. Per-ticket
 * failures become sentinel rows, so `rows.length === tickets.length` always holds.
 */
export async function runBatchClassification(tickets: readonly Ticket[], options: BatchOptions): Promise<BatchResult> {
  const logger = getLogger();
  const summary = emptySummary(tickets.length);

  return withSpan('triage.batch', { 'triage.batch.size': tickets.length }, async (span) => {
    const rows: ReportRow[] = [];

    for (const [index, ticket] of tickets.entries()) {
      const { result, row } = await withSpan('triage.ticket', { 'triage.ticket.id': ticket.id }, () =>
        classifyTicket(ticket, options)
      );

      rows.push(row);
      countRow(summary, row);

      if (options.verbose) {
        (options.trace ?? process.stderr).write(formatTrace(ticket, result, row));
      }
      options.onProgress?.(index + 1, tickets.length, row);
    }

    span.setAttribute('triage.batch.failures', summary.parseFailures + summary.transportFailures);
    logger.info({ ...summary }, 'Batch classification finished');
    return { rows, summary };
  });
}
