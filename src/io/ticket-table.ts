import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';

import { TriageConfigError } from '../http/errors';
import { stringifyForOutput } from '../utils/json-output';
import type { BatchResult, ReportRow, Ticket } from '../workflows/types';

export const TICKET_ID_COLUMN = 'support_tick_id';
export const TICKET_TEXT_COLUMN = 'support_ticket_text';

export const REPORT_COLUMNS = [
  TICKET_ID_COLUMN,
  'category',
  'tags',
  'priority',
  'suggested_eta',
  'generated_reply',
  'sentiment'
] as const;

export const TAG_SEPARATOR = ', ';

const CsvRowsSchema = z.array(z.array(z.string()));

function readCsvRows(content: string): string[][] {
  try {
    return CsvRowsSchema.parse(
      parse(content, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true
      })
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TriageConfigError(`Cannot parse input CSV: ${reason}`);
  }
}

export function parseTicketCsv(content: string): Ticket[] {
  const rows = readCsvRows(content);

  const header = (rows[0] ?? []).map((name) => name.trim());
  const idIndex = header.indexOf(TICKET_ID_COLUMN);
  const textIndex = header.indexOf(TICKET_TEXT_COLUMN);
  const missing = [
    ...(idIndex === -1 ? [TICKET_ID_COLUMN] : []),
    ...(textIndex === -1 ? [TICKET_TEXT_COLUMN] : [])
  ];
  if (missing.length) {
    throw new TriageConfigError(
      `The input CSV must contain '${TICKET_ID_COLUMN}' and '${TICKET_TEXT_COLUMN}' columns (missing: ${missing.join(', ')}).`
    );
  }

  return rows.slice(1).map((cells) => ({
    id: (cells[idIndex] ?? '').trim(),
    text: cells[textIndex] ?? ''
  }));
}

export function loadTicketsFromCsv(filePath: string): Ticket[] {
  let content: string;
  try {
    content = readFileSync(path.resolve(filePath), 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TriageConfigError(`Cannot read input file ${filePath}: ${reason}`);
  }
  return parseTicketCsv(content);
}

export function flattenTags(tags: readonly string[]): string {
  return tags.join(TAG_SEPARATOR);
}

export function formatReportCsv(rows: readonly ReportRow[]): string {
  return stringify([
    [...REPORT_COLUMNS],
    ...rows.map((row) => [
      row.ticketId,
      row.category,
      flattenTags(row.tags),
      row.priority,
      row.suggestedEta,
      row.generatedReply,
      row.sentiment
    ])
  ]);
}

export function toReportJsonRow(row: ReportRow): Record<string, unknown> {
  return {
    [TICKET_ID_COLUMN]: row.ticketId,
    category: row.category,
    tags: row.tags,
    priority: row.priority,
    suggested_eta: row.suggestedEta,
    generated_reply: row.generatedReply,
    sentiment: row.sentiment,
    outcome: row.outcome
  };
}

export function formatReportJson(result: BatchResult): string {
  return `${stringifyForOutput({
    summary: result.summary,
    rows: result.rows.map(toReportJsonRow)
  })}\n`;
}

export function writeReport(filePath: string, content: string): string {
  const target = path.resolve(filePath);
  mkdirSync(path.dirname(target), { recursive: true });
  writeFileSync(target, content, 'utf8');
  return target;
}
