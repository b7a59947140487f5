export const PRIORITIES = ['high', 'medium', 'low'] as const;
export const SENTIMENTS = ['positive', 'negative', 'neutral'] as const;

export const UNKNOWN = 'Unknown';
export const ERROR = 'Error';

export type Priority = (typeof PRIORITIES)[number] | typeof UNKNOWN | typeof ERROR;
export type Sentiment = (typeof SENTIMENTS)[number] | typeof UNKNOWN | typeof ERROR;

export interface Ticket {
  readonly id: string;
  readonly text: string;
}

export interface ClassificationRecord {
  category: string;
  tags: string[];
  priority: Priority;
  suggestedEta: string;
  generatedReply: string;
  sentiment: Sentiment;
}

export type ClassificationField = keyof ClassificationRecord;

/**
 * `complete`/`partial` came from parseable JSON; the two failure outcomes carry the sentinel record.
 */
export type ClassificationOutcome = 'complete' | 'partial' | 'parse_failure' | 'transport_failure';

export interface ReportRow extends ClassificationRecord {
  ticketId: string;
  ticketText: string;
  outcome: ClassificationOutcome;
}

export interface BatchSummary {
  total: number;
  complete: number;
  partial: number;
  parseFailures: number;
  transportFailures: number;
}

export interface BatchResult {
  rows: ReportRow[];
  summary: BatchSummary;
}
