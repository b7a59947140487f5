import { readFileSync } from 'node:fs';
import path from 'node:path';

import { Command } from 'commander';

import { describeSettings, resolveSettings, type TriageSettings } from '../config/settings';
import { TriageConfigError } from '../http/errors';
import {
  formatReportCsv,
  formatReportJson,
  loadTicketsFromCsv,
  toReportJsonRow,
  writeReport
} from '../io/ticket-table';
import { createInferenceClient, type InferenceClient } from '../llm/provider';
import { renderTicketClassificationPrompt } from '../llm/prompts/ticket-classification';
import { writeJsonLine } from '../utils/json-output';
import { getCliVersion } from '../utils/version';
import { classifyTicket, runBatchClassification } from '../workflows/batch-classify';
import type { BatchSummary } from '../workflows/types';

type OutputStream = Pick<typeof process.stdout, 'write'>;
type ErrorStream = Pick<typeof process.stderr, 'write'>;
type ReportFormat = 'csv' | 'json';

const REPORT_FORMATS: ReportFormat[] = ['csv', 'json'];

export interface CliRuntime {
  stdout?: OutputStream;
  stderr?: ErrorStream;
  env?: Record<string, string | undefined>;
  createClient?: (settings: TriageSettings) => InferenceClient;
}

interface InferenceOptions {
  extractJson?: boolean;
  provider?: string;
  model?: string;
  region?: string;
  endpointUrl?: string;
  timeoutMs?: string;
}

interface ClassifyOptions extends InferenceOptions {
  input: string;
  out?: string;
  format?: string;
  verbose?: boolean;
}

interface ClassifyTextOptions extends InferenceOptions {
  file?: string;
  id: string;
}

function parseReportFormat(value: string | undefined): ReportFormat {
  const format = (value ?? 'csv').trim().toLowerCase();
  const match = REPORT_FORMATS.find((item) => item === format);
  if (!match) {
    throw new TriageConfigError(`Invalid format: ${value}. Use ${REPORT_FORMATS.join('|')}.`);
  }
  return match;
}

function readTicketText(text: string | undefined, file: string | undefined): string {
  return file ? readFileSync(path.resolve(file), 'utf8') : (text ?? '');
}

function addInferenceOptions(command: Command): Command {
  return command
    .option('--extract-json', 'Accept a JSON object embedded in surrounding text')
    .option('--provider <provider>', 'bedrock-titan|openai-compatible')
    .option('--model <modelId>', 'Model id')
    .option('--region <region>', 'Bedrock region')
    .option('--endpoint-url <url>', 'Inference endpoint base URL')
    .option('--timeout-ms <ms>', 'Per-request timeout in milliseconds');
}

function settingsFrom(env: Record<string, string | undefined>, options: InferenceOptions): TriageSettings {
  return resolveSettings(env, {
    provider: options.provider,
    modelId: options.model,
    region: options.region,
    endpointUrl: options.endpointUrl,
    timeoutMs: options.timeoutMs
  });
}

export function formatSummaryLine(summary: BatchSummary): string {
  return (
    `Classified ${summary.total} ticket${summary.total === 1 ? '' : 's'}: ` +
    `${summary.complete} complete, ${summary.partial} partial, ` +
    `${summary.parseFailures} parse failures, ${summary.transportFailures} transport failures.`
  );
}

export function createCli(runtime: CliRuntime = {}): Command {
  const stdout = runtime.stdout ?? process.stdout;
  const stderr = runtime.stderr ?? process.stderr;
  const env = runtime.env ?? process.env;
  const createClient = runtime.createClient ?? createInferenceClient;

  const program = new Command();
  program
    .name('support-triage')
    .description('Classify support tickets with a hosted LLM and write a triage report')
    .version(getCliVersion());
  program.option('--error-format <format>', 'text|json', 'text');

  program.exitOverride((error) => {
    if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
      return;
    }
    throw error;
  });

  program.configureOutput({
    writeOut: (text: string) => {
      stdout.write(text);
    },
    writeErr: (text: string) => {
      stderr.write(text);
    }
  });

  addInferenceOptions(
    program
      .command('classify')
      .description('Classify every ticket in a CSV file')
      .requiredOption('--input <path>', 'CSV with support_tick_id and support_ticket_text columns')
      .option('--out <path>', 'Write the report here instead of stdout')
      .option('--format <format>', 'csv|json', 'csv')
      .option('--verbose', 'Trace each ticket input and output to stderr')
  ).action(async (options: ClassifyOptions) => {
    const format = parseReportFormat(options.format);
    const settings = settingsFrom(env, options);
    const tickets = loadTicketsFromCsv(options.input);
    const client = createClient(settings);

    const result = await runBatchClassification(tickets, {
      client,
      verbose: options.verbose === true,
      trace: stderr,
      extractEmbeddedJson: options.extractJson === true
    });

    const content = format === 'json' ? formatReportJson(result) : formatReportCsv(result.rows);
    if (options.out) {
      const target = writeReport(options.out, content);
      stderr.write(`Wrote ${result.rows.length} rows to ${target}\n`);
    } else {
      stdout.write(content);
    }
    stderr.write(`${formatSummaryLine(result.summary)}\n`);
  });

  program
    .command('prompt')
    .description('Print the rendered classification prompt for one ticket text')
    .argument('[text]', 'Ticket text')
    .option('--file <path>', 'Read the ticket text from a file')
    .action((text: string | undefined, options: { file?: string }) => {
      stdout.write(`${renderTicketClassificationPrompt(readTicketText(text, options.file))}\n`);
    });

  addInferenceOptions(
    program
      .command('classify-text')
      .description('Classify one ticket text and print the result as JSON')
      .argument('[text]', 'Ticket text')
      .option('--file <path>', 'Read the ticket text from a file')
      .option('--id <id>', 'Ticket id to report', 'adhoc')
  ).action(async (text: string | undefined, options: ClassifyTextOptions) => {
    const ticketText = readTicketText(text, options.file);
    if (!ticketText.trim()) {
      throw new TriageConfigError('Please enter a valid support ticket.');
    }
    const client = createClient(settingsFrom(env, options));
    const { row } = await classifyTicket(
      { id: options.id, text: ticketText },
      { client, extractEmbeddedJson: options.extractJson === true }
    );
    writeJsonLine(stdout, toReportJsonRow(row));
  });

  const config = program.command('config').description('Inspect resolved settings');
  config
    .command('show')
    .description('Print resolved inference settings (API key masked)')
    .action(() => {
      writeJsonLine(stdout, describeSettings(resolveSettings(env)));
    });

  return program;
}

export async function runCli(argv = process.argv, runtime: CliRuntime = {}): Promise<void> {
  const program = createCli(runtime);
  await program.parseAsync(argv);
}
