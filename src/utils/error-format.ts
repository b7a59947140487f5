import { toProblemDetails } from '../contracts/problem';

export type CliErrorFormat = 'text' | 'json';

function isCliErrorFormat(value: string | undefined): value is CliErrorFormat {
  return value === 'text' || value === 'json';
}

export function parseErrorFormatArg(argv: string[]): CliErrorFormat | undefined {
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '--error-format') {
      const next = argv[index + 1];
      if (isCliErrorFormat(next)) {
        return next;
      }
      continue;
    }

    if (arg.startsWith('--error-format=')) {
      const value = arg.slice('--error-format='.length);
      if (isCliErrorFormat(value)) {
        return value;
      }
    }
  }

  return undefined;
}

export function resolveCliErrorFormat(argv: string[], envValue = process.env.TRIAGE_ERROR_FORMAT): CliErrorFormat {
  return parseErrorFormatArg(argv) ?? (envValue === 'json' ? 'json' : 'text');
}

export function formatFatalError(error: unknown, format: CliErrorFormat): string {
  if (format === 'json') {
    return `${JSON.stringify(toProblemDetails(error), null, 2)}\n`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `${message}\n`;
}
