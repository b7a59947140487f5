export class TriageError extends Error {
  readonly code: string;

  constructor(message: string, code = 'TRIAGE_ERROR') {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class TriageHttpError extends TriageError {
  readonly status: number;
  readonly statusText: string;
  readonly details?: unknown;

  constructor(args: { message: string; status: number; statusText: string; details?: unknown }) {
    super(args.message, 'TRIAGE_HTTP_ERROR');
    this.status = args.status;
    this.statusText = args.statusText;
    this.details = args.details;
  }
}

/**
 * The endpoint answered 2xx but the body did not carry the expected result envelope.
 */
export class TriageEnvelopeError extends TriageError {
  constructor(message: string) {
    super(message, 'TRIAGE_ENVELOPE_ERROR');
  }
}

export class TriageTimeoutError extends TriageError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, 'TRIAGE_TIMEOUT_ERROR');
    this.timeoutMs = timeoutMs;
  }
}

export class TriageConfigError extends TriageError {
  constructor(message: string) {
    super(message, 'TRIAGE_CONFIG_ERROR');
  }
}
