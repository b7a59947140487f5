import { TriageConfigError } from '../http/errors';

export interface ProblemDetails {
  type: string;
  title: string;
  status?: number;
  detail: string;
  instance?: string;
  triageCode: string;
}

function toMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// Inference failures never get here: they are reported per ticket, not as fatal errors.
export function toProblemDetails(error: unknown, instance?: string): ProblemDetails {
  if (error instanceof TriageConfigError) {
    return {
      type: 'urn:support-triage:problems:config-error',
      title: 'Invalid configuration',
      status: 400,
      detail: error.message,
      instance,
      triageCode: error.code
    };
  }

  return {
    type: 'about:blank',
    title: 'Unhandled error',
    status: 500,
    detail: toMessage(error),
    instance,
    triageCode: 'TRIAGE_UNHANDLED_ERROR'
  };
}
