import pino, { type Logger } from 'pino';

function resolveLevel(): string {
  return process.env.TRIAGE_LOG_LEVEL?.trim() || 'silent';
}

let singleton: Logger | undefined;

export function getLogger(): Logger {
  if (!singleton) {
    singleton = pino(
      {
        name: 'support-triage',
        level: resolveLevel()
      },
      pino.destination(2)
    );
  }
  return singleton;
}
