import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level: LevelWithSilent;
  /**
   * Also append every line to this file (the auth audit trail).
   */
  auditFile?: string;
  name?: string;
  /** Defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * Fields that must never reach a log line in clear text.
 */
export const REDACTED_PATHS = [
  'password',
  '*.password',
  'masterKey',
  '*.masterKey',
  'refresh_token',
  '*.refresh_token',
  'req.headers.authorization',
  'req.headers.cookie',
];

export function createLogger(options: LoggerOptions): Logger {
  const base = {
    name: options.name ?? 'blog-api',
    level: options.level,
    redact: { paths: REDACTED_PATHS, censor: '****' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const primary = options.destination ?? pino.destination(1);
  if (!options.auditFile) {
    return pino(base, primary);
  }

  const streams: { stream: DestinationStream }[] = [
    { stream: primary },
    { stream: pino.destination({ dest: options.auditFile, mkdir: true, sync: false }) },
  ];
  return pino(base, pino.multistream(streams));
}
