import pino from 'pino';
import { LogLevel } from 'perl-debug-core';

/**
 * Fields that may carry debuggee environments. Launch requests are logged at
 * debug level with their arguments, and those often hold credentials.
 */
const REDACTED_PATHS = [
  'dapRequest.arguments.env',
  'dapMessage.arguments.env',
  'settings.env',
  'env',
];

export interface AdapterLoggerOptions {
  level: LogLevel;
  /** Append to this file instead of writing to stderr. */
  logFile?: string;
  /** Explicit destination, used by tests. */
  destination?: pino.DestinationStream;
}

/**
 * Root logger of the adapter. JSON lines go to stderr by default: in stdio
 * mode stdout carries the protocol.
 */
export function createAdapterLogger(options: AdapterLoggerOptions): pino.Logger {
  const destination =
    options.destination ??
    (options.logFile
      ? pino.destination({ dest: options.logFile, mkdir: true, sync: true })
      : pino.destination({ dest: 2, sync: true }));

  return pino(
    {
      name: 'perl-debug-adapter',
      level: options.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: REDACTED_PATHS,
        censor: '[REDACTED]',
      },
    },
    destination,
  );
}
