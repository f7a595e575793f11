import * as path from 'path';
import {
  optionalBoolean,
  optionalNumber,
  optionalString,
  optionalStringArray,
  optionalStringRecord,
  requireRecord,
} from '../protocol/requestArguments';
import { ProtocolError } from '../errors';

export interface LaunchArguments {
  /** Absolute path of the script to debug. */
  program: string;
  args: string[];
  /** Absolute working directory of the debuggee. */
  cwd: string;
  env: Record<string, string>;
  stopOnEntry: boolean;
  /** Overrides the host's interpreter for this session. */
  perlPath?: string;
  /** Passed to perl as `-I` switches, in order. */
  includePaths: string[];
}

export interface AttachArguments {
  host: string;
  port: number;
  /** How long to wait for the debugger to connect. */
  timeoutMs?: number;
}

export const DEFAULT_ATTACH_HOST = '127.0.0.1';

/**
 * Validates `launch` arguments. Relative paths are resolved against `cwd`,
 * which itself is resolved against `baseDir`.
 */
export function parseLaunchArguments(
  value: unknown,
  baseDir: string = process.cwd(),
): LaunchArguments {
  const command = 'launch';
  const record = requireRecord(value, command);
  const program = optionalString(record, 'program', command);
  if (!program || program.trim().length === 0) {
    throw new ProtocolError("Invalid arguments for 'launch': 'program' is required");
  }
  const cwd = path.resolve(baseDir, optionalString(record, 'cwd', command) ?? '.');
  return {
    program: path.resolve(cwd, program),
    args: optionalStringArray(record, 'args', command) ?? [],
    cwd,
    env: optionalStringRecord(record, 'env', command) ?? {},
    stopOnEntry: optionalBoolean(record, 'stopOnEntry', command) ?? false,
    perlPath: optionalString(record, 'perlPath', command),
    includePaths: (optionalStringArray(record, 'includePaths', command) ?? []).map(
      (include) => path.resolve(cwd, include),
    ),
  };
}

export function parseAttachArguments(value: unknown): AttachArguments {
  const command = 'attach';
  const record = requireRecord(value, command);
  const port = optionalNumber(record, 'port', command);
  if (port === undefined || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ProtocolError(
      "Invalid arguments for 'attach': 'port' must be an integer between 1 and 65535",
    );
  }
  const timeoutMs = optionalNumber(record, 'timeoutMs', command);
  if (timeoutMs !== undefined && !(timeoutMs > 0)) {
    throw new ProtocolError(
      "Invalid arguments for 'attach': 'timeoutMs' must be positive",
    );
  }
  return {
    host: optionalString(record, 'host', command) ?? DEFAULT_ATTACH_HOST,
    port,
    timeoutMs,
  };
}
