import { DebugProtocol } from '@vscode/debugprotocol';
import { ProtocolError } from '../errors';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(command: string, detail: string): ProtocolError {
  return new ProtocolError(`Invalid arguments for '${command}': ${detail}`);
}

export function requireRecord(
  value: unknown,
  command: string,
): Record<string, unknown> {
  if (!isRecord(value)) {
    throw invalid(command, 'arguments must be an object');
  }
  return value;
}

export function requireNumber(
  record: Record<string, unknown>,
  key: string,
  command: string,
): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw invalid(command, `'${key}' must be a number`);
  }
  return value;
}

export function requireString(
  record: Record<string, unknown>,
  key: string,
  command: string,
): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw invalid(command, `'${key}' must be a string`);
  }
  return value;
}

export function optionalNumber(
  record: Record<string, unknown>,
  key: string,
  command: string,
): number | undefined {
  return record[key] === undefined
    ? undefined
    : requireNumber(record, key, command);
}

export function optionalString(
  record: Record<string, unknown>,
  key: string,
  command: string,
): string | undefined {
  return record[key] === undefined
    ? undefined
    : requireString(record, key, command);
}

export function optionalBoolean(
  record: Record<string, unknown>,
  key: string,
  command: string,
): boolean | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw invalid(command, `'${key}' must be a boolean`);
  }
  return value;
}

export function optionalStringArray(
  record: Record<string, unknown>,
  key: string,
  command: string,
): string[] | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v) => typeof v === 'string')) {
    throw invalid(command, `'${key}' must be an array of strings`);
  }
  return value.map(String);
}

export function optionalStringRecord(
  record: Record<string, unknown>,
  key: string,
  command: string,
): Record<string, string> | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw invalid(command, `'${key}' must be an object of strings`);
  }
  const result: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw invalid(command, `'${key}.${name}' must be a string`);
    }
    result[name] = entry;
  }
  return result;
}

export interface ClientCapabilities {
  clientID?: string;
  adapterID: string;
  linesStartAt1: boolean;
  columnsStartAt1: boolean;
}

export function parseInitializeArguments(value: unknown): ClientCapabilities {
  const command = 'initialize';
  const record = value === undefined ? {} : requireRecord(value, command);
  return {
    clientID: optionalString(record, 'clientID', command),
    adapterID: optionalString(record, 'adapterID', command) ?? 'perl',
    linesStartAt1: optionalBoolean(record, 'linesStartAt1', command) ?? true,
    columnsStartAt1:
      optionalBoolean(record, 'columnsStartAt1', command) ?? true,
  };
}

export interface RequestedBreakpoint {
  line: number;
  condition?: string;
  hitCondition?: string;
  logMessage?: string;
}

export interface SetBreakpointsRequest {
  source: DebugProtocol.Source;
  path: string;
  breakpoints: RequestedBreakpoint[];
}

export function parseSetBreakpointsArguments(
  value: unknown,
): SetBreakpointsRequest {
  const command = 'setBreakpoints';
  const record = requireRecord(value, command);
  const source = record.source;
  if (!isRecord(source) || typeof source.path !== 'string' || !source.path) {
    throw invalid(command, "'source.path' is required");
  }
  const sourceInfo: DebugProtocol.Source = { path: source.path };
  if (typeof source.name === 'string') {
    sourceInfo.name = source.name;
  }

  const breakpoints: RequestedBreakpoint[] = [];
  if (record.breakpoints !== undefined) {
    if (!Array.isArray(record.breakpoints)) {
      throw invalid(command, "'breakpoints' must be an array");
    }
    for (const entry of record.breakpoints) {
      const bp = requireRecord(entry, command);
      breakpoints.push({
        line: requireNumber(bp, 'line', command),
        condition: optionalString(bp, 'condition', command),
        hitCondition: optionalString(bp, 'hitCondition', command),
        logMessage: optionalString(bp, 'logMessage', command),
      });
    }
  } else if (record.lines !== undefined) {
    if (
      !Array.isArray(record.lines) ||
      !record.lines.every((line) => typeof line === 'number')
    ) {
      throw invalid(command, "'lines' must be an array of numbers");
    }
    for (const line of record.lines) {
      breakpoints.push({ line: Number(line) });
    }
  }
  return { source: sourceInfo, path: source.path, breakpoints };
}

export interface RequestedFunctionBreakpoint {
  name: string;
  condition?: string;
  hitCondition?: string;
}

export function parseSetFunctionBreakpointsArguments(
  value: unknown,
): RequestedFunctionBreakpoint[] {
  const command = 'setFunctionBreakpoints';
  const record = requireRecord(value, command);
  if (!Array.isArray(record.breakpoints)) {
    throw invalid(command, "'breakpoints' must be an array");
  }
  return record.breakpoints.map((entry) => {
    const bp = requireRecord(entry, command);
    return {
      name: requireString(bp, 'name', command),
      condition: optionalString(bp, 'condition', command),
      hitCondition: optionalString(bp, 'hitCondition', command),
    };
  });
}

export function parseSetExceptionBreakpointsArguments(
  value: unknown,
): string[] {
  const command = 'setExceptionBreakpoints';
  const record = requireRecord(value, command);
  const filters = optionalStringArray(record, 'filters', command);
  if (filters === undefined) {
    throw invalid(command, "'filters' is required");
  }
  return filters;
}

export function parseThreadId(value: unknown, command: string): number {
  return requireNumber(requireRecord(value, command), 'threadId', command);
}

export interface StackTraceRequest {
  threadId: number;
  startFrame: number;
  levels?: number;
}

export function parseStackTraceArguments(value: unknown): StackTraceRequest {
  const command = 'stackTrace';
  const record = requireRecord(value, command);
  const levels = optionalNumber(record, 'levels', command);
  return {
    threadId: requireNumber(record, 'threadId', command),
    startFrame: optionalNumber(record, 'startFrame', command) ?? 0,
    levels: levels !== undefined && levels > 0 ? levels : undefined,
  };
}

export function parseScopesArguments(value: unknown): number {
  const command = 'scopes';
  return requireNumber(requireRecord(value, command), 'frameId', command);
}

export function parseVariablesArguments(value: unknown): number {
  const command = 'variables';
  return requireNumber(
    requireRecord(value, command),
    'variablesReference',
    command,
  );
}

export interface EvaluateRequest {
  expression: string;
  frameId?: number;
  context?: string;
}

export function parseEvaluateArguments(value: unknown): EvaluateRequest {
  const command = 'evaluate';
  const record = requireRecord(value, command);
  return {
    expression: requireString(record, 'expression', command),
    frameId: optionalNumber(record, 'frameId', command),
    context: optionalString(record, 'context', command),
  };
}

export interface SetVariableRequest {
  variablesReference: number;
  name: string;
  value: string;
}

export function parseSetVariableArguments(value: unknown): SetVariableRequest {
  const command = 'setVariable';
  const record = requireRecord(value, command);
  return {
    variablesReference: requireNumber(record, 'variablesReference', command),
    name: requireString(record, 'name', command).trim(),
    value: requireString(record, 'value', command).trim(),
  };
}

export interface InlineValuesRequest {
  path: string;
  startLine: number;
  endLine: number;
}

export function parseInlineValuesArguments(value: unknown): InlineValuesRequest {
  const command = 'inlineValues';
  const record = requireRecord(value, command);
  const source = record.source;
  if (!isRecord(source) || typeof source.path !== 'string' || !source.path) {
    throw invalid(command, "'source.path' is required");
  }
  return {
    path: source.path,
    startLine: requireNumber(record, 'startLine', command),
    endLine: requireNumber(record, 'endLine', command),
  };
}
