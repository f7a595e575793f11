import { BridgeFrame, BridgeLocation, BridgeVariable } from './debuggeeBridge';

/** `  DB<1> `, `  DB<<12>> ` (nested), with or without trailing space. */
const PROMPT = /^\s*DB<+\d+>+\s*$/;

/** `main::foo(lib/x.pl:12):\tcode` or `main::(x.pl:3):` at file scope. */
const CONTEXT =
  /^((?:[A-Za-z_]\w*::)*\w*)\((.+?):(\d+)\):(.*)$/;

/** One line of `T` output: `$ = main::foo(1, 2) called from file 'x.pl' line 12`. */
const BACKTRACE =
  /^\s*[$@.]\s*=\s*(.+?)(?:\(.*\))?\s+called from file ['`](.+?)'\s+line\s+(\d+)\s*$/;

const VARIABLE = /^(\s*)([$@%][\w:]+)\s*=\s*(.*)$/;
const ARRAY_ELEMENT = /^(\s*)(\d+)\s+(.*)$/;
const HASH_ELEMENT = /^(\s*)(.+?)\s+=>\s+(.*)$/;

const TERMINATED = /Debugged program terminated/;

const EXCEPTION =
  /\b(?:died|uncaught exception|panic)\b|^\s*at\s+\S+?\s+line\s+\d+\.?$/i;

/** `... at lib/x.pl line 12.` */
const ERROR_LOCATION = /\bat\s+(\S+?)\s+line\s+(\d+)\b/;

/** Debugger chatter that is not program output. */
const NOISE = [
  /^\s*$/,
  /^Loading DB routines from perl5db\.pl/,
  /^Editor support /,
  /^Enter h or 'h h' for help/,
  /^\s*Use 'q' to quit or 'R' to restart/,
  /^\s*use o inhibit_exit to avoid stopping/,
  /^\s*h q, h R or h o to get additional info/,
  /^\s*DB::fake::/,
];

export interface ContextLine extends BridgeLocation {
  /** Source text the debugger printed after the location. */
  code: string;
}

export function isPrompt(text: string): boolean {
  return PROMPT.test(text);
}

/**
 * Parses a location line. The sub name loses a trailing `::`, so file-scope
 * code in `main` reports `main`.
 */
export function parseContextLine(line: string): ContextLine | undefined {
  const match = CONTEXT.exec(line);
  if (!match) {
    return undefined;
  }
  const subroutine = match[1].replace(/::$/, '') || 'main';
  return {
    subroutine,
    file: match[2],
    line: parseInt(match[3], 10),
    code: match[4].trim(),
  };
}

export function isTerminationNotice(line: string): boolean {
  return TERMINATED.test(line);
}

export function isExceptionLine(line: string): boolean {
  return EXCEPTION.test(line);
}

export function errorLocation(
  line: string,
): { file: string; line: number } | undefined {
  const match = ERROR_LOCATION.exec(line);
  return match ? { file: match[1], line: parseInt(match[2], 10) } : undefined;
}

export function isDebuggerNoise(line: string): boolean {
  return NOISE.some((pattern) => pattern.test(line));
}

function isDebuggerFrame(name: string, file: string): boolean {
  return name.startsWith('DB::') || /(?:^|[\\/])perl5db\.pl$/.test(file);
}

/**
 * Builds the frame list from the stop location and `T` output. Each `T` line
 * names a sub and where it was called from; the caller's location belongs to
 * the next frame out.
 */
export function parseBacktrace(
  top: BridgeLocation,
  lines: readonly string[],
): BridgeFrame[] {
  const calls: Array<{ sub: string; file: string; line: number }> = [];
  for (const text of lines) {
    const match = BACKTRACE.exec(text);
    if (match) {
      calls.push({
        sub: match[1].trim(),
        file: match[2],
        line: parseInt(match[3], 10),
      });
    }
  }

  const frames: BridgeFrame[] = [];
  let name = top.subroutine;
  let file = top.file;
  let line = top.line;
  calls.forEach((call, index) => {
    frames.push({ name, file, line });
    name = calls[index + 1]?.sub ?? 'main';
    file = call.file;
    line = call.line;
  });
  frames.push({ name, file, line });

  return frames.filter((frame) => !isDebuggerFrame(frame.name, frame.file));
}

/**
 * Parses `y`/`V` output. Arrays and hashes get one level of children;
 * anything nested deeper is summarised by its first line.
 */
export function parseVariableDump(lines: readonly string[]): BridgeVariable[] {
  const variables: BridgeVariable[] = [];
  let open: { variable: BridgeVariable; sigil: string; childIndent?: number } | undefined;

  for (const text of lines) {
    if (open) {
      const closing =
        /^\s*\)\s*$/.test(text) &&
        (open.childIndent === undefined || indentOf(text) < open.childIndent);
      if (closing) {
        open.variable.value = summary(open.sigil, open.variable.children ?? []);
        open = undefined;
        continue;
      }
      const indent = indentOf(text);
      if (open.childIndent === undefined) {
        open.childIndent = indent;
      }
      if (indent > open.childIndent) {
        continue;
      }
      const element =
        open.sigil === '%' ? HASH_ELEMENT.exec(text) : ARRAY_ELEMENT.exec(text);
      if (element) {
        open.variable.children?.push({
          name: open.sigil === '%' ? unquote(element[2]) : `[${element[2]}]`,
          value: element[3].trim(),
        });
      }
      continue;
    }

    const match = VARIABLE.exec(text);
    if (!match) {
      continue;
    }
    const name = match[2];
    const value = match[3].trim();
    if (value === '(') {
      const variable: BridgeVariable = { name, value, children: [] };
      variables.push(variable);
      open = { variable, sigil: name.charAt(0) };
    } else {
      variables.push({ name, value });
    }
  }
  if (open) {
    open.variable.value = summary(open.sigil, open.variable.children ?? []);
  }
  return variables;
}

function indentOf(text: string): number {
  const match = /^\s*/.exec(text);
  return match ? match[0].length : 0;
}

function unquote(key: string): string {
  const trimmed = key.trim();
  const quoted = /^'(.*)'$/.exec(trimmed) ?? /^"(.*)"$/.exec(trimmed);
  return quoted ? quoted[1] : trimmed;
}

function summary(sigil: string, children: readonly BridgeVariable[]): string {
  const kind = sigil === '%' ? 'HASH' : 'ARRAY';
  return `${kind}(${children.length})`;
}

/** `$DB::sub{name}` value: `file:start-end`. */
const SUB_LOCATION = /^(.+):(\d+)-(\d+)$/;

export function parseSubLocation(
  text: string,
): { file: string; line: number } | undefined {
  const match = SUB_LOCATION.exec(text.trim());
  return match ? { file: match[1], line: parseInt(match[2], 10) } : undefined;
}

/**
 * Parses `L b` output: a file name line ending in `:`, then one
 * ` line:\tsource` entry per breakpoint, each followed by its condition.
 */
export function parseBreakpointListing(
  lines: readonly string[],
): Array<{ file: string; line: number }> {
  const breakpoints: Array<{ file: string; line: number }> = [];
  let file: string | undefined;
  for (const text of lines) {
    const entry = /^\s+(\d+):/.exec(text);
    if (entry) {
      if (file !== undefined) {
        breakpoints.push({ file, line: parseInt(entry[1], 10) });
      }
      continue;
    }
    const header = /^(\S.*):\s*$/.exec(text);
    if (header) {
      file = header[1];
    }
  }
  return breakpoints;
}
