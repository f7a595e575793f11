import { DebugProtocol } from '@vscode/debugprotocol';
import { LineClassification } from '../source/lineClassification';
import { validateBreakpointLine } from '../source/breakpointValidator';
import {
  RequestedBreakpoint,
  RequestedFunctionBreakpoint,
} from '../protocol/requestArguments';
import { InstallResult } from '../bridge/debuggeeBridge';

export interface Breakpoint {
  readonly id: number;
  readonly fileId: string;
  readonly source: DebugProtocol.Source;
  readonly requestedLine: number;
  verifiedLine?: number;
  verified: boolean;
  message?: string;
  readonly condition?: string;
  readonly hitCondition?: string;
  readonly logMessage?: string;
  hitCount: number;
}

export interface FunctionBreakpoint {
  readonly id: number;
  readonly name: string;
  readonly condition?: string;
  readonly hitCondition?: string;
  verified: boolean;
  message?: string;
  file?: string;
  line?: number;
  hitCount: number;
}

export type HitPredicate = (hitCount: number) => boolean;

const HIT_CONDITION = /^\s*(>=|<=|==|=|>|<|%)?\s*(\d+)\s*$/;

/**
 * Parses a DAP hit condition. A bare number stops from that hit onwards;
 * `% n` stops on every n-th hit.
 */
export function parseHitCondition(text: string): HitPredicate | undefined {
  const match = HIT_CONDITION.exec(text);
  if (!match) {
    return undefined;
  }
  const n = parseInt(match[2], 10);
  const operator = match[1] ?? '>=';
  switch (operator) {
    case '>=':
      return (count) => count >= n;
    case '>':
      return (count) => count > n;
    case '<':
      return (count) => count < n;
    case '<=':
      return (count) => count <= n;
    case '=':
    case '==':
      return (count) => count === n;
    case '%':
      return n === 0 ? undefined : (count) => count % n === 0;
    default:
      return undefined;
  }
}

/** Problems that make a requested breakpoint unusable, whatever its line. */
function requestProblem(
  condition: string | undefined,
  hitCondition: string | undefined,
  logMessage?: string,
): string | undefined {
  if (condition !== undefined && /[\r\n]/.test(condition)) {
    return 'Breakpoint condition must not contain line breaks';
  }
  // Each `{expression}` of a log message is sent to the debugger as one line.
  if (logMessage !== undefined && /[\r\n]/.test(logMessage)) {
    return 'Log message must not contain line breaks';
  }
  if (hitCondition !== undefined && !parseHitCondition(hitCondition)) {
    return `Invalid hit condition '${hitCondition}'`;
  }
  return undefined;
}

const SUB_NAME = /^(?:[A-Za-z_]\w*::)*[A-Za-z_]\w*$/;

export function qualifySubName(name: string): string {
  return name.includes('::') ? name : `main::${name}`;
}

export interface HitOutcome {
  /** Breakpoints at the location whose hit conditions are met. */
  hit: Breakpoint[];
  /** Log points among `hit`; they never stop the debuggee. */
  logPoints: Breakpoint[];
  /** Ids to report as `hitBreakpointIds`. */
  stopIds: number[];
  shouldStop: boolean;
}

/**
 * Every breakpoint of one session. Setting a file's breakpoints replaces the
 * previous set for that file in one step; ids are never reused.
 */
export class BreakpointRegistry {
  private nextId = 1;
  private readonly byFile = new Map<string, Breakpoint[]>();
  private functionBreakpoints: FunctionBreakpoint[] = [];
  private readonly pendingFiles = new Set<string>();
  private functionsPending = false;

  /**
   * Validates `requested` against `classification` and makes the result the
   * file's complete breakpoint set.
   */
  replaceFileBreakpoints(
    fileId: string,
    source: DebugProtocol.Source,
    requested: RequestedBreakpoint[],
    classification: LineClassification,
  ): Breakpoint[] {
    const next = requested.map((request): Breakpoint => {
      const breakpoint: Breakpoint = {
        id: this.nextId++,
        fileId,
        source,
        requestedLine: request.line,
        verified: false,
        condition: request.condition,
        hitCondition: request.hitCondition,
        logMessage: request.logMessage,
        hitCount: 0,
      };
      const problem = requestProblem(
        request.condition,
        request.hitCondition,
        request.logMessage,
      );
      if (problem) {
        breakpoint.message = problem;
        return breakpoint;
      }
      const validation = validateBreakpointLine(classification, request.line);
      if (validation.verified) {
        breakpoint.verified = true;
        breakpoint.verifiedLine = validation.line;
      } else {
        breakpoint.message = validation.message;
      }
      return breakpoint;
    });
    if (next.length === 0) {
      this.byFile.delete(fileId);
    } else {
      this.byFile.set(fileId, next);
    }
    return next;
  }

  replaceFunctionBreakpoints(
    requested: RequestedFunctionBreakpoint[],
  ): FunctionBreakpoint[] {
    this.functionBreakpoints = requested.map((request) => {
      const breakpoint: FunctionBreakpoint = {
        id: this.nextId++,
        name: qualifySubName(request.name.trim()),
        condition: request.condition,
        hitCondition: request.hitCondition,
        verified: false,
        hitCount: 0,
      };
      const problem =
        requestProblem(request.condition, request.hitCondition) ??
        (SUB_NAME.test(request.name.trim())
          ? undefined
          : `Invalid subroutine name '${request.name}'`);
      if (problem) {
        breakpoint.message = problem;
      }
      return breakpoint;
    });
    return this.functionBreakpoints;
  }

  fileBreakpoints(fileId: string): readonly Breakpoint[] {
    return this.byFile.get(fileId) ?? [];
  }

  files(): string[] {
    return Array.from(this.byFile.keys());
  }

  functions(): readonly FunctionBreakpoint[] {
    return this.functionBreakpoints;
  }

  /** Breakpoints of a file that can be handed to the debugger. */
  installable(fileId: string): Breakpoint[] {
    return this.fileBreakpoints(fileId).filter(
      (bp) => bp.verified && bp.verifiedLine !== undefined,
    );
  }

  installableFunctions(): FunctionBreakpoint[] {
    return this.functionBreakpoints.filter((bp) => bp.message === undefined);
  }

  /** Folds the debugger's answer for `installable(fileId)` back in. */
  applyInstallResults(fileId: string, results: InstallResult[]): Breakpoint[] {
    const installed = this.installable(fileId);
    installed.forEach((bp, index) => {
      const result = results[index];
      if (!result) return;
      if (!result.verified) {
        bp.verified = false;
        bp.message =
          result.message ?? 'The debugger could not set this breakpoint';
      } else if (result.line !== undefined) {
        bp.verifiedLine = result.line;
      }
    });
    return installed;
  }

  applyFunctionInstallResults(results: InstallResult[]): FunctionBreakpoint[] {
    const installed = this.installableFunctions();
    installed.forEach((bp, index) => {
      const result = results[index];
      if (!result) return;
      bp.verified = result.verified;
      bp.message = result.verified ? undefined : result.message;
      bp.file = result.file;
      bp.line = result.line;
    });
    return installed;
  }

  markPending(fileId: string): void {
    this.pendingFiles.add(fileId);
  }

  markFunctionsPending(): void {
    this.functionsPending = true;
  }

  /** Files whose sets changed while the debuggee could not accept them. */
  takePending(): { files: string[]; functions: boolean } {
    const files = Array.from(this.pendingFiles);
    const functions = this.functionsPending;
    this.pendingFiles.clear();
    this.functionsPending = false;
    return { files, functions };
  }

  get hasPending(): boolean {
    return this.pendingFiles.size > 0 || this.functionsPending;
  }

  /**
   * Counts a stop at `fileId:line` against every breakpoint there and decides
   * whether the debuggee should stay stopped.
   */
  registerHit(fileId: string, line: number): HitOutcome {
    const atLine = this.fileBreakpoints(fileId).filter(
      (bp) => bp.verified && bp.verifiedLine === line,
    );
    const functionsAtLine = this.functionBreakpoints.filter(
      (bp) => bp.verified && bp.file === fileId && bp.line === line,
    );
    const hit: Breakpoint[] = [];
    const stopIds: number[] = [];
    for (const bp of atLine) {
      bp.hitCount++;
      if (!hitConditionMet(bp.hitCondition, bp.hitCount)) continue;
      hit.push(bp);
      if (bp.logMessage === undefined) stopIds.push(bp.id);
    }
    for (const bp of functionsAtLine) {
      bp.hitCount++;
      if (hitConditionMet(bp.hitCondition, bp.hitCount)) stopIds.push(bp.id);
    }
    // A stop with no breakpoint here came from somewhere else, e.g. $DB::single.
    const matchedAny = atLine.length > 0 || functionsAtLine.length > 0;
    return {
      hit,
      logPoints: hit.filter((bp) => bp.logMessage !== undefined),
      stopIds,
      shouldStop: stopIds.length > 0 || !matchedAny,
    };
  }
}

function hitConditionMet(condition: string | undefined, count: number): boolean {
  if (condition === undefined) return true;
  const predicate = parseHitCondition(condition);
  return predicate ? predicate(count) : false;
}

export function toProtocolBreakpoint(
  bp: Breakpoint,
): DebugProtocol.Breakpoint {
  const result: DebugProtocol.Breakpoint = {
    id: bp.id,
    verified: bp.verified,
    source: bp.source,
  };
  if (bp.verified && bp.verifiedLine !== undefined) {
    result.line = bp.verifiedLine;
  }
  if (bp.message !== undefined) {
    result.message = bp.message;
  }
  return result;
}

export function toProtocolFunctionBreakpoint(
  bp: FunctionBreakpoint,
): DebugProtocol.Breakpoint {
  const result: DebugProtocol.Breakpoint = { id: bp.id, verified: bp.verified };
  if (bp.file !== undefined && bp.line !== undefined) {
    result.source = { path: bp.file };
    result.line = bp.line;
  }
  if (bp.message !== undefined) {
    result.message = bp.message;
  }
  return result;
}
