import { BridgeError } from '../errors';

export type ResumeMode = 'continue' | 'next' | 'stepIn' | 'stepOut';

export type VariableScope = 'locals' | 'package' | 'globals';

export interface BridgeLocation {
  /** File as the debugger reports it, resolved against the debuggee cwd. */
  file: string;
  line: number;
  /** Fully qualified sub name, or the package name at file scope. */
  subroutine: string;
}

export interface BridgeStop {
  location?: BridgeLocation;
  /** Set when the stop was caused by a `die` the exception filters asked for. */
  exceptionText?: string;
}

export interface BridgeFrame {
  name: string;
  file: string;
  line: number;
}

export interface BridgeVariable {
  name: string;
  value: string;
  /** One level of elements for arrays and hashes. */
  children?: BridgeVariable[];
}

export interface BreakpointInstall {
  line: number;
  condition?: string;
}

export interface FunctionBreakpointInstall {
  name: string;
  condition?: string;
}

export interface InstallResult {
  verified: boolean;
  /** Where the debugger placed it, when known. */
  file?: string;
  line?: number;
  message?: string;
}

export type OutputCategory = 'stdout' | 'stderr' | 'console';

export interface DebuggeeBridgeEvents {
  stopped: (stop: BridgeStop) => void;
  output: (category: OutputCategory, text: string) => void;
  exited: (exitCode: number | null, signal: string | null) => void;
  error: (error: BridgeError) => void;
}

/**
 * The session's view of a running Perl debugger. Implementations own the
 * process or socket; the session only sees these operations and events.
 */
export interface DebuggeeBridge {
  /**
   * False when breakpoints can only be changed while the debuggee is stopped.
   * The session then queues changes made while running.
   */
  readonly supportsLiveBreakpoints: boolean;

  /** Resolves once the debugger is ready and paused before the first statement. */
  start(): Promise<BridgeLocation | undefined>;

  /** Replaces every breakpoint of `fileId` with `entries`, results in order. */
  installBreakpoints(
    fileId: string,
    entries: BreakpointInstall[],
  ): Promise<InstallResult[]>;

  installFunctionBreakpoints(
    entries: FunctionBreakpointInstall[],
  ): Promise<InstallResult[]>;

  setExceptionFilters(filters: string[]): Promise<void>;

  resume(mode: ResumeMode): void;

  pause(): void;

  stackTrace(): Promise<BridgeFrame[]>;

  variables(scope: VariableScope, frameIndex: number): Promise<BridgeVariable[]>;

  evaluate(expression: string): Promise<string>;

  /** Assigns `value` to the variable `name` and returns what it now holds. */
  setVariable(name: string, value: string): Promise<string>;

  /** Ends the debuggee at once. Safe to call more than once. */
  kill(): void;

  on<U extends keyof DebuggeeBridgeEvents>(
    event: U,
    listener: DebuggeeBridgeEvents[U],
  ): this;
  off<U extends keyof DebuggeeBridgeEvents>(
    event: U,
    listener: DebuggeeBridgeEvents[U],
  ): this;
}
