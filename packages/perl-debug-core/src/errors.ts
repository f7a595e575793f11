import { DebugProtocol } from '@vscode/debugprotocol';

/** Stable ids carried in `body.error.id` of failed responses. */
export const ErrorIds = {
  unknownCommand: 1001,
  invalidArguments: 1002,
  illegalState: 1003,
  sourceUnavailable: 1004,
  debuggerUnavailable: 1005,
  debuggerTimeout: 1006,
  staleReference: 1007,
  internal: 1099,
} as const;

export type ErrorId = (typeof ErrorIds)[keyof typeof ErrorIds];

/**
 * A request-scoped failure, answered with a failed response. Never ends the
 * session.
 */
export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly id: ErrorId = ErrorIds.invalidArguments,
    public readonly showUser = false,
  ) {
    super(message);
    this.name = 'ProtocolError';
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }

  toMessage(): DebugProtocol.Message {
    return { id: this.id, format: this.message, showUser: this.showUser };
  }
}

export type BridgeErrorStage =
  | 'spawn'
  | 'handshake'
  | 'attach'
  | 'exit'
  | 'protocol'
  | 'query';

/**
 * Failure talking to the Perl debugger. `query` failures are request-scoped;
 * every other stage ends the session.
 */
export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly stage: BridgeErrorStage,
    public readonly underlyingError?: Error,
    public readonly stderrOutput?: string,
    public readonly exitCode?: number | null,
    public readonly signal?: string | null,
  ) {
    super(message);
    this.name = 'BridgeError';
    Object.setPrototypeOf(this, BridgeError.prototype);
  }

  get isFatal(): boolean {
    return this.stage !== 'query';
  }
}

export class BridgeErrorBuilder {
  private _stage?: BridgeErrorStage;
  private _underlyingError?: Error;
  private _stderrOutput?: string;
  private _exitCode?: number | null;
  private _signal?: string | null;

  constructor(private readonly _message: string) {}

  public stage(stage: BridgeErrorStage): this {
    this._stage = stage;
    return this;
  }

  public underlyingError(error: Error): this {
    this._underlyingError = error;
    return this;
  }

  public stderrOutput(stderr: string): this {
    this._stderrOutput = stderr;
    return this;
  }

  public exitCode(exitCode: number | null): this {
    this._exitCode = exitCode;
    return this;
  }

  public signal(signal: string | null): this {
    this._signal = signal;
    return this;
  }

  public build(): BridgeError {
    if (!this._message) {
      throw new Error("BridgeErrorBuilder: 'message' is required.");
    }
    if (!this._stage) {
      throw new Error("BridgeErrorBuilder: 'stage' is required.");
    }
    return new BridgeError(
      this._message,
      this._stage,
      this._underlyingError,
      this._stderrOutput,
      this._exitCode,
      this._signal,
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
