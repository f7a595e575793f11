/* eslint-disable @typescript-eslint/no-unsafe-declaration-merging */
import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import * as path from 'path';
import { DebugProtocol } from '@vscode/debugprotocol';
import { LoggerInterface } from '../logging';
import { MessageSink, InvalidRequest } from '../protocol/dapProtocolServer';
import {
  parseEvaluateArguments,
  parseInitializeArguments,
  parseInlineValuesArguments,
  parseScopesArguments,
  parseSetBreakpointsArguments,
  parseSetExceptionBreakpointsArguments,
  parseSetFunctionBreakpointsArguments,
  parseSetVariableArguments,
  parseStackTraceArguments,
  parseThreadId,
  parseVariablesArguments,
  ClientCapabilities,
} from '../protocol/requestArguments';
import {
  BridgeError,
  ErrorIds,
  ProtocolError,
  errorMessage,
} from '../errors';
import { SourceIndexCache } from '../source/sourceIndexCache';
import { collectInlineValues } from '../source/inlineValues';
import { splitLines } from '../source/lineClassifier';
import {
  SourceLoader,
  SourceReadError,
  toFileId,
} from '../source/sourceLoader';
import {
  BridgeFrame,
  BridgeLocation,
  BridgeStop,
  BridgeVariable,
  DebuggeeBridge,
  DebuggeeBridgeEvents,
  InstallResult,
  OutputCategory,
  ResumeMode,
  VariableScope,
} from '../bridge/debuggeeBridge';
import { AdapterSettings } from '../config/adapterSettings';
import {
  AttachArguments,
  LaunchArguments,
  parseAttachArguments,
  parseLaunchArguments,
} from '../config/launchArguments';
import { EventDispatcher } from './eventDispatcher';
import {
  Breakpoint,
  BreakpointRegistry,
  FunctionBreakpoint,
  toProtocolBreakpoint,
  toProtocolFunctionBreakpoint,
} from './breakpointRegistry';
import { FrameSnapshot } from './frameSnapshot';
import { SessionState, canTransition, isKnownCommand, isLegalIn } from './sessionState';

export const THREAD_ID = 1;
export const THREAD_NAME = 'main';

export const ADAPTER_CAPABILITIES: DebugProtocol.Capabilities = {
  supportsConfigurationDoneRequest: true,
  supportsFunctionBreakpoints: true,
  supportsConditionalBreakpoints: true,
  supportsHitConditionalBreakpoints: true,
  supportsLogPoints: true,
  supportsTerminateRequest: true,
  supportsEvaluateForHovers: true,
  supportsSetVariable: true,
  exceptionBreakpointFilters: [
    {
      filter: 'die',
      label: 'Perl die() and uncaught exceptions',
      default: false,
    },
    {
      filter: 'all',
      label: 'All Perl exception events',
      default: false,
    },
  ],
};

/** A plain, package-qualified or numbered variable with its sigil. */
const ASSIGNABLE_NAME =
  /^[$@%](?:[A-Za-z_][A-Za-z0-9_]*(?:::[A-Za-z_][A-Za-z0-9_]*)*|\d+|_)$/;

const SCOPES: ReadonlyArray<{
  name: string;
  scope: VariableScope;
  presentationHint?: string;
  expensive: boolean;
}> = [
  { name: 'Locals', scope: 'locals', presentationHint: 'locals', expensive: false },
  { name: 'Package', scope: 'package', expensive: true },
  { name: 'Globals', scope: 'globals', expensive: true },
];

/** Creates the bridge for a launch or attach request. */
export interface BridgeFactory {
  launch(
    args: LaunchArguments,
    settings: AdapterSettings,
    logger: LoggerInterface,
  ): DebuggeeBridge;
  attach(
    args: AttachArguments,
    settings: AdapterSettings,
    logger: LoggerInterface,
  ): DebuggeeBridge;
}

export interface DebugSessionOptions {
  sink: MessageSink;
  bridgeFactory: BridgeFactory;
  sourceCache: SourceIndexCache;
  sourceLoader: SourceLoader;
  settings: AdapterSettings;
  logger: LoggerInterface;
  sessionId?: string;
}

export interface DebugSessionEvents {
  stateChanged: (payload: {
    sessionId: string;
    from: SessionState;
    to: SessionState;
  }) => void;
  /** The client has been answered for `disconnect`/`terminate`. */
  ended: (payload: { sessionId: string }) => void;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export declare interface DebugSession {
  on<U extends keyof DebugSessionEvents>(
    event: U,
    listener: DebugSessionEvents[U],
  ): this;
  once<U extends keyof DebugSessionEvents>(
    event: U,
    listener: DebugSessionEvents[U],
  ): this;
  emit<U extends keyof DebugSessionEvents>(
    event: U,
    ...args: Parameters<DebugSessionEvents[U]>
  ): boolean;
}

type BridgeListeners = {
  [U in keyof DebuggeeBridgeEvents]: DebuggeeBridgeEvents[U];
};

/**
 * One client conversation. Requests and debugger notifications are handled
 * one at a time, in arrival order, through a single mailbox; every response
 * and event leaves through the session's dispatcher.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class DebugSession extends EventEmitter {
  public readonly sessionId: string;
  private readonly logger: LoggerInterface;
  private readonly dispatcher: EventDispatcher;
  private readonly registry = new BreakpointRegistry();
  private readonly bridgeFactory: BridgeFactory;
  private readonly sourceCache: SourceIndexCache;
  private readonly sourceLoader: SourceLoader;
  private readonly settings: AdapterSettings;

  private _state: SessionState = 'uninitialized';
  private mailbox: Promise<void> = Promise.resolve();
  private clientCapabilities: ClientCapabilities | undefined;
  private bridge: DebuggeeBridge | undefined;
  private bridgeListeners: BridgeListeners | undefined;
  private exceptionFilters: string[] = [];
  private stopOnEntry = false;
  private entryLocation: BridgeLocation | undefined;
  private lastResume: ResumeMode | undefined;
  private pauseRequested = false;
  private snapshot: FrameSnapshot | undefined;
  private nextHandle = 1;

  constructor(options: DebugSessionOptions) {
    super();
    this.sessionId = options.sessionId ?? randomUUID();
    this.logger = options.logger.child
      ? options.logger.child({ sessionId: this.sessionId })
      : options.logger;
    this.dispatcher = new EventDispatcher(options.sink, this.logger);
    this.bridgeFactory = options.bridgeFactory;
    this.sourceCache = options.sourceCache;
    this.sourceLoader = options.sourceLoader;
    this.settings = options.settings;
  }

  get state(): SessionState {
    return this._state;
  }

  /** Settles once everything queued so far has been handled. */
  idle(): Promise<void> {
    return this.mailbox;
  }

  /** Queues a client request. */
  handleRequest(request: DebugProtocol.Request): void {
    this.logger.debug(
      { command: request.command, requestSeq: request.seq },
      'Request received',
    );
    if (request.command === 'disconnect' || request.command === 'terminate') {
      // A query stuck on a hung debugger must not hold these back, and the
      // client hears `terminated` before any answer the kill provokes.
      this.terminate();
      this.releaseBridge();
    }
    this.enqueue(() => this.processRequest(request));
  }

  /** Answers a framed message that could not be read as a request. */
  handleInvalidRequest(invalid: InvalidRequest): void {
    this.enqueue(() => {
      if (invalid.requestSeq === undefined) {
        this.logger.warn({ invalid }, 'Dropping unanswerable message');
        return;
      }
      this.dispatcher.errorResponse(
        { seq: invalid.requestSeq, command: invalid.command ?? '' },
        new ProtocolError(invalid.message, ErrorIds.invalidArguments).toMessage(),
      );
    });
  }

  /** The transport is gone: stop the debuggee, send nothing more. */
  dispose(reason: string): void {
    this.logger.info(`Disposing session: ${reason}`);
    this.releaseBridge();
    if (this._state !== 'terminated') {
      this.setState('terminated');
    }
  }

  private enqueue(task: () => Promise<void> | void): void {
    this.mailbox = this.mailbox.then(async () => {
      try {
        await task();
      } catch (error) {
        this.logger.error({ err: error }, 'Unhandled error in session task');
      }
    });
  }

  private setState(next: SessionState): void {
    const from = this._state;
    if (from === next) return;
    if (!canTransition(from, next)) {
      throw new ProtocolError(
        `Cannot move from ${from} to ${next}`,
        ErrorIds.illegalState,
      );
    }
    this._state = next;
    this.logger.debug({ from, to: next }, 'Session state changed');
    this.emit('stateChanged', { sessionId: this.sessionId, from, to: next });
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  private async processRequest(request: DebugProtocol.Request): Promise<void> {
    const { command } = request;
    if (!isKnownCommand(command)) {
      this.dispatcher.errorResponse(
        request,
        new ProtocolError(
          `Unrecognized request '${command}'`,
          ErrorIds.unknownCommand,
        ).toMessage(),
      );
      return;
    }
    if (!isLegalIn(command, this._state)) {
      this.dispatcher.errorResponse(
        request,
        new ProtocolError(
          `'${command}' is not allowed while the session is ${this._state}`,
          ErrorIds.illegalState,
        ).toMessage(),
      );
      return;
    }
    try {
      await this.dispatch(request);
    } catch (error) {
      this.failRequest(request, error);
    }
  }

  private failRequest(request: DebugProtocol.Request, error: unknown): void {
    if (error instanceof ProtocolError) {
      this.logger.debug({ command: request.command }, error.message);
      this.dispatcher.errorResponse(request, error.toMessage());
      return;
    }
    if (error instanceof SourceReadError) {
      this.dispatcher.errorResponse(
        request,
        new ProtocolError(error.message, ErrorIds.sourceUnavailable).toMessage(),
      );
      return;
    }
    if (error instanceof BridgeError) {
      this.logger.warn(
        { command: request.command, stage: error.stage, err: error },
        'Debugger query failed',
      );
      const id =
        error.stage === 'query'
          ? ErrorIds.debuggerTimeout
          : ErrorIds.debuggerUnavailable;
      this.dispatcher.errorResponse(
        request,
        new ProtocolError(error.message, id, true).toMessage(),
      );
      if (error.stage === 'query') {
        this.dispatcher.event<DebugProtocol.OutputEvent['body']>('output', {
          category: 'console',
          output: `The Perl debugger did not answer '${request.command}': ${error.message}\n`,
        });
      }
      return;
    }
    this.logger.error(
      { command: request.command, err: error },
      'Request handler failed',
    );
    this.dispatcher.errorResponse(
      request,
      new ProtocolError(
        `Internal error handling '${request.command}': ${errorMessage(error)}`,
        ErrorIds.internal,
      ).toMessage(),
    );
  }

  private async dispatch(request: DebugProtocol.Request): Promise<void> {
    const command = request.command;
    switch (command) {
      case 'initialize':
        return this.onInitialize(request);
      case 'launch':
        return this.onLaunch(request);
      case 'attach':
        return this.onAttach(request);
      case 'setBreakpoints':
        return this.onSetBreakpoints(request);
      case 'setFunctionBreakpoints':
        return this.onSetFunctionBreakpoints(request);
      case 'setExceptionBreakpoints':
        return this.onSetExceptionBreakpoints(request);
      case 'configurationDone':
        return this.onConfigurationDone(request);
      case 'threads':
        return this.onThreads(request);
      case 'continue':
      case 'next':
      case 'stepIn':
      case 'stepOut':
        return this.onResume(request, command);
      case 'pause':
        return this.onPause(request);
      case 'stackTrace':
        return this.onStackTrace(request);
      case 'scopes':
        return this.onScopes(request);
      case 'variables':
        return this.onVariables(request);
      case 'evaluate':
        return this.onEvaluate(request);
      case 'setVariable':
        return this.onSetVariable(request);
      case 'inlineValues':
        return this.onInlineValues(request);
      case 'disconnect':
      case 'terminate':
        return this.onDisconnect(request);
      default:
        throw new ProtocolError(
          `Unrecognized request '${command}'`,
          ErrorIds.unknownCommand,
        );
    }
  }

  private onInitialize(request: DebugProtocol.Request): void {
    this.clientCapabilities = parseInitializeArguments(request.arguments);
    this.setState('initialized');
    this.dispatcher.response(request, ADAPTER_CAPABILITIES);
    this.dispatcher.event('initialized');
  }

  private async onLaunch(request: DebugProtocol.Request): Promise<void> {
    const args = parseLaunchArguments(request.arguments);
    this.stopOnEntry = args.stopOnEntry;
    this.logger.info(
      { program: args.program, cwd: args.cwd },
      'Launching Perl debugger',
    );
    await this.startBridge(
      request,
      this.bridgeFactory.launch(args, this.settings, this.logger),
    );
  }

  private async onAttach(request: DebugProtocol.Request): Promise<void> {
    const args = parseAttachArguments(request.arguments);
    this.stopOnEntry = false;
    this.logger.info(
      { host: args.host, port: args.port },
      'Waiting for Perl debugger to attach',
    );
    await this.startBridge(
      request,
      this.bridgeFactory.attach(args, this.settings, this.logger),
    );
  }

  private async startBridge(
    request: DebugProtocol.Request,
    bridge: DebuggeeBridge,
  ): Promise<void> {
    this.bridge = bridge;
    this.listenTo(bridge);
    try {
      this.entryLocation = await bridge.start();
    } catch (error) {
      this.logger.error({ err: error }, 'Perl debugger failed to start');
      this.releaseBridge();
      this.dispatcher.errorResponse(
        request,
        new ProtocolError(
          `Could not start the Perl debugger: ${errorMessage(error)}`,
          ErrorIds.debuggerUnavailable,
          true,
        ).toMessage(),
      );
      this.terminate();
      return;
    }
    if (this.bridge !== bridge) {
      // Disconnected while the debugger was starting.
      this.dispatcher.errorResponse(
        request,
        new ProtocolError(
          'The session ended before the debugger was ready',
          ErrorIds.illegalState,
        ).toMessage(),
      );
      return;
    }
    this.setState('configuring');

    const changed: DebugProtocol.Breakpoint[] = [];
    try {
      for (const fileId of this.registry.files()) {
        for (const bp of await this.installFile(fileId)) {
          changed.push(this.clientBreakpoint(bp));
        }
      }
      if (this.registry.functions().length > 0) {
        changed.push(
          ...(await this.installFunctions()).map(toProtocolFunctionBreakpoint),
        );
      }
      if (this.exceptionFilters.length > 0) {
        await bridge.setExceptionFilters(this.exceptionFilters);
      }
    } catch (error) {
      this.logger.error({ err: error }, 'Perl debugger failed during setup');
      this.releaseBridge();
      this.dispatcher.errorResponse(
        request,
        new ProtocolError(
          `Could not prepare the Perl debugger: ${errorMessage(error)}`,
          ErrorIds.debuggerUnavailable,
          true,
        ).toMessage(),
      );
      this.terminate();
      return;
    }
    if (this.bridge !== bridge) {
      this.dispatcher.errorResponse(
        request,
        new ProtocolError(
          'The session ended before the debugger was ready',
          ErrorIds.illegalState,
        ).toMessage(),
      );
      return;
    }
    this.registry.takePending();

    this.dispatcher.response(request);
    this.emitBreakpointChanges(changed);
  }

  private async onSetBreakpoints(request: DebugProtocol.Request): Promise<void> {
    const args = parseSetBreakpointsArguments(request.arguments);
    const fileId = toFileId(args.path);
    // A read failure leaves the file's previous set in force.
    const buffer = await this.sourceLoader.load(fileId);
    const classification = this.sourceCache.getOrBuild(buffer);
    const requested = args.breakpoints.map((bp) => ({
      ...bp,
      line: this.fromClientLine(bp.line),
    }));
    const breakpoints = this.registry.replaceFileBreakpoints(
      fileId,
      args.source,
      requested,
      classification,
    );

    if (this.bridge) {
      if (this.canInstallNow()) {
        await this.installFile(fileId);
      } else {
        this.registry.markPending(fileId);
        this.logger.debug(
          { fileId },
          'Debuggee is running; breakpoints will be installed at the next stop',
        );
      }
    }

    this.dispatcher.response<DebugProtocol.SetBreakpointsResponse['body']>(
      request,
      { breakpoints: breakpoints.map((bp) => this.clientBreakpoint(bp)) },
    );
  }

  private async onSetFunctionBreakpoints(
    request: DebugProtocol.Request,
  ): Promise<void> {
    const requested = parseSetFunctionBreakpointsArguments(request.arguments);
    const breakpoints = this.registry.replaceFunctionBreakpoints(requested);
    if (this.bridge) {
      if (this.canInstallNow()) {
        await this.installFunctions();
      } else {
        this.registry.markFunctionsPending();
      }
    }
    this.dispatcher.response<DebugProtocol.SetFunctionBreakpointsResponse['body']>(
      request,
      { breakpoints: breakpoints.map(toProtocolFunctionBreakpoint) },
    );
  }

  private async onSetExceptionBreakpoints(
    request: DebugProtocol.Request,
  ): Promise<void> {
    const filters = parseSetExceptionBreakpointsArguments(request.arguments);
    const known = new Set(
      (ADAPTER_CAPABILITIES.exceptionBreakpointFilters ?? []).map(
        (f) => f.filter,
      ),
    );
    this.exceptionFilters = filters.filter((f) => known.has(f));
    if (this.bridge) {
      await this.bridge.setExceptionFilters(this.exceptionFilters);
    }
    this.dispatcher.response<DebugProtocol.SetExceptionBreakpointsResponse['body']>(
      request,
      {
        breakpoints: filters.map((filter) =>
          known.has(filter)
            ? { verified: true }
            : { verified: false, message: `Unknown exception filter '${filter}'` },
        ),
      },
    );
  }

  private onConfigurationDone(request: DebugProtocol.Request): void {
    const bridge = this.requireBridge();
    if (this.stopOnEntry) {
      this.setState('stopped');
      this.snapshot = this.newSnapshot(this.entryLocation);
      this.dispatcher.response(request);
      this.emitStopped('entry');
      return;
    }
    this.snapshot = undefined;
    this.lastResume = 'continue';
    this.setState('running');
    this.dispatcher.response(request);
    bridge.resume('continue');
  }

  private onThreads(request: DebugProtocol.Request): void {
    const threads: DebugProtocol.Thread[] =
      this.bridge && this._state !== 'terminated'
        ? [{ id: THREAD_ID, name: THREAD_NAME }]
        : [];
    this.dispatcher.response<DebugProtocol.ThreadsResponse['body']>(request, {
      threads,
    });
  }

  private onResume(request: DebugProtocol.Request, mode: ResumeMode): void {
    this.checkThread(parseThreadId(request.arguments, request.command));
    const bridge = this.requireBridge();
    this.snapshot = undefined;
    this.lastResume = mode;
    this.pauseRequested = false;
    this.setState('running');
    if (mode === 'continue') {
      this.dispatcher.response<DebugProtocol.ContinueResponse['body']>(request, {
        allThreadsContinued: true,
      });
      this.dispatcher.event<DebugProtocol.ContinuedEvent['body']>('continued', {
        threadId: THREAD_ID,
        allThreadsContinued: true,
      });
    } else {
      this.dispatcher.response(request);
    }
    bridge.resume(mode);
  }

  private onPause(request: DebugProtocol.Request): void {
    this.checkThread(parseThreadId(request.arguments, request.command));
    const bridge = this.requireBridge();
    if (this._state === 'running') {
      bridge.pause();
      this.pauseRequested = true;
    }
    this.dispatcher.response(request);
  }

  private async onStackTrace(request: DebugProtocol.Request): Promise<void> {
    const args = parseStackTraceArguments(request.arguments);
    this.checkThread(args.threadId);
    const snapshot = this.requireSnapshot();
    const bridge = this.requireBridge();

    let frames = snapshot.cachedFrames;
    if (!frames) {
      try {
        frames = await bridge.stackTrace();
        if (frames.length === 0) {
          frames = snapshot.fallbackFrames();
        }
        snapshot.rememberFrames(frames);
      } catch (error) {
        if (!(error instanceof BridgeError) || error.isFatal) throw error;
        this.logger.warn({ err: error }, 'Falling back to the stop location');
        this.dispatcher.event<DebugProtocol.OutputEvent['body']>('output', {
          category: 'console',
          output: `The Perl debugger did not return a backtrace: ${error.message}\n`,
        });
        frames = snapshot.fallbackFrames();
      }
    }
    if (this.snapshot !== snapshot) {
      throw new ProtocolError(
        'The debuggee resumed before the stack was read',
        ErrorIds.staleReference,
      );
    }

    const start = Math.max(0, args.startFrame);
    const end = args.levels === undefined ? frames.length : start + args.levels;
    const stackFrames = frames
      .slice(start, end)
      .map((frame, offset) => this.toStackFrame(snapshot, frame, start + offset));
    this.dispatcher.response<DebugProtocol.StackTraceResponse['body']>(request, {
      stackFrames,
      totalFrames: frames.length,
    });
  }

  private onScopes(request: DebugProtocol.Request): void {
    const frameId = parseScopesArguments(request.arguments);
    const snapshot = this.requireSnapshot();
    const frameIndex = snapshot.frameIndex(frameId);
    if (frameIndex === undefined) {
      throw new ProtocolError(
        `Unknown or stale frame id ${frameId}`,
        ErrorIds.staleReference,
      );
    }
    const scopes: DebugProtocol.Scope[] = SCOPES.map((scope) => {
      const entry: DebugProtocol.Scope = {
        name: scope.name,
        variablesReference: snapshot.reference({
          kind: 'scope',
          scope: scope.scope,
          frameIndex,
        }),
        expensive: scope.expensive,
      };
      if (scope.presentationHint) {
        entry.presentationHint = scope.presentationHint;
      }
      return entry;
    });
    this.dispatcher.response<DebugProtocol.ScopesResponse['body']>(request, {
      scopes,
    });
  }

  private async onVariables(request: DebugProtocol.Request): Promise<void> {
    const ref = parseVariablesArguments(request.arguments);
    const snapshot = this.requireSnapshot();
    const container = snapshot.container(ref);
    if (!container) {
      throw new ProtocolError(
        `Unknown or stale variables reference ${ref}`,
        ErrorIds.staleReference,
      );
    }
    const variables =
      container.kind === 'children'
        ? container.children
        : await this.requireBridge().variables(
            container.scope,
            container.frameIndex,
          );
    if (this.snapshot !== snapshot) {
      throw new ProtocolError(
        'The debuggee resumed before the variables were read',
        ErrorIds.staleReference,
      );
    }
    this.dispatcher.response<DebugProtocol.VariablesResponse['body']>(request, {
      variables: variables.map((variable) =>
        this.toProtocolVariable(snapshot, variable),
      ),
    });
  }

  private async onEvaluate(request: DebugProtocol.Request): Promise<void> {
    const args = parseEvaluateArguments(request.arguments);
    if (/[\r\n]/.test(args.expression)) {
      throw new ProtocolError(
        'Expressions must fit on a single line',
        ErrorIds.invalidArguments,
      );
    }
    const snapshot = this.requireSnapshot();
    if (args.frameId !== undefined && snapshot.frameIndex(args.frameId) === undefined) {
      throw new ProtocolError(
        `Unknown or stale frame id ${args.frameId}`,
        ErrorIds.staleReference,
      );
    }
    const result = await this.requireBridge().evaluate(args.expression);
    this.dispatcher.response<DebugProtocol.EvaluateResponse['body']>(request, {
      result,
      variablesReference: 0,
    });
  }

  private async onSetVariable(request: DebugProtocol.Request): Promise<void> {
    const args = parseSetVariableArguments(request.arguments);
    if (!args.name || !args.value) {
      throw new ProtocolError(
        'setVariable needs a variable name and a value',
        ErrorIds.invalidArguments,
      );
    }
    if (/[\r\n]/.test(args.name) || /[\r\n]/.test(args.value)) {
      throw new ProtocolError(
        'Variable names and values must fit on a single line',
        ErrorIds.invalidArguments,
      );
    }
    if (!ASSIGNABLE_NAME.test(args.name)) {
      throw new ProtocolError(
        `Cannot assign to '${args.name}': expected a variable name with its sigil`,
        ErrorIds.invalidArguments,
      );
    }
    const snapshot = this.requireSnapshot();
    const container = snapshot.container(args.variablesReference);
    if (!container) {
      throw new ProtocolError(
        `Unknown or stale variables reference ${args.variablesReference}`,
        ErrorIds.staleReference,
      );
    }
    // The debugger evaluates in the frame it is stopped in.
    if (
      container.kind === 'scope' &&
      container.scope === 'locals' &&
      container.frameIndex > 0
    ) {
      throw new ProtocolError(
        'Only variables of the innermost frame can be changed',
        ErrorIds.invalidArguments,
      );
    }
    const value = await this.requireBridge().setVariable(args.name, args.value);
    this.logger.debug({ name: args.name }, 'Variable changed');
    this.dispatcher.response<DebugProtocol.SetVariableResponse['body']>(request, {
      value,
      variablesReference: 0,
    });
  }

  private async onInlineValues(request: DebugProtocol.Request): Promise<void> {
    const args = parseInlineValuesArguments(request.arguments);
    const startLine = this.fromClientLine(args.startLine);
    const endLine = this.fromClientLine(args.endLine);
    if (startLine < 1 || endLine < 1) {
      throw new ProtocolError(
        'inlineValues needs lines inside the file',
        ErrorIds.invalidArguments,
      );
    }
    const buffer = await this.sourceLoader.load(toFileId(args.path));
    const classification = this.sourceCache.getOrBuild(buffer);
    const columnOffset =
      this.clientCapabilities?.columnsStartAt1 === false ? 1 : 0;
    const inlineValues = collectInlineValues(
      splitLines(buffer.text),
      classification,
      startLine,
      endLine,
    ).map((lookup) => ({
      type: 'variable',
      line: this.toClientLine(lookup.line),
      column: lookup.column - columnOffset,
      variableName: lookup.variableName,
    }));
    this.dispatcher.response(request, { inlineValues });
  }

  private onDisconnect(request: DebugProtocol.Request): void {
    this.releaseBridge();
    this.terminate();
    this.dispatcher.response(request);
    this.emit('ended', { sessionId: this.sessionId });
  }

  // ---------------------------------------------------------------------------
  // Debugger notifications
  // ---------------------------------------------------------------------------

  private listenTo(bridge: DebuggeeBridge): void {
    const listeners: BridgeListeners = {
      stopped: (stop) => this.enqueue(() => this.onBridgeStopped(bridge, stop)),
      output: (category, text) =>
        this.enqueue(() => this.onBridgeOutput(bridge, category, text)),
      exited: (exitCode, signal) =>
        this.enqueue(() => this.onBridgeExited(bridge, exitCode, signal)),
      error: (error) => this.enqueue(() => this.onBridgeError(bridge, error)),
    };
    bridge.on('stopped', listeners.stopped);
    bridge.on('output', listeners.output);
    bridge.on('exited', listeners.exited);
    bridge.on('error', listeners.error);
    this.bridgeListeners = listeners;
  }

  /** Detaches from and kills the current bridge, if any. */
  private releaseBridge(): void {
    const bridge = this.bridge;
    const listeners = this.bridgeListeners;
    this.bridge = undefined;
    this.bridgeListeners = undefined;
    if (!bridge) return;
    if (listeners) {
      bridge.off('stopped', listeners.stopped);
      bridge.off('output', listeners.output);
      bridge.off('exited', listeners.exited);
      // Late failures from a killed debugger are only logged.
      bridge.off('error', listeners.error);
      bridge.on('error', (error) =>
        this.logger.debug({ err: error }, 'Error from released debugger'),
      );
    }
    bridge.kill();
  }

  private async onBridgeStopped(
    bridge: DebuggeeBridge,
    stop: BridgeStop,
  ): Promise<void> {
    if (bridge !== this.bridge) return;
    if (this._state !== 'running') {
      this.logger.debug({ state: this._state }, 'Ignoring stop notification');
      return;
    }
    const location = stop.location;
    this.snapshot = this.newSnapshot(location);
    const changed = await this.flushPendingBreakpoints();

    let reason: DebugProtocol.StoppedEvent['body']['reason'];
    let hitBreakpointIds: number[] | undefined;
    if (stop.exceptionText !== undefined) {
      reason = 'exception';
    } else if (this.pauseRequested) {
      reason = 'pause';
    } else if (this.lastResume === 'continue' && location) {
      const outcome = this.registry.registerHit(
        toFileId(location.file),
        location.line,
      );
      for (const logPoint of outcome.logPoints) {
        await this.emitLogPoint(bridge, logPoint);
      }
      if (!outcome.shouldStop) {
        this.emitBreakpointChanges(changed);
        this.snapshot = undefined;
        bridge.resume('continue');
        return;
      }
      // No breakpoint here: `$DB::single` or a stop the debugger chose.
      reason = outcome.stopIds.length > 0 ? 'breakpoint' : 'step';
      hitBreakpointIds = outcome.stopIds;
    } else if (this.lastResume === undefined) {
      reason = 'entry';
    } else {
      reason = 'step';
    }

    this.pauseRequested = false;
    this.setState('stopped');
    this.emitBreakpointChanges(changed);
    this.emitStopped(reason, {
      hitBreakpointIds,
      text: stop.exceptionText,
      description: stop.exceptionText,
    });
  }

  private onBridgeOutput(
    bridge: DebuggeeBridge,
    category: OutputCategory,
    text: string,
  ): void {
    if (bridge !== this.bridge) return;
    this.dispatcher.event<DebugProtocol.OutputEvent['body']>('output', {
      category,
      output: text,
    });
  }

  private onBridgeExited(
    bridge: DebuggeeBridge,
    exitCode: number | null,
    signal: string | null,
  ): void {
    if (bridge !== this.bridge) return;
    this.logger.info({ exitCode, signal }, 'Debuggee exited');
    this.releaseBridge();
    this.dispatcher.event<DebugProtocol.ExitedEvent['body']>('exited', {
      exitCode: exitCode ?? (signal ? 1 : 0),
    });
    this.terminate();
  }

  private onBridgeError(bridge: DebuggeeBridge, error: BridgeError): void {
    if (bridge !== this.bridge) return;
    if (!error.isFatal) {
      this.logger.warn({ err: error }, 'Debugger reported a recoverable error');
      return;
    }
    this.logger.error({ err: error, stage: error.stage }, 'Debugger failed');
    this.releaseBridge();
    this.dispatcher.event<DebugProtocol.OutputEvent['body']>('output', {
      category: 'console',
      output: `Perl debugger failed: ${error.message}\n`,
    });
    this.terminate();
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /** Moves to `terminated` once, announcing it to the client. */
  private terminate(): void {
    if (this._state === 'terminated') return;
    this.snapshot = undefined;
    this.setState('terminated');
    this.dispatcher.event<DebugProtocol.TerminatedEvent['body']>('terminated');
  }

  private canInstallNow(): boolean {
    if (!this.bridge) return false;
    return (
      this._state === 'configuring' ||
      this._state === 'stopped' ||
      (this._state === 'running' && this.bridge.supportsLiveBreakpoints)
    );
  }

  /** Installs a file's set; returns the breakpoints the debugger moved or refused. */
  private async installFile(fileId: string): Promise<Breakpoint[]> {
    const bridge = this.requireBridge();
    const installable = this.registry.installable(fileId);
    const before = installable.map(installState);
    const results = await this.refuseOnFailure(
      installable.length,
      bridge.installBreakpoints(
        fileId,
        installable.map((bp) => ({
          line: bp.verifiedLine ?? bp.requestedLine,
          condition: bp.condition,
        })),
      ),
    );
    return this.registry
      .applyInstallResults(fileId, results)
      .filter((bp, index) => installState(bp) !== before[index]);
  }

  private async installFunctions(): Promise<FunctionBreakpoint[]> {
    const bridge = this.requireBridge();
    const installable = this.registry.installableFunctions();
    const before = installable.map(functionInstallState);
    const results = await this.refuseOnFailure(
      installable.length,
      bridge.installFunctionBreakpoints(
        installable.map((bp) => ({
          name: bp.name,
          condition: bp.condition,
        })),
      ),
    );
    return this.registry
      .applyFunctionInstallResults(results)
      .filter((bp, index) => functionInstallState(bp) !== before[index]);
  }

  /**
   * A debugger that fails to install a set leaves every entry of it
   * unverified; the request that triggered the install still succeeds.
   */
  private async refuseOnFailure(
    count: number,
    install: Promise<InstallResult[]>,
  ): Promise<InstallResult[]> {
    try {
      return await install;
    } catch (error) {
      if (!(error instanceof BridgeError)) throw error;
      this.logger.warn({ err: error }, 'Breakpoint install failed');
      const message = `The Perl debugger could not install this breakpoint: ${error.message}`;
      return Array.from({ length: count }, () => ({ verified: false, message }));
    }
  }

  /** Installs sets queued while running; returns what to announce. */
  private async flushPendingBreakpoints(): Promise<DebugProtocol.Breakpoint[]> {
    if (!this.registry.hasPending) return [];
    const pending = this.registry.takePending();
    const changed: DebugProtocol.Breakpoint[] = [];
    for (const fileId of pending.files) {
      for (const bp of await this.installFile(fileId)) {
        changed.push(this.clientBreakpoint(bp));
      }
    }
    if (pending.functions) {
      changed.push(
        ...(await this.installFunctions()).map(toProtocolFunctionBreakpoint),
      );
    }
    return changed;
  }

  private emitBreakpointChanges(changed: DebugProtocol.Breakpoint[]): void {
    for (const breakpoint of changed) {
      this.dispatcher.event<DebugProtocol.BreakpointEvent['body']>('breakpoint', {
        reason: 'changed',
        breakpoint,
      });
    }
  }

  private emitStopped(
    reason: DebugProtocol.StoppedEvent['body']['reason'],
    extra: { hitBreakpointIds?: number[]; text?: string; description?: string } = {},
  ): void {
    const body: DebugProtocol.StoppedEvent['body'] = {
      reason,
      threadId: THREAD_ID,
      allThreadsStopped: true,
    };
    if (extra.hitBreakpointIds && extra.hitBreakpointIds.length > 0) {
      body.hitBreakpointIds = extra.hitBreakpointIds;
    }
    if (extra.description !== undefined) body.description = extra.description;
    if (extra.text !== undefined) body.text = extra.text;
    this.dispatcher.event('stopped', body);
  }

  /** Expands `{expression}` parts of a log message while the debuggee is stopped. */
  private async emitLogPoint(
    bridge: DebuggeeBridge,
    logPoint: Breakpoint,
  ): Promise<void> {
    const template = logPoint.logMessage ?? '';
    const parts = template.split(/(\{[^{}]*\})/);
    let message = '';
    for (const part of parts) {
      if (part.length > 2 && part.startsWith('{') && part.endsWith('}')) {
        const expression = part.slice(1, -1).trim();
        try {
          message += await bridge.evaluate(expression);
        } catch (error) {
          message += `<${errorMessage(error)}>`;
        }
      } else {
        message += part;
      }
    }
    this.dispatcher.event<DebugProtocol.OutputEvent['body']>('output', {
      category: 'console',
      output: `${message}\n`,
      source: logPoint.source,
      line: this.toClientLine(logPoint.verifiedLine ?? logPoint.requestedLine),
    });
  }

  private newSnapshot(location: BridgeLocation | undefined): FrameSnapshot {
    return new FrameSnapshot(() => this.nextHandle++, location);
  }

  private toStackFrame(
    snapshot: FrameSnapshot,
    frame: BridgeFrame,
    index: number,
  ): DebugProtocol.StackFrame {
    return {
      id: snapshot.frameId(index),
      name: frame.name,
      source: { name: path.basename(frame.file), path: frame.file },
      line: this.toClientLine(frame.line),
      column: this.clientCapabilities?.columnsStartAt1 === false ? 0 : 1,
    };
  }

  private toProtocolVariable(
    snapshot: FrameSnapshot,
    variable: BridgeVariable,
  ): DebugProtocol.Variable {
    const children = variable.children;
    return {
      name: variable.name,
      value: variable.value,
      variablesReference:
        children && children.length > 0
          ? snapshot.reference({ kind: 'children', children })
          : 0,
    };
  }

  private clientBreakpoint(bp: Breakpoint): DebugProtocol.Breakpoint {
    const result = toProtocolBreakpoint(bp);
    if (result.line !== undefined) {
      result.line = this.toClientLine(result.line);
    }
    return result;
  }

  private toClientLine(line: number): number {
    return this.clientCapabilities?.linesStartAt1 === false ? line - 1 : line;
  }

  private fromClientLine(line: number): number {
    return this.clientCapabilities?.linesStartAt1 === false ? line + 1 : line;
  }

  private checkThread(threadId: number): void {
    if (threadId !== THREAD_ID) {
      throw new ProtocolError(`Unknown thread ${threadId}`);
    }
  }

  private requireBridge(): DebuggeeBridge {
    if (!this.bridge) {
      throw new ProtocolError(
        'No Perl debugger is running',
        ErrorIds.debuggerUnavailable,
      );
    }
    return this.bridge;
  }

  private requireSnapshot(): FrameSnapshot {
    if (!this.snapshot) {
      throw new ProtocolError('The debuggee is not stopped', ErrorIds.illegalState);
    }
    return this.snapshot;
  }
}

function installState(bp: Breakpoint): string {
  return `${bp.verified}:${bp.verifiedLine ?? ''}:${bp.message ?? ''}`;
}

function functionInstallState(bp: FunctionBreakpoint): string {
  return `${bp.verified}:${bp.file ?? ''}:${bp.line ?? ''}:${bp.message ?? ''}`;
}
