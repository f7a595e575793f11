/* eslint-disable @typescript-eslint/no-unsafe-declaration-merging */
import { EventEmitter } from 'events';
import * as child_process from 'child_process';
import * as fs from 'fs';
import * as net from 'net';
import * as path from 'path';
import { Duplex, Readable, Writable } from 'stream';
import { LoggerInterface, componentLogger } from '../logging';
import {
  BridgeError,
  BridgeErrorBuilder,
  ErrorIds,
  ProtocolError,
  errorMessage,
} from '../errors';
import { AdapterSettings } from '../config/adapterSettings';
import { AttachArguments, LaunchArguments } from '../config/launchArguments';
import {
  BreakpointInstall,
  BridgeFrame,
  BridgeLocation,
  BridgeVariable,
  DebuggeeBridge,
  DebuggeeBridgeEvents,
  FunctionBreakpointInstall,
  InstallResult,
  ResumeMode,
  VariableScope,
} from './debuggeeBridge';
import { LineChannel } from './lineChannel';
import {
  errorLocation,
  isDebuggerNoise,
  isExceptionLine,
  isTerminationNotice,
  parseBacktrace,
  parseBreakpointListing,
  parseContextLine,
  parseSubLocation,
  parseVariableDump,
} from './debuggerOutputParser';

/** The parts of a child process the bridge uses. */
export interface DebuggeeProcess {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(
    event: 'exit',
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnFunction = (
  command: string,
  args: string[],
  options: child_process.SpawnOptions,
) => DebuggeeProcess;

export type StatFunction = (
  filePath: string,
) => Promise<Pick<fs.Stats, 'isFile'>>;

/** Waits for one debugger connection on `host:port`. */
export type AcceptFunction = (
  host: string,
  port: number,
  timeoutMs: number,
) => Promise<Duplex>;

export interface PerlDebuggerBridgeHooks {
  spawn?: SpawnFunction;
  stat?: StatFunction;
  accept?: AcceptFunction;
}

export type DebuggerTarget =
  | { kind: 'launch'; args: LaunchArguments }
  | { kind: 'attach'; args: AttachArguments };

type Phase =
  | 'idle'
  | 'starting'
  | 'paused'
  | 'running'
  | 'postmortem'
  | 'exiting'
  | 'closed';

const RESUME_COMMANDS: Record<ResumeMode, string> = {
  continue: 'c',
  next: 'n',
  stepIn: 's',
  stepOut: 'r',
};

const BREAK_FAILURE = /not breakable|no file matching|not found|syntax error/i;

const RECENT_OUTPUT_LINES = 50;

interface ActiveQuery {
  readonly command: string;
  readonly begin: string;
  readonly end: string;
  readonly lines: string[];
  position: 'before' | 'inside' | 'after';
  settle?: (lines: string[]) => void;
}

interface StartWaiter {
  resolve: (location: BridgeLocation | undefined) => void;
  reject: (error: BridgeError) => void;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export declare interface PerlDebuggerBridge {
  on<U extends keyof DebuggeeBridgeEvents>(
    event: U,
    listener: DebuggeeBridgeEvents[U],
  ): this;
  off<U extends keyof DebuggeeBridgeEvents>(
    event: U,
    listener: DebuggeeBridgeEvents[U],
  ): this;
  emit<U extends keyof DebuggeeBridgeEvents>(
    event: U,
    ...args: Parameters<DebuggeeBridgeEvents[U]>
  ): boolean;
}

/**
 * Drives `perl -d` over its line protocol. Commands are only written while
 * the debugger sits at a prompt; query output is fenced between two printed
 * markers so it can be told apart from the program's own output.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class PerlDebuggerBridge extends EventEmitter implements DebuggeeBridge {
  public readonly supportsLiveBreakpoints = false;

  private readonly logger: LoggerInterface;
  private readonly channel = new LineChannel();
  private readonly spawnProcess: SpawnFunction;
  private readonly statFile: StatFunction;
  private readonly accept: AcceptFunction;
  private readonly baseDir: string;

  private phase: Phase = 'idle';
  private process: DebuggeeProcess | undefined;
  private connection: Duplex | undefined;
  private input: Writable | undefined;
  private startWaiter: StartWaiter | undefined;
  private startTimer: NodeJS.Timeout | undefined;
  private activeQuery: ActiveQuery | undefined;
  private failQuery: ((error: BridgeError) => void) | undefined;
  private queryChain: Promise<unknown> = Promise.resolve();
  private nextMarker = 1;

  private location: BridgeLocation | undefined;
  private frames: BridgeFrame[] | undefined;
  private programFinished = false;
  private breakOnDie = false;
  private exceptionText: string | undefined;
  private exceptionLocation: BridgeLocation | undefined;
  private readonly recentOutput: string[] = [];

  private readonly installedLines = new Map<string, number[]>();
  private installedFunctionLocations: Array<{ file: string; line: number }> = [];

  constructor(
    private readonly target: DebuggerTarget,
    private readonly settings: AdapterSettings,
    logger: LoggerInterface,
    hooks: PerlDebuggerBridgeHooks = {},
  ) {
    super();
    this.logger = componentLogger(logger, 'PerlDebuggerBridge');
    this.spawnProcess =
      hooks.spawn ?? ((command, args, options) => child_process.spawn(command, args, options));
    this.statFile = hooks.stat ?? ((filePath) => fs.promises.stat(filePath));
    this.accept = hooks.accept ?? acceptDebuggerConnection;
    this.baseDir = target.kind === 'launch' ? target.args.cwd : process.cwd();

    this.channel.on('line', (line) => this.handleLine(line));
    this.channel.on('prompt', () => this.handlePrompt());
  }

  /** Launches or accepts the debugger and waits for its first prompt. */
  async start(): Promise<BridgeLocation | undefined> {
    if (this.phase !== 'idle') {
      throw new BridgeErrorBuilder('The debugger was already started')
        .stage('spawn')
        .build();
    }
    this.phase = 'starting';
    if (this.target.kind === 'launch') {
      await this.launch(this.target.args);
    } else {
      await this.attach(this.target.args);
    }
    return this.waitForFirstPrompt();
  }

  async installBreakpoints(
    fileId: string,
    entries: BreakpointInstall[],
  ): Promise<InstallResult[]> {
    for (const line of this.installedLines.get(fileId) ?? []) {
      await this.query(`B ${fileId}:${line}`);
    }
    this.installedLines.delete(fileId);

    const results: InstallResult[] = [];
    const installed: number[] = [];
    for (const entry of entries) {
      const output = await this.query(
        `b ${fileId}:${entry.line}${conditionSuffix(entry.condition)}`,
      );
      const failure = output.find((line) => BREAK_FAILURE.test(line));
      if (failure) {
        results.push({ verified: false, message: failure.trim() });
      } else {
        installed.push(entry.line);
        results.push({ verified: true, file: fileId, line: entry.line });
      }
    }
    if (installed.length > 0) {
      this.installedLines.set(fileId, installed);
    }
    return results;
  }

  async installFunctionBreakpoints(
    entries: FunctionBreakpointInstall[],
  ): Promise<InstallResult[]> {
    for (const location of this.installedFunctionLocations) {
      await this.query(`B ${location.file}:${location.line}`);
    }
    this.installedFunctionLocations = [];

    const results: InstallResult[] = [];
    for (const entry of entries) {
      const declared = parseSubLocation(
        (await this.query(`p $DB::sub{'${entry.name}'}`)).join(''),
      );
      if (!declared) {
        results.push({
          verified: false,
          message: `Subroutine ${entry.name} not found`,
        });
        continue;
      }
      const before = new Set(
        (await this.listBreakpoints()).map((bp) => `${bp.file}:${bp.line}`),
      );
      const output = await this.query(
        `b ${entry.name}${conditionSuffix(entry.condition)}`,
      );
      const failure = output.find((line) => BREAK_FAILURE.test(line));
      if (failure) {
        results.push({ verified: false, message: failure.trim() });
        continue;
      }
      // `b sub` breaks on the first statement, which only the listing reveals.
      const after = await this.listBreakpoints();
      const placed =
        after.find((bp) => !before.has(`${bp.file}:${bp.line}`)) ?? declared;
      this.installedFunctionLocations.push(placed);
      results.push({
        verified: true,
        file: this.resolvePath(placed.file),
        line: placed.line,
      });
    }
    return results;
  }

  /** Any filter turns on stopping at an uncaught `die`. */
  async setExceptionFilters(filters: string[]): Promise<void> {
    this.breakOnDie = filters.length > 0;
    this.logger.debug({ filters }, 'Exception filters updated');
  }

  resume(mode: ResumeMode): void {
    if (this.phase === 'postmortem') {
      this.quit();
      return;
    }
    if (this.phase !== 'paused') {
      this.logger.warn({ mode, phase: this.phase }, 'Ignoring resume');
      return;
    }
    this.phase = 'running';
    this.location = undefined;
    this.frames = undefined;
    this.exceptionText = undefined;
    this.exceptionLocation = undefined;
    this.write(RESUME_COMMANDS[mode]);
  }

  pause(): void {
    if (this.phase !== 'running') {
      return;
    }
    if (!this.process) {
      throw new ProtocolError(
        'Pause is not supported for attached sessions',
        ErrorIds.illegalState,
      );
    }
    this.process.kill('SIGINT');
  }

  async stackTrace(): Promise<BridgeFrame[]> {
    const top = this.location;
    if (!top) {
      return [];
    }
    const frames = parseBacktrace(top, await this.query('T')).map((frame) => ({
      ...frame,
      file: this.resolvePath(frame.file),
    }));
    this.frames = frames;
    return frames;
  }

  async variables(
    scope: VariableScope,
    frameIndex: number,
  ): Promise<BridgeVariable[]> {
    let command: string;
    switch (scope) {
      case 'locals':
        command = `y ${frameIndex}`;
        break;
      case 'package':
        command = `V ${packageOf(this.frameName(frameIndex))}`;
        break;
      case 'globals':
        command = 'V main';
        break;
    }
    return parseVariableDump(await this.query(command));
  }

  async evaluate(expression: string): Promise<string> {
    return (await this.query(`p ${expression}`)).join('\n');
  }

  async setVariable(name: string, value: string): Promise<string> {
    await this.query(`p ${name} = ${value}`);
    return (await this.query(`p ${name}`)).join('\n');
  }

  kill(): void {
    if (this.phase === 'closed') {
      return;
    }
    this.logger.info('Stopping the Perl debugger');
    this.phase = 'closed';
    const stopped = new BridgeErrorBuilder('The debugger was stopped')
      .stage('exit')
      .build();
    this.failPending(stopped);
    if (this.input && this.input.writable) {
      this.input.write('q\n');
    }
    this.process?.kill('SIGTERM');
    this.connection?.destroy();
  }

  // ---------------------------------------------------------------------------
  // Startup
  // ---------------------------------------------------------------------------

  private async launch(args: LaunchArguments): Promise<void> {
    let stats: Pick<fs.Stats, 'isFile'>;
    try {
      stats = await this.statFile(args.program);
    } catch (error) {
      throw this.startFailure(
        `Program not found: ${args.program}`,
        'spawn',
        error,
      );
    }
    if (!stats.isFile()) {
      throw this.startFailure(`Program is not a file: ${args.program}`, 'spawn');
    }

    const perlPath = args.perlPath ?? this.settings.perlPath;
    const perlArgs = [
      ...this.settings.perlArgs,
      ...args.includePaths.map((include) => `-I${include}`),
      '-d',
      '--',
      args.program,
      ...args.args,
    ];
    const env: NodeJS.ProcessEnv = {
      ...process.env,
      ...this.settings.env,
      ...args.env,
      PERLDB_OPTS: ['ReadLine=0', args.env.PERLDB_OPTS ?? this.settings.env.PERLDB_OPTS]
        .filter((option) => option !== undefined && option.length > 0)
        .join(' '),
    };
    this.logger.info({ perlPath, perlArgs, cwd: args.cwd }, 'Spawning perl -d');

    let child: DebuggeeProcess;
    try {
      child = this.spawnProcess(perlPath, perlArgs, {
        cwd: args.cwd,
        env,
        stdio: ['pipe', 'pipe', 'pipe'],
      });
    } catch (error) {
      throw this.startFailure(`Failed to spawn ${perlPath}`, 'spawn', error);
    }
    this.process = child;
    this.input = child.stdin ?? undefined;

    child.on('error', (error) => this.handleProcessError(error));
    child.on('exit', (code, signal) => this.handleExit(code, signal));
    child.stdout?.on('data', (data: Buffer | string) => {
      this.emit('output', 'stdout', data.toString());
    });
    // The debugger's own dialogue shares stderr with the program's warnings.
    child.stderr?.on('data', (data: Buffer | string) => {
      this.channel.push(data.toString());
    });
    child.stdin?.on('error', (error) => {
      this.logger.warn({ err: error }, 'Debugger input stream error');
    });
  }

  private async attach(args: AttachArguments): Promise<void> {
    const timeoutMs = args.timeoutMs ?? this.settings.handshakeTimeoutMs;
    this.logger.info(
      { host: args.host, port: args.port, timeoutMs },
      'Listening for RemotePort debugger',
    );
    let socket: Duplex;
    try {
      socket = await this.accept(args.host, args.port, timeoutMs);
    } catch (error) {
      throw this.startFailure(
        `No Perl debugger connected to ${args.host}:${args.port}: ${errorMessage(error)}`,
        'attach',
        error,
      );
    }
    if (this.phase !== 'starting') {
      socket.destroy();
      throw this.startFailure('The debugger was stopped', 'attach');
    }
    this.connection = socket;
    this.input = socket;
    socket.on('data', (data: Buffer | string) => this.channel.push(data.toString()));
    socket.on('error', (error) => {
      this.logger.warn({ err: error }, 'Debugger connection error');
    });
    socket.on('close', () => this.handleExit(null, null));
  }

  private waitForFirstPrompt(): Promise<BridgeLocation | undefined> {
    return new Promise((resolve, reject) => {
      if (this.phase === 'paused' || this.phase === 'postmortem') {
        resolve(this.location);
        return;
      }
      if (this.phase !== 'starting') {
        reject(this.startFailure('The debugger exited during startup', 'handshake'));
        return;
      }
      this.startWaiter = { resolve, reject };
      this.startTimer = setTimeout(() => {
        const waiter = this.startWaiter;
        this.startWaiter = undefined;
        this.startTimer = undefined;
        waiter?.reject(
          this.startFailure(
            `The debugger did not prompt within ${this.settings.handshakeTimeoutMs}ms`,
            'handshake',
          ),
        );
        this.kill();
      }, this.settings.handshakeTimeoutMs);
    });
  }

  private settleStart(): StartWaiter | undefined {
    const waiter = this.startWaiter;
    this.startWaiter = undefined;
    if (this.startTimer) {
      clearTimeout(this.startTimer);
      this.startTimer = undefined;
    }
    return waiter;
  }

  private startFailure(
    message: string,
    stage: 'spawn' | 'handshake' | 'attach',
    cause?: unknown,
  ): BridgeError {
    const builder = new BridgeErrorBuilder(message).stage(stage);
    if (cause instanceof Error) {
      builder.underlyingError(cause);
    }
    if (this.recentOutput.length > 0) {
      builder.stderrOutput(this.recentOutput.join('\n'));
    }
    return builder.build();
  }

  // ---------------------------------------------------------------------------
  // Debugger output
  // ---------------------------------------------------------------------------

  private handleLine(line: string): void {
    this.logger.trace({ line }, 'Debugger output');
    const query = this.activeQuery;
    if (query) {
      this.collectQueryLine(query, line);
      return;
    }

    this.remember(line);
    const context = parseContextLine(line);
    if (context) {
      this.location = {
        subroutine: context.subroutine,
        file: this.resolvePath(context.file),
        line: context.line,
      };
      return;
    }
    if (isTerminationNotice(line)) {
      this.programFinished = true;
      return;
    }
    if (this.breakOnDie && isExceptionLine(line)) {
      this.exceptionText =
        this.exceptionText === undefined ? line.trim() : `${this.exceptionText}\n${line.trim()}`;
      const at = errorLocation(line);
      if (at) {
        this.exceptionLocation = {
          subroutine: this.location?.subroutine ?? 'main',
          file: this.resolvePath(at.file),
          line: at.line,
        };
      }
    }
    if (isDebuggerNoise(line)) {
      return;
    }
    this.emit('output', 'stderr', `${line}\n`);
  }

  private handlePrompt(): void {
    const query = this.activeQuery;
    if (query) {
      if (query.position === 'after') {
        this.activeQuery = undefined;
        query.settle?.(query.lines);
      }
      return;
    }

    switch (this.phase) {
      case 'starting': {
        this.phase = this.programFinished ? 'postmortem' : 'paused';
        this.settleStart()?.resolve(this.location);
        return;
      }
      case 'running':
        if (!this.programFinished) {
          this.phase = 'paused';
          this.emit('stopped', { location: this.location });
          return;
        }
        if (this.breakOnDie && this.exceptionText !== undefined) {
          this.phase = 'postmortem';
          this.emit('stopped', {
            location: this.exceptionLocation ?? this.location,
            exceptionText: this.exceptionText,
          });
          return;
        }
        this.quit();
        return;
      default:
        this.logger.debug({ phase: this.phase }, 'Unexpected prompt');
    }
  }

  private handleProcessError(error: Error): void {
    this.logger.error({ err: error }, 'Perl debugger process error');
    const failure = this.startFailure(
      `Perl debugger process error: ${error.message}`,
      'spawn',
      error,
    );
    const waiter = this.settleStart();
    if (waiter) {
      this.phase = 'closed';
      waiter.reject(failure);
      return;
    }
    if (this.phase !== 'closed') {
      this.emit('error', failure);
    }
  }

  private handleExit(code: number | null, signal: NodeJS.Signals | null): void {
    this.channel.end();
    const wasClosed = this.phase === 'closed';
    this.phase = 'closed';
    this.logger.info({ code, signal }, 'Perl debugger exited');

    const exited = new BridgeErrorBuilder(
      `The debugger exited (code ${code ?? 'none'}${signal ? `, signal ${signal}` : ''})`,
    )
      .stage('exit')
      .exitCode(code)
      .signal(signal)
      .stderrOutput(this.recentOutput.join('\n'))
      .build();

    const waiter = this.settleStart();
    if (waiter) {
      waiter.reject(
        new BridgeError(
          `The debugger exited before its first prompt (code ${code ?? 'none'})`,
          'handshake',
          exited,
          this.recentOutput.join('\n'),
          code,
          signal,
        ),
      );
      return;
    }
    this.failPending(exited);
    if (!wasClosed) {
      this.emit('exited', code, signal);
    }
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** Runs `command` at the prompt, one query at a time, and returns its output. */
  private query(command: string): Promise<string[]> {
    const run = (): Promise<string[]> => this.runQuery(command);
    const result = this.queryChain.then(run, run);
    this.queryChain = result.catch(() => undefined);
    return result;
  }

  private runQuery(command: string): Promise<string[]> {
    if (this.phase !== 'paused' && this.phase !== 'postmortem') {
      return Promise.reject(
        new BridgeErrorBuilder(`The debugger is not at a prompt (${this.phase})`)
          .stage('query')
          .build(),
      );
    }
    const marker = this.nextMarker++;
    const query: ActiveQuery = {
      command,
      begin: `DAP_BEGIN_${marker}`,
      end: `DAP_END_${marker}`,
      lines: [],
      position: 'before',
    };
    return new Promise<string[]>((resolve, reject) => {
      const timer = setTimeout(() => {
        // Late output of this query is still swallowed until its end marker.
        query.settle = undefined;
        this.failQuery = undefined;
        reject(
          new BridgeErrorBuilder(
            `Timed out after ${this.settings.queryTimeoutMs}ms waiting for '${command}'`,
          )
            .stage('query')
            .build(),
        );
      }, this.settings.queryTimeoutMs);
      query.settle = (lines) => {
        clearTimeout(timer);
        this.failQuery = undefined;
        resolve(lines);
      };
      this.failQuery = (error) => {
        clearTimeout(timer);
        query.settle = undefined;
        this.failQuery = undefined;
        reject(error);
      };
      this.activeQuery = query;
      this.write(`p "${query.begin}"`);
      this.write(command);
      this.write(`p "${query.end}"`);
    });
  }

  private collectQueryLine(query: ActiveQuery, line: string): void {
    const text = line.trim();
    switch (query.position) {
      case 'before':
        if (text === query.begin) query.position = 'inside';
        return;
      case 'inside':
        if (text === query.end) {
          query.position = 'after';
        } else {
          query.lines.push(line);
        }
        return;
      case 'after':
        return;
    }
  }

  private failPending(error: BridgeError): void {
    this.settleStart()?.reject(error);
    this.failQuery?.(error);
    this.activeQuery = undefined;
  }

  private async listBreakpoints(): Promise<Array<{ file: string; line: number }>> {
    return parseBreakpointListing(await this.query('L b'));
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private write(command: string): void {
    if (!this.input || !this.input.writable) {
      this.logger.warn({ command }, 'Debugger input is closed');
      return;
    }
    this.logger.trace({ command }, 'Debugger command');
    this.input.write(`${command}\n`);
  }

  private quit(): void {
    this.phase = 'exiting';
    this.write('q');
  }

  private remember(line: string): void {
    this.recentOutput.push(line);
    if (this.recentOutput.length > RECENT_OUTPUT_LINES) {
      this.recentOutput.shift();
    }
  }

  private resolvePath(file: string): string {
    return path.resolve(this.baseDir, file);
  }

  private frameName(frameIndex: number): string {
    return this.frames?.[frameIndex]?.name ?? this.location?.subroutine ?? 'main';
  }
}

function conditionSuffix(condition: string | undefined): string {
  return condition !== undefined && condition.trim().length > 0
    ? ` ${condition.trim()}`
    : '';
}

/** `Foo::Bar::baz` → `Foo::Bar`; a bare name is a package of its own. */
export function packageOf(subroutine: string): string {
  const separator = subroutine.lastIndexOf('::');
  return separator === -1 ? subroutine : subroutine.slice(0, separator);
}

/**
 * Listens on `host:port` for the connection a `perl -d` started with
 * `PERLDB_OPTS="RemotePort=host:port"` makes, then stops listening.
 */
export function acceptDebuggerConnection(
  host: string,
  port: number,
  timeoutMs: number,
): Promise<Duplex> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    const timer = setTimeout(() => {
      server.close();
      reject(new Error(`timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    server.once('connection', (socket) => {
      clearTimeout(timer);
      server.close();
      resolve(socket);
    });
    server.once('error', (error) => {
      clearTimeout(timer);
      server.close();
      reject(error);
    });
    server.listen(port, host);
  });
}

/** Creates {@link PerlDebuggerBridge}s for launch and attach requests. */
export class PerlBridgeFactory {
  constructor(private readonly hooks: PerlDebuggerBridgeHooks = {}) {}

  launch(
    args: LaunchArguments,
    settings: AdapterSettings,
    logger: LoggerInterface,
  ): DebuggeeBridge {
    return new PerlDebuggerBridge({ kind: 'launch', args }, settings, logger, this.hooks);
  }

  attach(
    args: AttachArguments,
    settings: AdapterSettings,
    logger: LoggerInterface,
  ): DebuggeeBridge {
    return new PerlDebuggerBridge({ kind: 'attach', args }, settings, logger, this.hooks);
  }
}
