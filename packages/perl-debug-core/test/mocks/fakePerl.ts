import { EventEmitter } from 'events';
import { Duplex, PassThrough } from 'stream';
import * as sinon from 'sinon';
import { DebuggeeProcess } from '../../src/bridge/perlDebuggerBridge';

const MARKER = /^p "(DAP_(?:BEGIN|END)_\d+)"$/;

/**
 * Answers commands the way `perl -d` does on a pipe: output, then a prompt
 * with no trailing newline. Markers printed by the bridge are echoed back;
 * anything else is answered by `reply`.
 */
abstract class ScriptedDebugger {
  public readonly commands: string[] = [];
  /** Output for a command, before the next prompt. */
  public readonly reply = sinon.stub<[string], string>().returns('');

  private promptCount = 1;
  private partialInput = '';
  private hangOn: string | undefined;
  private hung = false;

  /** Stops answering, prompt included, once `command` arrives. */
  hang(command: string): void {
    this.hangOn = command;
  }

  /** Banner, the first stop location and the first prompt. */
  boot(location = 'main::(/work/app.pl:1):\tuse strict;'): void {
    this.output(
      [
        '',
        'Loading DB routines from perl5db.pl version 1.60',
        'Editor support available.',
        '',
        "Enter h or 'h h' for help, or 'man perldebug' for more help.",
        '',
        location,
        '',
      ].join('\n'),
    );
    this.prompt();
  }

  protected abstract output(text: string): void;

  protected abstract quit(): void;

  protected receive(chunk: string): void {
    this.partialInput += chunk;
    let newline = this.partialInput.indexOf('\n');
    while (newline !== -1) {
      const command = this.partialInput.slice(0, newline);
      this.partialInput = this.partialInput.slice(newline + 1);
      this.handle(command);
      newline = this.partialInput.indexOf('\n');
    }
  }

  private handle(command: string): void {
    this.commands.push(command);
    if (command === 'q') {
      this.quit();
      return;
    }
    if (this.hung || command === this.hangOn) {
      this.hung = true;
      return;
    }
    const marker = MARKER.exec(command);
    const text = marker ? `${marker[1]}\n` : this.reply(command);
    if (text.length > 0) {
      this.output(text);
    }
    this.prompt();
  }

  private prompt(): void {
    this.output(`  DB<${this.promptCount++}> `);
  }
}

/** A `perl -d` child process; the dialogue runs over stderr. */
export class FakePerlProcess extends ScriptedDebugger implements DebuggeeProcess {
  public readonly pid = 4242;
  public readonly stdin = new PassThrough();
  public readonly stdout = new PassThrough();
  public readonly stderr = new PassThrough();
  public readonly kill = sinon.stub<[NodeJS.Signals?], boolean>().returns(true);
  private readonly events = new EventEmitter();

  constructor() {
    super();
    this.stdin.on('data', (chunk: Buffer) => this.receive(chunk.toString()));
  }

  on(
    event: 'exit',
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): this;
  on(event: 'error', listener: (error: Error) => void): this;
  on(
    event: string,
    listener:
      | ((code: number | null, signal: NodeJS.Signals | null) => void)
      | ((error: Error) => void),
  ): this {
    this.events.on(event, listener);
    return this;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.events.emit('exit', code, signal);
  }

  fail(error: Error): void {
    this.events.emit('error', error);
  }

  protected output(text: string): void {
    this.stderr.write(text);
  }

  protected quit(): void {
    setImmediate(() => this.exit(0));
  }
}

/** The far end of a `RemotePort` connection. */
export class FakeDebuggerSocket extends Duplex {
  private readonly debuggerSide: SocketDebugger;

  constructor() {
    super();
    this.debuggerSide = new SocketDebugger(this);
  }

  get commands(): string[] {
    return this.debuggerSide.commands;
  }

  get reply(): sinon.SinonStub<[string], string> {
    return this.debuggerSide.reply;
  }

  boot(location?: string): void {
    this.debuggerSide.boot(location);
  }

  hang(command: string): void {
    this.debuggerSide.hang(command);
  }

  _read(): void {
    // Output is pushed as the scripted debugger produces it.
  }

  _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.debuggerSide.accept(chunk.toString());
    callback();
  }
}

class SocketDebugger extends ScriptedDebugger {
  constructor(private readonly socket: FakeDebuggerSocket) {
    super();
  }

  accept(chunk: string): void {
    this.receive(chunk);
  }

  protected output(text: string): void {
    this.socket.push(text);
  }

  protected quit(): void {
    setImmediate(() => this.socket.destroy());
  }
}
