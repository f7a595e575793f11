import { expect } from 'chai';
import * as sinon from 'sinon';
import { DebugProtocol } from '@vscode/debugprotocol';
import {
  ADAPTER_CAPABILITIES,
  DebugSession,
} from '../../src/session/debugSession';
import { InMemorySourceIndexCache } from '../../src/source/sourceIndexCache';
import { SourceLoader } from '../../src/source/sourceLoader';
import { DEFAULT_SETTINGS } from '../../src/config/adapterSettings';
import { BridgeErrorBuilder } from '../../src/errors';
import { FakeBridge, FakeBridgeFactory } from '../mocks/fakeBridge';
import { RecordingSink } from '../mocks/recordingSink';
import { createMockLogger } from '../mocks/mockLogger';

const APP = '/work/app.pl';
const APP_SOURCE = `${[
  '#!/usr/bin/perl',
  'use strict;',
  '',
  'sub greet {',
  '    my ($name) = @_;',
  '    print "Hello, $name\\n";',
  '}',
  '',
  '# say hello',
  "greet('world');",
  'print <<EOT;',
  'body text',
  'EOT',
  'exit 0;',
].join('\n')}\n`;
const SOURCE = { path: APP, name: 'app.pl' };

describe('DebugSession', () => {
  let sink: RecordingSink;
  let factory: FakeBridgeFactory;
  let read: sinon.SinonStub<[string], Promise<Buffer>>;
  let session: DebugSession;
  let nextSeq: number;

  beforeEach(() => {
    sink = new RecordingSink();
    factory = new FakeBridgeFactory();
    read = sinon.stub<[string], Promise<Buffer>>().callsFake(async (filePath) => {
      if (filePath === APP) {
        return Buffer.from(APP_SOURCE);
      }
      throw new Error('ENOENT: no such file');
    });
    session = new DebugSession({
      sink,
      bridgeFactory: factory,
      sourceCache: new InMemorySourceIndexCache(),
      sourceLoader: new SourceLoader(undefined, read),
      settings: { ...DEFAULT_SETTINGS },
      logger: createMockLogger(),
      sessionId: 'test-session',
    });
    nextSeq = 1;
  });

  afterEach(() => {
    sinon.restore();
  });

  function request(command: string, args?: unknown): DebugProtocol.Request {
    return { seq: nextSeq++, type: 'request', command, arguments: args };
  }

  async function send(
    command: string,
    args?: unknown,
  ): Promise<DebugProtocol.Response> {
    const message = request(command, args);
    session.handleRequest(message);
    await session.idle();
    return sink.responseTo(message.seq);
  }

  async function launch(stopOnEntry = false): Promise<FakeBridge> {
    await send('initialize', { adapterID: 'perl' });
    await send('launch', { program: APP, cwd: '/work', stopOnEntry });
    return factory.bridge;
  }

  /** Launched and resumed with `continue`, so the session is running. */
  async function running(): Promise<FakeBridge> {
    const bridge = await launch();
    await send('configurationDone');
    return bridge;
  }

  /** Launched with stopOnEntry and stopped at line 1. */
  async function stoppedOnEntry(): Promise<FakeBridge> {
    const bridge = await launch(true);
    await send('configurationDone');
    return bridge;
  }

  function lastKinds(count: number): string[] {
    return sink.kinds().slice(-count);
  }

  describe('initialize', () => {
    it('responds with the adapter capabilities, then emits initialized', async () => {
      const response = await send('initialize', { adapterID: 'perl' });

      expect(response.success).to.equal(true);
      expect(response.body).to.deep.equal(ADAPTER_CAPABILITIES);
      expect(sink.kinds()).to.deep.equal([
        'response:initialize',
        'event:initialized',
      ]);
      expect(sink.messages.map((m) => m.seq)).to.deep.equal([1, 2]);
      expect(session.state).to.equal('initialized');
    });

    it('announces each state change', async () => {
      const changes: string[] = [];
      session.on('stateChanged', ({ from, to }) => changes.push(`${from}->${to}`));

      await stoppedOnEntry();

      expect(changes).to.deep.equal([
        'uninitialized->initialized',
        'initialized->configuring',
        'configuring->stopped',
      ]);
    });
  });

  describe('request validation', () => {
    it('rejects a request that is illegal in the current state', async () => {
      const response = await send('continue', { threadId: 1 });

      expect(response.success).to.equal(false);
      expect(response.message).to.equal(
        "'continue' is not allowed while the session is uninitialized",
      );
      expect(response.body.error.id).to.equal(1003);
      expect(session.state).to.equal('uninitialized');
    });

    it('rejects a second initialize', async () => {
      await send('initialize');
      const response = await send('initialize');

      expect(response.success).to.equal(false);
      expect(response.message).to.equal(
        "'initialize' is not allowed while the session is initialized",
      );
    });

    it('rejects an unknown command', async () => {
      const response = await send('frobnicate');

      expect(response.success).to.equal(false);
      expect(response.message).to.equal("Unrecognized request 'frobnicate'");
      expect(response.body.error.id).to.equal(1001);
    });

    it('fails a launch without a program and stays initialized', async () => {
      await send('initialize');
      const response = await send('launch', {});

      expect(response.success).to.equal(false);
      expect(response.message).to.equal(
        "Invalid arguments for 'launch': 'program' is required",
      );
      expect(response.body.error.id).to.equal(1002);
      expect(session.state).to.equal('initialized');
      expect(factory.launch.called).to.equal(false);
    });

    it('answers a framed message that was not a usable request', async () => {
      session.handleInvalidRequest({
        requestSeq: 9,
        command: 'launch',
        message: 'Request is missing a sequence number',
      });
      await session.idle();

      const response = sink.responseTo(9);
      expect(response.success).to.equal(false);
      expect(response.command).to.equal('launch');
      expect(response.message).to.equal('Request is missing a sequence number');
    });
  });

  describe('setBreakpoints', () => {
    it('validates lines against the classified source before launch', async () => {
      await send('initialize');
      const response = await send('setBreakpoints', {
        source: SOURCE,
        breakpoints: [{ line: 1 }, { line: 8 }, { line: 12 }, { line: 14 }, { line: 30 }],
      });

      expect(response.success).to.equal(true);
      expect(response.body).to.deep.equal({
        breakpoints: [
          { id: 1, verified: true, source: SOURCE, line: 2 },
          { id: 2, verified: true, source: SOURCE, line: 10 },
          { id: 3, verified: true, source: SOURCE, line: 14 },
          { id: 4, verified: true, source: SOURCE, line: 14 },
          {
            id: 5,
            verified: false,
            source: SOURCE,
            message: 'Line number exceeds file length',
          },
        ],
      });
      expect(factory.bridges).to.have.length(0);
    });

    it('converts lines for clients that count from zero', async () => {
      await send('initialize', { linesStartAt1: false });
      const response = await send('setBreakpoints', {
        source: SOURCE,
        breakpoints: [{ line: 0 }],
      });

      expect(response.body.breakpoints[0].line).to.equal(1);
    });

    it('fails for an unreadable source', async () => {
      await send('initialize');
      const response = await send('setBreakpoints', {
        source: { path: '/work/missing.pl' },
        breakpoints: [{ line: 1 }],
      });

      expect(response.success).to.equal(false);
      expect(response.message).to.equal(
        'Could not read source file /work/missing.pl: ENOENT: no such file',
      );
      expect(response.body.error.id).to.equal(1004);
    });

    it('keeps the previous set when the source cannot be re-read', async () => {
      await send('initialize');
      await send('setBreakpoints', { source: SOURCE, breakpoints: [{ line: 2 }] });
      read.rejects(new Error('EACCES: permission denied'));

      const failed = await send('setBreakpoints', {
        source: SOURCE,
        breakpoints: [{ line: 5 }],
      });
      await send('launch', { program: APP, cwd: '/work' });
      const bridge = factory.bridge;

      expect(failed.success).to.equal(false);
      expect(bridge.installBreakpoints.calledOnce).to.equal(true);
      expect(bridge.installBreakpoints.firstCall.args).to.deep.equal([
        APP,
        [{ line: 2, condition: undefined }],
      ]);
    });

    it('installs at once while stopped', async () => {
      const bridge = await stoppedOnEntry();

      const response = await send('setBreakpoints', {
        source: SOURCE,
        breakpoints: [{ line: 5, condition: '$name eq "world"' }],
      });

      expect(bridge.installBreakpoints.calledOnceWithExactly(APP, [
        { line: 5, condition: '$name eq "world"' },
      ])).to.equal(true);
      expect(response.body.breakpoints).to.deep.equal([
        { id: 1, verified: true, source: SOURCE, line: 5 },
      ]);
    });

    it('reports provisional results while running and announces changes at the next stop', async () => {
      const bridge = await running();

      const response = await send('setBreakpoints', {
        source: SOURCE,
        breakpoints: [{ line: 1 }],
      });
      expect(response.body.breakpoints).to.deep.equal([
        { id: 1, verified: true, source: SOURCE, line: 2 },
      ]);
      expect(bridge.installBreakpoints.called).to.equal(false);

      bridge.installBreakpoints.resolves([
        { verified: false, message: 'Line 2 not breakable.' },
      ]);
      bridge.stopAt(APP, 5, 'main::greet');
      await session.idle();

      expect(lastKinds(2)).to.deep.equal(['event:breakpoint', 'event:stopped']);
      const [changed] = sink.events('breakpoint');
      expect(changed.body).to.deep.equal({
        reason: 'changed',
        breakpoint: {
          id: 1,
          verified: false,
          source: SOURCE,
          message: 'Line 2 not breakable.',
        },
      });
      expect(sink.events('stopped')[0].body.reason).to.equal('step');
    });
  });

  describe('launch', () => {
    it('installs breakpoints registered earlier and announces the ones that changed', async () => {
      factory.prepare = (bridge) => {
        bridge.installBreakpoints.callsFake(async (fileId, entries) =>
          entries.map((entry) =>
            entry.line === 6
              ? { verified: false, message: 'Line 6 not breakable.' }
              : { verified: true, file: fileId, line: entry.line },
          ),
        );
      };
      await send('initialize');
      await send('setBreakpoints', {
        source: SOURCE,
        breakpoints: [{ line: 1 }, { line: 6 }],
      });

      const response = await send('launch', { program: APP, cwd: '/work' });

      expect(response.success).to.equal(true);
      expect(session.state).to.equal('configuring');
      expect(factory.bridge.installBreakpoints.firstCall.args).to.deep.equal([
        APP,
        [
          { line: 2, condition: undefined },
          { line: 6, condition: undefined },
        ],
      ]);
      expect(lastKinds(2)).to.deep.equal(['response:launch', 'event:breakpoint']);
      expect(sink.events('breakpoint')[0].body).to.deep.equal({
        reason: 'changed',
        breakpoint: {
          id: 2,
          verified: false,
          source: SOURCE,
          message: 'Line 6 not breakable.',
        },
      });
    });

    it('fails the request and terminates when the debugger cannot start', async () => {
      factory.prepare = (bridge) => {
        bridge.start.rejects(new Error('spawn perl ENOENT'));
      };
      await send('initialize');

      const response = await send('launch', { program: APP, cwd: '/work' });

      expect(response.success).to.equal(false);
      expect(response.message).to.equal(
        'Could not start the Perl debugger: spawn perl ENOENT',
      );
      expect(response.body.error.id).to.equal(1005);
      expect(lastKinds(2)).to.deep.equal(['response:launch', 'event:terminated']);
      expect(session.state).to.equal('terminated');
      expect(factory.bridge.kill.calledOnce).to.equal(true);
    });

    it('reports breakpoints the debugger failed to install as unverified', async () => {
      factory.prepare = (bridge) => {
        bridge.installFunctionBreakpoints.rejects(
          new BridgeErrorBuilder('Timed out waiting for the debugger')
            .stage('query')
            .build(),
        );
      };
      await send('initialize');
      await send('setFunctionBreakpoints', { breakpoints: [{ name: 'greet' }] });

      const response = await send('launch', { program: APP, cwd: '/work' });

      expect(response.success).to.equal(true);
      expect(session.state).to.equal('configuring');
      expect(factory.bridge.kill.called).to.equal(false);
      expect(lastKinds(2)).to.deep.equal(['response:launch', 'event:breakpoint']);
      expect(sink.events('breakpoint')[0].body).to.deep.equal({
        reason: 'changed',
        breakpoint: {
          id: 1,
          verified: false,
          message:
            'The Perl debugger could not install this breakpoint: Timed out waiting for the debugger',
        },
      });
    });

    it('kills the debugger and terminates when setup fails', async () => {
      factory.prepare = (bridge) => {
        bridge.setExceptionFilters.rejects(new Error('debugger went away'));
      };
      await send('initialize');
      await send('setExceptionBreakpoints', { filters: ['die'] });

      const response = await send('launch', { program: APP, cwd: '/work' });

      expect(response.success).to.equal(false);
      expect(response.message).to.equal(
        'Could not prepare the Perl debugger: debugger went away',
      );
      expect(factory.bridge.kill.calledOnce).to.equal(true);
      expect(lastKinds(2)).to.deep.equal(['response:launch', 'event:terminated']);
      expect(session.state).to.equal('terminated');
    });

    it('attaches through the factory', async () => {
      await send('initialize');
      const response = await send('attach', { port: 5000 });

      expect(response.success).to.equal(true);
      expect(factory.attach.calledOnce).to.equal(true);
      expect(factory.attach.firstCall.args[0]).to.deep.equal({
        host: '127.0.0.1',
        port: 5000,
        timeoutMs: undefined,
      });
      expect(session.state).to.equal('configuring');
    });
  });

  describe('configurationDone', () => {
    it('stays stopped and reports entry with stopOnEntry', async () => {
      const bridge = await stoppedOnEntry();

      expect(session.state).to.equal('stopped');
      expect(bridge.resume.called).to.equal(false);
      expect(lastKinds(2)).to.deep.equal([
        'response:configurationDone',
        'event:stopped',
      ]);
      expect(sink.events('stopped')[0].body).to.deep.equal({
        reason: 'entry',
        threadId: 1,
        allThreadsStopped: true,
      });
    });

    it('resumes the debuggee otherwise', async () => {
      const bridge = await running();

      expect(session.state).to.equal('running');
      expect(bridge.resume.calledOnceWithExactly('continue')).to.equal(true);
      expect(sink.events('stopped')).to.have.length(0);
    });
  });

  describe('threads', () => {
    it('lists no threads before a debuggee exists', async () => {
      await send('initialize');
      const response = await send('threads');
      expect(response.body).to.deep.equal({ threads: [] });
    });

    it('lists the single Perl thread once launched', async () => {
      await launch();
      const response = await send('threads');
      expect(response.body).to.deep.equal({ threads: [{ id: 1, name: 'main' }] });
    });
  });

  describe('stops', () => {
    it('reports a breakpoint hit with its id', async () => {
      await send('initialize');
      await send('setBreakpoints', { source: SOURCE, breakpoints: [{ line: 10 }] });
      await send('launch', { program: APP, cwd: '/work' });
      await send('configurationDone');

      factory.bridge.stopAt(APP, 10);
      await session.idle();

      expect(session.state).to.equal('stopped');
      expect(sink.events('stopped')[0].body).to.deep.equal({
        reason: 'breakpoint',
        threadId: 1,
        allThreadsStopped: true,
        hitBreakpointIds: [1],
      });
    });

    it('refuses a log point whose message spans lines', async () => {
      await send('initialize');
      const response = await send('setBreakpoints', {
        source: SOURCE,
        breakpoints: [{ line: 10, logMessage: 'v={$x\nq}' }],
      });
      await send('launch', { program: APP, cwd: '/work' });

      expect(response.body.breakpoints).to.deep.equal([
        {
          id: 1,
          verified: false,
          source: SOURCE,
          message: 'Log message must not contain line breaks',
        },
      ]);
      expect(factory.bridge.installBreakpoints.firstCall.args).to.deep.equal([
        APP,
        [],
      ]);
    });

    it('resumes silently until the hit condition is met', async () => {
      await send('initialize');
      await send('setBreakpoints', {
        source: SOURCE,
        breakpoints: [{ line: 10, hitCondition: '2' }],
      });
      await send('launch', { program: APP, cwd: '/work' });
      await send('configurationDone');
      const bridge = factory.bridge;

      bridge.stopAt(APP, 10);
      await session.idle();
      expect(sink.events('stopped')).to.have.length(0);
      expect(bridge.resume.callCount).to.equal(2);
      expect(session.state).to.equal('running');

      bridge.stopAt(APP, 10);
      await session.idle();
      expect(sink.events('stopped')[0].body.hitBreakpointIds).to.deep.equal([1]);
    });

    it('prints log points and keeps running', async () => {
      await send('initialize');
      await send('setBreakpoints', {
        source: SOURCE,
        breakpoints: [{ line: 10, logMessage: 'greeting {$name}!' }],
      });
      await send('launch', { program: APP, cwd: '/work' });
      await send('configurationDone');
      const bridge = factory.bridge;
      bridge.evaluate.resolves('world');

      bridge.stopAt(APP, 10);
      await session.idle();

      expect(bridge.evaluate.calledOnceWithExactly('$name')).to.equal(true);
      expect(sink.events('output')[0].body).to.deep.equal({
        category: 'console',
        output: 'greeting world!\n',
        source: SOURCE,
        line: 10,
      });
      expect(sink.events('stopped')).to.have.length(0);
      expect(bridge.resume.lastCall.args).to.deep.equal(['continue']);
      expect(session.state).to.equal('running');
    });

    it('reports pause after an interrupt', async () => {
      const bridge = await running();

      const response = await send('pause', { threadId: 1 });
      bridge.stopAt(APP, 5, 'main::greet');
      await session.idle();

      expect(response.success).to.equal(true);
      expect(bridge.pause.calledOnce).to.equal(true);
      expect(sink.events('stopped')[0].body.reason).to.equal('pause');
    });

    it('reports an uncaught die as an exception', async () => {
      const bridge = await running();

      bridge.stop({
        location: { file: APP, line: 6, subroutine: 'main::greet' },
        exceptionText: 'Died at /work/app.pl line 6.',
      });
      await session.idle();

      expect(sink.events('stopped')[0].body).to.deep.equal({
        reason: 'exception',
        threadId: 1,
        allThreadsStopped: true,
        description: 'Died at /work/app.pl line 6.',
        text: 'Died at /work/app.pl line 6.',
      });
    });

    it('ignores stop notifications unless running', async () => {
      const bridge = await stoppedOnEntry();
      const before = sink.messages.length;

      bridge.stopAt(APP, 2);
      await session.idle();

      expect(sink.messages).to.have.length(before);
    });
  });

  describe('execution control', () => {
    it('responds to continue before emitting continued', async () => {
      const bridge = await stoppedOnEntry();

      const response = await send('continue', { threadId: 1 });

      expect(response.body).to.deep.equal({ allThreadsContinued: true });
      expect(lastKinds(2)).to.deep.equal(['response:continue', 'event:continued']);
      expect(sink.events('continued')[0].body).to.deep.equal({
        threadId: 1,
        allThreadsContinued: true,
      });
      expect(bridge.resume.calledOnceWithExactly('continue')).to.equal(true);
      expect(session.state).to.equal('running');
    });

    it('steps without a continued event and reports the step stop', async () => {
      const bridge = await stoppedOnEntry();

      await send('next', { threadId: 1 });
      expect(sink.events('continued')).to.have.length(0);
      expect(bridge.resume.calledOnceWithExactly('next')).to.equal(true);

      bridge.stopAt(APP, 2);
      await session.idle();
      expect(sink.events('stopped')[1].body.reason).to.equal('step');
    });

    it('rejects an unknown thread', async () => {
      await stoppedOnEntry();

      const response = await send('stepIn', { threadId: 7 });

      expect(response.success).to.equal(false);
      expect(response.message).to.equal('Unknown thread 7');
      expect(session.state).to.equal('stopped');
    });
  });

  describe('inspection', () => {
    it('returns frames from the debugger', async () => {
      await stoppedOnEntry();

      const response = await send('stackTrace', { threadId: 1 });

      expect(response.body).to.deep.equal({
        stackFrames: [
          {
            id: 1,
            name: 'main::greet',
            source: { name: 'app.pl', path: APP },
            line: 4,
            column: 1,
          },
          {
            id: 2,
            name: 'main',
            source: { name: 'app.pl', path: APP },
            line: 9,
            column: 1,
          },
        ],
        totalFrames: 2,
      });
    });

    it('honours startFrame and levels', async () => {
      await stoppedOnEntry();

      const response = await send('stackTrace', {
        threadId: 1,
        startFrame: 1,
        levels: 1,
      });

      expect(response.body.stackFrames).to.have.length(1);
      expect(response.body.stackFrames[0].name).to.equal('main');
      expect(response.body.totalFrames).to.equal(2);
    });

    it('falls back to the stop location when the backtrace times out', async () => {
      const bridge = await stoppedOnEntry();
      bridge.stackTrace.rejects(
        new BridgeErrorBuilder("Timed out after 5000ms waiting for 'T'")
          .stage('query')
          .build(),
      );

      const response = await send('stackTrace', { threadId: 1 });

      expect(lastKinds(2)).to.deep.equal(['event:output', 'response:stackTrace']);
      expect(sink.events('output')[0].body).to.deep.equal({
        category: 'console',
        output:
          "The Perl debugger did not return a backtrace: Timed out after 5000ms waiting for 'T'\n",
      });
      expect(response.body).to.deep.equal({
        stackFrames: [
          {
            id: 1,
            name: 'main',
            source: { name: 'app.pl', path: APP },
            line: 1,
            column: 1,
          },
        ],
        totalFrames: 1,
      });
    });

    it('lists the three scopes of a frame', async () => {
      await stoppedOnEntry();
      await send('stackTrace', { threadId: 1 });

      const response = await send('scopes', { frameId: 1 });

      expect(response.body).to.deep.equal({
        scopes: [
          {
            name: 'Locals',
            variablesReference: 3,
            expensive: false,
            presentationHint: 'locals',
          },
          { name: 'Package', variablesReference: 4, expensive: true },
          { name: 'Globals', variablesReference: 5, expensive: true },
        ],
      });
    });

    it('expands one level of children without asking the debugger again', async () => {
      const bridge = await stoppedOnEntry();
      bridge.variables.resolves([
        { name: '$x', value: '1' },
        {
          name: '@list',
          value: 'ARRAY(2)',
          children: [
            { name: '[0]', value: '1' },
            { name: '[1]', value: '2' },
          ],
        },
      ]);
      await send('stackTrace', { threadId: 1 });
      await send('scopes', { frameId: 1 });

      const locals = await send('variables', { variablesReference: 3 });
      const children = await send('variables', { variablesReference: 6 });

      expect(bridge.variables.calledOnceWithExactly('locals', 0)).to.equal(true);
      expect(locals.body).to.deep.equal({
        variables: [
          { name: '$x', value: '1', variablesReference: 0 },
          { name: '@list', value: 'ARRAY(2)', variablesReference: 6 },
        ],
      });
      expect(children.body).to.deep.equal({
        variables: [
          { name: '[0]', value: '1', variablesReference: 0 },
          { name: '[1]', value: '2', variablesReference: 0 },
        ],
      });
    });

    it('rejects frame ids and references from an earlier stop', async () => {
      const bridge = await stoppedOnEntry();
      await send('stackTrace', { threadId: 1 });
      await send('scopes', { frameId: 1 });
      await send('continue', { threadId: 1 });
      bridge.stopAt(APP, 10);
      await session.idle();

      const scopes = await send('scopes', { frameId: 1 });
      const variables = await send('variables', { variablesReference: 3 });

      expect(scopes.success).to.equal(false);
      expect(scopes.message).to.equal('Unknown or stale frame id 1');
      expect(scopes.body.error.id).to.equal(1007);
      expect(variables.success).to.equal(false);
      expect(variables.message).to.equal('Unknown or stale variables reference 3');
    });

    it('evaluates single-line expressions only', async () => {
      const bridge = await stoppedOnEntry();

      const ok = await send('evaluate', { expression: '$x + 1' });
      const rejected = await send('evaluate', { expression: '1;\n2' });

      expect(ok.body).to.deep.equal({ result: '42', variablesReference: 0 });
      expect(bridge.evaluate.calledOnceWithExactly('$x + 1')).to.equal(true);
      expect(rejected.success).to.equal(false);
      expect(rejected.message).to.equal('Expressions must fit on a single line');
    });

    it('assigns a variable through the debugger', async () => {
      const bridge = await stoppedOnEntry();
      await send('stackTrace', { threadId: 1 });
      await send('scopes', { frameId: 1 });

      const response = await send('setVariable', {
        variablesReference: 3,
        name: '$x',
        value: ' 5 ',
      });

      expect(response.body).to.deep.equal({ value: '5', variablesReference: 0 });
      expect(bridge.setVariable.calledOnceWithExactly('$x', '5')).to.equal(true);
    });

    it('refuses assignments the debugger cannot take on one line', async () => {
      const bridge = await stoppedOnEntry();
      await send('stackTrace', { threadId: 1 });
      await send('scopes', { frameId: 1 });

      const element = await send('setVariable', {
        variablesReference: 3,
        name: '[0]',
        value: '1',
      });
      const multiline = await send('setVariable', {
        variablesReference: 3,
        name: '$x',
        value: '1;\nsystem(1)',
      });
      const stale = await send('setVariable', {
        variablesReference: 99,
        name: '$x',
        value: '1',
      });

      expect(element.message).to.equal(
        "Cannot assign to '[0]': expected a variable name with its sigil",
      );
      expect(multiline.message).to.equal(
        'Variable names and values must fit on a single line',
      );
      expect(stale.message).to.equal('Unknown or stale variables reference 99');
      expect(bridge.setVariable.called).to.equal(false);
    });

    it('only assigns locals of the innermost frame', async () => {
      const bridge = await stoppedOnEntry();
      await send('stackTrace', { threadId: 1 });
      await send('scopes', { frameId: 2 });

      const response = await send('setVariable', {
        variablesReference: 3,
        name: '$x',
        value: '1',
      });

      expect(response.success).to.equal(false);
      expect(response.message).to.equal(
        'Only variables of the innermost frame can be changed',
      );
      expect(bridge.setVariable.called).to.equal(false);
    });

    it('refuses setVariable while the debuggee runs', async () => {
      await running();

      const response = await send('setVariable', {
        variablesReference: 3,
        name: '$x',
        value: '1',
      });

      expect(response.success).to.equal(false);
      expect(response.message).to.equal(
        "'setVariable' is not allowed while the session is running",
      );
    });

    it('lists the variables on the executable lines of a range', async () => {
      await stoppedOnEntry();

      const response = await send('inlineValues', {
        source: SOURCE,
        startLine: 4,
        endLine: 13,
      });

      expect(response.body).to.deep.equal({
        inlineValues: [
          { type: 'variable', line: 5, column: 9, variableName: '$name' },
          { type: 'variable', line: 5, column: 18, variableName: '@_' },
          { type: 'variable', line: 6, column: 19, variableName: '$name' },
        ],
      });
    });

    it('fails a timed-out evaluation and reports the unresponsive debugger', async () => {
      const bridge = await stoppedOnEntry();
      bridge.evaluate.rejects(
        new BridgeErrorBuilder("Timed out after 5000ms waiting for 'p $x'")
          .stage('query')
          .build(),
      );

      const response = await send('evaluate', { expression: '$x' });

      expect(response.success).to.equal(false);
      expect(response.body.error.id).to.equal(1006);
      expect(lastKinds(2)).to.deep.equal(['response:evaluate', 'event:output']);
      expect(sink.events('output')[0].body.output).to.equal(
        "The Perl debugger did not answer 'evaluate': Timed out after 5000ms waiting for 'p $x'\n",
      );
      expect(session.state).to.equal('stopped');
    });
  });

  describe('function and exception breakpoints', () => {
    it('installs valid subroutine breakpoints while stopped', async () => {
      const bridge = await stoppedOnEntry();

      const response = await send('setFunctionBreakpoints', {
        breakpoints: [{ name: 'greet' }, { name: 'bad name' }],
      });

      expect(bridge.installFunctionBreakpoints.firstCall.args).to.deep.equal([
        [{ name: 'main::greet', condition: undefined }],
      ]);
      expect(response.body).to.deep.equal({
        breakpoints: [
          { id: 1, verified: true, source: { path: APP }, line: 10 },
          {
            id: 2,
            verified: false,
            message: "Invalid subroutine name 'bad name'",
          },
        ],
      });
    });

    it('accepts known exception filters and passes them on', async () => {
      const bridge = await launch();

      const response = await send('setExceptionBreakpoints', {
        filters: ['die', 'bogus'],
      });

      expect(response.body).to.deep.equal({
        breakpoints: [
          { verified: true },
          { verified: false, message: "Unknown exception filter 'bogus'" },
        ],
      });
      expect(bridge.setExceptionFilters.calledOnceWithExactly(['die'])).to.equal(true);
    });
  });

  describe('termination', () => {
    it('emits exited then terminated when the debuggee ends', async () => {
      const bridge = await running();

      bridge.exit(0);
      await session.idle();

      expect(lastKinds(2)).to.deep.equal(['event:exited', 'event:terminated']);
      expect(sink.events('exited')[0].body).to.deep.equal({ exitCode: 0 });
      expect(session.state).to.equal('terminated');
    });

    it('terminates on a fatal debugger failure', async () => {
      const bridge = await running();

      bridge.fail(
        new BridgeErrorBuilder('Lost the debugger connection')
          .stage('protocol')
          .build(),
      );
      await session.idle();

      expect(lastKinds(2)).to.deep.equal(['event:output', 'event:terminated']);
      expect(sink.events('output')[0].body.output).to.equal(
        'Perl debugger failed: Lost the debugger connection\n',
      );
    });

    it('forwards program output', async () => {
      const bridge = await running();

      bridge.print('stdout', 'Hello, world\n');
      await session.idle();

      expect(sink.events('output')[0].body).to.deep.equal({
        category: 'stdout',
        output: 'Hello, world\n',
      });
    });

    it('disconnects past a debugger query that never answers', async () => {
      const bridge = await stoppedOnEntry();
      let rejectEvaluate: (error: Error) => void = () => {};
      bridge.evaluate.returns(
        new Promise<string>((_resolve, reject) => {
          rejectEvaluate = reject;
        }),
      );
      bridge.kill.callsFake(() =>
        rejectEvaluate(
          new BridgeErrorBuilder('The debugger was stopped').stage('exit').build(),
        ),
      );
      const ended = sinon.spy();
      session.on('ended', ended);

      const evaluate = request('evaluate', { expression: '$x' });
      session.handleRequest(evaluate);
      await new Promise((resolve) => setImmediate(resolve));
      expect(bridge.evaluate.calledOnce).to.equal(true);
      const disconnect = request('disconnect');
      session.handleRequest(disconnect);
      await session.idle();

      expect(lastKinds(3)).to.deep.equal([
        'event:terminated',
        'response:evaluate',
        'response:disconnect',
      ]);
      expect(sink.responseTo(evaluate.seq).success).to.equal(false);
      expect(sink.responseTo(disconnect.seq).success).to.equal(true);
      expect(sink.events('terminated')).to.have.length(1);
      expect(ended.calledOnceWithExactly({ sessionId: 'test-session' })).to.equal(true);
      expect(session.state).to.equal('terminated');
    });

    it('ignores the debuggee after disconnecting', async () => {
      const bridge = await running();
      await send('disconnect');
      const before = sink.messages.length;

      bridge.exit(0);
      await session.idle();

      expect(bridge.kill.calledOnce).to.equal(true);
      expect(sink.messages).to.have.length(before);
    });
  });

  it('numbers responses and events from one counter', async () => {
    await stoppedOnEntry();
    await send('continue', { threadId: 1 });

    const seqs = sink.messages.map((message) => message.seq);
    expect(seqs).to.deep.equal(seqs.map((_seq, index) => index + 1));
  });
});
