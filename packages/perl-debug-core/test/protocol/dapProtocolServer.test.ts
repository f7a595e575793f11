import { expect } from 'chai';
import * as sinon from 'sinon';
import { PassThrough } from 'stream';
import { DebugProtocol } from '@vscode/debugprotocol';
import {
  DAPProtocolServer,
  InvalidRequest,
} from '../../src/protocol/dapProtocolServer';
import { createMockLogger } from '../mocks/mockLogger';

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function frame(payload: unknown): string {
  const body = JSON.stringify(payload);
  return `Content-Length: ${Buffer.byteLength(body, 'utf8')}\r\n\r\n${body}`;
}

describe('DAPProtocolServer', () => {
  let input: PassThrough;
  let output: PassThrough;
  let server: DAPProtocolServer;
  let requests: DebugProtocol.Request[];
  let invalid: InvalidRequest[];

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    server = new DAPProtocolServer(createMockLogger());
    requests = [];
    invalid = [];
    server.on('request', (request) => requests.push(request));
    server.on('invalidRequest', (entry) => invalid.push(entry));
    server.connect(input, output);
  });

  afterEach(() => {
    sinon.restore();
  });

  it('reads a framed request', async () => {
    input.write(
      frame({
        seq: 1,
        type: 'request',
        command: 'initialize',
        arguments: { adapterID: 'perl' },
      }),
    );
    await tick();

    expect(requests).to.deep.equal([
      {
        type: 'request',
        seq: 1,
        command: 'initialize',
        arguments: { adapterID: 'perl' },
      },
    ]);
  });

  it('reassembles a request split across chunks', async () => {
    const data = frame({ seq: 2, type: 'request', command: 'threads' });

    input.write(data.slice(0, 10));
    input.write(data.slice(10, 30));
    await tick();
    expect(requests).to.have.length(0);
    input.write(data.slice(30));
    await tick();

    expect(requests.map((r) => r.command)).to.deep.equal(['threads']);
  });

  it('reads several requests from one chunk', async () => {
    input.write(
      frame({ seq: 1, type: 'request', command: 'threads' }) +
        frame({
          seq: 2,
          type: 'request',
          command: 'pause',
          arguments: { threadId: 1 },
        }),
    );
    await tick();

    expect(requests.map((r) => r.seq)).to.deep.equal([1, 2]);
  });

  it('counts the length in bytes, not characters', async () => {
    input.write(
      frame({
        seq: 3,
        type: 'request',
        command: 'evaluate',
        arguments: { expression: '"héllo"' },
      }),
    );
    await tick();

    expect(requests[0].arguments).to.deep.equal({ expression: '"héllo"' });
  });

  it('skips a frame with a bad body and keeps reading', async () => {
    input.write('Content-Length: 5\r\n\r\n{oops');
    input.write(frame({ seq: 4, type: 'request', command: 'threads' }));
    await tick();

    expect(requests.map((r) => r.seq)).to.deep.equal([4]);
    expect(server.isConnected()).to.equal(true);
  });

  it('reports requests without a command or sequence number', async () => {
    input.write(frame({ seq: 5, type: 'request' }));
    input.write(frame({ type: 'request', command: 'launch' }));
    await tick();

    expect(invalid).to.deep.equal([
      { requestSeq: 5, message: 'Request is missing a command' },
      { command: 'launch', message: 'Request is missing a sequence number' },
    ]);
    expect(requests).to.have.length(0);
  });

  it('ignores messages that are not requests', async () => {
    input.write(frame({ seq: 6, type: 'event', event: 'stopped' }));
    await tick();

    expect(requests).to.have.length(0);
    expect(invalid).to.have.length(0);
  });

  it('disconnects on an oversized Content-Length', async () => {
    const disconnected = sinon.spy();
    server.on('disconnected', disconnected);

    input.write(
      `Content-Length: ${DAPProtocolServer.MAX_CONTENT_LENGTH + 1}\r\n\r\n`,
    );
    await tick();

    expect(
      disconnected.calledOnceWithExactly('Content-Length limit exceeded'),
    ).to.equal(true);
    expect(server.isConnected()).to.equal(false);
  });

  it('writes framed messages', async () => {
    const message: DebugProtocol.Event = {
      seq: 1,
      type: 'event',
      event: 'initialized',
    };

    server.send(message);
    await tick();

    const body = JSON.stringify(message);
    expect(String(output.read())).to.equal(
      `Content-Length: ${body.length}\r\n\r\n${body}`,
    );
  });

  it('drops outbound messages once the client is gone', async () => {
    const disconnected = sinon.spy();
    server.on('disconnected', disconnected);

    input.end();
    await tick();

    expect(
      disconnected.calledOnceWithExactly('Client closed the input stream'),
    ).to.equal(true);
    const terminated: DebugProtocol.Event = {
      seq: 1,
      type: 'event',
      event: 'terminated',
    };
    server.send(terminated);
    await tick();
    expect(output.read()).to.equal(null);
  });
});
