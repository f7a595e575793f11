/* eslint-disable @typescript-eslint/no-unsafe-declaration-merging */
import { EventEmitter } from 'events';
import * as stream from 'stream';
import { DebugProtocol } from '@vscode/debugprotocol';
import { LoggerInterface, componentLogger } from '../logging';
import { isRecord } from './requestArguments';

const TWO_CRLF = '\r\n\r\n';

export interface InvalidRequest {
  /** `seq` of the offending message, when it carried one. */
  requestSeq?: number;
  command?: string;
  message: string;
}

export interface DAPProtocolServerEvents {
  request: (request: DebugProtocol.Request) => void;
  /** A well-framed message that is not a usable request. */
  invalidRequest: (invalid: InvalidRequest) => void;
  disconnected: (reason: string) => void;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export declare interface DAPProtocolServer {
  on<U extends keyof DAPProtocolServerEvents>(
    event: U,
    listener: DAPProtocolServerEvents[U],
  ): this;
  once<U extends keyof DAPProtocolServerEvents>(
    event: U,
    listener: DAPProtocolServerEvents[U],
  ): this;
  emit<U extends keyof DAPProtocolServerEvents>(
    event: U,
    ...args: Parameters<DAPProtocolServerEvents[U]>
  ): boolean;
}

/** Anything that can carry outbound protocol messages. */
export interface MessageSink {
  send(message: DebugProtocol.ProtocolMessage): void;
}

/**
 * Adapter side of a DAP connection: reads `Content-Length` framed requests
 * from the client and writes responses and events back. Sequence numbers of
 * outbound messages are assigned by the caller.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class DAPProtocolServer extends EventEmitter implements MessageSink {
  public static readonly MAX_CONTENT_LENGTH = 50 * 1024 * 1024; // 50 MB
  public static readonly MAX_BUFFER_SIZE = 60 * 1024 * 1024; // 60 MB
  private static readonly MAX_CONSECUTIVE_PARSE_FAILURES = 10;

  private connected = false;
  private buffer: Buffer = Buffer.alloc(0);
  private readableStream: stream.Readable | null = null;
  private writableStream: stream.Writable | null = null;
  private consecutiveParseFailures = 0;
  private readonly logger: LoggerInterface;

  constructor(logger: LoggerInterface) {
    super();
    this.logger = componentLogger(logger, 'DAPProtocolServer');
  }

  public connect(readable: stream.Readable, writable: stream.Writable): void {
    if (this.connected) {
      this.logger.warn('Already connected. Ignoring connect call.');
      return;
    }
    this.readableStream = readable;
    this.writableStream = writable;

    readable.on('data', (data: Buffer | string) => {
      this.handleData(typeof data === 'string' ? Buffer.from(data) : data);
    });
    readable.on('end', () => {
      this.handleDisconnect('Client closed the input stream');
    });
    readable.on('close', () => {
      this.handleDisconnect('Readable stream closed');
    });
    readable.on('error', (error: Error) => {
      this.logger.error({ err: error }, 'Readable stream error.');
      this.handleDisconnect(`Readable stream error: ${error.message}`);
    });
    writable.on('error', (error: Error) => {
      this.logger.error({ err: error }, 'Writable stream error.');
      this.handleDisconnect(`Writable stream error: ${error.message}`);
    });

    this.connected = true;
    this.logger.debug('Transport connected.');
  }

  public isConnected(): boolean {
    return this.connected;
  }

  public send(message: DebugProtocol.ProtocolMessage): void {
    const writable = this.writableStream;
    if (!this.connected || !writable || writable.destroyed) {
      this.logger.warn(
        { dapMessage: message },
        `Dropping outbound ${message.type}: transport is not connected.`,
      );
      return;
    }
    const payload = Buffer.from(JSON.stringify(message), 'utf8');
    const header = `Content-Length: ${payload.length}${TWO_CRLF}`;
    this.logger.trace({ dapMessage: message }, 'Sending DAP message');
    try {
      writable.write(Buffer.concat([Buffer.from(header, 'ascii'), payload]));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error({ err: error }, `Error writing to stream: ${reason}`);
      this.handleDisconnect(`Error writing to stream: ${reason}`);
    }
  }

  private handleData(data: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, data]);
    if (this.buffer.length > DAPProtocolServer.MAX_BUFFER_SIZE) {
      this.logger.error(
        `Buffer size ${this.buffer.length} exceeds maximum ${DAPProtocolServer.MAX_BUFFER_SIZE}. Disconnecting.`,
      );
      this.handleDisconnect('Buffer size limit exceeded');
      return;
    }
    while (this.connected && this.processBufferOnce()) {
      // keep draining complete frames
    }
  }

  /**
   * Parses at most one frame off the buffer.
   * @returns false when more data is needed or the connection was dropped.
   */
  private processBufferOnce(): boolean {
    const headerIndex = this.buffer.indexOf(TWO_CRLF);
    if (headerIndex === -1) {
      return false;
    }

    const headers = this.parseHeaders(
      this.buffer.toString('ascii', 0, headerIndex),
    );
    const contentLength = headers['content-length'];
    const messageLength =
      contentLength !== undefined && /^\d+$/.test(contentLength)
        ? parseInt(contentLength, 10)
        : NaN;

    if (isNaN(messageLength)) {
      this.logger.error(
        `Missing or invalid Content-Length header: ${contentLength ?? '<none>'}`,
      );
      this.buffer = this.buffer.subarray(headerIndex + TWO_CRLF.length);
      return this.recordParseFailure();
    }

    if (messageLength > DAPProtocolServer.MAX_CONTENT_LENGTH) {
      this.logger.error(
        `Content-Length ${messageLength} exceeds maximum ${DAPProtocolServer.MAX_CONTENT_LENGTH}. Disconnecting.`,
      );
      this.handleDisconnect('Content-Length limit exceeded');
      return false;
    }

    const messageStart = headerIndex + TWO_CRLF.length;
    if (this.buffer.length < messageStart + messageLength) {
      return false;
    }
    const body = this.buffer.toString(
      'utf8',
      messageStart,
      messageStart + messageLength,
    );
    this.buffer = this.buffer.subarray(messageStart + messageLength);

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      this.logger.error(
        { err: error, rawMessage: body },
        'Error parsing DAP message JSON.',
      );
      return this.recordParseFailure();
    }
    this.consecutiveParseFailures = 0;
    this.handleMessage(parsed);
    return true;
  }

  private recordParseFailure(): boolean {
    this.consecutiveParseFailures++;
    if (
      this.consecutiveParseFailures >
      DAPProtocolServer.MAX_CONSECUTIVE_PARSE_FAILURES
    ) {
      this.logger.error('Too many consecutive parse failures. Disconnecting.');
      this.handleDisconnect('Too many consecutive parse failures');
      return false;
    }
    return true;
  }

  private parseHeaders(headerString: string): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const line of headerString.split('\r\n')) {
      const separator = line.indexOf(':');
      if (separator > 0) {
        headers[line.slice(0, separator).trim().toLowerCase()] = line
          .slice(separator + 1)
          .trim();
      }
    }
    return headers;
  }

  private handleMessage(message: unknown): void {
    if (!isRecord(message)) {
      this.logger.warn({ dapMessage: message }, 'Ignoring non-object message.');
      return;
    }
    const requestSeq =
      typeof message.seq === 'number' ? message.seq : undefined;
    if (message.type !== 'request') {
      this.logger.warn(
        { dapMessage: message },
        `Ignoring DAP message of type ${String(message.type)}.`,
      );
      return;
    }
    if (typeof message.command !== 'string' || message.command.length === 0) {
      this.emit('invalidRequest', {
        requestSeq,
        message: 'Request is missing a command',
      });
      return;
    }
    if (requestSeq === undefined) {
      this.emit('invalidRequest', {
        command: message.command,
        message: 'Request is missing a sequence number',
      });
      return;
    }
    const request: DebugProtocol.Request = {
      type: 'request',
      seq: requestSeq,
      command: message.command,
      arguments: message.arguments,
    };
    this.logger.debug({ dapRequest: request }, 'Received DAP request');
    this.emit('request', request);
  }

  private handleDisconnect(reason: string): void {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    this.logger.info(`Transport disconnected. Reason: ${reason}`);
    this.readableStream?.removeAllListeners('data');
    this.readableStream = null;
    this.writableStream = null;
    this.buffer = Buffer.alloc(0);
    this.consecutiveParseFailures = 0;
    this.emit('disconnected', reason);
  }

  public dispose(): void {
    const writable = this.writableStream;
    this.handleDisconnect('Server disposed');
    if (writable && writable !== process.stdout && !writable.destroyed) {
      writable.end();
    }
  }
}
