import { DebugProtocol } from '@vscode/debugprotocol';
import { MessageSink } from '../protocol/dapProtocolServer';
import { LoggerInterface, componentLogger } from '../logging';

/**
 * Outbound side of one session. Responses and events draw their `seq` from a
 * single counter when they are created and reach the sink in that order.
 */
export class EventDispatcher {
  private nextSeq = 1;
  private readonly queue: DebugProtocol.ProtocolMessage[] = [];
  private flushing = false;
  private readonly logger: LoggerInterface;

  constructor(
    private readonly sink: MessageSink,
    logger: LoggerInterface,
  ) {
    this.logger = componentLogger(logger, 'EventDispatcher');
  }

  /** The `seq` the next outbound message will carry. */
  get peekSeq(): number {
    return this.nextSeq;
  }

  response<B>(request: DebugProtocol.Request, body?: B): DebugProtocol.Response {
    const response: DebugProtocol.Response = {
      type: 'response',
      seq: this.nextSeq++,
      request_seq: request.seq,
      command: request.command,
      success: true,
    };
    if (body !== undefined) {
      response.body = body;
    }
    this.enqueue(response);
    return response;
  }

  errorResponse(
    request: Pick<DebugProtocol.Request, 'seq' | 'command'>,
    error: DebugProtocol.Message,
  ): DebugProtocol.ErrorResponse {
    const response: DebugProtocol.ErrorResponse = {
      type: 'response',
      seq: this.nextSeq++,
      request_seq: request.seq,
      command: request.command,
      success: false,
      message: error.format,
      body: { error },
    };
    this.enqueue(response);
    return response;
  }

  event<B>(event: string, body?: B): DebugProtocol.Event {
    const message: DebugProtocol.Event = {
      type: 'event',
      seq: this.nextSeq++,
      event,
    };
    if (body !== undefined) {
      message.body = body;
    }
    this.enqueue(message);
    return message;
  }

  private enqueue(message: DebugProtocol.ProtocolMessage): void {
    this.queue.push(message);
    this.flush();
  }

  /**
   * Writes queued messages to the sink. A send that re-enters the dispatcher
   * appends to the queue and is written by the outer flush.
   */
  flush(): void {
    if (this.flushing) {
      return;
    }
    this.flushing = true;
    try {
      let message = this.queue.shift();
      while (message !== undefined) {
        this.logger.trace(
          { seq: message.seq, type: message.type },
          'Dispatching message',
        );
        this.sink.send(message);
        message = this.queue.shift();
      }
    } finally {
      this.flushing = false;
    }
  }
}
