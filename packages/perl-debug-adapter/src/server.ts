/* eslint-disable @typescript-eslint/no-unsafe-declaration-merging */
import { EventEmitter } from 'events';
import * as net from 'net';
import * as stream from 'stream';
import {
  AdapterSettings,
  BridgeFactory,
  DAPProtocolServer,
  DebugSession,
  InMemorySourceIndexCache,
  LoggerInterface,
  PerlBridgeFactory,
  SourceIndexCache,
  SourceLoader,
  componentLogger,
} from 'perl-debug-core';

export interface AdapterHostOptions {
  settings: AdapterSettings;
  logger: LoggerInterface;
  /** Replaces the `perl -d` bridge; tests pass a fake. */
  bridgeFactory?: BridgeFactory;
}

export interface AdapterHostEvents {
  sessionStarted: (sessionId: string) => void;
  sessionClosed: (sessionId: string, reason: string) => void;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export declare interface AdapterHost {
  on<U extends keyof AdapterHostEvents>(
    event: U,
    listener: AdapterHostEvents[U],
  ): this;
  once<U extends keyof AdapterHostEvents>(
    event: U,
    listener: AdapterHostEvents[U],
  ): this;
  emit<U extends keyof AdapterHostEvents>(
    event: U,
    ...args: Parameters<AdapterHostEvents[U]>
  ): boolean;
}

interface HostedSession {
  session: DebugSession;
  transport: DAPProtocolServer;
}

/**
 * Serves debug sessions: a single one over a stream pair (stdio), or one per
 * connection on a TCP port. All sessions share one source cache.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class AdapterHost extends EventEmitter {
  private readonly logger: LoggerInterface;
  private readonly settings: AdapterSettings;
  private readonly bridgeFactory: BridgeFactory;
  private readonly sourceCache: SourceIndexCache;
  private readonly sourceLoader: SourceLoader;
  private readonly sessions = new Map<string, HostedSession>();
  private tcpServer: net.Server | undefined;

  constructor(options: AdapterHostOptions) {
    super();
    this.logger = componentLogger(options.logger, 'AdapterHost');
    this.settings = options.settings;
    this.bridgeFactory = options.bridgeFactory ?? new PerlBridgeFactory();
    this.sourceCache = new InMemorySourceIndexCache({
      maxEntries: options.settings.cacheMaxEntries,
    });
    this.sourceLoader = new SourceLoader(options.logger);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /** Runs one session over the given streams. */
  serve(readable: stream.Readable, writable: stream.Writable): DebugSession {
    const transport = new DAPProtocolServer(this.logger);
    const session = new DebugSession({
      sink: transport,
      bridgeFactory: this.bridgeFactory,
      sourceCache: this.sourceCache,
      sourceLoader: this.sourceLoader,
      settings: this.settings,
      logger: this.logger,
    });
    const { sessionId } = session;

    transport.on('request', (request) => session.handleRequest(request));
    transport.on('invalidRequest', (invalid) =>
      session.handleInvalidRequest(invalid),
    );
    transport.once('disconnected', (reason) => {
      session.dispose(reason);
      this.sessions.delete(sessionId);
      this.logger.info({ sessionId, reason }, 'Session closed');
      this.emit('sessionClosed', sessionId, reason);
    });
    session.once('ended', () => transport.dispose());

    this.sessions.set(sessionId, { session, transport });
    transport.connect(readable, writable);
    this.logger.info({ sessionId }, 'Session started');
    this.emit('sessionStarted', sessionId);
    return session;
  }

  /** Accepts connections on `host:port`; port 0 picks a free one. */
  listen(port: number, host: string): Promise<net.AddressInfo> {
    if (this.tcpServer) {
      return Promise.reject(new Error('The adapter is already listening'));
    }
    const server = net.createServer((socket) => {
      this.logger.info(
        { remoteAddress: socket.remoteAddress, remotePort: socket.remotePort },
        'Client connected',
      );
      this.serve(socket, socket);
    });
    this.tcpServer = server;

    return new Promise((resolve, reject) => {
      server.once('error', (error) => {
        this.tcpServer = undefined;
        reject(error);
      });
      server.listen(port, host, () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error(`Unexpected listen address: ${String(address)}`));
          return;
        }
        this.logger.info(
          { host: address.address, port: address.port },
          'Listening for debug clients',
        );
        resolve(address);
      });
    });
  }

  /** Ends every session and stops accepting connections. */
  async close(reason: string): Promise<void> {
    this.logger.info(`Shutting down: ${reason}`);
    for (const { transport } of [...this.sessions.values()]) {
      transport.dispose();
    }
    const server = this.tcpServer;
    this.tcpServer = undefined;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
