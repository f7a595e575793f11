import { readFile } from 'fs/promises';
import * as path from 'path';
import { SourceBuffer, createSourceBuffer } from './sourceBuffer';
import { LoggerInterface, componentLogger, silentLogger } from '../logging';

export class SourceReadError extends Error {
  constructor(
    public readonly fileId: string,
    public readonly cause?: unknown,
  ) {
    super(
      `Could not read source file ${fileId}: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = 'SourceReadError';
    Object.setPrototypeOf(this, SourceReadError.prototype);
  }
}

export type ReadFileFunction = (filePath: string) => Promise<Buffer>;

/** Normalises a client-supplied path into the id used to key sources. */
export function toFileId(filePath: string): string {
  return path.resolve(filePath);
}

/**
 * Reads source files into buffers. Concurrent loads of the same file share
 * one read.
 */
export class SourceLoader {
  private readonly inFlight = new Map<string, Promise<SourceBuffer>>();
  private readonly logger: LoggerInterface;

  constructor(
    logger: LoggerInterface = silentLogger,
    private readonly read: ReadFileFunction = (filePath) => readFile(filePath),
  ) {
    this.logger = componentLogger(logger, 'SourceLoader');
  }

  load(filePath: string): Promise<SourceBuffer> {
    const fileId = toFileId(filePath);
    const pending = this.inFlight.get(fileId);
    if (pending) {
      return pending;
    }
    const loading = this.readBuffer(fileId).finally(() => {
      this.inFlight.delete(fileId);
    });
    this.inFlight.set(fileId, loading);
    return loading;
  }

  private async readBuffer(fileId: string): Promise<SourceBuffer> {
    let content: Buffer;
    try {
      content = await this.read(fileId);
    } catch (error) {
      this.logger.warn({ fileId, err: error }, 'Failed to read source file');
      throw new SourceReadError(fileId, error);
    }
    this.logger.trace({ fileId, bytes: content.length }, 'Read source file');
    return createSourceBuffer(fileId, content);
  }
}
