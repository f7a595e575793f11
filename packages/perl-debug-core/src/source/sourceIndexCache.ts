import { LineClassification } from './lineClassification';
import { classifyLines } from './lineClassifier';
import { SourceBuffer } from './sourceBuffer';
import { LoggerInterface, componentLogger, silentLogger } from '../logging';

/**
 * Classifications keyed by file id. An entry is valid only for the
 * fingerprint it was built from.
 */
export interface SourceIndexCache {
  /**
   * Returns the classification for `buffer`, reusing the stored one when the
   * fingerprint matches and rebuilding the whole entry otherwise.
   */
  getOrBuild(buffer: SourceBuffer): LineClassification;
  /** Stored classification for a file, whatever its fingerprint. */
  peek(fileId: string): LineClassification | undefined;
  invalidate(fileId: string): boolean;
  clear(): void;
  readonly size: number;
}

export interface InMemorySourceIndexCacheOptions {
  /** Least recently used files are evicted beyond this many entries. */
  maxEntries?: number;
  classify?: (buffer: SourceBuffer) => LineClassification;
  logger?: LoggerInterface;
}

export class InMemorySourceIndexCache implements SourceIndexCache {
  // Map iteration order doubles as recency order: oldest first.
  private readonly entries = new Map<string, LineClassification>();
  private readonly maxEntries: number;
  private readonly classify: (buffer: SourceBuffer) => LineClassification;
  private readonly logger: LoggerInterface;

  constructor(options: InMemorySourceIndexCacheOptions = {}) {
    const maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
    if (!(maxEntries >= 1)) {
      throw new RangeError(`maxEntries must be at least 1, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
    this.classify = options.classify ?? classifyLines;
    this.logger = componentLogger(
      options.logger ?? silentLogger,
      'SourceIndexCache',
    );
  }

  get size(): number {
    return this.entries.size;
  }

  getOrBuild(buffer: SourceBuffer): LineClassification {
    const cached = this.entries.get(buffer.fileId);
    if (cached && cached.fingerprint === buffer.fingerprint) {
      this.entries.delete(buffer.fileId);
      this.entries.set(buffer.fileId, cached);
      this.logger.trace({ fileId: buffer.fileId }, 'Source index cache hit');
      return cached;
    }

    const started = Date.now();
    const classification = this.classify(buffer);
    this.entries.delete(buffer.fileId);
    this.entries.set(buffer.fileId, classification);
    this.logger.debug(
      {
        fileId: buffer.fileId,
        lines: classification.lineCount,
        replaced: cached !== undefined,
        elapsedMs: Date.now() - started,
      },
      'Classified source file',
    );
    this.evictOverflow();
    return classification;
  }

  peek(fileId: string): LineClassification | undefined {
    return this.entries.get(fileId);
  }

  invalidate(fileId: string): boolean {
    return this.entries.delete(fileId);
  }

  clear(): void {
    this.entries.clear();
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.entries.delete(oldest.value);
      this.logger.debug({ fileId: oldest.value }, 'Evicted source index');
    }
  }
}
