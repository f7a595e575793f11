import { createHash } from 'crypto';

/**
 * One immutable snapshot of a source file. An edit produces a new buffer with
 * a new fingerprint; buffers are never mutated.
 */
export interface SourceBuffer {
  /** Normalised absolute path of the file. */
  readonly fileId: string;
  /** Decoded UTF-8 content. */
  readonly text: string;
  /** SHA-256 hex digest of the raw bytes. */
  readonly fingerprint: string;
}

export function fingerprintOf(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

export function createSourceBuffer(
  fileId: string,
  content: string | Buffer,
): SourceBuffer {
  const text = typeof content === 'string' ? content : content.toString('utf8');
  return Object.freeze({
    fileId,
    text,
    fingerprint: fingerprintOf(content),
  });
}
