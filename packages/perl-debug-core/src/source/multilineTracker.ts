import { ClassificationDiagnostic } from './lineClassification';

export type HeredocQuoting = 'bare' | 'double' | 'single' | 'backtick';

/** A heredoc declared on an executable line whose body has not ended yet. */
export interface PendingHeredoc {
  readonly terminator: string;
  readonly quoting: HeredocQuoting;
  /** `<<~`: the terminator and body may be indented. */
  readonly indented: boolean;
  readonly declarationLine: number;
}

export interface LiteralLineResult {
  readonly owningLine: number;
  /** The line was the terminator of the head heredoc, which is now closed. */
  readonly terminated: boolean;
}

/**
 * State carried between lines while a buffer is classified: the open POD
 * block, if any, and the FIFO of heredocs whose bodies start on the next
 * line. One tracker per classification pass.
 */
export class MultilineConstructTracker {
  private documentationOpenedAt: number | undefined;
  private readonly heredocs: PendingHeredoc[] = [];
  private head = 0;

  get inDocumentation(): boolean {
    return this.documentationOpenedAt !== undefined;
  }

  get hasPendingLiterals(): boolean {
    return this.head < this.heredocs.length;
  }

  get pendingLiteralCount(): number {
    return this.heredocs.length - this.head;
  }

  enterDocumentation(line: number): void {
    this.documentationOpenedAt = line;
  }

  /**
   * Consumes a line inside a POD block. Returns true when the line closed it.
   */
  consumeDocumentationLine(text: string): boolean {
    if (isPodCut(text)) {
      this.documentationOpenedAt = undefined;
      return true;
    }
    return false;
  }

  enqueueLiteral(heredoc: PendingHeredoc): void {
    this.heredocs.push(heredoc);
  }

  /**
   * Consumes a line belonging to the head heredoc. Must only be called while
   * `hasPendingLiterals`.
   */
  consumeLiteralLine(text: string): LiteralLineResult {
    const current = this.heredocs[this.head];
    const candidate = current.indented ? stripIndent(text) : text;
    const terminated = candidate === current.terminator;
    if (terminated) {
      this.head++;
      if (this.head === this.heredocs.length) {
        this.heredocs.length = 0;
        this.head = 0;
      }
    }
    return { owningLine: current.declarationLine, terminated };
  }

  /** Diagnostics for constructs still open at end of input. */
  pendingDiagnostics(): ClassificationDiagnostic[] {
    const diagnostics: ClassificationDiagnostic[] = [];
    if (this.documentationOpenedAt !== undefined) {
      diagnostics.push({
        line: this.documentationOpenedAt,
        message: 'POD block is not closed by =cut before end of file',
      });
    }
    for (let i = this.head; i < this.heredocs.length; i++) {
      const heredoc = this.heredocs[i];
      diagnostics.push({
        line: heredoc.declarationLine,
        message: `Heredoc terminator '${heredoc.terminator}' not found before end of file`,
      });
    }
    return diagnostics;
  }
}

export function isPodCut(text: string): boolean {
  return text.startsWith('=cut') && !/^=cut\w/.test(text);
}

function stripIndent(text: string): string {
  let i = 0;
  while (i < text.length && (text[i] === ' ' || text[i] === '\t')) i++;
  return i === 0 ? text : text.slice(i);
}
