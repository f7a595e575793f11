/**
 * Compile-time phase blocks. Their header line is a valid stop point no
 * matter when the block actually runs.
 */
export type PhaseBlock = 'BEGIN' | 'END' | 'INIT' | 'CHECK' | 'UNITCHECK';

export interface ExecutableLine {
  readonly kind: 'executable';
  readonly phase?: PhaseBlock;
}

export interface CommentLine {
  readonly kind: 'comment';
}

export interface BlankLine {
  readonly kind: 'blank';
}

/** A line inside a POD block, including its opening and `=cut` lines. */
export interface DocumentationLine {
  readonly kind: 'documentation';
}

/** A heredoc body line or terminator line. */
export interface LiteralBodyLine {
  readonly kind: 'literalBody';
  /** 1-based line of the statement that declared the heredoc. */
  readonly owningLine: number;
}

/** A line at or after `__END__` / `__DATA__`. */
export interface DataLine {
  readonly kind: 'data';
}

export type LineTag =
  | ExecutableLine
  | CommentLine
  | BlankLine
  | DocumentationLine
  | LiteralBodyLine
  | DataLine;

export type LineKind = LineTag['kind'];

export interface ClassificationDiagnostic {
  /** 1-based line on which the unterminated construct was opened. */
  readonly line: number;
  readonly message: string;
}

export const EXECUTABLE: ExecutableLine = Object.freeze({ kind: 'executable' });
export const COMMENT: CommentLine = Object.freeze({ kind: 'comment' });
export const BLANK: BlankLine = Object.freeze({ kind: 'blank' });
export const DOCUMENTATION: DocumentationLine = Object.freeze({
  kind: 'documentation',
});
export const DATA: DataLine = Object.freeze({ kind: 'data' });

const PHASE_TAGS: Record<PhaseBlock, ExecutableLine> = {
  BEGIN: Object.freeze({ kind: 'executable', phase: 'BEGIN' }),
  END: Object.freeze({ kind: 'executable', phase: 'END' }),
  INIT: Object.freeze({ kind: 'executable', phase: 'INIT' }),
  CHECK: Object.freeze({ kind: 'executable', phase: 'CHECK' }),
  UNITCHECK: Object.freeze({ kind: 'executable', phase: 'UNITCHECK' }),
};

export function phaseTag(phase: PhaseBlock): ExecutableLine {
  return PHASE_TAGS[phase];
}

/**
 * Per-line classification of one source buffer. Immutable; lines are
 * addressed 1-based, as editors and the Perl debugger number them.
 */
export class LineClassification {
  private readonly _tags: readonly LineTag[];
  private readonly _diagnostics: readonly ClassificationDiagnostic[];

  constructor(
    public readonly fingerprint: string,
    tags: LineTag[],
    diagnostics: ClassificationDiagnostic[] = [],
  ) {
    this._tags = Object.freeze(tags);
    this._diagnostics = Object.freeze(diagnostics);
  }

  get lineCount(): number {
    return this._tags.length;
  }

  get diagnostics(): readonly ClassificationDiagnostic[] {
    return this._diagnostics;
  }

  get tags(): readonly LineTag[] {
    return this._tags;
  }

  /** Tag of a 1-based line, or undefined outside the file. */
  tagAt(line: number): LineTag | undefined {
    if (!Number.isInteger(line) || line < 1 || line > this._tags.length) {
      return undefined;
    }
    return this._tags[line - 1];
  }

  isExecutable(line: number): boolean {
    return this.tagAt(line)?.kind === 'executable';
  }

  /** Lines of the given kind, ascending. */
  linesOfKind(kind: LineKind): number[] {
    const lines: number[] = [];
    this._tags.forEach((tag, index) => {
      if (tag.kind === kind) lines.push(index + 1);
    });
    return lines;
  }
}
