import { LineClassification, LineTag } from './lineClassification';

export type LineValidation =
  | { readonly verified: true; readonly line: number }
  | { readonly verified: false; readonly message: string };

export const LINE_NOT_POSITIVE = 'Line number must be positive';
export const LINE_PAST_END = 'Line number exceeds file length';

/**
 * Resolves a requested breakpoint line to the line the debugger will actually
 * stop on: the line itself when executable, otherwise the next executable line
 * after it. Never moves backwards.
 */
export function validateBreakpointLine(
  classification: LineClassification,
  requestedLine: number,
): LineValidation {
  if (!Number.isInteger(requestedLine) || requestedLine < 1) {
    return { verified: false, message: LINE_NOT_POSITIVE };
  }
  const requestedTag = classification.tagAt(requestedLine);
  if (requestedTag === undefined) {
    return { verified: false, message: LINE_PAST_END };
  }

  for (let line = requestedLine; line <= classification.lineCount; line++) {
    if (classification.isExecutable(line)) {
      return { verified: true, line };
    }
  }
  return { verified: false, message: noExecutableLineMessage(requestedTag) };
}

function noExecutableLineMessage(tag: LineTag): string {
  switch (tag.kind) {
    case 'literalBody':
      return 'Breakpoint set inside heredoc content';
    case 'documentation':
      return 'Breakpoint set inside POD documentation';
    case 'data':
      return 'Breakpoint set in the __END__/__DATA__ section';
    case 'comment':
    case 'blank':
      return 'Breakpoint set on comment or blank line';
    case 'executable':
      return 'No executable code at or after this line';
  }
}
