import { LineClassification } from './lineClassification';

/** A variable the client can look up and show beside its line. */
export interface InlineVariableLookup {
  line: number;
  /** 1-based column of the sigil. */
  column: number;
  variableName: string;
}

const VARIABLE = /[$@%][A-Za-z_]\w*(?:::\w+)*/g;
const TRAILING_COMMENT = /(^|\s)#.*$/;

/**
 * Lists the variables named on the executable lines from `startLine` to
 * `endLine`, each name once per line. The range may be given in either order.
 */
export function collectInlineValues(
  lines: readonly string[],
  classification: LineClassification,
  startLine: number,
  endLine: number,
): InlineVariableLookup[] {
  const first = Math.max(1, Math.min(startLine, endLine));
  const last = Math.min(lines.length, Math.max(startLine, endLine));
  const found: InlineVariableLookup[] = [];
  for (let line = first; line <= last; line++) {
    if (!classification.isExecutable(line)) {
      continue;
    }
    const code = lines[line - 1].replace(TRAILING_COMMENT, '');
    const seen = new Set<string>();
    for (const match of code.matchAll(VARIABLE)) {
      const name = match[0];
      if (seen.has(name)) {
        continue;
      }
      seen.add(name);
      found.push({ line, column: (match.index ?? 0) + 1, variableName: name });
    }
  }
  return found;
}
