import { SourceBuffer } from './sourceBuffer';
import {
  BLANK,
  COMMENT,
  DATA,
  DOCUMENTATION,
  EXECUTABLE,
  LineClassification,
  LineTag,
  PhaseBlock,
  phaseTag,
} from './lineClassification';
import {
  HeredocQuoting,
  MultilineConstructTracker,
  PendingHeredoc,
} from './multilineTracker';

const PHASE_BLOCK = /^\s*(?:sub\s+)?(BEGIN|END|INIT|CHECK|UNITCHECK)\s*\{/;
const DATA_SECTION = /^__(?:END|DATA)__(?!\w)/;
const POD_START = /^=[A-Za-z]/;
const QUOTE_LIKE = new Set(['q', 'qq', 'qw', 'qr', 'm', 's', 'tr', 'y']);
/** Quote-like operators that take a pattern and a replacement. */
const TWO_PART_QUOTE_LIKE = new Set(['s', 'tr', 'y']);
/** Words after which a `/` opens a pattern rather than dividing. */
const OPERAND_KEYWORDS = new Set([
  'and',
  'or',
  'not',
  'xor',
  'if',
  'elsif',
  'unless',
  'while',
  'until',
  'return',
  'split',
  'grep',
  'map',
  'when',
]);
const CLOSING_BRACKETS = new Map([
  ['(', ')'],
  ['[', ']'],
  ['{', '}'],
  ['<', '>'],
]);
/** Characters that cannot open a quote-like body after the operator word. */
const NOT_DELIMITERS = ',;)]}';
/** Characters before a word that make it a name rather than an operator. */
const NAME_PREFIXES = '$@%&*#-';

const TAB = 9;
const VERTICAL_TAB = 11;
const FORM_FEED = 12;
const SPACE = 32;
const DIGIT_0 = 48;
const EQUALS = 61;
const DIGIT_9 = 57;
const UPPER_A = 65;
const UPPER_Z = 90;
const UNDERSCORE = 95;
const LOWER_A = 97;
const LOWER_S = 115;
const LOWER_Z = 122;

/**
 * Splits a buffer into lines. A trailing `\r` is dropped from each line and a
 * final newline does not open an extra, empty line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.endsWith('\r')) {
      lines[i] = line.slice(0, -1);
    }
  }
  return lines;
}

/**
 * Tags every line of `buffer` as executable, comment, blank, documentation,
 * heredoc body or data. Single pass, never throws; constructs still open at
 * end of file are reported as diagnostics.
 */
export function classifyLines(buffer: SourceBuffer): LineClassification {
  const lines = splitLines(buffer.text);
  const tags: LineTag[] = new Array<LineTag>(lines.length);
  const tracker = new MultilineConstructTracker();
  let inData = false;

  for (let index = 0; index < lines.length; index++) {
    const text = lines[index];
    const lineNumber = index + 1;

    if (inData) {
      tags[index] = DATA;
      continue;
    }

    if (tracker.inDocumentation) {
      tracker.consumeDocumentationLine(text);
      tags[index] = DOCUMENTATION;
      continue;
    }

    if (tracker.hasPendingLiterals) {
      const { owningLine } = tracker.consumeLiteralLine(text);
      tags[index] = { kind: 'literalBody', owningLine };
      continue;
    }

    const lead = text.charCodeAt(0);
    if (lead === EQUALS && POD_START.test(text)) {
      tags[index] = DOCUMENTATION;
      tracker.enterDocumentation(lineNumber);
      tracker.consumeDocumentationLine(text);
      continue;
    }

    if (lead === UNDERSCORE && DATA_SECTION.test(text)) {
      inData = true;
      tags[index] = DATA;
      continue;
    }

    const firstCode = firstNonBlank(text);
    if (firstCode === -1) {
      tags[index] = BLANK;
      continue;
    }
    if (text[firstCode] === '#') {
      tags[index] = COMMENT;
      continue;
    }

    const first = text.charCodeAt(firstCode);
    const phase =
      first === LOWER_S || (first >= UPPER_A && first <= UPPER_Z)
        ? PHASE_BLOCK.exec(text)
        : null;
    tags[index] =
      phase && isPhaseBlock(phase[1]) ? phaseTag(phase[1]) : EXECUTABLE;
    for (const heredoc of scanHeredocs(text, lineNumber)) {
      tracker.enqueueLiteral(heredoc);
    }
  }

  return new LineClassification(
    buffer.fingerprint,
    tags,
    tracker.pendingDiagnostics(),
  );
}

const PHASE_BLOCKS: readonly PhaseBlock[] = [
  'BEGIN',
  'END',
  'INIT',
  'CHECK',
  'UNITCHECK',
];

function isPhaseBlock(name: string): name is PhaseBlock {
  return PHASE_BLOCKS.some((phase) => phase === name);
}

function isBlankCode(code: number): boolean {
  return (
    code === SPACE || code === TAB || code === FORM_FEED || code === VERTICAL_TAB
  );
}

/** True for `[A-Za-z0-9_]`; NaN from an out-of-range `charCodeAt` is false. */
function isWordCode(code: number): boolean {
  return (
    (code >= LOWER_A && code <= LOWER_Z) ||
    (code >= UPPER_A && code <= UPPER_Z) ||
    (code >= DIGIT_0 && code <= DIGIT_9) ||
    code === UNDERSCORE
  );
}

function firstNonBlank(text: string): number {
  for (let i = 0; i < text.length; i++) {
    if (!isBlankCode(text.charCodeAt(i))) {
      return i;
    }
  }
  return -1;
}

/**
 * Finds heredoc introducers on one line of code, in order of appearance.
 * Strings, quote-like operators and patterns are skipped and scanning stops
 * at a comment or at a construct that continues onto the next line.
 */
export function scanHeredocs(
  text: string,
  declarationLine: number,
): PendingHeredoc[] {
  const found: PendingHeredoc[] = [];
  if (text.indexOf('<<') === -1) {
    return found;
  }
  // Whether the next token starts a term, where `/` opens a pattern.
  let operand = true;
  let previousWord = '';
  let i = 0;
  while (i < text.length) {
    const code = text.charCodeAt(i);
    if (isBlankCode(code)) {
      i++;
      continue;
    }

    if (isWordCode(code)) {
      const start = i;
      while (isWordCode(text.charCodeAt(i))) {
        i++;
      }
      const word = text.slice(start, i);
      const open = QUOTE_LIKE.has(word)
        ? quoteLikeDelimiterAt(text, start, i, previousWord)
        : -1;
      previousWord = word;
      if (open === -1) {
        operand = OPERAND_KEYWORDS.has(word);
        continue;
      }
      const end = skipQuoteLike(
        text,
        open,
        TWO_PART_QUOTE_LIKE.has(word) ? 2 : 1,
      );
      if (end === -1) {
        break;
      }
      i = skipModifiers(text, end);
      operand = false;
      continue;
    }
    previousWord = '';

    const c = text[i];
    if (c === '#') {
      break;
    }

    if (c === '$') {
      const next = text[i + 1];
      if (next === '#') {
        // `$#array`, `$#{...}` and `$#$ref`.
        i += 2;
        operand = true;
        continue;
      }
      if (
        next !== undefined &&
        !isWordCode(text.charCodeAt(i + 1)) &&
        next !== '{' &&
        next !== '$' &&
        next !== ':'
      ) {
        // Punctuation variables such as `$/`, `$'` and `$"`.
        i += 2;
        operand = false;
        continue;
      }
      i++;
      operand = true;
      continue;
    }

    if (c === '"' || c === "'" || c === '`') {
      // A `'` inside a word is the old package separator, not a quote.
      if (c === "'" && isWordCode(text.charCodeAt(i - 1))) {
        i++;
        continue;
      }
      const end = skipDelimited(text, i, c, 1);
      if (end === -1) {
        break;
      }
      i = end;
      operand = false;
      continue;
    }

    if (c === '/') {
      if (operand) {
        const end = skipDelimited(text, i, '/', 1);
        if (end === -1) {
          break;
        }
        i = skipModifiers(text, end);
        operand = false;
        continue;
      }
      // Division, `/=` or the `//` defined-or operator.
      i += text[i + 1] === '/' ? 2 : 1;
      operand = true;
      continue;
    }

    if (c === '<' && text[i + 1] === '<') {
      const match = parseHeredocIntroducer(text, i + 2, declarationLine);
      if (match) {
        found.push(match.heredoc);
        i = match.end;
        operand = false;
      } else {
        i += 2;
        operand = true;
      }
      continue;
    }

    operand = c !== ')' && c !== ']' && c !== '}';
    i++;
  }
  return found;
}

/**
 * Where the body of the quote-like operator `text[start..end)` opens, or -1
 * when the word is a name: a variable, method, hash key, sub name or the
 * left side of `=>`.
 */
function quoteLikeDelimiterAt(
  text: string,
  start: number,
  end: number,
  previousWord: string,
): number {
  if (previousWord === 'sub') {
    return -1;
  }
  const before = text[start - 1];
  if (before !== undefined) {
    if (NAME_PREFIXES.includes(before)) {
      return -1;
    }
    if (before === '>' && text[start - 2] === '-') {
      return -1;
    }
    if (before === ':' && text[start - 2] === ':') {
      return -1;
    }
  }
  // `q#...#` only when the `#` follows at once; after a blank it is a comment.
  if (text[end] === '#') {
    return end;
  }
  let i = end;
  while (isBlankCode(text.charCodeAt(i))) {
    i++;
  }
  const c = text[i];
  if (c === undefined || c === '#' || isWordCode(text.charCodeAt(i))) {
    return -1;
  }
  if (NOT_DELIMITERS.includes(c) || (c === '=' && text[i + 1] === '>')) {
    return -1;
  }
  return i;
}

/**
 * Skips the `parts` delimited sections of a quote-like operator whose body
 * opens at `open`. Bracketed parts nest and each part may pick its own
 * brackets, as in `s{a} [b]`; other delimiters are shared, as in `s/a/b/`.
 */
function skipQuoteLike(text: string, open: number, parts: number): number {
  let i = open;
  for (let part = 0; part < parts; part++) {
    const delimiter = text[i];
    const close = CLOSING_BRACKETS.get(delimiter);
    if (close === undefined) {
      return skipDelimited(text, i, delimiter, parts - part);
    }
    i = skipBracketed(text, i, delimiter, close);
    if (i === -1) {
      return -1;
    }
    if (part + 1 < parts) {
      while (isBlankCode(text.charCodeAt(i))) {
        i++;
      }
      if (i >= text.length) {
        return -1;
      }
    }
  }
  return i;
}

function skipBracketed(
  text: string,
  open: number,
  opening: string,
  closing: string,
): number {
  let depth = 0;
  let i = open;
  while (i < text.length) {
    const c = text[i];
    if (c === '\\') {
      i += 2;
      continue;
    }
    if (c === opening) {
      depth++;
    } else if (c === closing) {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
    i++;
  }
  return -1;
}

function skipModifiers(text: string, index: number): number {
  let i = index;
  while (isWordCode(text.charCodeAt(i))) {
    i++;
  }
  return i;
}

/**
 * Skips `parts` delimited sections starting at the opening delimiter at
 * `open`. Returns the index after the last closing delimiter, or -1 when the
 * construct continues past the end of the line.
 */
function skipDelimited(
  text: string,
  open: number,
  delimiter: string,
  parts: number,
): number {
  let i = open + 1;
  let remaining = parts;
  while (i < text.length) {
    const c = text[i];
    if (c === '\\') {
      i += 2;
      continue;
    }
    if (c === delimiter) {
      remaining--;
      if (remaining === 0) {
        return i + 1;
      }
    }
    i++;
  }
  return -1;
}

interface IntroducerMatch {
  heredoc: PendingHeredoc;
  end: number;
}

function parseHeredocIntroducer(
  text: string,
  start: number,
  declarationLine: number,
): IntroducerMatch | undefined {
  let i = start;
  let indented = false;
  if (text[i] === '~') {
    indented = true;
    i++;
  }

  // `<<\EOF` is the single-quoted form spelled without quotes.
  const escaped = text[i] === '\\';
  const bare = /^[A-Za-z_]\w*/.exec(text.slice(escaped ? i + 1 : i));
  if (bare) {
    return {
      heredoc: {
        terminator: bare[0],
        quoting: escaped ? 'single' : 'bare',
        indented,
        declarationLine,
      },
      end: i + (escaped ? 1 : 0) + bare[0].length,
    };
  }

  while (text[i] === ' ' || text[i] === '\t') {
    i++;
  }
  const quote = text[i];
  const quoting = quotingOf(quote);
  if (quoting === undefined) {
    return undefined;
  }
  const close = text.indexOf(quote, i + 1);
  if (close === -1) {
    return undefined;
  }
  return {
    heredoc: {
      terminator: text.slice(i + 1, close),
      quoting,
      indented,
      declarationLine,
    },
    end: close + 1,
  };
}

function quotingOf(c: string | undefined): HeredocQuoting | undefined {
  switch (c) {
    case '"':
      return 'double';
    case "'":
      return 'single';
    case '`':
      return 'backtick';
    default:
      return undefined;
  }
}
