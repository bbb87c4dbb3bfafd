export class SourceSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SourceSyntaxError';
  }
}

export interface StringDelimiter {
  delimiter: string;
  escapes: boolean;
  multiline: boolean;
}

export interface LexerSyntax {
  lineComments: readonly string[];
  blockComment?: readonly [open: string, close: string];
  /** Longest delimiters first, so `"""` wins over `"`. */
  strings: readonly StringDelimiter[];
}

export const GO_SYNTAX: LexerSyntax = {
  lineComments: ['//'],
  blockComment: ['/*', '*/'],
  strings: [
    { delimiter: '"', escapes: true, multiline: false },
    { delimiter: '`', escapes: false, multiline: true },
    { delimiter: "'", escapes: true, multiline: false },
  ],
};

export const PYTHON_SYNTAX: LexerSyntax = {
  lineComments: ['#'],
  strings: [
    { delimiter: '"""', escapes: true, multiline: true },
    { delimiter: "'''", escapes: true, multiline: true },
    { delimiter: '"', escapes: true, multiline: false },
    { delimiter: "'", escapes: true, multiline: false },
  ],
};

function blank(segment: string): string {
  return segment.replace(/[^\n]/g, ' ');
}

function lineOf(text: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index; i++) {
    if (text[i] === '\n') line++;
  }
  return line;
}

/**
 * Replaces comments with whitespace, and string contents too unless
 * `keepStrings` is set. Line and column positions are preserved.
 */
export function maskSource(
  text: string,
  syntax: LexerSyntax,
  options: { keepStrings?: boolean } = {},
): string {
  let out = '';
  let i = 0;

  outer: while (i < text.length) {
    if (syntax.blockComment && text.startsWith(syntax.blockComment[0], i)) {
      const [open, close] = syntax.blockComment;
      const end = text.indexOf(close, i + open.length);
      if (end === -1) {
        throw new SourceSyntaxError(`unterminated block comment at line ${lineOf(text, i)}`);
      }
      out += blank(text.slice(i, end + close.length));
      i = end + close.length;
      continue;
    }

    for (const marker of syntax.lineComments) {
      if (text.startsWith(marker, i)) {
        let end = text.indexOf('\n', i);
        if (end === -1) end = text.length;
        out += blank(text.slice(i, end));
        i = end;
        continue outer;
      }
    }

    for (const str of syntax.strings) {
      if (!text.startsWith(str.delimiter, i)) continue;
      let j = i + str.delimiter.length;
      while (j < text.length) {
        if (str.escapes && text[j] === '\\') {
          j += 2;
          continue;
        }
        if (text.startsWith(str.delimiter, j)) break;
        if (!str.multiline && text[j] === '\n') {
          throw new SourceSyntaxError(`unterminated string at line ${lineOf(text, i)}`);
        }
        j++;
      }
      if (j >= text.length) {
        throw new SourceSyntaxError(`unterminated string at line ${lineOf(text, i)}`);
      }
      const body = text.slice(i + str.delimiter.length, j);
      out += str.delimiter + (options.keepStrings ? body : blank(body)) + str.delimiter;
      i = j + str.delimiter.length;
      continue outer;
    }

    out += text[i];
    i++;
  }

  return out;
}

const COMMENT_LINE_PREFIXES = ['//', '#', '--', '<!--'];

/**
 * Best-effort check that `pattern` occurs on `line` outside a comment.
 * Only same-line markers are understood; block comments spanning lines are not.
 */
export function lineHasCodeMatch(line: string, pattern: string): boolean {
  if (!line.includes(pattern)) return false;

  const trimmed = line.trim();
  if (COMMENT_LINE_PREFIXES.some((prefix) => trimmed.startsWith(prefix))) return false;

  const marker = line.indexOf('//');
  if (marker !== -1) return line.slice(0, marker).includes(pattern);

  if (trimmed.includes('/*') || trimmed.includes('*/') || trimmed.startsWith('*')) return false;
  return true;
}

export function textHasCodeMatch(text: string, pattern: string): boolean {
  return text.split('\n').some((line) => lineHasCodeMatch(line, pattern));
}

/** Returns the patterns, in order, that occur on at least one code line. */
export function matchingPatterns(text: string, patterns: readonly string[]): string[] {
  return patterns.filter((pattern) => textHasCodeMatch(text, pattern));
}
