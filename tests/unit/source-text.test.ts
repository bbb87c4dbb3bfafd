import {
  GO_SYNTAX,
  PYTHON_SYNTAX,
  SourceSyntaxError,
  lineHasCodeMatch,
  maskSource,
  matchingPatterns,
} from '../../src/core/source-text.js';

describe('maskSource', () => {
  it('should blank comments and string contents', () => {
    expect(maskSource('x := "a // b" // c', GO_SYNTAX)).toBe(`x := "${' '.repeat(6)}"${' '.repeat(5)}`);
  });

  it('should keep string contents when asked', () => {
    expect(maskSource('x := "a // b" // c', GO_SYNTAX, { keepStrings: true })).toBe(`x := "a // b"${' '.repeat(5)}`);
  });

  it('should preserve line structure across block comments', () => {
    const text = 'a /* one\ntwo */ b';
    const masked = maskSource(text, GO_SYNTAX);
    expect(masked).toBe(`a${' '.repeat(7)}\n${' '.repeat(7)}b`);
    expect(masked.length).toBe(text.length);
  });

  it('should treat raw Go strings as multiline', () => {
    expect(maskSource('s := `x\ny`', GO_SYNTAX)).toBe('s := ` \n `');
  });

  it('should blank Python triple-quoted strings', () => {
    expect(maskSource('s = """Counter(\n"""', PYTHON_SYNTAX)).toBe(`s = """${' '.repeat(8)}\n"""`);
  });

  it('should leave Python hash comments blank', () => {
    expect(maskSource('x = 1  # Counter()', PYTHON_SYNTAX)).toBe(`x = 1${' '.repeat(13)}`);
  });

  it('should report an unterminated string with its line', () => {
    expect(() => maskSource('a\nb := "oops\n', GO_SYNTAX)).toThrow(SourceSyntaxError);
    expect(() => maskSource('a\nb := "oops\n', GO_SYNTAX)).toThrow('unterminated string at line 2');
  });

  it('should report an unterminated block comment', () => {
    expect(() => maskSource('/* x', GO_SYNTAX)).toThrow('unterminated block comment at line 1');
  });
});

describe('lineHasCodeMatch', () => {
  it('should match a pattern in code', () => {
    expect(lineHasCodeMatch('h := promhttp.Handler() // metrics', 'promhttp.Handler()')).toBe(true);
  });

  it('should ignore whole-line comments', () => {
    expect(lineHasCodeMatch('// promhttp.Handler()', 'promhttp')).toBe(false);
    expect(lineHasCodeMatch('   # Counter(', 'Counter(')).toBe(false);
    expect(lineHasCodeMatch(' * Counter(', 'Counter(')).toBe(false);
  });

  it('should ignore a match after a trailing comment marker', () => {
    expect(lineHasCodeMatch('x := 1 // promhttp.Handler()', 'promhttp.Handler()')).toBe(false);
  });

  it('should return false when the pattern is absent', () => {
    expect(lineHasCodeMatch('foo()', 'bar')).toBe(false);
  });
});

describe('matchingPatterns', () => {
  it('should return matching patterns in the given order', () => {
    expect(matchingPatterns('a()\n// b()\nc()\n', ['c()', 'b()', 'a()'])).toEqual(['c()', 'a()']);
  });
});
