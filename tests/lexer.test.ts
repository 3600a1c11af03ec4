import { Lexer } from '../src/lexer/lexer';
import { TokenType } from '../src/lexer/tokens';
import { RiftError } from '../src/runtime/errors';

describe('Lexer', () => {
  function tokenize(source: string) {
    return new Lexer(source).tokenize();
  }

  function tokenTypes(source: string) {
    return tokenize(source).map(t => t.type);
  }

  function tokenValues(source: string) {
    return tokenize(source)
      .filter(t => t.type !== TokenType.EOF)
      .map(t => ({ type: t.type, value: t.value }));
  }

  describe('basic tokens', () => {
    it('should tokenize an empty source', () => {
      expect(tokenTypes('')).toEqual([TokenType.EOF]);
    });

    it('should tokenize directives', () => {
      expect(tokenTypes('@rift @fuse @task @target @deploy')).toEqual([
        TokenType.RIFT,
        TokenType.FUSE,
        TokenType.TASK,
        TokenType.TARGET,
        TokenType.DEPLOY,
        TokenType.EOF,
      ]);
    });

    it('should tokenize keywords and identifiers', () => {
      expect(tokenValues('let call if else while with optimize hello_2')).toEqual([
        { type: TokenType.LET, value: 'let' },
        { type: TokenType.CALL, value: 'call' },
        { type: TokenType.IF, value: 'if' },
        { type: TokenType.ELSE, value: 'else' },
        { type: TokenType.WHILE, value: 'while' },
        { type: TokenType.WITH, value: 'with' },
        { type: TokenType.OPTIMIZE, value: 'optimize' },
        { type: TokenType.IDENTIFIER, value: 'hello_2' },
      ]);
    });

    it('should treat Object.prototype member names as identifiers', () => {
      expect(tokenValues('constructor toString __proto__')).toEqual([
        { type: TokenType.IDENTIFIER, value: 'constructor' },
        { type: TokenType.IDENTIFIER, value: 'toString' },
        { type: TokenType.IDENTIFIER, value: '__proto__' },
      ]);
    });

    it('should tokenize numbers', () => {
      expect(tokenValues('42 3.14')).toEqual([
        { type: TokenType.NUMBER, value: '42' },
        { type: TokenType.NUMBER, value: '3.14' },
      ]);
    });

    it('should stop a number at its second dot', () => {
      expect(() => tokenize('1.2.3')).toThrow(/Unexpected character '\.'/);
    });

    it('should tokenize punctuation', () => {
      expect(tokenTypes('{ } ( ) ; = ,')).toEqual([
        TokenType.LBRACE,
        TokenType.RBRACE,
        TokenType.LPAREN,
        TokenType.RPAREN,
        TokenType.SEMICOLON,
        TokenType.EQUALS,
        TokenType.COMMA,
        TokenType.EOF,
      ]);
    });
  });

  describe('strings', () => {
    it('should decode escapes', () => {
      const [tok] = tokenize('"a\\n\\t\\"b\\"\\\\"');
      expect(tok.type).toBe(TokenType.STRING);
      expect(tok.value).toBe('a\n\t"b"\\');
    });

    it('should keep unknown escapes verbatim', () => {
      const [tok] = tokenize('"\\d+"');
      expect(tok.value).toBe('\\d+');
    });

    it('should allow strings to span lines', () => {
      const tokens = tokenize('"line1\nline2" x');
      expect(tokens[0].value).toBe('line1\nline2');
      expect(tokens[1]).toEqual({ type: TokenType.IDENTIFIER, value: 'x', line: 2, column: 8 });
    });

    it('should reject an unterminated string', () => {
      expect(() => tokenize('"never closed')).toThrow(RiftError);
      expect(() => tokenize('"never closed')).toThrow(/Unterminated string starting at line 1/);
    });
  });

  describe('comments and positions', () => {
    it('should drop line comments', () => {
      expect(tokenValues('let x = 1; // trailing\n// full line\ncall x;')).toEqual([
        { type: TokenType.LET, value: 'let' },
        { type: TokenType.IDENTIFIER, value: 'x' },
        { type: TokenType.EQUALS, value: '=' },
        { type: TokenType.NUMBER, value: '1' },
        { type: TokenType.SEMICOLON, value: ';' },
        { type: TokenType.CALL, value: 'call' },
        { type: TokenType.IDENTIFIER, value: 'x' },
        { type: TokenType.SEMICOLON, value: ';' },
      ]);
    });

    it('should track lines and columns across CRLF', () => {
      const tokens = tokenize('let a = 1;\r\n  call a;');
      const call = tokens.find(t => t.type === TokenType.CALL);
      expect(call).toEqual({ type: TokenType.CALL, value: 'call', line: 2, column: 3 });
    });
  });

  describe('errors', () => {
    it('should reject unknown directives', () => {
      expect(() => tokenize('@nope')).toThrow("ParseError: Unknown directive '@nope' at line 1, column 1");
    });

    it('should report the position of an unexpected character', () => {
      expect(() => tokenize('let x = 1;\nlet y = #')).toThrow(
        "ParseError: Lexer error at line 2, column 9: Unexpected character '#'",
      );
    });
  });
});
