import { Token, TokenType, KEYWORDS } from './tokens';
import { RiftError } from '../runtime/errors';

const SYMBOLS: Record<string, TokenType> = {
  '{': TokenType.LBRACE,
  '}': TokenType.RBRACE,
  '(': TokenType.LPAREN,
  ')': TokenType.RPAREN,
  ';': TokenType.SEMICOLON,
  '=': TokenType.EQUALS,
  ',': TokenType.COMMA,
};

export class Lexer {
  private source: string;
  private tokens: Token[] = [];
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];

      if (ch === ' ' || ch === '\t') {
        this.advance();
        continue;
      }

      if (ch === '\n') {
        this.newline();
        continue;
      }

      if (ch === '\r') {
        this.advance();
        if (this.pos < this.source.length && this.source[this.pos] === '\n') {
          this.pos++;
        }
        this.line++;
        this.column = 1;
        continue;
      }

      // Line comments
      if (ch === '/' && this.peekNext() === '/') {
        this.readComment();
        continue;
      }

      if (ch === '"') {
        this.readString();
        continue;
      }

      if (this.isDigit(ch)) {
        this.readNumber();
        continue;
      }

      // Identifiers, keywords and @directives
      if (this.isAlpha(ch) || ch === '@') {
        this.readIdentifier();
        continue;
      }

      const symbol = SYMBOLS[ch];
      if (symbol) {
        this.addTokenAt(symbol, ch, this.line, this.column);
        this.advance();
        continue;
      }

      throw this.error(`Unexpected character '${ch}'`);
    }

    this.addTokenAt(TokenType.EOF, '', this.line, this.column);
    return this.filterTokens(this.tokens);
  }

  private readComment(): void {
    const startCol = this.column;
    this.advance(); this.advance(); // skip //
    let text = '';
    while (this.pos < this.source.length && this.source[this.pos] !== '\n' && this.source[this.pos] !== '\r') {
      text += this.source[this.pos];
      this.advance();
    }
    this.addTokenAt(TokenType.COMMENT, text.trim(), this.line, startCol);
  }

  private readString(): void {
    const startLine = this.line;
    const startCol = this.column;
    this.advance(); // skip opening quote
    let text = '';
    while (this.pos < this.source.length && this.source[this.pos] !== '"') {
      const ch = this.source[this.pos];
      if (ch === '\\') {
        this.advance();
        if (this.pos < this.source.length) {
          const escaped = this.source[this.pos];
          switch (escaped) {
            case 'n': text += '\n'; break;
            case 't': text += '\t'; break;
            case 'r': text += '\r'; break;
            case '\\': text += '\\'; break;
            case '"': text += '"'; break;
            default: text += '\\' + escaped;
          }
          this.advance();
        }
      } else if (ch === '\n') {
        // Fuse bodies routinely span lines
        text += ch;
        this.newline();
      } else {
        text += ch;
        this.advance();
      }
    }
    if (this.pos >= this.source.length) {
      throw this.error(`Unterminated string starting at line ${startLine}`);
    }
    this.advance(); // skip closing quote
    this.addTokenAt(TokenType.STRING, text, startLine, startCol);
  }

  private readNumber(): void {
    const startCol = this.column;
    let num = '';
    let hasDot = false;
    while (this.pos < this.source.length && (this.isDigit(this.source[this.pos]) || this.source[this.pos] === '.')) {
      if (this.source[this.pos] === '.') {
        if (hasDot) break;
        hasDot = true;
      }
      num += this.source[this.pos];
      this.advance();
    }
    this.addTokenAt(TokenType.NUMBER, num, this.line, startCol);
  }

  private readIdentifier(): void {
    const startCol = this.column;
    let id = this.source[this.pos];
    this.advance();
    while (this.pos < this.source.length && this.isAlphaNumeric(this.source[this.pos])) {
      id += this.source[this.pos];
      this.advance();
    }

    const keyword = Object.prototype.hasOwnProperty.call(KEYWORDS, id) ? KEYWORDS[id] : undefined;
    if (keyword !== undefined) {
      this.addTokenAt(keyword, id, this.line, startCol);
    } else if (id.startsWith('@')) {
      throw new RiftError('ParseError', `Unknown directive '${id}' at line ${this.line}, column ${startCol}`);
    } else {
      this.addTokenAt(TokenType.IDENTIFIER, id, this.line, startCol);
    }
  }

  private newline(): void {
    this.pos++;
    this.line++;
    this.column = 1;
  }

  private advance(): void {
    this.pos++;
    this.column++;
  }

  private peekNext(): string {
    return this.pos + 1 < this.source.length ? this.source[this.pos + 1] : '';
  }

  private addTokenAt(type: TokenType, value: string, line: number, column: number): void {
    this.tokens.push({ type, value, line, column });
  }

  private isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
  }

  private isAlpha(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }

  private error(message: string): RiftError {
    return new RiftError('ParseError', `Lexer error at line ${this.line}, column ${this.column}: ${message}`);
  }

  private filterTokens(tokens: Token[]): Token[] {
    return tokens.filter(t => t.type !== TokenType.COMMENT);
  }
}
