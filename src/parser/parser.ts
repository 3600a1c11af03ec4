import { Token, TokenType } from '../lexer/tokens';
import { RiftError } from '../runtime/errors';
import * as AST from './ast';

export class Parser {
  private tokens: Token[] = [];
  private pos = 0;

  parse(tokens: Token[]): AST.Program {
    this.tokens = tokens;
    this.pos = 0;

    const body: AST.Statement[] = [];
    while (!this.check(TokenType.EOF)) {
      body.push(this.parseStatement());
    }

    return {
      type: 'Program',
      body,
      position: { line: 1, column: 1 },
    };
  }

  // ─── Statements ────────────────────────────────────────

  private parseStatement(): AST.Statement {
    const tok = this.peek();

    switch (tok.type) {
      case TokenType.RIFT: return this.parseRift();
      case TokenType.TASK: return this.parseTask();
      case TokenType.FUSE: return this.parseFuse();
      case TokenType.TARGET: return this.parseTarget();
      case TokenType.DEPLOY: return this.parseDeploy();
      case TokenType.LET: return this.parseLet();
      case TokenType.CALL: return this.parseCall();
      case TokenType.IF: return this.parseIf();
      case TokenType.WHILE: return this.parseWhile();
      case TokenType.NUMBER:
      case TokenType.STRING:
      case TokenType.IDENTIFIER: {
        // Bare expressions parse; the interpreter rejects them
        const expr = this.parseExpression();
        this.match(TokenType.SEMICOLON);
        return expr;
      }
      default:
        throw this.error(`Unexpected token ${tok.type} '${tok.value}'`);
    }
  }

  private parseRift(): AST.Rift {
    const pos = this.position();
    this.expect(TokenType.RIFT);
    const name = this.expect(TokenType.IDENTIFIER).value;
    const body = this.parseBlock();
    return { type: 'Rift', name, body, position: pos };
  }

  private parseTask(): AST.Task {
    const pos = this.position();
    this.expect(TokenType.TASK);
    const name = this.expect(TokenType.IDENTIFIER).value;
    const body = this.parseBlock();
    return { type: 'Task', name, body, position: pos };
  }

  private parseFuse(): AST.Fuse {
    const pos = this.position();
    this.expect(TokenType.FUSE);
    const language = this.expect(TokenType.STRING).value;
    this.expect(TokenType.LBRACE);
    const code = this.expect(TokenType.STRING).value;
    this.expect(TokenType.RBRACE);
    this.match(TokenType.SEMICOLON);
    return { type: 'Fuse', language, code, position: pos };
  }

  private parseTarget(): AST.Target {
    const pos = this.position();
    this.expect(TokenType.TARGET);
    const language = this.expect(TokenType.STRING).value;
    this.match(TokenType.SEMICOLON);
    return { type: 'Target', language, position: pos };
  }

  private parseDeploy(): AST.Deploy {
    const pos = this.position();
    this.expect(TokenType.DEPLOY);
    const selector = this.expect(TokenType.STRING).value;
    this.expect(TokenType.LBRACE);

    const config: Record<string, string> = {};
    while (!this.check(TokenType.RBRACE) && !this.check(TokenType.EOF)) {
      const key = this.expectOneOf(TokenType.IDENTIFIER, TokenType.STRING).value;
      this.expect(TokenType.EQUALS);
      const value = this.expectOneOf(TokenType.STRING, TokenType.NUMBER, TokenType.IDENTIFIER).value;
      this.expect(TokenType.SEMICOLON);
      config[key] = value;
    }

    this.expect(TokenType.RBRACE);
    this.match(TokenType.SEMICOLON);
    return { type: 'Deploy', selector, config, position: pos };
  }

  private parseLet(): AST.Let {
    const pos = this.position();
    this.expect(TokenType.LET);
    const name = this.expect(TokenType.IDENTIFIER).value;
    this.expect(TokenType.EQUALS);
    const value = this.parseExpression();
    this.expect(TokenType.SEMICOLON);
    return { type: 'Let', name, value, position: pos };
  }

  /**
   * call <name> [with] [arg, ...];
   *
   * `optimize` is a keyword so that `call optimize with hello;` reads
   * naturally; it is stored as an ordinary call name.
   */
  private parseCall(): AST.Call {
    const pos = this.position();
    this.expect(TokenType.CALL);
    const name = this.expectOneOf(TokenType.IDENTIFIER, TokenType.OPTIMIZE).value;

    const args: AST.Expression[] = [];
    this.match(TokenType.WITH);
    if (!this.check(TokenType.SEMICOLON)) {
      args.push(this.parseExpression());
      while (this.match(TokenType.COMMA)) {
        args.push(this.parseExpression());
      }
    }

    this.expect(TokenType.SEMICOLON);
    return { type: 'Call', name, args, position: pos };
  }

  private parseIf(): AST.IfStatement {
    const pos = this.position();
    this.expect(TokenType.IF);
    const condition = this.parseExpression();
    const thenBody = this.parseBlock();

    let elseBody: AST.Statement[] = [];
    if (this.match(TokenType.ELSE)) {
      elseBody = this.parseBlock();
    }

    return { type: 'If', condition, thenBody, elseBody, position: pos };
  }

  private parseWhile(): AST.WhileStatement {
    const pos = this.position();
    this.expect(TokenType.WHILE);
    const condition = this.parseExpression();
    const body = this.parseBlock();
    return { type: 'While', condition, body, position: pos };
  }

  private parseBlock(): AST.Statement[] {
    this.expect(TokenType.LBRACE);
    const body: AST.Statement[] = [];
    while (!this.check(TokenType.RBRACE) && !this.check(TokenType.EOF)) {
      body.push(this.parseStatement());
    }
    this.expect(TokenType.RBRACE);
    return body;
  }

  // ─── Expressions ───────────────────────────────────────

  private parseExpression(): AST.Expression {
    const tok = this.peek();
    const pos = this.position();

    switch (tok.type) {
      case TokenType.NUMBER:
        this.advance();
        return { type: 'NumberLiteral', value: parseFloat(tok.value), position: pos };
      case TokenType.STRING:
        this.advance();
        return { type: 'StringLiteral', value: tok.value, position: pos };
      case TokenType.IDENTIFIER:
        this.advance();
        return { type: 'Identifier', name: tok.value, position: pos };
      default:
        throw this.error(`Invalid expression '${tok.value}'`);
    }
  }

  // ─── Helpers ───────────────────────────────────────────

  private peek(): Token {
    return this.tokens[this.pos] || { type: TokenType.EOF, value: '', line: 0, column: 0 };
  }

  private advance(): Token {
    const tok = this.peek();
    this.pos++;
    return tok;
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType): Token {
    const tok = this.peek();
    if (tok.type !== type) {
      throw this.error(`Expected ${type} but got ${tok.type} '${tok.value}'`);
    }
    return this.advance();
  }

  private expectOneOf(...types: TokenType[]): Token {
    const tok = this.peek();
    if (!types.includes(tok.type)) {
      throw this.error(`Expected ${types.join(' or ')} but got ${tok.type} '${tok.value}'`);
    }
    return this.advance();
  }

  private position(): AST.Position {
    const tok = this.peek();
    return { line: tok.line, column: tok.column };
  }

  private error(message: string): RiftError {
    const tok = this.peek();
    return new RiftError(
      'ParseError',
      `Parse error at line ${tok.line}, column ${tok.column}: ${message}`,
      {},
      { line: tok.line, column: tok.column },
    );
  }
}
