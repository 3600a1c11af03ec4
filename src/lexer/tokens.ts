export enum TokenType {
  // Literals
  STRING = 'STRING',
  NUMBER = 'NUMBER',
  IDENTIFIER = 'IDENTIFIER',

  // Directives
  RIFT = 'RIFT',       // @rift
  FUSE = 'FUSE',       // @fuse
  TASK = 'TASK',       // @task
  TARGET = 'TARGET',   // @target
  DEPLOY = 'DEPLOY',   // @deploy

  // Keywords
  LET = 'LET',
  CALL = 'CALL',
  IF = 'IF',
  ELSE = 'ELSE',
  WHILE = 'WHILE',
  WITH = 'WITH',
  OPTIMIZE = 'OPTIMIZE',

  // Punctuation
  LBRACE = 'LBRACE',       // {
  RBRACE = 'RBRACE',       // }
  LPAREN = 'LPAREN',       // (
  RPAREN = 'RPAREN',       // )
  SEMICOLON = 'SEMICOLON', // ;
  EQUALS = 'EQUALS',       // =
  COMMA = 'COMMA',         // ,

  // Special
  COMMENT = 'COMMENT',
  EOF = 'EOF',
}

export const KEYWORDS: Record<string, TokenType> = {
  '@rift': TokenType.RIFT,
  '@fuse': TokenType.FUSE,
  '@task': TokenType.TASK,
  '@target': TokenType.TARGET,
  '@deploy': TokenType.DEPLOY,
  'let': TokenType.LET,
  'call': TokenType.CALL,
  'if': TokenType.IF,
  'else': TokenType.ELSE,
  'while': TokenType.WHILE,
  'with': TokenType.WITH,
  'optimize': TokenType.OPTIMIZE,
};

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}
