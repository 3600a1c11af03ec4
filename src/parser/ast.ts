export type Node =
  | Program
  | Statement
  | Expression;

export type Statement =
  | Rift
  | Task
  | Fuse
  | Target
  | Deploy
  | Let
  | Call
  | IfStatement
  | WhileStatement
  | Expression;

export type Expression =
  | NumberLiteral
  | StringLiteral
  | Identifier;

/** A value that can live in the variable table. */
export type Literal = NumberLiteral | StringLiteral;

export interface Position {
  line: number;
  column: number;
}

export interface BaseNode {
  /** Absent on nodes synthesized by the runtime (e.g. optimized fuses). */
  position?: Position;
}

export interface Program extends BaseNode {
  type: 'Program';
  body: Statement[];
}

/** A named, reusable sequence of statements. */
export interface Rift extends BaseNode {
  type: 'Rift';
  name: string;
  body: Statement[];
}

/** Same shape as a rift, kept in its own namespace. */
export interface Task extends BaseNode {
  type: 'Task';
  name: string;
  body: Statement[];
}

/** A guest-language snippet tagged with its language. */
export interface Fuse extends BaseNode {
  type: 'Fuse';
  language: string;
  code: string;
}

export interface Target extends BaseNode {
  type: 'Target';
  language: string;
}

export interface Deploy extends BaseNode {
  type: 'Deploy';
  selector: string;
  config: Record<string, string>;
}

export interface Let extends BaseNode {
  type: 'Let';
  name: string;
  value: Expression;
}

export interface Call extends BaseNode {
  type: 'Call';
  name: string;
  /** Parsed calls only carry expressions; `optimize` also accepts a Rift node. */
  args: Statement[];
}

export interface IfStatement extends BaseNode {
  type: 'If';
  condition: Expression;
  thenBody: Statement[];
  elseBody: Statement[];
}

export interface WhileStatement extends BaseNode {
  type: 'While';
  condition: Expression;
  body: Statement[];
}

export interface NumberLiteral extends BaseNode {
  type: 'NumberLiteral';
  value: number;
}

export interface StringLiteral extends BaseNode {
  type: 'StringLiteral';
  value: string;
}

export interface Identifier extends BaseNode {
  type: 'Identifier';
  name: string;
}
