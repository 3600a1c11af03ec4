/**
 * tree-sitter backed syntax adapters.
 *
 * The native parser and the grammars are optional dependencies and are
 * loaded lazily. A grammar that fails to load simply leaves its language
 * without an adapter.
 */

import { Language } from './languages';
import { SyntaxNode, SyntaxTree, SyntaxTreeAdapter } from './resolver';

type TreeSitterNode = {
  type: string;
  startIndex: number;
  endIndex: number;
  namedChildren: TreeSitterNode[];
  childForFieldName: (field: string) => TreeSitterNode | null;
};
type TreeSitterTree = { rootNode: TreeSitterNode };
type TreeSitterParser = { setLanguage: (language: unknown) => void; parse: (content: string) => TreeSitterTree };
type TreeSitterParserCtor = new () => TreeSitterParser;

const GRAMMARS: Record<Language, { module: string; exportName?: string }> = {
  python: { module: 'tree-sitter-python' },
  javascript: { module: 'tree-sitter-javascript' },
  go: { module: 'tree-sitter-go' },
  cpp: { module: 'tree-sitter-cpp' },
  java: { module: 'tree-sitter-java' },
  php: { module: 'tree-sitter-php', exportName: 'php' },
  rust: { module: 'tree-sitter-rust' },
};

function isParserCtor(value: unknown): value is TreeSitterParserCtor {
  return typeof value === 'function';
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function loadParserCtor(): TreeSitterParserCtor | null {
  try {
    const mod: unknown = require('tree-sitter');
    return isParserCtor(mod) ? mod : null;
  } catch {
    return null;
  }
}

function loadGrammar(moduleName: string, exportName?: string): unknown {
  try {
    const mod: unknown = require(moduleName);
    if (exportName) {
      return isObject(mod) ? mod[exportName] ?? null : null;
    }
    return mod ?? null;
  } catch {
    return null;
  }
}

function* walkTree(node: TreeSitterNode): Generator<TreeSitterNode> {
  yield node;
  for (const child of node.namedChildren) {
    yield* walkTree(child);
  }
}

/** Wraps a tree-sitter node, translating its string indices into UTF-8 byte offsets. */
class TreeSitterSyntaxNode implements SyntaxNode {
  readonly startByte: number;
  readonly endByte: number;

  constructor(private node: TreeSitterNode, private source: string) {
    this.startByte = Buffer.byteLength(source.slice(0, node.startIndex), 'utf-8');
    this.endByte = Buffer.byteLength(source.slice(0, node.endIndex), 'utf-8');
  }

  kind(): string {
    return this.node.type;
  }

  childByFieldName(name: string): SyntaxNode | null {
    const child = this.node.childForFieldName(name);
    return child ? new TreeSitterSyntaxNode(child, this.source) : null;
  }
}

export class TreeSitterAdapter implements SyntaxTreeAdapter {
  private parser: TreeSitterParser;

  constructor(parserCtor: TreeSitterParserCtor, grammar: unknown) {
    this.parser = new parserCtor();
    this.parser.setLanguage(grammar);
  }

  parse(code: string): SyntaxTree {
    const root = this.parser.parse(code).rootNode;
    return {
      *walk() {
        for (const node of walkTree(root)) {
          yield new TreeSitterSyntaxNode(node, code);
        }
      },
    };
  }
}

/** Build an adapter for every grammar that loads. Empty when tree-sitter itself is missing. */
export function loadTreeSitterAdapters(): Map<string, SyntaxTreeAdapter> {
  const adapters = new Map<string, SyntaxTreeAdapter>();
  const parserCtor = loadParserCtor();
  if (!parserCtor) return adapters;

  for (const [language, grammar] of Object.entries(GRAMMARS)) {
    const loaded = loadGrammar(grammar.module, grammar.exportName);
    if (!loaded) continue;
    try {
      adapters.set(language, new TreeSitterAdapter(parserCtor, loaded));
    } catch {
      // ABI mismatch between parser and grammar
      continue;
    }
  }
  return adapters;
}
