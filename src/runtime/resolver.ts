import { RiftError } from './errors';
import { normalizeLanguage } from './languages';

// ─── Syntax tree adapter interface ──────────────────────

export interface SyntaxNode {
  kind(): string;
  childByFieldName(name: string): SyntaxNode | null;
  /** Byte offsets into the UTF-8 encoded source. */
  startByte: number;
  endByte: number;
}

export interface SyntaxTree {
  /** Every node, parents before children. */
  walk(): Iterable<SyntaxNode>;
}

export interface SyntaxTreeAdapter {
  parse(code: string): SyntaxTree;
}

const IMPORT_KINDS = new Set(['import_statement', 'import_declaration']);

// ─── Resolver ───────────────────────────────────────────

/**
 * Extracts the imported module names from a guest-language snippet by
 * walking its syntax tree. Results follow source order and are not
 * deduplicated.
 */
export class DependencyResolver {
  private adapters: Map<string, SyntaxTreeAdapter>;

  constructor(adapters: Map<string, SyntaxTreeAdapter>) {
    this.adapters = adapters;
  }

  supports(language: string): boolean {
    const lang = normalizeLanguage(language);
    return lang !== undefined && this.adapters.has(lang);
  }

  resolve(language: string, code: string): string[] {
    const lang = normalizeLanguage(language);
    const adapter = lang ? this.adapters.get(lang) : undefined;
    if (!adapter) {
      throw new RiftError('UnsupportedLanguage', `No syntax adapter for language '${language}'`, { language });
    }

    const bytes = Buffer.from(code, 'utf-8');
    const deps: string[] = [];
    for (const node of adapter.parse(code).walk()) {
      if (!IMPORT_KINDS.has(node.kind())) continue;
      const name = node.childByFieldName('name');
      if (name) {
        deps.push(bytes.subarray(name.startByte, name.endByte).toString('utf-8'));
      }
    }
    return deps;
  }
}
