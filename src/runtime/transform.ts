import * as fs from 'fs';
import * as path from 'path';
import { normalizeLanguage } from './languages';

/**
 * Source-to-source translation used by `optimize`. Resolves to null when
 * the pair is not supported, in which case the snippet is left as is.
 */
export interface CodeTransformer {
  translate(sourceLanguage: string, targetLanguage: string, code: string): Promise<string | null>;
}

// ─── Template rules ─────────────────────────────────────

export interface RewriteRule {
  pattern: string;
  replacement: string;
}

export interface TransformRule {
  source: string;
  target: string;
  /** Lines matching any of these patterns are removed before anything else. */
  drop: string[];
  /** Applied to every line, in order. */
  rewrites: RewriteRule[];
  prelude: string[];
  epilogue: string[];
  /** Spaces added in front of every non-empty body line. */
  indent: number;
}

export const DEFAULT_TEMPLATES = path.join(__dirname, '..', '..', 'templates', 'transforms.json');

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseRewrite(value: unknown, where: string): RewriteRule {
  if (!isRecord(value) || typeof value.pattern !== 'string' || typeof value.replacement !== 'string') {
    throw new Error(`Invalid rewrite in ${where}: expected { pattern, replacement } strings`);
  }
  return { pattern: value.pattern, replacement: value.replacement };
}

/** Validate the parsed contents of a rules file. */
export function parseTransformRules(data: unknown, filePath: string): TransformRule[] {
  if (!isRecord(data) || !Array.isArray(data.rules)) {
    throw new Error(`Invalid transform rules in ${filePath}: missing "rules" array`);
  }

  return data.rules.map((rule: unknown, i: number): TransformRule => {
    const where = `${filePath} (rule ${i})`;
    if (!isRecord(rule) || typeof rule.source !== 'string' || typeof rule.target !== 'string') {
      throw new Error(`Invalid rule in ${where}: "source" and "target" must be strings`);
    }
    const drop = rule.drop ?? [];
    const prelude = rule.prelude ?? [];
    const epilogue = rule.epilogue ?? [];
    if (!isStringArray(drop) || !isStringArray(prelude) || !isStringArray(epilogue)) {
      throw new Error(`Invalid rule in ${where}: "drop", "prelude" and "epilogue" must be string arrays`);
    }
    const rewrites = rule.rewrites ?? [];
    if (!Array.isArray(rewrites)) {
      throw new Error(`Invalid rule in ${where}: "rewrites" must be an array`);
    }
    const indent = rule.indent ?? 0;
    if (typeof indent !== 'number' || indent < 0) {
      throw new Error(`Invalid rule in ${where}: "indent" must be a non-negative number`);
    }
    return {
      source: rule.source,
      target: rule.target,
      drop,
      rewrites: rewrites.map((r: unknown) => parseRewrite(r, where)),
      prelude,
      epilogue,
      indent,
    };
  });
}

function dedent(lines: string[]): string[] {
  const widths = lines
    .filter(line => line.trim() !== '')
    .map(line => line.length - line.trimStart().length);
  const common = widths.length > 0 ? Math.min(...widths) : 0;
  return lines.map(line => line.slice(Math.min(common, line.length - line.trimStart().length)));
}

/**
 * Line-oriented translator driven by a rules file. Good enough for the
 * print/assign/comment style snippets that fuse blocks usually hold.
 */
export class TemplateTransformer implements CodeTransformer {
  private rules: Map<string, TransformRule> = new Map();

  constructor(rules: TransformRule[]) {
    for (const rule of rules) {
      this.rules.set(this.key(rule.source, rule.target), rule);
    }
  }

  static fromFile(filePath: string = DEFAULT_TEMPLATES): TemplateTransformer {
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new Error(`Invalid JSON in transform rules ${filePath}: ${error.message}`);
      }
      throw error;
    }
    return new TemplateTransformer(parseTransformRules(data, filePath));
  }

  supports(sourceLanguage: string, targetLanguage: string): boolean {
    return this.rules.has(this.key(sourceLanguage, targetLanguage));
  }

  async translate(sourceLanguage: string, targetLanguage: string, code: string): Promise<string | null> {
    const rule = this.rules.get(this.key(sourceLanguage, targetLanguage));
    if (!rule) return null;
    return this.apply(rule, code);
  }

  apply(rule: TransformRule, code: string): string {
    const drops = rule.drop.map(p => new RegExp(p));
    const rewrites = rule.rewrites.map(r => ({ regex: new RegExp(r.pattern, 'g'), replacement: r.replacement }));
    const pad = ' '.repeat(rule.indent);

    const kept = code.split(/\r?\n/).filter(line => !drops.some(re => re.test(line)));
    const body = dedent(kept).map(line => {
      let out = line;
      for (const { regex, replacement } of rewrites) {
        out = out.replace(regex, replacement);
      }
      return out.trim() === '' ? '' : pad + out;
    });

    // Trim blank lines left at either end by dropped imports and tags
    while (body.length > 0 && body[0] === '') body.shift();
    while (body.length > 0 && body[body.length - 1] === '') body.pop();

    return [...rule.prelude, ...body, ...rule.epilogue].join('\n') + '\n';
  }

  private key(source: string, target: string): string {
    const from = normalizeLanguage(source) ?? source;
    const to = normalizeLanguage(target) ?? target;
    return `${from}->${to}`;
  }
}
