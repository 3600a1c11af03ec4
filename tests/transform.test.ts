import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TemplateTransformer, parseTransformRules } from '../src/runtime/transform';

describe('TemplateTransformer', () => {
  const transformer = TemplateTransformer.fromFile();

  it('should translate php to rust', async () => {
    const php = '<?php\n$name = "Rift";\necho $name;\n?>';
    await expect(transformer.translate('php', 'rust', php)).resolves.toBe(
      'fn main() {\n    let mut name = "Rift";\n    println!("{}", name);\n}\n',
    );
  });

  it('should translate single-line php with inline tags', async () => {
    await expect(transformer.translate('php', 'rust', '<?php echo "hi"; ?>')).resolves.toBe(
      'fn main() {\n    println!("{}", "hi");\n}\n',
    );
  });

  it('should drop imports, dedent and rewrite python for rust', async () => {
    const python = 'import sys\n\n    # greet\n    print("hi")\n    count = 2\n';
    await expect(transformer.translate('python', 'rust', python)).resolves.toBe(
      'fn main() {\n    // greet\n    println!("{}", "hi");\n    let mut count = 2;\n}\n',
    );
  });

  it('should translate javascript to python without a wrapper', async () => {
    await expect(transformer.translate('js', 'python', 'const x = 1;\nconsole.log(x);')).resolves.toBe('x = 1\nprint(x)\n');
  });

  it('should unwrap go main functions', async () => {
    const go = 'package main\n\nimport "fmt"\n\nfunc main() {\n\tmsg := "hi"\n\tfmt.Println(msg)\n}';
    await expect(transformer.translate('go', 'rust', go)).resolves.toBe(
      'fn main() {\n    let mut msg = "hi";\n    println!("{}", msg);\n}\n',
    );
  });

  it('should return null for pairs without a rule', async () => {
    expect(transformer.supports('javascript', 'rust')).toBe(true);
    expect(transformer.supports('rust', 'python')).toBe(false);
    await expect(transformer.translate('rust', 'python', 'fn main() {}')).resolves.toBeNull();
  });

  it('should honour rules passed directly', async () => {
    const custom = new TemplateTransformer([{
      source: 'python',
      target: 'php',
      drop: [],
      rewrites: [{ pattern: '^print\\((.*)\\)$', replacement: 'echo $1;' }],
      prelude: ['<?php'],
      epilogue: [],
      indent: 0,
    }]);
    await expect(custom.translate('python', 'php', 'print(1)')).resolves.toBe('<?php\necho 1;\n');
  });
});

describe('parseTransformRules()', () => {
  it('should fill in optional fields', () => {
    expect(parseTransformRules({ rules: [{ source: 'go', target: 'rust' }] }, 'rules.json')).toEqual([
      { source: 'go', target: 'rust', drop: [], rewrites: [], prelude: [], epilogue: [], indent: 0 },
    ]);
  });

  it('should reject a file without a rules array', () => {
    expect(() => parseTransformRules({}, 'rules.json')).toThrow('Invalid transform rules in rules.json: missing "rules" array');
  });

  it('should reject malformed rewrites', () => {
    expect(() => parseTransformRules({ rules: [{ source: 'a', target: 'b', rewrites: [{ pattern: 1 }] }] }, 'r.json'))
      .toThrow('Invalid rewrite in r.json (rule 0): expected { pattern, replacement } strings');
  });

  it('should report invalid JSON with the file path', () => {
    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'rift-rules-')), 'bad.json');
    fs.writeFileSync(file, '{ nope');
    try {
      expect(() => TemplateTransformer.fromFile(file)).toThrow(`Invalid JSON in transform rules ${file}`);
    } finally {
      fs.rmSync(path.dirname(file), { recursive: true, force: true });
    }
  });
});
