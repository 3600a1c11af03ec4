#!/usr/bin/env node

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as readline from 'readline';
import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { loadConfig, loadConfigForScript, RiftConfig } from './runtime/config';
import { errorReport } from './runtime/errors';
import { SUPPORTED_LANGUAGES } from './runtime/languages';
import { createSession, Session } from './runtime/session';
import { SilentStatusReporter, StatusReporter, TerminalStatusReporter } from './runtime/status';

const USAGE = `
rift - The Rift fusion runtime v0.1.0

Usage:
  rift                       Start the interactive shell
  rift <file.rift>           Run a Rift script
  rift --parse <file.rift>   Parse and print AST
  rift --lex <file.rift>     Tokenize and print tokens
  rift --help                Show this help message

Transformer Options:
  --transformer template     Rule-based translation for optimize (default)
  --transformer claude       Claude-backed translation (requires ANTHROPIC_API_KEY)
  --model <model-id>         Claude model to use (default: claude-sonnet-4-5-20250929)

Other Options:
  --trace                    Enable execution tracing
  --quiet                    Suppress status spinner (for piping / CI)
  --config <path>            Path to rift.config.json (auto-detected by default)

Examples:
  rift examples/hello.rift
  rift --trace --transformer claude examples/optimize.rift

Environment Variables:
  ANTHROPIC_API_KEY    API key for the Claude transformer
  RIFT_MODEL           Default model (overridden by --model)
`;

const REPL_HELP = `
Statements:
  @rift hello { @fuse "python" { "print('hi')" } }
  call hello;
  let x = 42;
  @target "rust";
  call optimize with hello;
  @deploy "local" { }

Commands:
  help     Show this message
  status   Show rifts, tasks, variables and cached artifacts
  clear    Forget everything defined in this session
  exit     Leave the shell (also: quit)
`;

const HISTORY_FILE = path.join(os.homedir(), '.rift_history');
const HISTORY_SIZE = 500;

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

function applyTransformerFlags(config: RiftConfig, args: string[]): RiftConfig {
  const provider = getArg(args, '--transformer');
  const model = getArg(args, '--model') || process.env.RIFT_MODEL;
  if (provider !== undefined && provider !== 'template' && provider !== 'claude') {
    console.error(`Error: Unknown transformer "${provider}". Use "template" or "claude".`);
    process.exit(1);
  }

  const transformer = { ...config.transformer };
  if (provider === 'template' || provider === 'claude') transformer.provider = provider;
  if (model) transformer.model = model;

  if (transformer.provider === 'claude' && !process.env.ANTHROPIC_API_KEY) {
    console.error('Error: ANTHROPIC_API_KEY environment variable is required for the Claude transformer.');
    console.error('Set it with: export ANTHROPIC_API_KEY=your-key-here');
    process.exit(1);
  }
  return { ...config, transformer };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function reportError(error: unknown): void {
  console.error(`\n${errorReport(error).join('\n')}`);
}

// ─── REPL ───────────────────────────────────────────────

function loadHistory(): string[] {
  try {
    return fs.readFileSync(HISTORY_FILE, 'utf-8').split('\n').filter(Boolean).reverse().slice(0, HISTORY_SIZE);
  } catch {
    return [];
  }
}

function saveHistory(history: string[]): void {
  try {
    fs.writeFileSync(HISTORY_FILE, [...history].reverse().join('\n') + '\n');
  } catch (e) {
    console.error(`Could not save history: ${errorMessage(e)}`);
  }
}

/** Net `{` minus `}` outside string literals, so multi-line blocks can be typed. */
function braceDepth(text: string): number {
  let depth = 0;
  let inString = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
    }
  }
  return depth;
}

async function printStatus(session: Session): Promise<void> {
  const summary = await session.env.summary();
  const list = (items: string[]) => (items.length > 0 ? items.join(', ') : '(none)');
  console.log(`Rifts:           ${list(summary.rifts)}`);
  console.log(`Tasks:           ${list(summary.tasks)}`);
  console.log(`Variables:       ${list(summary.variables)}`);
  console.log(`Cached artifacts: ${summary.cacheEntries}`);
  console.log(`Target language: ${summary.targetLanguage ?? 'rust (default)'}`);
  console.log(`Languages:       ${SUPPORTED_LANGUAGES.join(', ')}`);
}

async function repl(session: Session): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'rift> ',
    history: loadHistory(),
    historySize: HISTORY_SIZE,
  });

  let history: string[] = [];
  rl.on('history', (h: string[]) => { history = h; });

  console.log('Rift interactive shell. Type "help" for examples, "exit" to leave.');
  rl.prompt();

  let buffer = '';
  for await (const line of rl) {
    const input = buffer ? `${buffer}\n${line}` : line;
    const command = input.trim();

    if (!buffer) {
      if (command === '') { rl.prompt(); continue; }
      if (command === 'exit' || command === 'quit') break;
      if (command === 'help') { console.log(REPL_HELP); rl.prompt(); continue; }
      if (command === 'status') { await printStatus(session); rl.prompt(); continue; }
      if (command === 'clear') {
        await session.reset();
        console.log('Session cleared.');
        rl.prompt();
        continue;
      }
    }

    if (braceDepth(input) > 0) {
      buffer = input;
      rl.setPrompt('....> ');
      rl.prompt();
      continue;
    }

    buffer = '';
    rl.setPrompt('rift> ');
    try {
      await session.execute(input);
    } catch (error) {
      reportError(error);
    }
    rl.prompt();
  }

  rl.close();
  session.close();
  saveHistory(history);
}

// ─── Main ───────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    process.exit(0);
  }

  const flags = new Set(args.filter(a => a.startsWith('--')));
  const flagsWithValues = new Set(['--transformer', '--model', '--config']);
  const files: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      if (flagsWithValues.has(args[i])) i++; // Skip next arg (the value)
      continue;
    }
    files.push(args[i]);
  }

  const traceEnabled = flags.has('--trace');
  const status: StatusReporter = flags.has('--quiet')
    ? new SilentStatusReporter()
    : new TerminalStatusReporter();
  const explicitConfig = getArg(args, '--config');

  if (files.length === 0) {
    if (flags.has('--lex') || flags.has('--parse')) {
      console.error('Error: No input file specified.');
      console.log(USAGE);
      process.exit(1);
    }
    const config = applyTransformerFlags(loadConfig(explicitConfig), args);
    const session = createSession({ config, trace: traceEnabled, status, apiKey: process.env.ANTHROPIC_API_KEY });
    await repl(session);
    return;
  }

  const filePath = path.resolve(files[0]);

  if (!fs.existsSync(filePath)) {
    console.error(`Error: File not found: ${filePath}`);
    process.exit(1);
  }

  const source = fs.readFileSync(filePath, 'utf-8');

  // Lex-only mode
  if (flags.has('--lex')) {
    try {
      const tokens = new Lexer(source).tokenize();
      for (const tok of tokens) {
        const val = tok.value ? ` ${JSON.stringify(tok.value)}` : '';
        console.log(`${tok.line}:${tok.column}\t${tok.type}${val}`);
      }
    } catch (e) {
      console.error(errorMessage(e));
      process.exit(1);
    }
    return;
  }

  // Parse-only mode
  if (flags.has('--parse')) {
    try {
      const tokens = new Lexer(source).tokenize();
      const ast = new Parser().parse(tokens);
      console.log(JSON.stringify(ast, null, 2));
    } catch (e) {
      console.error(errorMessage(e));
      process.exit(1);
    }
    return;
  }

  // Full execution
  const config = applyTransformerFlags(loadConfigForScript(filePath, explicitConfig), args);
  const session = createSession({ config, trace: traceEnabled, status, apiKey: process.env.ANTHROPIC_API_KEY });
  try {
    await session.execute(source);
  } catch (error) {
    status.stop();
    reportError(error);
    process.exitCode = 1;
  } finally {
    session.close();
  }
}

main().catch(error => {
  console.error(`Fatal: ${errorMessage(error)}`);
  process.exit(1);
});
