import { Lexer } from '../lexer/lexer';
import { Parser } from '../parser/parser';
import * as AST from '../parser/ast';
import { ClaudeTransformer } from './claude-transformer';
import { RiftConfig } from './config';
import { DeploymentOrchestrator } from './deploy';
import { Environment } from './environment';
import { Deployer, Interpreter } from './interpreter';
import { DependencyResolver } from './resolver';
import { CodeExecutor, SandboxExecutor } from './sandbox';
import { SilentStatusReporter, StatusReporter } from './status';
import { createDefaultTargets } from './targets';
import { CodeTransformer, TemplateTransformer } from './transform';
import { loadTreeSitterAdapters } from './tree-sitter';

export function parse(source: string): AST.Program {
  const tokens = new Lexer(source).tokenize();
  return new Parser().parse(tokens);
}

export interface SessionOptions {
  config?: RiftConfig;
  trace?: boolean;
  log?: (message: string) => void;
  status?: StatusReporter;
  /** Overrides for the collaborators normally built from config. */
  resolver?: DependencyResolver;
  executor?: CodeExecutor;
  transformer?: CodeTransformer;
  deployer?: Deployer;
  /** Used when the transformer provider is "claude". */
  apiKey?: string;
}

/**
 * One interpreter plus one environment. A REPL keeps a single session
 * alive so rifts, variables and cached artifacts carry across inputs.
 */
export class Session {
  readonly env = new Environment();
  private controller = new AbortController();

  constructor(private interpreter: Interpreter) {}

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  /** Parse and run a source string. */
  async execute(source: string): Promise<void> {
    return this.run(parse(source));
  }

  run(program: AST.Program): Promise<void> {
    return this.interpreter.interpret(program, this.env, this.controller.signal);
  }

  /** Forget every rift, task, variable and cached artifact. */
  reset(): Promise<void> {
    return this.env.clear();
  }

  /** Stop scheduling new work. Running subprocesses are left to finish. */
  close(): void {
    this.controller.abort();
  }
}

export function createTransformer(config: RiftConfig, apiKey?: string): CodeTransformer {
  const settings = config.transformer ?? {};
  if (settings.provider === 'claude') {
    return new ClaudeTransformer({ apiKey, model: settings.model, maxTokens: settings.maxTokens });
  }
  return TemplateTransformer.fromFile(settings.templates);
}

export function createSession(options: SessionOptions = {}): Session {
  const config = options.config ?? {};
  const log = options.log ?? console.log;
  const status = options.status ?? new SilentStatusReporter();

  const deployer = options.deployer ?? new DeploymentOrchestrator({
    targets: createDefaultTargets({
      outputDir: config.deploy?.outputDir ?? process.cwd(),
      log,
    }),
    maxRetries: config.deploy?.maxRetries,
    baseDelayMs: config.deploy?.baseDelayMs,
    defaults: config.deploy?.defaults,
    status,
    log,
  });

  const interpreter = new Interpreter({
    resolver: options.resolver ?? new DependencyResolver(loadTreeSitterAdapters()),
    executor: options.executor ?? new SandboxExecutor({
      workDir: config.workDir,
      retainLanguages: config.retainLanguages,
      log,
    }),
    transformer: options.transformer ?? createTransformer(config, options.apiKey),
    deployer,
    maxIterations: config.maxIterations,
    trace: options.trace,
    log,
    status,
  });

  return new Session(interpreter);
}
