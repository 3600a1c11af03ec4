import * as AST from '../parser/ast';
import { contentHash } from './cache';
import { DeployReport, compileArtifact } from './deploy';
import { Environment } from './environment';
import { RiftError } from './errors';
import { displayName, normalizeLanguage } from './languages';
import { DependencyResolver } from './resolver';
import { CodeExecutor } from './sandbox';
import { SilentStatusReporter, StatusReporter } from './status';
import { CodeTransformer } from './transform';

export interface Deployer {
  deploy(selector: string, config: Record<string, string>, payload: string, signal?: AbortSignal): Promise<DeployReport[]>;
}

export interface InterpreterOptions {
  resolver: DependencyResolver;
  executor: CodeExecutor;
  transformer: CodeTransformer;
  /** Without one, `@deploy` fails with UnsupportedOperation. */
  deployer?: Deployer;
  /** Upper bound on while-loop bodies. Defaults to 10,000. */
  maxIterations?: number;
  /** Used by optimize when no `@target` has been set. Defaults to rust. */
  defaultTargetLanguage?: string;
  trace?: boolean;
  log?: (message: string) => void;
  status?: StatusReporter;
}

export const OPTIMIZE = 'optimize';

export class Interpreter {
  private resolver: DependencyResolver;
  private executor: CodeExecutor;
  private transformer: CodeTransformer;
  private deployer?: Deployer;
  private maxIterations: number;
  private defaultTargetLanguage: string;
  private traceEnabled: boolean;
  private log: (message: string) => void;
  private status: StatusReporter;

  constructor(options: InterpreterOptions) {
    this.resolver = options.resolver;
    this.executor = options.executor;
    this.transformer = options.transformer;
    this.deployer = options.deployer;
    this.maxIterations = options.maxIterations ?? 10_000;
    this.defaultTargetLanguage = options.defaultTargetLanguage ?? 'rust';
    this.traceEnabled = options.trace ?? false;
    this.log = options.log ?? console.log;
    this.status = options.status ?? new SilentStatusReporter();
  }

  /**
   * Evaluate a node against the environment. Top-level program statements
   * run concurrently; bodies of calls, branches and loops run in order.
   * Once `signal` is aborted no further node starts.
   */
  async interpret(node: AST.Node, env: Environment, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new RiftError('Cancelled', 'Session was cancelled', {}, node.position);
    }

    switch (node.type) {
      case 'Program':
        return this.runConcurrently(node.body, env, signal);

      case 'Rift': {
        const { name, body } = node;
        await env.write(state => { state.rifts.set(name, body); });
        this.trace(`Registered rift ${name} (${body.length} statements)`);
        return;
      }

      case 'Task': {
        const { name, body } = node;
        await env.write(state => { state.tasks.set(name, body); });
        this.trace(`Registered task ${name} (${body.length} statements)`);
        return;
      }

      case 'Target': {
        const { language } = node;
        await env.write(state => { state.targetLanguage = language; });
        this.trace(`Target language set to ${language}`);
        return;
      }

      case 'Fuse':
        return this.executeFuse(node, env);

      case 'Let':
        return this.executeLet(node, env);

      case 'Call':
        return this.executeCall(node, env, signal);

      case 'If': {
        const branch = await this.evaluateCondition(node.condition, env) ? node.thenBody : node.elseBody;
        return this.runSequentially(branch, env, signal);
      }

      case 'While':
        return this.executeWhile(node, env, signal);

      case 'Deploy':
        return this.executeDeploy(node, env, signal);

      case 'NumberLiteral':
      case 'StringLiteral':
      case 'Identifier':
        throw new RiftError('UnsupportedOperation', `Cannot execute a bare ${node.type} as a statement`, {}, node.position);
    }
  }

  // ─── Control flow ───────────────────────────────────────

  /** Fail-fast: the first error aborts the siblings' signal and is rethrown. */
  private async runConcurrently(body: readonly AST.Statement[], env: Environment, signal?: AbortSignal): Promise<void> {
    const controller = new AbortController();
    const forward = () => controller.abort();
    signal?.addEventListener('abort', forward, { once: true });

    try {
      await Promise.all(body.map(stmt =>
        this.interpret(stmt, env, controller.signal).catch((error: unknown) => {
          controller.abort();
          throw error;
        }),
      ));
    } finally {
      signal?.removeEventListener('abort', forward);
    }
  }

  private async runSequentially(body: readonly AST.Statement[], env: Environment, signal?: AbortSignal): Promise<void> {
    for (const stmt of body) {
      await this.interpret(stmt, env, signal);
    }
  }

  private async executeWhile(node: AST.WhileStatement, env: Environment, signal?: AbortSignal): Promise<void> {
    let iterations = 0;
    while (await this.evaluateCondition(node.condition, env)) {
      if (iterations >= this.maxIterations) {
        throw new RiftError(
          'IterationLimitExceeded',
          `while loop exceeded ${this.maxIterations} iterations`,
          { iterations },
          node.position,
        );
      }
      iterations++;
      await this.runSequentially(node.body, env, signal);
    }
    this.trace(`while loop finished after ${iterations} iteration(s)`);
  }

  /** Conditions are numbers, nonzero meaning true. An identifier must hold a number. */
  private async evaluateCondition(condition: AST.Expression, env: Environment): Promise<boolean> {
    let value: AST.Literal;
    if (condition.type === 'Identifier') {
      const { name } = condition;
      const found = await env.read(view => view.variables.get(name));
      if (!found) {
        throw new RiftError('VariableNotFound', `Variable '${name}' is not defined`, { name }, condition.position);
      }
      value = found;
    } else {
      value = condition;
    }

    if (value.type !== 'NumberLiteral') {
      throw new RiftError('UnsupportedOperation', 'Condition must be a number', {}, condition.position);
    }
    return value.value !== 0;
  }

  // ─── Statements ─────────────────────────────────────────

  private async executeFuse(node: AST.Fuse, env: Environment): Promise<void> {
    const hash = contentHash(node.code);
    const cached = await env.read(view => view.artifactCache.get(hash));
    if (cached !== undefined) {
      this.log(`Using cached artifact: ${hash}`);
      return;
    }

    const language = normalizeLanguage(node.language);
    if (!language) {
      throw new RiftError('UnsupportedLanguage', `Unsupported language '${node.language}'`, { language: node.language }, node.position);
    }

    let deps: string[] = [];
    if (this.resolver.supports(language)) {
      deps = this.resolver.resolve(language, node.code);
      this.trace(`${language} dependencies: ${deps.length > 0 ? deps.join(', ') : '(none)'}`);
    } else {
      this.trace(`No syntax adapter for ${language}; skipping dependency detection`);
    }

    const task = this.status.start(`Running ${displayName(language)} snippet...`);
    let stdout: string;
    try {
      ({ stdout } = await this.executor.execute(language, node.code, deps));
    } catch (error) {
      task.fail(`${displayName(language)} snippet failed`);
      throw error;
    }
    task.succeed(`${displayName(language)} snippet finished`);

    await env.write(state => { state.artifactCache.set(hash, stdout); });
    this.log(`${node.language} output: ${stdout.trimEnd()}`);
  }

  private async executeLet(node: AST.Let, env: Environment): Promise<void> {
    const value = node.value;
    await env.write(state => {
      if (value.type === 'Identifier') {
        const found = state.variables.get(value.name);
        if (!found) {
          throw new RiftError('VariableNotFound', `Variable '${value.name}' is not defined`, { name: value.name }, value.position);
        }
        state.variables.set(node.name, found);
      } else {
        state.variables.set(node.name, value);
      }
    });
    this.trace(`let ${node.name}`);
  }

  private async executeCall(node: AST.Call, env: Environment, signal?: AbortSignal): Promise<void> {
    if (node.name === OPTIMIZE) {
      return this.optimize(node.args[0], env);
    }

    // Rifts shadow tasks of the same name
    const body = await env.read(view => view.rifts.get(node.name) ?? view.tasks.get(node.name));
    if (!body) {
      throw new RiftError('FunctionNotFound', `No rift or task named '${node.name}'`, { name: node.name }, node.position);
    }

    this.trace(`call ${node.name}`);
    await this.runSequentially(body, env, signal);
  }

  private async executeDeploy(node: AST.Deploy, env: Environment, signal?: AbortSignal): Promise<void> {
    if (!this.deployer) {
      throw new RiftError('UnsupportedOperation', 'No deployment targets are configured', {}, node.position);
    }
    const payload = await env.read(compileArtifact);
    const reports = await this.deployer.deploy(node.selector, node.config, payload, signal);
    this.trace(`deploy '${node.selector}' reached ${reports.length} target(s)`);
  }

  // ─── Optimize ───────────────────────────────────────────

  /**
   * Translate every fuse of a rift into the target language and store the
   * result as `optimized_<name>`. Snippets the transformer cannot map are
   * kept unchanged; the original rift is never modified.
   */
  private async optimize(arg: AST.Statement | undefined, env: Environment): Promise<void> {
    if (!arg) {
      throw new RiftError('UnsupportedOperation', 'Missing code to optimize');
    }

    let name: string;
    let body: readonly AST.Statement[];
    const targetSetting = await env.read(view => view.targetLanguage);

    if (arg.type === 'Rift') {
      name = arg.name;
      body = arg.body;
    } else if (arg.type === 'Identifier' || arg.type === 'StringLiteral') {
      const riftName = arg.type === 'Identifier' ? arg.name : arg.value;
      const stored = await env.read(view => view.rifts.get(riftName));
      if (!stored) {
        throw new RiftError('FunctionNotFound', `No rift named '${riftName}'`, { name: riftName }, arg.position);
      }
      name = riftName;
      body = stored;
    } else {
      throw new RiftError('UnsupportedOperation', 'Optimization requires a rift', {}, arg.position);
    }

    const target = targetSetting ?? this.defaultTargetLanguage;
    const optimized: AST.Statement[] = [];
    for (const stmt of body) {
      if (stmt.type !== 'Fuse') {
        optimized.push(stmt);
        continue;
      }
      this.log(`Rewriting ${displayName(stmt.language)} to ${displayName(target)}`);
      const translated = await this.transformer.translate(stmt.language, target, stmt.code);
      if (translated === null) {
        this.trace(`No ${stmt.language} -> ${target} mapping; keeping the original snippet`);
        optimized.push(stmt);
      } else {
        optimized.push({ type: 'Fuse', language: target, code: translated });
      }
    }

    const optimizedName = `optimized_${name}`;
    await env.write(state => { state.rifts.set(optimizedName, optimized); });
    this.log(`Stored optimized rift ${optimizedName}`);
  }

  private trace(message: string): void {
    if (this.traceEnabled) {
      this.log(`  [trace] ${message}`);
    }
  }
}
