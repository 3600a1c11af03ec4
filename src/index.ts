export { Lexer } from './lexer/lexer';
export { Token, TokenType } from './lexer/tokens';
export { Parser } from './parser/parser';
export * as AST from './parser/ast';
export { Interpreter, InterpreterOptions, Deployer } from './runtime/interpreter';
export { Environment, EnvironmentState, EnvironmentView, EnvironmentSummary } from './runtime/environment';
export { ArtifactCache, contentHash } from './runtime/cache';
export { ReadWriteLock } from './runtime/rwlock';
export { RiftError, RiftErrorType, RiftErrorDetails, DeployError, isRiftError, errorHint, errorReport } from './runtime/errors';
export { Language, SUPPORTED_LANGUAGES, normalizeLanguage, displayName } from './runtime/languages';
export { DependencyResolver, SyntaxNode, SyntaxTree, SyntaxTreeAdapter } from './runtime/resolver';
export { TreeSitterAdapter, loadTreeSitterAdapters } from './runtime/tree-sitter';
export { Toolchain, Command, TOOLCHAINS, javaClassName } from './runtime/toolchains';
export {
  SandboxExecutor,
  SandboxOptions,
  CodeExecutor,
  ExecutionResult,
  ProcessRunner,
  ProcessResult,
  execFileRunner,
} from './runtime/sandbox';
export {
  DeployTarget,
  TargetName,
  TARGET_NAMES,
  ChainClient,
  CloudClient,
  ContractDeployment,
  FunctionDefinition,
  EthereumTarget,
  SolanaTarget,
  AwsTarget,
  LocalTarget,
  DryRunChainClient,
  DryRunCloudClient,
  createDefaultTargets,
} from './runtime/targets';
export {
  DeploymentOrchestrator,
  DeploymentOrchestratorOptions,
  DeployReport,
  PayloadCodec,
  IdentityCodec,
  compileArtifact,
  sleep,
} from './runtime/deploy';
export { CodeTransformer, TemplateTransformer, TransformRule, parseTransformRules } from './runtime/transform';
export { ClaudeTransformer, ClaudeTransformerOptions } from './runtime/claude-transformer';
export { RiftConfig, loadConfig, loadConfigForScript, validateConfig } from './runtime/config';
export { StatusReporter, StatusTask, StatusStream, TerminalStatusReporter, SilentStatusReporter } from './runtime/status';
export { Session, SessionOptions, createSession, createTransformer, parse } from './runtime/session';

import { createSession, SessionOptions } from './runtime/session';

/**
 * Run a Rift source string in a fresh session.
 */
export async function execute(source: string, options?: SessionOptions): Promise<void> {
  const session = createSession(options);
  try {
    await session.execute(source);
  } finally {
    session.close();
  }
}
