import * as AST from '../parser/ast';
import { SUPPORTED_LANGUAGES } from './languages';

export type RiftErrorType =
  | 'ParseError'
  | 'UnsupportedLanguage'
  | 'ToolchainNotFound'
  | 'DependencyInstallFailed'
  | 'ExecutionFailed'
  | 'VariableNotFound'
  | 'FunctionNotFound'
  | 'IterationLimitExceeded'
  | 'DeployConfigMissing'
  | 'DeployFailed'
  | 'CacheError'
  | 'UnsupportedOperation'
  | 'Cancelled';

/** Structured context attached to an error; which fields are set depends on the type. */
export interface RiftErrorDetails {
  language?: string;
  dependency?: string;
  stderr?: string;
  target?: string;
  attempts?: number;
  stage?: 'compile' | 'run';
  exitCode?: number | null;
  key?: string;
  iterations?: number;
  name?: string;
}

/** Rift runtime error. The message is prefixed with its type. */
export class RiftError extends Error {
  constructor(
    public errorType: RiftErrorType,
    message: string,
    public details: RiftErrorDetails = {},
    public position?: AST.Position,
  ) {
    super(`${errorType}: ${message}`);
    this.name = 'RiftError';
  }
}

/**
 * Raised by a deployment when one or more selected sinks failed.
 * Every sink still ran to completion; `failures` holds one error per failed sink.
 */
export class DeployError extends RiftError {
  constructor(public failures: RiftError[]) {
    super(
      'DeployFailed',
      `${failures.length} deployment target(s) failed: ${failures.map(f => f.details.target ?? '?').join(', ')}`,
    );
    this.name = 'DeployError';
  }
}

export function isRiftError(error: unknown, type?: RiftErrorType): error is RiftError {
  return error instanceof RiftError && (type === undefined || error.errorType === type);
}

/** REPL hint for the error types a user can fix by retyping. */
export function errorHint(error: RiftError): string | undefined {
  switch (error.errorType) {
    case 'UnsupportedLanguage':
      return `Supported languages are: ${SUPPORTED_LANGUAGES.join(', ')}`;
    case 'ParseError':
      return "Check syntax. Use 'help' for examples";
    default:
      return undefined;
  }
}

/**
 * Lines shown to the user for a failed run. A deploy failure lists every
 * sink that failed, each with its own message and captured stderr.
 */
export function errorReport(error: unknown): string[] {
  const lines = [`Error: ${error instanceof Error ? error.message : String(error)}`];
  if (!isRiftError(error)) return lines;

  if (error instanceof DeployError) {
    for (const failure of error.failures) {
      lines.push(`  - ${failure.message}`);
      if (failure.details.stderr) lines.push(`    ${failure.details.stderr.trimEnd()}`);
    }
  }
  if (error.details.stderr) lines.push(error.details.stderr.trimEnd());
  const hint = errorHint(error);
  if (hint) lines.push(`Hint: ${hint}`);
  return lines;
}
