/**
 * Sandboxed execution adapter — runs guest-language snippets through the
 * host toolchains in a scratch directory per run.
 *
 * "Sandbox" here means an isolated working directory, not OS-level
 * isolation. There is no timeout and no automatic retry.
 */

import { execFile } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { contentHash } from './cache';
import { RiftError } from './errors';
import { Language, normalizeLanguage } from './languages';
import { Command, TOOLCHAINS } from './toolchains';

// ─── Process runner ─────────────────────────────────────

export interface ProcessResult {
  stdout: string;
  stderr: string;
  /** null when the process never started or was killed by a signal. */
  exitCode: number | null;
  /** Set when the executable could not be launched at all. */
  spawnError?: string;
}

export interface ProcessRunner {
  run(command: string, args: string[], options: { cwd: string }): Promise<ProcessResult>;
}

const MAX_OUTPUT = 64 * 1024 * 1024;

export const execFileRunner: ProcessRunner = {
  run(command, args, options) {
    return new Promise(resolve => {
      execFile(command, args, { cwd: options.cwd, maxBuffer: MAX_OUTPUT }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
        } else if (typeof error.code === 'number') {
          resolve({ stdout, stderr, exitCode: error.code });
        } else if (typeof error.code === 'string') {
          resolve({ stdout, stderr, exitCode: null, spawnError: error.message });
        } else {
          resolve({ stdout, stderr, exitCode: null });
        }
      });
    });
  },
};

// ─── Executor ───────────────────────────────────────────

export interface ExecutionResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CodeExecutor {
  execute(language: string, code: string, deps: string[]): Promise<ExecutionResult>;
}

export interface SandboxOptions {
  /** Root for the per-run `<hash>-XXXXXX` directories. Defaults to <tmpdir>/rift. */
  workDir?: string;
  runner?: ProcessRunner;
  /** Languages whose scratch directory is kept after the run. Defaults to ['rust']. */
  retainLanguages?: string[];
  log?: (message: string) => void;
}

export class SandboxExecutor implements CodeExecutor {
  readonly workDir: string;
  private runner: ProcessRunner;
  private retainLanguages: Set<string>;
  private log: (message: string) => void;

  constructor(options: SandboxOptions = {}) {
    this.workDir = options.workDir ?? path.join(os.tmpdir(), 'rift');
    this.runner = options.runner ?? execFileRunner;
    this.retainLanguages = new Set(options.retainLanguages ?? ['rust']);
    this.log = options.log ?? (() => {});
  }

  async execute(language: string, code: string, deps: string[]): Promise<ExecutionResult> {
    const lang = normalizeLanguage(language);
    if (!lang) {
      throw new RiftError('UnsupportedLanguage', `Unsupported language '${language}'`, { language });
    }
    const toolchain = TOOLCHAINS[lang];

    await this.materialize(lang, this.workDir, () => fs.promises.mkdir(this.workDir, { recursive: true }));

    const probe = await this.exec(toolchain.probe);
    if (probe.spawnError !== undefined || probe.exitCode !== 0) {
      throw new RiftError('ToolchainNotFound', `No working toolchain for ${lang} (${toolchain.probe.command})`, {
        language: lang,
        stderr: probe.spawnError ?? probe.stderr,
      });
    }

    if (toolchain.install) {
      for (const dependency of deps) {
        const result = await this.exec(toolchain.install(dependency));
        if (result.spawnError !== undefined || result.exitCode !== 0) {
          throw new RiftError('DependencyInstallFailed', `Failed to install ${dependency} for ${lang}`, {
            language: lang,
            dependency,
            stderr: result.spawnError ?? result.stderr,
          });
        }
      }
    }

    // One directory per run, so concurrent runs of the same snippet never share files.
    const prefix = path.join(this.workDir, `${contentHash(code)}-`);
    const dir = await this.materialize(lang, prefix, () => fs.promises.mkdtemp(prefix));
    const source = path.join(dir, toolchain.sourceFile(code));

    try {
      await this.materialize(lang, source, () => fs.promises.writeFile(source, code, 'utf-8'));

      if (toolchain.compile) {
        const compiled = await this.exec(toolchain.compile(dir, source));
        if (compiled.spawnError !== undefined || compiled.exitCode !== 0) {
          throw new RiftError('ExecutionFailed', `${lang} compilation failed`, {
            language: lang,
            stage: 'compile',
            exitCode: compiled.exitCode,
            stderr: compiled.spawnError ?? compiled.stderr,
          });
        }
      }

      const ran = await this.exec(toolchain.run(dir, source));
      if (ran.spawnError !== undefined || ran.exitCode !== 0) {
        throw new RiftError('ExecutionFailed', `${lang} snippet exited with ${ran.exitCode ?? 'no exit code'}`, {
          language: lang,
          stage: 'run',
          exitCode: ran.exitCode,
          stderr: ran.spawnError ?? ran.stderr,
        });
      }
      return { stdout: ran.stdout, stderr: ran.stderr, exitCode: 0 };
    } finally {
      if (!this.retainLanguages.has(lang)) {
        await this.cleanup(dir);
      }
    }
  }

  private async materialize<T>(lang: Language, target: string, write: () => Promise<T>): Promise<T> {
    try {
      return await write();
    } catch (e) {
      throw new RiftError('ExecutionFailed', `Could not write ${lang} snippet to ${target}`, {
        language: lang,
        stderr: e instanceof Error ? e.message : String(e),
      });
    }
  }

  private exec(command: Command): Promise<ProcessResult> {
    return this.runner.run(command.command, command.args, { cwd: this.workDir });
  }

  private async cleanup(dir: string): Promise<void> {
    try {
      await fs.promises.rm(dir, { recursive: true, force: true });
    } catch (e) {
      this.log(`Could not remove ${dir}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
}
