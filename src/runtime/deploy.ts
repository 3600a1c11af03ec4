import { contentHash } from './cache';
import { EnvironmentView } from './environment';
import { DeployError, RiftError, isRiftError } from './errors';
import { SilentStatusReporter, StatusReporter } from './status';
import { DeployTarget } from './targets';

// ─── Payload ────────────────────────────────────────────

/**
 * Assemble the deployment payload: for each rift in insertion order, each
 * direct fuse child contributes its cached output, or `language: code`
 * when it has not run yet.
 */
export function compileArtifact(view: EnvironmentView): string {
  const parts: string[] = [];
  for (const body of view.rifts.values()) {
    for (const stmt of body) {
      if (stmt.type !== 'Fuse') continue;
      const cached = view.artifactCache.get(contentHash(stmt.code));
      parts.push(cached ?? `${stmt.language}: ${stmt.code}`);
    }
  }
  return parts.join('\n');
}

export interface PayloadCodec {
  encode(payload: string): string;
}

export const IdentityCodec: PayloadCodec = {
  encode: payload => payload,
};

// ─── Timing ─────────────────────────────────────────────

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

function cancelled(): RiftError {
  return new RiftError('Cancelled', 'Session was cancelled');
}

export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelled());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

// ─── Orchestrator ───────────────────────────────────────

export interface DeployReport {
  target: string;
  attempts: number;
  location: string;
}

export interface DeploymentOrchestratorOptions {
  targets: DeployTarget[];
  /** Retries after the first failure. Defaults to 3. */
  maxRetries?: number;
  /** Delay before retry n is baseDelayMs * 2^n. Defaults to 100. */
  baseDelayMs?: number;
  sleep?: Sleep;
  codec?: PayloadCodec;
  /** Per-target config values used when the deploy statement omits them. */
  defaults?: Record<string, Record<string, string>>;
  status?: StatusReporter;
  log?: (message: string) => void;
}

export class DeploymentOrchestrator {
  private targets: DeployTarget[];
  private maxRetries: number;
  private baseDelayMs: number;
  private sleep: Sleep;
  private codec: PayloadCodec;
  private defaults: Record<string, Record<string, string>>;
  private status: StatusReporter;
  private log: (message: string) => void;

  constructor(options: DeploymentOrchestratorOptions) {
    this.targets = options.targets;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 100;
    this.sleep = options.sleep ?? sleep;
    this.codec = options.codec ?? IdentityCodec;
    this.defaults = options.defaults ?? {};
    this.status = options.status ?? new SilentStatusReporter();
    this.log = options.log ?? console.log;
  }

  /** `"all"` picks every sink; otherwise every sink whose name occurs in the selector. */
  select(selector: string): DeployTarget[] {
    if (selector === 'all') return [...this.targets];
    return this.targets.filter(t => selector.includes(t.name));
  }

  /**
   * Deploy the payload to every selected sink. Sinks run independently
   * and all run to completion; if any failed, a DeployError listing every
   * failure is thrown.
   */
  async deploy(
    selector: string,
    config: Record<string, string>,
    payload: string,
    signal?: AbortSignal,
  ): Promise<DeployReport[]> {
    const selected = this.select(selector);
    if (selected.length === 0) {
      this.log(`No deployment targets match '${selector}'`);
      return [];
    }

    const encoded = this.codec.encode(payload);
    const results = await Promise.allSettled(
      selected.map(target => this.deployTo(target, { ...this.defaults[target.name], ...config }, encoded, signal)),
    );

    const reports: DeployReport[] = [];
    const failures: RiftError[] = [];
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        reports.push(result.value);
      } else {
        failures.push(this.toRiftError(selected[i].name, result.reason));
      }
    });

    if (signal?.aborted) throw cancelled();
    if (failures.length > 0) throw new DeployError(failures);
    return reports;
  }

  private async deployTo(
    target: DeployTarget,
    config: Record<string, string>,
    payload: string,
    signal?: AbortSignal,
  ): Promise<DeployReport> {
    for (const key of target.requiredKeys) {
      if (config[key] === undefined || config[key] === '') {
        throw new RiftError('DeployConfigMissing', `${target.name} deployment requires '${key}'`, {
          target: target.name,
          key,
        });
      }
    }

    let attempts = 0;
    const task = this.status.start(`Deploying to ${target.name}...`);
    for (;;) {
      if (signal?.aborted) {
        task.fail(`${target.name} deployment cancelled`);
        throw cancelled();
      }
      try {
        const location = await target.deploy(config, payload);
        attempts++;
        task.succeed(`Deployed to ${target.name}`);
        this.log(`Deployed to ${target.name}: ${location}`);
        return { target: target.name, attempts, location };
      } catch (e) {
        attempts++;
        const message = e instanceof Error ? e.message : String(e);
        if (attempts > this.maxRetries) {
          task.fail(`${target.name} deployment failed`);
          throw new RiftError('DeployFailed', `${target.name} failed after ${attempts} attempts: ${message}`, {
            target: target.name,
            attempts,
          });
        }
        const delay = this.baseDelayMs * 2 ** attempts;
        this.log(`${target.name} deployment failed (attempt ${attempts}), retrying in ${delay}ms: ${message}`);
        try {
          await this.sleep(delay, signal);
        } catch (error) {
          task.fail(`${target.name} deployment cancelled`);
          throw error;
        }
      }
    }
  }

  private toRiftError(target: string, reason: unknown): RiftError {
    if (isRiftError(reason)) return reason;
    const message = reason instanceof Error ? reason.message : String(reason);
    return new RiftError('DeployFailed', message, { target });
  }
}
