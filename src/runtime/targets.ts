/**
 * Deployment sinks. Each sink declares the config keys it needs and
 * hands the payload to a client. The network protocols themselves live
 * behind ChainClient and CloudClient; the defaults here only log what
 * they would send.
 */

import * as fs from 'fs';
import * as path from 'path';

export const TARGET_NAMES = ['ethereum', 'solana', 'aws', 'local'] as const;
export type TargetName = typeof TARGET_NAMES[number];

export interface DeployTarget {
  name: TargetName;
  requiredKeys: readonly string[];
  /** Resolves to a human-readable location of the deployed artifact. */
  deploy(config: Record<string, string>, payload: string): Promise<string>;
}

// ─── Clients ────────────────────────────────────────────

export interface ContractDeployment {
  network: 'ethereum' | 'solana';
  endpoint: string;
  address: string;
  payload: string;
}

export interface ChainClient {
  deployContract(request: ContractDeployment): Promise<string>;
}

export interface FunctionDefinition {
  region: string;
  name: string;
  role: string;
  runtime: string;
  handler: string;
  bucket: string;
  key: string;
}

export interface CloudClient {
  putObject(request: { region: string; bucket: string; key: string; body: string }): Promise<void>;
  createFunction(definition: FunctionDefinition): Promise<string>;
}

export class DryRunChainClient implements ChainClient {
  constructor(private log: (message: string) => void) {}

  async deployContract(request: ContractDeployment): Promise<string> {
    this.log(`[${request.network}] would deploy ${request.payload.length} bytes to ${request.address} via ${request.endpoint}`);
    return `${request.network}:${request.address}`;
  }
}

export class DryRunCloudClient implements CloudClient {
  constructor(private log: (message: string) => void) {}

  async putObject(request: { region: string; bucket: string; key: string; body: string }): Promise<void> {
    this.log(`[aws] would upload s3://${request.bucket}/${request.key} (${request.region})`);
  }

  async createFunction(definition: FunctionDefinition): Promise<string> {
    this.log(`[aws] would create function ${definition.name} (${definition.runtime}, handler ${definition.handler})`);
    return `arn:aws:lambda:${definition.region}:function:${definition.name}`;
  }
}

// ─── Sinks ──────────────────────────────────────────────

export class EthereumTarget implements DeployTarget {
  readonly name = 'ethereum';
  readonly requiredKeys = ['api_key', 'contract'];

  constructor(private client: ChainClient) {}

  deploy(config: Record<string, string>, payload: string): Promise<string> {
    return this.client.deployContract({
      network: 'ethereum',
      endpoint: `https://mainnet.infura.io/v3/${config.api_key}`,
      address: config.contract,
      payload,
    });
  }
}

export class SolanaTarget implements DeployTarget {
  readonly name = 'solana';
  readonly requiredKeys = ['rpc_url', 'program_id'];

  constructor(private client: ChainClient) {}

  deploy(config: Record<string, string>, payload: string): Promise<string> {
    return this.client.deployContract({
      network: 'solana',
      endpoint: config.rpc_url,
      address: config.program_id,
      payload,
    });
  }
}

export class AwsTarget implements DeployTarget {
  readonly name = 'aws';
  readonly requiredKeys = ['region', 'bucket', 'function', 'role'];

  constructor(private client: CloudClient) {}

  async deploy(config: Record<string, string>, payload: string): Promise<string> {
    const key = `${config.function}.zip`;
    await this.client.putObject({ region: config.region, bucket: config.bucket, key, body: payload });
    return this.client.createFunction({
      region: config.region,
      name: config.function,
      role: config.role,
      runtime: 'provided.al2',
      handler: 'main',
      bucket: config.bucket,
      key,
    });
  }
}

export class LocalTarget implements DeployTarget {
  readonly name = 'local';
  readonly requiredKeys: readonly string[] = [];

  constructor(private outputDir: string, private now: () => number = Date.now) {}

  async deploy(_config: Record<string, string>, payload: string): Promise<string> {
    await fs.promises.mkdir(this.outputDir, { recursive: true });
    const file = path.join(this.outputDir, `rift_artifact_${Math.floor(this.now() / 1000)}`);
    await fs.promises.writeFile(file, payload, 'utf-8');
    return file;
  }
}

export interface DefaultTargetOptions {
  outputDir: string;
  log: (message: string) => void;
  chainClient?: ChainClient;
  cloudClient?: CloudClient;
  now?: () => number;
}

export function createDefaultTargets(options: DefaultTargetOptions): DeployTarget[] {
  const chain = options.chainClient ?? new DryRunChainClient(options.log);
  const cloud = options.cloudClient ?? new DryRunCloudClient(options.log);
  return [
    new EthereumTarget(chain),
    new SolanaTarget(chain),
    new AwsTarget(cloud),
    new LocalTarget(options.outputDir, options.now),
  ];
}
