import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { contentHash } from '../src/runtime/cache';
import { DeploymentOrchestrator, compileArtifact, sleep } from '../src/runtime/deploy';
import { Environment } from '../src/runtime/environment';
import { DeployError, RiftError } from '../src/runtime/errors';
import {
  ChainClient,
  CloudClient,
  ContractDeployment,
  DeployTarget,
  FunctionDefinition,
  LocalTarget,
  createDefaultTargets,
} from '../src/runtime/targets';

class RecordingChainClient implements ChainClient {
  requests: ContractDeployment[] = [];
  async deployContract(request: ContractDeployment): Promise<string> {
    this.requests.push(request);
    return `${request.network}:${request.address}`;
  }
}

class RecordingCloudClient implements CloudClient {
  uploads: { region: string; bucket: string; key: string; body: string }[] = [];
  functions: FunctionDefinition[] = [];
  async putObject(request: { region: string; bucket: string; key: string; body: string }): Promise<void> {
    this.uploads.push(request);
  }
  async createFunction(definition: FunctionDefinition): Promise<string> {
    this.functions.push(definition);
    return `lambda:${definition.name}`;
  }
}

/** Fails the first `failures` attempts, then succeeds. */
function flakyTarget(name: 'ethereum' | 'solana' | 'aws' | 'local', failures: number): DeployTarget & { attempts: number } {
  return {
    name,
    requiredKeys: [],
    attempts: 0,
    async deploy() {
      this.attempts++;
      if (this.attempts <= failures) throw new Error(`attempt ${this.attempts} failed`);
      return `${name}-ok`;
    },
  };
}

const FULL_CONFIG = {
  api_key: 'test-key',
  contract: '0xabc',
  rpc_url: 'http://localhost:8899',
  program_id: 'prog1',
  region: 'us-east-1',
  bucket: 'artifacts',
  function: 'handler',
  role: 'arn:role/test',
};

describe('DeploymentOrchestrator', () => {
  let outputDir: string;
  let chain: RecordingChainClient;
  let cloud: RecordingCloudClient;
  let delays: number[];

  const log = jest.fn();
  const recordSleep = async (ms: number) => { delays.push(ms); };

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rift-deploy-test-'));
    chain = new RecordingChainClient();
    cloud = new RecordingCloudClient();
    delays = [];
    log.mockReset();
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  function orchestrator(extra: Partial<ConstructorParameters<typeof DeploymentOrchestrator>[0]> = {}) {
    return new DeploymentOrchestrator({
      targets: createDefaultTargets({ outputDir, log, chainClient: chain, cloudClient: cloud, now: () => 1_700_000_000_500 }),
      sleep: recordSleep,
      log,
      ...extra,
    });
  }

  describe('select()', () => {
    it('should pick every sink for "all"', () => {
      expect(orchestrator().select('all').map(t => t.name)).toEqual(['ethereum', 'solana', 'aws', 'local']);
    });

    it('should pick sinks whose name occurs in the selector', () => {
      expect(orchestrator().select('aws').map(t => t.name)).toEqual(['aws']);
      expect(orchestrator().select('solana+local').map(t => t.name)).toEqual(['solana', 'local']);
      expect(orchestrator().select('azure')).toEqual([]);
    });
  });

  it('should deploy to every sink with the expected requests', async () => {
    const reports = await orchestrator().deploy('all', FULL_CONFIG, 'payload');

    expect(reports).toEqual([
      { target: 'ethereum', attempts: 1, location: 'ethereum:0xabc' },
      { target: 'solana', attempts: 1, location: 'solana:prog1' },
      { target: 'aws', attempts: 1, location: 'lambda:handler' },
      { target: 'local', attempts: 1, location: path.join(outputDir, 'rift_artifact_1700000000') },
    ]);
    expect(chain.requests).toEqual([
      { network: 'ethereum', endpoint: 'https://mainnet.infura.io/v3/test-key', address: '0xabc', payload: 'payload' },
      { network: 'solana', endpoint: 'http://localhost:8899', address: 'prog1', payload: 'payload' },
    ]);
    expect(cloud.uploads).toEqual([{ region: 'us-east-1', bucket: 'artifacts', key: 'handler.zip', body: 'payload' }]);
    expect(cloud.functions[0]).toMatchObject({ runtime: 'provided.al2', handler: 'main', role: 'arn:role/test', key: 'handler.zip' });
    expect(fs.readFileSync(path.join(outputDir, 'rift_artifact_1700000000'), 'utf-8')).toBe('payload');
  });

  it('should fail fast on missing keys without calling the client', async () => {
    const error = await orchestrator().deploy('ethereum', { api_key: 'test-key' }, 'p').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeployError);
    expect(error).toMatchObject({
      failures: [{ errorType: 'DeployConfigMissing', details: { target: 'ethereum', key: 'contract' } }],
    });
    expect(chain.requests).toHaveLength(0);
    expect(delays).toEqual([]);
  });

  it('should merge configured defaults under the statement config', async () => {
    const o = orchestrator({ defaults: { aws: { region: 'eu-west-1', role: 'arn:role/default' } } });
    await o.deploy('aws', { bucket: 'b', function: 'fn', region: 'us-west-2' }, 'p');

    expect(cloud.uploads[0].region).toBe('us-west-2');
    expect(cloud.functions[0].role).toBe('arn:role/default');
  });

  it('should retry with exponential backoff and then succeed', async () => {
    const target = flakyTarget('local', 2);
    const reports = await orchestrator({ targets: [target] }).deploy('local', {}, 'p');

    expect(reports).toEqual([{ target: 'local', attempts: 3, location: 'local-ok' }]);
    expect(delays).toEqual([200, 400]);
  });

  it('should give up after three retries', async () => {
    const target = flakyTarget('solana', 10);
    const error = await orchestrator({ targets: [target] }).deploy('solana', {}, 'p').catch((e: unknown) => e);

    expect(target.attempts).toBe(4);
    expect(delays).toEqual([200, 400, 800]);
    expect(error).toMatchObject({
      errorType: 'DeployFailed',
      failures: [{ errorType: 'DeployFailed', details: { target: 'solana', attempts: 4 } }],
    });
  });

  it('should let every sink finish and collect all failures', async () => {
    const good = flakyTarget('local', 0);
    const bad = flakyTarget('aws', 10);
    const error = await orchestrator({ targets: [bad, good], maxRetries: 1 })
      .deploy('all', {}, 'p')
      .catch((e: unknown) => e);

    expect(good.attempts).toBe(1);
    expect(bad.attempts).toBe(2);
    expect(error).toBeInstanceOf(DeployError);
    if (error instanceof DeployError) {
      expect(error.failures.map(f => f.details.target)).toEqual(['aws']);
      expect(error.message).toBe('DeployFailed: 1 deployment target(s) failed: aws');
    }
  });

  it('should succeed with an empty report when nothing matches', async () => {
    await expect(orchestrator().deploy('gcp', {}, 'p')).resolves.toEqual([]);
    expect(log).toHaveBeenCalledWith("No deployment targets match 'gcp'");
  });

  it('should pass the payload through the codec', async () => {
    const target = flakyTarget('local', 0);
    const deploy = jest.spyOn(target, 'deploy');
    await orchestrator({ targets: [target], codec: { encode: p => p.toUpperCase() } }).deploy('local', {}, 'abc');

    expect(deploy).toHaveBeenCalledWith({}, 'ABC');
  });
});

describe('sleep()', () => {
  it('should reject with Cancelled once the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ errorType: 'Cancelled' });
  });

  it('should reject immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(RiftError);
  });
});

describe('LocalTarget', () => {
  it('should name artifacts by unix seconds', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rift-local-test-'));
    try {
      const location = await new LocalTarget(dir, () => 42_999).deploy({}, 'data');
      expect(location).toBe(path.join(dir, 'rift_artifact_42'));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('compileArtifact()', () => {
  it('should use cached outputs and fall back to language-tagged source', async () => {
    const env = new Environment();
    await env.write(state => {
      state.rifts.set('first', [
        { type: 'Fuse', language: 'python', code: 'print(1)' },
        { type: 'Let', name: 'x', value: { type: 'NumberLiteral', value: 1 } },
        { type: 'Fuse', language: 'go', code: 'package main' },
      ]);
      state.rifts.set('second', [{ type: 'Fuse', language: 'php', code: 'echo 2;' }]);
      state.artifactCache.set(contentHash('print(1)'), '1\n');
    });

    expect(await env.read(compileArtifact)).toBe('1\n\ngo: package main\nphp: echo 2;');
  });
});
