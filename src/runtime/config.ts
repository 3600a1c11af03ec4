/**
 * Configuration loader for Rift.
 *
 * Loads rift.config.json (or .riftrc.json) and validates its shape.
 * Relative paths in the file are resolved against the file's directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { TARGET_NAMES } from './targets';

const CONFIG_FILENAMES = ['rift.config.json', '.riftrc.json'];

export interface DeployConfig {
  maxRetries?: number;
  baseDelayMs?: number;
  /** Where the local sink writes artifacts. */
  outputDir?: string;
  /** Per-target values merged under every `@deploy` statement's own keys. */
  defaults?: Record<string, Record<string, string>>;
}

export interface TransformerConfig {
  provider?: 'template' | 'claude';
  model?: string;
  maxTokens?: number;
  /** Rules file for the template transformer. */
  templates?: string;
}

export interface RiftConfig {
  workDir?: string;
  maxIterations?: number;
  retainLanguages?: string[];
  deploy?: DeployConfig;
  transformer?: TransformerConfig;
}

/**
 * Load Rift configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. rift.config.json / .riftrc.json in cwd
 *
 * Returns an empty config if no file is found.
 */
export function loadConfig(explicitPath?: string): RiftConfig {
  if (explicitPath) {
    return readConfigFile(path.resolve(explicitPath));
  }
  return findConfigIn(process.cwd()) ?? {};
}

/** Like loadConfig, but the script's own directory is searched before cwd. */
export function loadConfigForScript(scriptPath: string, explicitPath?: string): RiftConfig {
  if (explicitPath) return loadConfig(explicitPath);
  const scriptDir = path.dirname(path.resolve(scriptPath));
  return findConfigIn(scriptDir) ?? loadConfig();
}

function findConfigIn(dir: string): RiftConfig | undefined {
  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(dir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }
  return undefined;
}

function readConfigFile(filePath: string): RiftConfig {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return resolvePaths(validateConfig(data, filePath), path.dirname(filePath));
}

function resolvePaths(config: RiftConfig, baseDir: string): RiftConfig {
  const resolved: RiftConfig = { ...config };
  if (config.workDir) resolved.workDir = path.resolve(baseDir, config.workDir);
  if (config.deploy?.outputDir) {
    resolved.deploy = { ...config.deploy, outputDir: path.resolve(baseDir, config.deploy.outputDir) };
  }
  if (config.transformer?.templates) {
    resolved.transformer = { ...config.transformer, templates: path.resolve(baseDir, config.transformer.templates) };
  }
  return resolved;
}

// ─── Validation ─────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(obj: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw new Error(`Invalid "${key}" in ${where}: must be a string`);
  return value;
}

function optionalCount(obj: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid "${key}" in ${where}: must be a non-negative integer`);
  }
  return value;
}

function validateDeploy(value: unknown, filePath: string): DeployConfig {
  if (!isRecord(value)) throw new Error(`Invalid "deploy" in ${filePath}: must be an object`);

  const deploy: DeployConfig = {
    maxRetries: optionalCount(value, 'maxRetries', `deploy section of ${filePath}`),
    baseDelayMs: optionalCount(value, 'baseDelayMs', `deploy section of ${filePath}`),
    outputDir: optionalString(value, 'outputDir', `deploy section of ${filePath}`),
  };

  if (value.defaults !== undefined) {
    if (!isRecord(value.defaults)) {
      throw new Error(`Invalid "deploy.defaults" in ${filePath}: must be an object`);
    }
    const defaults: Record<string, Record<string, string>> = {};
    for (const [target, entries] of Object.entries(value.defaults)) {
      if (!TARGET_NAMES.some(name => name === target)) {
        throw new Error(`Unknown deployment target "${target}" in ${filePath}. Use one of: ${TARGET_NAMES.join(', ')}`);
      }
      if (!isRecord(entries)) {
        throw new Error(`Invalid defaults for "${target}" in ${filePath}: must be an object`);
      }
      const values: Record<string, string> = {};
      for (const [key, v] of Object.entries(entries)) {
        if (typeof v !== 'string' && typeof v !== 'number') {
          throw new Error(`Invalid default "${target}.${key}" in ${filePath}: must be a string or number`);
        }
        values[key] = String(v);
      }
      defaults[target] = values;
    }
    deploy.defaults = defaults;
  }
  return deploy;
}

function validateTransformer(value: unknown, filePath: string): TransformerConfig {
  if (!isRecord(value)) throw new Error(`Invalid "transformer" in ${filePath}: must be an object`);
  const where = `transformer section of ${filePath}`;

  const raw = value.provider;
  let provider: TransformerConfig['provider'];
  if (raw === 'template' || raw === 'claude') {
    provider = raw;
  } else if (raw !== undefined) {
    throw new Error(`Invalid "provider" in ${where}: must be "template" or "claude"`);
  }
  return {
    provider,
    model: optionalString(value, 'model', where),
    maxTokens: optionalCount(value, 'maxTokens', where),
    templates: optionalString(value, 'templates', where),
  };
}

/**
 * Validate config structure. Throws on invalid config.
 */
export function validateConfig(data: unknown, filePath: string): RiftConfig {
  if (!isRecord(data)) {
    throw new Error(`Invalid config in ${filePath}: must be a JSON object`);
  }

  const config: RiftConfig = {
    workDir: optionalString(data, 'workDir', filePath),
    maxIterations: optionalCount(data, 'maxIterations', filePath),
  };

  if (data.retainLanguages !== undefined) {
    const langs = data.retainLanguages;
    if (!Array.isArray(langs) || !langs.every((l: unknown): l is string => typeof l === 'string')) {
      throw new Error(`Invalid "retainLanguages" in ${filePath}: must be an array of strings`);
    }
    config.retainLanguages = langs;
  }
  if (data.deploy !== undefined) config.deploy = validateDeploy(data.deploy, filePath);
  if (data.transformer !== undefined) config.transformer = validateTransformer(data.transformer, filePath);

  return config;
}
