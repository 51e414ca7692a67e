/**
 * Configuration loader
 *
 * Values are merged from defaults, an optional JSON file and the environment,
 * in that order.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigError, errorMessage } from '../errors';
import { ClientConfig, DaemonScheme, TlsClientOptions } from '../types';

export const DEFAULT_DOCKER_HOST = 'unix:///var/run/docker.sock';

export const ENV = {
  host: 'DOCKER_HOST',
  tlsVerify: 'DOCKER_TLS_VERIFY',
  certPath: 'DOCKER_CERT_PATH',
  version: 'DOCKER_API_VERSION',
  registry: 'DOCKERD_PULL_REGISTRY',
  timeout: 'DOCKERD_PULL_TIMEOUT',
  configFile: 'DOCKERD_PULL_CONFIG',
} as const;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** JSON config file; falls back to DOCKERD_PULL_CONFIG */
  file?: string;
  /** Values applied last, e.g. from command-line flags */
  overrides?: Partial<ClientConfig>;
}

const defaultConfig: Omit<ClientConfig, 'registry'> = {
  host: DEFAULT_DOCKER_HOST,
  scheme: 'http',
  version: '',
  timeout: 0,
};

function isScheme(value: unknown): value is DaemonScheme {
  return value === 'http' || value === 'https';
}

function parseTimeout(value: unknown, source: string): number {
  const timeout = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof timeout !== 'number' || !Number.isInteger(timeout) || timeout < 0) {
    throw new ConfigError(`${source}: timeout must be a non-negative integer, got ${JSON.stringify(value)}`);
  }
  return timeout;
}

function optionalString(record: Record<string, unknown>, key: string, source: string): string | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`${source}: "${key}" must be a string`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonFile(file: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigError(`${file}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Read a JSON config file. A missing file yields an empty config.
 */
export function readConfigFile(file: string): Partial<ClientConfig> {
  if (!fs.existsSync(file)) {
    return {};
  }

  const parsed = parseJsonFile(file);
  if (!isRecord(parsed)) {
    throw new ConfigError(`${file}: expected a JSON object`);
  }

  const config: Partial<ClientConfig> = {};
  const host = optionalString(parsed, 'host', file);
  const version = optionalString(parsed, 'version', file);
  const registry = optionalString(parsed, 'registry', file);
  const certPath = optionalString(parsed, 'certPath', file);
  if (host !== undefined) config.host = host;
  if (version !== undefined) config.version = version;
  if (registry !== undefined) config.registry = registry;
  if (certPath !== undefined) config.certPath = certPath;
  if (parsed.scheme !== undefined) {
    if (!isScheme(parsed.scheme)) {
      throw new ConfigError(`${file}: scheme must be "http" or "https"`);
    }
    config.scheme = parsed.scheme;
  }
  if (parsed.timeout !== undefined) {
    config.timeout = parseTimeout(parsed.timeout, file);
  }
  return config;
}

/**
 * Config values present in the environment
 */
export function readEnv(env: NodeJS.ProcessEnv): Partial<ClientConfig> {
  const host = env[ENV.host];
  const version = env[ENV.version];
  const registry = env[ENV.registry];
  const timeout = env[ENV.timeout];
  const certPath = env[ENV.certPath];

  const config: Partial<ClientConfig> = {};
  if (host) config.host = host;
  if (env[ENV.tlsVerify]) config.scheme = 'https';
  if (version !== undefined) config.version = version;
  if (registry) config.registry = registry;
  if (timeout) config.timeout = parseTimeout(timeout, ENV.timeout);
  if (certPath) config.certPath = certPath;
  return config;
}

/**
 * Check merged values and fill in the required ones
 */
export function validateConfig(config: Partial<ClientConfig>): ClientConfig {
  const merged = { ...defaultConfig, ...config };
  if (!merged.host) {
    throw new ConfigError('docker host is required');
  }
  if (!merged.registry) {
    throw new ConfigError(`registry is required (set ${ENV.registry} or "registry" in the config file)`);
  }
  if (!isScheme(merged.scheme)) {
    throw new ConfigError(`scheme must be "http" or "https", got "${merged.scheme}"`);
  }
  const validated: ClientConfig = {
    host: merged.host,
    scheme: merged.scheme,
    version: merged.version,
    registry: merged.registry,
    timeout: parseTimeout(merged.timeout, 'timeout'),
  };
  if (merged.certPath) validated.certPath = merged.certPath;
  return validated;
}

function readPem(certPath: string, name: string): Buffer | undefined {
  const file = path.join(certPath, name);
  if (!fs.existsSync(file)) {
    return undefined;
  }
  try {
    return fs.readFileSync(file);
  } catch (error) {
    throw new ConfigError(`${file}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Read ca.pem, cert.pem and key.pem from a certificate directory, the
 * layout docker uses for DOCKER_CERT_PATH. Missing files are left out.
 */
export function readTlsFiles(certPath: string): TlsClientOptions {
  const options: TlsClientOptions = {};
  const ca = readPem(certPath, 'ca.pem');
  const cert = readPem(certPath, 'cert.pem');
  const key = readPem(certPath, 'key.pem');
  if (ca) options.ca = ca;
  if (cert) options.cert = cert;
  if (key) options.key = key;
  return options;
}

/**
 * Load client configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): ClientConfig {
  const env = options.env ?? process.env;
  const file = options.file ?? env[ENV.configFile];

  return validateConfig({
    ...(file ? readConfigFile(file) : {}),
    ...readEnv(env),
    ...definedOnly(options.overrides ?? {}),
  });
}

function definedOnly(config: Partial<ClientConfig>): Partial<ClientConfig> {
  const result: Partial<ClientConfig> = {};
  if (config.host !== undefined) result.host = config.host;
  if (config.scheme !== undefined) result.scheme = config.scheme;
  if (config.version !== undefined) result.version = config.version;
  if (config.registry !== undefined) result.registry = config.registry;
  if (config.timeout !== undefined) result.timeout = config.timeout;
  if (config.certPath !== undefined) result.certPath = config.certPath;
  return result;
}
