/**
 * Pull Image Command
 */

import { Command, InvalidArgumentError } from 'commander';
import { DockerDaemonClient } from '../../client';
import { loadConfig, readTlsFiles } from '../../config';
import { errorMessage } from '../../errors';
import { ClientConfig, DaemonScheme } from '../../types';

export interface PullCommandOptions {
  host?: string;
  scheme?: DaemonScheme;
  apiVersion?: string;
  registry?: string;
  timeout?: number;
  certPath?: string;
  config?: string;
}

/**
 * Pull an image through the daemon. Returns the process exit code.
 */
export async function pullImageCmd(repository: string, tag: string, options: PullCommandOptions = {}): Promise<number> {
  const overrides: Partial<ClientConfig> = {
    host: options.host,
    scheme: options.scheme,
    version: options.apiVersion,
    registry: options.registry,
    timeout: options.timeout,
    certPath: options.certPath,
  };

  let client: DockerDaemonClient | undefined;
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const config = loadConfig({ file: options.config, overrides });
    const tls = config.scheme === 'https' && config.certPath ? readTlsFiles(config.certPath) : undefined;
    client = new DockerDaemonClient({ ...config, tls });
    await client.imagePull(repository, tag, { signal: controller.signal });
    console.log(`Pulled ${config.registry}/${repository}:${tag}`);
    return 0;
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  } finally {
    process.removeListener('SIGINT', onSigint);
    client?.close();
  }
}

function parseScheme(value: string): DaemonScheme {
  if (value !== 'http' && value !== 'https') {
    throw new InvalidArgumentError(`scheme must be "http" or "https", got "${value}"`);
  }
  return value;
}

function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout < 0) {
    throw new InvalidArgumentError(`timeout must be a non-negative integer, got "${value}"`);
  }
  return timeout;
}

export function pullCommand(): Command {
  return new Command('pull')
    .description('Pull an image from the configured registry through the docker daemon')
    .argument('<repository>', 'Repository name, without registry')
    .argument('[tag]', 'Image tag', 'latest')
    .option('-H, --host <address>', 'Daemon address (tcp://host:port or unix:///path)')
    .option('--scheme <scheme>', 'URL scheme presented to the daemon', parseScheme)
    .option('--api-version <version>', 'Daemon API version')
    .option('-r, --registry <host>', 'Registry host prefixed to the repository')
    .option('--timeout <ms>', 'Request timeout in milliseconds', parseTimeout)
    .option('--cert-path <dir>', 'Directory holding ca.pem, cert.pem and key.pem')
    .option('-c, --config <file>', 'JSON config file')
    .action(async (repository: string, tag: string, options: PullCommandOptions) => {
      process.exitCode = await pullImageCmd(repository, tag, options);
    });
}
