/**
 * dockerd-pull - Daemon Client
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import type { Agent } from 'https';
import type { Logger } from 'pino';
import { addAbortSignal, Readable } from 'stream';
import { finished } from 'stream/promises';
import {
  AddressParseError,
  DaemonError,
  errorMessage,
  RequestConstructionError,
  ResponseReadError,
  TransportError,
} from '../errors';
import { allowsCompression, createHttpsAgent, parseHost } from '../host';
import { createLogger } from '../logger';
import {
  DaemonClientOptions,
  DaemonScheme,
  DaemonTransport,
  DockerClient,
  PostRequest,
  PullOptions,
  ResolvedHost,
} from '../types';

/** Operation path of `docker pull` */
export const IMAGE_CREATE_PATH = '/images/create';

/** Host header sent on every request; the daemon does not route by it */
export const SYNTHETIC_HOST = 'docker';

function resolveHost(host: string): ResolvedHost {
  try {
    return parseHost(host);
  } catch (error) {
    if (error instanceof AddressParseError) {
      throw new AddressParseError(error.code, `parse docker host \`${host}\`: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

function encodeQuery(query: Record<string, string>): string {
  const params = new URLSearchParams();
  const entries = Object.entries(query).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [key, value] of entries) {
    params.append(key, value);
  }
  return params.toString();
}

function cancelled(message: string, cause: unknown): TransportError {
  return new TransportError(`${message}: canceled`, { cause, cancelled: true });
}

async function readAll(body: Readable, signal?: AbortSignal): Promise<Buffer> {
  if (signal) {
    addAbortSignal(signal, body);
  }
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

async function drain(body: Readable, signal?: AbortSignal): Promise<void> {
  if (signal) {
    addAbortSignal(signal, body);
  }
  body.resume();
  await finished(body);
}

/**
 * Docker daemon client
 *
 * Holds one resolved transport for its whole life. Calls share nothing but
 * that transport's connection pool, so they may run concurrently.
 */
export class DockerDaemonClient implements DockerClient {
  readonly scheme: DaemonScheme;
  readonly version: string;
  readonly registry: string;
  readonly timeout: number;

  private readonly resolved: ResolvedHost;
  private readonly httpsAgent?: Agent;
  private readonly client: AxiosInstance;
  private readonly log: Logger;

  constructor(options: DaemonClientOptions) {
    this.resolved = resolveHost(options.host);
    this.scheme = options.scheme ?? 'http';
    this.version = options.version ?? '';
    this.registry = options.registry;
    this.timeout = options.timeout ?? 0;
    this.client = options.http ?? axios.create();
    this.log = options.logger ?? createLogger('docker-client');

    if (this.scheme === 'https') {
      this.httpsAgent = createHttpsAgent(this.resolved.transport, options.tls);
    }
  }

  get transport(): DaemonTransport {
    return this.resolved.transport;
  }

  /** Authority placed into request URLs */
  get host(): string {
    return this.resolved.host;
  }

  get basePath(): string {
    return this.resolved.basePath;
  }

  /**
   * Path with base path and API version applied
   */
  apiPath(path: string): string {
    if (!this.version) {
      return `${this.resolved.basePath}${path}`;
    }
    const version = this.version.startsWith('v') ? this.version.slice(1) : this.version;
    return `${this.resolved.basePath}/v${version}${path}`;
  }

  /**
   * Absolute request URL for an operation path
   */
  requestUrl(path: string, query: Record<string, string> = {}): string {
    try {
      const url = new URL(`${this.scheme}://${this.resolved.host}`);
      url.pathname = this.apiPath(path);
      const search = encodeQuery(query);
      if (search) {
        url.search = search;
      }
      return url.toString();
    } catch (error) {
      throw new RequestConstructionError(`create request: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Pull `<registry>/<repository>:<tag>`. Resolves once the daemon has
   * finished streaming the pull progress.
   */
  async imagePull(repository: string, tag: string, options: PullOptions = {}): Promise<void> {
    const fromImage = `${this.registry}/${repository}`;
    this.log.debug({ image: fromImage, tag }, 'Pulling image');

    await this.post(IMAGE_CREATE_PATH, {
      query: { fromImage, tag },
      headers: { 'X-Registry-Auth': '' },
      drain: true,
      signal: options.signal,
    });

    this.log.info({ image: fromImage, tag }, 'Image pulled');
  }

  /**
   * POST to a versioned daemon endpoint. Any status other than 200 rejects
   * with a DaemonError carrying the body the daemon sent.
   */
  async post(path: string, request: PostRequest = {}): Promise<void> {
    const url = this.requestUrl(path, request.query);
    const compress = allowsCompression(this.resolved.transport);
    const headers: Record<string, string> = { ...request.headers, Host: SYNTHETIC_HOST };
    if (!compress) {
      headers['Accept-Encoding'] = 'identity';
    }

    this.log.debug({ url, transport: this.resolved.transport.kind }, 'POST to docker daemon');

    let response: AxiosResponse<Readable>;
    try {
      response = await this.client.request<Readable>({
        method: 'POST',
        url,
        headers,
        data: request.body ?? Buffer.alloc(0),
        responseType: 'stream',
        decompress: compress,
        validateStatus: () => true,
        maxRedirects: 0,
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        proxy: false,
        timeout: this.timeout,
        httpAgent: this.resolved.agent,
        httpsAgent: this.httpsAgent,
        signal: request.signal,
      });
    } catch (error) {
      if (axios.isCancel(error) || request.signal?.aborted) {
        throw cancelled('send post request', error);
      }
      throw new TransportError(`send post request: ${errorMessage(error)}`, { cause: error });
    }

    const body = response.data;
    try {
      if (response.status !== 200) {
        const message = await this.read('read error resp', () => readAll(body, request.signal), request.signal);
        throw new DaemonError(path, response.status, message.toString('utf8'));
      }

      // The daemon acknowledges before the operation is done; the end of the
      // body is the completion signal.
      if (request.drain) {
        await this.read('read resp body', () => drain(body, request.signal), request.signal);
      }
    } finally {
      body.destroy();
    }
  }

  /**
   * Destroy pooled connections. The client must not be used afterwards;
   * closing it again does nothing.
   */
  close(): void {
    this.resolved.agent.destroy();
    this.httpsAgent?.destroy();
  }

  private async read<T>(operation: string, reader: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    try {
      return await reader();
    } catch (error) {
      if (signal?.aborted) {
        throw cancelled(operation, error);
      }
      throw new ResponseReadError(`${operation}: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Create a client for the daemon at `options.host`
 */
export function createDockerClient(options: DaemonClientOptions): DockerDaemonClient {
  return new DockerDaemonClient(options);
}

export default DockerDaemonClient;
