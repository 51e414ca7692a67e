/**
 * dockerd-pull - Types
 */

import type { Agent } from 'http';
import type { AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import type { ConnectionOptions } from 'tls';

/**
 * URL scheme presented to the daemon in the request line
 */
export type DaemonScheme = 'http' | 'https';

/**
 * TCP transport: standard dialing to host:port
 */
export interface TcpTransport {
  kind: 'tcp';
  address: string;
}

/**
 * Unix socket transport: every connection dials the same socket path
 */
export interface UnixTransport {
  kind: 'unix';
  socketPath: string;
}

export type DaemonTransport = TcpTransport | UnixTransport;

/**
 * Certificates used when the scheme is https
 */
export type TlsClientOptions = Pick<ConnectionOptions, 'ca' | 'cert' | 'key' | 'rejectUnauthorized'>;

/**
 * ResolvedHost is the outcome of parsing a daemon address
 */
export interface ResolvedHost {
  transport: DaemonTransport;
  /** Pooled agent that opens connections for this transport */
  agent: Agent;
  /** Authority placed into outgoing request URLs */
  host: string;
  /** Path prefix applied to every request, may be empty */
  basePath: string;
}

/**
 * ClientConfig represents the plain, serializable client configuration
 */
export interface ClientConfig {
  /** Daemon address, tcp://host:port[/path] or unix:///path/to/socket */
  host: string;
  scheme: DaemonScheme;
  /** API version, empty for no version qualifier */
  version: string;
  /** Registry hostname prefixed to repository names */
  registry: string;
  /** Request timeout in milliseconds, 0 disables it */
  timeout: number;
  /** Directory holding ca.pem, cert.pem and key.pem */
  certPath?: string;
}

/**
 * DaemonClientOptions represents client construction options
 */
export interface DaemonClientOptions {
  host: string;
  scheme?: DaemonScheme;
  version?: string;
  registry: string;
  timeout?: number;
  /** Trust and client certificates, used when scheme is https */
  tls?: TlsClientOptions;
  logger?: Logger;
  /** axios instance to send requests through */
  http?: AxiosInstance;
}

/**
 * PostRequest describes a single POST to the daemon
 */
export interface PostRequest {
  query?: Record<string, string>;
  headers?: Record<string, string>;
  body?: Buffer | string;
  /**
   * Read the response body to its end before resolving. The daemon answers
   * 200 before some operations finish and streams progress until they do.
   */
  drain?: boolean;
  signal?: AbortSignal;
}

/**
 * Options accepted by a single image pull
 */
export interface PullOptions {
  signal?: AbortSignal;
}

/**
 * DockerClient is the operation surface offered to callers
 */
export interface DockerClient {
  imagePull(repository: string, tag: string, options?: PullOptions): Promise<void>;
}
