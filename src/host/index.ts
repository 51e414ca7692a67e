/**
 * dockerd-pull - Host Resolver
 *
 * Parses a daemon address into a transport, the agent that dials it, and the
 * authority and path prefix used when building request URLs. The WHATWG URL
 * parser cannot read "unix:///..." addresses the way the daemon means them,
 * so the scheme is split off by hand.
 */

import http from 'http';
import https from 'https';
import net from 'net';
import type { Duplex } from 'stream';
import tls from 'tls';
import { AddressParseError, errorMessage } from '../errors';
import { DaemonTransport, ResolvedHost, TlsClientOptions } from '../types';

/** Connect timeout for Unix socket dials */
export const DEFAULT_DIAL_TIMEOUT = 32_000;

/** Authority presented when the daemon has no network host */
export const UNIX_SOCKET_HOST = 'docker';

/**
 * Size of sockaddr_un.sun_path on the current platform
 */
export function maxSocketPathLength(platform: NodeJS.Platform = process.platform): number {
  switch (platform) {
    case 'darwin':
    case 'freebsd':
    case 'openbsd':
    case 'netbsd':
      return 104;
    default:
      return 108;
  }
}

/**
 * Open a connection to a Unix socket, destroying it with an error when it has
 * not connected within `dialTimeout` ms
 */
export function dialUnix(socketPath: string, dialTimeout: number): net.Socket {
  const socket = net.createConnection({ path: socketPath });
  const timer = setTimeout(() => {
    socket.destroy(new Error(`dial unix ${socketPath}: connect timeout after ${dialTimeout}ms`));
  }, dialTimeout);
  const clear = () => clearTimeout(timer);
  socket.once('connect', clear);
  socket.once('close', clear);
  return socket;
}

/**
 * Agent that dials one fixed Unix socket for every connection, whatever host
 * and port the request names
 */
export class UnixSocketAgent extends http.Agent {
  readonly socketPath: string;
  readonly dialTimeout: number;

  constructor(socketPath: string, dialTimeout: number = DEFAULT_DIAL_TIMEOUT) {
    super({ keepAlive: true });
    this.socketPath = socketPath;
    this.dialTimeout = dialTimeout;
  }

  createConnection(): net.Socket {
    return dialUnix(this.socketPath, this.dialTimeout);
  }
}

type ConnectionCallback = (err: Error | null, stream?: Duplex) => void;

/**
 * TLS counterpart of UnixSocketAgent. The handshake runs over the Unix socket
 * once it has connected, verifying the daemon certificate against
 * UNIX_SOCKET_HOST.
 */
export class UnixSocketTlsAgent extends https.Agent {
  readonly socketPath: string;
  readonly dialTimeout: number;
  private readonly tlsOptions: TlsClientOptions;

  constructor(socketPath: string, dialTimeout: number = DEFAULT_DIAL_TIMEOUT, tlsOptions: TlsClientOptions = {}) {
    super({ keepAlive: true, ...tlsOptions, servername: UNIX_SOCKET_HOST });
    this.socketPath = socketPath;
    this.dialTimeout = dialTimeout;
    this.tlsOptions = tlsOptions;
  }

  // The connection is handed back through the callback once the socket is up
  createConnection(_options: unknown, callback?: ConnectionCallback): undefined {
    const raw = dialUnix(this.socketPath, this.dialTimeout);
    const onError = (err: Error) => callback?.(err);
    raw.once('error', onError);
    raw.once('connect', () => {
      raw.removeListener('error', onError);
      callback?.(null, tls.connect({ ...this.tlsOptions, socket: raw, servername: UNIX_SOCKET_HOST }));
    });
    return undefined;
  }
}

/**
 * Name the daemon certificate is checked against for a TCP address. IP
 * literals get no SNI name, so verification falls back to the address.
 */
export function tlsServerName(address: string): string {
  const hostname = new URL(`tcp://${address}`).hostname.replace(/^\[(.*)\]$/, '$1');
  return net.isIP(hostname) ? '' : hostname;
}

/**
 * Agent for https requests over the given transport. Requests carry a
 * synthetic Host header, so the server name is fixed here rather than taken
 * from it.
 */
export function createHttpsAgent(
  transport: DaemonTransport,
  tlsOptions: TlsClientOptions = {},
  dialTimeout: number = DEFAULT_DIAL_TIMEOUT
): https.Agent {
  if (transport.kind === 'unix') {
    return new UnixSocketTlsAgent(transport.socketPath, dialTimeout, tlsOptions);
  }
  return new https.Agent({ keepAlive: true, ...tlsOptions, servername: tlsServerName(transport.address) });
}

function parseTcp(target: string): ResolvedHost {
  let parsed: URL;
  try {
    parsed = new URL(`tcp://${target}`);
  } catch (error) {
    throw new AddressParseError('ERR_INVALID_ADDRESS', `invalid tcp address "${target}": ${errorMessage(error)}`, {
      cause: error,
    });
  }
  if (!parsed.host) {
    throw new AddressParseError('ERR_INVALID_ADDRESS', `tcp address "${target}" has no host`);
  }

  const transport: DaemonTransport = { kind: 'tcp', address: parsed.host };
  return {
    transport,
    agent: new http.Agent({ keepAlive: true }),
    host: parsed.host,
    basePath: parsed.pathname,
  };
}

function parseUnix(socketPath: string, dialTimeout: number): ResolvedHost {
  const limit = maxSocketPathLength();
  if (Buffer.byteLength(socketPath) > limit) {
    throw new AddressParseError('ERR_PATH_TOO_LONG', `Unix socket path "${socketPath}" is too long (max ${limit} bytes)`);
  }

  const transport: DaemonTransport = { kind: 'unix', socketPath };
  return {
    transport,
    agent: new UnixSocketAgent(socketPath, dialTimeout),
    host: UNIX_SOCKET_HOST,
    basePath: '',
  };
}

/**
 * Parse a daemon address of the form `tcp://host:port[/path]` or
 * `unix:///path/to/socket`
 */
export function parseHost(host: string, dialTimeout: number = DEFAULT_DIAL_TIMEOUT): ResolvedHost {
  const separator = host.indexOf('://');
  if (separator === -1) {
    throw new AddressParseError('ERR_INVALID_ADDRESS', `unable to parse docker host "${host}"`);
  }

  const protocol = host.slice(0, separator);
  const target = host.slice(separator + 3);

  switch (protocol) {
    case 'tcp':
      return parseTcp(target);
    case 'unix':
      return parseUnix(target, dialTimeout);
    default:
      throw new AddressParseError('ERR_UNSUPPORTED_PROTOCOL', `Protocol ${protocol} not supported`);
  }
}

/**
 * Whether responses over this transport may be compressed
 */
export function allowsCompression(transport: DaemonTransport): boolean {
  return transport.kind === 'tcp';
}
