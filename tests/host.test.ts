/**
 * Host Resolver Tests
 */

import { once } from 'events';
import * as fs from 'fs';
import net from 'net';
import https from 'https';
import {
  AddressParseError,
  createHttpsAgent,
  maxSocketPathLength,
  parseHost,
  tlsServerName,
  UNIX_SOCKET_HOST,
  UnixSocketAgent,
  UnixSocketTlsAgent,
} from '../src';
import { tempSocketPath } from './support/fake-daemon';

function parseError(host: string): AddressParseError {
  try {
    parseHost(host).agent.destroy();
  } catch (error) {
    if (error instanceof AddressParseError) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected "${host}" to be rejected`);
}

describe('parseHost', () => {
  describe('tcp', () => {
    it('should resolve host and port with an empty base path', () => {
      const resolved = parseHost('tcp://localhost:2375');

      expect(resolved.transport).toEqual({ kind: 'tcp', address: 'localhost:2375' });
      expect(resolved.host).toBe('localhost:2375');
      expect(resolved.basePath).toBe('');
      resolved.agent.destroy();
    });

    it('should keep the URL path as base path', () => {
      const resolved = parseHost('tcp://10.0.0.5:2376/docker/api');

      expect(resolved.host).toBe('10.0.0.5:2376');
      expect(resolved.basePath).toBe('/docker/api');
      resolved.agent.destroy();
    });

    it('should accept IPv6 literals', () => {
      const resolved = parseHost('tcp://[::1]:2375');

      expect(resolved.host).toBe('[::1]:2375');
      resolved.agent.destroy();
    });

    it('should reject an address without a host', () => {
      expect(parseError('tcp://').code).toBe('ERR_INVALID_ADDRESS');
    });
  });

  describe('unix', () => {
    it('should resolve a socket path', () => {
      const resolved = parseHost('unix:///var/run/docker.sock');

      expect(resolved.transport).toEqual({ kind: 'unix', socketPath: '/var/run/docker.sock' });
      expect(resolved.host).toBe(UNIX_SOCKET_HOST);
      expect(resolved.basePath).toBe('');
      expect(resolved.agent).toBeInstanceOf(UnixSocketAgent);
      resolved.agent.destroy();
    });

    it('should accept a path at the platform limit', () => {
      const limit = maxSocketPathLength();
      const socketPath = `/${'a'.repeat(limit - 1)}`;

      const resolved = parseHost(`unix://${socketPath}`);

      expect(resolved.transport).toEqual({ kind: 'unix', socketPath });
      resolved.agent.destroy();
    });

    it('should reject a path one byte over the limit', () => {
      const socketPath = `/${'a'.repeat(maxSocketPathLength())}`;

      const error = parseError(`unix://${socketPath}`);

      expect(error.code).toBe('ERR_PATH_TOO_LONG');
    });

    it('should count bytes rather than characters', () => {
      // "é" is two bytes in UTF-8
      const socketPath = `/${'é'.repeat(Math.ceil(maxSocketPathLength() / 2))}`;

      expect(parseError(`unix://${socketPath}`).code).toBe('ERR_PATH_TOO_LONG');
    });
  });

  describe('invalid addresses', () => {
    it.each(['localhost:2375', '/var/run/docker.sock', 'tcp:/localhost:2375', ''])(
      'should reject %p without a scheme separator',
      (host) => {
        expect(parseError(host).code).toBe('ERR_INVALID_ADDRESS');
      }
    );

    it.each(['http://localhost:2375', 'npipe:////./pipe/docker_engine', 'ssh://user@host'])(
      'should reject unsupported protocol %p',
      (host) => {
        const error = parseError(host);

        expect(error.code).toBe('ERR_UNSUPPORTED_PROTOCOL');
        expect(error.message).toBe(`Protocol ${host.split('://')[0]} not supported`);
      }
    );
  });
});

describe('maxSocketPathLength', () => {
  it('should follow sockaddr_un sizes', () => {
    expect(maxSocketPathLength('linux')).toBe(108);
    expect(maxSocketPathLength('darwin')).toBe(104);
    expect(maxSocketPathLength('freebsd')).toBe(104);
  });
});

describe('UnixSocketAgent', () => {
  let socketPath: string;
  let server: net.Server;

  beforeEach(async () => {
    socketPath = tempSocketPath();
    fs.rmSync(socketPath, { force: true });
    server = net.createServer((socket) => socket.end());
    server.listen(socketPath);
    await once(server, 'listening');
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    fs.rmSync(socketPath, { force: true });
  });

  it('should dial the configured socket path', async () => {
    const agent = new UnixSocketAgent(socketPath);
    const accepted = once(server, 'connection');

    const socket = agent.createConnection();
    await once(socket, 'connect');
    const [peer] = await accepted;

    expect(peer).toBeInstanceOf(net.Socket);
    socket.destroy();
    agent.destroy();
  });

  it('should fail to dial a missing socket', async () => {
    const agent = new UnixSocketAgent(`${socketPath}.missing`);

    const socket = agent.createConnection();
    const [error] = await once(socket, 'error');

    expect(error).toMatchObject({ code: 'ENOENT' });
    agent.destroy();
  });

  it('should default to a 32 second connect timeout', () => {
    const agent = new UnixSocketAgent(socketPath);

    expect(agent.dialTimeout).toBe(32_000);
    agent.destroy();
  });

  it('should destroy a dial that does not connect in time', async () => {
    // A socket that is never connected stands in for a daemon that hangs
    const pending = new net.Socket();
    const dial = jest.spyOn(net, 'createConnection').mockReturnValue(pending);
    const agent = new UnixSocketAgent(socketPath, 50);

    try {
      const socket = agent.createConnection();
      const [error] = await once(socket, 'error');

      expect(socket).toBe(pending);
      expect(error).toMatchObject({ message: `dial unix ${socketPath}: connect timeout after 50ms` });
      expect(socket.destroyed).toBe(true);
    } finally {
      dial.mockRestore();
      agent.destroy();
    }
  });
});

describe('UnixSocketTlsAgent', () => {
  it('should pass a dial timeout to the connection callback', async () => {
    const socketPath = tempSocketPath();
    const dial = jest.spyOn(net, 'createConnection').mockReturnValue(new net.Socket());
    const agent = new UnixSocketTlsAgent(socketPath, 50);

    try {
      const error = await new Promise<Error | null>((resolve) => {
        agent.createConnection({}, (err) => resolve(err));
      });

      expect(error?.message).toBe(`dial unix ${socketPath}: connect timeout after 50ms`);
    } finally {
      dial.mockRestore();
      agent.destroy();
    }
  });

  it('should pass a failed dial to the connection callback', async () => {
    const agent = new UnixSocketTlsAgent(`${tempSocketPath()}.missing`);

    const error = await new Promise<Error | null>((resolve) => {
      agent.createConnection({}, (err) => resolve(err));
    });

    expect(error).toMatchObject({ code: 'ENOENT' });
    agent.destroy();
  });
});

describe('tlsServerName', () => {
  it('should use the host name without the port', () => {
    expect(tlsServerName('localhost:2376')).toBe('localhost');
    expect(tlsServerName('daemon.internal:2376')).toBe('daemon.internal');
  });

  it('should leave IP literals without a server name', () => {
    expect(tlsServerName('127.0.0.1:2376')).toBe('');
    expect(tlsServerName('[::1]:2376')).toBe('');
  });
});

describe('createHttpsAgent', () => {
  it('should fix the server name for tcp', () => {
    const agent = createHttpsAgent({ kind: 'tcp', address: 'localhost:2376' });

    expect(agent).toBeInstanceOf(https.Agent);
    expect(agent.options.servername).toBe('localhost');
    agent.destroy();
  });

  it('should run TLS over the socket for unix', () => {
    const agent = createHttpsAgent({ kind: 'unix', socketPath: '/var/run/docker.sock' });

    expect(agent).toBeInstanceOf(UnixSocketTlsAgent);
    expect(agent.options.servername).toBe(UNIX_SOCKET_HOST);
    agent.destroy();
  });
});
