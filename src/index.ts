/**
 * dockerd-pull
 * Triggers image pulls on a Docker-compatible daemon
 */

// Types
export * from './types';

// Errors
export * from './errors';

// Host resolution
export {
  parseHost,
  maxSocketPathLength,
  dialUnix,
  tlsServerName,
  createHttpsAgent,
  UnixSocketAgent,
  UnixSocketTlsAgent,
  DEFAULT_DIAL_TIMEOUT,
  UNIX_SOCKET_HOST,
} from './host';

// Client
export { DockerDaemonClient, createDockerClient, IMAGE_CREATE_PATH, SYNTHETIC_HOST } from './client';

// Configuration
export { loadConfig, validateConfig, readConfigFile, readEnv, readTlsFiles, DEFAULT_DOCKER_HOST } from './config';
export type { LoadConfigOptions } from './config';

// Logging
export { logger, createLogger } from './logger';

// Version
export { VERSION } from './version';
