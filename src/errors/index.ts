/**
 * dockerd-pull - Errors
 */

export type AddressErrorCode = 'ERR_INVALID_ADDRESS' | 'ERR_UNSUPPORTED_PROTOCOL' | 'ERR_PATH_TOO_LONG';

export type DaemonClientErrorCode =
  | AddressErrorCode
  | 'ERR_REQUEST_CONSTRUCTION'
  | 'ERR_TRANSPORT'
  | 'ERR_DAEMON'
  | 'ERR_RESPONSE_READ'
  | 'ERR_CONFIG';

/**
 * Base class of every error raised by this package
 */
export class DaemonClientError extends Error {
  readonly code: DaemonClientErrorCode;

  constructor(code: DaemonClientErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The daemon address could not be turned into a transport
 */
export class AddressParseError extends DaemonClientError {
  declare readonly code: AddressErrorCode;

  constructor(code: AddressErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class RequestConstructionError extends DaemonClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ERR_REQUEST_CONSTRUCTION', message, options);
  }
}

/**
 * The request never produced a response: connection failure, timeout, or
 * cancellation by the caller (`cancelled` is then true)
 */
export class TransportError extends DaemonClientError {
  readonly cancelled: boolean;

  constructor(message: string, options?: { cause?: unknown; cancelled?: boolean }) {
    super('ERR_TRANSPORT', message, options);
    this.cancelled = options?.cancelled ?? false;
  }
}

/**
 * The daemon answered with a non-200 status
 */
export class DaemonError extends DaemonClientError {
  readonly statusCode: number;
  readonly path: string;
  readonly daemonMessage: string;

  constructor(path: string, statusCode: number, daemonMessage: string) {
    super('ERR_DAEMON', `Error posting to ${path}: code ${statusCode}, err: ${daemonMessage}`);
    this.path = path;
    this.statusCode = statusCode;
    this.daemonMessage = daemonMessage;
  }
}

export class ResponseReadError extends DaemonClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ERR_RESPONSE_READ', message, options);
  }
}

export class ConfigError extends DaemonClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ERR_CONFIG', message, options);
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
