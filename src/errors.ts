/**
 * WebHDFS Error Definitions
 *
 * This module defines all error types for the WebHDFS client.
 * Errors are categorized into client errors, transport errors, protocol errors,
 * and errors reported by the remote server.
 */

import type { RemoteErrorInfo } from './types';

/**
 * Base exception for all WebHDFS errors
 */
export class WebHdfsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WebHdfsError';
    Object.setPrototypeOf(this, WebHdfsError.prototype);
  }
}

/**
 * Client has been closed
 */
export class ClientClosedError extends WebHdfsError {
  constructor() {
    super('Client is closed');
    this.name = 'ClientClosedError';
    Object.setPrototypeOf(this, ClientClosedError.prototype);
  }
}

/**
 * Another operation is already in flight on this client
 */
export class ClientBusyError extends WebHdfsError {
  constructor() {
    super('Client is busy: another operation is in progress');
    this.name = 'ClientBusyError';
    Object.setPrototypeOf(this, ClientBusyError.prototype);
  }
}

/**
 * Connection timeout
 */
export class ConnectionTimeoutError extends WebHdfsError {
  constructor(url?: string) {
    super(url ? `Connection timeout to ${url}` : 'Connection timeout');
    this.name = 'ConnectionTimeoutError';
    Object.setPrototypeOf(this, ConnectionTimeoutError.prototype);
  }
}

/**
 * Data transfer timeout
 */
export class NetworkTimeoutError extends WebHdfsError {
  constructor(operation?: string) {
    super(operation ? `Network timeout during ${operation}` : 'Network timeout');
    this.name = 'NetworkTimeoutError';
    Object.setPrototypeOf(this, NetworkTimeoutError.prototype);
  }
}

/**
 * Server response failed verification
 */
export class InvalidResponseError extends WebHdfsError {
  constructor(details?: string) {
    super(details ? `Invalid response from server: ${details}` : 'Invalid response from server');
    this.name = 'InvalidResponseError';
    Object.setPrototypeOf(this, InvalidResponseError.prototype);
  }
}

/**
 * Operation is not supported
 */
export class OperationNotSupportedError extends WebHdfsError {
  constructor(operation?: string) {
    super(operation ? `Operation not supported: ${operation}` : 'Operation not supported');
    this.name = 'OperationNotSupportedError';
    Object.setPrototypeOf(this, OperationNotSupportedError.prototype);
  }
}

/**
 * Invalid argument was provided
 */
export class InvalidArgumentError extends WebHdfsError {
  constructor(details?: string) {
    super(details ? `Invalid argument: ${details}` : 'Invalid argument');
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * Server behaved outside the WebHDFS protocol contract
 */
export class ProtocolError extends WebHdfsError {
  constructor(message: string) {
    super(`protocol error: ${message}`);
    this.name = 'ProtocolError';
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

/**
 * Failure inside the client's own data handling (broken sink or source)
 */
export class ClientSideError extends WebHdfsError {
  constructor(message: string) {
    super(message);
    this.name = 'ClientSideError';
    Object.setPrototypeOf(this, ClientSideError.prototype);
  }
}

/**
 * Network-related error during communication
 */
export class NetworkError extends WebHdfsError {
  public readonly operation: string;
  public readonly url: string;
  public readonly originalError: Error;

  constructor(operation: string, url: string, originalError: Error) {
    super(`Network error during ${operation} to ${url}: ${originalError.message}`);
    this.name = 'NetworkError';
    this.operation = operation;
    this.url = url;
    this.originalError = originalError;
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Server answered with an unexpected status and an undecodable body
 */
export class UnexpectedStatusError extends WebHdfsError {
  public readonly statusCode: number;
  public readonly body: string;

  constructor(statusCode: number, body: string = '') {
    super(
      body
        ? `unexpected server response code: ${statusCode} (${body})`
        : `unexpected server response code: ${statusCode}`
    );
    this.name = 'UnexpectedStatusError';
    this.statusCode = statusCode;
    this.body = body;
    Object.setPrototypeOf(this, UnexpectedStatusError.prototype);
  }
}

/**
 * Application error reported by the server in a `RemoteException` envelope
 */
export class RemoteError extends WebHdfsError {
  public readonly statusCode: number;
  public readonly exception: string;
  public readonly javaClassName: string;
  public readonly remoteMessage: string;

  constructor(statusCode: number, info: RemoteErrorInfo) {
    super(`remote error: ${info.message}`);
    this.name = 'RemoteError';
    this.statusCode = statusCode;
    this.exception = info.exception;
    this.javaClassName = info.javaClassName;
    this.remoteMessage = info.message;
    Object.setPrototypeOf(this, RemoteError.prototype);
  }
}

/**
 * Remote path does not exist
 */
export class FileNotFoundError extends RemoteError {
  constructor(statusCode: number, info: RemoteErrorInfo) {
    super(statusCode, info);
    this.name = 'FileNotFoundError';
    Object.setPrototypeOf(this, FileNotFoundError.prototype);
  }
}

/**
 * Remote path already exists
 */
export class FileAlreadyExistsError extends RemoteError {
  constructor(statusCode: number, info: RemoteErrorInfo) {
    super(statusCode, info);
    this.name = 'FileAlreadyExistsError';
    Object.setPrototypeOf(this, FileAlreadyExistsError.prototype);
  }
}

/**
 * Server refused access to the remote path
 */
export class AccessDeniedError extends RemoteError {
  constructor(statusCode: number, info: RemoteErrorInfo) {
    super(statusCode, info);
    this.name = 'AccessDeniedError';
    Object.setPrototypeOf(this, AccessDeniedError.prototype);
  }
}

/**
 * Maps a decoded `RemoteException` envelope to a TypeScript error
 *
 * Well-known exception names map to dedicated subclasses;
 * everything else becomes a plain RemoteError.
 *
 * Recognized exceptions:
 *   FileNotFoundException      -> FileNotFoundError
 *   FileAlreadyExistsException -> FileAlreadyExistsError
 *   AccessControlException     -> AccessDeniedError
 *   SecurityException          -> AccessDeniedError
 */
export function mapRemoteError(statusCode: number, info: RemoteErrorInfo): RemoteError {
  switch (info.exception) {
    case 'FileNotFoundException':
      return new FileNotFoundError(statusCode, info);
    case 'FileAlreadyExistsException':
      return new FileAlreadyExistsError(statusCode, info);
    case 'AccessControlException':
    case 'SecurityException':
      return new AccessDeniedError(statusCode, info);
    default:
      return new RemoteError(statusCode, info);
  }
}
