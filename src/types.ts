/**
 * WebHDFS Protocol Types and Constants
 *
 * This module defines the protocol-level constants, operation names, and data structures
 * used in communication with WebHDFS namenodes and datanodes.
 */

import type { Readable, Writable } from 'stream';
import type { Logger, LogLevel } from './logger';

// Protocol Constants
export const CLIENT_VERSION = '1.0.0';
export const WEBHDFS_DEFAULT_PORT = 50070;
export const WEBHDFS_PATH_PREFIX = '/webhdfs/v1';

// Redirect hops followed before giving up
export const MAX_REDIRECTS = 20;

// Status recorded on a reply when a local fault aborted the transfer
export const CLIENT_ERROR_STATUS = -1;

/**
 * WebHDFS operations, sent as the `op=` query parameter
 */
export enum Operation {
  CREATE = 'CREATE',
  OPEN = 'OPEN',
  MKDIRS = 'MKDIRS',
  LISTSTATUS = 'LISTSTATUS',
  DELETE = 'DELETE',
  RENAME = 'RENAME',
}

/**
 * Status codes that count as success for each exchange
 */
export enum ExpectedStatus {
  OK = 200,
  CREATED = 201,
  TEMPORARY_REDIRECT = 307,
}

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE';

/**
 * Kind of a listed filesystem entry
 */
export enum FileType {
  FILE = 'FILE',
  DIRECTORY = 'DIRECTORY',
}

/**
 * Metadata of one entry returned by a directory listing
 */
export interface FileStatus {
  /** Last access time, milliseconds since epoch */
  accessTime: number;
  /** Block size in bytes */
  blockSize: number;
  /** Owning group */
  group: string;
  /** File length in bytes (0 for directories) */
  length: number;
  /** Last modification time, milliseconds since epoch */
  modificationTime: number;
  /** Owning user */
  owner: string;
  /** Entry name relative to the listed directory */
  pathSuffix: string;
  /** Octal permission string, e.g. "755" */
  permission: string;
  /** Replication factor (0 for directories) */
  replication: number;
  type: FileType;
}

/**
 * Decoded `RemoteException` envelope
 */
export interface RemoteErrorInfo {
  exception: string;
  javaClassName: string;
  message: string;
}

/**
 * One outgoing HTTP exchange
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  /** Follow 3xx responses transparently */
  followRedirect: boolean;
  /** Request body, pulled on demand and sent chunked */
  dataSource?: Readable;
  /** Receives the response body when the status matches `expectedStatus` */
  dataSink?: Writable;
  expectedStatus: number;
}

/**
 * Outcome of one HTTP exchange
 */
export interface HttpReply {
  statusCode: number;
  /** Body of a response whose status did not match, kept for diagnosis */
  unexpectedContent: string;
  /** Set when a local fault aborted the transfer */
  clientError?: string;
  /** Redirect target of a 3xx that was not followed */
  redirectUrl?: string;
}

/**
 * Client configuration options
 */
export interface ClientConfig {
  /** Namenode host name */
  host: string;
  /** Namenode HTTP port (default: 50070) */
  port?: number;
  /** Sent as `user.name` with every request */
  userName?: string;
  /** Timeout for establishing connections in milliseconds (default: 0, transport default) */
  connectTimeout?: number;
  /** Timeout for a whole exchange in milliseconds (default: 0, no limit) */
  dataTransferTimeout?: number;
  /** Log level (default: WEBHDFS_LOG_LEVEL environment variable, else SILENT) */
  logLevel?: LogLevel;
  /** Custom logger; overrides logLevel */
  logger?: Logger;
}

/**
 * Components of an `hdfs://host[:port]/path` URI
 */
export interface HdfsUri {
  host: string;
  port?: number;
  path: string;
}
