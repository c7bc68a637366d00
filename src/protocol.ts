/**
 * WebHDFS Protocol Encoding and Decoding
 *
 * This module builds operation URLs and decodes the JSON bodies
 * returned by WebHDFS servers.
 */

import {
  WEBHDFS_PATH_PREFIX,
  FileType,
  FileStatus,
  HdfsUri,
  RemoteErrorInfo,
} from './types';
import type { QueryEncodable } from './options';
import { InvalidArgumentError, InvalidResponseError } from './errors';

const BOOLEAN_TRUE_REPLY = '{"boolean":true}';

/**
 * Returns true for bytes that pass through path encoding unchanged:
 * ASCII alphanumerics and `- _ . ~ /`
 */
function isUnreservedPathByte(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) || // 0-9
    (byte >= 0x41 && byte <= 0x5a) || // A-Z
    (byte >= 0x61 && byte <= 0x7a) || // a-z
    byte === 0x2d || // -
    byte === 0x5f || // _
    byte === 0x2e || // .
    byte === 0x7e || // ~
    byte === 0x2f // /
  );
}

/**
 * Percent-encodes a remote path, keeping `/` separators intact
 *
 * Every UTF-8 byte outside the unreserved set becomes `%XX` (uppercase hex).
 *
 * Examples:
 *   "/tmp/a b.txt" -> "/tmp/a%20b.txt"
 *   "/tmp/ü"       -> "/tmp/%C3%BC"
 */
export function encodePath(path: string): string {
  let encoded = '';
  for (const byte of Buffer.from(path, 'utf8')) {
    if (isUnreservedPathByte(byte)) {
      encoded += String.fromCharCode(byte);
    } else {
      encoded += '%' + byte.toString(16).toUpperCase().padStart(2, '0');
    }
  }
  return encoded;
}

/**
 * Builds WebHDFS operation URLs for one endpoint
 */
export class UrlBuilder {
  private readonly prefix: string;
  private readonly userName: string;

  constructor(host: string, port: number, userName: string = '') {
    this.prefix = `http://${host}:${port}${WEBHDFS_PATH_PREFIX}`;
    this.userName = userName;
  }

  /**
   * Returns `http://host:port/webhdfs/v1<path>?[user.name=<user>&]op=<op><options>`
   */
  buildUrl(path: string, operation: string, options?: QueryEncodable): string {
    let url = this.prefix + encodePath(path) + '?';
    if (this.userName) {
      url += `user.name=${this.userName}&`;
    }
    url += `op=${operation}`;
    if (options) {
      url += options.toQueryString();
    }
    return url;
  }
}

/**
 * Parses JSON text, returning undefined instead of throwing on malformed input
 */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function stringField(record: Record<string, unknown>, key: string, fallback: string = ''): string {
  const value = record[key];
  return typeof value === 'string' ? value : fallback;
}

/**
 * Checks a boolean reply; only the exact body `{"boolean":true}` counts as success
 */
export function isBooleanTrue(body: string): boolean {
  return body === BOOLEAN_TRUE_REPLY;
}

/**
 * Decodes a single FileStatus JSON object
 *
 * Missing or mistyped fields fall back to 0 or ''. Any type other than
 * "FILE" is treated as a directory.
 */
export function decodeFileStatus(value: Record<string, unknown>): FileStatus {
  return {
    accessTime: numberField(value, 'accessTime'),
    blockSize: numberField(value, 'blockSize'),
    group: stringField(value, 'group'),
    length: numberField(value, 'length'),
    modificationTime: numberField(value, 'modificationTime'),
    owner: stringField(value, 'owner'),
    pathSuffix: stringField(value, 'pathSuffix'),
    permission: stringField(value, 'permission'),
    replication: numberField(value, 'replication'),
    type: value.type === 'FILE' ? FileType.FILE : FileType.DIRECTORY,
  };
}

/**
 * Decodes a LISTSTATUS reply body
 *
 * Throws InvalidResponseError if the body is not JSON at all. JSON without a
 * `FileStatuses.FileStatus` array yields an empty list.
 */
export function decodeFileStatuses(body: string): FileStatus[] {
  const listing = tryParseJson(body);
  if (listing === undefined) {
    throw new InvalidResponseError('cannot parse directory listing');
  }

  if (!isRecord(listing) || !isRecord(listing.FileStatuses)) {
    return [];
  }

  const items = listing.FileStatuses.FileStatus;
  if (!Array.isArray(items)) {
    return [];
  }

  const files: FileStatus[] = [];
  for (const item of items) {
    files.push(decodeFileStatus(isRecord(item) ? item : {}));
  }
  return files;
}

/**
 * Decodes a `{"RemoteException": {...}}` error envelope
 *
 * Returns undefined if the body is not JSON or has no RemoteException member.
 */
export function tryParseRemoteError(body: string): RemoteErrorInfo | undefined {
  const value = tryParseJson(body);
  if (!isRecord(value) || !('RemoteException' in value)) {
    return undefined;
  }

  const exception = isRecord(value.RemoteException) ? value.RemoteException : {};
  return {
    exception: stringField(exception, 'exception', 'Unknown'),
    javaClassName: stringField(exception, 'javaClassName'),
    message: stringField(exception, 'message'),
  };
}

/**
 * Splits an `hdfs://host[:port]/path` URI into its components
 *
 * Examples:
 *   "hdfs://nn1/tmp/f"      -> { host: "nn1", path: "/tmp/f" }
 *   "hdfs://nn1:9870/tmp/f" -> { host: "nn1", port: 9870, path: "/tmp/f" }
 */
export function parseHdfsUri(uri: string): HdfsUri {
  const match = /^hdfs:\/\/([^/:]+)(?::(\d+))?(\/.*)?$/.exec(uri);
  if (!match) {
    throw new InvalidArgumentError(`not an hdfs:// URI: ${uri}`);
  }

  const [, host, portText, path] = match;
  const result: HdfsUri = { host, path: path ?? '/' };
  if (portText !== undefined) {
    const port = parseInt(portText, 10);
    if (port < 1 || port > 65535) {
      throw new InvalidArgumentError(`invalid port in URI: ${uri}`);
    }
    result.port = port;
  }
  return result;
}
