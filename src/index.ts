/**
 * WebHDFS TypeScript Client Library
 *
 * TypeScript client for the WebHDFS REST API of Hadoop-compatible filesystems.
 * Provides a typed, stream-based API for reading, writing, listing, and managing remote paths.
 *
 * @packageDocumentation
 */

export { Client, DataSource } from './client';

export { HttpConnection, ConnectionOptions } from './connection';

export {
  ClientConfig,
  FileStatus,
  FileType,
  HdfsUri,
  HttpMethod,
  HttpReply,
  HttpRequest,
  Operation,
  ExpectedStatus,
  RemoteErrorInfo,
  WEBHDFS_DEFAULT_PORT,
} from './types';

export {
  QueryEncodable,
  OptionSet,
  encodeOptions,
  WriteOptions,
  WriteOptionsInit,
  AppendOptions,
  AppendOptionsInit,
  ReadOptions,
  ReadOptionsInit,
  MakeDirOptions,
  MakeDirOptionsInit,
  RemoveOptions,
  RemoveOptionsInit,
} from './options';

export {
  UrlBuilder,
  encodePath,
  parseHdfsUri,
  decodeFileStatuses,
  tryParseRemoteError,
} from './protocol';

export { Logger, LogLevel, ConsoleLogger } from './logger';

export {
  WebHdfsError,
  ClientClosedError,
  ClientBusyError,
  ConnectionTimeoutError,
  NetworkTimeoutError,
  InvalidResponseError,
  OperationNotSupportedError,
  InvalidArgumentError,
  ProtocolError,
  ClientSideError,
  NetworkError,
  UnexpectedStatusError,
  RemoteError,
  FileNotFoundError,
  FileAlreadyExistsError,
  AccessDeniedError,
} from './errors';
