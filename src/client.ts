/**
 * WebHDFS TypeScript Client
 *
 * Main client class for interacting with a WebHDFS service.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Readable, Writable } from 'stream';
import { HttpConnection } from './connection';
import { Operations } from './operations';
import { UrlBuilder, parseHdfsUri } from './protocol';
import {
  MakeDirOptions,
  MakeDirOptionsInit,
  ReadOptions,
  ReadOptionsInit,
  RemoveOptions,
  RemoveOptionsInit,
  WriteOptions,
  WriteOptionsInit,
} from './options';
import { ClientConfig, FileStatus, WEBHDFS_DEFAULT_PORT } from './types';
import { ConsoleLogger, Logger } from './logger';
import {
  ClientBusyError,
  ClientClosedError,
  ClientSideError,
  InvalidArgumentError,
} from './errors';

type ResolvedConfig = Required<Omit<ClientConfig, 'logLevel' | 'logger'>> & { logger: Logger };

/**
 * Data accepted by writeFile
 */
export type DataSource = Readable | Buffer | string;

function toReadable(source: DataSource): Readable {
  if (source instanceof Readable) {
    return source;
  }
  const data = typeof source === 'string' ? Buffer.from(source, 'utf8') : source;
  return Readable.from(data.length > 0 ? [data] : []);
}

/**
 * WebHDFS client for file operations
 *
 * The client runs one operation at a time; starting another operation before
 * the previous one settles rejects with ClientBusyError.
 *
 * @example
 * ```typescript
 * const client = new Client({ host: 'namenode.local', userName: 'hdfs' });
 * await client.writeFile(Buffer.from('hello'), '/tmp/hello.txt', { overwrite: true });
 * const data = await client.readFileToBuffer('/tmp/hello.txt');
 * await client.remove('/tmp/hello.txt');
 * await client.close();
 * ```
 */
export class Client {
  private config: ResolvedConfig;
  private connection: HttpConnection;
  private ops: Operations;
  private closed: boolean = false;
  private busy: boolean = false;

  constructor(config: ClientConfig) {
    this.validateConfig(config);

    // Set defaults
    this.config = {
      host: config.host,
      port: config.port ?? WEBHDFS_DEFAULT_PORT,
      userName: config.userName ?? '',
      connectTimeout: config.connectTimeout ?? 0,
      dataTransferTimeout: config.dataTransferTimeout ?? 0,
      logger: config.logger ?? new ConsoleLogger(config.logLevel),
    };

    this.connection = new HttpConnection({
      connectTimeout: this.config.connectTimeout,
      dataTransferTimeout: this.config.dataTransferTimeout,
      logger: this.config.logger,
    });

    this.ops = new Operations(
      new UrlBuilder(this.config.host, this.config.port, this.config.userName),
      this.connection,
      this.config.logger
    );
  }

  /**
   * Creates a client from an `hdfs://host[:port]` URI; any path part is ignored
   */
  static fromUri(uri: string, config: Omit<ClientConfig, 'host' | 'port'> = {}): Client {
    const { host, port } = parseHdfsUri(uri);
    return new Client({ ...config, host, port });
  }

  /**
   * Validates the client configuration
   */
  private validateConfig(config: ClientConfig): void {
    if (!config) {
      throw new InvalidArgumentError('Config is required');
    }

    if (!config.host) {
      throw new InvalidArgumentError('Host is required');
    }

    if (
      config.port !== undefined &&
      (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535)
    ) {
      throw new InvalidArgumentError(`Invalid port: ${config.port}`);
    }

    for (const key of ['connectTimeout', 'dataTransferTimeout'] as const) {
      const value = config[key];
      if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
        throw new InvalidArgumentError(`Invalid ${key}: ${value}`);
      }
    }
  }

  /**
   * Checks if the client is closed and throws an error if so
   */
  private checkClosed(): void {
    if (this.closed) {
      throw new ClientClosedError();
    }
  }

  /**
   * Runs one operation, rejecting if another is still in flight
   */
  private async exclusive<T>(operation: () => Promise<T>): Promise<T> {
    this.checkClosed();
    if (this.busy) {
      throw new ClientBusyError();
    }
    this.busy = true;
    try {
      return await operation();
    } finally {
      this.busy = false;
    }
  }

  /**
   * Writes data to a remote file
   */
  async writeFile(
    source: DataSource,
    remotePath: string,
    opts: WriteOptions | WriteOptionsInit = {}
  ): Promise<void> {
    const options = WriteOptions.from(opts);
    await this.exclusive(() => this.ops.writeFile(toReadable(source), remotePath, options));
  }

  /**
   * Streams a remote file into a writable sink; the sink is not ended
   */
  async readFile(
    remotePath: string,
    sink: Writable,
    opts: ReadOptions | ReadOptionsInit = {}
  ): Promise<void> {
    const options = ReadOptions.from(opts);
    await this.exclusive(() => this.ops.readFile(remotePath, sink, options));
  }

  /**
   * Creates a remote directory
   */
  async makeDir(remoteDirPath: string, opts: MakeDirOptions | MakeDirOptionsInit = {}): Promise<void> {
    const options = MakeDirOptions.from(opts);
    await this.exclusive(() => this.ops.makeDir(remoteDirPath, options));
  }

  /**
   * Lists the entries of a remote directory
   */
  async listDir(remoteDirPath: string): Promise<FileStatus[]> {
    return this.exclusive(() => this.ops.listDir(remoteDirPath));
  }

  /**
   * Deletes a remote file or directory
   */
  async remove(remotePath: string, opts: RemoveOptions | RemoveOptionsInit = {}): Promise<void> {
    const options = RemoveOptions.from(opts);
    await this.exclusive(() => this.ops.remove(remotePath, options));
  }

  /**
   * Renames a remote file or directory
   */
  async rename(remotePath: string, newRemotePath: string): Promise<void> {
    await this.exclusive(() => this.ops.rename(remotePath, newRemotePath));
  }

  /**
   * Uploads a file from the local filesystem
   */
  async uploadFile(
    localFilename: string,
    remotePath: string,
    opts: WriteOptions | WriteOptionsInit = {}
  ): Promise<void> {
    const options = WriteOptions.from(opts);
    await this.exclusive(async () => {
      const handle = await fs.promises.open(localFilename, 'r');
      const stream = handle.createReadStream();
      try {
        await this.ops.writeFile(stream, remotePath, options);
      } finally {
        stream.destroy();
      }
    });
  }

  /**
   * Downloads a remote file and saves it to the local filesystem
   *
   * Parent directories are created as needed; an existing file is truncated.
   */
  async downloadToFile(
    remotePath: string,
    localFilename: string,
    opts: ReadOptions | ReadOptionsInit = {}
  ): Promise<void> {
    const options = ReadOptions.from(opts);
    await this.exclusive(async () => {
      await fs.promises.mkdir(path.dirname(localFilename), { recursive: true });
      const handle = await fs.promises.open(localFilename, 'w');
      const stream = handle.createWriteStream();
      const failure: { error?: Error } = {};
      stream.on('error', (err: Error) => {
        failure.error = err;
      });
      try {
        await this.ops.readFile(remotePath, stream, options);
      } finally {
        await new Promise<void>((resolve) => stream.end(() => resolve()));
      }
      if (failure.error) {
        throw new ClientSideError(`cannot write to ${localFilename}: ${failure.error.message}`);
      }
    });
  }

  /**
   * Downloads a remote file and returns its content
   */
  async readFileToBuffer(
    remotePath: string,
    opts: ReadOptions | ReadOptionsInit = {}
  ): Promise<Buffer> {
    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });
    await this.readFile(remotePath, sink, opts);
    return Buffer.concat(chunks);
  }

  /**
   * Closes the client and releases its HTTP agent
   *
   * After calling close, all operations will throw ClientClosedError.
   * It's safe to call close multiple times.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.connection.close();
  }
}
