/**
 * WebHDFS Operations
 *
 * This module implements the filesystem operations (write, read, mkdir, list, delete, rename)
 * as short exchange scripts over an HttpConnection.
 */

import { Writable } from 'stream';
import type { Readable } from 'stream';
import { HttpConnection } from './connection';
import { UrlBuilder, isBooleanTrue, decodeFileStatuses } from './protocol';
import { ExpectedStatus, Operation, FileStatus } from './types';
import { InvalidResponseError, ProtocolError } from './errors';
import type { MakeDirOptions, ReadOptions, RemoveOptions, WriteOptions } from './options';
import type { Logger } from './logger';

/**
 * In-memory sink used to capture small JSON replies
 */
class BufferSink extends Writable {
  private readonly chunks: Buffer[] = [];

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk);
    callback();
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Handles all WebHDFS file operations
 *
 * This class is used internally by the Client class.
 */
export class Operations {
  private urlBuilder: UrlBuilder;
  private connection: HttpConnection;
  private logger: Logger;

  constructor(urlBuilder: UrlBuilder, connection: HttpConnection, logger: Logger) {
    this.urlBuilder = urlBuilder;
    this.connection = connection;
    this.logger = logger;
  }

  /**
   * Creates a file in two steps: ask the namenode for a datanode, then send the data there
   */
  async writeFile(dataSource: Readable, remotePath: string, opts: WriteOptions): Promise<void> {
    // Step 1. Get the datanode URL
    const reply = await this.connection.execute({
      method: 'PUT',
      url: this.urlBuilder.buildUrl(remotePath, Operation.CREATE, opts),
      followRedirect: false,
      expectedStatus: ExpectedStatus.TEMPORARY_REDIRECT,
    });
    if (!reply.redirectUrl) {
      this.logger.warn(`CREATE ${remotePath}: no Location in 307 reply`);
      throw new ProtocolError('no redirection to data node');
    }

    // Step 2. Put the data
    await this.connection.execute({
      method: 'PUT',
      url: reply.redirectUrl,
      followRedirect: false,
      dataSource,
      expectedStatus: ExpectedStatus.CREATED,
    });
  }

  /**
   * Streams a file into the sink, following the redirect to the datanode
   */
  async readFile(remotePath: string, dataSink: Writable, opts: ReadOptions): Promise<void> {
    await this.connection.execute({
      method: 'GET',
      url: this.urlBuilder.buildUrl(remotePath, Operation.OPEN, opts),
      followRedirect: true,
      dataSink,
      expectedStatus: ExpectedStatus.OK,
    });
  }

  /**
   * Creates a directory and its missing parents
   */
  async makeDir(remoteDirPath: string, opts: MakeDirOptions): Promise<void> {
    const body = await this.requestText(
      'PUT',
      this.urlBuilder.buildUrl(remoteDirPath, Operation.MKDIRS, opts)
    );
    if (!isBooleanTrue(body)) {
      this.logger.warn(`MKDIRS ${remoteDirPath} rejected: ${body}`);
      throw new InvalidResponseError(`can't create dir ${remoteDirPath}, reply: ${body}`);
    }
  }

  /**
   * Lists the entries of a directory
   */
  async listDir(remoteDirPath: string): Promise<FileStatus[]> {
    const sink = new BufferSink();
    await this.connection.execute({
      method: 'GET',
      url: this.urlBuilder.buildUrl(remoteDirPath, Operation.LISTSTATUS),
      followRedirect: true,
      dataSink: sink,
      expectedStatus: ExpectedStatus.OK,
    });
    return decodeFileStatuses(sink.text());
  }

  /**
   * Deletes a file or directory
   */
  async remove(remotePath: string, opts: RemoveOptions): Promise<void> {
    const body = await this.requestText(
      'DELETE',
      this.urlBuilder.buildUrl(remotePath, Operation.DELETE, opts)
    );
    if (!isBooleanTrue(body)) {
      this.logger.warn(`DELETE ${remotePath} rejected: ${body}`);
      throw new InvalidResponseError(`can't delete ${remotePath}`);
    }
  }

  /**
   * Renames a file or directory
   *
   * The destination is appended verbatim and must already be safe for a query string.
   */
  async rename(remotePath: string, newRemotePath: string): Promise<void> {
    const url =
      this.urlBuilder.buildUrl(remotePath, Operation.RENAME) + `&destination=${newRemotePath}`;
    const body = await this.requestText('PUT', url);
    if (!isBooleanTrue(body)) {
      this.logger.warn(`RENAME ${remotePath} rejected: ${body}`);
      throw new InvalidResponseError(`can't rename ${remotePath}`);
    }
  }

  /**
   * Runs a bodiless request expecting 200 and returns the reply body as text
   */
  private async requestText(method: 'PUT' | 'DELETE', url: string): Promise<string> {
    const sink = new BufferSink();
    await this.connection.execute({
      method,
      url,
      followRedirect: false,
      dataSink: sink,
      expectedStatus: ExpectedStatus.OK,
    });
    return sink.text();
  }
}
