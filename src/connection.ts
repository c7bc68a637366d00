/**
 * WebHDFS HTTP Connection
 *
 * This module executes single HTTP exchanges against WebHDFS servers,
 * streaming request and response bodies and classifying the outcome.
 */

import * as http from 'http';
import type { Socket } from 'net';
import {
  CLIENT_VERSION,
  CLIENT_ERROR_STATUS,
  MAX_REDIRECTS,
  HttpRequest,
  HttpReply,
} from './types';
import {
  ClientBusyError,
  ClientClosedError,
  ClientSideError,
  ConnectionTimeoutError,
  NetworkError,
  NetworkTimeoutError,
  OperationNotSupportedError,
  ProtocolError,
  UnexpectedStatusError,
  WebHdfsError,
  mapRemoteError,
} from './errors';
import { tryParseRemoteError } from './protocol';
import type { Logger } from './logger';

export interface ConnectionOptions {
  /** Milliseconds to wait for the TCP connection; 0 means no limit */
  connectTimeout: number;
  /** Milliseconds allowed for a whole exchange; 0 means no limit */
  dataTransferTimeout: number;
  logger: Logger;
}

/**
 * Result of one raw exchange, before redirect handling
 */
interface Exchange {
  reply: HttpReply;
  location?: string;
}

let userAgent: string | undefined;

/**
 * Process-wide User-Agent header, computed once on first use
 */
function getUserAgent(): string {
  if (userAgent === undefined) {
    userAgent = `webhdfs-client/${CLIENT_VERSION} node/${process.versions.node}`;
  }
  return userAgent;
}

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

/**
 * Executes WebHDFS requests one at a time over its own HTTP agent
 *
 * A connection is not safe for concurrent use: starting a request while
 * another is in flight rejects with ClientBusyError.
 */
export class HttpConnection {
  private readonly agent: http.Agent;
  private readonly options: ConnectionOptions;
  private busy: boolean = false;
  private closed: boolean = false;

  constructor(options: ConnectionOptions) {
    this.options = options;
    this.agent = new http.Agent({ keepAlive: false, maxSockets: 1 });
  }

  /**
   * Performs the request and returns the reply if the final status matches
   * `request.expectedStatus`
   *
   * Throws ClientSideError for local faults, NetworkError or a timeout error for
   * transport faults, RemoteError for decodable server errors, and
   * UnexpectedStatusError otherwise.
   */
  async execute(request: HttpRequest): Promise<HttpReply> {
    if (this.closed) {
      throw new ClientClosedError();
    }
    if (request.method === 'POST') {
      throw new OperationNotSupportedError('POST requests');
    }
    if (this.busy) {
      throw new ClientBusyError();
    }

    this.busy = true;
    try {
      this.options.logger.debug(
        `${request.method} ${request.url} (expecting ${request.expectedStatus})`
      );
      const reply = await this.perform(request);
      this.options.logger.debug(`${request.method} ${request.url} -> ${reply.statusCode}`);
      return this.checkReply(request, reply);
    } finally {
      this.busy = false;
    }
  }

  /**
   * Runs the exchange, following redirects when the request asks for it
   */
  private async perform(request: HttpRequest): Promise<HttpReply> {
    const { dataTransferTimeout } = this.options;
    // the transfer limit covers every hop of the exchange together
    const deadline = dataTransferTimeout > 0 ? Date.now() + dataTransferTimeout : 0;
    let url = request.url;

    for (let hop = 0; ; hop++) {
      let remaining = 0;
      if (deadline > 0) {
        remaining = deadline - Date.now();
        if (remaining <= 0) {
          throw new NetworkTimeoutError(`${request.method} ${url}`);
        }
      }
      const { reply, location } = await this.exchange(request, url, remaining);

      if (!isRedirect(reply.statusCode) || location === undefined) {
        return reply;
      }

      const target = this.resolveLocation(location, url);
      // a streamed body cannot be replayed, so only bodiless requests are followed
      if (!request.followRedirect || request.dataSource) {
        reply.redirectUrl = target;
        return reply;
      }

      if (hop >= MAX_REDIRECTS) {
        throw new NetworkError(
          request.method,
          url,
          new Error(`maximum of ${MAX_REDIRECTS} redirects exceeded`)
        );
      }
      this.options.logger.debug(`following redirect ${reply.statusCode} to ${target}`);
      url = target;
    }
  }

  private resolveLocation(location: string, base: string): string {
    try {
      return new URL(location, base).toString();
    } catch {
      throw new ProtocolError(`invalid redirect location: ${location}`);
    }
  }

  /**
   * Sends one HTTP request and collects its response within `transferTimeout` ms (0 for no limit)
   */
  private exchange(request: HttpRequest, url: string, transferTimeout: number): Promise<Exchange> {
    const { method, dataSource, dataSink, expectedStatus } = request;
    const { connectTimeout } = this.options;

    return new Promise<Exchange>((resolve, reject) => {
      const reply: HttpReply = { statusCode: 0, unexpectedContent: '' };
      const unexpectedChunks: Buffer[] = [];
      const timers: NodeJS.Timeout[] = [];
      const cleanups: Array<(succeeded: boolean) => void> = [];
      let location: string | undefined;
      let settled = false;

      const cleanup = (succeeded: boolean) => {
        for (const timer of timers) {
          clearTimeout(timer);
        }
        for (const fn of cleanups) {
          fn(succeeded);
        }
      };

      const fail = (error: WebHdfsError) => {
        if (settled) return;
        settled = true;
        cleanup(false);
        reject(error);
      };

      const succeed = () => {
        if (settled) return;
        settled = true;
        cleanup(true);
        if (unexpectedChunks.length > 0) {
          reply.unexpectedContent = Buffer.concat(unexpectedChunks).toString('utf8');
        }
        resolve({ reply, location });
      };

      const headers: http.OutgoingHttpHeaders = { 'User-Agent': getUserAgent() };
      if (method === 'PUT') {
        if (dataSource) {
          headers['Transfer-Encoding'] = 'chunked';
        } else {
          headers['Content-Length'] = '0';
        }
      }

      let req: http.ClientRequest;
      try {
        req = http.request(url, { method, headers, agent: this.agent });
      } catch (err) {
        reject(new NetworkError(method, url, err instanceof Error ? err : new Error(String(err))));
        return;
      }

      // Local faults abort the transfer and win over whatever error the transport reports next
      const abortWithClientError = (message: string) => {
        if (reply.clientError === undefined) {
          reply.statusCode = CLIENT_ERROR_STATUS;
          reply.clientError = message;
        }
        fail(new ClientSideError(reply.clientError));
        req.destroy();
      };

      const onTransportError = (err: Error) => {
        if (reply.clientError !== undefined) {
          fail(new ClientSideError(reply.clientError));
          return;
        }
        fail(new NetworkError(method, url, err));
      };

      req.on('error', onTransportError);

      if (connectTimeout > 0) {
        req.once('socket', (socket: Socket) => {
          if (!socket.connecting) return;
          const timer = setTimeout(() => {
            fail(new ConnectionTimeoutError(url));
            req.destroy();
          }, connectTimeout);
          timers.push(timer);
          socket.once('connect', () => clearTimeout(timer));
        });
      }

      if (transferTimeout > 0) {
        timers.push(
          setTimeout(() => {
            fail(new NetworkTimeoutError(`${method} ${url}`));
            req.destroy();
          }, transferTimeout)
        );
      }

      req.on('response', (res: http.IncomingMessage) => {
        res.on('error', onTransportError);

        const status = res.statusCode;
        if (status === undefined) {
          abortWithClientError('cannot read response status');
          return;
        }
        reply.statusCode = status;
        const locationHeader = res.headers.location;
        if (locationHeader) {
          location = locationHeader;
        }

        if (status !== expectedStatus || !dataSink) {
          res.on('data', (chunk: Buffer) => {
            if (status !== expectedStatus) {
              unexpectedChunks.push(chunk);
            }
          });
          res.on('end', succeed);
          return;
        }

        // Forward the body into the caller's sink, honoring backpressure
        let pendingWrites = 0;
        let ended = false;
        let waitingForDrain = false;

        const onSinkError = (err: Error) => {
          abortWithClientError(`cannot write to data sink: ${err.message}`);
        };
        const onDrain = () => {
          waitingForDrain = false;
          res.resume();
        };
        const releaseSink = () => {
          dataSink.removeListener('error', onSinkError);
        };
        dataSink.once('error', onSinkError);
        cleanups.push((succeeded) => {
          dataSink.removeListener('drain', onDrain);
          if (succeeded) {
            releaseSink();
            return;
          }
          // A failed write emits 'error' on a later tick. Once it has fired the once-listener
          // is gone; an error still pending on a sink that destroys asynchronously keeps it.
          setImmediate(() => {
            if (dataSink.errored === null) {
              releaseSink();
            }
          });
        });

        res.on('data', (chunk: Buffer) => {
          pendingWrites++;
          const ok = dataSink.write(chunk, (err?: Error | null) => {
            pendingWrites--;
            if (err) {
              onSinkError(err);
            } else if (ended && pendingWrites === 0) {
              succeed();
            }
          });
          if (!ok && !waitingForDrain) {
            waitingForDrain = true;
            res.pause();
            dataSink.once('drain', onDrain);
          }
        });

        res.on('end', () => {
          ended = true;
          if (pendingWrites === 0) {
            succeed();
          }
        });
      });

      if (dataSource) {
        const onSourceError = (err: Error) => {
          abortWithClientError(`cannot read from data source: ${err.message}`);
        };
        dataSource.on('error', onSourceError);
        cleanups.push(() => {
          dataSource.removeListener('error', onSourceError);
          dataSource.unpipe(req);
        });
        dataSource.pipe(req);
      } else {
        req.end();
      }
    });
  }

  /**
   * Verifies the final status, decoding the server's error envelope on mismatch
   */
  private checkReply(request: HttpRequest, reply: HttpReply): HttpReply {
    if (reply.statusCode === request.expectedStatus) {
      return reply;
    }

    const remoteError = tryParseRemoteError(reply.unexpectedContent);
    if (remoteError) {
      throw mapRemoteError(reply.statusCode, remoteError);
    }
    throw new UnexpectedStatusError(reply.statusCode, reply.unexpectedContent);
  }

  /**
   * Returns true while a request is in flight
   */
  isBusy(): boolean {
    return this.busy;
  }

  /**
   * Releases the underlying HTTP agent
   *
   * It's safe to call close multiple times.
   */
  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.agent.destroy();
    }
  }
}
