/**
 * Unit tests for the WebHDFS client against an in-process namenode/datanode stand-in
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Writable } from 'stream';
import { Client } from '../src/client';
import { ClientConfig, FileType } from '../src/types';
import { WriteOptions } from '../src/options';
import { Logger } from '../src/logger';
import {
  ClientBusyError,
  ClientClosedError,
  FileAlreadyExistsError,
  FileNotFoundError,
  InvalidArgumentError,
  InvalidResponseError,
  ProtocolError,
} from '../src/errors';
import { FakeServer, redirect, sendJson } from './fakeServer';

class RecordingLogger implements Logger {
  readonly warnings: string[] = [];
  debug(): void {}
  info(): void {}
  warn(message: string): void {
    this.warnings.push(message);
  }
  error(): void {}
}

describe('Client', () => {
  describe('Configuration', () => {
    it('should create client with valid configuration', async () => {
      const client = new Client({ host: 'nn.local' });
      expect(client).toBeDefined();

      await client.close();
    });

    it('should create client from an hdfs URI', async () => {
      const client = Client.fromUri('hdfs://nn.local:9870/ignored', { userName: 'hdfs' });
      expect(client).toBeDefined();

      await client.close();
    });

    it('should throw error for invalid configuration', () => {
      expect(() => new Client({ host: '' })).toThrow(InvalidArgumentError);
      expect(() => new Client({ host: 'nn', port: 0 })).toThrow(InvalidArgumentError);
      expect(() => new Client({ host: 'nn', port: 70000 })).toThrow(InvalidArgumentError);
      expect(() => new Client({ host: 'nn', connectTimeout: -1 })).toThrow(InvalidArgumentError);
      expect(() => new Client({ host: 'nn', dataTransferTimeout: 1.5 })).toThrow(
        InvalidArgumentError
      );
      expect(() => Client.fromUri('http://nn.local')).toThrow(InvalidArgumentError);
    });
  });

  describe('Client lifecycle', () => {
    it('should reject operations after close', async () => {
      const client = new Client({ host: 'nn.local' });
      await client.close();

      await expect(client.listDir('/tmp')).rejects.toThrow(ClientClosedError);
      await expect(client.writeFile(Buffer.from('x'), '/tmp/x')).rejects.toThrow(
        ClientClosedError
      );
      await expect(client.remove('/tmp/x')).rejects.toThrow(ClientClosedError);
    });

    it('should handle close idempotently', async () => {
      const client = new Client({ host: 'nn.local' });
      await client.close();
      await client.close(); // Should not throw
    });
  });

  describe('File operations', () => {
    const server = new FakeServer();
    let client: Client;
    let logger: RecordingLogger;

    beforeAll(async () => {
      await server.start();
    });

    afterAll(async () => {
      await server.stop();
    });

    beforeEach(() => {
      server.reset();
      logger = new RecordingLogger();
      const config: ClientConfig = {
        host: '127.0.0.1',
        port: server.port,
        userName: 'tester',
        logger,
      };
      client = new Client(config);
    });

    afterEach(async () => {
      await client.close();
    });

    describe('writeFile', () => {
      it('should create a file in two exchanges', async () => {
        server.handler = (req, res) => {
          if (req.url.startsWith('/webhdfs/')) {
            redirect(res, `${server.baseUrl}/datanode/tmp/f?op=CREATE&overwrite=true`);
          } else {
            res.writeHead(201);
            res.end();
          }
        };
        const data = Buffer.alloc(100, 7);

        await client.writeFile(data, '/tmp/f', new WriteOptions().setOverwrite(true));

        expect(server.requests).toHaveLength(2);
        const [create, upload] = server.requests;
        expect(create.method).toBe('PUT');
        expect(create.url).toBe('/webhdfs/v1/tmp/f?user.name=tester&op=CREATE&overwrite=true');
        expect(create.body.length).toBe(0);
        expect(upload.method).toBe('PUT');
        expect(upload.url).toBe('/datanode/tmp/f?op=CREATE&overwrite=true');
        expect(upload.body.equals(data)).toBe(true);
      });

      it('should accept plain options and string data', async () => {
        server.handler = (req, res) => {
          if (req.url.startsWith('/webhdfs/')) {
            redirect(res, '/datanode/tmp/s');
          } else {
            res.writeHead(201);
            res.end();
          }
        };

        await client.writeFile('text body', '/tmp/s', { replication: 2, blockSize: 1048576 });

        expect(server.requests[0].url).toBe(
          '/webhdfs/v1/tmp/s?user.name=tester&op=CREATE&replication=2&blocksize=1048576'
        );
        expect(server.requests[1].body.toString('utf8')).toBe('text body');
      });

      it('should fail without a redirect to a data node', async () => {
        server.handler = (_req, res) => {
          res.writeHead(307);
          res.end();
        };

        const promise = client.writeFile(Buffer.from('data'), '/tmp/f');

        await expect(promise).rejects.toThrow(ProtocolError);
        await expect(promise).rejects.toThrow('protocol error: no redirection to data node');
        expect(server.requests).toHaveLength(1);
        expect(logger.warnings).toEqual(['CREATE /tmp/f: no Location in 307 reply']);
      });

      it('should surface a remote error from the namenode', async () => {
        server.handler = (_req, res) =>
          sendJson(
            res,
            403,
            '{"RemoteException":{"exception":"FileAlreadyExistsException","javaClassName":"org.apache.hadoop.fs.FileAlreadyExistsException","message":"/tmp/f already exists"}}'
          );

        const promise = client.writeFile(Buffer.from('data'), '/tmp/f');

        await expect(promise).rejects.toThrow(FileAlreadyExistsError);
        await expect(promise).rejects.toThrow('remote error: /tmp/f already exists');
        expect(server.requests).toHaveLength(1);
      });

      it('should fail when the data node does not answer 201', async () => {
        server.handler = (req, res) => {
          if (req.url.startsWith('/webhdfs/')) {
            redirect(res, '/datanode/tmp/f');
          } else {
            res.writeHead(200);
            res.end();
          }
        };

        await expect(client.writeFile(Buffer.from('data'), '/tmp/f')).rejects.toThrow(
          'unexpected server response code: 200'
        );
      });
    });

    describe('readFile', () => {
      it('should follow the redirect and stream into the sink', async () => {
        server.handler = (req, res) => {
          if (req.url.startsWith('/webhdfs/')) {
            redirect(res, '/datanode/tmp/f?op=OPEN&offset=2');
          } else {
            res.writeHead(200);
            res.end('file content');
          }
        };
        const chunks: Buffer[] = [];
        const sink = new Writable({
          write(chunk: Buffer, _encoding, callback) {
            chunks.push(chunk);
            callback();
          },
        });

        await client.readFile('/tmp/f', sink, { offset: 2 });

        expect(Buffer.concat(chunks).toString('utf8')).toBe('file content');
        expect(server.requests.map((r) => r.url)).toEqual([
          '/webhdfs/v1/tmp/f?user.name=tester&op=OPEN&offset=2',
          '/datanode/tmp/f?op=OPEN&offset=2',
        ]);
        expect(sink.writableEnded).toBe(false);
      });

      it('should read a file into a buffer', async () => {
        server.handler = (_req, res) => {
          res.writeHead(200);
          res.end('buffered');
        };

        const data = await client.readFileToBuffer('/tmp/f');

        expect(data.toString('utf8')).toBe('buffered');
      });

      it('should raise FileNotFoundError for a missing file', async () => {
        server.handler = (_req, res) =>
          sendJson(
            res,
            404,
            '{"RemoteException":{"exception":"FileNotFoundException","javaClassName":"java.io.FileNotFoundException","message":"File does not exist: /tmp/none"}}'
          );

        await expect(client.readFileToBuffer('/tmp/none')).rejects.toThrow(FileNotFoundError);
      });
    });

    describe('makeDir', () => {
      it('should accept a true boolean reply', async () => {
        server.handler = (_req, res) => sendJson(res, 200, '{"boolean":true}');

        await client.makeDir('/tmp/new dir', { permission: 755 });

        expect(server.requests[0].method).toBe('PUT');
        expect(server.requests[0].url).toBe(
          '/webhdfs/v1/tmp/new%20dir?user.name=tester&op=MKDIRS&permission=755'
        );
      });

      it('should fail on a false boolean reply', async () => {
        server.handler = (_req, res) => sendJson(res, 200, '{"boolean":false}');

        const promise = client.makeDir('/tmp/d');

        await expect(promise).rejects.toThrow(InvalidResponseError);
        await expect(promise).rejects.toThrow(
          'Invalid response from server: can\'t create dir /tmp/d, reply: {"boolean":false}'
        );
        expect(logger.warnings).toEqual(['MKDIRS /tmp/d rejected: {"boolean":false}']);
      });
    });

    describe('listDir', () => {
      it('should decode the listing', async () => {
        server.handler = (_req, res) =>
          sendJson(
            res,
            200,
            '{"FileStatuses":{"FileStatus":[{"pathSuffix":"a.txt","type":"FILE","length":100,"owner":"tester","group":"users","permission":"644","replication":3,"blockSize":134217728,"accessTime":1,"modificationTime":2}]}}'
          );

        const files = await client.listDir('/tmp');

        expect(server.requests[0].method).toBe('GET');
        expect(server.requests[0].url).toBe('/webhdfs/v1/tmp?user.name=tester&op=LISTSTATUS');
        expect(files).toHaveLength(1);
        expect(files[0].type).toBe(FileType.FILE);
        expect(files[0].pathSuffix).toBe('a.txt');
        expect(files[0].length).toBe(100);
      });

      it('should return an empty list for an unexpected JSON shape', async () => {
        server.handler = (_req, res) => sendJson(res, 200, '{"Other":{}}');

        await expect(client.listDir('/tmp')).resolves.toEqual([]);
      });

      it('should fail for a body that is not JSON', async () => {
        server.handler = (_req, res) => {
          res.writeHead(200);
          res.end('<html>not json</html>');
        };

        await expect(client.listDir('/tmp')).rejects.toThrow('cannot parse directory listing');
      });
    });

    describe('remove', () => {
      it('should send a DELETE with options', async () => {
        server.handler = (_req, res) => sendJson(res, 200, '{"boolean":true}');

        await client.remove('/tmp/d', { recursive: true });

        expect(server.requests[0].method).toBe('DELETE');
        expect(server.requests[0].url).toBe(
          '/webhdfs/v1/tmp/d?user.name=tester&op=DELETE&recursive=true'
        );
      });

      it('should fail on a false boolean reply', async () => {
        server.handler = (_req, res) => sendJson(res, 200, '{"boolean":false}');

        await expect(client.remove('/tmp/d')).rejects.toThrow(
          "Invalid response from server: can't delete /tmp/d"
        );
      });
    });

    describe('rename', () => {
      it('should append the destination verbatim', async () => {
        server.handler = (_req, res) => sendJson(res, 200, '{"boolean":true}');

        await client.rename('/tmp/a', '/tmp/b');

        expect(server.requests[0].method).toBe('PUT');
        expect(server.requests[0].url).toBe(
          '/webhdfs/v1/tmp/a?user.name=tester&op=RENAME&destination=/tmp/b'
        );
      });

      it('should fail on a false boolean reply', async () => {
        server.handler = (_req, res) => sendJson(res, 200, '{"boolean":false}');

        await expect(client.rename('/tmp/a', '/tmp/b')).rejects.toThrow(
          "Invalid response from server: can't rename /tmp/a"
        );
      });
    });

    describe('local files', () => {
      let tempDir: string;

      beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'webhdfs-test-'));
      });

      afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
      });

      it('should upload a local file', async () => {
        const localFile = path.join(tempDir, 'upload.txt');
        fs.writeFileSync(localFile, 'from disk');
        server.handler = (req, res) => {
          if (req.url.startsWith('/webhdfs/')) {
            redirect(res, '/datanode/tmp/upload.txt');
          } else {
            res.writeHead(201);
            res.end();
          }
        };

        await client.uploadFile(localFile, '/tmp/upload.txt', { overwrite: true });

        expect(server.requests[1].body.toString('utf8')).toBe('from disk');
      });

      it('should reject a missing local file before contacting the server', async () => {
        await expect(
          client.uploadFile(path.join(tempDir, 'missing.txt'), '/tmp/x')
        ).rejects.toThrow('ENOENT');
        expect(server.requests).toHaveLength(0);
      });

      it('should download into a local file, creating directories', async () => {
        server.handler = (_req, res) => {
          res.writeHead(200);
          res.end('to disk');
        };
        const localFile = path.join(tempDir, 'nested', 'download.txt');

        await client.downloadToFile('/tmp/f', localFile);

        expect(fs.readFileSync(localFile, 'utf8')).toBe('to disk');
      });
    });

    it('should reject a concurrent operation', async () => {
      server.handler = (_req, res) => {
        setTimeout(() => sendJson(res, 200, '{"boolean":true}'), 50);
      };

      const first = client.makeDir('/tmp/a');
      await expect(client.makeDir('/tmp/b')).rejects.toThrow(ClientBusyError);
      await expect(first).resolves.toBeUndefined();
      expect(server.requests).toHaveLength(1);
    });
  });
});
