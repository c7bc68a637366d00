/**
 * Copy Example
 *
 * Copies files between the local filesystem and WebHDFS, or prints a remote file:
 *
 *   ts-node examples/copy-example.ts cat hdfs://namenode/tmp/file.txt
 *   ts-node examples/copy-example.ts cp ./local.txt hdfs://namenode/tmp/file.txt
 *   ts-node examples/copy-example.ts cp hdfs://namenode/tmp/file.txt ./local.txt
 */

import { Client, RemoteError, parseHdfsUri } from '../src';

async function withClient(uri: string, action: (client: Client, remotePath: string) => Promise<void>) {
  const { path } = parseHdfsUri(uri);
  const client = Client.fromUri(uri, { userName: 'webhdfs-client', connectTimeout: 10000 });
  try {
    await action(client, path);
  } finally {
    await client.close();
  }
}

async function main(args: string[]) {
  const [command, src, dest] = args;

  if (command === 'cat' && src) {
    await withClient(src, (client, remotePath) => client.readFile(remotePath, process.stdout));
  } else if (command === 'cp' && src && dest) {
    if (src.startsWith('hdfs://')) {
      console.log(`Copying ${src} to ${dest}...`);
      await withClient(src, (client, remotePath) => client.downloadToFile(remotePath, dest));
    } else {
      console.log(`Copying ${src} to ${dest}...`);
      await withClient(dest, (client, remotePath) =>
        client.uploadFile(src, remotePath, { overwrite: true })
      );
    }
  } else {
    console.error('Usage: copy-example (cat <hdfs-uri> | cp <src> <dest>)');
    process.exitCode = 2;
  }
}

main(process.argv.slice(2)).catch((error) => {
  if (error instanceof RemoteError) {
    console.error(`Server rejected the request (${error.exception}): ${error.remoteMessage}`);
  } else {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exitCode = 1;
});
