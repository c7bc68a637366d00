/**
 * Basic WebHDFS Client Usage Example
 *
 * This example demonstrates the basic operations:
 * - Creating directories
 * - Writing and reading files
 * - Listing, renaming and deleting
 */

import { Client, ClientConfig, FileType } from '../src';

async function main() {
  console.log('WebHDFS TypeScript Client - Basic Usage Example');
  console.log('='.repeat(50));

  // Configure client
  const config: ClientConfig = {
    host: 'namenode.example.local', // Replace with your namenode host
    port: 50070,
    userName: 'webhdfs-client',
    connectTimeout: 10000,
    dataTransferTimeout: 600000,
  };

  // Create client
  const client = new Client(config);

  try {
    // Example 1: Create a directory
    console.log('\n1. Creating /tmp/webhdfs-example...');
    await client.makeDir('/tmp/webhdfs-example', { permission: 755 });
    console.log('   Directory created!');

    // Example 2: Write a file
    console.log('\n2. Writing a file...');
    await client.writeFile(
      Buffer.from('Hello, WebHDFS! This is a test file.'),
      '/tmp/webhdfs-example/hello.txt',
      { overwrite: true }
    );
    console.log('   Written successfully!');

    // Example 3: Read it back
    console.log('\n3. Reading the file...');
    const data = await client.readFileToBuffer('/tmp/webhdfs-example/hello.txt');
    console.log(`   Read ${data.length} bytes`);
    console.log(`   Content: ${data.toString()}`);

    // Example 4: List the directory
    console.log('\n4. Listing the directory...');
    for (const status of await client.listDir('/tmp/webhdfs-example')) {
      const kind = status.type === FileType.FILE ? 'file' : 'dir ';
      console.log(`   ${kind} ${status.permission} ${status.owner} ${status.length} ${status.pathSuffix}`);
    }

    // Example 5: Rename and delete
    console.log('\n5. Renaming and deleting...');
    await client.rename('/tmp/webhdfs-example/hello.txt', '/tmp/webhdfs-example/renamed.txt');
    await client.remove('/tmp/webhdfs-example', { recursive: true });
    console.log('   Cleaned up!');

    console.log('\n' + '='.repeat(50));
    console.log('Example completed successfully!');
  } catch (error) {
    console.error('\nError:', error);
  } finally {
    // Always close the client
    await client.close();
    console.log('\nClient closed.');
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
