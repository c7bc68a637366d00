/**
 * WebHDFS Operation Options
 *
 * Per-operation option builders and the encoder that turns them into
 * a query string fragment. See the WebHDFS REST API docs for option semantics.
 */

import { InvalidArgumentError } from './errors';

/**
 * Anything that can be appended to an operation URL
 */
export interface QueryEncodable {
  toQueryString(): string;
}

/**
 * Encodes options as `&name=value` pairs in iteration order
 *
 * Values are emitted verbatim. The leading `&` assumes the fragment is
 * appended after `op=...`.
 */
export function encodeOptions(options: ReadonlyMap<string, string>): string {
  let query = '';
  for (const [name, value] of options) {
    query += `&${name}=${value}`;
  }
  return query;
}

/**
 * Insertion-ordered set of named option values; setting a name again replaces its value
 */
export class OptionSet implements QueryEncodable {
  private readonly options = new Map<string, string>();

  set(name: string, value: string): this {
    this.options.set(name, value);
    return this;
  }

  get(name: string): string | undefined {
    return this.options.get(name);
  }

  get size(): number {
    return this.options.size;
  }

  toQueryString(): string {
    return encodeOptions(this.options);
  }
}

function checkCount(name: string, value: number): string {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${value}`);
  }
  return String(value);
}

/**
 * Permission is given as octal digits written in decimal, e.g. 755
 */
function checkPermission(value: number): string {
  const text = String(value);
  if (!Number.isSafeInteger(value) || !/^[0-7]{1,4}$/.test(text)) {
    throw new InvalidArgumentError(`permission must be 1-4 octal digits, got ${value}`);
  }
  return text;
}

export interface WriteOptionsInit {
  overwrite?: boolean;
  blockSize?: number;
  replication?: number;
  permission?: number;
  bufferSize?: number;
}

/**
 * Options for CREATE
 */
export class WriteOptions implements QueryEncodable {
  private readonly options = new OptionSet();

  static from(init: WriteOptionsInit | WriteOptions = {}): WriteOptions {
    if (init instanceof WriteOptions) {
      return init;
    }
    const opts = new WriteOptions();
    if (init.overwrite !== undefined) opts.setOverwrite(init.overwrite);
    if (init.blockSize !== undefined) opts.setBlockSize(init.blockSize);
    if (init.replication !== undefined) opts.setReplication(init.replication);
    if (init.permission !== undefined) opts.setPermission(init.permission);
    if (init.bufferSize !== undefined) opts.setBufferSize(init.bufferSize);
    return opts;
  }

  setOverwrite(overwrite: boolean): this {
    this.options.set('overwrite', overwrite ? 'true' : 'false');
    return this;
  }

  setBlockSize(blockSize: number): this {
    this.options.set('blocksize', checkCount('blockSize', blockSize));
    return this;
  }

  setReplication(replication: number): this {
    this.options.set('replication', checkCount('replication', replication));
    return this;
  }

  setPermission(permission: number): this {
    this.options.set('permission', checkPermission(permission));
    return this;
  }

  setBufferSize(bufferSize: number): this {
    this.options.set('buffersize', checkCount('bufferSize', bufferSize));
    return this;
  }

  toQueryString(): string {
    return this.options.toQueryString();
  }
}

export interface AppendOptionsInit {
  bufferSize?: number;
}

/**
 * Options for APPEND
 */
export class AppendOptions implements QueryEncodable {
  private readonly options = new OptionSet();

  static from(init: AppendOptionsInit | AppendOptions = {}): AppendOptions {
    if (init instanceof AppendOptions) {
      return init;
    }
    const opts = new AppendOptions();
    if (init.bufferSize !== undefined) opts.setBufferSize(init.bufferSize);
    return opts;
  }

  setBufferSize(bufferSize: number): this {
    this.options.set('buffersize', checkCount('bufferSize', bufferSize));
    return this;
  }

  toQueryString(): string {
    return this.options.toQueryString();
  }
}

export interface ReadOptionsInit {
  offset?: number;
  length?: number;
  bufferSize?: number;
}

/**
 * Options for OPEN
 */
export class ReadOptions implements QueryEncodable {
  private readonly options = new OptionSet();

  static from(init: ReadOptionsInit | ReadOptions = {}): ReadOptions {
    if (init instanceof ReadOptions) {
      return init;
    }
    const opts = new ReadOptions();
    if (init.offset !== undefined) opts.setOffset(init.offset);
    if (init.length !== undefined) opts.setLength(init.length);
    if (init.bufferSize !== undefined) opts.setBufferSize(init.bufferSize);
    return opts;
  }

  setOffset(offset: number): this {
    this.options.set('offset', checkCount('offset', offset));
    return this;
  }

  setLength(length: number): this {
    this.options.set('length', checkCount('length', length));
    return this;
  }

  setBufferSize(bufferSize: number): this {
    this.options.set('buffersize', checkCount('bufferSize', bufferSize));
    return this;
  }

  toQueryString(): string {
    return this.options.toQueryString();
  }
}

export interface MakeDirOptionsInit {
  permission?: number;
}

/**
 * Options for MKDIRS
 */
export class MakeDirOptions implements QueryEncodable {
  private readonly options = new OptionSet();

  static from(init: MakeDirOptionsInit | MakeDirOptions = {}): MakeDirOptions {
    if (init instanceof MakeDirOptions) {
      return init;
    }
    const opts = new MakeDirOptions();
    if (init.permission !== undefined) opts.setPermission(init.permission);
    return opts;
  }

  setPermission(permission: number): this {
    this.options.set('permission', checkPermission(permission));
    return this;
  }

  toQueryString(): string {
    return this.options.toQueryString();
  }
}

export interface RemoveOptionsInit {
  recursive?: boolean;
}

/**
 * Options for DELETE
 */
export class RemoveOptions implements QueryEncodable {
  private readonly options = new OptionSet();

  static from(init: RemoveOptionsInit | RemoveOptions = {}): RemoveOptions {
    if (init instanceof RemoveOptions) {
      return init;
    }
    const opts = new RemoveOptions();
    if (init.recursive !== undefined) opts.setRecursive(init.recursive);
    return opts;
  }

  setRecursive(recursive: boolean): this {
    this.options.set('recursive', recursive ? 'true' : 'false');
    return this;
  }

  toQueryString(): string {
    return this.options.toQueryString();
  }
}
