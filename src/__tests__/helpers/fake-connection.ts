/**
 * In-memory Connection for handler and response tests.
 *
 * Reads hand out the queued chunks one at a time; once they run out the
 * connection reports end of stream, or a read timeout when
 * `onExhausted: 'timeout'` is set.
 */

import type { Connection } from '../../http/types.js';

export interface FakeConnectionOptions {
  id?: string;
  remoteAddress?: string;
  onExhausted?: 'eof' | 'timeout';
  failWrites?: boolean;
}

export class FakeConnection implements Connection {
  readonly id: string;
  readonly remoteAddress: string;
  readonly writes: Buffer[] = [];
  readonly readTimeouts: number[] = [];
  closed = false;
  closeCount = 0;
  private chunks: Buffer[];

  constructor(
    chunks: Array<string | Buffer> = [],
    private readonly options: FakeConnectionOptions = {}
  ) {
    this.id = options.id ?? 'fake0001';
    this.remoteAddress = options.remoteAddress ?? '127.0.0.1:50000';
    this.chunks = chunks.map((chunk) => (typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk));
  }

  async read(timeoutMs: number): Promise<Buffer | null> {
    this.readTimeouts.push(timeoutMs);
    const next = this.chunks.shift();
    if (next !== undefined) {
      return next;
    }
    return this.options.onExhausted === 'timeout' ? null : Buffer.alloc(0);
  }

  async write(data: Buffer): Promise<void> {
    if (this.closed) {
      throw new Error('Connection is no longer writable');
    }
    if (this.options.failWrites) {
      throw new Error('write EPIPE');
    }
    this.writes.push(Buffer.from(data));
  }

  close(): void {
    this.closeCount++;
    this.closed = true;
  }

  output(): Buffer {
    return Buffer.concat(this.writes);
  }
}
