/**
 * Pull-style reader/writer over a net.Socket.
 *
 * The socket stays paused until a worker asks for bytes, so connections that
 * wait in the pool queue do not buffer unboundedly in user space.
 */

import * as net from 'net';
import { v4 as uuidv4 } from 'uuid';
import type { Connection } from './types.js';

// How long a closed connection may linger waiting for the peer's FIN
const CLOSE_GRACE_MS = 2000;

interface PendingRead {
  resolve: (value: Buffer | null) => void;
  reject: (reason: Error) => void;
  timer: NodeJS.Timeout;
}

export class SocketConnection implements Connection {
  readonly id: string;
  readonly remoteAddress: string;
  private pending: Buffer[] = [];
  private ended = false;
  private error: Error | null = null;
  private closed = false;
  private reader: PendingRead | null = null;

  constructor(private readonly socket: net.Socket, id: string = uuidv4().slice(0, 8)) {
    this.id = id;
    this.remoteAddress = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;

    socket.pause();

    socket.on('data', (data: Buffer) => {
      if (this.closed) return;
      this.pending.push(data);
      socket.pause();
      this.settle();
    });

    socket.on('end', () => {
      this.ended = true;
      this.settle();
    });

    socket.on('close', () => {
      this.ended = true;
      this.settle();
    });

    socket.on('error', (error: Error) => {
      this.error = error;
      this.settle();
    });
  }

  read(timeoutMs: number): Promise<Buffer | null> {
    if (this.reader) {
      return Promise.reject(new Error('Read already in progress'));
    }
    if (this.pending.length > 0) {
      return Promise.resolve(this.takePending());
    }
    if (this.error) {
      return Promise.reject(this.error);
    }
    if (this.ended || this.closed) {
      return Promise.resolve(Buffer.alloc(0));
    }

    return new Promise<Buffer | null>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.reader?.timer !== timer) return;
        this.reader = null;
        this.socket.pause();
        resolve(null);
      }, timeoutMs);
      this.reader = { resolve, reject, timer };
      this.socket.resume();
    });
  }

  write(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.error) {
        reject(this.error);
        return;
      }
      if (this.closed || this.socket.destroyed || !this.socket.writable) {
        reject(new Error('Connection is no longer writable'));
        return;
      }
      this.socket.write(data, (error?: Error | null) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Flush and half-close. The socket is destroyed once the peer closes its
   * side or the grace period runs out, whichever comes first.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.reader) {
      clearTimeout(this.reader.timer);
      this.reader.resolve(Buffer.alloc(0));
      this.reader = null;
    }

    if (this.socket.destroyed) return;

    this.pending = [];
    this.socket.setTimeout(CLOSE_GRACE_MS, () => {
      this.socket.destroy();
    });
    // Keep draining so the peer's FIN is seen and the socket can close
    this.socket.resume();
    this.socket.end();
  }

  private takePending(): Buffer {
    const data = this.pending.length === 1 ? this.pending[0] : Buffer.concat(this.pending);
    this.pending = [];
    return data;
  }

  private settle(): void {
    const reader = this.reader;
    if (!reader) return;

    if (this.pending.length > 0) {
      this.reader = null;
      clearTimeout(reader.timer);
      reader.resolve(this.takePending());
    } else if (this.error) {
      this.reader = null;
      clearTimeout(reader.timer);
      reader.reject(this.error);
    } else if (this.ended) {
      this.reader = null;
      clearTimeout(reader.timer);
      reader.resolve(Buffer.alloc(0));
    }
  }
}
