/**
 * Bounded history of formatted log lines shared by every worker.
 *
 * All mutation and copying happens inside synchronous method bodies. Workers
 * interleave only at await points, so append() and snapshot() never observe
 * each other half-done and eviction order always follows call order.
 */

import { RingBuffer } from './buffer.js';

export const DEFAULT_LOG_BUFFER_CAPACITY = 500;

export class LogBuffer {
  private lines: RingBuffer<string>;

  constructor(capacity = DEFAULT_LOG_BUFFER_CAPACITY) {
    this.lines = new RingBuffer<string>(capacity);
  }

  append(line: string): void {
    this.lines.push(line);
  }

  /**
   * Immutable copy of the buffered lines, oldest first.
   */
  snapshot(): readonly string[] {
    return Object.freeze(this.lines.toArray());
  }

  get size(): number {
    return this.lines.getSize();
  }

  get capacity(): number {
    return this.lines.getCapacity();
  }

  clear(): void {
    this.lines.clear();
  }
}
