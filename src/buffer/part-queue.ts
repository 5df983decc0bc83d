/**
 * FIFO queue of parts waiting to be pulled
 */

import type { Part } from '../types/part.js';

/**
 * Copies a part so that callers cannot mutate a queued Buffer payload
 */
export function snapshotPart(part: Part): Part {
  return typeof part.payload === 'string'
    ? part
    : { mimetype: part.mimetype, payload: Buffer.from(part.payload) };
}

/**
 * Strict first-in first-out queue of parts
 *
 * Dequeued slots are compacted once they make up half of the backing
 * array, so a long-lived buffer that is pushed and pulled in turn does not
 * grow without bound.
 */
export class PartQueue {
  private items: Part[] = [];
  private head = 0;

  /**
   * Adds a part to the tail
   */
  append(part: Part): void {
    this.items.push(part);
  }

  /**
   * Returns the head without removing it, or undefined when empty
   */
  peek(): Part | undefined {
    return this.head < this.items.length ? this.items[this.head] : undefined;
  }

  /**
   * Removes and returns the head, or undefined when empty
   */
  dequeue(): Part | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const part = this.items[this.head];
    this.head++;

    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return part;
  }

  /**
   * Number of queued parts
   */
  count(): number {
    return this.items.length - this.head;
  }

  /**
   * Removes every queued part
   */
  clear(): void {
    this.items = [];
    this.head = 0;
  }

  /**
   * Snapshot of the queued parts, head first; Buffer payloads are copied
   */
  toArray(): Part[] {
    return this.items.slice(this.head).map(snapshotPart);
  }
}
