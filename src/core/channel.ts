// src/core/channel.ts
// Unbounded results channel: any task may send, only the session drains.

/**
 * Channel: FIFO buffer of messages with a non-blocking drain.
 */
export class Channel<T> {
  private buffer: T[] = [];
  private closed = false;
  private readonly listeners = new Set<() => void>();

  /**
   * Append a message. Messages sent after close() are dropped.
   * Returns whether the message was accepted.
   */
  send(message: T): boolean {
    if (this.closed) return false;
    this.buffer.push(message);
    for (const wake of this.listeners) wake();
    return true;
  }

  /**
   * Take every buffered message, oldest first. Never blocks.
   */
  drain(): T[] {
    const out = this.buffer;
    this.buffer = [];
    return out;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Register a callback run after each send. Returns a function that removes it.
   */
  onSend(wake: () => void): () => void {
    this.listeners.add(wake);
    return () => {
      this.listeners.delete(wake);
    };
  }

  close(): void {
    this.closed = true;
    this.buffer = [];
    this.listeners.clear();
  }
}
