/**
 * Single-producer / single-consumer channel carrying a provider stream to its consumer.
 *
 * The producer pushes records with `send()` and finishes with exactly one terminal
 * signal: `close()` (end-of-stream) or `fail()` (error). Whichever comes first wins;
 * later terminal calls and sends are ignored and return false. `send()` never blocks:
 * records are buffered until the consumer pulls them.
 *
 * The consumer drains the channel with `for await`. Records arrive in order, the loop
 * ends on end-of-stream and throws on error. Leaving the loop early (break, return,
 * a throw in the loop body) abandons the channel, after which the producer's sends
 * are refused so its read loop can stop.
 */
export class StreamChannel<T extends NonNullable<unknown>> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private terminal: { kind: 'end' } | { kind: 'error'; error: Error } | null = null;
  private abandoned = false;
  private iterating = false;
  private wake: (() => void) | null = null;

  /** Settles once the producer task started by `from()` has finished. */
  drained: Promise<void> = Promise.resolve();

  /**
   * Run `source` as this channel's producer task. Every record is forwarded, and the
   * channel is closed when the source is exhausted or failed when it throws.
   */
  static from<T extends NonNullable<unknown>>(source: AsyncIterable<T>): StreamChannel<T> {
    const channel = new StreamChannel<T>();
    channel.drained = channel.pump(source);
    return channel;
  }

  /** True once a terminal signal was sent or the consumer went away. */
  get closed(): boolean {
    return this.terminal !== null || this.abandoned;
  }

  send(value: T): boolean {
    if (this.closed) return false;
    this.buffer.push(value);
    this.notify();
    return true;
  }

  close(): boolean {
    if (this.terminal !== null) return false;
    this.terminal = { kind: 'end' };
    this.notify();
    return true;
  }

  fail(error: unknown): boolean {
    if (this.terminal !== null) return false;
    this.terminal = { kind: 'error', error: toError(error) };
    this.notify();
    return true;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    if (this.iterating) {
      throw new Error('StreamChannel supports a single consumer');
    }
    this.iterating = true;

    try {
      while (true) {
        const next = this.buffer.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }

        if (this.terminal?.kind === 'end') return;
        if (this.terminal?.kind === 'error') throw this.terminal.error;

        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
      }
    } finally {
      if (this.terminal === null) {
        this.abandoned = true;
      }
      this.buffer.length = 0;
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private async pump(source: AsyncIterable<T>): Promise<void> {
    try {
      for await (const value of source) {
        // Consumer left: stop pulling so the upstream read is released
        if (!this.send(value)) break;
      }
      this.close();
    } catch (err) {
      this.fail(err);
    }
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
