import readline from 'readline';
import type { Readable } from 'stream';

/**
 * Pull-style line reader over a child process pipe.
 *
 * Lines that arrive while nobody is waiting are buffered, so a response that
 * is written in one burst is not lost between two `next()` calls. `next()`
 * resolves to `null` once the stream has ended and the buffer is drained.
 */
export class LineReader {
  private readonly buffered: string[] = [];
  private readonly waiters: Array<(line: string | null) => void> = [];
  private readonly rl: readline.Interface;
  private ended = false;

  constructor(input: Readable) {
    this.rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });
    this.rl.on('line', (line) => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.buffered.push(line);
      }
    });
    this.rl.on('close', () => {
      this.ended = true;
      for (const waiter of this.waiters.splice(0)) {
        waiter(null);
      }
    });
  }

  get isEnded(): boolean {
    return this.ended && this.buffered.length === 0;
  }

  next(): Promise<string | null> {
    const line = this.buffered.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.ended) return;
    this.rl.close();
  }
}
