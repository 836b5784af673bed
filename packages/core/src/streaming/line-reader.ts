import type { Readable } from 'node:stream';
import readline from 'node:readline';

/**
 * Read a stream line by line until it ends.
 *
 * Resolves when the stream ends, closes or fails. A read error stops this
 * reader only and is not reported; the task's exit status carries the outcome.
 * A final line without a trailing newline is still delivered.
 */
export function drainLines(stream: Readable, onLine: (line: string) => void): Promise<void> {
  return new Promise((resolve) => {
    const reader = readline.createInterface({
      input: stream,
      crlfDelay: Number.POSITIVE_INFINITY,
    });

    reader.on('line', onLine);
    reader.once('close', () => resolve());
    reader.on('error', () => reader.close());
    stream.once('error', () => reader.close());
    stream.once('close', () => reader.close());
  });
}
