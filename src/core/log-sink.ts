import { appendFileSync, closeSync, existsSync, fstatSync, mkdirSync, openSync, readSync } from 'fs';
import { dirname } from 'path';
import { StringDecoder } from 'string_decoder';

const BLOCK_SIZE = 64 * 1024;
const NEWLINE = 0x0a;

export interface LogReader {
  tailLines(count: number): string[];
}

/**
 * Append-only log of every command's combined output for one run.
 *
 * Bytes are decoded before they hit the file, so a reader never sees half
 * of a multi-byte character even when a chunk boundary splits one.
 */
export class LogSink implements LogReader {
  private readonly decoder = new StringDecoder('utf8');
  private written = 0;

  constructor(readonly path: string) {}

  /** Byte offset of the end of the log. Only ever grows. */
  get bytesWritten(): number {
    return this.written;
  }

  append(chunk: Buffer | string): void {
    this.write(typeof chunk === 'string' ? chunk : this.decoder.write(chunk));
  }

  /**
   * Write out any bytes held back waiting for the rest of a character.
   * Called when a command's output stream ends.
   */
  flush(): void {
    this.write(this.decoder.end());
  }

  tailLines(count: number): string[] {
    if (count <= 0 || !existsSync(this.path)) return [];

    const fd = openSync(this.path, 'r');
    try {
      let position = fstatSync(fd).size;
      const blocks: Buffer[] = [];
      let newlines = 0;

      // One newline more than requested guarantees `count` whole lines.
      while (position > 0 && newlines <= count) {
        const length = Math.min(BLOCK_SIZE, position);
        position -= length;
        const block = Buffer.alloc(length);
        readSync(fd, block, 0, length, position);
        blocks.unshift(block);
        for (const byte of block) {
          if (byte === NEWLINE) newlines++;
        }
      }

      let data = Buffer.concat(blocks);
      if (position > 0) {
        // drop the partial line we started reading in the middle of
        data = data.subarray(data.indexOf(NEWLINE) + 1);
      }

      let text = data.toString('utf8');
      if (text.endsWith('\n')) text = text.slice(0, -1);
      if (text.length === 0) return [];
      return text.split('\n').slice(-count);
    } finally {
      closeSync(fd);
    }
  }

  private write(text: string): void {
    if (text.length === 0) return;
    const dir = dirname(this.path);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    appendFileSync(this.path, text, 'utf-8');
    this.written += Buffer.byteLength(text, 'utf-8');
  }
}
