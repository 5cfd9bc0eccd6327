import { StringDecoder } from 'string_decoder';
import { Transform } from 'stream';
import type { TransformCallback } from 'stream';

const LINE_BREAK_REGEX = /\r\n|\r|\n/;

/**
 * A Transform stream that turns arbitrary text chunks into lines.
 *
 * A line may be split across any number of chunks, and so may a multi-byte
 * UTF-8 character. Each complete line is pushed without its terminator
 * (`\n`, `\r\n` or a lone `\r`). Whatever is left when the input ends is pushed as the
 * last line.
 *
 * @example
 * // Input chunks: "REITS:\r\nBob Jo", "nes\nAnn Lee"
 * // Output (chunks): "REITS:", "Bob Jones", "Ann Lee"
 */
export class LineSplitter extends Transform {
  private buffer = '';
  private decoder = new StringDecoder('utf8');

  constructor() {
    super({ readableObjectMode: true });
  }

  _transform(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    this.buffer +=
      typeof chunk === 'string' ? chunk : this.decoder.write(chunk);

    this.pushCompleteLines(false);
    callback();
  }

  _flush(callback: TransformCallback): void {
    this.buffer += this.decoder.end();
    this.pushCompleteLines(true);
    if (this.buffer) {
      this.push(this.buffer);
      this.buffer = '';
    }
    callback();
  }

  /**
   * Pushes every terminated line in the buffer. A `\r` at the very end is
   * held back until the input ends, since the next chunk may start with `\n`.
   */
  private pushCompleteLines(isFinal: boolean): void {
    let match = LINE_BREAK_REGEX.exec(this.buffer);
    while (match) {
      if (
        !isFinal &&
        match[0] === '\r' &&
        match.index === this.buffer.length - 1
      ) {
        return;
      }
      this.push(this.buffer.slice(0, match.index));
      this.buffer = this.buffer.slice(match.index + match[0].length);
      match = LINE_BREAK_REGEX.exec(this.buffer);
    }
  }
}
