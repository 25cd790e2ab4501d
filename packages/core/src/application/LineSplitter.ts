/** Line terminators understood by the splitter. */
export type LineEnding = '\n' | '\r\n';

const LF = 0x0a;
const CR = 0x0d;

/**
 * Re-assembles lines from arbitrarily cut chunks.
 *
 * Text chunks and byte chunks are buffered separately, so a `Buffer` line is
 * never decoded before it is complete. A partial line left over from one kind
 * of chunk is emitted as its own line when the other kind arrives.
 */
export class LineSplitter {
  private readonly stripCr: boolean;
  private text = '';
  private bytes: Buffer = Buffer.alloc(0);

  constructor(lineEnding: LineEnding = '\n') {
    this.stripCr = lineEnding === '\r\n';
  }

  /** Feed a chunk and return the lines it completes, without terminators. */
  push(chunk: string | Buffer): Array<string | Buffer> {
    return typeof chunk === 'string' ? this.pushText(chunk) : this.pushBytes(chunk);
  }

  /** Return the trailing unterminated line, if any, and reset the buffers. */
  flush(): Array<string | Buffer> {
    const lines: Array<string | Buffer> = [];
    if (this.text !== '') lines.push(this.trimText(this.text));
    if (this.bytes.length > 0) lines.push(this.trimBytes(this.bytes));
    this.text = '';
    this.bytes = Buffer.alloc(0);
    return lines;
  }

  private pushText(chunk: string): Array<string | Buffer> {
    const lines: Array<string | Buffer> = [];
    if (this.bytes.length > 0) {
      lines.push(this.trimBytes(this.bytes));
      this.bytes = Buffer.alloc(0);
    }

    const parts = (this.text + chunk).split('\n');
    this.text = parts.pop() ?? '';
    for (const part of parts) {
      lines.push(this.trimText(part));
    }
    return lines;
  }

  private pushBytes(chunk: Buffer): Array<string | Buffer> {
    const lines: Array<string | Buffer> = [];
    if (this.text !== '') {
      lines.push(this.trimText(this.text));
      this.text = '';
    }

    const data = this.bytes.length > 0 ? Buffer.concat([this.bytes, chunk]) : chunk;
    let start = 0;
    let end = data.indexOf(LF, start);
    while (end !== -1) {
      lines.push(this.trimBytes(data.subarray(start, end)));
      start = end + 1;
      end = data.indexOf(LF, start);
    }
    this.bytes = Buffer.from(data.subarray(start));
    return lines;
  }

  private trimText(line: string): string {
    return this.stripCr && line.endsWith('\r') ? line.slice(0, -1) : line;
  }

  private trimBytes(line: Buffer): Buffer {
    return this.stripCr && line.length > 0 && line[line.length - 1] === CR ? line.subarray(0, -1) : line;
  }
}
