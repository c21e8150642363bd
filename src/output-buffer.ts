export type RetainMode = 'head' | 'tail';

/**
 * Accumulates text up to `limit` bytes. In `head` mode later data is
 * dropped once full; in `tail` mode the oldest data is dropped instead.
 * Either way `truncated` records that something was lost.
 */
export class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  private lost = false;

  constructor(private readonly limit: number, private readonly mode: RetainMode = 'head') {}

  append(chunk: Buffer | string): void {
    const data = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    if (data.length === 0) {
      return;
    }

    if (this.mode === 'head') {
      const room = this.limit - this.size;
      if (room <= 0) {
        this.lost = true;
        return;
      }
      const kept = data.length > room ? data.subarray(0, room) : data;
      if (kept.length < data.length) {
        this.lost = true;
      }
      this.chunks.push(kept);
      this.size += kept.length;
      return;
    }

    this.chunks.push(data);
    this.size += data.length;
    this.trimHead();
  }

  get byteLength(): number {
    return this.size;
  }

  get truncated(): boolean {
    return this.lost;
  }

  toString(): string {
    return Buffer.concat(this.chunks, this.size).toString('utf8');
  }

  /** Returns everything held and empties the buffer. The truncated flag resets too. */
  drain(): { text: string; truncated: boolean } {
    const drained = { text: this.toString(), truncated: this.lost };
    this.chunks = [];
    this.size = 0;
    this.lost = false;
    return drained;
  }

  private trimHead(): void {
    let excess = this.size - this.limit;
    if (excess <= 0) {
      return;
    }
    this.lost = true;

    while (excess > 0) {
      const first = this.chunks[0];
      if (!first) {
        break;
      }
      if (first.length <= excess) {
        this.chunks.shift();
        this.size -= first.length;
        excess -= first.length;
      } else {
        this.chunks[0] = first.subarray(excess);
        this.size -= excess;
        excess = 0;
      }
    }
  }
}
