import { GifDecodeError } from '../../../shared/errors/gif-decode-error.js';

/** Forward-only reader over a GIF byte buffer. Every read is bounds-checked. */
export class ByteCursor {
  private position = 0;

  public constructor(private readonly data: Uint8Array) {}

  public get offset(): number {
    return this.position;
  }

  public get remaining(): number {
    return this.data.length - this.position;
  }

  public readByte(): number {
    const value = this.data[this.position];
    if (value === undefined) {
      throw this.endOfData(1);
    }

    this.position += 1;
    return value;
  }

  public readUint16(): number {
    const low = this.readByte();
    const high = this.readByte();
    return low | (high << 8);
  }

  /** Copies `count` bytes out of the underlying buffer. */
  public readBytes(count: number): Uint8Array {
    return this.data.slice(this.position, this.advance(count));
  }

  public readAscii(count: number): string {
    return String.fromCharCode(...this.readBytes(count));
  }

  public skip(count: number): void {
    this.advance(count);
  }

  /**
   * Reads one data sub-block and returns a view of its payload, or null on
   * the zero-length terminator. The view is only valid until the caller
   * hands control back.
   */
  public readSubBlock(): Uint8Array | null {
    const size = this.readByte();
    if (size === 0) {
      return null;
    }

    const start = this.position;
    return this.data.subarray(start, this.advance(size));
  }

  /** Concatenates a sub-block chain up to and including its terminator. */
  public readSubBlockChain(): Uint8Array {
    const chunks: Uint8Array[] = [];
    let total = 0;

    for (let chunk = this.readSubBlock(); chunk; chunk = this.readSubBlock()) {
      chunks.push(chunk);
      total += chunk.length;
    }

    const data = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      data.set(chunk, offset);
      offset += chunk.length;
    }

    return data;
  }

  /**
   * Skips a sub-block chain. Pass `firstSize` when the size byte of the
   * first sub-block has already been consumed.
   */
  public skipSubBlockChain(firstSize?: number): void {
    let size = firstSize ?? this.readByte();
    while (size !== 0) {
      this.advance(size);
      size = this.readByte();
    }
  }

  private advance(count: number): number {
    const end = this.position + count;
    if (end > this.data.length) {
      throw this.endOfData(count);
    }

    this.position = end;
    return end;
  }

  private endOfData(requested: number): GifDecodeError {
    return GifDecodeError.malformed('Unexpected end of GIF data', {
      offset: this.position,
      requested,
      length: this.data.length,
    });
  }
}
