import { GifDecodeError } from '../../../shared/errors/gif-decode-error.js';

/**
 * Palette indices of one frame, written in decode order. Capacity is the
 * logical screen pixel count, so no frame can write past it.
 */
export class IndexStream {
  public readonly indices: Uint16Array;

  private length = 0;

  public constructor(capacity: number) {
    this.indices = new Uint16Array(capacity);
  }

  public get count(): number {
    return this.length;
  }

  public get capacity(): number {
    return this.indices.length;
  }

  public push(index: number): void {
    if (this.length >= this.indices.length) {
      throw GifDecodeError.malformed('Frame data decodes to more pixels than the logical screen holds', {
        capacity: this.indices.length,
      });
    }

    this.indices[this.length] = index;
    this.length += 1;
  }

  public reset(): void {
    this.length = 0;
  }

  public toArray(): number[] {
    return Array.from(this.indices.subarray(0, this.length));
  }
}
