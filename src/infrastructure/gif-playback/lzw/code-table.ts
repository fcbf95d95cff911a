import {
  CODE_TABLE_CAPACITY,
  DEFAULT_DECODER_LIMITS,
} from '../../../domain/gif-playback/value-objects/decoder-limits.js';
import type { IndexStream } from '../../../domain/gif-playback/value-objects/index-stream.js';
import { GifDecodeError } from '../../../shared/errors/gif-decode-error.js';

export const MAX_CODE_WIDTH = 12;

const NO_CODE = -1;

/**
 * LZW dictionary stored as back-linked rows: each row holds the last byte of
 * its string and the code of the prefix. Allocated once, reset in place.
 */
export class CodeTable {
  private readonly lastBytes = new Uint16Array(CODE_TABLE_CAPACITY);

  private readonly prefixes = new Int16Array(CODE_TABLE_CAPACITY);

  private readonly scratch: Uint16Array;

  private minimumCodeSize = 0;

  private width = 0;

  private slots = 0;

  public constructor(maxChainLength: number = DEFAULT_DECODER_LIMITS.maxChainLength) {
    this.scratch = new Uint16Array(maxChainLength);
  }

  public get minCodeSize(): number {
    return this.minimumCodeSize;
  }

  public get clearCode(): number {
    return 1 << this.minimumCodeSize;
  }

  public get endCode(): number {
    return this.clearCode + 1;
  }

  public get codeWidth(): number {
    return this.width;
  }

  public get nextSlot(): number {
    return this.slots;
  }

  public get isFull(): boolean {
    return this.slots >= CODE_TABLE_CAPACITY;
  }

  public reset(minCodeSize: number): void {
    const clearCode = 1 << minCodeSize;
    if (clearCode + 2 > CODE_TABLE_CAPACITY) {
      throw GifDecodeError.capacityExceeded('LZW minimum code size leaves no room in the code table', {
        minCodeSize,
        capacity: CODE_TABLE_CAPACITY,
      });
    }

    for (let code = 0; code < clearCode; code += 1) {
      this.lastBytes[code] = code;
      this.prefixes[code] = NO_CODE;
    }

    this.minimumCodeSize = minCodeSize;
    this.width = minCodeSize + 1;
    this.slots = clearCode + 2;
  }

  public append(lastByte: number, prefix: number): void {
    if (this.isFull) {
      throw GifDecodeError.capacityExceeded('LZW code table is full', { capacity: CODE_TABLE_CAPACITY });
    }

    this.lastBytes[this.slots] = lastByte;
    this.prefixes[this.slots] = prefix;
    this.slots += 1;

    if (this.slots >= 1 << this.width && this.width < MAX_CODE_WIDTH) {
      this.width += 1;
    }
  }

  /** First byte of the string `code` stands for. */
  public firstByte(code: number): number {
    let current = code;
    for (let steps = 0; steps < this.scratch.length; steps += 1) {
      const prefix = this.prefixes[current] ?? NO_CODE;
      if (prefix === NO_CODE) {
        return this.lastBytes[current] ?? 0;
      }

      this.assertNotSelfLinked(current, prefix);
      current = prefix;
    }

    throw this.chainTooLong(code);
  }

  /** Writes the string for `code` into `output`, oldest byte first. */
  public emit(code: number, output: IndexStream): void {
    let length = 0;
    let current = code;

    while (current !== NO_CODE) {
      if (length >= this.scratch.length) {
        throw this.chainTooLong(code);
      }

      const prefix = this.prefixes[current] ?? NO_CODE;
      this.assertNotSelfLinked(current, prefix);
      this.scratch[length] = this.lastBytes[current] ?? 0;
      length += 1;
      current = prefix;
    }

    for (let position = length - 1; position >= 0; position -= 1) {
      output.push(this.scratch[position] ?? 0);
    }
  }

  private assertNotSelfLinked(code: number, prefix: number): void {
    if (prefix === code) {
      throw GifDecodeError.malformed('LZW code table row refers to itself', { code });
    }
  }

  private chainTooLong(code: number): GifDecodeError {
    return GifDecodeError.malformed('LZW code chain exceeds the maximum length', {
      code,
      maxChainLength: this.scratch.length,
    });
  }
}
