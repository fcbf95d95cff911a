import { BaseError } from './base.error.js';

export type GifDecodeErrorKind = 'UnsupportedFeature' | 'MalformedStream' | 'CapacityExceeded';

const ERROR_CODES = {
  UnsupportedFeature: 'gif.unsupported-feature',
  MalformedStream: 'gif.malformed-stream',
  CapacityExceeded: 'gif.capacity-exceeded',
} as const satisfies Record<GifDecodeErrorKind, string>;

/**
 * Raised while reading a GIF byte stream. A document is never returned
 * partially built once one of these has been thrown.
 */
export class GifDecodeError extends BaseError {
  public readonly kind: GifDecodeErrorKind;

  private constructor(kind: GifDecodeErrorKind, message: string, metadata?: Record<string, unknown>) {
    super({ code: ERROR_CODES[kind], message, metadata, exposeMessage: true });
    this.kind = kind;
  }

  /** Valid GIF, but uses something this decoder refuses (interlacing, sorted tables, ...). */
  public static unsupported(message: string, metadata?: Record<string, unknown>): GifDecodeError {
    return new GifDecodeError('UnsupportedFeature', message, metadata);
  }

  public static malformed(message: string, metadata?: Record<string, unknown>): GifDecodeError {
    return new GifDecodeError('MalformedStream', message, metadata);
  }

  public static capacityExceeded(
    message: string,
    metadata?: Record<string, unknown>,
  ): GifDecodeError {
    return new GifDecodeError('CapacityExceeded', message, metadata);
  }
}
