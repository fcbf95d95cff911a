import { describe, expect, it } from 'vitest';

import { ByteCursor } from '../../../../src/infrastructure/gif-playback/parser/byte-cursor.js';
import { GifDecodeError } from '../../../../src/shared/errors/gif-decode-error.js';
import { captureError } from '../../../helpers/errors.js';

describe('ByteCursor', () => {
  it('reads little-endian unsigned 16-bit values', () => {
    const cursor = new ByteCursor(Uint8Array.from([0x34, 0x12, 0xff, 0x00]));

    expect(cursor.readUint16()).toBe(0x1234);
    expect(cursor.readUint16()).toBe(0x00ff);
    expect(cursor.remaining).toBe(0);
  });

  it('reads ASCII text', () => {
    const cursor = new ByteCursor(Uint8Array.from([0x47, 0x49, 0x46]));

    expect(cursor.readAscii(3)).toBe('GIF');
  });

  it('returns copies from readBytes', () => {
    const source = Uint8Array.from([1, 2, 3]);
    const cursor = new ByteCursor(source);

    const bytes = cursor.readBytes(2);
    source[0] = 99;

    expect(Array.from(bytes)).toEqual([1, 2]);
    expect(cursor.offset).toBe(2);
  });

  it('raises a malformed-stream error when reading past the end', () => {
    const cursor = new ByteCursor(Uint8Array.from([7]));
    cursor.readByte();

    const error = captureError(() => cursor.readByte());

    expect(error).toBeInstanceOf(GifDecodeError);
    expect(error).toMatchObject({ kind: 'MalformedStream', code: 'gif.malformed-stream' });
  });

  it('rejects a multi-byte read that would overrun the buffer', () => {
    const cursor = new ByteCursor(Uint8Array.from([1, 2, 3]));

    expect(captureError(() => cursor.readBytes(4))).toMatchObject({ kind: 'MalformedStream' });
    expect(cursor.offset).toBe(0);
  });

  it('walks sub-blocks until the zero-length terminator', () => {
    const cursor = new ByteCursor(Uint8Array.from([2, 10, 11, 1, 12, 0, 0x3b]));

    expect(Array.from(cursor.readSubBlock() ?? [])).toEqual([10, 11]);
    expect(Array.from(cursor.readSubBlock() ?? [])).toEqual([12]);
    expect(cursor.readSubBlock()).toBeNull();
    expect(cursor.readByte()).toBe(0x3b);
  });

  it('concatenates a sub-block chain', () => {
    const cursor = new ByteCursor(Uint8Array.from([2, 1, 2, 1, 3, 0]));

    expect(Array.from(cursor.readSubBlockChain())).toEqual([1, 2, 3]);
    expect(cursor.offset).toBe(6);
  });

  it('skips a chain whose first size byte was already consumed', () => {
    const cursor = new ByteCursor(Uint8Array.from([0xaa, 1, 0xbb, 0, 0x3b]));

    cursor.skipSubBlockChain(1);

    expect(cursor.offset).toBe(4);
    expect(cursor.readByte()).toBe(0x3b);
  });

  it('fails on a chain that never terminates', () => {
    const cursor = new ByteCursor(Uint8Array.from([3, 1, 2, 3, 2, 4]));

    expect(captureError(() => cursor.skipSubBlockChain())).toMatchObject({
      kind: 'MalformedStream',
    });
  });
});
