import type { IndexStream } from '../../../domain/gif-playback/value-objects/index-stream.js';
import { GifDecodeError } from '../../../shared/errors/gif-decode-error.js';

import type { CodeTable } from './code-table.js';

/**
 * Everything needed to resume decoding where the previous chunk stopped,
 * including a code whose bits straddle two sub-blocks.
 */
export interface DecompressionState {
  partialCode: number;
  partialBits: number;
  /** Next bit to read within the current byte. */
  mask: number;
  previousCode: number | null;
  ended: boolean;
}

export function createDecompressionState(): DecompressionState {
  return { partialCode: 0, partialBits: 0, mask: 0x01, previousCode: null, ended: false };
}

export function resetDecompressionState(state: DecompressionState): void {
  state.partialCode = 0;
  state.partialBits = 0;
  state.mask = 0x01;
  state.previousCode = null;
  state.ended = false;
}

/**
 * Decodes one chunk of LZW data into `output`. Chunks of the same frame must
 * be fed in order with the same table and state; the result does not depend
 * on where the chunk boundaries fall.
 */
export function decodeLzw(
  bytes: Uint8Array,
  table: CodeTable,
  state: DecompressionState,
  output: IndexStream,
): DecompressionState {
  let code = state.partialCode;
  let bits = state.partialBits;
  let mask = state.mask;
  let position = 0;

  while (!state.ended && position < bytes.length) {
    const width = table.codeWidth;

    while (bits < width && position < bytes.length) {
      if (((bytes[position] ?? 0) & mask) !== 0) {
        code |= 1 << bits;
      }

      bits += 1;
      mask <<= 1;
      if (mask === 0x100) {
        mask = 0x01;
        position += 1;
      }
    }

    if (bits < width) {
      break;
    }

    processCode(code, table, state, output);
    code = 0;
    bits = 0;
  }

  state.partialCode = code;
  state.partialBits = bits;
  state.mask = mask;
  return state;
}

function processCode(
  code: number,
  table: CodeTable,
  state: DecompressionState,
  output: IndexStream,
): void {
  if (code === table.clearCode) {
    table.reset(table.minCodeSize);
    state.previousCode = null;
    return;
  }

  if (code === table.endCode) {
    state.ended = true;
    return;
  }

  const previous = state.previousCode;
  if (code > table.nextSlot || (code === table.nextSlot && previous === null)) {
    throw GifDecodeError.malformed('LZW code is not yet defined', {
      code,
      nextSlot: table.nextSlot,
    });
  }

  if (previous !== null && !table.isFull) {
    // KwKwK: the new string starts with the previous string's first byte.
    const source = code === table.nextSlot ? previous : code;
    table.append(table.firstByte(source), previous);
  }

  state.previousCode = code;
  table.emit(code, output);
}
