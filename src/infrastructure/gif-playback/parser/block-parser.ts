import { GifDocument } from '../../../domain/gif-playback/entities/gif-document.js';
import type { FramePayload, GifFrame } from '../../../domain/gif-playback/entities/gif-frame.js';
import {
  resolveDecoderLimits,
  type DecoderLimits,
} from '../../../domain/gif-playback/value-objects/decoder-limits.js';
import {
  BLOCK_TERMINATOR,
  BlockTag,
  DEFAULT_GRAPHICS_CONTROL,
  DisposalMethod,
  ExtensionLabel,
  GIF_SIGNATURE,
  GIF_VERSIONS,
  paletteEntryCount,
  type GifHeader,
  type GifVersion,
  type GraphicsControlBlock,
  type ImageDescriptor,
  type Palette,
  type SupportedDisposal,
} from '../../../domain/gif-playback/value-objects/gif-blocks.js';
import { IndexStream } from '../../../domain/gif-playback/value-objects/index-stream.js';
import {
  colorResolutionOf,
  colorTableSizeOf,
  disposalMethodOf,
  hasGlobalColorTable,
  hasLocalColorTable,
  hasTransparentColor,
  isGlobalTableSorted,
  isInterlaced,
  isLocalTableSorted,
} from '../../../domain/gif-playback/value-objects/packed-fields.js';
import { GifDecodeError } from '../../../shared/errors/gif-decode-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { CodeTable, MAX_CODE_WIDTH } from '../lzw/code-table.js';
import {
  createDecompressionState,
  decodeLzw,
  resetDecompressionState,
} from '../lzw/lzw-decoder.js';

import { ByteCursor } from './byte-cursor.js';

const GRAPHICS_CONTROL_BLOCK_SIZE = 4;

export interface ScreenContext {
  readonly header: GifHeader;
  readonly globalPalette: Palette | null;
}

/** Called with each frame as soon as its indices are decoded. */
export type FrameSink = (frame: GifFrame, indices: IndexStream, screen: ScreenContext) => void;

export type FrameIngestion =
  | {
      readonly mode: 'decode';
      /** Keep one index stream per frame; otherwise a single stream is reused. */
      readonly retainIndices: boolean;
      readonly onFrame?: FrameSink;
    }
  | { readonly mode: 'compressed' };

export interface ParseOptions {
  readonly ingestion: FrameIngestion;
  readonly limits?: Partial<DecoderLimits>;
}

export function parseGifDocument(bytes: Uint8Array, options: ParseOptions): GifDocument {
  return new GifBlockParser(bytes, options).parse();
}

class GifBlockParser {
  private readonly logger = createChildLogger({ module: 'GifBlockParser' });

  private readonly cursor: ByteCursor;

  private readonly limits: DecoderLimits;

  private readonly frames: GifFrame[] = [];

  private readonly decompression = createDecompressionState();

  private codeTable: CodeTable | null = null;

  private sharedStream: IndexStream | null = null;

  private pendingControl: GraphicsControlBlock | null = null;

  public constructor(
    bytes: Uint8Array,
    private readonly options: ParseOptions,
  ) {
    this.cursor = new ByteCursor(bytes);
    this.limits = resolveDecoderLimits(options.limits);
  }

  public parse(): GifDocument {
    const header = this.readHeader();
    const globalPalette = header.hasGlobalColorTable
      ? this.readPalette(header.globalColorTableSize)
      : null;
    const screen: ScreenContext = { header, globalPalette };

    let reachedTrailer = false;
    while (!reachedTrailer) {
      const offset = this.cursor.offset;
      const tag = this.cursor.readByte();

      switch (tag) {
        case BlockTag.Extension:
          this.readExtension();
          break;
        case BlockTag.Image:
          this.readImage(screen);
          break;
        case BlockTag.Trailer:
          reachedTrailer = true;
          break;
        default:
          throw GifDecodeError.unsupported(
            `Bad block format byte 0x${tag.toString(16).padStart(2, '0')}`,
            { offset, tag },
          );
      }
    }

    if (this.pendingControl) {
      this.logger.debug('Discarding graphics control block with no following image');
    }

    const document = GifDocument.create(
      { header, globalPalette, frames: this.frames },
      this.limits,
    );

    this.logger.debug(
      {
        width: header.width,
        height: header.height,
        frameCount: document.frameCount,
        totalRunTime: document.totalRunTime,
        mode: this.options.ingestion.mode,
      },
      'Parsed GIF document',
    );

    return document;
  }

  private readHeader(): GifHeader {
    const signature = this.cursor.readAscii(3);
    if (signature !== GIF_SIGNATURE) {
      throw GifDecodeError.malformed('Missing GIF signature', { signature });
    }

    const version = this.cursor.readAscii(3);
    if (!isGifVersion(version)) {
      throw GifDecodeError.unsupported(`Unsupported GIF version "${version}"`, { version });
    }

    const width = this.cursor.readUint16();
    const height = this.cursor.readUint16();
    const packed = this.cursor.readByte();
    const backgroundColorIndex = this.cursor.readByte();
    const pixelAspectRatio = this.cursor.readByte();

    if (width * height > this.limits.maxCanvasPixels) {
      throw GifDecodeError.capacityExceeded('Logical screen exceeds the canvas pixel limit', {
        width,
        height,
        maxCanvasPixels: this.limits.maxCanvasPixels,
      });
    }

    return {
      signature: GIF_SIGNATURE,
      version,
      width,
      height,
      hasGlobalColorTable: hasGlobalColorTable(packed),
      colorResolution: colorResolutionOf(packed),
      sortFlag: isGlobalTableSorted(packed),
      globalColorTableSize: colorTableSizeOf(packed),
      backgroundColorIndex,
      pixelAspectRatio,
    };
  }

  private readPalette(sizeField: number): Palette {
    const size = paletteEntryCount(sizeField);
    return { colors: this.cursor.readBytes(size * 3), size };
  }

  private readExtension(): void {
    const label = this.cursor.readByte();
    const blockSize = this.cursor.readByte();

    switch (label) {
      case ExtensionLabel.GraphicsControl:
        this.readGraphicsControl(blockSize);
        break;
      case ExtensionLabel.Application:
        this.cursor.skip(blockSize);
        this.cursor.skipSubBlockChain();
        break;
      case ExtensionLabel.Comment:
        this.cursor.skipSubBlockChain(blockSize);
        break;
      case ExtensionLabel.PlainText:
      case ExtensionLabel.PlainTextLegacy:
        this.cursor.skip(blockSize);
        this.cursor.skipSubBlockChain();
        // Plain text is a graphic rendering block and consumes the control block.
        this.pendingControl = null;
        break;
      default:
        throw GifDecodeError.unsupported(
          `Unknown extension label 0x${label.toString(16).padStart(2, '0')}`,
          { offset: this.cursor.offset - 2, label },
        );
    }
  }

  private readGraphicsControl(blockSize: number): void {
    if (blockSize !== GRAPHICS_CONTROL_BLOCK_SIZE) {
      throw GifDecodeError.malformed('Graphics control extension must be 4 bytes long', {
        offset: this.cursor.offset - 1,
        blockSize,
      });
    }

    const packed = this.cursor.readByte();
    const delay = this.cursor.readUint16();
    const transparentIndex = this.cursor.readByte();
    const terminatorOffset = this.cursor.offset;

    if (this.cursor.readByte() !== BLOCK_TERMINATOR) {
      throw GifDecodeError.malformed('Missing block terminator after graphics control extension', {
        offset: terminatorOffset,
      });
    }

    if (this.pendingControl) {
      this.logger.debug('Graphics control block replaced before any image used it');
    }

    this.pendingControl = {
      delay,
      disposal: toSupportedDisposal(disposalMethodOf(packed)),
      hasTransparency: hasTransparentColor(packed),
      transparentIndex,
    };
  }

  private readImage(screen: ScreenContext): void {
    const offset = this.cursor.offset - 1;
    if (this.frames.length >= this.limits.maxFrames) {
      throw GifDecodeError.capacityExceeded('GIF stream exceeds the frame limit', {
        offset,
        maxFrames: this.limits.maxFrames,
      });
    }

    const descriptor = this.readImageDescriptor();
    const { header } = screen;

    if (descriptor.interlaced) {
      throw GifDecodeError.unsupported('Interlaced images are not supported', { offset });
    }

    if (descriptor.sorted) {
      throw GifDecodeError.unsupported('Sorted local colour tables are not supported', { offset });
    }

    if (
      descriptor.left + descriptor.width > header.width ||
      descriptor.top + descriptor.height > header.height
    ) {
      throw GifDecodeError.malformed('Image rectangle lies outside the logical screen', {
        offset,
        rect: {
          left: descriptor.left,
          top: descriptor.top,
          width: descriptor.width,
          height: descriptor.height,
        },
      });
    }

    const localPalette = descriptor.hasLocalColorTable
      ? this.readPalette(descriptor.localColorTableSize)
      : null;

    if (!localPalette && !screen.globalPalette) {
      throw GifDecodeError.malformed('Image has neither a local nor a global colour table', {
        offset,
      });
    }

    const minCodeSize = this.cursor.readByte();
    if (minCodeSize < 1 || minCodeSize > MAX_CODE_WIDTH) {
      throw GifDecodeError.malformed('LZW minimum code size must be between 1 and 12', {
        offset: this.cursor.offset - 1,
        minCodeSize,
      });
    }

    const graphicsControl = this.pendingControl ?? DEFAULT_GRAPHICS_CONTROL;
    this.pendingControl = null;

    const frameProps = {
      index: this.frames.length,
      descriptor,
      localPalette,
      minCodeSize,
      graphicsControl,
    };

    const { ingestion } = this.options;
    if (ingestion.mode === 'compressed') {
      this.frames.push({
        ...frameProps,
        payload: { kind: 'compressed', data: this.cursor.readSubBlockChain() },
      });
      return;
    }

    const stream = ingestion.retainIndices
      ? new IndexStream(header.width * header.height)
      : this.reusableStream(header);
    this.decodeImageData(minCodeSize, stream);

    const expected = descriptor.width * descriptor.height;
    if (stream.count !== expected) {
      throw GifDecodeError.malformed('Image data does not cover the image rectangle', {
        offset,
        decoded: stream.count,
        expected,
      });
    }

    const payload: FramePayload = ingestion.retainIndices
      ? { kind: 'indices', indices: stream }
      : { kind: 'released' };
    const frame: GifFrame = { ...frameProps, payload };

    this.frames.push(frame);
    ingestion.onFrame?.(frame, stream, screen);
  }

  private readImageDescriptor(): ImageDescriptor {
    const left = this.cursor.readUint16();
    const top = this.cursor.readUint16();
    const width = this.cursor.readUint16();
    const height = this.cursor.readUint16();
    const packed = this.cursor.readByte();

    return {
      left,
      top,
      width,
      height,
      hasLocalColorTable: hasLocalColorTable(packed),
      interlaced: isInterlaced(packed),
      sorted: isLocalTableSorted(packed),
      localColorTableSize: colorTableSizeOf(packed),
    };
  }

  private decodeImageData(minCodeSize: number, stream: IndexStream): void {
    this.codeTable ??= new CodeTable(this.limits.maxChainLength);
    this.codeTable.reset(minCodeSize);
    resetDecompressionState(this.decompression);
    stream.reset();

    for (let chunk = this.cursor.readSubBlock(); chunk; chunk = this.cursor.readSubBlock()) {
      decodeLzw(chunk, this.codeTable, this.decompression, stream);
    }
  }

  private reusableStream(header: GifHeader): IndexStream {
    this.sharedStream ??= new IndexStream(header.width * header.height);
    return this.sharedStream;
  }
}

function isGifVersion(version: string): version is GifVersion {
  return GIF_VERSIONS.some((candidate) => candidate === version);
}

function toSupportedDisposal(method: number): SupportedDisposal {
  switch (method) {
    case DisposalMethod.None:
      return DisposalMethod.None;
    case DisposalMethod.Keep:
      return DisposalMethod.Keep;
    case DisposalMethod.ClearToBackground:
      return DisposalMethod.ClearToBackground;
    case DisposalMethod.RestoreToPrevious:
      throw GifDecodeError.unsupported('Disposal method "restore to previous" is not supported', {
        disposal: method,
      });
    default:
      throw GifDecodeError.unsupported(`Undefined disposal method ${method}`, { disposal: method });
  }
}
