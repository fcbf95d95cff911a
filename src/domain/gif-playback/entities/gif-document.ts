import { AppError } from '../../../shared/errors/app-error.js';
import { GifDecodeError } from '../../../shared/errors/gif-decode-error.js';
import { DEFAULT_DECODER_LIMITS, type DecoderLimits } from '../value-objects/decoder-limits.js';
import {
  backgroundColorOf,
  type GifHeader,
  type GraphicsControlBlock,
  type Palette,
  type RgbaColor,
} from '../value-objects/gif-blocks.js';

import type { GifFrame } from './gif-frame.js';

export interface GifDocumentProps {
  readonly header: GifHeader;
  readonly globalPalette: Palette | null;
  readonly frames: readonly GifFrame[];
}

// Absorbs binary error such as 0.29 * 100 === 28.999999999999996.
const HUNDREDTHS_EPSILON = 1e-6;

export const toHundredths = (seconds: number): number =>
  Math.floor(seconds * 100 + HUNDREDTHS_EPSILON);

export class GifDocument {
  public readonly header: GifHeader;

  public readonly globalPalette: Palette | null;

  public readonly frames: readonly GifFrame[];

  public readonly graphicsControls: readonly GraphicsControlBlock[];

  /**
   * Sum of the delays of the graphics control blocks attached to frames, in
   * hundredths of a second. A control block that no image follows, or that a
   * later one replaces, adds nothing.
   */
  public readonly totalRunTime: number;

  private readonly cumulativeDelays: readonly number[];

  private constructor(props: GifDocumentProps) {
    this.header = props.header;
    this.globalPalette = props.globalPalette;
    this.frames = props.frames;
    this.graphicsControls = props.frames.map((frame) => frame.graphicsControl);

    let elapsed = 0;
    this.cumulativeDelays = this.graphicsControls.map((control) => {
      elapsed += control.delay;
      return elapsed;
    });
    this.totalRunTime = elapsed;
  }

  public static create(
    props: GifDocumentProps,
    limits: Pick<DecoderLimits, 'maxFrames'> = DEFAULT_DECODER_LIMITS,
  ): GifDocument {
    if (props.frames.length === 0) {
      throw GifDecodeError.malformed('GIF stream contains no image frames');
    }

    if (props.frames.length > limits.maxFrames) {
      throw GifDecodeError.capacityExceeded('GIF stream exceeds the frame limit', {
        frameCount: props.frames.length,
        maxFrames: limits.maxFrames,
      });
    }

    return new GifDocument(props);
  }

  public get width(): number {
    return this.header.width;
  }

  public get height(): number {
    return this.header.height;
  }

  public get frameCount(): number {
    return this.frames.length;
  }

  public get durationSeconds(): number {
    return this.totalRunTime / 100;
  }

  public get backgroundColor(): RgbaColor {
    return backgroundColorOf(this.header, this.globalPalette);
  }

  public frameAt(index: number): GifFrame {
    const frame = Number.isInteger(index) ? this.frames[index] : undefined;
    if (!frame) {
      throw AppError.outOfRange('gif-playback.frame-out-of-range', 'Frame index is out of range', {
        index,
        frameCount: this.frames.length,
      });
    }

    return frame;
  }

  /**
   * Frame visible at `seconds`: the first whose cumulative delay is strictly
   * greater than the elapsed hundredths. Without looping, times past the end
   * select the last frame.
   */
  public frameIndexAtTime(seconds: number, looping: boolean): number {
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw AppError.validation('gif-playback.invalid-time', { seconds });
    }

    const elapsed = toHundredths(seconds);
    return this.frameIndexAtHundredths(
      looping && this.totalRunTime > 0 ? elapsed % this.totalRunTime : elapsed,
    );
  }

  public frameIndexAtHundredths(hundredths: number): number {
    if (this.totalRunTime === 0) {
      return 0;
    }

    const index = this.cumulativeDelays.findIndex((cumulative) => cumulative > hundredths);
    return index === -1 ? this.frames.length - 1 : index;
  }
}
