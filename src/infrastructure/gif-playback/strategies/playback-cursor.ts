import type { GifDocument } from '../../../domain/gif-playback/entities/gif-document.js';
import { AppError } from '../../../shared/errors/app-error.js';

/**
 * Tracks elapsed playback time and the visible frame. The visible frame moves
 * at most one step per tick, so a slow caller never skips a frame's disposal.
 */
export class PlaybackCursor {
  private elapsedSeconds = 0;

  private visibleIndex = 0;

  public constructor(private readonly document: GifDocument) {}

  public get frameIndex(): number {
    return this.visibleIndex;
  }

  /** Returns the newly visible frame index, or null when nothing changes. */
  public advance(deltaSeconds: number): number | null {
    if (!Number.isFinite(deltaSeconds) || deltaSeconds < 0) {
      throw AppError.validation('gif-playback.invalid-delta', { deltaSeconds });
    }

    const duration = this.document.durationSeconds;
    if (duration === 0) {
      return null;
    }

    this.elapsedSeconds = (this.elapsedSeconds + deltaSeconds) % duration;
    const target = this.document.frameIndexAtTime(this.elapsedSeconds, true);
    if (target === this.visibleIndex) {
      return null;
    }

    this.visibleIndex = (this.visibleIndex + 1) % this.document.frameCount;
    return this.visibleIndex;
  }
}
