import type {
  GifPlaybackLoader,
  GifPlaybackOutcome,
} from '../../../domain/gif-playback/contracts/gif-playback.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { BaseError } from '../../../shared/errors/base.error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import type { LoadGifPlaybackCommand } from '../commands/load-playback.command.js';
import {
  loadGifPlaybackCommandSchema,
  type LoadGifPlaybackInput,
  type LoadGifPlaybackPayload,
} from '../dto/load-playback.dto.js';

export class LoadGifPlaybackHandler {
  private readonly logger = createChildLogger({ module: 'LoadGifPlaybackHandler' });

  public constructor(private readonly loader: GifPlaybackLoader) {}

  public execute(command: LoadGifPlaybackCommand): GifPlaybackOutcome {
    const payload = this.validate(command.payload);

    this.logger.info(
      { strategy: payload.strategy, sizeBytes: payload.source.byteLength, cacheKey: payload.cacheKey },
      'Loading GIF playback',
    );

    try {
      const outcome = this.loader.load({
        source: payload.source,
        strategy: payload.strategy,
        limits: payload.limits,
        cacheKey: payload.cacheKey,
      });

      this.logger.info(
        {
          strategy: outcome.playback.kind,
          frameCount: outcome.playback.frameCount,
          durationSeconds: outcome.playback.durationSeconds,
          decodeTimeMs: outcome.decodeTimeMs,
          cached: outcome.fromCache,
        },
        'GIF playback ready',
      );

      return outcome;
    } catch (error) {
      this.logger.error({ strategy: payload.strategy, error }, 'GIF playback failed to load');
      if (error instanceof BaseError) {
        throw error;
      }

      throw AppError.fromUnknown(error, 'gif-playback.failure');
    }
  }

  private validate(payload: LoadGifPlaybackPayload): LoadGifPlaybackInput {
    const parsed = loadGifPlaybackCommandSchema.safeParse(payload);

    if (!parsed.success) {
      const error = AppError.validation('gif-playback.invalid-payload', {
        issues: parsed.error.issues,
      });
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid GIF playback payload received');
      throw error;
    }

    return parsed.data;
  }
}
