import { describe, expect, it } from 'vitest';

import type { GifPlaybackRequest } from '../../../../src/domain/gif-playback/contracts/gif-playback.js';
import { PlaybackCache } from '../../../../src/infrastructure/gif-playback/cache/playback-cache.js';
import { GifPlaybackService } from '../../../../src/infrastructure/gif-playback/gif-playback.service.js';
import { GifDecodeError } from '../../../../src/shared/errors/gif-decode-error.js';
import { captureError } from '../../../helpers/errors.js';
import { buildGif } from '../../../helpers/gif-fixture.js';

const source = buildGif({
  width: 2,
  height: 1,
  globalPalette: [
    [255, 0, 0],
    [0, 255, 0],
  ],
  frames: [
    { width: 2, height: 1, indices: [0, 1], delay: 10 },
    { width: 2, height: 1, indices: [1, 0], delay: 10 },
  ],
});

const request = (overrides: Partial<GifPlaybackRequest> = {}): GifPlaybackRequest => ({
  source,
  strategy: 'full-cache',
  limits: {},
  ...overrides,
});

describe('GifPlaybackService', () => {
  it('serves a cached full-cache playback for a repeated key', () => {
    const service = new GifPlaybackService();

    const first = service.load(request({ cacheKey: 'sample' }));
    const second = service.load(request({ cacheKey: 'sample' }));

    expect(first.fromCache).toBe(false);
    expect(first.decodeTimeMs).toBeGreaterThanOrEqual(0);
    expect(second.fromCache).toBe(true);
    expect(second.decodeTimeMs).toBe(0);
    expect(second.playback).toBe(first.playback);
  });

  it('decodes again without a cache key', () => {
    const service = new GifPlaybackService();

    const first = service.load(request());
    const second = service.load(request());

    expect(second.fromCache).toBe(false);
    expect(second.playback).not.toBe(first.playback);
  });

  it.each(['streaming-index', 'streaming-compressed'] as const)(
    'never caches %s playbacks',
    (strategy) => {
      const service = new GifPlaybackService();

      const first = service.load(request({ strategy, cacheKey: 'sample' }));
      const second = service.load(request({ strategy, cacheKey: 'sample' }));

      expect(first.playback.kind).toBe(strategy);
      expect(second.fromCache).toBe(false);
      expect(second.playback).not.toBe(first.playback);
    },
  );

  it('keeps full-cache entries apart from streaming requests with the same key', () => {
    const service = new GifPlaybackService();

    service.load(request({ strategy: 'streaming-index', cacheKey: 'sample' }));
    const outcome = service.load(request({ cacheKey: 'sample' }));

    expect(outcome.fromCache).toBe(false);
    expect(outcome.playback.kind).toBe('full-cache');
  });

  it('evicts the least recently used entry', () => {
    const service = new GifPlaybackService({ cacheEntries: 1 });

    service.load(request({ cacheKey: 'a' }));
    service.load(request({ cacheKey: 'b' }));

    expect(service.load(request({ cacheKey: 'b' })).fromCache).toBe(true);
    expect(service.load(request({ cacheKey: 'a' })).fromCache).toBe(false);
  });

  it('re-checks decoder limits instead of serving an entry parsed under looser ones', () => {
    const service = new GifPlaybackService();

    expect(service.load(request({ cacheKey: 'sample' })).playback.frameCount).toBe(2);
    const error = captureError(() =>
      service.load(request({ cacheKey: 'sample', limits: { maxFrames: 1 } })),
    );

    expect(error).toBeInstanceOf(GifDecodeError);
    expect(error).toMatchObject({ kind: 'CapacityExceeded' });
  });

  it('treats explicit default limits like omitted ones', () => {
    const service = new GifPlaybackService();

    const first = service.load(request({ cacheKey: 'sample' }));
    const second = service.load(request({ cacheKey: 'sample', limits: { maxFrames: 4096 } }));

    expect(second.fromCache).toBe(true);
    expect(second.playback).toBe(first.playback);
  });
});

describe('PlaybackCache.keyFor', () => {
  it('combines the key with the resolved limits', () => {
    expect(PlaybackCache.keyFor('sample')).toBe('sample|4096:4096:16777216');
    expect(PlaybackCache.keyFor('sample', { maxFrames: 1 })).toBe('sample|1:4096:16777216');
  });
});
