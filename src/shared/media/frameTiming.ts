export interface FrameTimingStats {
  averageDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  stdDeviationMs: number;
  fps: number;
  /** Frames with no delay; players treat these as shown together with the next frame. */
  zeroDelayFrames: number;
}

export function roundToPrecision(value: number, precision = 2): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

export function calculateFrameTimingStats(delaysMs: readonly number[]): FrameTimingStats {
  if (delaysMs.length === 0) {
    return {
      averageDelayMs: 0,
      minDelayMs: 0,
      maxDelayMs: 0,
      stdDeviationMs: 0,
      fps: 0,
      zeroDelayFrames: 0,
    };
  }

  const total = delaysMs.reduce((sum, delay) => sum + delay, 0);
  const average = total / delaysMs.length;
  const min = Math.min(...delaysMs);
  const max = Math.max(...delaysMs);
  const variance =
    delaysMs.reduce((acc, delay) => acc + (delay - average) ** 2, 0) / delaysMs.length;
  const stdDeviation = Math.sqrt(variance);
  const fps = average > 0 ? 1000 / average : 0;

  return {
    averageDelayMs: roundToPrecision(average, 3),
    minDelayMs: roundToPrecision(min, 3),
    maxDelayMs: roundToPrecision(max, 3),
    stdDeviationMs: roundToPrecision(stdDeviation, 3),
    fps: roundToPrecision(fps, 3),
    zeroDelayFrames: delaysMs.filter((delay) => delay === 0).length,
  };
}

/** GIF delays are stored in hundredths of a second. */
export function hundredthsToMs(delays: readonly number[]): number[] {
  return delays.map((delay) => delay * 10);
}
