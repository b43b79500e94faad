/**
 * Time of the frame being evaluated, in seconds.
 */
export type FrameTime = Readonly<{
  /**
   * Time elapsed since the previous frame.
   */
  deltaSecs: number;
  /**
   * Total time since the runtime started receiving frames.
   */
  elapsedSecs: number;
}>;

export const ZERO_FRAME_TIME: FrameTime = Object.freeze({
  deltaSecs: 0,
  elapsedSecs: 0,
});

export const frameTime = (deltaSecs: number, elapsedSecs = deltaSecs): FrameTime =>
  Object.freeze({ deltaSecs, elapsedSecs });

/**
 * Clamps a host-supplied delta into `[0, maxDeltaSecs]`; non-finite deltas
 * count as zero.
 */
export function clampFrameDelta(deltaSecs: number, maxDeltaSecs: number): number {
  if (!Number.isFinite(deltaSecs) || deltaSecs <= 0) {
    return 0;
  }
  return Math.min(deltaSecs, maxDeltaSecs);
}
