import { describe, expect, it } from 'vitest';

import { ZERO_FRAME_TIME, clampFrameDelta, frameTime } from './input-time.js';

describe('frame time', () => {
  it('starts at zero and defaults the elapsed time to the delta', () => {
    expect(ZERO_FRAME_TIME).toEqual({ deltaSecs: 0, elapsedSecs: 0 });
    expect(Object.isFrozen(ZERO_FRAME_TIME)).toBe(true);
    expect(frameTime(0.5)).toEqual({ deltaSecs: 0.5, elapsedSecs: 0.5 });
    expect(frameTime(0.25, 3)).toEqual({ deltaSecs: 0.25, elapsedSecs: 3 });
  });

  it('clamps deltas into the allowed range', () => {
    expect(clampFrameDelta(0.5, 1)).toBe(0.5);
    expect(clampFrameDelta(4, 1)).toBe(1);
    expect(clampFrameDelta(-0.1, 1)).toBe(0);
    expect(clampFrameDelta(Number.POSITIVE_INFINITY, 1)).toBe(0);
    expect(clampFrameDelta(Number.NaN, 1)).toBe(0);
  });
});
