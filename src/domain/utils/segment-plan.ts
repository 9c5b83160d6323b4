/**
 * Segment boundary planning for fixed-duration splits.
 */

export interface PlannedSegment {
  index: number; // 0-based
  start: number;
  end: number;
  duration: number;
}

/**
 * Plan `ceil(totalDuration / splitDuration)` segments. Every segment but the
 * last lasts exactly `splitDuration`; the last one runs to `totalDuration`,
 * so a remainder never becomes an extra short segment.
 */
export function planSegments(totalDuration: number, splitDuration: number): PlannedSegment[] {
  if (!Number.isFinite(splitDuration) || splitDuration <= 0) {
    throw new RangeError(`Split duration must be a positive number, got ${splitDuration}`);
  }
  if (!Number.isFinite(totalDuration) || totalDuration <= 0) {
    return [];
  }

  const count = Math.ceil(totalDuration / splitDuration);
  const segments: PlannedSegment[] = [];

  for (let i = 0; i < count; i++) {
    const start = i * splitDuration;
    const duration = i === count - 1 ? totalDuration - start : splitDuration;
    segments.push({ index: i, start, end: start + duration, duration });
  }

  return segments;
}

export function segmentFilename(index: number): string {
  return `reel_${String(index + 1).padStart(2, "0")}.mp4`;
}
