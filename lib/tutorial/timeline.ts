import type { NarrationClip, Segment, TimelineEntry, TutorialRun, TutorialTimeline } from '@/types/tutorial';
import { TimelineInvariantError } from '@/lib/tutorial/errors';

// Offsets are rounded to the millisecond upstream.
const EPSILON_SEC = 0.002;

const round = (value: number) => Math.round(value * 1000) / 1000;

function executedSegments(segments: readonly Segment[]): Segment[] {
  return segments.filter((s) => s.status === 'executed');
}

/**
 * Lays the sealed intervals and their clips out on one timeline. Throws
 * `TimelineInvariantError` when the run is inconsistent: missing or extra
 * intervals, clips without an interval, out-of-order or overlapping entries.
 */
export function buildTimeline(run: TutorialRun): TutorialTimeline {
  const executed = executedSegments(run.segments);
  if (executed.length !== run.intervals.length) {
    throw new TimelineInvariantError(
      `Expected one interval per executed segment (${executed.length}), found ${run.intervals.length}`
    );
  }

  const clipsByIndex = new Map<number, NarrationClip>();
  for (const clip of run.clips) {
    if (clipsByIndex.has(clip.segmentIndex)) {
      throw new TimelineInvariantError(`Segment ${clip.segmentIndex} has more than one narration clip`);
    }
    clipsByIndex.set(clip.segmentIndex, clip);
  }

  const entries: TimelineEntry[] = [];
  let previousEnd = 0;
  let previousIndex = -1;

  run.intervals.forEach((interval, position) => {
    const segment = executed[position];
    if (interval.segmentIndex !== segment.index) {
      throw new TimelineInvariantError(
        `Interval ${position} belongs to segment ${interval.segmentIndex}, expected ${segment.index}`
      );
    }
    if (interval.segmentIndex <= previousIndex) {
      throw new TimelineInvariantError(`Intervals are not ordered by segment index at ${interval.segmentIndex}`);
    }
    if (interval.endOffsetSec < interval.startOffsetSec) {
      throw new TimelineInvariantError(`Interval for segment ${interval.segmentIndex} ends before it starts`);
    }
    if (interval.startOffsetSec + EPSILON_SEC < previousEnd) {
      throw new TimelineInvariantError(
        `Interval for segment ${interval.segmentIndex} starts at ${interval.startOffsetSec}s, before the previous entry ends at ${previousEnd}s`
      );
    }

    const clip = clipsByIndex.get(interval.segmentIndex) ?? null;
    clipsByIndex.delete(interval.segmentIndex);
    let endSec = interval.endOffsetSec;
    if (clip) {
      if (clip.startOffsetSec + EPSILON_SEC < interval.startOffsetSec) {
        throw new TimelineInvariantError(`Narration for segment ${clip.segmentIndex} starts before its interval`);
      }
      endSec = Math.max(endSec, clip.startOffsetSec + clip.durationSec);
    }

    entries.push({
      segmentIndex: interval.segmentIndex,
      interval,
      clip,
      startSec: interval.startOffsetSec,
      endSec: round(endSec),
      holdSec: round(endSec - interval.endOffsetSec),
      audioDelaySec: clip ? round(Math.max(0, clip.startOffsetSec - interval.startOffsetSec)) : 0,
      caption: segment.explanation
    });
    previousEnd = endSec;
    previousIndex = interval.segmentIndex;
  });

  const orphan = clipsByIndex.keys().next();
  if (!orphan.done) {
    throw new TimelineInvariantError(`Narration clip for segment ${orphan.value} has no capture interval`);
  }

  return {
    topic: run.topic,
    narrationMode: run.narrationMode,
    entries,
    totalSec: entries.length ? entries[entries.length - 1].endSec : 0,
    degraded: run.degradedSegments.length > 0
  };
}
