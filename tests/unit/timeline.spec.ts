import { describe, it, expect } from 'vitest';
import { buildTimeline } from '@/lib/tutorial/timeline';
import { TimelineInvariantError } from '@/lib/tutorial/errors';
import type { CaptureInterval, NarrationClip, Segment, TutorialRun } from '@/types/tutorial';

const executed = (index: number, explanation = `Step ${index}`): Segment => ({
  index,
  code: `step_${index}()`,
  explanation,
  status: 'executed'
});

const interval = (segmentIndex: number, start: number, end: number): CaptureInterval => ({
  segmentIndex,
  filePath: `/tmp/rec/segment_00${segmentIndex}.mp4`,
  startOffsetSec: start,
  endOffsetSec: end
});

const clip = (segmentIndex: number, start: number, duration: number): NarrationClip => ({
  segmentIndex,
  audioPath: `/tmp/audio/narration_00${segmentIndex}.mp3`,
  durationSec: duration,
  startOffsetSec: start
});

function run(overrides: Partial<TutorialRun>): TutorialRun {
  return {
    topic: 'Lists',
    narrationMode: 'after',
    approvalPolicy: 'force-approve',
    segments: [],
    intervals: [],
    clips: [],
    degradedSegments: [],
    ...overrides
  };
}

describe('buildTimeline', () => {
  it('holds the last frame while after-mode narration plays', () => {
    const timeline = buildTimeline(
      run({
        segments: [executed(0), executed(1)],
        intervals: [interval(0, 0, 1.5), interval(1, 3.5, 5)],
        clips: [clip(0, 1.5, 2), clip(1, 5, 1.25)]
      })
    );

    expect(timeline.entries.map((e) => [e.startSec, e.endSec, e.holdSec, e.audioDelaySec])).toEqual([
      [0, 3.5, 2, 1.5],
      [3.5, 6.25, 1.25, 1.5]
    ]);
    expect(timeline.totalSec).toBe(6.25);
    expect(timeline.degraded).toBe(false);
  });

  it('plays parallel narration from the interval start', () => {
    const timeline = buildTimeline(
      run({
        narrationMode: 'parallel',
        segments: [executed(0)],
        intervals: [interval(0, 0, 2.5)],
        clips: [clip(0, 0, 2)]
      })
    );

    expect(timeline.entries[0]).toMatchObject({ startSec: 0, endSec: 2.5, holdSec: 0, audioDelaySec: 0, caption: 'Step 0' });
  });

  it('keeps degraded segments without narration', () => {
    const timeline = buildTimeline(
      run({
        segments: [executed(0), executed(1)],
        intervals: [interval(0, 0, 1), interval(1, 1, 2)],
        clips: [clip(1, 2, 1)],
        degradedSegments: [0]
      })
    );

    expect(timeline.entries[0].clip).toBeNull();
    expect(timeline.entries[0].endSec).toBe(1);
    expect(timeline.totalSec).toBe(3);
    expect(timeline.degraded).toBe(true);
  });

  it('ignores rejected proposals when pairing intervals', () => {
    const rejected: Segment = { index: 1, code: 'bad()', explanation: 'Nope', status: 'rejected' };
    const timeline = buildTimeline(
      run({
        segments: [executed(0), rejected, executed(1)],
        intervals: [interval(0, 0, 1), interval(1, 1, 2)]
      })
    );

    expect(timeline.entries.map((e) => e.segmentIndex)).toEqual([0, 1]);
  });

  it('is empty for a run without executed segments', () => {
    expect(buildTimeline(run({}))).toMatchObject({ entries: [], totalSec: 0 });
  });

  it('rejects a missing interval', () => {
    expect(() => buildTimeline(run({ segments: [executed(0)] }))).toThrow(
      'Expected one interval per executed segment (1), found 0'
    );
  });

  it('rejects overlapping entries', () => {
    expect(() =>
      buildTimeline(
        run({
          segments: [executed(0), executed(1)],
          intervals: [interval(0, 0, 1), interval(1, 1, 2)],
          clips: [clip(0, 1, 2)]
        })
      )
    ).toThrow('Interval for segment 1 starts at 1s, before the previous entry ends at 3s');
  });

  it('rejects narration placed before its interval', () => {
    expect(() =>
      buildTimeline(run({ segments: [executed(0)], intervals: [interval(0, 1, 2)], clips: [clip(0, 0.5, 1)] }))
    ).toThrow(TimelineInvariantError);
  });

  it('rejects duplicate and orphan clips', () => {
    expect(() =>
      buildTimeline(
        run({ segments: [executed(0)], intervals: [interval(0, 0, 1)], clips: [clip(0, 1, 1), clip(0, 2, 1)] })
      )
    ).toThrow('Segment 0 has more than one narration clip');
    expect(() =>
      buildTimeline(run({ segments: [executed(0)], intervals: [interval(0, 0, 1)], clips: [clip(3, 1, 1)] }))
    ).toThrow('Narration clip for segment 3 has no capture interval');
  });

  it('rejects intervals that do not match the executed segments', () => {
    expect(() =>
      buildTimeline(run({ segments: [executed(0)], intervals: [interval(2, 0, 1)] }))
    ).toThrow('Interval 0 belongs to segment 2, expected 0');
    expect(() =>
      buildTimeline(run({ segments: [executed(0)], intervals: [interval(0, 2, 1)] }))
    ).toThrow('Interval for segment 0 ends before it starts');
  });
});
