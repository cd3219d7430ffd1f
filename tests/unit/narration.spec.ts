import { describe, it, expect } from 'vitest';
import { NarrationRecorder, type AudioPlayer, type SpeechSynthesizer } from '@/lib/tutorial/narration';
import { SynthesisError } from '@/lib/tutorial/errors';
import { FakeClock, StubPlayer, StubSynthesizer } from '@/tests/helpers/fakes';

describe('NarrationRecorder.synthesize', () => {
  it('returns a clip placed at the requested offset', async () => {
    const recorder = new NarrationRecorder(new StubSynthesizer({ durationSec: 3.2 }), new StubPlayer());

    expect(await recorder.synthesize(4, 'Now we sort the list.', 12.5)).toEqual({
      segmentIndex: 4,
      audioPath: '/tmp/audio/narration_004.mp3',
      durationSec: 3.2,
      startOffsetSec: 12.5
    });
  });

  it('rejects empty narration', async () => {
    const recorder = new NarrationRecorder(new StubSynthesizer(), new StubPlayer());

    await expect(recorder.synthesize(0, '  ', 0)).rejects.toBeInstanceOf(SynthesisError);
  });

  it('wraps provider failures as synthesis errors', async () => {
    const failing: SpeechSynthesizer = {
      speak: async () => {
        throw new Error('quota exceeded');
      }
    };
    const recorder = new NarrationRecorder(failing, new StubPlayer());

    await expect(recorder.synthesize(2, 'Hello', 0)).rejects.toThrow('Narration failed for segment 2: quota exceeded');
    await expect(recorder.synthesize(2, 'Hello', 0)).rejects.toBeInstanceOf(SynthesisError);
  });

  it('rejects audio without a usable duration', async () => {
    const silent: SpeechSynthesizer = { speak: async () => ({ audioPath: '/tmp/a.mp3', durationSec: 0 }) };
    const recorder = new NarrationRecorder(silent, new StubPlayer());

    await expect(recorder.synthesize(1, 'Hello', 0)).rejects.toThrow('Narration for segment 1 has no measurable duration');
  });
});

describe('NarrationRecorder.beginPlayback', () => {
  it('resolves with the clip once playback ends', async () => {
    const player = new StubPlayer();
    const recorder = new NarrationRecorder(new StubSynthesizer({ durationSec: 1.5 }), player);

    const playback = recorder.beginPlayback(0, 'First we import pandas.', () => 0);

    expect(await playback.finished).toEqual({
      segmentIndex: 0,
      audioPath: '/tmp/audio/narration_000.mp3',
      durationSec: 1.5,
      startOffsetSec: 0
    });
    expect(player.played).toEqual(['/tmp/audio/narration_000.mp3']);
  });

  it('stamps the clip offset when the player starts, after synthesis latency', async () => {
    const clock = new FakeClock();
    const player = new StubPlayer(clock, 1500);
    const recorder = new NarrationRecorder(new StubSynthesizer({ clock, latencyMs: 1200, durationSec: 1.5 }), player);

    const clip = await recorder.beginPlayback(2, 'Now we plot.', () => clock.now() / 1000).finished;

    expect(player.startedAt).toEqual([1200]);
    expect(clip.startOffsetSec).toBe(1.2);
    expect(clock.now()).toBe(2700);
  });

  it('stops an ongoing playback', async () => {
    const waiting: AudioPlayer = {
      play: (_path, signal) =>
        new Promise((_resolve, reject) => {
          if (!signal) return;
          const stopped = signal;
          stopped.addEventListener('abort', () => reject(stopped.reason), { once: true });
        })
    };
    const recorder = new NarrationRecorder(new StubSynthesizer(), waiting);

    const playback = recorder.beginPlayback(0, 'Hello', () => 0);
    await new Promise((resolve) => setImmediate(resolve));
    playback.stop();

    await expect(playback.finished).rejects.toBe('narration stopped');
  });

  it('reports player failures as synthesis errors', async () => {
    const broken: AudioPlayer = {
      play: async () => {
        throw new Error('no audio device');
      }
    };
    const recorder = new NarrationRecorder(new StubSynthesizer(), broken);

    await expect(recorder.beginPlayback(3, 'Hello', () => 0).finished).rejects.toThrow(
      'Playback failed for segment 3: no audio device'
    );
  });
});
